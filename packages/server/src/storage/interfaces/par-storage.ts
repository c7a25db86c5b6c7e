/**
 * Storage for pushed authorization requests
 * RFC 9126
 */
export interface IParStorage {
  /**
   * Store request parameters under a request_uri for `ttlSeconds`
   */
  put(requestUri: string, params: Record<string, string>, ttlSeconds: number): Promise<void>;

  /**
   * Return and delete the stored parameters in one step.
   * Returns null when absent, expired or already taken.
   */
  take(requestUri: string): Promise<Record<string, string> | null>;
}
