import type { PushedAuthorizationResponse } from '@opcore/shared';
import type { IParStorage } from '../storage/interfaces/par-storage.js';
import { OAuthError } from '../errors/oauth-error.js';
import { generateUuid } from '../crypto/random.js';
import { DEFAULT_PAR_TTL, PAR_REQUEST_URI_PREFIX } from '../config/constants.js';

/**
 * Pushed authorization requests
 * RFC 9126
 */
export class PushedAuthorizations {
  constructor(
    private readonly storage: IParStorage,
    private readonly ttl: number = DEFAULT_PAR_TTL
  ) {}

  static isRequestUri(value: string): boolean {
    return value.startsWith(PAR_REQUEST_URI_PREFIX);
  }

  async push(params: Record<string, string>): Promise<PushedAuthorizationResponse> {
    const requestUri = `${PAR_REQUEST_URI_PREFIX}${generateUuid()}`;
    await this.storage.put(requestUri, params, this.ttl);
    return { request_uri: requestUri, expires_in: this.ttl };
  }

  /**
   * Stored request for a request_uri. Each one resolves once.
   */
  async resolve(requestUri: string): Promise<Record<string, string>> {
    const params = await this.storage.take(requestUri);
    if (!params) {
      throw OAuthError.invalidRequestUri('Got a request_uri I can not resolve');
    }
    return params;
  }
}
