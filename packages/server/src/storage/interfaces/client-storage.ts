import type { OidcClient, CreateClientInput } from '@opcore/shared';

/**
 * Client registry
 */
export interface IClientStorage {
  /**
   * Register a client
   * Returns the client and, for confidential clients, the plaintext secret
   */
  create(input: CreateClientInput): Promise<{ client: OidcClient; clientSecret?: string }>;

  /**
   * Find a client by client_id
   */
  findByClientId(clientId: string): Promise<OidcClient | null>;

  /**
   * List all registered clients
   */
  list(): Promise<OidcClient[]>;

  /**
   * Verify client credentials
   * Returns the client if credentials are valid, null otherwise
   */
  verifyCredentials(clientId: string, clientSecret: string): Promise<OidcClient | null>;
}
