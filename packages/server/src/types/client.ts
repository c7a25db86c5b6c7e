import type { ClientAuthMethod, OidcClient } from '@opcore/shared';

/**
 * Client that authenticated to the current request
 */
export interface AuthenticatedClient {
  client: OidcClient;
  authMethod: ClientAuthMethod;
}
