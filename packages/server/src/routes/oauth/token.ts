import { Hono } from 'hono';
import type { OidcVariables } from '../../types/hono.js';
import type { ProviderContext } from '../../context.js';
import { OAuthError } from '../../errors/oauth-error.js';
import { clientAuthenticator } from '../../middleware/client-authenticator.js';
import { createAuthorizationCodeHandler } from '../../grants/authorization-code/handler.js';
import { createRefreshTokenHandler } from '../../grants/refresh-token/handler.js';
import { tokenRequestSchema } from '../../types/schemas.js';
import { requestParams } from '../../utils/params.js';
import {
  HEADER_CACHE_CONTROL,
  HEADER_PRAGMA,
  SUPPORTED_GRANT_TYPES,
  TOKEN_CACHE_CONTROL,
  TOKEN_PRAGMA,
} from '../../config/constants.js';

export interface TokenRouteOptions {
  provider: ProviderContext;
}

function isSupportedGrantType(value: string): boolean {
  return SUPPORTED_GRANT_TYPES.some((grantType) => grantType === value);
}

/**
 * Create token endpoint routes
 *
 * RFC 6749 Section 3.2
 */
export function createTokenRoutes(options: TokenRouteOptions) {
  const { provider } = options;

  const router = new Hono<{ Variables: OidcVariables }>();

  const authorizationCodeHandler = createAuthorizationCodeHandler(provider);
  const refreshTokenHandler = createRefreshTokenHandler(provider);

  // POST /token
  router.post(
    '/',
    clientAuthenticator({ clientStorage: provider.clients }),
    async (c) => {
      const authenticated = c.get('client');
      if (!authenticated) {
        throw OAuthError.invalidClient('Client authentication required');
      }

      const params = await requestParams(c);
      const grantType = params['grant_type'];
      if (!grantType) {
        throw OAuthError.invalidRequest('Missing grant_type parameter');
      }
      if (!isSupportedGrantType(grantType)) {
        throw OAuthError.unsupportedGrantType(`Unsupported grant_type: ${grantType}`);
      }

      const request = tokenRequestSchema.parse(params);
      if (request.client_id !== undefined && request.client_id !== authenticated.client.clientId) {
        throw OAuthError.invalidClient('client_id does not match the authenticated client');
      }

      const response =
        request.grant_type === 'authorization_code'
          ? await authorizationCodeHandler(authenticated.client, request)
          : await refreshTokenHandler(authenticated.client, request);

      // RFC 6749 Section 5.1
      c.header(HEADER_CACHE_CONTROL, TOKEN_CACHE_CONTROL);
      c.header(HEADER_PRAGMA, TOKEN_PRAGMA);
      return c.json(response);
    }
  );

  return router;
}
