import { Hono } from 'hono';
import type { OidcVariables } from '../../types/hono.js';
import type { ProviderContext } from '../../context.js';
import { OAuthError } from '../../errors/oauth-error.js';
import { SessionError } from '../../errors/session-errors.js';
import { clientAuthenticator } from '../../middleware/client-authenticator.js';
import { requestParams } from '../../utils/params.js';

export interface RevokeRouteOptions {
  provider: ProviderContext;
}

/**
 * Create token revocation endpoint routes
 *
 * RFC 7009
 */
export function createRevokeRoutes(options: RevokeRouteOptions) {
  const { provider } = options;

  const router = new Hono<{ Variables: OidcVariables }>();

  // POST /revoke
  router.post(
    '/',
    clientAuthenticator({ clientStorage: provider.clients }),
    async (c) => {
      const authenticated = c.get('client');
      if (!authenticated) {
        throw OAuthError.invalidClient('Client authentication required');
      }

      const params = await requestParams(c);
      const value = params['token'];
      if (!value) {
        throw OAuthError.invalidRequest('Missing token parameter');
      }

      // RFC 7009 Section 2.2: unknown tokens are not an error
      try {
        const { sessionId, clientId } = await provider.sessionManager.getSessionInfoByToken(value);
        if (clientId !== authenticated.client.clientId) {
          provider.logger.warn('Revocation of a token issued to another client', {
            clientId: authenticated.client.clientId,
          });
        } else {
          await provider.sessionManager.revokeToken(sessionId, value);
          provider.logger.info('Token revoked', { clientId });
        }
      } catch (error) {
        if (!(error instanceof SessionError)) {
          throw error;
        }
        provider.logger.debug('Revocation of an unknown token', { clientId: authenticated.client.clientId });
      }

      return c.body(null, 200);
    }
  );

  return router;
}
