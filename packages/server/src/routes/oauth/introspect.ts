import { Hono } from 'hono';
import type { IntrospectionResponse } from '@opcore/shared';
import type { OidcVariables } from '../../types/hono.js';
import type { ProviderContext } from '../../context.js';
import type { GrantSessionInfo } from '../../session/manager.js';
import { OAuthError } from '../../errors/oauth-error.js';
import { SessionError } from '../../errors/session-errors.js';
import { clientAuthenticator } from '../../middleware/client-authenticator.js';
import { unpackSessionKey } from '../../session/session-key.js';
import { requestParams } from '../../utils/params.js';
import { TOKEN_TYPE_ACCESS_TOKEN, TOKEN_TYPE_BEARER } from '../../config/constants.js';

export interface IntrospectRouteOptions {
  provider: ProviderContext;
}

/**
 * Create token introspection endpoint routes
 *
 * RFC 7662
 */
export function createIntrospectRoutes(options: IntrospectRouteOptions) {
  const { provider } = options;

  const router = new Hono<{ Variables: OidcVariables }>();

  // POST /introspect
  router.post(
    '/',
    // Require client authentication for introspection
    clientAuthenticator({
      clientStorage: provider.clients,
      allowPublicClients: false,
    }),
    async (c) => {
      const params = await requestParams(c);
      const value = params['token'];
      if (!value) {
        throw OAuthError.invalidRequest('Missing token parameter');
      }

      // Inactive response for invalid tokens
      const inactive: IntrospectionResponse = { active: false };

      let info: GrantSessionInfo;
      try {
        info = await provider.sessionManager.getSessionInfoByToken(value);
      } catch (error) {
        if (error instanceof SessionError) {
          return c.json(inactive);
        }
        throw error;
      }

      const { sessionId, clientId, grant } = info;
      const token = grant.getToken(value);
      const now = provider.clock.now();
      if (!token || !token.isActive(now) || !grant.isActive()) {
        return c.json(inactive);
      }

      const scope = token.scope ?? grant.scope;
      const [userId] = unpackSessionKey(sessionId);
      const restriction = await provider.claims.getClaims(sessionId, scope, 'introspection');
      const claims = await provider.claims.getUserClaims(userId, restriction);

      const response: IntrospectionResponse = {
        ...claims,
        active: true,
        scope: scope.join(' '),
        client_id: clientId,
        token_type: token.type === TOKEN_TYPE_ACCESS_TOKEN ? TOKEN_TYPE_BEARER : token.type,
        iat: token.issuedAt,
        sub: grant.sub,
        aud: [clientId],
        iss: provider.settings.issuer,
      };
      if (token.expiresAt !== undefined) {
        response.exp = token.expiresAt;
      }

      return c.json(response);
    }
  );

  return router;
}
