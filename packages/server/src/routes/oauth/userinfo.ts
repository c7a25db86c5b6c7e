import { Hono, type Context } from 'hono';
import type { OidcVariables } from '../../types/hono.js';
import type { ProviderContext } from '../../context.js';
import { OAuthError } from '../../errors/oauth-error.js';
import { bearerAuth } from '../../middleware/bearer-auth.js';
import { unpackSessionKey } from '../../session/session-key.js';

export interface UserInfoRoutesOptions {
  provider: ProviderContext;
}

/**
 * Create UserInfo endpoint routes
 *
 * OpenID Connect Core 1.0 Section 5.3
 */
export function createUserInfoRoutes(options: UserInfoRoutesOptions) {
  const { provider } = options;

  const router = new Hono<{ Variables: OidcVariables }>();

  const auth = bearerAuth({
    sessionManager: provider.sessionManager,
    clock: provider.clock,
    realm: provider.settings.issuer,
  });

  const userinfo = async (c: Context<{ Variables: OidcVariables }>) => {
    const bearer = c.get('bearer');
    if (!bearer) {
      throw OAuthError.invalidToken('Missing access token');
    }

    const { sessionId, grant, token } = bearer;
    const [userId] = unpackSessionKey(sessionId);

    const restriction = await provider.claims.getClaims(sessionId, token.scope ?? grant.scope, 'userinfo');
    const claims = await provider.claims.getUserClaims(userId, restriction);

    // sub is the client session's subject, never the user's own claim
    return c.json({ ...claims, sub: grant.sub });
  };

  // GET /userinfo
  router.get('/', auth, userinfo);

  // POST /userinfo
  router.post('/', auth, userinfo);

  return router;
}
