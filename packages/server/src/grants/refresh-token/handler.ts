import type { OidcClient, TokenResponse } from '@opcore/shared';
import type { ProviderContext } from '../../context.js';
import type { TokenRequest } from '../../types/schemas.js';
import { grantForToken, bearerResponse } from '../common.js';
import { OAuthError } from '../../errors/oauth-error.js';
import { GRANT_TYPE_REFRESH_TOKEN, TOKEN_TYPE_REFRESH_TOKEN } from '../../config/constants.js';

type RefreshTokenRequest = Extract<TokenRequest, { grant_type: 'refresh_token' }>;

/**
 * Refresh Token Grant Handler
 * RFC 6749 Section 6
 *
 * When the usage rules let a refresh token mint another one, the old
 * token is used up and revoked.
 */
export function createRefreshTokenHandler(ctx: ProviderContext) {
  const { sessionManager, tokenHandler, clock, logger } = ctx;

  return async (client: OidcClient, request: RefreshTokenRequest): Promise<TokenResponse> => {
    if (!client.allowedGrants.includes(GRANT_TYPE_REFRESH_TOKEN)) {
      throw OAuthError.unauthorizedClient('Client is not allowed to use refresh_token grant');
    }

    const { sessionId } = await grantForToken(ctx, request.refresh_token, client);

    const response = await sessionManager.updateGrant(sessionId, async (grant) => {
      const now = clock.now();
      const refreshToken = grant.getToken(request.refresh_token);
      if (!refreshToken || refreshToken.type !== TOKEN_TYPE_REFRESH_TOKEN) {
        throw OAuthError.invalidGrant('Not a refresh token');
      }
      if (!refreshToken.isActive(now) || !grant.isActive()) {
        throw OAuthError.invalidGrant('Refresh token is expired or revoked');
      }

      // RFC 6749 Section 6: the scope may only narrow
      const granted = refreshToken.scope ?? grant.scope;
      const scope = request.scope ?? granted;
      const extra = scope.filter((value) => !granted.includes(value));
      if (extra.length > 0) {
        throw OAuthError.invalidScope(`Scope exceeds the original grant: ${extra.join(' ')}`);
      }

      const accessToken = await grant.mintToken(sessionId, 'access_token', tokenHandler.codec('access_token'), {
        now,
        basedOn: refreshToken,
        scope,
        resources: refreshToken.resources ?? grant.resources,
      });
      const tokens = bearerResponse(accessToken, now, scope);

      if (grant.supportsMinting(refreshToken, 'refresh_token')) {
        const rotated = await grant.mintToken(sessionId, 'refresh_token', tokenHandler.codec('refresh_token'), {
          now,
          basedOn: refreshToken,
          scope: granted,
          resources: refreshToken.resources ?? grant.resources,
        });
        refreshToken.registerUsage();
        refreshToken.revoke();
        tokens.refresh_token = rotated.value;
      }

      return tokens;
    });

    logger.info('Refresh token exchanged', { clientId: client.clientId, rotated: response.refresh_token !== undefined });
    return response;
  };
}
