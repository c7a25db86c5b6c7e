import type { OidcClient, TokenResponse } from '@opcore/shared';
import type { ProviderContext } from '../../context.js';
import type { TokenRequest } from '../../types/schemas.js';
import { grantForToken, bearerResponse, revokeMintedFrom } from '../common.js';
import { OAuthError } from '../../errors/oauth-error.js';
import { buildIdTokenClaims } from '../../token/id-token.js';
import { unpackSessionKey } from '../../session/session-key.js';
import {
  GRANT_TYPE_AUTHORIZATION_CODE,
  OFFLINE_ACCESS_SCOPE,
  OPENID_SCOPE,
  TOKEN_TYPE_AUTHORIZATION_CODE,
} from '../../config/constants.js';

type AuthorizationCodeRequest = Extract<TokenRequest, { grant_type: 'authorization_code' }>;

type Exchange = { kind: 'issued'; response: TokenResponse } | { kind: 'rejected'; error: OAuthError };

/**
 * Authorization Code Grant Handler
 * RFC 6749 Section 4.1.3, OpenID Connect Core 1.0 Section 3.1.3
 */
export function createAuthorizationCodeHandler(ctx: ProviderContext) {
  const { sessionManager, tokenHandler, clock, claims, idTokens, logger } = ctx;

  return async (client: OidcClient, request: AuthorizationCodeRequest): Promise<TokenResponse> => {
    if (!client.allowedGrants.includes(GRANT_TYPE_AUTHORIZATION_CODE)) {
      throw OAuthError.unauthorizedClient('Client is not allowed to use authorization_code grant');
    }

    const { sessionId } = await grantForToken(ctx, request.code, client);
    const [userId] = unpackSessionKey(sessionId);

    // Rejections are returned, not thrown, so revocations made on a
    // replayed code are persisted with the grant
    const exchange = await sessionManager.updateGrant(sessionId, async (grant): Promise<Exchange> => {
      const now = clock.now();
      const code = grant.getToken(request.code);
      if (!code || code.type !== TOKEN_TYPE_AUTHORIZATION_CODE) {
        return { kind: 'rejected', error: OAuthError.invalidGrant('Not an authorization code') };
      }

      if (code.maxUsageReached() || code.revoked) {
        const revoked = revokeMintedFrom(grant, code);
        code.revoke();
        logger.warn('Authorization code replayed', { clientId: client.clientId, revoked });
        return { kind: 'rejected', error: OAuthError.invalidGrant('Authorization code has already been used') };
      }

      if (!code.isActive(now) || !grant.isActive()) {
        return { kind: 'rejected', error: OAuthError.invalidGrant('Authorization code is expired or revoked') };
      }

      // RFC 6749 Section 4.1.3: must match if it was in the authorization request
      const expectedRedirect = grant.authorizationRequest.redirect_uri;
      if (expectedRedirect !== undefined && request.redirect_uri !== undefined && request.redirect_uri !== expectedRedirect) {
        return { kind: 'rejected', error: OAuthError.invalidGrant('redirect_uri mismatch') };
      }

      const accessToken = await grant.mintToken(sessionId, 'access_token', tokenHandler.codec('access_token'), {
        now,
        basedOn: code,
        scope: grant.scope,
        resources: grant.resources,
      });
      const response = bearerResponse(accessToken, now, grant.scope);

      if (grant.scope.includes(OFFLINE_ACCESS_SCOPE) && grant.supportsMinting(code, 'refresh_token')) {
        const refreshToken = await grant.mintToken(sessionId, 'refresh_token', tokenHandler.codec('refresh_token'), {
          now,
          basedOn: code,
          scope: grant.scope,
          resources: grant.resources,
        });
        response.refresh_token = refreshToken.value;
      }

      if (grant.scope.includes(OPENID_SCOPE) && grant.supportsMinting(code, 'id_token')) {
        const userClaims = await claims.getUserClaims(userId, { ...grant.claims.id_token });
        const algorithm = await idTokens.algorithmFor(client.clientId);
        const idToken = await grant.mintToken(sessionId, 'id_token', tokenHandler.codec('id_token'), {
          now,
          basedOn: code,
          extra: buildIdTokenClaims({ grant, accessToken: accessToken.value, userClaims, algorithm }),
        });
        response.id_token = idToken.value;
      }

      code.registerUsage();
      return { kind: 'issued', response };
    });

    if (exchange.kind === 'rejected') {
      throw exchange.error;
    }

    logger.info('Authorization code exchanged', { clientId: client.clientId });
    return exchange.response;
  };
}
