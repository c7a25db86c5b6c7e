import type { OidcClient, TokenResponse } from '@opcore/shared';
import type { ProviderContext } from '../context.js';
import type { GrantSessionInfo } from '../session/manager.js';
import type { Grant } from '../session/grant.js';
import type { SessionToken } from '../session/token.js';
import { OAuthError } from '../errors/oauth-error.js';
import { SessionError } from '../errors/session-errors.js';
import { TOKEN_TYPE_BEARER } from '../config/constants.js';

/**
 * Grant holding a token presented at the token endpoint. Anything the
 * engine can not resolve, or a token of another client, is invalid_grant.
 */
export async function grantForToken(ctx: ProviderContext, value: string, client: OidcClient): Promise<GrantSessionInfo> {
  let info: GrantSessionInfo;
  try {
    info = await ctx.sessionManager.getSessionInfoByToken(value);
  } catch (error) {
    if (error instanceof SessionError) {
      ctx.logger.info('Unresolvable token at the token endpoint', { clientId: client.clientId, error });
      throw OAuthError.invalidGrant(error.message);
    }
    throw error;
  }

  if (info.clientId !== client.clientId) {
    throw OAuthError.invalidGrant('Token was issued to a different client');
  }
  return info;
}

/**
 * Revoke every token minted from `token`, transitively
 */
export function revokeMintedFrom(grant: Grant, token: SessionToken): number {
  let revoked = 0;
  for (const derived of grant.mintedFrom(token)) {
    if (!derived.revoked) {
      derived.revoke();
      revoked += 1;
    }
    revoked += revokeMintedFrom(grant, derived);
  }
  return revoked;
}

export function bearerResponse(accessToken: SessionToken, now: number, scope: readonly string[]): TokenResponse {
  const response: TokenResponse = {
    access_token: accessToken.value,
    token_type: TOKEN_TYPE_BEARER,
  };
  const expiresIn = accessToken.expiresIn(now);
  if (expiresIn !== undefined) {
    response.expires_in = expiresIn;
  }
  if (scope.length > 0) {
    response.scope = scope.join(' ');
  }
  return response;
}
