import type { OidcClient } from '@opcore/shared';
import { UnAuthorizedClientScope } from '../errors/session-errors.js';
import {
  ADDRESS_SCOPE,
  EMAIL_SCOPE,
  OFFLINE_ACCESS_SCOPE,
  OPENID_SCOPE,
  PHONE_SCOPE,
  PROFILE_SCOPE,
} from '../config/constants.js';

/**
 * Claims released by each standard scope
 * OpenID Connect Core 1.0 Section 5.4
 */
export const STANDARD_SCOPE_CLAIMS: Record<string, readonly string[]> = {
  [OPENID_SCOPE]: ['sub'],
  [PROFILE_SCOPE]: [
    'name',
    'given_name',
    'family_name',
    'middle_name',
    'nickname',
    'profile',
    'picture',
    'website',
    'gender',
    'birthdate',
    'zoneinfo',
    'locale',
    'updated_at',
    'preferred_username',
  ],
  [EMAIL_SCOPE]: ['email', 'email_verified'],
  [ADDRESS_SCOPE]: ['address'],
  [PHONE_SCOPE]: ['phone_number', 'phone_number_verified'],
  [OFFLINE_ACCESS_SCOPE]: [],
};

/**
 * Claim names released by a set of scopes. Unknown scopes release nothing.
 */
export function convertScopesToClaims(
  scopes: readonly string[],
  scopeToClaims: Record<string, readonly string[]> = STANDARD_SCOPE_CLAIMS
): Record<string, null> {
  const claims: Record<string, null> = {};
  for (const scope of scopes) {
    for (const claim of scopeToClaims[scope] ?? []) {
      claims[claim] = null;
    }
  }
  return claims;
}

/**
 * Scopes a client may be granted out of the requested ones
 */
export function filterScopes(requested: readonly string[], client: Pick<OidcClient, 'allowedScopes'>): string[] {
  const allowed = client.allowedScopes;
  return allowed ? requested.filter((scope) => allowed.includes(scope)) : [...requested];
}

/**
 * With `denyUnknown` set, refuse a request naming a scope outside the
 * client's allowed scopes, or the provider's when the client has none
 */
export function checkUnknownScopesPolicy(
  requested: readonly string[],
  client: Pick<OidcClient, 'allowedScopes' | 'clientId'>,
  options: { denyUnknown: boolean; scopesSupported: readonly string[] }
): void {
  if (!options.denyUnknown) {
    return;
  }
  const allowed = client.allowedScopes ?? options.scopesSupported;
  const refused = requested.find((scope) => !allowed.includes(scope));
  if (refused !== undefined) {
    throw new UnAuthorizedClientScope(`${client.clientId} requested an unauthorized scope (${refused})`);
  }
}
