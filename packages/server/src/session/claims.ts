import { isDeepStrictEqual } from 'node:util';
import type { ClaimRequestSpec, ClaimsRestriction, ClaimsUsage, UserClaims } from '@opcore/shared';
import type { IClientStorage } from '../storage/interfaces/client-storage.js';
import type { IUserStorage } from '../storage/interfaces/user-storage.js';
import type { SessionManager } from './manager.js';
import { convertScopesToClaims, STANDARD_SCOPE_CLAIMS } from './scopes.js';
import { unpackSessionKey } from './session-key.js';

/**
 * How one usage (userinfo, id_token, ...) assembles its restriction
 */
export interface ClaimsUsagePolicy {
  baseClaims?: ClaimsRestriction;
  enableClaimsPerClient?: boolean;
  addClaimsByScope?: boolean;
}

export type ClaimsPolicy = Partial<Record<ClaimsUsage, ClaimsUsagePolicy>>;

export const DEFAULT_CLAIMS_POLICY: ClaimsPolicy = {
  userinfo: { addClaimsByScope: true, enableClaimsPerClient: true },
  id_token: { enableClaimsPerClient: true },
  introspection: { enableClaimsPerClient: true },
  access_token: {},
};

/**
 * Whether a user's claim value satisfies a claim request.
 * OpenID Connect Core 1.0 Section 5.5.1
 */
export function claimsMatch(value: unknown, spec: ClaimRequestSpec | null | undefined): boolean {
  if (value === null || value === undefined) {
    return false;
  }
  if (spec === null || spec === undefined) {
    return true;
  }

  if ('value' in spec && isDeepStrictEqual(value, spec.value)) {
    return true;
  }
  if (spec.values?.some((candidate) => isDeepStrictEqual(value, candidate))) {
    return true;
  }

  // essential alone constrains presence only
  const keys = Object.keys(spec);
  return keys.length === 1 && keys[0] === 'essential';
}

/**
 * Resolves what identity data a usage may release for a session
 */
export class ClaimsResolver {
  private readonly policy: ClaimsPolicy;
  private readonly scopeToClaims: Record<string, readonly string[]>;

  constructor(
    private readonly sessionManager: SessionManager,
    private readonly clients: IClientStorage,
    private readonly users: IUserStorage,
    options: { policy?: ClaimsPolicy; scopeToClaims?: Record<string, readonly string[]> } = {}
  ) {
    this.policy = options.policy ?? DEFAULT_CLAIMS_POLICY;
    this.scopeToClaims = options.scopeToClaims ?? STANDARD_SCOPE_CLAIMS;
  }

  /**
   * Claims restriction for a usage. Later sources overwrite the spec of
   * a claim an earlier one already named: configured base claims, then
   * per-client claims, then scope claims, then claims the authorization
   * request asked for.
   */
  async getClaims(sessionId: string, scopes: readonly string[], usage: ClaimsUsage): Promise<ClaimsRestriction> {
    const policy = this.policy[usage] ?? {};
    const claims: ClaimsRestriction = { ...policy.baseClaims };

    const [, clientId, grantId] = unpackSessionKey(sessionId);

    if (policy.enableClaimsPerClient && clientId !== undefined) {
      const client = await this.clients.findByClientId(clientId);
      const perClient = client?.addClaims?.[usage];
      if (Array.isArray(perClient)) {
        for (const name of perClient) {
          claims[name] = null;
        }
      } else if (perClient) {
        Object.assign(claims, perClient);
      }
    }

    if (policy.addClaimsByScope) {
      Object.assign(claims, convertScopesToClaims(scopes, this.scopeToClaims));
    }

    if ((usage === 'id_token' || usage === 'userinfo') && grantId !== undefined) {
      const grant = await this.sessionManager.getGrant(sessionId);
      const requested = grant.authorizationRequest.claims?.[usage];
      if (requested) {
        Object.assign(claims, requested);
      }
    }

    return claims;
  }

  /**
   * Claims the given scopes release
   */
  scopeClaims(scopes: readonly string[]): ClaimsRestriction {
    return convertScopesToClaims(scopes, this.scopeToClaims);
  }

  /**
   * Claims of the given restriction a user can actually release
   */
  async getUserClaims(userId: string, restriction: ClaimsRestriction): Promise<UserClaims> {
    const info = await this.users.getClaims(userId);
    const released: UserClaims = {};
    if (!info) {
      return released;
    }

    for (const [name, spec] of Object.entries(restriction)) {
      const value = info[name];
      if (claimsMatch(value, spec)) {
        released[name] = value;
      }
    }
    return released;
  }
}
