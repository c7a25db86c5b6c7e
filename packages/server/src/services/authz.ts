import type { AuthorizationRequest, ClaimsRestriction, ClaimsUsage, OidcClient, UsageRules } from '@opcore/shared';
import type { ClaimsResolver } from '../session/claims.js';
import type { SessionManager } from '../session/manager.js';
import type { Grant } from '../session/grant.js';
import type { Logger } from '../logging/logger.js';
import { checkUnknownScopesPolicy, filterScopes } from '../session/scopes.js';

const CLAIMS_USAGES: readonly ClaimsUsage[] = ['userinfo', 'id_token', 'introspection', 'access_token'];

export interface AuthorizationServiceOptions {
  sessionManager: SessionManager;
  claims: ClaimsResolver;
  defaultUsageRules: UsageRules;
  scopesSupported: readonly string[];
  denyUnknownScopes: boolean;
  logger: Logger;
}

/**
 * Decides what a grant covers: scopes, claims per usage and token usage rules
 */
export class AuthorizationService {
  constructor(private readonly options: AuthorizationServiceOptions) {}

  /**
   * Provider usage rules with the client's own rules laid over them, per token type
   */
  usageRules(client: OidcClient): UsageRules {
    const rules: UsageRules = { ...this.options.defaultUsageRules };
    for (const [type, rule] of Object.entries(client.tokenUsageRules ?? {})) {
      if (type === 'authorization_code' || type === 'access_token' || type === 'refresh_token' || type === 'id_token') {
        rules[type] = { ...rules[type], ...rule };
      }
    }
    return rules;
  }

  /**
   * Refuse scopes the unknown-scopes policy does not allow
   */
  checkScopes(request: AuthorizationRequest, client: OidcClient): void {
    try {
      checkUnknownScopesPolicy(request.scope, client, {
        denyUnknown: this.options.denyUnknownScopes,
        scopesSupported: this.options.scopesSupported,
      });
    } catch (error) {
      this.options.logger.warn('Scope denied', { clientId: client.clientId, scope: request.scope });
      throw error;
    }
  }

  grantScope(request: AuthorizationRequest, client: OidcClient): string[] {
    return filterScopes(request.scope, client);
  }

  /**
   * Resolve and store the claims each usage of the grant may release
   */
  async authorize(sessionId: string): Promise<Grant> {
    return this.options.sessionManager.updateGrant(sessionId, async (grant) => {
      const claims: Partial<Record<ClaimsUsage, ClaimsRestriction>> = {};
      for (const usage of CLAIMS_USAGES) {
        claims[usage] = await this.options.claims.getClaims(sessionId, grant.scope, usage);
      }
      grant.setClaims(claims);
      return grant;
    });
  }
}
