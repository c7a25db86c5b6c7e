import type {
  AuthorizationRequest,
  ClaimsRestriction,
  ClaimsUsage,
  TokenType,
  UsageRules,
} from '@opcore/shared';

export type { TokenType, ClaimsUsage, ClaimsRestriction, UsageRules };

/**
 * Result of a successful end-user authentication
 */
export interface AuthenticationEvent {
  uid: string;
  salt: string;
  /** Epoch seconds after which the event no longer backs a grant */
  validUntil: number;
  /** Authentication context class reference */
  authnInfo: string;
  authnTime?: number;
}

/**
 * Stored form of a token. `basedOn` is the index of the token it was
 * minted from in the owning grant's token list.
 */
export interface TokenRecord {
  id: string;
  type: TokenType;
  value: string;
  basedOn: number | null;
  usageCount: number;
  maxUsage?: number;
  issuedAt: number;
  expiresAt?: number;
  revoked: boolean;
  scope?: string[];
  resources?: string[];
}

export interface UserSessionRecord {
  kind: 'user';
  userId: string;
  subordinate: string[];
  revoked: boolean;
}

export interface ClientSessionRecord {
  kind: 'client';
  userId: string;
  clientId: string;
  sub: string;
  subordinate: string[];
  revoked: boolean;
}

export type GrantKind = 'authorization' | 'exchange';

export interface GrantRecord {
  kind: 'grant';
  id: string;
  grantKind: GrantKind;
  sub: string;
  scope: string[];
  resources: string[];
  authorizationRequest: AuthorizationRequest;
  authenticationEvent: AuthenticationEvent;
  claims: Partial<Record<ClaimsUsage, ClaimsRestriction>>;
  usageRules: UsageRules;
  issuedTokens: TokenRecord[];
  issuedAt: number;
  revoked: boolean;
}

export type SessionRecord = UserSessionRecord | ClientSessionRecord | GrantRecord;
