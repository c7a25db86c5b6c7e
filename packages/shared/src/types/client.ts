import type { GrantType, TokenType, ClaimsUsage } from './oauth.js';

/**
 * OAuth 2.0 Client Types
 */
export type ClientType = 'confidential' | 'public';

/**
 * Client Authentication Methods
 */
export type ClientAuthMethod = 'client_secret_basic' | 'client_secret_post' | 'none';

/**
 * Subject identifier types
 * OpenID Connect Core 1.0 Section 8
 */
export type SubjectType = 'public' | 'pairwise';

/**
 * JSON Web Key Set
 */
export interface JsonWebKeySet {
  keys: JsonWebKey[];
}

export interface JsonWebKey {
  kty: string;
  use?: string;
  key_ops?: string[];
  alg?: string;
  kid?: string;
  n?: string;
  e?: string;
  crv?: string;
  x?: string;
  y?: string;
}

/**
 * Per token type rules a grant enforces when minting
 */
export interface UsageRule {
  expires_in?: number | string;
  max_usage?: number;
  supports_minting?: TokenType[];
}

export type UsageRules = Partial<Record<TokenType, UsageRule>>;

/**
 * Registered OpenID Connect client
 */
export interface OidcClient {
  clientId: string;
  clientSecretHash?: string;
  clientType: ClientType;
  authMethod: ClientAuthMethod;
  name: string;
  redirectUris: string[];
  /** Registered response type sets, each a space separated string such as "code id_token" */
  responseTypes?: string[];
  allowedGrants: GrantType[];
  allowedScopes?: string[];
  postLogoutRedirectUris?: string[];
  backchannelLogoutUri?: string;
  backchannelLogoutSessionRequired?: boolean;
  frontchannelLogoutUri?: string;
  frontchannelLogoutSessionRequired?: boolean;
  idTokenSignedResponseAlg?: string;
  requestObjectSigningAlg?: string;
  requestUris?: string[];
  subjectType?: SubjectType;
  sectorIdentifierUri?: string;
  jwks?: JsonWebKeySet;
  /** Claims always released to this client, per usage */
  addClaims?: Partial<Record<ClaimsUsage, string[] | Record<string, null>>>;
  tokenUsageRules?: UsageRules;
  policyUri?: string;
  logoUri?: string;
  tosUri?: string;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Client creation input
 */
export type CreateClientInput = Omit<OidcClient, 'clientId' | 'clientSecretHash' | 'createdAt' | 'updatedAt'> & {
  clientId?: string;
  clientSecret?: string;
};
