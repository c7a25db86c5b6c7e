/**
 * OAuth 2.0 Grant Types handled by the token endpoint
 * RFC 6749
 */
export type GrantType = 'authorization_code' | 'refresh_token';

/**
 * Single response type values for the authorization endpoint
 * OAuth 2.0 Multiple Response Type Encoding Practices
 */
export type ResponseTypeValue = 'code' | 'token' | 'id_token' | 'none';

/**
 * How authorization response parameters are returned to the client
 */
export type ResponseMode = 'query' | 'fragment' | 'form_post';

/**
 * OpenID Connect prompt values
 */
export type Prompt = 'none' | 'login' | 'consent' | 'select_account';

/**
 * Credential types that live inside a grant
 */
export type TokenType = 'authorization_code' | 'access_token' | 'refresh_token' | 'id_token';

/**
 * Places where a claims restriction applies
 */
export type ClaimsUsage = 'userinfo' | 'id_token' | 'introspection' | 'access_token';

/**
 * Individual claim request
 * OpenID Connect Core 1.0 Section 5.5.1
 */
export interface ClaimRequestSpec {
  essential?: boolean;
  value?: unknown;
  values?: unknown[];
}

/**
 * A claim name mapped to its request, null meaning "default manner"
 */
export type ClaimsRestriction = Record<string, ClaimRequestSpec | null>;

/**
 * The `claims` authorization request parameter
 */
export interface ClaimsParameter {
  userinfo?: ClaimsRestriction;
  id_token?: ClaimsRestriction;
}

/**
 * Authorization request after parsing, as snapshotted into a grant
 */
export interface AuthorizationRequest {
  client_id: string;
  response_type: ResponseTypeValue[];
  scope: string[];
  redirect_uri?: string;
  state?: string;
  nonce?: string;
  response_mode?: ResponseMode;
  prompt?: Prompt[];
  max_age?: number;
  acr_values?: string[];
  login_hint?: string;
  id_token_hint?: string;
  ui_locales?: string;
  claims?: ClaimsParameter;
  resource?: string[];
  upm_answer?: string;
}

/**
 * Pushed Authorization Request response
 * RFC 9126 Section 2.2
 */
export interface PushedAuthorizationResponse {
  request_uri: string;
  expires_in: number;
}
