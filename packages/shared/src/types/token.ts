/**
 * Token endpoint success response
 * RFC 6749 Section 5.1
 */
export interface TokenResponse {
  access_token: string;
  token_type: 'Bearer';
  expires_in?: number;
  refresh_token?: string;
  id_token?: string;
  scope?: string;
}

/**
 * ID Token Payload
 * OpenID Connect Core 1.0 Section 2
 */
export interface IdTokenPayload {
  iss: string;
  sub: string;
  aud: string[];
  exp: number;
  iat: number;
  auth_time?: number;
  nonce?: string;
  acr?: string;
  sid: string;
  c_hash?: string;
  at_hash?: string;
  [claim: string]: unknown;
}

/**
 * Logout Token Payload
 * OpenID Connect Back-Channel Logout 1.0 Section 2.4
 */
export interface LogoutTokenPayload {
  iss: string;
  sub: string;
  aud: string[];
  iat: number;
  jti: string;
  events: {
    'http://schemas.openid.net/event/backchannel-logout': Record<string, never>;
  };
  sid: string;
  [claim: string]: unknown;
}

/**
 * Token Introspection Response
 * RFC 7662 Section 2.2
 */
export interface IntrospectionResponse {
  active: boolean;
  scope?: string;
  client_id?: string;
  token_type?: string;
  exp?: number;
  iat?: number;
  sub?: string;
  aud?: string[];
  iss?: string;
  [claim: string]: unknown;
}
