/**
 * OAuth 2.0 / OpenID Connect Error Codes
 * RFC 6749 Section 4.1.2.1, 5.2
 * OpenID Connect Core 1.0 Section 3.1.2.6
 * RFC 9126 Section 2.3
 */

// Authorization endpoint errors (RFC 6749 Section 4.1.2.1)
export const ERROR_INVALID_REQUEST = 'invalid_request' as const;
export const ERROR_UNAUTHORIZED_CLIENT = 'unauthorized_client' as const;
export const ERROR_ACCESS_DENIED = 'access_denied' as const;
export const ERROR_UNSUPPORTED_RESPONSE_TYPE = 'unsupported_response_type' as const;
export const ERROR_INVALID_SCOPE = 'invalid_scope' as const;
export const ERROR_SERVER_ERROR = 'server_error' as const;

// Token endpoint errors (RFC 6749 Section 5.2)
export const ERROR_INVALID_CLIENT = 'invalid_client' as const;
export const ERROR_INVALID_GRANT = 'invalid_grant' as const;
export const ERROR_UNSUPPORTED_GRANT_TYPE = 'unsupported_grant_type' as const;

// OpenID Connect authentication errors
export const ERROR_LOGIN_REQUIRED = 'login_required' as const;
export const ERROR_INVALID_REQUEST_URI = 'invalid_request_uri' as const;
export const ERROR_INVALID_REQUEST_OBJECT = 'invalid_request_object' as const;

// Additional errors
export const ERROR_INVALID_TOKEN = 'invalid_token' as const;

/**
 * All OAuth error codes
 */
export type OAuthErrorCode =
  | typeof ERROR_INVALID_REQUEST
  | typeof ERROR_UNAUTHORIZED_CLIENT
  | typeof ERROR_ACCESS_DENIED
  | typeof ERROR_UNSUPPORTED_RESPONSE_TYPE
  | typeof ERROR_INVALID_SCOPE
  | typeof ERROR_SERVER_ERROR
  | typeof ERROR_INVALID_CLIENT
  | typeof ERROR_INVALID_GRANT
  | typeof ERROR_UNSUPPORTED_GRANT_TYPE
  | typeof ERROR_LOGIN_REQUIRED
  | typeof ERROR_INVALID_REQUEST_URI
  | typeof ERROR_INVALID_REQUEST_OBJECT
  | typeof ERROR_INVALID_TOKEN;

/**
 * HTTP status codes for OAuth errors
 */
export const ERROR_STATUS_CODES = {
  [ERROR_INVALID_REQUEST]: 400,
  [ERROR_UNAUTHORIZED_CLIENT]: 401,
  [ERROR_ACCESS_DENIED]: 403,
  [ERROR_UNSUPPORTED_RESPONSE_TYPE]: 400,
  [ERROR_INVALID_SCOPE]: 400,
  [ERROR_SERVER_ERROR]: 500,
  [ERROR_INVALID_CLIENT]: 401,
  [ERROR_INVALID_GRANT]: 400,
  [ERROR_UNSUPPORTED_GRANT_TYPE]: 400,
  [ERROR_LOGIN_REQUIRED]: 400,
  [ERROR_INVALID_REQUEST_URI]: 400,
  [ERROR_INVALID_REQUEST_OBJECT]: 400,
  [ERROR_INVALID_TOKEN]: 401,
} as const satisfies Record<OAuthErrorCode, number>;

export type OAuthErrorStatus = (typeof ERROR_STATUS_CODES)[OAuthErrorCode];

/**
 * Default error descriptions
 */
export const ERROR_DESCRIPTIONS: Record<OAuthErrorCode, string> = {
  [ERROR_INVALID_REQUEST]:
    'The request is missing a required parameter, includes an invalid parameter value, includes a parameter more than once, or is otherwise malformed.',
  [ERROR_UNAUTHORIZED_CLIENT]:
    'The client is not authorized to request an authorization code using this method.',
  [ERROR_ACCESS_DENIED]: 'The resource owner or authorization server denied the request.',
  [ERROR_UNSUPPORTED_RESPONSE_TYPE]:
    'The authorization server does not support obtaining an authorization code using this method.',
  [ERROR_INVALID_SCOPE]: 'The requested scope is invalid, unknown, or malformed.',
  [ERROR_SERVER_ERROR]:
    'The authorization server encountered an unexpected condition that prevented it from fulfilling the request.',
  [ERROR_INVALID_CLIENT]: 'Client authentication failed.',
  [ERROR_INVALID_GRANT]:
    'The provided authorization grant or refresh token is invalid, expired, revoked, or was issued to another client.',
  [ERROR_UNSUPPORTED_GRANT_TYPE]:
    'The authorization grant type is not supported by the authorization server.',
  [ERROR_LOGIN_REQUIRED]: 'The authorization server requires end-user authentication.',
  [ERROR_INVALID_REQUEST_URI]: 'The request_uri in the authorization request returns an error or contains invalid data.',
  [ERROR_INVALID_REQUEST_OBJECT]: 'The request parameter contains an invalid request object.',
  [ERROR_INVALID_TOKEN]: 'The access token provided is expired, revoked, malformed, or invalid.',
};
