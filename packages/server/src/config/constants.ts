/**
 * OpenID Connect Provider Constants
 */

// Grant types
export const GRANT_TYPE_AUTHORIZATION_CODE = 'authorization_code' as const;
export const GRANT_TYPE_REFRESH_TOKEN = 'refresh_token' as const;

export const SUPPORTED_GRANT_TYPES = [GRANT_TYPE_AUTHORIZATION_CODE, GRANT_TYPE_REFRESH_TOKEN] as const;

// Response types
export const RESPONSE_TYPE_CODE = 'code' as const;
export const RESPONSE_TYPE_TOKEN = 'token' as const;
export const RESPONSE_TYPE_ID_TOKEN = 'id_token' as const;
export const RESPONSE_TYPE_NONE = 'none' as const;

export const RESPONSE_TYPE_VALUES = [
  RESPONSE_TYPE_CODE,
  RESPONSE_TYPE_TOKEN,
  RESPONSE_TYPE_ID_TOKEN,
  RESPONSE_TYPE_NONE,
] as const;

// Used when a client registered no response types
export const DEFAULT_RESPONSE_TYPES = ['code'] as const;

// Response modes
export const RESPONSE_MODES = ['query', 'fragment', 'form_post'] as const;

// Token types held by a grant
export const TOKEN_TYPE_AUTHORIZATION_CODE = 'authorization_code' as const;
export const TOKEN_TYPE_ACCESS_TOKEN = 'access_token' as const;
export const TOKEN_TYPE_REFRESH_TOKEN = 'refresh_token' as const;
export const TOKEN_TYPE_ID_TOKEN = 'id_token' as const;

export const TOKEN_TYPES = [
  TOKEN_TYPE_AUTHORIZATION_CODE,
  TOKEN_TYPE_ACCESS_TOKEN,
  TOKEN_TYPE_REFRESH_TOKEN,
  TOKEN_TYPE_ID_TOKEN,
] as const;

// Type tags carried inside encoded token values
export const TOKEN_TYPE_TAGS = {
  authorization_code: 'A',
  access_token: 'T',
  refresh_token: 'R',
  id_token: 'I',
} as const;

export const TOKEN_TYPE_BEARER = 'Bearer' as const;

// Client authentication methods
export const CLIENT_AUTH_BASIC = 'client_secret_basic' as const;
export const CLIENT_AUTH_POST = 'client_secret_post' as const;
export const CLIENT_AUTH_NONE = 'none' as const;

// Signing algorithms
export const SIGNING_ALGORITHM_RS256 = 'RS256' as const;
export const SIGNING_ALGORITHM_ES256 = 'ES256' as const;

export const SUPPORTED_SIGNING_ALGORITHMS = [SIGNING_ALGORITHM_RS256, SIGNING_ALGORITHM_ES256] as const;

export const DEFAULT_SIGNING_ALGORITHM = SIGNING_ALGORITHM_RS256;

// Default TTLs (in seconds)
export const DEFAULT_AUTHORIZATION_CODE_TTL = 600; // 10 minutes
export const DEFAULT_ACCESS_TOKEN_TTL = 3600; // 1 hour
export const DEFAULT_REFRESH_TOKEN_TTL = 86400; // 1 day
export const DEFAULT_ID_TOKEN_TTL = 3600; // 1 hour
export const DEFAULT_AUTHN_EVENT_TTL = 3600; // 1 hour
export const DEFAULT_PAR_TTL = 3600; // 1 hour
export const DEFAULT_LOGOUT_TOKEN_TTL = 86400; // 1 day
export const DEFAULT_LOGOUT_CONFIRMATION_TTL = 300; // 5 minutes
export const DEFAULT_LOGIN_TICKET_TTL = 900; // 15 minutes
export const DEFAULT_BACKCHANNEL_TIMEOUT_MS = 10000;

// Cookies
export const DEFAULT_SESSION_COOKIE_NAME = 'oidc_op';
export const DEFAULT_SESSION_MANAGEMENT_COOKIE_NAME = 'oidc_op_sm';
export const COOKIE_TYPE_SESSION = 'sso' as const;
export const COOKIE_TYPE_SESSION_MANAGEMENT = 'sman' as const;

// Session keys
export const SESSION_KEY_SEPARATOR = ';;';

// PAR request_uri prefix
export const PAR_REQUEST_URI_PREFIX = 'urn:uuid:';

// Back-channel logout
export const BACKCHANNEL_LOGOUT_EVENT = 'http://schemas.openid.net/event/backchannel-logout' as const;
export const ID_TOKEN_JWT_TYPE = 'JWT';
export const LOGOUT_TOKEN_TYPE = 'logout+jwt';
export const LOGOUT_CONFIRMATION_TOKEN_TYPE = 'logout-confirm+jwt';
export const END_SESSION_PATH = '/end_session';
export const END_SESSION_VERIFY_PATH = '/end_session/verify';
export const POST_LOGOUT_PATH = '/end_session/done';
// Status codes a relying party may answer a back-channel logout with that still count as delivered
export const BACKCHANNEL_TOLERATED_STATUS_CODES = [501, 504] as const;

// Authentication context class references
export const ACR_INTERNET_PROTOCOL_PASSWORD = 'urn:oasis:names:tc:SAML:2.0:ac:classes:InternetProtocolPassword';
export const ACR_UNSPECIFIED = 'urn:oasis:names:tc:SAML:2.0:ac:classes:unspecified';

// OpenID Connect scopes
export const OPENID_SCOPE = 'openid' as const;
export const PROFILE_SCOPE = 'profile' as const;
export const EMAIL_SCOPE = 'email' as const;
export const ADDRESS_SCOPE = 'address' as const;
export const PHONE_SCOPE = 'phone' as const;
export const OFFLINE_ACCESS_SCOPE = 'offline_access' as const;

// HTTP headers
export const HEADER_AUTHORIZATION = 'Authorization';
export const HEADER_WWW_AUTHENTICATE = 'WWW-Authenticate';
export const HEADER_CACHE_CONTROL = 'Cache-Control';
export const HEADER_PRAGMA = 'Pragma';

// Content types
export const CONTENT_TYPE_FORM = 'application/x-www-form-urlencoded';
export const CONTENT_TYPE_HTML = 'text/html';

// Cache control for token responses
export const TOKEN_CACHE_CONTROL = 'no-store';
export const TOKEN_PRAGMA = 'no-cache';
