import {
  type OAuthErrorCode,
  type OAuthErrorStatus,
  ERROR_STATUS_CODES,
  ERROR_DESCRIPTIONS,
  ERROR_INVALID_REQUEST,
  ERROR_INVALID_CLIENT,
  ERROR_INVALID_GRANT,
  ERROR_UNAUTHORIZED_CLIENT,
  ERROR_ACCESS_DENIED,
  ERROR_UNSUPPORTED_RESPONSE_TYPE,
  ERROR_INVALID_SCOPE,
  ERROR_UNSUPPORTED_GRANT_TYPE,
  ERROR_SERVER_ERROR,
  ERROR_LOGIN_REQUIRED,
  ERROR_INVALID_REQUEST_URI,
  ERROR_INVALID_REQUEST_OBJECT,
  ERROR_INVALID_TOKEN,
} from './error-codes.js';

/**
 * OAuth 2.0 Error Response
 * RFC 6749 Section 5.2
 */
export interface OAuthErrorResponse {
  error: OAuthErrorCode;
  error_description?: string;
  error_uri?: string;
  state?: string;
}

/**
 * OAuth 2.0 Error class
 * Represents RFC-compliant OAuth errors
 */
export class OAuthError extends Error {
  public readonly code: OAuthErrorCode;
  public readonly statusCode: OAuthErrorStatus;
  public readonly description: string;
  public readonly errorUri?: string;
  public readonly state?: string;

  constructor(
    code: OAuthErrorCode,
    description?: string,
    options?: {
      errorUri?: string;
      state?: string;
      cause?: unknown;
    }
  ) {
    const desc = description ?? ERROR_DESCRIPTIONS[code];
    super(desc);
    this.name = 'OAuthError';
    this.code = code;
    this.statusCode = ERROR_STATUS_CODES[code];
    this.description = desc;

    if (options?.errorUri) {
      this.errorUri = options.errorUri;
    }
    if (options?.state) {
      this.state = options.state;
    }
    if (options?.cause) {
      this.cause = options.cause;
    }

    // Maintains proper stack trace in V8
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Copy of this error carrying the client's state value
   */
  withState(state: string | undefined): OAuthError {
    if (!state) {
      return this;
    }
    return new OAuthError(this.code, this.description, {
      errorUri: this.errorUri,
      state,
      cause: this.cause,
    });
  }

  /**
   * Convert to JSON response body
   */
  toJSON(): OAuthErrorResponse {
    const response: OAuthErrorResponse = {
      error: this.code,
    };

    if (this.description) {
      response.error_description = this.description;
    }

    if (this.errorUri) {
      response.error_uri = this.errorUri;
    }

    if (this.state) {
      response.state = this.state;
    }

    return response;
  }

  /**
   * Response parameters for an authorization error sent back to the client
   */
  toResponseArgs(): Record<string, string> {
    const args: Record<string, string> = { error: this.code };
    if (this.description) {
      args['error_description'] = this.description;
    }
    if (this.errorUri) {
      args['error_uri'] = this.errorUri;
    }
    if (this.state) {
      args['state'] = this.state;
    }
    return args;
  }

  /**
   * Convert to URL query string for redirect errors
   */
  toQueryString(): string {
    return new URLSearchParams(this.toResponseArgs()).toString();
  }

  // Factory methods for common errors

  static invalidRequest(description?: string, state?: string): OAuthError {
    return new OAuthError(ERROR_INVALID_REQUEST, description, { state });
  }

  static invalidClient(description?: string): OAuthError {
    return new OAuthError(ERROR_INVALID_CLIENT, description);
  }

  static invalidGrant(description?: string): OAuthError {
    return new OAuthError(ERROR_INVALID_GRANT, description);
  }

  static unauthorizedClient(description?: string, state?: string): OAuthError {
    return new OAuthError(ERROR_UNAUTHORIZED_CLIENT, description, { state });
  }

  static accessDenied(description?: string, state?: string): OAuthError {
    return new OAuthError(ERROR_ACCESS_DENIED, description, { state });
  }

  static unsupportedResponseType(description?: string, state?: string): OAuthError {
    return new OAuthError(ERROR_UNSUPPORTED_RESPONSE_TYPE, description, { state });
  }

  static invalidScope(description?: string, state?: string): OAuthError {
    return new OAuthError(ERROR_INVALID_SCOPE, description, { state });
  }

  static unsupportedGrantType(description?: string): OAuthError {
    return new OAuthError(ERROR_UNSUPPORTED_GRANT_TYPE, description);
  }

  static serverError(description?: string, cause?: unknown): OAuthError {
    return new OAuthError(ERROR_SERVER_ERROR, description, { cause });
  }

  static loginRequired(description?: string, state?: string): OAuthError {
    return new OAuthError(ERROR_LOGIN_REQUIRED, description, { state });
  }

  static invalidRequestUri(description?: string): OAuthError {
    return new OAuthError(ERROR_INVALID_REQUEST_URI, description);
  }

  static invalidRequestObject(description?: string): OAuthError {
    return new OAuthError(ERROR_INVALID_REQUEST_OBJECT, description);
  }

  static invalidToken(description?: string): OAuthError {
    return new OAuthError(ERROR_INVALID_TOKEN, description);
  }
}
