import { OAuthError } from './oauth-error.js';

/**
 * Base class for failures raised by the session, grant and token engine.
 * The HTTP layer turns these into OAuth error responses through `toOAuthError`.
 */
export abstract class SessionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }

  /**
   * Error to report at the token endpoint
   */
  toOAuthError(): OAuthError {
    return OAuthError.invalidGrant(this.message);
  }
}

/** A token value that cannot be decoded or is not held by any grant */
export class UnknownToken extends SessionError {}

/** Minting from a base token whose usage rules do not allow the requested type */
export class MintingNotAllowed extends SessionError {}

/** An expired token or authentication event */
export class ToOld extends SessionError {}

/** A revoked session, grant or token */
export class Revoked extends SessionError {}

/** No record at the given session path */
export class UnknownSession extends SessionError {}

/** A malformed session key */
export class InvalidSessionKey extends SessionError {
  override toOAuthError(): OAuthError {
    return OAuthError.invalidRequest(this.message);
  }
}

/** Client that is not registered */
export class UnknownClient extends SessionError {
  override toOAuthError(): OAuthError {
    return OAuthError.unauthorizedClient(this.message);
  }
}

/** Redirect or logout URI that fails validation */
export class RedirectUriError extends SessionError {
  override toOAuthError(): OAuthError {
    return OAuthError.invalidRequest(this.message);
  }
}

/** Scope that the scope policy refuses */
export class UnAuthorizedClientScope extends SessionError {
  override toOAuthError(): OAuthError {
    return OAuthError.invalidScope(this.message);
  }
}

/** Failure talking to a remote party, such as fetching a request_uri */
export class ServiceError extends SessionError {
  override toOAuthError(): OAuthError {
    return OAuthError.invalidRequestUri(this.message);
  }
}

/**
 * Map an engine failure seen inside the authorization flow
 */
export function toAuthorizationError(error: SessionError): OAuthError {
  if (error instanceof UnknownToken || error instanceof MintingNotAllowed || error instanceof ToOld) {
    return OAuthError.accessDenied(error.message);
  }
  return error.toOAuthError();
}
