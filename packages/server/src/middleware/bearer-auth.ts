import type { MiddlewareHandler } from 'hono';
import type { OidcVariables } from '../types/hono.js';
import type { SessionManager } from '../session/manager.js';
import type { Clock } from '../session/clock.js';
import { OAuthError } from '../errors/oauth-error.js';
import { SessionError } from '../errors/session-errors.js';
import {
  CONTENT_TYPE_FORM,
  HEADER_AUTHORIZATION,
  HEADER_WWW_AUTHENTICATE,
  TOKEN_TYPE_ACCESS_TOKEN,
} from '../config/constants.js';

export interface BearerAuthOptions {
  sessionManager: SessionManager;
  clock: Clock;
  realm: string;
}

/**
 * Extract bearer token from Authorization header
 */
function extractBearerToken(authHeader: string): string | null {
  if (!authHeader.startsWith('Bearer ')) {
    return null;
  }
  return authHeader.slice(7);
}

/**
 * Middleware to validate bearer access tokens against the grant that
 * issued them. The token may also arrive as a form parameter.
 * RFC 6750 Section 2
 *
 * Sets `bearer` in context variables on success
 */
export function bearerAuth(options: BearerAuthOptions): MiddlewareHandler<{
  Variables: OidcVariables;
}> {
  const { sessionManager, clock, realm } = options;

  return async (c, next) => {
    const authHeader = c.req.header(HEADER_AUTHORIZATION);
    let value: string | null = null;

    if (authHeader) {
      value = extractBearerToken(authHeader);
      if (!value) {
        c.header(HEADER_WWW_AUTHENTICATE, `Bearer realm="${realm}", error="invalid_request"`);
        throw OAuthError.invalidToken('Invalid authorization header format');
      }
    } else if (c.req.method === 'POST' && c.req.header('content-type')?.includes(CONTENT_TYPE_FORM)) {
      const body = await c.req.parseBody();
      const candidate = body['access_token'];
      value = typeof candidate === 'string' ? candidate : null;
    }

    if (!value) {
      c.header(HEADER_WWW_AUTHENTICATE, `Bearer realm="${realm}"`);
      throw OAuthError.invalidToken('Missing access token');
    }

    try {
      const info = await sessionManager.getSessionInfoByToken(value);
      const token = info.grant.getToken(value);
      if (!token || token.type !== TOKEN_TYPE_ACCESS_TOKEN || !token.isActive(clock.now()) || !info.grant.isActive()) {
        throw OAuthError.invalidToken('Access token is not active');
      }
      c.set('bearer', { sessionId: info.sessionId, clientId: info.clientId, grant: info.grant, token });
    } catch (error) {
      if (error instanceof SessionError || error instanceof OAuthError) {
        c.header(HEADER_WWW_AUTHENTICATE, `Bearer realm="${realm}", error="invalid_token"`);
        throw error instanceof OAuthError ? error : OAuthError.invalidToken(error.message);
      }
      throw error;
    }

    await next();
  };
}
