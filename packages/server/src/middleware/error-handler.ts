import type { ErrorHandler, MiddlewareHandler } from 'hono';
import { ZodError } from 'zod';
import type { OidcVariables } from '../types/hono.js';
import type { Logger } from '../logging/logger.js';
import { OAuthError } from '../errors/oauth-error.js';
import { SessionError } from '../errors/session-errors.js';
import { TOKEN_CACHE_CONTROL, TOKEN_PRAGMA, HEADER_CACHE_CONTROL, HEADER_PRAGMA } from '../config/constants.js';

/**
 * Global error handler for OAuth errors
 *
 * Transforms errors into RFC-compliant OAuth error responses
 */
export function oauthErrorHandler(logger: Logger, options: { exposeErrors?: boolean } = {}): ErrorHandler<{
  Variables: OidcVariables;
}> {
  return (err, c) => {
    // Set no-cache headers for error responses
    c.header(HEADER_CACHE_CONTROL, TOKEN_CACHE_CONTROL);
    c.header(HEADER_PRAGMA, TOKEN_PRAGMA);

    let error: OAuthError;
    if (err instanceof OAuthError) {
      error = err;
    } else if (err instanceof SessionError) {
      error = err.toOAuthError();
    } else if (err instanceof ZodError) {
      error = OAuthError.invalidRequest(err.issues.map((issue) => issue.message).join(', '));
    } else {
      logger.error('Unhandled error', { path: c.req.path, error: err });
      error = OAuthError.serverError(options.exposeErrors ? err.message : 'An unexpected error occurred');
    }

    if (error.statusCode >= 500) {
      logger.error('OAuth error', { path: c.req.path, code: error.code, cause: error.cause });
    } else {
      logger.info('OAuth error', { path: c.req.path, code: error.code, description: error.description });
    }

    return c.json(error.toJSON(), error.statusCode);
  };
}

/**
 * Security headers middleware
 */
export function securityHeaders(options: { strictTransport?: boolean } = {}): MiddlewareHandler<{
  Variables: OidcVariables;
}> {
  return async (c, next) => {
    await next();

    // Prevent clickjacking
    c.header('X-Frame-Options', 'DENY');

    // Prevent MIME type sniffing
    c.header('X-Content-Type-Options', 'nosniff');

    // Referrer policy
    c.header('Referrer-Policy', 'strict-origin-when-cross-origin');

    // Strict Transport Security (enable in production with HTTPS)
    if (options.strictTransport) {
      c.header('Strict-Transport-Security', 'max-age=31536000; includeSubDomains');
    }
  };
}

/**
 * Request logging middleware
 */
export function requestLogger(logger: Logger): MiddlewareHandler<{ Variables: OidcVariables }> {
  return async (c, next) => {
    const start = Date.now();
    const method = c.req.method;
    const path = c.req.path;

    await next();

    // Don't log sensitive data
    logger.info('Request', {
      method,
      path,
      status: c.res.status,
      duration: Date.now() - start,
      client: c.get('client')?.client.clientId,
    });
  };
}
