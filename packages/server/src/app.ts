import { Hono } from 'hono';
import { cors } from 'hono/cors';
import type { OidcVariables } from './types/hono.js';
import type { ProviderContext } from './context.js';
import { oauthErrorHandler, securityHeaders, requestLogger } from './middleware/error-handler.js';
import { AuthorizationFlow } from './authorization/flow.js';
import { LogoutCoordinator } from './logout/coordinator.js';
import {
  createAuthorizeRoutes,
  createParRoutes,
  createTokenRoutes,
  createUserInfoRoutes,
  createIntrospectRoutes,
  createRevokeRoutes,
  createEndSessionRoutes,
} from './routes/oauth/index.js';
import { END_SESSION_PATH } from './config/constants.js';

export interface OidcServerOptions {
  provider: ProviderContext;
  enableCors?: boolean;
  enableLogging?: boolean;
  /** Send Strict-Transport-Security */
  strictTransport?: boolean;
  /** Put messages of unexpected errors in server_error responses */
  exposeErrors?: boolean;
}

/**
 * Create the OpenID Connect provider application
 */
export function createOidcServer(options: OidcServerOptions): Hono<{ Variables: OidcVariables }> {
  const { provider, enableCors = true, enableLogging = true, strictTransport = false, exposeErrors = false } = options;

  const app = new Hono<{ Variables: OidcVariables }>();
  const logger = provider.logger.child({ component: 'http' });

  const flow = new AuthorizationFlow(provider);
  const logout = new LogoutCoordinator(provider);

  // Global error handler
  app.onError(oauthErrorHandler(logger, { exposeErrors }));

  // Security headers
  app.use('*', securityHeaders({ strictTransport }));

  // Logging
  if (enableLogging) {
    app.use('*', requestLogger(logger));
  }

  // CORS for the endpoints browser based clients call directly
  if (enableCors) {
    const apiCors = cors({
      origin: '*',
      allowMethods: ['GET', 'POST', 'OPTIONS'],
      allowHeaders: ['Authorization', 'Content-Type'],
      exposeHeaders: ['WWW-Authenticate'],
      maxAge: 86400,
    });
    for (const path of ['/token', '/userinfo', '/introspect', '/revoke']) {
      app.use(path, apiCors);
    }
  }

  // Health check
  app.get('/health', (c) => c.json({ status: 'ok' }));

  app.route('/authorize', createAuthorizeRoutes({ provider, flow }));
  app.route('/par', createParRoutes({ provider, flow }));
  app.route('/token', createTokenRoutes({ provider }));
  app.route('/userinfo', createUserInfoRoutes({ provider }));
  app.route('/introspect', createIntrospectRoutes({ provider }));
  app.route('/revoke', createRevokeRoutes({ provider }));
  app.route(END_SESSION_PATH, createEndSessionRoutes({ provider, logout }));

  return app;
}
