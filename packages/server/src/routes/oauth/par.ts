import { Hono } from 'hono';
import type { OidcVariables } from '../../types/hono.js';
import type { ProviderContext } from '../../context.js';
import type { AuthorizationFlow } from '../../authorization/flow.js';
import { OAuthError } from '../../errors/oauth-error.js';
import { clientAuthenticator } from '../../middleware/client-authenticator.js';
import { requestParams } from '../../utils/params.js';

export interface ParRouteOptions {
  provider: ProviderContext;
  flow: AuthorizationFlow;
}

// Client credentials never end up in a stored request
const CREDENTIAL_PARAMS = ['client_secret', 'client_assertion', 'client_assertion_type'];

/**
 * Create pushed authorization request endpoint routes
 *
 * RFC 9126
 */
export function createParRoutes(options: ParRouteOptions) {
  const { provider, flow } = options;

  const router = new Hono<{ Variables: OidcVariables }>();

  // POST /par
  router.post(
    '/',
    clientAuthenticator({ clientStorage: provider.clients }),
    async (c) => {
      const authenticated = c.get('client');
      if (!authenticated) {
        throw OAuthError.invalidClient('Client authentication required');
      }

      const params = await requestParams(c);
      for (const name of CREDENTIAL_PARAMS) {
        delete params[name];
      }

      if (params['request_uri'] !== undefined) {
        throw OAuthError.invalidRequest('request_uri is not allowed in a pushed request');
      }
      params['client_id'] ??= authenticated.client.clientId;
      if (params['client_id'] !== authenticated.client.clientId) {
        throw OAuthError.invalidRequest('client_id does not match the authenticated client');
      }

      const validated = await flow.validate(params);
      if ('kind' in validated) {
        throw validated.kind === 'denied' ? validated.error : OAuthError.invalidRequest();
      }

      const pushed = await provider.par.push(params);
      provider.logger.info('Authorization request pushed', { clientId: authenticated.client.clientId });
      return c.json(pushed, 201);
    }
  );

  return router;
}
