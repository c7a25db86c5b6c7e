import { Hono, type Context } from 'hono';
import { getCookie, setCookie } from 'hono/cookie';
import { zValidator } from '@hono/zod-validator';
import type { OidcVariables } from '../../types/hono.js';
import type { ProviderContext } from '../../context.js';
import type { CookieSpec } from '../../cookie/cookie-dealer.js';
import type { AuthorizationResponse } from '../../authorization/response-builder.js';
import type { AuthorizationFlow, FlowOutcome } from '../../authorization/flow.js';
import { UserPassAuthn, loginFormSchema } from '../../authn/user-pass.js';
import { OAuthError } from '../../errors/oauth-error.js';
import { requestParams } from '../../utils/params.js';
import { rejectInvalid } from '../../middleware/validation.js';

export interface AuthorizeRouteOptions {
  provider: ProviderContext;
  flow: AuthorizationFlow;
}

type AuthorizeContext = Context<{ Variables: OidcVariables }>;

function applyCookies(c: AuthorizeContext, cookies: readonly CookieSpec[]): void {
  for (const cookie of cookies) {
    setCookie(c, cookie.name, cookie.value, cookie.options);
  }
}

function deliver(c: AuthorizeContext, response: AuthorizationResponse): Response {
  if (response.kind === 'form_post') {
    return c.html(response.body);
  }
  return c.redirect(response.location);
}

/**
 * Create authorization endpoint routes
 *
 * OpenID Connect Core 1.0 Section 3.1.2
 */
export function createAuthorizeRoutes(options: AuthorizeRouteOptions) {
  const { provider, flow } = options;

  const router = new Hono<{ Variables: OidcVariables }>();

  // Turn a flow outcome into an HTTP response, handing off to the
  // authentication method when the user has to log in
  const respond = async (c: AuthorizeContext, outcome: FlowOutcome): Promise<Response> => {
    switch (outcome.kind) {
      case 'proceed':
        applyCookies(c, outcome.cookies);
        return deliver(c, outcome.response);

      case 'denied':
        if (outcome.response) {
          return deliver(c, outcome.response);
        }
        throw outcome.error;

      case 'needs_authentication': {
        const challenge = await outcome.method.challenge(outcome.args);
        if (challenge.kind === 'html') {
          return c.html(challenge.body);
        }
        const resumed = await flow.completeAuthentication({
          params: outcome.args.request,
          userId: challenge.userId,
          methodId: outcome.method.id,
        });
        if (resumed.kind === 'needs_authentication') {
          throw OAuthError.serverError('Authentication did not complete');
        }
        return respond(c, resumed);
      }
    }
  };

  const authorize = async (c: AuthorizeContext) => {
    const params = await requestParams(c);
    const outcome = await flow.process({
      params,
      cookie: getCookie(c, provider.settings.sessionCookieName),
    });
    return respond(c, outcome);
  };

  // GET /authorize - Initial authorization request
  router.get('/', authorize);

  // POST /authorize - Form encoded authorization request
  router.post('/', authorize);

  // POST /authorize/verify - Login form submission
  router.post('/verify', zValidator('form', loginFormSchema, rejectInvalid), async (c) => {
    const method = provider.authnBroker.all().find((candidate) => candidate instanceof UserPassAuthn);
    if (!(method instanceof UserPassAuthn)) {
      throw OAuthError.invalidRequest('Password login is not enabled');
    }

    const result = await method.verify(c.req.valid('form'));
    if (!result.ok) {
      return c.html(result.body, 401);
    }

    provider.logger.info('Password login succeeded', { clientId: result.request['client_id'] });
    const outcome = await flow.completeAuthentication({
      params: result.request,
      userId: result.userId,
      methodId: method.id,
    });
    return respond(c, outcome);
  });

  return router;
}
