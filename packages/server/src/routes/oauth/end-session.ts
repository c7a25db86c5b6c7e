import { Hono, type Context } from 'hono';
import { getCookie, setCookie } from 'hono/cookie';
import type { OidcVariables } from '../../types/hono.js';
import type { ProviderContext } from '../../context.js';
import type { LogoutCoordinator } from '../../logout/coordinator.js';
import { OAuthError } from '../../errors/oauth-error.js';
import { endSessionRequestSchema } from '../../types/schemas.js';
import { escapeHtml } from '../../utils/html.js';
import { requestParams } from '../../utils/params.js';

export interface EndSessionRouteOptions {
  provider: ProviderContext;
  logout: LogoutCoordinator;
}

type EndSessionContext = Context<{ Variables: OidcVariables }>;

function confirmPage(action: string, sjwt: string): string {
  return `<!DOCTYPE html>
<html>
<head>
  <meta charset="utf-8">
  <title>Sign out</title>
</head>
<body>
  <p>Do you want to sign out?</p>
  <form method="post" action="${escapeHtml(action)}">
    <input type="hidden" name="sjwt" value="${escapeHtml(sjwt)}"/>
    <button type="submit">Sign out</button>
  </form>
</body>
</html>`;
}

/**
 * Loads every front-channel logout iframe, then moves on to `redirectUri`
 */
function loggedOutPage(iframes: readonly string[], redirectUri: string): string {
  return `<!DOCTYPE html>
<html>
<head>
  <meta charset="utf-8">
  <meta http-equiv="refresh" content="2;url=${escapeHtml(redirectUri)}">
  <title>Signed out</title>
</head>
<body>
  ${iframes.map((iframe) => `${iframe}</iframe>`).join('\n  ')}
</body>
</html>`;
}

const DONE_PAGE = `<!DOCTYPE html>
<html>
<head>
  <meta charset="utf-8">
  <title>Signed out</title>
</head>
<body>
  <p>You have been signed out.</p>
</body>
</html>`;

/**
 * Create end session (RP-initiated logout) routes
 *
 * OpenID Connect RP-Initiated Logout 1.0
 */
export function createEndSessionRoutes(options: EndSessionRouteOptions) {
  const { provider, logout } = options;

  const router = new Hono<{ Variables: OidcVariables }>();

  const endSession = async (c: EndSessionContext) => {
    const request = endSessionRequestSchema.parse(await requestParams(c));
    const { location } = await logout.validateEndSession(request, getCookie(c, provider.settings.sessionCookieName));
    return c.redirect(location);
  };

  const sjwtFrom = async (c: EndSessionContext): Promise<string> => {
    const sjwt = (await requestParams(c))['sjwt'];
    if (!sjwt) {
      throw OAuthError.invalidRequest('Missing sjwt parameter');
    }
    return sjwt;
  };

  // GET /end_session
  router.get('/', endSession);

  // POST /end_session
  router.post('/', endSession);

  // GET /end_session/verify - Ask the user to confirm
  router.get('/verify', async (c) => {
    const sjwt = await sjwtFrom(c);
    // Rejects stale or forged confirmations before showing anything
    await logout.verifyConfirmation(sjwt);
    return c.html(confirmPage(c.req.path, sjwt));
  });

  // POST /end_session/verify - Confirmed: log out everywhere
  router.post('/verify', async (c) => {
    const confirmation = await logout.verifyConfirmation(await sjwtFrom(c));
    const iframes = await logout.doVerifiedLogout(confirmation.sid, { all: true });

    for (const cookie of logout.killCookies()) {
      setCookie(c, cookie.name, cookie.value, cookie.options);
    }

    provider.logger.info('End-user logged out', { frontchannel: iframes.length });
    return c.html(loggedOutPage(iframes, confirmation.redirect_uri));
  });

  // GET /end_session/done - Default post logout page
  router.get('/done', (c) => c.html(DONE_PAGE));

  return router;
}
