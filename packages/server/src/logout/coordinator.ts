import { z } from 'zod';
import type { JWTPayload } from 'jose';
import type { LogoutTokenPayload, OidcClient } from '@opcore/shared';
import type { ProviderContext } from '../context.js';
import type { CookieSpec } from '../cookie/cookie-dealer.js';
import type { Logger } from '../logging/logger.js';
import type { EndSessionRequest } from '../types/schemas.js';
import { OAuthError } from '../errors/oauth-error.js';
import { RedirectUriError, SessionError, UnknownSession } from '../errors/session-errors.js';
import { verifyUri } from '../authorization/redirect-uri.js';
import { sessionKey, unpackSessionKey } from '../session/session-key.js';
import { generateJti } from '../crypto/random.js';
import { escapeHtml } from '../utils/html.js';
import {
  BACKCHANNEL_LOGOUT_EVENT,
  BACKCHANNEL_TOLERATED_STATUS_CODES,
  CONTENT_TYPE_FORM,
  COOKIE_TYPE_SESSION,
  LOGOUT_CONFIRMATION_TOKEN_TYPE,
  LOGOUT_TOKEN_TYPE,
} from '../config/constants.js';

/** Back-channel notification: logout URI and signed logout token */
export type BackchannelSpec = [uri: string, token: string];

/**
 * Notifications owed to relying parties after a logout, per client id
 */
export interface LogoutPlan {
  blu: Record<string, BackchannelSpec>;
  flu: Record<string, string>;
}

/**
 * Payload of the token an end-session request hands to the
 * confirmation page
 */
export interface LogoutConfirmation {
  sid: string;
  state?: string;
  redirect_uri: string;
}

const confirmationSchema = z.object({
  sid: z.string().min(1),
  state: z.string().optional(),
  redirect_uri: z.string().url(),
});

const sessionCookieSchema = z.object({ sid: z.string().min(1) });

/**
 * Iframe that tells a relying party in the browser that the user left.
 * With session binding, `iss` and `sid` are merged into the registered
 * URI's query.
 * OpenID Connect Front-Channel Logout 1.0 Section 2
 */
export function frontchannelIframe(client: OidcClient, issuer: string, sid: string): string | null {
  const uri = client.frontchannelLogoutUri;
  if (!uri) {
    return null;
  }
  if (!client.frontchannelLogoutSessionRequired) {
    return `<iframe src="${escapeHtml(uri)}">`;
  }

  const url = new URL(uri);
  url.searchParams.set('iss', issuer);
  url.searchParams.set('sid', sid);
  return `<iframe src="${escapeHtml(url.toString())}">`;
}

/**
 * Tears down client sessions and works out whom to tell about it
 */
export class LogoutCoordinator {
  private readonly logger: Logger;

  constructor(private readonly ctx: ProviderContext) {
    this.logger = ctx.logger.child({ component: 'logout' });
  }

  /**
   * Signed logout token for a client with a back-channel logout URI
   * OpenID Connect Back-Channel Logout 1.0 Section 2.4
   */
  async backchannelLogout(client: OidcClient, sub: string, sessionId: string): Promise<BackchannelSpec | null> {
    const uri = client.backchannelLogoutUri;
    if (!uri) {
      return null;
    }

    const iat = this.ctx.clock.now();
    const payload: LogoutTokenPayload = {
      iss: this.ctx.settings.issuer,
      sub,
      aud: [client.clientId],
      iat,
      exp: iat + this.ctx.settings.logoutTokenTtl,
      jti: generateJti(),
      events: { [BACKCHANNEL_LOGOUT_EVENT]: {} },
      sid: this.ctx.sidCipher.encrypt(sessionId),
    };

    const token = await this.ctx.keys.sign(payload, {
      algorithm: await this.ctx.idTokens.algorithmFor(client.clientId),
      typ: LOGOUT_TOKEN_TYPE,
    });
    return [uri, token];
  }

  /**
   * Log the user out of the client a session id belongs to. The client
   * session is revoked whatever the notifications later do.
   */
  async logoutFromClient(sessionId: string): Promise<LogoutPlan> {
    const [userId, clientId] = unpackSessionKey(sessionId);
    if (clientId === undefined) {
      throw new UnknownSession(`Not a client session id: ${sessionId}`);
    }

    const plan: LogoutPlan = { blu: {}, flu: {} };
    const clientSession = await this.ctx.sessionManager.getClientSession(userId, clientId);
    await this.plan(plan, clientId, clientSession.sub, sessionId);

    await this.ctx.sessionManager.revokeClientSession(sessionId);
    return plan;
  }

  /**
   * Log the user out of every client they have a session with
   */
  async logoutAllClients(sessionId: string): Promise<LogoutPlan> {
    const [userId, originClientId] = unpackSessionKey(sessionId);
    const { sessionManager } = this.ctx;
    const userSession = await sessionManager.getUserSession(userId);

    const plan: LogoutPlan = { blu: {}, flu: {} };
    for (const clientId of userSession.subordinate) {
      const clientSession = await sessionManager.getClientSession(userId, clientId);
      if (clientSession.revoked) {
        continue;
      }

      // Relying parties know the sid of the grant their ID Tokens came from
      const lastGrant = clientSession.subordinate[clientSession.subordinate.length - 1];
      const sid =
        clientId === originClientId
          ? sessionId
          : lastGrant === undefined
            ? sessionKey(userId, clientId)
            : sessionKey(userId, clientId, lastGrant);

      await this.plan(plan, clientId, clientSession.sub, sid);
      await sessionManager.revokeClientSession(sid);
    }

    await sessionManager.revokeUserSession(userId);
    this.logger.info('User logged out of all clients', {
      clients: userSession.subordinate.length,
    });
    return plan;
  }

  /**
   * Run a confirmed logout: deliver back-channel notifications and
   * return the front-channel iframes for the browser to load.
   * A relying party that fails to answer does not stop the others.
   */
  async doVerifiedLogout(sessionId: string, options: { all?: boolean } = {}): Promise<string[]> {
    const plan = options.all ? await this.logoutAllClients(sessionId) : await this.logoutFromClient(sessionId);

    await Promise.all(
      Object.entries(plan.blu).map(([clientId, [uri, token]]) => this.deliver(clientId, uri, token))
    );

    return Object.values(plan.flu);
  }

  /**
   * Check an end-session request against the browser's session and
   * issue the confirmation token the logout page has to present
   * OpenID Connect RP-Initiated Logout 1.0 Section 2
   */
  async validateEndSession(request: EndSessionRequest, cookie: string | undefined): Promise<{ location: string; confirmation: string }> {
    if (request.post_logout_redirect_uri && !request.id_token_hint) {
      throw OAuthError.invalidRequest('If post_logout_redirect_uri then id_token_hint is a MUST');
    }

    const sessionId = this.sessionFromCookie(cookie);

    let sub: string;
    let clientId: string;
    try {
      const info = await this.ctx.sessionManager.getSessionInfo(sessionId, { client: true });
      if (info.clientId === undefined || !info.clientSession) {
        throw new UnknownSession('Session has no client');
      }
      clientId = info.clientId;
      sub = info.clientSession.sub;
    } catch (error) {
      if (error instanceof SessionError) {
        throw OAuthError.invalidRequest("Can't find any corresponding session");
      }
      throw error;
    }

    if (request.id_token_hint) {
      await this.checkIdTokenHint(request.id_token_hint, clientId, sub);
    }

    const client = await this.ctx.clients.findByClientId(clientId);
    if (!client) {
      throw OAuthError.invalidRequest('Unknown client');
    }

    const confirmation: LogoutConfirmation = { sid: sessionId, redirect_uri: this.ctx.settings.postLogoutUri };
    if (request.post_logout_redirect_uri) {
      try {
        verifyUri(client, request.post_logout_redirect_uri, 'post_logout_redirect_uri');
      } catch (error) {
        if (error instanceof RedirectUriError) {
          throw error.toOAuthError();
        }
        throw error;
      }

      const target = new URL(request.post_logout_redirect_uri);
      if (request.state) {
        target.searchParams.set('state', request.state);
        confirmation.state = request.state;
      }
      confirmation.redirect_uri = target.toString();
    }

    const { issuer } = this.ctx.settings;
    const iat = this.ctx.clock.now();
    const sjwt = await this.ctx.keys.sign(
      { ...confirmation, iss: issuer, aud: [issuer], iat, exp: iat + this.ctx.settings.logoutConfirmationTtl },
      { typ: LOGOUT_CONFIRMATION_TOKEN_TYPE }
    );

    const location = new URL(this.ctx.settings.logoutVerifyUri);
    location.searchParams.set('sjwt', sjwt);
    return { location: location.toString(), confirmation: sjwt };
  }

  /**
   * Payload of a confirmation token this provider issued
   */
  async verifyConfirmation(sjwt: string): Promise<LogoutConfirmation> {
    const { issuer } = this.ctx.settings;
    let payload: unknown;
    try {
      payload = await this.ctx.keys.verify(sjwt, {
        issuer,
        audience: issuer,
        typ: LOGOUT_CONFIRMATION_TOKEN_TYPE,
        clockTolerance: 0,
        currentDate: new Date(this.ctx.clock.now() * 1000),
      });
    } catch (error) {
      throw new OAuthError('invalid_request', 'Invalid or expired logout confirmation', { cause: error });
    }

    const parsed = confirmationSchema.safeParse(payload);
    if (!parsed.success) {
      throw OAuthError.invalidRequest('Malformed logout confirmation');
    }
    const confirmation: LogoutConfirmation = { sid: parsed.data.sid, redirect_uri: parsed.data.redirect_uri };
    if (parsed.data.state !== undefined) {
      confirmation.state = parsed.data.state;
    }
    return confirmation;
  }

  /**
   * Cookies that clear the session and session management cookies
   */
  killCookies(): CookieSpec[] {
    const { sessionCookieName, sessionManagementCookieName } = this.ctx.settings;
    return this.ctx.cookies.killCookies([sessionManagementCookieName, sessionCookieName]);
  }

  private async plan(plan: LogoutPlan, clientId: string, sub: string, sid: string): Promise<void> {
    const client = await this.ctx.clients.findByClientId(clientId);
    if (!client) {
      this.logger.warn('Session for a client that is gone', { clientId });
      return;
    }

    if (client.backchannelLogoutUri) {
      const spec = await this.backchannelLogout(client, sub, sid);
      if (spec) {
        plan.blu[clientId] = spec;
      }
    } else if (client.frontchannelLogoutUri) {
      const iframe = frontchannelIframe(client, this.ctx.settings.issuer, this.ctx.sidCipher.encrypt(sid));
      if (iframe) {
        plan.flu[clientId] = iframe;
      }
    }
  }

  private async deliver(clientId: string, uri: string, token: string): Promise<void> {
    this.logger.info('Logging out from client', { clientId, uri });
    try {
      const response = await this.ctx.fetch(uri, {
        method: 'POST',
        headers: { 'Content-Type': CONTENT_TYPE_FORM },
        body: new URLSearchParams({ logout_token: token }).toString(),
        signal: AbortSignal.timeout(this.ctx.settings.backchannelTimeoutMs),
      });

      const tolerated: readonly number[] = BACKCHANNEL_TOLERATED_STATUS_CODES;
      if (response.status < 300) {
        this.logger.info('Logged out from client', { clientId });
      } else if (tolerated.includes(response.status)) {
        this.logger.info('Back-channel logout answered with an acceptable status', { clientId, status: response.status });
      } else {
        this.logger.warn('Failed to log out from client', { clientId, status: response.status });
      }
    } catch (error) {
      this.logger.warn('Failed to log out from client', { clientId, error });
    }
  }

  private sessionFromCookie(cookie: string | undefined): string {
    const value = this.ctx.cookies.getCookieValue(cookie, this.ctx.settings.sessionCookieName);
    if (!value || value.type !== COOKIE_TYPE_SESSION) {
      throw OAuthError.invalidRequest('Missing cookie');
    }

    let payload: unknown;
    try {
      payload = JSON.parse(value.payload);
    } catch (error) {
      throw new OAuthError('invalid_request', 'Cookie error', { cause: error });
    }
    const parsed = sessionCookieSchema.safeParse(payload);
    if (!parsed.success) {
      throw OAuthError.invalidRequest('Cookie error');
    }
    return parsed.data.sid;
  }

  private async checkIdTokenHint(hint: string, clientId: string, sub: string): Promise<void> {
    let payload: JWTPayload;
    try {
      ({ payload } = await this.ctx.idTokens.verify(hint, { allowExpired: true }));
    } catch (error) {
      if (error instanceof SessionError) {
        throw OAuthError.invalidRequest('Invalid id_token_hint');
      }
      throw error;
    }

    const audience = Array.isArray(payload.aud) ? payload.aud : [payload.aud];
    if (!audience.includes(clientId)) {
      throw OAuthError.invalidRequest("Client ID doesn't match");
    }
    if (payload.sub !== sub) {
      throw OAuthError.invalidRequest("Sub doesn't match");
    }
  }
}
