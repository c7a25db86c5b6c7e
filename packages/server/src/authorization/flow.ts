import { isDeepStrictEqual } from 'node:util';
import { ZodError } from 'zod';
import type { AuthorizationRequest, OidcClient, ResponseMode } from '@opcore/shared';
import type { ProviderContext } from '../context.js';
import type { AuthenticationArgs, AuthenticationMethod, AuthenticationResult } from '../authn/method.js';
import type { CookieSpec } from '../cookie/cookie-dealer.js';
import type { Grant } from '../session/grant.js';
import type { Logger } from '../logging/logger.js';
import { sessionCookiePayload } from '../authn/method.js';
import { authorizationRequestSchema } from '../types/schemas.js';
import { OAuthError } from '../errors/oauth-error.js';
import {
  InvalidSessionKey,
  SessionError,
  ToOld,
  UnknownClient,
  UnknownSession,
  toAuthorizationError,
} from '../errors/session-errors.js';
import { getUri } from './redirect-uri.js';
import {
  buildAuthorizationResponse,
  resolveResponseMode,
  type AuthorizationResponse,
  type ResponseArgs,
} from './response-builder.js';
import { isAuthenticationEventValid } from '../session/grant.js';
import { sectorIdentifierFor } from '../session/subject.js';
import { unpackSessionKey } from '../session/session-key.js';
import { sha256 } from '../crypto/hash.js';
import { generateSalt } from '../crypto/random.js';
import { toParameter } from '../utils/params.js';
import { buildIdTokenClaims } from '../token/id-token.js';
import {
  COOKIE_TYPE_SESSION,
  COOKIE_TYPE_SESSION_MANAGEMENT,
  DEFAULT_RESPONSE_TYPES,
  TOKEN_TYPE_BEARER,
} from '../config/constants.js';

export type FlowState = 'RECEIVED' | 'VALIDATED' | 'AUTHENTICATING' | 'AUTHENTICATED' | 'RESPONSE_BUILT' | 'ERROR';

/**
 * Result of one pass through the authorization endpoint
 */
export type FlowOutcome =
  | { kind: 'proceed'; sessionId: string; response: AuthorizationResponse; cookies: CookieSpec[] }
  | { kind: 'needs_authentication'; method: AuthenticationMethod; args: AuthenticationArgs }
  | { kind: 'denied'; error: OAuthError; response?: AuthorizationResponse };

export interface AuthorizationInput {
  /** Raw request parameters from the query or form body */
  params: Record<string, string>;
  /** Value of the OP session cookie, if the browser sent one */
  cookie?: string;
  /** Force a specific authentication method */
  methodId?: string;
  /** User the requester insists on */
  reqUser?: string;
}

export interface CompletedAuthentication {
  params: Record<string, string>;
  userId: string;
  methodId?: string;
}

interface ValidatedRequest {
  client: OidcClient;
  request: AuthorizationRequest;
  redirectUri: string;
}

type AuthState =
  | { kind: 'authenticated'; sessionId: string }
  | { kind: 'needs_authentication' }
  | { kind: 'login_required' };

/**
 * OpenID Connect Session Management 1.0 Section 4.2
 */
export function computeSessionState(opbs: string, salt: string, clientId: string, redirectUri: string): string {
  const { protocol, host } = new URL(redirectUri);
  return `${sha256(`${clientId} ${protocol}//${host} ${opbs} ${salt}`)}.${salt}`;
}

/**
 * Flatten an authorization request back to form parameters
 */
export function requestToParams(request: AuthorizationRequest): Record<string, string> {
  const params: Record<string, string> = {};
  for (const [name, value] of Object.entries(request)) {
    if (value === undefined || value === null) {
      continue;
    }
    params[name] = toParameter(name, value);
  }
  return params;
}

function sameRequest(a: AuthorizationRequest, b: AuthorizationRequest): boolean {
  // Compare the stored forms; absent and undefined members are the same
  return isDeepStrictEqual(JSON.parse(JSON.stringify(a)), JSON.parse(JSON.stringify(b)));
}

/**
 * Whether the response type returns tokens from the authorization
 * endpoint, which puts the response in the fragment by default
 */
function isFragmentEncoded(request: AuthorizationRequest): boolean {
  return request.response_type.some((type) => type !== 'code' && type !== 'none');
}

/**
 * Response mode to report an error with when the requested one can
 * not be trusted
 */
function errorResponseMode(request: AuthorizationRequest): ResponseMode {
  if (request.response_mode === 'form_post') {
    return 'form_post';
  }
  return isFragmentEncoded(request) ? 'fragment' : 'query';
}

/**
 * The authorization endpoint state machine:
 * RECEIVED → VALIDATED → AUTHENTICATING → AUTHENTICATED → RESPONSE_BUILT,
 * with ERROR reachable from every state.
 */
export class AuthorizationFlow {
  private readonly logger: Logger;

  constructor(private readonly ctx: ProviderContext) {
    this.logger = ctx.logger.child({ component: 'authorization' });
  }

  /**
   * Handle an authorization request up to a response, a handoff to an
   * authentication method, or a denial
   */
  async process(input: AuthorizationInput): Promise<FlowOutcome> {
    this.enter('RECEIVED');
    const validated = await this.validate(input.params);
    if ('kind' in validated) {
      return validated;
    }
    const { request, client } = validated;

    const method = this.pickMethod(request, input.methodId);
    if (!method) {
      return this.deny(validated, OAuthError.accessDenied('ACR I do not support'));
    }

    this.enter('AUTHENTICATING', { clientId: client.clientId, method: method.id });
    let state: AuthState;
    try {
      state = await this.setupAuth(validated, method, input);
    } catch (error) {
      return this.deny(validated, this.asOAuthError(error, 'access_denied'));
    }

    if (state.kind === 'login_required') {
      return this.deny(validated, OAuthError.loginRequired());
    }
    if (state.kind === 'needs_authentication') {
      this.logger.info('Authentication deferred', { clientId: client.clientId, method: method.id });
      return { kind: 'needs_authentication', method, args: this.authnArgs(validated) };
    }

    return this.postAuthentication(validated, state.sessionId);
  }

  /**
   * Resume after an authentication method established who the user is
   */
  async completeAuthentication(input: CompletedAuthentication): Promise<FlowOutcome> {
    this.enter('RECEIVED');
    const validated = await this.validate(input.params);
    if ('kind' in validated) {
      return validated;
    }
    const { request, client } = validated;

    const method = this.pickMethod(request, input.methodId);
    if (!method) {
      return this.deny(validated, OAuthError.accessDenied('ACR I do not support'));
    }

    let sessionId: string;
    try {
      const now = this.ctx.clock.now();
      sessionId = await this.createSession(validated, input.userId, {
        uid: input.userId,
        salt: generateSalt(),
        validUntil: now + this.ctx.settings.authnEventTtl,
        authnInfo: method.acr,
        authnTime: now,
      });
    } catch (error) {
      return this.deny(validated, this.asOAuthError(error, 'server_error'));
    }

    this.logger.info('User authenticated', { clientId: client.clientId, method: method.id });
    return this.postAuthentication(validated, sessionId);
  }

  /**
   * Client, request parameters, response type and redirect URI checks.
   * Failures here are reported to the user agent, never redirected.
   */
  async validate(params: Record<string, string>): Promise<ValidatedRequest | FlowOutcome> {
    const clientId = params['client_id'];
    if (!clientId) {
      return this.fail(OAuthError.invalidRequest('client_id is required'));
    }

    const client = await this.ctx.clients.findByClientId(clientId);
    if (!client) {
      this.logger.warn('Unknown client', { clientId });
      return this.fail(new UnknownClient('unknown client').toOAuthError());
    }

    let request: AuthorizationRequest;
    try {
      const resolved = await this.ctx.requestObjects.resolve(params, client);
      request = authorizationRequestSchema.parse(resolved);
    } catch (error) {
      return this.fail(this.asOAuthError(error, 'invalid_request'));
    }

    if (request.client_id !== client.clientId) {
      return this.fail(OAuthError.invalidRequest('client_id does not match'));
    }

    if (!this.verifyResponseType(request, client)) {
      return this.fail(OAuthError.invalidRequest('Trying to use unregistered response_type'));
    }

    let redirectUri: string;
    try {
      redirectUri = getUri(client, request.redirect_uri);
    } catch (error) {
      return this.fail(this.asOAuthError(error, 'invalid_request'));
    }

    const validated: ValidatedRequest = { client, request: { ...request, redirect_uri: redirectUri }, redirectUri };
    this.enter('VALIDATED', { clientId });

    try {
      this.ctx.authz.checkScopes(validated.request, client);
    } catch (error) {
      return this.deny(validated, this.asOAuthError(error, 'invalid_scope'));
    }

    return validated;
  }

  /**
   * The requested response type set must be one the client registered
   */
  verifyResponseType(request: AuthorizationRequest, client: OidcClient): boolean {
    const registered = client.responseTypes?.length ? client.responseTypes : [...DEFAULT_RESPONSE_TYPES];
    const requested = new Set<string>(request.response_type);
    return registered.some((entry) => {
      const set = new Set(entry.split(' ').filter((part) => part.length > 0));
      return set.size === requested.size && [...set].every((type) => requested.has(type));
    });
  }

  private pickMethod(request: AuthorizationRequest, methodId?: string): AuthenticationMethod | undefined {
    const broker = this.ctx.authnBroker;
    if (methodId) {
      return broker.get(methodId);
    }
    if (request.acr_values?.length) {
      return broker.pick(request.acr_values);
    }
    return broker.default();
  }

  /**
   * Work out whether the cookie carries a usable authentication, and
   * which session it backs
   */
  private async setupAuth(validated: ValidatedRequest, method: AuthenticationMethod, input: AuthorizationInput): Promise<AuthState> {
    const { request } = validated;
    const promptNone = request.prompt?.includes('none') ?? false;
    const needsAuthentication = (): AuthState =>
      promptNone ? { kind: 'login_required' } : { kind: 'needs_authentication' };

    const maxAge =
      this.ctx.settings.upmAnswerForcesReauthentication && request.upm_answer === 'true' ? 0 : request.max_age;

    const result = await this.identify(input.cookie, method, maxAge);
    if (!result) {
      this.logger.info('No active authentication', { clientId: request.client_id });
      return needsAuthentication();
    }

    if (this.ctx.settings.reAuthenticate(request, method) || request.prompt?.includes('login')) {
      return { kind: 'needs_authentication' };
    }

    const { uid, sid } = result.identity;
    const reqUser = input.reqUser ?? (await this.hintedUser(request));
    if (reqUser !== undefined && reqUser !== uid) {
      this.logger.debug('Wanted to be someone else', { clientId: request.client_id });
      return needsAuthentication();
    }

    if (sid === undefined) {
      return needsAuthentication();
    }

    const [, cookieClientId] = unpackSessionKey(sid);
    if (cookieClientId !== request.client_id) {
      return needsAuthentication();
    }

    const grant = await this.ctx.sessionManager.getGrant(sid);
    if (!grant.isActive()) {
      return needsAuthentication();
    }

    const now = this.ctx.clock.now();
    if (!isAuthenticationEventValid(grant.authenticationEvent, now)) {
      return needsAuthentication();
    }
    // max_age counts from the authentication, not from when the cookie was last issued
    if (maxAge !== undefined && now > grant.authenticationEvent.authnTime + maxAge) {
      this.logger.info('Too old authentication', { clientId: request.client_id });
      return needsAuthentication();
    }

    if (sameRequest(request, grant.authorizationRequest)) {
      return { kind: 'authenticated', sessionId: sid };
    }

    // Same authentication, new request: a new grant under it
    const sessionId = await this.createSession(validated, uid, grant.authenticationEvent);
    return { kind: 'authenticated', sessionId };
  }

  /**
   * Identity in the session cookie, if it refers to a live session
   */
  private async identify(
    cookie: string | undefined,
    method: AuthenticationMethod,
    maxAge: number | undefined
  ): Promise<AuthenticationResult | null> {
    const value = this.ctx.cookies.getCookieValue(cookie, this.ctx.settings.sessionCookieName);
    if (!value || value.type !== COOKIE_TYPE_SESSION) {
      return null;
    }

    let result: AuthenticationResult | null;
    try {
      result = method.authenticatedAs(value, { now: this.ctx.clock.now(), maxAge });
    } catch (error) {
      if (error instanceof ToOld) {
        this.logger.info('Too old authentication');
        return null;
      }
      throw error;
    }

    const sid = result?.identity.sid;
    if (!result || sid === undefined) {
      return result;
    }

    try {
      const [userId, clientId] = unpackSessionKey(sid);
      if (clientId === undefined) {
        return null;
      }
      const clientSession = await this.ctx.sessionManager.getClientSession(userId, clientId);
      const grant = await this.ctx.sessionManager.getGrant(sid);
      return clientSession.revoked || !grant.isActive() ? null : result;
    } catch (error) {
      if (error instanceof UnknownSession || error instanceof InvalidSessionKey) {
        return null;
      }
      throw error;
    }
  }

  /**
   * User an id_token_hint names, when it is one of ours
   */
  private async hintedUser(request: AuthorizationRequest): Promise<string | undefined> {
    if (!request.id_token_hint) {
      return undefined;
    }
    try {
      const { sessionId } = await this.ctx.idTokens.verify(request.id_token_hint, {
        allowExpired: true,
        audience: request.client_id,
      });
      const [userId] = unpackSessionKey(sessionId);
      return userId;
    } catch (error) {
      if (error instanceof SessionError) {
        this.logger.info('Ignoring unusable id_token_hint', { error });
        return undefined;
      }
      throw error;
    }
  }

  private async createSession(
    validated: ValidatedRequest,
    userId: string,
    authnEvent: Grant['authenticationEvent']
  ): Promise<string> {
    const { client, request } = validated;
    return this.ctx.sessionManager.createSession({
      authnEvent,
      authRequest: request,
      userId,
      clientId: client.clientId,
      subType: client.subjectType,
      sectorIdentifier: sectorIdentifierFor(client.sectorIdentifierUri, client.redirectUris),
      scope: this.ctx.authz.grantScope(request, client),
      resources: request.resource,
      usageRules: this.ctx.authz.usageRules(client),
    });
  }

  private authnArgs(validated: ValidatedRequest): AuthenticationArgs {
    const args: AuthenticationArgs = {
      request: requestToParams(validated.request),
      clientId: validated.client.clientId,
    };
    if (validated.request.login_hint) {
      args.loginHint = validated.request.login_hint;
    }
    return args;
  }

  /**
   * Authorize, mint and build the response. Nothing thrown here
   * escapes; unexpected failures become server_error.
   */
  private async postAuthentication(validated: ValidatedRequest, sessionId: string): Promise<FlowOutcome> {
    const { request, client, redirectUri } = validated;
    this.enter('AUTHENTICATED', { clientId: client.clientId });

    try {
      const grant = await this.ctx.authz.authorize(sessionId).catch((error: unknown) => {
        throw this.asOAuthError(error, 'access_denied');
      });

      const mode = resolveResponseMode(request.response_mode, isFragmentEncoded(request));
      const args = await this.createAuthnResponse(request, sessionId, grant);

      const cookies = [
        this.ctx.cookies.createCookie(sessionCookiePayload(sessionId), COOKIE_TYPE_SESSION, this.ctx.settings.sessionCookieName, {
          sameSite: this.ctx.settings.secureCookies ? 'None' : 'Lax',
        }),
      ];

      if (this.ctx.settings.checkSessionIframe) {
        const event = grant.authenticationEvent;
        if (!isAuthenticationEventValid(event, this.ctx.clock.now())) {
          throw OAuthError.serverError('Authentication has timed out');
        }
        const salt = generateSalt();
        const opbs = this.ctx.cookies.createCookie(
          JSON.stringify({ authn_time: event.authnTime }),
          COOKIE_TYPE_SESSION_MANAGEMENT,
          this.ctx.settings.sessionManagementCookieName,
          { sameSite: this.ctx.settings.secureCookies ? 'None' : 'Lax', httpOnly: false }
        );
        cookies.push(opbs);
        args['session_state'] = computeSessionState(opbs.value, salt, client.clientId, redirectUri);
      }

      // Mix-up mitigation
      args['iss'] = this.ctx.settings.issuer;
      args['client_id'] = client.clientId;

      this.enter('RESPONSE_BUILT', { clientId: client.clientId, mode });
      return {
        kind: 'proceed',
        sessionId,
        response: buildAuthorizationResponse(redirectUri, args, mode),
        cookies,
      };
    } catch (error) {
      if (!(error instanceof OAuthError) && !(error instanceof SessionError)) {
        this.logger.error('Failed to build authorization response', { clientId: client.clientId, error });
      }
      return this.deny(validated, this.asOAuthError(error, 'server_error'));
    }
  }

  /**
   * Mint what the response type asks for, in the order code, access
   * token, ID Token, and persist them with the grant in one step
   */
  private async createAuthnResponse(
    request: AuthorizationRequest,
    sessionId: string,
    authorized: Grant
  ): Promise<ResponseArgs> {
    const args: ResponseArgs = {};
    if (request.state) {
      args['state'] = request.state;
    }

    const types = new Set(request.response_type);
    if (types.size === 1 && types.has('none')) {
      return args;
    }

    if (request.scope.length > 0) {
      args['scope'] = authorized.scope.join(' ');
    }

    const { clock, tokenHandler, sessionManager } = this.ctx;

    await sessionManager.updateGrant(sessionId, async (grant) => {
      const now = clock.now();
      const handled = new Set<string>();

      const code = types.has('code')
        ? await grant.mintToken(sessionId, 'authorization_code', tokenHandler.codec('authorization_code'), { now })
        : undefined;
      if (code) {
        args['code'] = code.value;
        handled.add('code');
      }

      const accessToken = types.has('token')
        ? await grant.mintToken(sessionId, 'access_token', tokenHandler.codec('access_token'), {
            now,
            basedOn: code,
            scope: grant.scope,
          })
        : undefined;
      if (accessToken) {
        args['access_token'] = accessToken.value;
        args['token_type'] = TOKEN_TYPE_BEARER;
        const expiresIn = accessToken.expiresIn(now);
        if (expiresIn !== undefined) {
          args['expires_in'] = String(expiresIn);
        }
        handled.add('token');
      }

      if (types.has('id_token')) {
        const [userId] = unpackSessionKey(sessionId);
        const restriction = { ...grant.claims.id_token };
        if (!code && !accessToken) {
          // Nothing to call userinfo with: scope claims go in the ID Token
          Object.assign(restriction, this.ctx.claims.scopeClaims(grant.scope));
        }
        const userClaims = await this.ctx.claims.getUserClaims(userId, restriction);
        const algorithm = await this.ctx.idTokens.algorithmFor(request.client_id);

        const idToken = await grant.mintToken(sessionId, 'id_token', tokenHandler.codec('id_token'), {
          now,
          basedOn: code,
          extra: buildIdTokenClaims({
            grant,
            code: code?.value,
            accessToken: accessToken?.value,
            userClaims,
            algorithm,
          }),
        });
        args['id_token'] = idToken.value;
        handled.add('id_token');
      }

      const unhandled = [...types].filter((type) => !handled.has(type));
      if (unhandled.length > 0) {
        throw OAuthError.unsupportedResponseType(`Can not return ${unhandled.join(' ')}`);
      }
    });

    return args;
  }

  private enter(state: FlowState, fields: Record<string, unknown> = {}): void {
    this.logger.debug('Authorization flow state', { state, ...fields });
  }

  /**
   * Error shown to the user agent directly
   */
  private fail(error: OAuthError): FlowOutcome {
    this.enter('ERROR', { error: error.code });
    return { kind: 'denied', error };
  }

  /**
   * Error sent back to the client's verified redirect URI
   */
  private deny(validated: ValidatedRequest, error: OAuthError): FlowOutcome {
    const withState = error.withState(validated.request.state);
    this.enter('ERROR', { clientId: validated.client.clientId, error: withState.code });
    return {
      kind: 'denied',
      error: withState,
      response: buildAuthorizationResponse(
        validated.redirectUri,
        withState.toResponseArgs(),
        errorResponseMode(validated.request)
      ),
    };
  }

  private asOAuthError(error: unknown, fallback: 'access_denied' | 'server_error' | 'invalid_request' | 'invalid_scope'): OAuthError {
    if (error instanceof OAuthError) {
      return error;
    }
    if (error instanceof SessionError) {
      return toAuthorizationError(error);
    }
    if (error instanceof ZodError) {
      return OAuthError.invalidRequest(error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; '));
    }
    switch (fallback) {
      case 'access_denied':
        return OAuthError.accessDenied(error instanceof Error ? error.message : undefined);
      case 'invalid_request':
        return OAuthError.invalidRequest(error instanceof Error ? error.message : undefined);
      case 'invalid_scope':
        return OAuthError.invalidScope(error instanceof Error ? error.message : undefined);
      case 'server_error':
        return OAuthError.serverError(undefined, error);
    }
  }
}
