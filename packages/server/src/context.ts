import type { AuthorizationRequest, UsageRules } from '@opcore/shared';
import type { IClientStorage, IStorage, IUserStorage } from './storage/interfaces/index.js';
import type { KeyMaterial } from './crypto/jwt.js';
import type { Logger } from './logging/logger.js';
import type { AuthenticationMethod } from './authn/method.js';
import type { ClaimsPolicy } from './session/claims.js';
import type { FetchLike } from './authorization/request-object.js';
import type { TokenCodec } from './token/codec.js';
import { systemClock, type Clock } from './session/clock.js';
import { silentLogger } from './logging/logger.js';
import { SessionManager } from './session/manager.js';
import { coerceExpiresIn } from './session/grant.js';
import { ClaimsResolver } from './session/claims.js';
import { STANDARD_SCOPE_CLAIMS } from './session/scopes.js';
import { TokenHandler } from './token/handler.js';
import { OpaqueTokenCodec } from './token/opaque-codec.js';
import { JwtTokenCodec } from './token/jwt-codec.js';
import { IdTokenCodec } from './token/id-token.js';
import { SessionIdCipher } from './token/sid.js';
import { CookieDealer } from './cookie/cookie-dealer.js';
import { AuthnBroker, type AuthnMethodConfig } from './authn/registry.js';
import { PushedAuthorizations } from './authorization/par.js';
import { RequestObjectResolver } from './authorization/request-object.js';
import { AuthorizationService } from './services/authz.js';
import { sha256 } from './crypto/hash.js';
import * as constants from './config/constants.js';

/**
 * Decides whether an end-user with a usable session must still log in again
 */
export type ReAuthenticatePredicate = (request: AuthorizationRequest, method: AuthenticationMethod) => boolean;

export interface ProviderSettings {
  issuer: string;
  sessionCookieName: string;
  sessionManagementCookieName: string;
  /** Enables session_state in authorization responses */
  checkSessionIframe?: string;
  denyUnknownScopes: boolean;
  /** Seconds an authentication event backs grants */
  authnEventTtl: number;
  /** `upm_answer=true` on a request forces a fresh login */
  upmAnswerForcesReauthentication: boolean;
  reAuthenticate: ReAuthenticatePredicate;
  logoutTokenTtl: number;
  logoutConfirmationTtl: number;
  /** Where end-session requests without a post_logout_redirect_uri end up */
  postLogoutUri: string;
  /** Confirmation page an end-session request redirects to */
  logoutVerifyUri: string;
  backchannelTimeoutMs: number;
  secureCookies: boolean;
}

/**
 * Everything the protocol operations need, built once at startup
 */
export interface ProviderContext {
  settings: ProviderSettings;
  clock: Clock;
  logger: Logger;
  keys: KeyMaterial;
  clients: IClientStorage;
  users: IUserStorage;
  sessionManager: SessionManager;
  tokenHandler: TokenHandler;
  idTokens: IdTokenCodec;
  sidCipher: SessionIdCipher;
  claims: ClaimsResolver;
  cookies: CookieDealer;
  authnBroker: AuthnBroker;
  par: PushedAuthorizations;
  requestObjects: RequestObjectResolver;
  authz: AuthorizationService;
  fetch: FetchLike;
}

export interface ProviderContextOptions {
  storage: IStorage;
  keys: KeyMaterial;
  issuer: string;
  authnMethods: AuthnMethodConfig[];
  clock?: Clock;
  logger?: Logger;
  settings?: Partial<Omit<ProviderSettings, 'issuer'>>;
  usageRules?: UsageRules;
  claimsPolicy?: ClaimsPolicy;
  scopeToClaims?: Record<string, readonly string[]>;
  /** Access tokens as signed JWTs instead of encrypted opaque values */
  accessTokenFormat?: 'opaque' | 'jwt';
  parTtl?: number;
  /** Salt for subject identifiers; derived from the symmetric key when absent */
  subjectSalt?: string;
  fetch?: FetchLike;
}

export function defaultUsageRules(ttls: {
  authorizationCode?: number;
  accessToken?: number;
  refreshToken?: number;
  idToken?: number;
} = {}): UsageRules {
  return {
    authorization_code: {
      supports_minting: ['access_token', 'refresh_token', 'id_token'],
      max_usage: 1,
      expires_in: ttls.authorizationCode ?? constants.DEFAULT_AUTHORIZATION_CODE_TTL,
    },
    access_token: {
      expires_in: ttls.accessToken ?? constants.DEFAULT_ACCESS_TOKEN_TTL,
    },
    refresh_token: {
      supports_minting: ['access_token', 'refresh_token'],
      expires_in: ttls.refreshToken ?? constants.DEFAULT_REFRESH_TOKEN_TTL,
    },
    id_token: {
      expires_in: ttls.idToken ?? constants.DEFAULT_ID_TOKEN_TTL,
    },
  };
}

export function createProviderContext(options: ProviderContextOptions): ProviderContext {
  const { storage, keys, issuer } = options;
  const clock = options.clock ?? systemClock;
  const logger = options.logger ?? silentLogger;
  const fetchFn = options.fetch ?? fetch;

  const base = issuer.replace(/\/+$/, '');
  const settings: ProviderSettings = {
    issuer,
    sessionCookieName: constants.DEFAULT_SESSION_COOKIE_NAME,
    sessionManagementCookieName: constants.DEFAULT_SESSION_MANAGEMENT_COOKIE_NAME,
    denyUnknownScopes: false,
    authnEventTtl: constants.DEFAULT_AUTHN_EVENT_TTL,
    upmAnswerForcesReauthentication: true,
    reAuthenticate: () => false,
    logoutTokenTtl: constants.DEFAULT_LOGOUT_TOKEN_TTL,
    logoutConfirmationTtl: constants.DEFAULT_LOGOUT_CONFIRMATION_TTL,
    postLogoutUri: `${base}${constants.POST_LOGOUT_PATH}`,
    logoutVerifyUri: `${base}${constants.END_SESSION_VERIFY_PATH}`,
    backchannelTimeoutMs: constants.DEFAULT_BACKCHANNEL_TIMEOUT_MS,
    secureCookies: issuer.startsWith('https:'),
    ...options.settings,
  };

  const usageRules = options.usageRules ?? defaultUsageRules();
  const lifetime = (type: keyof UsageRules, fallback: number): number => {
    const expiresIn = usageRules[type]?.expires_in;
    return expiresIn === undefined ? fallback : coerceExpiresIn(expiresIn);
  };

  const clients = storage.clients;
  const sidCipher = new SessionIdCipher(keys.symKey);

  const idTokens = new IdTokenCodec(
    keys,
    issuer,
    lifetime('id_token', constants.DEFAULT_ID_TOKEN_TTL),
    clock,
    sidCipher,
    async (clientId) => {
      const client = await clients.findByClientId(clientId);
      const alg = client?.idTokenSignedResponseAlg;
      return alg && keys.supports(alg) ? alg : keys.defaultAlgorithm;
    }
  );

  const accessTokenLifetime = lifetime('access_token', constants.DEFAULT_ACCESS_TOKEN_TTL);
  const accessTokens: TokenCodec =
    options.accessTokenFormat === 'jwt'
      ? new JwtTokenCodec('access_token', keys, issuer, accessTokenLifetime, clock, sidCipher)
      : new OpaqueTokenCodec('access_token', keys.symKey, accessTokenLifetime, clock);

  const tokenHandler = new TokenHandler({
    authorization_code: new OpaqueTokenCodec(
      'authorization_code',
      keys.symKey,
      lifetime('authorization_code', constants.DEFAULT_AUTHORIZATION_CODE_TTL),
      clock
    ),
    access_token: accessTokens,
    refresh_token: new OpaqueTokenCodec(
      'refresh_token',
      keys.symKey,
      lifetime('refresh_token', constants.DEFAULT_REFRESH_TOKEN_TTL),
      clock
    ),
    id_token: idTokens,
  });

  const sessionManager = new SessionManager({
    storage: storage.sessions,
    tokenHandler,
    clock,
    salt: options.subjectSalt ?? sha256(`subject:${keys.symKey.toString('hex')}`),
    defaultUsageRules: usageRules,
    logger: logger.child({ component: 'session' }),
  });

  const scopeToClaims = options.scopeToClaims ?? STANDARD_SCOPE_CLAIMS;
  const claims = new ClaimsResolver(sessionManager, clients, storage.users, {
    policy: options.claimsPolicy,
    scopeToClaims,
  });

  const par = new PushedAuthorizations(storage.pushedRequests, options.parTtl);

  return {
    settings,
    clock,
    logger,
    keys,
    clients,
    users: storage.users,
    sessionManager,
    tokenHandler,
    idTokens,
    sidCipher,
    claims,
    cookies: new CookieDealer(keys.symKey, clock, { secure: settings.secureCookies }),
    authnBroker: AuthnBroker.fromConfig(options.authnMethods, { keys, issuer, clock, users: storage.users }),
    par,
    requestObjects: new RequestObjectResolver({
      par,
      clock,
      logger: logger.child({ component: 'request-object' }),
      fetch: fetchFn,
      timeoutMs: settings.backchannelTimeoutMs,
      issuer: settings.issuer,
    }),
    authz: new AuthorizationService({
      sessionManager,
      claims,
      defaultUsageRules: usageRules,
      scopesSupported: Object.keys(scopeToClaims),
      denyUnknownScopes: settings.denyUnknownScopes,
      logger: logger.child({ component: 'authz' }),
    }),
    fetch: fetchFn,
  };
}
