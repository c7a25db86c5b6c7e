import { describe, it, expect, beforeEach } from 'vitest';
import { createHash } from 'node:crypto';
import { AuthorizationFlow, computeSessionState, requestToParams, type FlowOutcome } from '../../authorization/flow.js';
import { createProviderContext, type ProviderContext, type ProviderSettings } from '../../context.js';
import { createMemoryStorage, type MemoryStorage } from '../../storage/memory/index.js';
import { authorizationRequestSchema } from '../../types/schemas.js';
import { KeyMaterial } from '../../crypto/jwt.js';
import { FixedClock } from '../../session/clock.js';
import { ACR_INTERNET_PROTOCOL_PASSWORD } from '../../config/constants.js';

const ISSUER = 'https://op.example.com';
const NOW = 1_700_000_000;

describe('computeSessionState', () => {
  it('should hash the client, origin, browser state and salt', () => {
    const expected = createHash('sha256').update('rp https://rp.example.com:8443 opbs-value s1', 'utf8').digest('hex');

    expect(computeSessionState('opbs-value', 's1', 'rp', 'https://rp.example.com:8443/cb?x=1')).toBe(`${expected}.s1`);
  });
});

describe('requestToParams', () => {
  it('should flatten lists and structured values', () => {
    const params = requestToParams({
      client_id: 'rp',
      response_type: ['code', 'id_token'],
      scope: ['openid', 'email'],
      state: undefined,
      claims: { userinfo: { email: null } },
    });

    expect(params).toEqual({
      client_id: 'rp',
      response_type: 'code id_token',
      scope: 'openid email',
      claims: '{"userinfo":{"email":null}}',
    });
  });

  it('should give back the same request when parsed again', () => {
    const request = authorizationRequestSchema.parse({
      client_id: 'rp',
      response_type: 'code',
      scope: 'openid email',
      prompt: 'login consent',
      max_age: '60',
      resource: ['https://a.example.com', 'https://b.example.com'],
    });

    const params = requestToParams(request);

    expect(params['resource']).toBe('["https://a.example.com","https://b.example.com"]');
    expect(params['max_age']).toBe('60');
    expect(authorizationRequestSchema.parse(params)).toEqual(request);
  });

  it('should keep a single resource as a one element list', () => {
    const request = authorizationRequestSchema.parse({
      client_id: 'rp',
      response_type: 'code',
      resource: 'https://a.example.com',
    });

    expect(request.resource).toEqual(['https://a.example.com']);
    expect(authorizationRequestSchema.parse(requestToParams(request)).resource).toEqual(['https://a.example.com']);
  });
});

describe('AuthorizationFlow', () => {
  let storage: MemoryStorage;
  let clock: FixedClock;
  let provider: ProviderContext;
  let flow: AuthorizationFlow;

  const params = (extra: Record<string, string> = {}) => ({
    client_id: 'rp',
    response_type: 'code',
    scope: 'openid',
    redirect_uri: 'https://rp.example.com/cb',
    state: 'xyz',
    ...extra,
  });

  const setup = async (settings: Partial<Omit<ProviderSettings, 'issuer'>> = {}) => {
    provider = createProviderContext({
      storage,
      keys: await KeyMaterial.create({ symKey: 'test-secret', algorithms: ['ES256'], defaultAlgorithm: 'ES256' }),
      issuer: ISSUER,
      authnMethods: [{ kind: 'user_pass' }],
      clock,
      settings,
    });
    flow = new AuthorizationFlow(provider);
  };

  const proceeded = (outcome: FlowOutcome) => {
    if (outcome.kind !== 'proceed') {
      throw new Error(`Expected proceed, got ${outcome.kind}`);
    }
    return outcome;
  };

  // Log a user in and return the session cookie the response sets
  const login = async (userId = 'alice', extra: Record<string, string> = {}) => {
    const outcome = proceeded(await flow.completeAuthentication({ params: params(extra), userId }));
    const [cookie] = outcome.cookies;
    if (!cookie) {
      throw new Error('No session cookie');
    }
    return { sessionId: outcome.sessionId, cookie: cookie.value, response: outcome.response };
  };

  beforeEach(async () => {
    clock = new FixedClock(NOW);
    storage = createMemoryStorage();
    for (const clientId of ['rp', 'rp2']) {
      await storage.clients.create({
        clientId,
        clientType: 'confidential',
        authMethod: 'client_secret_basic',
        name: clientId,
        redirectUris: ['https://rp.example.com/cb'],
        allowedGrants: ['authorization_code'],
        responseTypes: ['code', 'id_token', 'code none'],
      });
    }
    await setup();
  });

  it('should hand off to the login method without a session', async () => {
    const outcome = await flow.process({ params: params({ login_hint: 'alice' }) });

    expect(outcome.kind).toBe('needs_authentication');
    if (outcome.kind !== 'needs_authentication') return;
    expect(outcome.method.acr).toBe(ACR_INTERNET_PROTOCOL_PASSWORD);
    expect(outcome.args.clientId).toBe('rp');
    expect(outcome.args.loginHint).toBe('alice');
    expect(outcome.args.request['response_type']).toBe('code');
    expect(outcome.args.request['state']).toBe('xyz');
  });

  it('should redirect login_required for prompt=none without a session', async () => {
    const outcome = await flow.process({ params: params({ prompt: 'none' }) });

    expect(outcome.kind).toBe('denied');
    if (outcome.kind !== 'denied') return;
    expect(outcome.error.code).toBe('login_required');
    expect(outcome.response?.kind).toBe('redirect');
    if (outcome.response?.kind !== 'redirect') return;
    const location = new URL(outcome.response.location);
    expect(location.origin + location.pathname).toBe('https://rp.example.com/cb');
    expect(location.searchParams.get('error')).toBe('login_required');
    expect(location.searchParams.get('state')).toBe('xyz');
  });

  it('should not redirect for an unknown client', async () => {
    const outcome = await flow.process({ params: params({ client_id: 'nobody' }) });

    expect(outcome.kind).toBe('denied');
    if (outcome.kind !== 'denied') return;
    expect(outcome.error.code).toBe('unauthorized_client');
    expect(outcome.response).toBeUndefined();
  });

  it('should issue a code once authentication completes', async () => {
    const outcome = proceeded(await flow.completeAuthentication({ params: params(), userId: 'alice' }));

    expect(outcome.cookies.map((cookie) => cookie.name)).toEqual(['oidc_op']);
    expect(outcome.response.kind).toBe('redirect');
    if (outcome.response.kind !== 'redirect') return;
    const location = new URL(outcome.response.location);
    expect(location.searchParams.get('code')).toMatch(/.+/);
    expect(location.searchParams.get('state')).toBe('xyz');
    expect(location.searchParams.get('iss')).toBe(ISSUER);
    expect(location.searchParams.get('client_id')).toBe('rp');
  });

  it('should refuse a response type combination it can not produce', async () => {
    const outcome = await flow.completeAuthentication({ params: params({ response_type: 'code none' }), userId: 'alice' });

    expect(outcome.kind).toBe('denied');
    if (outcome.kind !== 'denied') return;
    expect(outcome.error.code).toBe('unsupported_response_type');
    expect(outcome.error.description).toBe('Can not return none');
  });

  it('should carry several resources through the login handoff', async () => {
    const resource = JSON.stringify(['https://a.example.com', 'https://b.example.com']);
    const handoff = await flow.process({ params: params({ resource }) });
    if (handoff.kind !== 'needs_authentication') {
      throw new Error(`Expected needs_authentication, got ${handoff.kind}`);
    }

    const outcome = proceeded(await flow.completeAuthentication({ params: handoff.args.request, userId: 'alice' }));

    const grant = await provider.sessionManager.getGrant(outcome.sessionId);
    expect(grant.authorizationRequest.resource).toEqual(['https://a.example.com', 'https://b.example.com']);
  });

  describe('with a live session', () => {
    it('should answer the same request from the same grant', async () => {
      const { sessionId, cookie } = await login();

      const outcome = proceeded(await flow.process({ params: params(), cookie }));

      expect(outcome.sessionId).toBe(sessionId);
    });

    it('should open a new grant under the same authentication for a changed request', async () => {
      const { sessionId, cookie } = await login();
      clock.advance(60);

      const outcome = proceeded(await flow.process({ params: params({ state: 'other' }), cookie }));

      expect(outcome.sessionId).not.toBe(sessionId);
      expect(outcome.sessionId.split(';;').slice(0, 2)).toEqual(['alice', 'rp']);
      const first = await provider.sessionManager.getGrant(sessionId);
      const second = await provider.sessionManager.getGrant(outcome.sessionId);
      expect(second.authenticationEvent).toEqual(first.authenticationEvent);
      expect(second.authenticationEvent.authnTime).toBe(NOW);
    });

    it('should ask for a new login when upm_answer=true', async () => {
      const { cookie } = await login();

      const outcome = await flow.process({ params: params({ upm_answer: 'true' }), cookie });

      expect(outcome.kind).toBe('needs_authentication');
    });

    it('should ignore upm_answer when that is turned off', async () => {
      await setup({ upmAnswerForcesReauthentication: false });
      const { cookie } = await login();

      const outcome = await flow.process({ params: params({ upm_answer: 'true' }), cookie });

      expect(outcome.kind).toBe('proceed');
    });

    it('should ask for a new login when the reAuthenticate predicate says so', async () => {
      const seen: string[] = [];
      await setup({
        reAuthenticate: (request, method) => {
          seen.push(`${request.client_id}:${method.acr}`);
          return true;
        },
      });
      const { cookie } = await login();

      const outcome = await flow.process({ params: params(), cookie });

      expect(outcome.kind).toBe('needs_authentication');
      expect(seen).toEqual([`rp:${ACR_INTERNET_PROTOCOL_PASSWORD}`]);
    });

    it('should ask for a new login for prompt=login', async () => {
      const { cookie } = await login();

      const outcome = await flow.process({ params: params({ prompt: 'login' }), cookie });

      expect(outcome.kind).toBe('needs_authentication');
    });

    it('should not reuse a session cookie issued for another client', async () => {
      const { cookie } = await login('alice', { client_id: 'rp2' });

      const outcome = await flow.process({ params: params(), cookie });

      expect(outcome.kind).toBe('needs_authentication');
    });

    it('should answer login_required for prompt=none with another client\'s cookie', async () => {
      const { cookie } = await login('alice', { client_id: 'rp2' });

      const outcome = await flow.process({ params: params({ prompt: 'none' }), cookie });

      expect(outcome.kind).toBe('denied');
      if (outcome.kind !== 'denied') return;
      expect(outcome.error.code).toBe('login_required');
    });

    it('should ask for a new login when id_token_hint names another user', async () => {
      const bob = await login('bob', { response_type: 'id_token', nonce: 'n-1' });
      if (bob.response.kind !== 'redirect') {
        throw new Error('Expected a redirect');
      }
      const idToken = new URLSearchParams(new URL(bob.response.location).hash.slice(1)).get('id_token');
      expect(idToken).toBeTruthy();
      const { cookie } = await login('alice');

      const outcome = await flow.process({ params: params({ id_token_hint: idToken ?? '' }), cookie });

      expect(outcome.kind).toBe('needs_authentication');
    });

    it('should keep the session when id_token_hint names the same user', async () => {
      const alice = await login('alice', { response_type: 'id_token', nonce: 'n-1' });
      if (alice.response.kind !== 'redirect') {
        throw new Error('Expected a redirect');
      }
      const idToken = new URLSearchParams(new URL(alice.response.location).hash.slice(1)).get('id_token');

      const outcome = await flow.process({ params: params({ id_token_hint: idToken ?? '' }), cookie: alice.cookie });

      expect(outcome.kind).toBe('proceed');
    });

    it('should ask for a new login once the grant behind the cookie is revoked', async () => {
      const { sessionId, cookie } = await login();
      await provider.sessionManager.revokeGrant(sessionId);

      const outcome = await flow.process({ params: params(), cookie });

      expect(outcome.kind).toBe('needs_authentication');
    });

    it('should ask for a new login once the authentication event has lapsed', async () => {
      const { cookie } = await login();
      clock.advance(3601);

      const outcome = await flow.process({ params: params(), cookie });

      expect(outcome.kind).toBe('needs_authentication');
    });

    it('should hold max_age against the authentication, not the reissued cookie', async () => {
      const { cookie } = await login();
      clock.advance(100);
      const silent = proceeded(await flow.process({ params: params(), cookie }));
      const [reissued] = silent.cookies;
      clock.advance(100);

      const tooOld = await flow.process({ params: params({ max_age: '150' }), cookie: reissued?.value });
      const recentEnough = await flow.process({ params: params({ max_age: '300' }), cookie: reissued?.value });

      expect(tooOld.kind).toBe('needs_authentication');
      expect(recentEnough.kind).toBe('proceed');
    });
  });

  describe('with unknown scopes denied', () => {
    beforeEach(async () => {
      await setup({ denyUnknownScopes: true });
    });

    it('should redirect invalid_scope for a scope outside the supported ones', async () => {
      const outcome = await flow.process({ params: params({ scope: 'openid launch_codes' }) });

      expect(outcome.kind).toBe('denied');
      if (outcome.kind !== 'denied') return;
      expect(outcome.error.code).toBe('invalid_scope');
      expect(outcome.error.description).toBe('rp requested an unauthorized scope (launch_codes)');
      if (outcome.response?.kind !== 'redirect') {
        throw new Error('Expected a redirect');
      }
      const location = new URL(outcome.response.location);
      expect(location.searchParams.get('error')).toBe('invalid_scope');
      expect(location.searchParams.get('state')).toBe('xyz');
    });

    it('should let supported scopes through', async () => {
      const outcome = await flow.process({ params: params({ scope: 'openid email' }) });

      expect(outcome.kind).toBe('needs_authentication');
    });
  });
});
