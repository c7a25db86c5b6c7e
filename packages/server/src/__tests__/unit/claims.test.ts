import { describe, it, expect, beforeEach } from 'vitest';
import { ClaimsResolver, claimsMatch } from '../../session/claims.js';
import { SessionManager } from '../../session/manager.js';
import { FixedClock } from '../../session/clock.js';
import { TokenHandler } from '../../token/handler.js';
import { MemorySessionStorage } from '../../storage/memory/session-storage.js';
import { MemoryClientStorage } from '../../storage/memory/client-storage.js';
import { MemoryUserStorage } from '../../storage/memory/user-storage.js';
import { defaultUsageRules } from '../../context.js';

describe('claimsMatch', () => {
  it('should never match a missing value', () => {
    expect(claimsMatch(undefined, null)).toBe(false);
    expect(claimsMatch(null, { essential: true })).toBe(false);
  });

  it('should match any value without a spec', () => {
    expect(claimsMatch('alice@example.com', null)).toBe(true);
    expect(claimsMatch('alice@example.com', undefined)).toBe(true);
  });

  it('should match an exact value', () => {
    expect(claimsMatch('urn:acr:1', { value: 'urn:acr:1' })).toBe(true);
    expect(claimsMatch('urn:acr:2', { value: 'urn:acr:1' })).toBe(false);
  });

  it('should match one of several values', () => {
    expect(claimsMatch('b', { values: ['a', 'b'] })).toBe(true);
    expect(claimsMatch('c', { values: ['a', 'b'] })).toBe(false);
  });

  it('should compare structured values deeply', () => {
    expect(claimsMatch({ country: 'NO' }, { value: { country: 'NO' } })).toBe(true);
  });

  it('should treat essential alone as presence only', () => {
    expect(claimsMatch('anything', { essential: true })).toBe(true);
    expect(claimsMatch('other', { essential: true, value: 'x' })).toBe(false);
  });
});

describe('ClaimsResolver', () => {
  const NOW = 1_700_000_000;
  let resolver: ClaimsResolver;
  let sessionId: string;

  beforeEach(async () => {
    const clock = new FixedClock(NOW);
    const manager = new SessionManager({
      storage: new MemorySessionStorage(),
      tokenHandler: new TokenHandler({}),
      clock,
      salt: 'salt',
      defaultUsageRules: defaultUsageRules(),
    });
    const clients = new MemoryClientStorage();
    const users = new MemoryUserStorage();

    await clients.create({
      clientId: 'rp',
      clientType: 'confidential',
      authMethod: 'client_secret_basic',
      name: 'Relying Party',
      redirectUris: ['https://rp.example.com/cb'],
      allowedGrants: ['authorization_code'],
      addClaims: { userinfo: ['phone_number'], id_token: { email: null } },
    });
    await users.upsert('alice', { name: 'Alice', email: 'alice@example.com', phone_number: '+15550100', given_name: 'Alice' });

    resolver = new ClaimsResolver(manager, clients, users);
    sessionId = await manager.createSession({
      userId: 'alice',
      clientId: 'rp',
      authnEvent: { uid: 'alice', salt: 's', validUntil: NOW + 3600, authnInfo: 'acr' },
      authRequest: {
        client_id: 'rp',
        response_type: ['code'],
        scope: ['openid', 'email'],
        claims: { userinfo: { given_name: { essential: true } } },
      },
    });
  });

  it('should combine client, scope and requested claims for userinfo', async () => {
    const restriction = await resolver.getClaims(sessionId, ['openid', 'email'], 'userinfo');

    expect(restriction).toEqual({
      phone_number: null,
      sub: null,
      email: null,
      email_verified: null,
      given_name: { essential: true },
    });
  });

  it('should leave scope claims out of the ID Token', async () => {
    const restriction = await resolver.getClaims(sessionId, ['openid', 'email'], 'id_token');

    expect(restriction).toEqual({ email: null });
  });

  it('should release nothing in access tokens by default', async () => {
    await expect(resolver.getClaims(sessionId, ['openid', 'email'], 'access_token')).resolves.toEqual({});
  });

  it('should release only the claims the user has', async () => {
    const claims = await resolver.getUserClaims('alice', {
      email: null,
      email_verified: null,
      given_name: { essential: true },
    });

    expect(claims).toEqual({ email: 'alice@example.com', given_name: 'Alice' });
  });

  it('should release nothing for an unknown user', async () => {
    await expect(resolver.getUserClaims('nobody', { email: null })).resolves.toEqual({});
  });
});
