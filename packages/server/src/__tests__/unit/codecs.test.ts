import { describe, it, expect, beforeAll } from 'vitest';
import { createHash } from 'node:crypto';
import * as jose from 'jose';
import { OpaqueTokenCodec } from '../../token/opaque-codec.js';
import { JwtTokenCodec } from '../../token/jwt-codec.js';
import { IdTokenCodec, buildIdTokenClaims } from '../../token/id-token.js';
import { SessionIdCipher } from '../../token/sid.js';
import { TokenHandler } from '../../token/handler.js';
import { KeyMaterial } from '../../crypto/jwt.js';
import { FixedClock } from '../../session/clock.js';
import { Grant } from '../../session/grant.js';
import { defaultUsageRules } from '../../context.js';
import { ToOld, UnknownToken } from '../../errors/session-errors.js';

const NOW = 1_700_000_000;
const ISSUER = 'https://op.example.com';
const SESSION_ID = 'alice;;rp;;g1';

function expectedHalfHash(value: string): string {
  return createHash('sha256').update(value).digest().subarray(0, 16).toString('base64url');
}

describe('token codecs', () => {
  let keys: KeyMaterial;
  let clock: FixedClock;

  beforeAll(async () => {
    keys = await KeyMaterial.create({ symKey: 'test-secret', algorithms: ['ES256'], defaultAlgorithm: 'ES256' });
  });

  describe('OpaqueTokenCodec', () => {
    it('should recover the session id and type', async () => {
      clock = new FixedClock(NOW);
      const codec = new OpaqueTokenCodec('refresh_token', keys.symKey, 86400, clock);

      const value = await codec.encode(SESSION_ID, 'R');
      const decoded = await codec.decode(value);

      expect(decoded.sid).toBe(SESSION_ID);
      expect(decoded.type).toBe('refresh_token');
      expect(decoded.iat).toBe(NOW);
      expect(decoded.exp).toBe(NOW + 86400);
    });

    it('should produce a different value each time', async () => {
      const codec = new OpaqueTokenCodec('access_token', keys.symKey, 3600, new FixedClock(NOW));

      expect(await codec.encode(SESSION_ID, 'T')).not.toBe(await codec.encode(SESSION_ID, 'T'));
    });

    it('should honor an explicit expiry', async () => {
      const codec = new OpaqueTokenCodec('access_token', keys.symKey, 3600, new FixedClock(NOW));

      const decoded = await codec.decode(await codec.encode(SESSION_ID, 'T', { exp: NOW + 10 }));

      expect(decoded.exp).toBe(NOW + 10);
    });

    it('should refuse values of another token type', async () => {
      const clockNow = new FixedClock(NOW);
      const refresh = new OpaqueTokenCodec('refresh_token', keys.symKey, 86400, clockNow);
      const access = new OpaqueTokenCodec('access_token', keys.symKey, 3600, clockNow);

      await expect(access.decode(await refresh.encode(SESSION_ID, 'R'))).rejects.toThrow(UnknownToken);
    });

    it('should report expiry', async () => {
      clock = new FixedClock(NOW);
      const codec = new OpaqueTokenCodec('access_token', keys.symKey, 3600, clock);
      const value = await codec.encode(SESSION_ID, 'T');
      clock.advance(3600);

      await expect(codec.decode(value)).rejects.toThrow(ToOld);
    });

    it('should refuse garbage', async () => {
      const codec = new OpaqueTokenCodec('access_token', keys.symKey, 3600, new FixedClock(NOW));

      await expect(codec.decode('garbage')).rejects.toThrow(UnknownToken);
    });
  });

  describe('JwtTokenCodec', () => {
    it('should sign a verifiable access token', async () => {
      clock = new FixedClock(NOW);
      const codec = new JwtTokenCodec('access_token', keys, ISSUER, 3600, clock, new SessionIdCipher(keys.symKey));

      const value = await codec.encode(SESSION_ID, 'T', { scope: 'openid' });

      expect(jose.decodeProtectedHeader(value).typ).toBe('at+jwt');
      const decoded = await codec.decode(value);
      expect(decoded.sid).toBe(SESSION_ID);
      expect(decoded.type).toBe('access_token');
      expect(decoded['scope']).toBe('openid');
      expect(decoded['iss']).toBe(ISSUER);
    });

    it('should not show the session id to the bearer', async () => {
      clock = new FixedClock(NOW);
      const codec = new JwtTokenCodec('access_token', keys, ISSUER, 3600, clock, new SessionIdCipher(keys.symKey));

      const value = await codec.encode(SESSION_ID, 'T');

      const { sid } = jose.decodeJwt(value);
      expect(typeof sid).toBe('string');
      expect(sid).not.toContain('alice');
      expect(new SessionIdCipher(keys.symKey).decrypt(String(sid))).toBe(SESSION_ID);
    });

    it('should report expiry', async () => {
      clock = new FixedClock(NOW);
      const codec = new JwtTokenCodec('access_token', keys, ISSUER, 60, clock, new SessionIdCipher(keys.symKey));
      const value = await codec.encode(SESSION_ID, 'T');
      clock.advance(61);

      await expect(codec.decode(value)).rejects.toThrow(ToOld);
    });

    it('should refuse tokens of another issuer', async () => {
      clock = new FixedClock(NOW);
      const mine = new JwtTokenCodec('access_token', keys, ISSUER, 60, clock, new SessionIdCipher(keys.symKey));
      const theirs = new JwtTokenCodec('access_token', keys, 'https://other.example.com', 60, clock, new SessionIdCipher(keys.symKey));

      await expect(mine.decode(await theirs.encode(SESSION_ID, 'T'))).rejects.toThrow(UnknownToken);
    });
  });

  describe('IdTokenCodec', () => {
    const cipherFor = (k: KeyMaterial) => new SessionIdCipher(k.symKey);

    it('should address the client and hide the session id', async () => {
      clock = new FixedClock(NOW);
      const codec = new IdTokenCodec(keys, ISSUER, 3600, clock, cipherFor(keys), async () => 'ES256');

      const value = await codec.encode(SESSION_ID, 'I', { sub: 'subject-1', nonce: 'n' });
      const { payload, sessionId } = await codec.verify(value);

      expect(sessionId).toBe(SESSION_ID);
      expect(payload.aud).toEqual(['rp']);
      expect(payload.iss).toBe(ISSUER);
      expect(payload.sub).toBe('subject-1');
      expect(payload.nonce).toBe('n');
      expect(payload.exp).toBe(NOW + 3600);
      expect(payload.sid).not.toContain('alice');
    });

    it('should give the same sid for every token of a session', async () => {
      clock = new FixedClock(NOW);
      const codec = new IdTokenCodec(keys, ISSUER, 3600, clock, cipherFor(keys), async () => 'ES256');

      const first = await codec.verify(await codec.encode(SESSION_ID, 'I', { sub: 's' }));
      const second = await codec.verify(await codec.encode(SESSION_ID, 'I', { sub: 's' }));

      expect(first.payload.sid).toBe(second.payload.sid);
    });

    it('should accept an expired token only when asked to', async () => {
      clock = new FixedClock(NOW);
      const codec = new IdTokenCodec(keys, ISSUER, 60, clock, cipherFor(keys), async () => 'ES256');
      const value = await codec.encode(SESSION_ID, 'I', { sub: 's' });
      clock.advance(120);

      await expect(codec.verify(value)).rejects.toThrow(ToOld);
      await expect(codec.verify(value, { allowExpired: true })).resolves.toMatchObject({ sessionId: SESSION_ID });
    });

    it('should refuse a token addressed to another client', async () => {
      clock = new FixedClock(NOW);
      const codec = new IdTokenCodec(keys, ISSUER, 3600, clock, cipherFor(keys), async () => 'ES256');
      const value = await codec.encode(SESSION_ID, 'I', { sub: 's' });

      await expect(codec.verify(value, { audience: 'rp' })).resolves.toMatchObject({ sessionId: SESSION_ID });
      await expect(codec.verify(value, { audience: 'other-rp' })).rejects.toThrow(UnknownToken);
    });

    it('should refuse a logout token', async () => {
      clock = new FixedClock(NOW);
      const cipher = cipherFor(keys);
      const codec = new IdTokenCodec(keys, ISSUER, 3600, clock, cipher, async () => 'ES256');
      const logoutToken = await keys.sign(
        {
          iss: ISSUER,
          sub: 's',
          aud: ['rp'],
          iat: NOW,
          exp: NOW + 60,
          sid: cipher.encrypt(SESSION_ID),
          events: { 'http://schemas.openid.net/event/backchannel-logout': {} },
        },
        { algorithm: 'ES256', typ: 'logout+jwt' }
      );

      await expect(codec.verify(logoutToken)).rejects.toThrow(UnknownToken);
    });

    it('should require a sub claim', async () => {
      const codec = new IdTokenCodec(keys, ISSUER, 60, new FixedClock(NOW), cipherFor(keys), async () => 'ES256');

      await expect(codec.encode(SESSION_ID, 'I')).rejects.toThrow('An ID Token needs a sub claim');
    });
  });

  describe('buildIdTokenClaims', () => {
    it('should bind the code and access token by hash', () => {
      const grant = Grant.create({
        sub: 'subject-1',
        scope: ['openid'],
        authorizationRequest: { client_id: 'rp', response_type: ['code', 'id_token'], scope: ['openid'], nonce: 'n-1' },
        authenticationEvent: { uid: 'alice', salt: 's', validUntil: NOW + 60, authnInfo: 'urn:acr', authnTime: NOW },
        usageRules: defaultUsageRules(),
        issuedAt: NOW,
      });

      const claims = buildIdTokenClaims({
        grant,
        code: 'the-code',
        accessToken: 'the-token',
        userClaims: { email: 'alice@example.com', sub: 'ignored' },
        algorithm: 'ES256',
      });

      expect(claims).toEqual({
        email: 'alice@example.com',
        sub: 'subject-1',
        acr: 'urn:acr',
        auth_time: NOW,
        nonce: 'n-1',
        c_hash: expectedHalfHash('the-code'),
        at_hash: expectedHalfHash('the-token'),
      });
    });
  });

  describe('TokenHandler', () => {
    it('should find the codec that accepts a value', async () => {
      const clockNow = new FixedClock(NOW);
      const handler = new TokenHandler({
        authorization_code: new OpaqueTokenCodec('authorization_code', keys.symKey, 600, clockNow),
        access_token: new JwtTokenCodec('access_token', keys, ISSUER, 3600, clockNow, new SessionIdCipher(keys.symKey)),
      });

      const value = await handler.codec('access_token').encode(SESSION_ID, 'T');

      await expect(handler.type(value)).resolves.toBe('access_token');
      await expect(handler.sid(value)).resolves.toBe(SESSION_ID);
    });

    it('should fail when no codec accepts a value', async () => {
      const handler = new TokenHandler({
        access_token: new OpaqueTokenCodec('access_token', keys.symKey, 3600, new FixedClock(NOW)),
      });

      await expect(handler.info('garbage')).rejects.toThrow('No codec recognizes the token');
    });

    it('should refuse to hand out a codec it does not have', () => {
      expect(() => new TokenHandler({}).codec('id_token')).toThrow('No codec configured for id_token');
    });
  });
});
