import { describe, it, expect } from 'vitest';
import { CookieDealer } from '../../cookie/cookie-dealer.js';
import { FixedClock } from '../../session/clock.js';
import { deriveKey } from '../../crypto/encrypt.js';

describe('CookieDealer', () => {
  const clock = new FixedClock(1_700_000_000);
  const dealer = new CookieDealer(deriveKey('test-secret'), clock);

  it('should read back what it signed', () => {
    const cookie = dealer.createCookie('{"sid":"abc"}', 'sso', 'oidc_op');

    expect(dealer.getCookieValue(cookie.value, 'oidc_op')).toEqual({
      payload: '{"sid":"abc"}',
      timestamp: 1_700_000_000,
      type: 'sso',
    });
  });

  it('should set secure defaults', () => {
    const cookie = dealer.createCookie('x', 'sso', 'oidc_op', { ttl: 60 });

    expect(cookie.options).toEqual({ path: '/', httpOnly: true, secure: true, sameSite: 'Lax', maxAge: 60 });
  });

  it('should let script readable cookies through when asked', () => {
    const cookie = dealer.createCookie('x', 'sm', 'oidc_op_sm', { httpOnly: false, sameSite: 'None' });

    expect(cookie.options.httpOnly).toBe(false);
    expect(cookie.options.sameSite).toBe('None');
  });

  it('should reject a tampered payload', () => {
    const cookie = dealer.createCookie('{"sid":"abc"}', 'sso', 'oidc_op');
    const [, ...rest] = cookie.value.split('|');
    const forged = [Buffer.from('{"sid":"xyz"}').toString('base64url'), ...rest].join('|');

    expect(dealer.getCookieValue(forged, 'oidc_op')).toBeNull();
  });

  it('should bind the signature to the cookie name', () => {
    const cookie = dealer.createCookie('x', 'sso', 'oidc_op');

    expect(dealer.getCookieValue(cookie.value, 'other')).toBeNull();
  });

  it('should reject values signed with another key', () => {
    const other = new CookieDealer(deriveKey('other-secret'), clock);
    const cookie = other.createCookie('x', 'sso', 'oidc_op');

    expect(dealer.getCookieValue(cookie.value, 'oidc_op')).toBeNull();
  });

  it('should reject malformed values', () => {
    expect(dealer.getCookieValue(undefined, 'oidc_op')).toBeNull();
    expect(dealer.getCookieValue('a|b', 'oidc_op')).toBeNull();
  });

  it('should expire cookies when killing them', () => {
    const [killed] = dealer.killCookies(['oidc_op']);

    expect(killed?.value).toBe('');
    expect(killed?.options.maxAge).toBe(0);
  });
});
