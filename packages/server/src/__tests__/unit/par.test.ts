import { describe, it, expect } from 'vitest';
import { PushedAuthorizations } from '../../authorization/par.js';
import { MemoryParStorage } from '../../storage/memory/par-storage.js';
import { FixedClock } from '../../session/clock.js';
import { OAuthError } from '../../errors/oauth-error.js';

describe('PushedAuthorizations', () => {
  const params = { client_id: 'rp', response_type: 'code', scope: 'openid' };

  it('should hand out a urn:uuid request URI', async () => {
    const par = new PushedAuthorizations(new MemoryParStorage(new FixedClock(0)), 90);

    const pushed = await par.push(params);

    expect(pushed.request_uri).toMatch(/^urn:uuid:[0-9a-f-]{36}$/);
    expect(pushed.expires_in).toBe(90);
    expect(PushedAuthorizations.isRequestUri(pushed.request_uri)).toBe(true);
  });

  it('should resolve a request URI exactly once', async () => {
    const par = new PushedAuthorizations(new MemoryParStorage(new FixedClock(0)));
    const { request_uri } = await par.push(params);

    await expect(par.resolve(request_uri)).resolves.toEqual(params);
    await expect(par.resolve(request_uri)).rejects.toThrow('Got a request_uri I can not resolve');
  });

  it('should not resolve after the request expired', async () => {
    const clock = new FixedClock(0);
    const par = new PushedAuthorizations(new MemoryParStorage(clock), 60);
    const { request_uri } = await par.push(params);
    clock.advance(60);

    await expect(par.resolve(request_uri)).rejects.toThrow(OAuthError);
  });

  it('should not resolve unknown request URIs', async () => {
    const par = new PushedAuthorizations(new MemoryParStorage(new FixedClock(0)));

    const error = await par.resolve('urn:uuid:00000000-0000-0000-0000-000000000000').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(OAuthError);
    if (error instanceof OAuthError) {
      expect(error.code).toBe('invalid_request_uri');
    }
  });
});
