import { describe, it, expect, beforeEach } from 'vitest';
import type { TokenResponse } from '@opcore/shared';
import {
  setupTestContext,
  tokensFor,
  basicAuth,
  readJson,
  type ErrorResponse,
  type TestContext,
} from '../test-setup.js';

describe('Refresh Token Grant', () => {
  let ctx: TestContext;

  beforeEach(async () => {
    ctx = await setupTestContext();
  });

  const refresh = (refreshToken: string, extra: Record<string, string> = {}) =>
    ctx.app.request('/token', {
      method: 'POST',
      headers: {
        'Content-Type': 'application/x-www-form-urlencoded',
        Authorization: basicAuth(ctx.confidentialClientId, ctx.confidentialClientSecret),
      },
      body: new URLSearchParams({ grant_type: 'refresh_token', refresh_token: refreshToken, ...extra }),
    });

  it('should issue a new access token and rotate the refresh token', async () => {
    const initial = await tokensFor(ctx);

    const res = await refresh(initial.refresh_token ?? '');

    expect(res.status).toBe(200);
    const tokens = await readJson<TokenResponse>(res);
    expect(tokens.token_type).toBe('Bearer');
    expect(tokens.expires_in).toBe(3600);
    expect(tokens.scope).toBe('openid profile email offline_access');
    expect(tokens.access_token).not.toBe(initial.access_token);
    expect(tokens.refresh_token).toBeTruthy();
    expect(tokens.refresh_token).not.toBe(initial.refresh_token);
    expect(tokens.id_token).toBeUndefined();
  });

  it('should reject a refresh token that was already rotated', async () => {
    const initial = await tokensFor(ctx);
    await refresh(initial.refresh_token ?? '');

    const res = await refresh(initial.refresh_token ?? '');

    expect(res.status).toBe(400);
    const error = await readJson<ErrorResponse>(res);
    expect(error.error).toBe('invalid_grant');
    expect(error.error_description).toBe('Refresh token is expired or revoked');
  });

  it('should accept the rotated refresh token', async () => {
    const initial = await tokensFor(ctx);
    const rotated = await readJson<TokenResponse>(await refresh(initial.refresh_token ?? ''));

    const res = await refresh(rotated.refresh_token ?? '');

    expect(res.status).toBe(200);
  });

  it('should narrow the scope of the new access token', async () => {
    const initial = await tokensFor(ctx);

    const res = await refresh(initial.refresh_token ?? '', { scope: 'openid' });

    expect(res.status).toBe(200);
    const tokens = await readJson<TokenResponse>(res);
    expect(tokens.scope).toBe('openid');
  });

  it('should reject a scope wider than the grant', async () => {
    const initial = await tokensFor(ctx);

    const res = await refresh(initial.refresh_token ?? '', { scope: 'openid phone' });

    expect(res.status).toBe(400);
    const error = await readJson<ErrorResponse>(res);
    expect(error.error).toBe('invalid_scope');
    expect(error.error_description).toBe('Scope exceeds the original grant: phone');
  });

  it('should reject an access token presented as a refresh token', async () => {
    const initial = await tokensFor(ctx);

    const res = await refresh(initial.access_token);

    expect(res.status).toBe(400);
    const error = await readJson<ErrorResponse>(res);
    expect(error.error).toBe('invalid_grant');
    expect(error.error_description).toBe('Not a refresh token');
  });

  it('should reject an expired refresh token', async () => {
    const initial = await tokensFor(ctx);
    ctx.clock.advance(86_400 * 31);

    const res = await refresh(initial.refresh_token ?? '');

    expect(res.status).toBe(400);
    const error = await readJson<ErrorResponse>(res);
    expect(error.error).toBe('invalid_grant');
  });
});
