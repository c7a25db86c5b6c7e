import { vi, type Mock } from 'vitest';
import * as jose from 'jose';
import { createOidcServer } from '../../app.js';
import { createProviderContext, type ProviderContext, type ProviderSettings } from '../../context.js';
import { KeyMaterial } from '../../crypto/jwt.js';
import { createMemoryStorage, type MemoryStorage } from '../../storage/memory/index.js';
import { FixedClock } from '../../session/clock.js';
import type { AuthnMethodConfig } from '../../authn/registry.js';
import type { CreateClientInput, TokenResponse } from '@opcore/shared';

/**
 * Test fixtures and helpers
 */

export const ISSUER = 'https://op.example.com';
export const REDIRECT_URI = 'https://rp.example.com/callback';
export const POST_LOGOUT_URI = 'https://rp.example.com/logged-out';
export const START_TIME = 1_700_000_000;

export type FetchMock = Mock<(input: string, init?: RequestInit) => Promise<Response>>;

// Shared test context
export interface TestContext {
  storage: MemoryStorage;
  provider: ProviderContext;
  app: ReturnType<typeof createOidcServer>;
  clock: FixedClock;
  fetch: FetchMock;
  confidentialClientId: string;
  confidentialClientSecret: string;
  publicClientId: string;
}

export interface SetupOptions {
  authnMethods?: AuthnMethodConfig[];
  settings?: Partial<Omit<ProviderSettings, 'issuer'>>;
  confidentialClient?: Partial<CreateClientInput>;
}

// Setup function for tests
export async function setupTestContext(options: SetupOptions = {}): Promise<TestContext> {
  const clock = new FixedClock(START_TIME);
  const storage = createMemoryStorage({ clock });
  const fetch: FetchMock = vi.fn<(input: string, init?: RequestInit) => Promise<Response>>(
    async () => new Response(null, { status: 200 })
  );

  await storage.users.upsert(
    'alice',
    { name: 'Alice Example', email: 'alice@example.com', email_verified: true, phone_number: '+15550100' },
    'alice-password'
  );

  const { client: confidentialClient, clientSecret } = await storage.clients.create({
    clientId: 'rp-confidential',
    clientSecret: 'test-secret',
    clientType: 'confidential',
    authMethod: 'client_secret_basic',
    name: 'Test Confidential Client',
    redirectUris: [REDIRECT_URI],
    postLogoutRedirectUris: [POST_LOGOUT_URI],
    responseTypes: ['code', 'id_token token', 'code id_token'],
    allowedGrants: ['authorization_code', 'refresh_token'],
    allowedScopes: ['openid', 'profile', 'email', 'offline_access'],
    ...options.confidentialClient,
  });

  const { client: publicClient } = await storage.clients.create({
    clientId: 'rp-public',
    clientType: 'public',
    authMethod: 'none',
    name: 'Test Public Client',
    redirectUris: ['https://spa.example.com/callback'],
    responseTypes: ['code'],
    allowedGrants: ['authorization_code'],
    allowedScopes: ['openid', 'email'],
  });

  const keys = await KeyMaterial.create({ symKey: 'test-secret', algorithms: ['RS256'] });

  const provider = createProviderContext({
    storage,
    keys,
    issuer: ISSUER,
    authnMethods: options.authnMethods ?? [{ kind: 'no_authn', user: 'alice' }],
    clock,
    fetch,
    settings: options.settings,
  });

  const app = createOidcServer({ provider, enableLogging: false });

  if (!clientSecret) {
    throw new Error('Confidential client was created without a secret');
  }

  return {
    storage,
    provider,
    app,
    clock,
    fetch,
    confidentialClientId: confidentialClient.clientId,
    confidentialClientSecret: clientSecret,
    publicClientId: publicClient.clientId,
  };
}

// Create Basic auth header
export function basicAuth(clientId: string, clientSecret: string): string {
  const credentials = Buffer.from(`${clientId}:${clientSecret}`).toString('base64');
  return `Basic ${credentials}`;
}

export function authorizePath(params: Record<string, string>): string {
  return `/authorize?${new URLSearchParams(params).toString()}`;
}

export function codeRequest(overrides: Record<string, string> = {}): Record<string, string> {
  return {
    response_type: 'code',
    client_id: 'rp-confidential',
    redirect_uri: REDIRECT_URI,
    scope: 'openid profile email offline_access',
    state: 'state-123',
    nonce: 'nonce-123',
    ...overrides,
  };
}

export function location(res: Response): URL {
  const value = res.headers.get('Location');
  if (!value) {
    throw new Error(`Expected a redirect, got ${res.status}`);
  }
  return new URL(value);
}

/**
 * Cookie header carrying every cookie a response set
 */
export function cookieHeader(res: Response): string {
  return res.headers
    .getSetCookie()
    .map((cookie) => cookie.split(';')[0])
    .join('; ');
}

export function setCookieNamed(res: Response, name: string): string | undefined {
  return res.headers.getSetCookie().find((cookie) => cookie.startsWith(`${name}=`));
}

export async function readJson<T>(res: Response): Promise<T> {
  return (await res.json()) as T;
}

export interface ErrorResponse {
  error: string;
  error_description?: string;
}

/**
 * Run a code flow authorization and return the code with the session cookie
 */
export async function authorizeCode(
  ctx: TestContext,
  overrides: Record<string, string> = {}
): Promise<{ code: string; cookie: string }> {
  const res = await ctx.app.request(authorizePath(codeRequest(overrides)));
  const code = location(res).searchParams.get('code');
  if (!code) {
    throw new Error('Authorization response carried no code');
  }
  return { code, cookie: cookieHeader(res) };
}

export async function exchangeCode(ctx: TestContext, code: string): Promise<Response> {
  return ctx.app.request('/token', {
    method: 'POST',
    headers: {
      'Content-Type': 'application/x-www-form-urlencoded',
      Authorization: basicAuth(ctx.confidentialClientId, ctx.confidentialClientSecret),
    },
    body: new URLSearchParams({ grant_type: 'authorization_code', code, redirect_uri: REDIRECT_URI }),
  });
}

export async function tokensFor(ctx: TestContext, overrides: Record<string, string> = {}): Promise<TokenResponse & { cookie: string }> {
  const { code, cookie } = await authorizeCode(ctx, overrides);
  const res = await exchangeCode(ctx, code);
  if (res.status !== 200) {
    throw new Error(`Token request failed with ${res.status}`);
  }
  return { ...(await readJson<TokenResponse>(res)), cookie };
}

/**
 * Verify a JWT against the provider's keys at the test clock's time
 */
export async function verifyJwt(ctx: TestContext, token: string): Promise<jose.JWTPayload> {
  const { payload } = await jose.jwtVerify(token, jose.createLocalJWKSet(ctx.provider.keys.jwks()), {
    currentDate: new Date(ctx.clock.now() * 1000),
  });
  return payload;
}

export { jose };
