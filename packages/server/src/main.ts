import { serve } from '@hono/node-server';
import { createOidcServer } from './app.js';
import { createProviderContext, defaultUsageRules } from './context.js';
import { KeyMaterial } from './crypto/jwt.js';
import { generateRandomBase64Url } from './crypto/random.js';
import { createLogger } from './logging/logger.js';
import { createMemoryStorage } from './storage/memory/index.js';
import { createRedisClient, createRedisStorage, ioredisCommands } from './storage/redis/index.js';
import type { IStorage } from './storage/interfaces/index.js';
import { getConfig } from './config/index.js';
import { SIGNING_ALGORITHM_RS256 } from './config/constants.js';

// Load configuration
const config = getConfig();
const logger = createLogger(config.logging.level, { service: 'opcore' });

const registries = createMemoryStorage();

// Development client and user, so the flows can be tried out locally
if (config.server.nodeEnv === 'development') {
  await registries.clients.create({
    clientId: 'dev-client',
    clientSecret: 'dev-secret',
    clientType: 'confidential',
    authMethod: 'client_secret_basic',
    name: 'Development client',
    redirectUris: ['http://localhost:8080/callback'],
    postLogoutRedirectUris: ['http://localhost:8080/'],
    allowedGrants: ['authorization_code', 'refresh_token'],
    allowedScopes: ['openid', 'profile', 'email', 'offline_access'],
    responseTypes: ['code'],
  });
  await registries.users.upsert('alice', { name: 'Alice Example', email: 'alice@example.com' }, 'alice-password');
}

// Create storage based on environment
let storage: IStorage;
if (config.redis.url) {
  logger.info('Using Redis session storage');
  const redis = createRedisClient({ url: config.redis.url });
  await redis.connect();
  storage = createRedisStorage(ioredisCommands(redis), registries);
} else {
  logger.info('Using in-memory storage (no REDIS_URL configured)');
  storage = registries;
}

let symKey = config.secrets.symKey;
if (!symKey) {
  logger.warn('SYM_KEY is not set; tokens and cookies will not survive a restart');
  symKey = generateRandomBase64Url(32);
}

const keys = await KeyMaterial.create({
  symKey,
  privateKeyPem: config.secrets.signingKeyPem
    ? { pem: config.secrets.signingKeyPem, algorithm: SIGNING_ALGORITHM_RS256 }
    : undefined,
});

const provider = createProviderContext({
  storage,
  keys,
  issuer: config.provider.issuer,
  authnMethods: [{ kind: 'user_pass' }],
  logger,
  settings: {
    checkSessionIframe: config.provider.checkSessionIframe,
    denyUnknownScopes: config.provider.denyUnknownScopes,
    sessionCookieName: config.provider.sessionCookieName,
    sessionManagementCookieName: config.provider.sessionManagementCookieName,
    authnEventTtl: config.defaults.authnEventTtl,
    logoutTokenTtl: config.defaults.logoutTokenTtl,
    logoutConfirmationTtl: config.defaults.logoutConfirmationTtl,
    backchannelTimeoutMs: config.defaults.backchannelTimeoutMs,
  },
  usageRules: defaultUsageRules({
    authorizationCode: config.defaults.authorizationCodeTtl,
    accessToken: config.defaults.accessTokenTtl,
    refreshToken: config.defaults.refreshTokenTtl,
    idToken: config.defaults.idTokenTtl,
  }),
  parTtl: config.defaults.parTtl,
});

const app = createOidcServer({
  provider,
  enableLogging: config.server.nodeEnv !== 'test',
  strictTransport: config.provider.issuer.startsWith('https:'),
});

// Start server
serve(
  {
    fetch: app.fetch,
    port: config.server.port,
    hostname: config.server.host,
  },
  (info) => {
    logger.info('OpenID Connect provider listening', {
      address: info.address,
      port: info.port,
      issuer: config.provider.issuer,
    });
  }
);
