import { readFileSync, existsSync } from 'node:fs';
import * as constants from './constants.js';

/**
 * Read a secret from file (Docker secrets) or environment variable
 * Supports both `VAR_FILE` (path to file) and `VAR` (direct value) patterns
 */
function readSecret(envVar: string): string | undefined {
  // Check for file-based secret first (Docker secrets pattern)
  const fileEnvVar = `${envVar}_FILE`;
  const filePath = process.env[fileEnvVar];

  if (filePath && existsSync(filePath)) {
    try {
      return readFileSync(filePath, 'utf-8').trim();
    } catch {
      console.warn(`Warning: Could not read secret from ${filePath}`);
    }
  }

  // Fall back to direct environment variable
  return process.env[envVar];
}

function readInt(envVar: string, fallback: number): number {
  return parseInt(process.env[envVar] ?? String(fallback), 10);
}

function readFlag(envVar: string, fallback: boolean): boolean {
  const value = process.env[envVar];
  if (value === undefined) {
    return fallback;
  }
  return value === 'true' || value === '1';
}

/**
 * Application configuration loaded from environment
 */
export interface Config {
  server: {
    port: number;
    host: string;
    nodeEnv: string;
  };
  provider: {
    issuer: string;
    checkSessionIframe: string | undefined;
    denyUnknownScopes: boolean;
    sessionCookieName: string;
    sessionManagementCookieName: string;
  };
  redis: {
    url: string | undefined;
  };
  secrets: {
    symKey: string | undefined;
    signingKeyPem: string | undefined;
  };
  logging: {
    level: string;
  };
  defaults: {
    authorizationCodeTtl: number;
    accessTokenTtl: number;
    refreshTokenTtl: number;
    idTokenTtl: number;
    authnEventTtl: number;
    parTtl: number;
    logoutTokenTtl: number;
    logoutConfirmationTtl: number;
    backchannelTimeoutMs: number;
  };
}

/**
 * Load configuration from environment variables
 */
export function loadConfig(): Config {
  const port = readInt('PORT', 3000);
  const host = process.env['HOST'] ?? '0.0.0.0';

  return {
    server: {
      port,
      host,
      nodeEnv: process.env['NODE_ENV'] ?? 'development',
    },
    provider: {
      issuer: process.env['ISSUER'] ?? `http://localhost:${port}`,
      checkSessionIframe: process.env['CHECK_SESSION_IFRAME'],
      denyUnknownScopes: readFlag('DENY_UNKNOWN_SCOPES', false),
      sessionCookieName: process.env['COOKIE_NAME_SESSION'] ?? constants.DEFAULT_SESSION_COOKIE_NAME,
      sessionManagementCookieName:
        process.env['COOKIE_NAME_SESSION_MANAGEMENT'] ?? constants.DEFAULT_SESSION_MANAGEMENT_COOKIE_NAME,
    },
    redis: {
      url: process.env['REDIS_URL'],
    },
    secrets: {
      symKey: readSecret('SYM_KEY'),
      signingKeyPem: readSecret('SIGNING_KEY'),
    },
    logging: {
      level: process.env['LOG_LEVEL'] ?? 'info',
    },
    defaults: {
      authorizationCodeTtl: readInt('DEFAULT_AUTHORIZATION_CODE_TTL', constants.DEFAULT_AUTHORIZATION_CODE_TTL),
      accessTokenTtl: readInt('DEFAULT_ACCESS_TOKEN_TTL', constants.DEFAULT_ACCESS_TOKEN_TTL),
      refreshTokenTtl: readInt('DEFAULT_REFRESH_TOKEN_TTL', constants.DEFAULT_REFRESH_TOKEN_TTL),
      idTokenTtl: readInt('DEFAULT_ID_TOKEN_TTL', constants.DEFAULT_ID_TOKEN_TTL),
      authnEventTtl: readInt('AUTHN_EVENT_TTL', constants.DEFAULT_AUTHN_EVENT_TTL),
      parTtl: readInt('PAR_TTL', constants.DEFAULT_PAR_TTL),
      logoutTokenTtl: readInt('LOGOUT_TOKEN_TTL', constants.DEFAULT_LOGOUT_TOKEN_TTL),
      logoutConfirmationTtl: readInt('LOGOUT_CONFIRMATION_TTL', constants.DEFAULT_LOGOUT_CONFIRMATION_TTL),
      backchannelTimeoutMs: readInt('BACKCHANNEL_TIMEOUT_MS', constants.DEFAULT_BACKCHANNEL_TIMEOUT_MS),
    },
  };
}

// Singleton config instance
let config: Config | null = null;

/**
 * Get the current configuration (loads if not already loaded)
 */
export function getConfig(): Config {
  if (!config) {
    config = loadConfig();
  }
  return config;
}

/**
 * Reset configuration (useful for testing)
 */
export function resetConfig(): void {
  config = null;
}

// Re-export constants
export { constants };
