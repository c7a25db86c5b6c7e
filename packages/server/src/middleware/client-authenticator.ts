import type { Context, MiddlewareHandler } from 'hono';
import type { ClientAuthMethod, OidcClient } from '@opcore/shared';
import type { OidcVariables } from '../types/hono.js';
import type { AuthenticatedClient } from '../types/client.js';
import type { IClientStorage } from '../storage/interfaces/index.js';
import { OAuthError } from '../errors/oauth-error.js';
import {
  CLIENT_AUTH_BASIC,
  CLIENT_AUTH_POST,
  CLIENT_AUTH_NONE,
  CONTENT_TYPE_FORM,
  HEADER_AUTHORIZATION,
} from '../config/constants.js';

export interface ClientAuthenticatorOptions {
  clientStorage: IClientStorage;
  allowPublicClients?: boolean; // Allow clients with auth_method='none'
}

/**
 * Extract client credentials from Basic auth header
 */
function extractBasicAuth(authHeader: string): { clientId: string; clientSecret: string } | null {
  if (!authHeader.startsWith('Basic ')) {
    return null;
  }

  const decoded = Buffer.from(authHeader.slice(6), 'base64').toString('utf-8');
  const colonIndex = decoded.indexOf(':');
  if (colonIndex === -1) {
    return null;
  }

  try {
    return {
      clientId: decodeURIComponent(decoded.slice(0, colonIndex)),
      clientSecret: decodeURIComponent(decoded.slice(colonIndex + 1)),
    };
  } catch {
    return null;
  }
}

/**
 * Extract client credentials from POST body
 */
async function extractPostAuth(c: Context): Promise<{ clientId: string; clientSecret?: string } | null> {
  const contentType = c.req.header('content-type');
  if (!contentType?.includes(CONTENT_TYPE_FORM)) {
    return null;
  }

  const body = await c.req.parseBody();
  const clientId = body['client_id'];
  if (typeof clientId !== 'string') {
    return null;
  }

  const clientSecret = body['client_secret'];
  return typeof clientSecret === 'string' ? { clientId, clientSecret } : { clientId };
}

/**
 * Middleware to authenticate OAuth clients
 *
 * Supports:
 * - client_secret_basic: HTTP Basic authentication
 * - client_secret_post: Credentials in POST body
 * - none: Public clients (no authentication)
 *
 * Sets `client` in context variables on success
 */
export function clientAuthenticator(options: ClientAuthenticatorOptions): MiddlewareHandler<{
  Variables: OidcVariables;
}> {
  const { clientStorage, allowPublicClients = true } = options;

  return async (c, next) => {
    const authHeader = c.req.header(HEADER_AUTHORIZATION);
    let client: OidcClient | null = null;
    let authMethod: ClientAuthMethod | null = null;

    // Try Basic authentication first
    const basicCreds = authHeader ? extractBasicAuth(authHeader) : null;
    if (basicCreds) {
      client = await clientStorage.findByClientId(basicCreds.clientId);

      if (!client) {
        throw OAuthError.invalidClient('Unknown client');
      }

      if (client.authMethod !== CLIENT_AUTH_BASIC) {
        throw OAuthError.invalidClient('Client is not configured for Basic authentication');
      }

      if (!(await clientStorage.verifyCredentials(client.clientId, basicCreds.clientSecret))) {
        throw OAuthError.invalidClient('Invalid client credentials');
      }

      authMethod = CLIENT_AUTH_BASIC;
    }

    // Try POST body authentication if Basic didn't work
    if (!client) {
      const postCreds = await extractPostAuth(c);

      if (postCreds) {
        client = await clientStorage.findByClientId(postCreds.clientId);

        if (!client) {
          throw OAuthError.invalidClient('Unknown client');
        }

        if (postCreds.clientSecret !== undefined) {
          if (client.authMethod !== CLIENT_AUTH_POST) {
            throw OAuthError.invalidClient('Client is not configured for POST authentication');
          }

          if (!(await clientStorage.verifyCredentials(client.clientId, postCreds.clientSecret))) {
            throw OAuthError.invalidClient('Invalid client credentials');
          }

          authMethod = CLIENT_AUTH_POST;
        } else if (client.authMethod === CLIENT_AUTH_NONE) {
          if (!allowPublicClients) {
            throw OAuthError.invalidClient('Public clients are not allowed');
          }
          authMethod = CLIENT_AUTH_NONE;
        } else {
          // Client ID provided but no credentials
          throw OAuthError.invalidClient('Client credentials required');
        }
      }
    }

    if (!client || !authMethod) {
      throw OAuthError.invalidClient('Client authentication required');
    }

    const authenticatedClient: AuthenticatedClient = { client, authMethod };
    c.set('client', authenticatedClient);

    await next();
  };
}
