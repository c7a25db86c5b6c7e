import type { Context } from 'hono';
import type { AuthenticatedClient } from './client.js';
import type { Grant } from '../session/grant.js';
import type { SessionToken } from '../session/token.js';

/**
 * Access token presented as a bearer credential, resolved to its grant
 */
export interface BearerToken {
  sessionId: string;
  clientId: string;
  grant: Grant;
  token: SessionToken;
}

/**
 * Hono context variables set by the provider's middleware
 */
export interface OidcVariables {
  client?: AuthenticatedClient;
  bearer?: BearerToken;
}

export type OidcContext = Context<{ Variables: OidcVariables }>;
