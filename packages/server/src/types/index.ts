export type { AuthenticatedClient } from './client.js';
export type { BearerToken, OidcContext, OidcVariables } from './hono.js';
export * from './schemas.js';
