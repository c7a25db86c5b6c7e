import type { OidcClient } from '@opcore/shared';

export function testClient(overrides: Partial<OidcClient> = {}): OidcClient {
  return {
    clientId: 'rp',
    clientType: 'confidential',
    authMethod: 'client_secret_basic',
    name: 'Relying Party',
    redirectUris: ['https://rp.example.com/cb'],
    allowedGrants: ['authorization_code'],
    createdAt: new Date(0),
    updatedAt: new Date(0),
    ...overrides,
  };
}
