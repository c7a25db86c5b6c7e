import type { OidcClient, CreateClientInput } from '@opcore/shared';
import type { IClientStorage } from '../interfaces/client-storage.js';
import {
  generateRandomBase64Url,
  generateClientSecret,
  hashClientSecret,
  verifyClientSecret,
} from '../../crypto/index.js';

/**
 * In-memory client registry implementation
 */
export class MemoryClientStorage implements IClientStorage {
  private clients = new Map<string, OidcClient>();

  async create(input: CreateClientInput): Promise<{ client: OidcClient; clientSecret?: string }> {
    const { clientId: requestedId, clientSecret: requestedSecret, ...metadata } = input;
    const clientId = requestedId ?? generateRandomBase64Url(16);
    const now = new Date();

    if (this.clients.has(clientId)) {
      throw new Error(`Client already registered: ${clientId}`);
    }

    let clientSecretHash: string | undefined;
    let clientSecret: string | undefined;

    // Generate secret for confidential clients
    if (input.clientType === 'confidential') {
      clientSecret = requestedSecret ?? generateClientSecret();
      clientSecretHash = await hashClientSecret(clientSecret);
    }

    const client: OidcClient = {
      ...metadata,
      clientId,
      clientSecretHash,
      createdAt: now,
      updatedAt: now,
    };

    this.clients.set(clientId, client);

    return { client, clientSecret };
  }

  async findByClientId(clientId: string): Promise<OidcClient | null> {
    return this.clients.get(clientId) ?? null;
  }

  async list(): Promise<OidcClient[]> {
    return Array.from(this.clients.values());
  }

  async verifyCredentials(clientId: string, clientSecret: string): Promise<OidcClient | null> {
    const client = await this.findByClientId(clientId);
    if (!client) return null;

    if (!client.clientSecretHash) {
      // Public client - no secret to verify
      return null;
    }

    const isValid = await verifyClientSecret(clientSecret, client.clientSecretHash);
    return isValid ? client : null;
  }
}
