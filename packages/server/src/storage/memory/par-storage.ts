import type { Clock } from '../../session/clock.js';
import { systemClock } from '../../session/clock.js';
import type { IParStorage } from '../interfaces/par-storage.js';

interface StoredRequest {
  params: Record<string, string>;
  expiresAt: number;
}

/**
 * In-memory pushed authorization request storage
 */
export class MemoryParStorage implements IParStorage {
  private requests = new Map<string, StoredRequest>();

  constructor(private readonly clock: Clock = systemClock) {}

  async put(requestUri: string, params: Record<string, string>, ttlSeconds: number): Promise<void> {
    this.requests.set(requestUri, { params: { ...params }, expiresAt: this.clock.now() + ttlSeconds });
  }

  async take(requestUri: string): Promise<Record<string, string> | null> {
    const stored = this.requests.get(requestUri);
    if (!stored) {
      return null;
    }

    this.requests.delete(requestUri);

    if (this.clock.now() >= stored.expiresAt) {
      return null;
    }

    return stored.params;
  }
}
