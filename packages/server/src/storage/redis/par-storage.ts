import type { IParStorage } from '../interfaces/par-storage.js';
import type { RedisCommands } from './client.js';
import { parametersSchema } from '../../types/schemas.js';

/**
 * Redis backed pushed authorization request storage.
 * Expiry is left to Redis; GETDEL makes resolution one-time.
 */
export class RedisParStorage implements IParStorage {
  constructor(
    private readonly redis: RedisCommands,
    private readonly prefix: string = 'par:'
  ) {}

  async put(requestUri: string, params: Record<string, string>, ttlSeconds: number): Promise<void> {
    await this.redis.set(this.prefix + requestUri, JSON.stringify(params), ttlSeconds);
  }

  async take(requestUri: string): Promise<Record<string, string> | null> {
    const raw = await this.redis.getdel(this.prefix + requestUri);
    if (raw === null) {
      return null;
    }
    return parametersSchema.parse(JSON.parse(raw));
  }
}
