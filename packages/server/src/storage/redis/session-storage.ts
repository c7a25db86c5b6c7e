import type { SessionRecord } from '../../session/types.js';
import type { ISessionStorage } from '../interfaces/session-storage.js';
import type { RedisCommands } from './client.js';
import { sessionRecordSchema } from '../../types/schemas.js';

/**
 * Redis backed session storage. Records are JSON strings under
 * `<prefix><session key>` and are validated when read back.
 */
export class RedisSessionStorage implements ISessionStorage {
  constructor(
    private readonly redis: RedisCommands,
    private readonly prefix: string = 'session:'
  ) {}

  async get(key: string): Promise<SessionRecord | null> {
    const raw = await this.redis.get(this.prefix + key);
    if (raw === null) {
      return null;
    }
    return sessionRecordSchema.parse(JSON.parse(raw));
  }

  async set(key: string, record: SessionRecord): Promise<void> {
    await this.redis.set(this.prefix + key, JSON.stringify(record));
  }

  async delete(key: string): Promise<void> {
    await this.redis.del(this.prefix + key);
  }
}
