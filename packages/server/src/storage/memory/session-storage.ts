import type { SessionRecord } from '../../session/types.js';
import type { ISessionStorage } from '../interfaces/session-storage.js';

/**
 * In-memory session storage implementation.
 * Records are cloned on the way in and out so callers never share state
 * with the store, matching what a serializing backend does.
 */
export class MemorySessionStorage implements ISessionStorage {
  private records = new Map<string, SessionRecord>();

  async get(key: string): Promise<SessionRecord | null> {
    const record = this.records.get(key);
    return record ? structuredClone(record) : null;
  }

  async set(key: string, record: SessionRecord): Promise<void> {
    this.records.set(key, structuredClone(record));
  }

  async delete(key: string): Promise<void> {
    this.records.delete(key);
  }

  /**
   * Number of stored records (for testing)
   */
  get size(): number {
    return this.records.size;
  }
}
