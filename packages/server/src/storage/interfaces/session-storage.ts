import type { SessionRecord } from '../../session/types.js';

/**
 * Storage for user sessions, client sessions and grants, addressed by
 * serialized session keys
 */
export interface ISessionStorage {
  get(key: string): Promise<SessionRecord | null>;

  set(key: string, record: SessionRecord): Promise<void>;

  delete(key: string): Promise<void>;
}
