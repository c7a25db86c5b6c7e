export * from './session-storage.js';
export * from './par-storage.js';
export * from './client-storage.js';
export * from './user-storage.js';

import type { IStorage } from '../interfaces/index.js';
import type { Clock } from '../../session/clock.js';
import { MemorySessionStorage } from './session-storage.js';
import { MemoryParStorage } from './par-storage.js';
import { MemoryClientStorage } from './client-storage.js';
import { MemoryUserStorage } from './user-storage.js';

export interface MemoryStorage extends IStorage {
  sessions: MemorySessionStorage;
  clients: MemoryClientStorage;
  users: MemoryUserStorage;
}

/**
 * Create a complete in-memory storage instance
 * Useful for development and testing
 */
export function createMemoryStorage(options: { clock?: Clock } = {}): MemoryStorage {
  return {
    sessions: new MemorySessionStorage(),
    pushedRequests: new MemoryParStorage(options.clock),
    clients: new MemoryClientStorage(),
    users: new MemoryUserStorage(),
  };
}
