export * from './session-storage.js';
export * from './par-storage.js';
export * from './client-storage.js';
export * from './user-storage.js';

import type { ISessionStorage } from './session-storage.js';
import type { IParStorage } from './par-storage.js';
import type { IClientStorage } from './client-storage.js';
import type { IUserStorage } from './user-storage.js';

/**
 * Complete storage interface for the provider
 */
export interface IStorage {
  sessions: ISessionStorage;
  pushedRequests: IParStorage;
  clients: IClientStorage;
  users: IUserStorage;
}
