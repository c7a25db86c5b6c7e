export * from './client.js';
export * from './session-storage.js';
export * from './par-storage.js';

import type { IClientStorage, IStorage, IUserStorage } from '../interfaces/index.js';
import type { RedisCommands } from './client.js';
import { RedisSessionStorage } from './session-storage.js';
import { RedisParStorage } from './par-storage.js';

/**
 * Storage with sessions and pushed requests in Redis. Clients and
 * users come from the given registries.
 */
export function createRedisStorage(
  redis: RedisCommands,
  registries: { clients: IClientStorage; users: IUserStorage }
): IStorage {
  return {
    sessions: new RedisSessionStorage(redis),
    pushedRequests: new RedisParStorage(redis),
    clients: registries.clients,
    users: registries.users,
  };
}
