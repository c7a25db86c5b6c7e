import { Redis } from 'ioredis';

/**
 * The Redis commands the provider stores sessions and pushed requests with
 */
export interface RedisCommands {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds?: number): Promise<void>;
  getdel(key: string): Promise<string | null>;
  del(key: string): Promise<void>;
  quit(): Promise<void>;
}

export interface RedisConfig {
  url: string;
  connectTimeoutMs?: number;
  commandTimeoutMs?: number;
}

/**
 * Create an ioredis client for the session store
 */
export function createRedisClient(config: RedisConfig): Redis {
  return new Redis(config.url, {
    lazyConnect: true,
    maxRetriesPerRequest: 1,
    connectTimeout: config.connectTimeoutMs ?? 5000,
    commandTimeout: config.commandTimeoutMs ?? 2000,
    retryStrategy: (times) => {
      if (times > 3) return null; // stop retrying
      return Math.min(times * 200, 1000);
    },
  });
}

/**
 * Adapt an ioredis client to `RedisCommands`
 */
export function ioredisCommands(redis: Redis): RedisCommands {
  return {
    get: (key) => redis.get(key),
    set: async (key, value, ttlSeconds) => {
      if (ttlSeconds !== undefined) {
        await redis.set(key, value, 'EX', ttlSeconds);
      } else {
        await redis.set(key, value);
      }
    },
    getdel: (key) => redis.getdel(key),
    del: async (key) => {
      await redis.del(key);
    },
    quit: async () => {
      await redis.quit();
    },
  };
}
