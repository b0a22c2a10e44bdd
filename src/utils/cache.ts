import { redisClient } from '../connections/redis';

/**
 * Key-value store holding short-lived JSON state (signup sessions, wizard drafts).
 * Values come back as `unknown`; callers validate them before use.
 */
export interface CacheStore {
  get(key: string): Promise<unknown>;
  set(key: string, value: unknown, ttlSeconds: number): Promise<void>;
  delete(key: string): Promise<void>;
}

export const redisCacheStore: CacheStore = {
  async get(key) {
    const raw = await redisClient.get(key);
    return raw === null ? null : JSON.parse(raw);
  },

  async set(key, value, ttlSeconds) {
    await redisClient.set(key, JSON.stringify(value), { EX: ttlSeconds });
  },

  async delete(key) {
    await redisClient.del(key);
  },
};

export const cacheStore: CacheStore = redisCacheStore;
