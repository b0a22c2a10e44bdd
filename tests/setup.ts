import { vi, beforeEach } from 'vitest';
import { resetDatabase } from './utils/test-db';
import { MemoryCacheStore } from './utils/memory-cache';
import { cacheStore } from '../src/utils/cache';

vi.mock('pg', async () => (await import('./utils/memory-db')).createPgAdapter());

vi.mock('../src/utils/cache', async () => {
  const { MemoryCacheStore: Store } = await import('./utils/memory-cache');
  const store = new Store();
  return { cacheStore: store, redisCacheStore: store };
});

beforeEach(async () => {
  await resetDatabase();
  if (cacheStore instanceof MemoryCacheStore) {
    cacheStore.clear();
  }
});
