import type { CacheStore } from '../../src/utils/cache';

interface Entry {
  raw: string;
  expiresAt: number;
}

/**
 * Redis stand-in: values round-trip through JSON and expire after their TTL
 */
export class MemoryCacheStore implements CacheStore {
  private entries = new Map<string, Entry>();

  async get(key: string): Promise<unknown> {
    const entry = this.entries.get(key);
    if (!entry) return null;
    if (entry.expiresAt <= Date.now()) {
      this.entries.delete(key);
      return null;
    }
    return JSON.parse(entry.raw);
  }

  async set(key: string, value: unknown, ttlSeconds: number): Promise<void> {
    this.entries.set(key, { raw: JSON.stringify(value), expiresAt: Date.now() + ttlSeconds * 1000 });
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key);
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  keys(): string[] {
    return [...this.entries.keys()];
  }

  clear(): void {
    this.entries.clear();
  }
}
