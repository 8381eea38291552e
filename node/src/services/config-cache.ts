// node/src/services/config-cache.ts: read-mostly, time-boxed cache of the active agent configuration
// and of stored prompts
//
// One instance per kind per process, created at start-up and handed to the pipeline deps.
// Entries expire after ttlSeconds; invalidate() drops them immediately (e.g. after an admin edit).
import { LRUCache } from 'lru-cache';
import { logger } from './logger';

const CONFIG_CACHE_MAX = 16;

export class ConfigCache<T extends {}> {
  private readonly entries: LRUCache<string, T> | null;

  constructor(ttlSeconds: number) {
    const ttl = Math.round(ttlSeconds * 1000);
    this.entries = ttl > 0 ? new LRUCache<string, T>({ max: CONFIG_CACHE_MAX, ttl }) : null;
  }

  get(key: string): T | null {
    return this.entries?.get(key) ?? null;
  }

  set(key: string, value: T): void {
    this.entries?.set(key, value);
  }

  /** Drops one key, or everything when no key is given. */
  invalidate(key?: string): void {
    if (key === undefined) {
      this.entries?.clear();
    } else {
      this.entries?.delete(key);
    }
    logger.info('config-cache:invalidated', { key: key ?? '*' });
  }
}
