import type Redis from 'ioredis';
import { log } from './logger';
import { counter } from './metrics';
import { systemClock, type Clock } from './time';

export type CacheEntry<V> = {
  value: V;
  storedAt: number;
  ttlSec: number;
};

type RawEntry = { value: unknown; storedAt: number; ttlSec: number };

const cacheLog = log.child({ module: 'infra.cache' });

function isRawEntry(input: unknown): input is RawEntry {
  if (typeof input !== 'object' || input === null) return false;
  return 'value' in input && 'storedAt' in input && 'ttlSec' in input
    && typeof input.storedAt === 'number' && typeof input.ttlSec === 'number';
}

/**
 * Read-through TTL cache keyed by string. Entries live in redis when a client
 * is supplied, otherwise (or after the first redis failure) in process memory.
 * Expiry is checked on read: an entry whose age reached its ttl reads as absent
 * and is deleted at that point.
 */
export class PersistedCache {
  private readonly memory = new Map<string, string>();
  private fallbackEnabled = false;

  constructor(
    private readonly redis: Redis | null,
    private readonly namespace = 'engine-cache',
    private readonly clock: Clock = systemClock,
  ) {}

  async get<V>(key: string, guard: (value: unknown) => value is V): Promise<V | null> {
    const entry = await this.getEntry(key);
    if (!entry) return null;
    if (!guard(entry.value)) {
      cacheLog.warn({ key }, 'cache-entry-shape-mismatch');
      await this.delete(key);
      return null;
    }
    return entry.value;
  }

  async getEntry(key: string): Promise<CacheEntry<unknown> | null> {
    const raw = await this.read(key);
    if (raw === null) return null;
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      cacheLog.warn({ key, err: err instanceof Error ? err.message : String(err) }, 'cache-entry-corrupt');
      await this.delete(key);
      return null;
    }
    if (!isRawEntry(parsed)) {
      await this.delete(key);
      return null;
    }
    if (this.clock() - parsed.storedAt >= parsed.ttlSec * 1000) {
      await this.delete(key);
      return null;
    }
    return parsed;
  }

  async set<V>(key: string, value: V, ttlSec: number): Promise<void> {
    const entry: CacheEntry<V> = { value, storedAt: this.clock(), ttlSec };
    const payload = JSON.stringify(entry);
    if (this.fallbackEnabled || !this.redis) {
      this.memory.set(this.key(key), payload);
      return;
    }
    try {
      // Redis-side expiry is only garbage collection; freshness is decided on read.
      await this.redis.set(this.key(key), payload, 'EX', Math.max(1, Math.ceil(ttlSec)) + 60);
    } catch (err) {
      this.enableFallback(err);
      this.memory.set(this.key(key), payload);
    }
  }

  async delete(key: string): Promise<void> {
    this.memory.delete(this.key(key));
    if (this.fallbackEnabled || !this.redis) return;
    try {
      await this.redis.del(this.key(key));
    } catch (err) {
      this.enableFallback(err);
    }
  }

  size(): number {
    return this.memory.size;
  }

  private async read(key: string): Promise<string | null> {
    if (this.fallbackEnabled || !this.redis) {
      return this.memory.get(this.key(key)) ?? null;
    }
    try {
      return await this.redis.get(this.key(key));
    } catch (err) {
      this.enableFallback(err);
      return this.memory.get(this.key(key)) ?? null;
    }
  }

  private key(key: string): string {
    return `${this.namespace}:${key}`;
  }

  private enableFallback(err: unknown): void {
    counter.cacheFallback.inc();
    if (this.fallbackEnabled) return;
    this.fallbackEnabled = true;
    cacheLog.warn({ err: err instanceof Error ? err.message : String(err) }, 'cache-fallback-enabled');
  }
}
