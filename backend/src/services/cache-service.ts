/**
 * services/cache-service.ts — Unified caching layer
 *
 * Redis-backed when ENABLE_REDIS_CACHE=true, in-memory Map fallback otherwise.
 * Provides: get/set/invalidatePattern with TTL support.
 *
 * Key naming convention:
 *   views:v{tableVersion}:{hash}   — computed dashboard views
 *   locations:v{tableVersion}      — location hierarchy
 *
 * Keys carry the table version, so a newly published table never hits an
 * entry computed from the previous one.
 */
import { createHash } from 'crypto';
import type Redis from 'ioredis';
import { childLogger } from '../shared/logger.ts';
import { cacheOperations } from '../shared/metrics.ts';

const log = childLogger({ module: 'cache' });

const MEM_CACHE_MAX = 200;

export interface CacheOptions {
  /** Redis client; null keeps everything in process memory */
  redis?: Redis | null;
  keyPrefix?: string;
}

export class CacheService {
  private readonly redis: Redis | null;
  private readonly keyPrefix: string;
  private readonly mem = new Map<string, { data: string; expiresAt: number }>();

  constructor(options: CacheOptions = {}) {
    this.redis = options.redis ?? null;
    this.keyPrefix = options.keyPrefix ?? '';
  }

  get backend(): 'redis' | 'memory' {
    return this.redis ? 'redis' : 'memory';
  }

  // ── In-memory fallback ──

  private memGet(key: string): string | null {
    const entry = this.mem.get(key);
    if (!entry) return null;
    if (Date.now() > entry.expiresAt) {
      this.mem.delete(key);
      return null;
    }
    return entry.data;
  }

  private memSet(key: string, data: string, ttlSec: number): void {
    // Evict oldest insertion on overflow
    if (this.mem.size >= MEM_CACHE_MAX) {
      const first = this.mem.keys().next();
      if (!first.done) this.mem.delete(first.value);
    }
    this.mem.set(key, { data, expiresAt: Date.now() + ttlSec * 1000 });
  }

  private memInvalidatePattern(pattern: string): number {
    const escaped = pattern.replace(/[.+?^${}()|[\]\\]/g, '\\$&');
    const regex = new RegExp('^' + escaped.replace(/\*/g, '.*') + '$');
    let count = 0;
    for (const key of [...this.mem.keys()]) {
      if (regex.test(key)) {
        this.mem.delete(key);
        count++;
      }
    }
    return count;
  }

  // ── Public API ──

  /**
   * Get cached value by key, checked by `parse` (e.g. a zod schema's parse).
   * Returns null on miss, on failure, or when the stored value no longer parses.
   */
  async get<T>(key: string, parse: (value: unknown) => T): Promise<T | null> {
    try {
      const raw = this.redis ? await this.redis.get(key) : this.memGet(key);
      cacheOperations.inc({ operation: raw === null ? 'miss' : 'hit' });
      if (raw === null) return null;
      return parse(JSON.parse(raw));
    } catch (err) {
      log.warn({ err, key }, 'Cache GET failed');
      return null;
    }
  }

  /**
   * Set value with TTL (in seconds).
   */
  async set(key: string, data: unknown, ttlSec: number): Promise<void> {
    try {
      const json = JSON.stringify(data);
      if (this.redis) await this.redis.setex(key, ttlSec, json);
      else this.memSet(key, json, ttlSec);
      cacheOperations.inc({ operation: 'set' });
    } catch (err) {
      log.warn({ err, key }, 'Cache SET failed');
    }
  }

  /**
   * Invalidate all keys matching a glob pattern (e.g. "views:*").
   * Redis: uses SCAN to avoid blocking. In-memory: regex match.
   */
  async invalidatePattern(pattern: string): Promise<number> {
    try {
      let count = 0;
      if (this.redis) {
        let cursor = '0';
        const fullPattern = this.keyPrefix + pattern;
        do {
          const [nextCursor, keys] = await this.redis.scan(cursor, 'MATCH', fullPattern, 'COUNT', 100);
          cursor = nextCursor;
          if (keys.length > 0) {
            // SCAN returns prefixed keys; ioredis adds the prefix again on DEL
            await this.redis.del(...keys.map(k => k.slice(this.keyPrefix.length)));
            count += keys.length;
          }
        } while (cursor !== '0');
      } else {
        count = this.memInvalidatePattern(pattern);
      }
      cacheOperations.inc({ operation: 'invalidate' }, count);
      return count;
    } catch (err) {
      log.warn({ err, pattern }, 'Cache INVALIDATE failed');
      return 0;
    }
  }

  /**
   * Drop every computed view and location tree (after a data refresh).
   */
  async invalidateViews(): Promise<number> {
    const views = await this.invalidatePattern('views:*');
    const locations = await this.invalidatePattern('locations:*');
    return views + locations;
  }

  /**
   * Get cache stats (for health endpoint).
   */
  async getStats(): Promise<{ type: 'redis' | 'memory'; keys: number; memoryUsed?: string }> {
    if (this.redis) {
      try {
        const info = await this.redis.info('keyspace');
        const dbLine = /db0:keys=(\d+)/.exec(info);
        const memInfo = await this.redis.info('memory');
        const memLine = /used_memory_human:(.+)/.exec(memInfo);
        return {
          type: 'redis',
          keys: dbLine?.[1] ? parseInt(dbLine[1], 10) : 0,
          memoryUsed: memLine?.[1] ? memLine[1].trim() : 'unknown',
        };
      } catch (err) {
        log.warn({ err }, 'Redis INFO failed');
        return { type: 'redis', keys: 0, memoryUsed: 'unavailable' };
      }
    }
    return { type: 'memory', keys: this.mem.size };
  }
}

// ── Helpers ──

/**
 * Stable hash of a parameter object (key order independent).
 */
export function hashFilters(filters: Record<string, unknown>): string {
  const sorted = JSON.stringify(filters, Object.keys(filters).sort());
  return createHash('md5').update(sorted).digest('hex').slice(0, 12);
}

export const viewsKey = (version: number, params: Record<string, unknown>): string =>
  `views:v${version}:${hashFilters(params)}`;

export const locationsKey = (version: number): string => `locations:v${version}`;
