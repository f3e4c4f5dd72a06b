/**
 * Response cache for accepted acquisitions
 *
 * Two tiers: an optional Redis backend and an in-process map. Reads try Redis
 * first, writes go to both. Any backend error degrades to a miss or a no-op;
 * the cache never fails an acquisition.
 */

import { createHash } from 'crypto';
import Redis from 'ioredis';
import { z } from 'zod';
import { isStrategyId, type StrategyId } from '@cloakscope/shared';
import { normalizeUrl } from '../acquisition/url';
import { cacheLogger } from '../utils/logger';

export interface CacheEntry {
  html: string;
  strategy: StrategyId;
  cloakedProvenance: boolean;
  finalUrl: string;
  /** Epoch ms */
  storedAt: number;
}

export type CacheBackend = 'redis' | 'memory';

export interface ResponseCacheOptions {
  /** Redis connection URL; the cache runs in memory only when omitted */
  redisUrl?: string;
  ttlSeconds?: number;
  keyPrefix?: string;
  /** Clock for local expiry */
  now?: () => number;
}

const DEFAULT_TTL_SECONDS = 3600;
const DEFAULT_KEY_PREFIX = 'seo:html:';

const cacheEntrySchema = z.object({
  html: z.string().min(1),
  strategy: z.custom<StrategyId>(value => typeof value === 'string' && isStrategyId(value)),
  cloakedProvenance: z.boolean(),
  finalUrl: z.string(),
  storedAt: z.number(),
});

interface LocalSlot {
  entry: CacheEntry;
  expiresAt: number;
}

/**
 * First 32 hex characters of sha256 over the normalized URL
 */
export function hashUrl(url: string): string {
  let normalized: string;
  try {
    normalized = normalizeUrl(url);
  } catch {
    normalized = url;
  }
  return createHash('sha256').update(normalized).digest('hex').substring(0, 32);
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class ResponseCache {
  private readonly ttlSeconds: number;
  private readonly keyPrefix: string;
  private readonly now: () => number;
  private readonly local = new Map<string, LocalSlot>();
  private redis: Redis | null = null;

  constructor(options: ResponseCacheOptions = {}) {
    this.ttlSeconds = options.ttlSeconds ?? DEFAULT_TTL_SECONDS;
    this.keyPrefix = options.keyPrefix ?? DEFAULT_KEY_PREFIX;
    this.now = options.now ?? Date.now;

    if (options.redisUrl) {
      this.redis = new Redis(options.redisUrl, {
        lazyConnect: true,
        maxRetriesPerRequest: 1,
        enableOfflineQueue: false,
      });
      this.redis.on('error', (error: Error) => {
        cacheLogger.warn(`Redis error: ${error.message}`);
      });
    }
  }

  get backend(): CacheBackend {
    return this.redis ? 'redis' : 'memory';
  }

  /**
   * Ping Redis. A failed ping disables Redis for the life of this cache.
   */
  async start(): Promise<void> {
    if (!this.redis) {
      cacheLogger.info('Using in-memory cache');
      return;
    }

    try {
      await this.redis.connect();
      await this.redis.ping();
      cacheLogger.info('Redis cache connected');
    } catch (error) {
      cacheLogger.warn(`Redis unavailable, falling back to memory: ${errorMessage(error)}`);
      this.redis.disconnect();
      this.redis = null;
    }
  }

  async stop(): Promise<void> {
    if (!this.redis) return;
    const redis = this.redis;
    this.redis = null;
    try {
      await redis.quit();
    } catch (error) {
      cacheLogger.warn(`Error closing Redis: ${errorMessage(error)}`);
    }
  }

  async get(url: string, scope: string): Promise<CacheEntry | null> {
    const key = this.buildKey(url, scope);

    if (this.redis) {
      try {
        const payload = await this.redis.get(key);
        if (payload !== null) {
          const entry = this.parse(payload, key);
          if (entry) {
            cacheLogger.debug(`Redis hit ${key}`);
            return entry;
          }
        }
      } catch (error) {
        cacheLogger.warn(`Redis get failed for ${key}: ${errorMessage(error)}`);
      }
    }

    const slot = this.local.get(key);
    if (!slot) return null;
    if (slot.expiresAt <= this.now()) {
      this.local.delete(key);
      return null;
    }
    cacheLogger.debug(`Local hit ${key}`);
    return slot.entry;
  }

  async set(url: string, entry: CacheEntry, scope: string): Promise<void> {
    const key = this.buildKey(url, scope);

    if (this.redis) {
      try {
        await this.redis.setex(key, this.ttlSeconds, JSON.stringify(entry));
      } catch (error) {
        cacheLogger.warn(`Redis set failed for ${key}: ${errorMessage(error)}`);
      }
    }

    const now = this.now();
    this.sweepLocal(now);
    this.local.set(key, { entry, expiresAt: now + this.ttlSeconds * 1000 });
  }

  clearLocal(): void {
    this.local.clear();
  }

  /** Entries held in process, expired ones included until the next write */
  get localSize(): number {
    return this.local.size;
  }

  private sweepLocal(now: number): void {
    for (const [key, slot] of this.local) {
      if (slot.expiresAt <= now) {
        this.local.delete(key);
      }
    }
  }

  private buildKey(url: string, scope: string): string {
    return `${this.keyPrefix}${scope}:${hashUrl(url)}`;
  }

  private parse(payload: string, key: string): CacheEntry | null {
    let data: unknown;
    try {
      data = JSON.parse(payload);
    } catch {
      cacheLogger.warn(`Corrupt cache payload at ${key}`);
      return null;
    }
    const parsed = cacheEntrySchema.safeParse(data);
    if (!parsed.success) {
      cacheLogger.warn(`Invalid cache entry at ${key}`);
      return null;
    }
    return parsed.data;
  }
}
