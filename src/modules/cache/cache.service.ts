import crypto from 'node:crypto';
import type { Redis as RedisClient } from 'ioredis';
import type { ZodType } from 'zod';
import { CACHE_ENABLED, CACHE_NAMESPACE_VERSION } from '../../config/cache.js';

function sha1(s: string): string {
  return crypto.createHash('sha1').update(s).digest('hex');
}

export type CacheSetOptions = { ttlSeconds: number; tags?: string[] };

export type CacheServiceOptions = { enabled?: boolean; namespace?: string };

export class CacheService {
  private readonly redis: RedisClient | null;
  private readonly enabled: boolean;
  private readonly ns: string;

  constructor(redis: RedisClient | null, opts?: CacheServiceOptions) {
    this.redis = redis;
    this.enabled = redis !== null && (opts?.enabled ?? CACHE_ENABLED);
    this.ns = opts?.namespace ?? CACHE_NAMESPACE_VERSION;
  }

  isEnabled(): boolean { return this.enabled; }

  buildKey(prefix: string, parts: unknown): string {
    const json = JSON.stringify(parts ?? {});
    return `${this.ns}:${prefix}:${sha1(json)}`;
  }

  // Entries that no longer match the schema count as misses
  async getJSON<T>(key: string, schema: ZodType<T>): Promise<T | null> {
    if (!this.enabled || !this.redis) return null;
    const raw = await this.redis.get(key);
    if (!raw) return null;
    const parsed = schema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : null;
  }

  async setJSON(key: string, data: unknown, opts: CacheSetOptions): Promise<void> {
    if (!this.enabled || !this.redis) return;
    const payload = JSON.stringify(data);
    if (opts.ttlSeconds > 0) await this.redis.set(key, payload, 'EX', opts.ttlSeconds);
    else await this.redis.set(key, payload);
    // Tag indexing
    const tags = Array.isArray(opts.tags) ? opts.tags.filter(Boolean) : [];
    for (const t of tags) {
      const setKey = `${this.ns}:index:${t}`;
      await this.redis.sadd(setKey, key);
      // Index outlives its entries so invalidation still finds them
      if (opts.ttlSeconds > 0) await this.redis.expire(setKey, Math.max(opts.ttlSeconds, 600));
    }
  }

  // Generation counters: a key built with the current generation can no longer
  // be read once the generation is bumped, even if it is written afterwards.
  async getGeneration(name: string): Promise<number> {
    if (!this.enabled || !this.redis) return 0;
    const raw = await this.redis.get(`${this.ns}:gen:${name}`);
    const generation = Number(raw ?? 0);
    return Number.isFinite(generation) ? generation : 0;
  }

  async bumpGeneration(name: string): Promise<number> {
    if (!this.enabled || !this.redis) return 0;
    return this.redis.incr(`${this.ns}:gen:${name}`);
  }

  async invalidateByTags(tags: string[]): Promise<number> {
    if (!this.enabled || !this.redis || !tags.length) return 0;
    let deleted = 0;
    for (const t of tags) {
      const setKey = `${this.ns}:index:${t}`;
      const members = await this.redis.smembers(setKey);
      if (members.length) deleted += await this.redis.del(...members);
      await this.redis.del(setKey);
    }
    return deleted;
  }
}

// Helpers to normalize parts for keys
export function roundGeo(v: number, digits = 5): number {
  const m = Math.pow(10, digits);
  return Math.round(v * m) / m;
}
