// src/services/cache.ts — bounded TTL response cache keyed by (user, normalized query)
import { createHash } from 'crypto';
import type { CacheStats } from '@/types/core';
import { CacheError } from '@/utils/errors';
import { logger } from './logger';

export interface CacheEntry<T> {
  key: string;
  payload: T;
  createdAt: number;
  ttlSeconds: number;
  accessCount: number;
}

export interface RequestCacheOptions {
  maxSize?: number;
  now?: () => number;
}

export function normalizeQuery(text: string): string {
  return text.trim().toLowerCase().replace(/\s+/g, ' ');
}

/** Stable fingerprint; the same user and query (modulo case and spacing) map to the same key. */
export function makeCacheKey(userId: string, text: string): string {
  const digest = createHash('sha256').update(`${userId}\u0000${normalizeQuery(text)}`).digest('hex');
  return `response:${digest}`;
}

export class RequestCache<T> {
  private readonly entries = new Map<string, CacheEntry<T>>();
  private hits = 0;
  private misses = 0;
  private readonly maxSize: number;
  private readonly now: () => number;

  constructor(options: RequestCacheOptions = {}) {
    this.maxSize = options.maxSize ?? 500;
    this.now = options.now ?? Date.now;
  }

  get(key: string): T | null {
    const entry = this.entries.get(key);
    if (!entry) {
      this.misses++;
      return null;
    }
    if (!this.isFresh(entry)) {
      this.entries.delete(key);
      this.misses++;
      return null;
    }
    entry.accessCount++;
    this.hits++;
    return entry.payload;
  }

  set(key: string, payload: T, ttlSeconds = 3600): void {
    if (!Number.isFinite(ttlSeconds) || ttlSeconds <= 0) {
      throw new CacheError(`Invalid TTL for ${key}: ${ttlSeconds}`);
    }
    const existing = this.entries.get(key);
    if (!existing && this.entries.size >= this.maxSize) {
      this.evictLeastUsed();
    }
    this.entries.set(key, {
      key,
      payload,
      createdAt: this.now(),
      ttlSeconds,
      accessCount: existing?.accessCount ?? 1,
    });
  }

  has(key: string): boolean {
    const entry = this.entries.get(key);
    return entry !== undefined && this.isFresh(entry);
  }

  get size(): number {
    return this.entries.size;
  }

  stats(): CacheStats {
    const total = this.hits + this.misses;
    return {
      hitRate: total > 0 ? Math.round((this.hits / total) * 10000) / 10000 : 0,
      totalEntries: this.entries.size,
      totalRequests: total,
      hits: this.hits,
      misses: this.misses,
    };
  }

  /** Drop every stale entry; returns how many were removed. */
  purgeExpired(): number {
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (!this.isFresh(entry)) {
        this.entries.delete(key);
        removed++;
      }
    }
    if (removed > 0) logger.debug('cache:purged', { removed, remaining: this.entries.size });
    return removed;
  }

  clear(): void {
    this.entries.clear();
  }

  private isFresh(entry: CacheEntry<T>): boolean {
    return this.now() - entry.createdAt < entry.ttlSeconds * 1000;
  }

  // Lowest access count goes first; ties fall to the oldest entry.
  private evictLeastUsed(): void {
    let victim: CacheEntry<T> | undefined;
    for (const entry of this.entries.values()) {
      if (
        !victim ||
        entry.accessCount < victim.accessCount ||
        (entry.accessCount === victim.accessCount && entry.createdAt < victim.createdAt)
      ) {
        victim = entry;
      }
    }
    if (victim) {
      this.entries.delete(victim.key);
      logger.debug('cache:evicted', { key: victim.key, accessCount: victim.accessCount });
    }
  }
}
