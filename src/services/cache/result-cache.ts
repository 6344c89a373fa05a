import { systemClock, type Clock } from '../../utils/clock.js';
import type { CardIdentity } from '../appraisal/types.js';

interface CacheEntry<T> {
  value: T;
  createdAt: number;
  expiresAt: number;
}

/**
 * TTL cache. Expired entries are dropped when read, and swept from the
 * whole map at most once per TTL period on write.
 */
export class ResultCache<T> {
  private cache: Map<string, CacheEntry<T>> = new Map();
  private readonly ttlMs: number;
  private lastSweepAt: number;

  constructor(
    ttlSeconds: number = 300,
    private readonly clock: Clock = systemClock,
  ) {
    this.ttlMs = ttlSeconds * 1000;
    this.lastSweepAt = clock.now();
  }

  get(key: string): T | null {
    const entry = this.cache.get(key);

    if (!entry) return null;

    if (this.clock.now() >= entry.expiresAt) {
      this.cache.delete(key);
      return null;
    }

    return entry.value;
  }

  set(key: string, value: T): void {
    const now = this.clock.now();
    if (now - this.lastSweepAt >= this.ttlMs) {
      this.sweep(now);
    }
    this.cache.set(key, {
      value,
      createdAt: now,
      expiresAt: now + this.ttlMs,
    });
  }

  /** Stored entries, including expired ones not yet swept. */
  size(): number {
    return this.cache.size;
  }

  private sweep(now: number): void {
    this.lastSweepAt = now;
    for (const [key, entry] of this.cache.entries()) {
      if (now >= entry.expiresAt) {
        this.cache.delete(key);
      }
    }
  }
}

/**
 * Composite key over every identity field. Variant order does not matter.
 */
export function buildCacheKey(identity: CardIdentity): string {
  return JSON.stringify([
    identity.name,
    identity.englishName ?? null,
    identity.setName ?? null,
    identity.cardNumber ?? null,
    identity.rarity ?? null,
    [...identity.variants].sort(),
  ]);
}
