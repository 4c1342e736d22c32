// src/cache/evaluationCache.ts
// In-process evaluation cache with TTL expiry and LRU eviction.
//
// Keys are `${prefix}:${criteriaId}:${snapshotHash}`, so identical input to
// the same criteria reuses the stored result until the TTL runs out or the
// criteria changes (forget).

import { config } from "../config";
import type { EvaluationResult } from "../engine";
import { createLogger } from "../observability";
import type { Snapshot } from "../snapshot";

const log = createLogger("cache/evaluation");

interface CacheEntry {
  value: EvaluationResult;
  expiresAt: number;
}

export interface EvaluationCacheOptions {
  enabled?: boolean;
  ttlSeconds?: number;
  prefix?: string;
  maxEntries?: number;
  /** Milliseconds since epoch; injectable for tests */
  clock?: () => number;
}

export interface CacheStats {
  enabled: boolean;
  hits: number;
  misses: number;
  evictions: number;
  size: number;
  hitRate: number;
}

export class EvaluationCache {
  // Map iteration order doubles as recency order: oldest first
  private entries: Map<string, CacheEntry> = new Map();
  private hits = 0;
  private misses = 0;
  private evictions = 0;

  private readonly enabled: boolean;
  private readonly ttlMs: number;
  private readonly prefix: string;
  private readonly maxEntries: number;
  private readonly clock: () => number;

  constructor(options: EvaluationCacheOptions = {}) {
    this.enabled = options.enabled ?? config.cache.enabled;
    this.ttlMs = (options.ttlSeconds ?? config.cache.ttlSeconds) * 1000;
    this.prefix = options.prefix ?? config.cache.prefix;
    this.maxEntries = Math.max(1, options.maxEntries ?? config.cache.maxEntries);
    this.clock = options.clock ?? Date.now;
  }

  key(criteriaId: string, snapshot: Snapshot): string {
    return `${this.prefix}:${criteriaId}:${snapshot.hash()}`;
  }

  get(criteriaId: string, snapshot: Snapshot): EvaluationResult | null {
    if (!this.enabled) return null;

    const key = this.key(criteriaId, snapshot);
    const entry = this.entries.get(key);

    if (!entry || entry.expiresAt <= this.clock()) {
      if (entry) this.entries.delete(key);
      this.misses++;
      log.debug({ key }, "Cache miss");
      return null;
    }

    // Refresh recency
    this.entries.delete(key);
    this.entries.set(key, entry);
    this.hits++;
    log.debug({ key }, "Cache hit");
    return entry.value;
  }

  /** Live entry present; does not count as a lookup */
  has(criteriaId: string, snapshot: Snapshot): boolean {
    if (!this.enabled) return false;
    const entry = this.entries.get(this.key(criteriaId, snapshot));
    return entry !== undefined && entry.expiresAt > this.clock();
  }

  set(criteriaId: string, snapshot: Snapshot, value: EvaluationResult): void {
    if (!this.enabled) return;

    const key = this.key(criteriaId, snapshot);
    this.entries.delete(key);
    this.entries.set(key, { value, expiresAt: this.clock() + this.ttlMs });

    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
      this.evictions++;
    }
  }

  /** Drop every entry for one criteria; returns how many went */
  forget(criteriaId: string): number {
    const scope = `${this.prefix}:${criteriaId}:`;
    let removed = 0;
    for (const key of [...this.entries.keys()]) {
      if (key.startsWith(scope)) {
        this.entries.delete(key);
        removed++;
      }
    }
    if (removed > 0) log.debug({ criteriaId, removed }, "Cache entries forgotten");
    return removed;
  }

  flush(): void {
    this.entries.clear();
    this.hits = 0;
    this.misses = 0;
    this.evictions = 0;
  }

  stats(): CacheStats {
    const lookups = this.hits + this.misses;
    return {
      enabled: this.enabled,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      size: this.entries.size,
      hitRate: lookups === 0 ? 0 : Math.round((this.hits / lookups) * 10000) / 100,
    };
  }
}
