/**
 * Metric Cache — bounded, expiring map from metric key to live instance.
 *
 * Expiry is lazy: every operation sweeps entries whose deadline has passed.
 * Map insertion order doubles as recency order; touching an entry re-inserts it.
 * An entry leaves the map only after its instance has been disposed.
 */

import type { CacheBounds, EngineError, Labels, MetricUpdate, Result } from './types.js';
import { ok } from './types.js';
import type { MetricInstance, MetricInstanceFactory } from './metric-factory.js';

export interface CachedMetric {
  key: string;
  instance: MetricInstance;
  /** Last value applied (the delta for counters, 1 for info) */
  lastValue: number;
  lastLabels: Labels;
  createdAt: number;
  lastAccessAt: number;
  expiresAt: number;
}

export type RemovalReason = 'expired' | 'evicted' | 'deleted' | 'cleared';

export interface MetricCacheOptions extends CacheBounds {
  /** Clock in milliseconds */
  now?: () => number;
  onRemove?: (entry: CachedMetric, reason: RemovalReason) => void;
}

export class MetricCache {
  private readonly store = new Map<string, CachedMetric>();
  private readonly maxSize: number;
  private readonly ttlMs: number;
  private readonly now: () => number;
  private readonly onRemove?: (entry: CachedMetric, reason: RemovalReason) => void;

  constructor(
    private readonly factory: MetricInstanceFactory,
    options: MetricCacheOptions,
  ) {
    if (!Number.isInteger(options.maxSize) || options.maxSize < 1) {
      throw new RangeError(`maxSize must be a positive integer, got ${options.maxSize}`);
    }
    if (!(options.ttlMs > 0)) {
      throw new RangeError(`ttlMs must be positive, got ${options.ttlMs}`);
    }
    this.maxSize = options.maxSize;
    this.ttlMs = options.ttlMs;
    this.now = options.now ?? Date.now;
    this.onRemove = options.onRemove;
  }

  upsert(update: MetricUpdate): Result<CachedMetric, EngineError> {
    const now = this.now();
    this.sweep(now);

    const existing = this.store.get(update.key);
    const applied = this.factory.createOrReuse(update, existing?.instance);
    if (!applied.ok) return applied;

    if (!existing && this.store.size >= this.maxSize) {
      this.evictOldest();
    }

    const entry: CachedMetric = {
      key: update.key,
      instance: applied.value,
      lastValue: applied.value.kind === 'info' ? 1 : update.value,
      lastLabels: { ...update.labels },
      createdAt: existing?.createdAt ?? now,
      lastAccessAt: now,
      expiresAt: now + this.ttlMs,
    };
    this.store.delete(update.key);
    this.store.set(update.key, entry);
    return ok(entry);
  }

  /** Look up and touch an entry, refreshing its deadline and recency. */
  get(key: string): CachedMetric | undefined {
    const now = this.now();
    this.sweep(now);
    const entry = this.store.get(key);
    if (!entry) return undefined;
    entry.lastAccessAt = now;
    entry.expiresAt = now + this.ttlMs;
    this.store.delete(key);
    this.store.set(key, entry);
    return entry;
  }

  contains(key: string): boolean {
    this.sweep(this.now());
    return this.store.has(key);
  }

  delete(key: string): boolean {
    this.sweep(this.now());
    const entry = this.store.get(key);
    if (!entry) return false;
    this.remove(entry, 'deleted');
    return true;
  }

  size(): number {
    this.sweep(this.now());
    return this.store.size;
  }

  /** Live entries, least recently used first. */
  entries(): CachedMetric[] {
    this.sweep(this.now());
    return [...this.store.values()];
  }

  clear(): void {
    for (const entry of [...this.store.values()]) {
      this.remove(entry, 'cleared');
    }
  }

  private sweep(now: number): void {
    for (const entry of [...this.store.values()]) {
      if (now >= entry.expiresAt) this.remove(entry, 'expired');
    }
  }

  private evictOldest(): void {
    const oldest = this.store.values().next();
    if (!oldest.done) this.remove(oldest.value, 'evicted');
  }

  private remove(entry: CachedMetric, reason: RemovalReason): void {
    this.factory.dispose(entry.instance);
    this.store.delete(entry.key);
    this.onRemove?.(entry, reason);
  }
}
