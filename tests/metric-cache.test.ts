import { describe, it, expect, beforeEach } from 'vitest';
import { Registry } from 'prom-client';
import { MetricInstanceFactory } from '../src/core/metric-factory.js';
import { MetricCache, type RemovalReason } from '../src/core/metric-cache.js';
import type { MetricUpdate } from '../src/core/types.js';

function gauge(key: string, value = 1): MetricUpdate {
  return { key, help: 'h', kind: 'gauge', value, labels: { source: 'test' } };
}

describe('MetricCache', () => {
  let registry: Registry;
  let now: number;
  let removed: Array<[string, RemovalReason]>;

  function cache(maxSize: number, ttlMs = 60_000): MetricCache {
    return new MetricCache(new MetricInstanceFactory(registry), {
      maxSize,
      ttlMs,
      now: () => now,
      onRemove: (entry, reason) => removed.push([entry.key, reason]),
    });
  }

  function registered(): string[] {
    return registry.getMetricsAsArray().map((metric) => metric.name);
  }

  beforeEach(() => {
    registry = new Registry();
    now = 0;
    removed = [];
  });

  describe('bounds', () => {
    it('evicts exactly the least recently used entry when full', () => {
      const c = cache(2);
      c.upsert(gauge('a'));
      c.upsert(gauge('b'));
      c.upsert(gauge('c'));
      expect(c.size()).toBe(2);
      expect(c.contains('a')).toBe(false);
      expect(registered().sort()).toEqual(['b', 'c']);
      expect(removed).toEqual([['a', 'evicted']]);
    });

    it('get marks an entry as recently used', () => {
      const c = cache(2);
      c.upsert(gauge('a'));
      c.upsert(gauge('b'));
      c.get('a');
      c.upsert(gauge('c'));
      expect(c.entries().map((e) => e.key)).toEqual(['a', 'c']);
      expect(removed).toEqual([['b', 'evicted']]);
    });

    it('contains does not change recency', () => {
      const c = cache(2);
      c.upsert(gauge('a'));
      c.upsert(gauge('b'));
      expect(c.contains('a')).toBe(true);
      c.upsert(gauge('c'));
      expect(removed).toEqual([['a', 'evicted']]);
    });

    it('updating an existing key never evicts', () => {
      const c = cache(2);
      c.upsert(gauge('a'));
      c.upsert(gauge('b'));
      c.upsert(gauge('a', 5));
      expect(c.size()).toBe(2);
      expect(removed).toEqual([]);
      expect(c.entries().map((e) => e.key)).toEqual(['b', 'a']);
    });

    it('a rejected upsert leaves the cache untouched', () => {
      const c = cache(1);
      c.upsert(gauge('a'));
      const result = c.upsert(gauge('bad-name'));
      expect(!result.ok && result.error.type).toBe('invalid_metric_name');
      expect(c.contains('a')).toBe(true);
      expect(removed).toEqual([]);
    });
  });

  describe('expiry', () => {
    it('expires entries lazily at their deadline', () => {
      const c = cache(10, 1000);
      c.upsert(gauge('a'));
      now = 999;
      expect(c.contains('a')).toBe(true);
      now = 1000;
      expect(c.contains('a')).toBe(false);
      expect(registered()).toEqual([]);
      expect(removed).toEqual([['a', 'expired']]);
    });

    it('get refreshes the deadline', () => {
      const c = cache(10, 1000);
      c.upsert(gauge('a'));
      now = 500;
      expect(c.get('a')?.expiresAt).toBe(1500);
      now = 1200;
      expect(c.contains('a')).toBe(true);
      now = 1500;
      expect(c.entries()).toEqual([]);
    });

    it('upsert refreshes the deadline and keeps createdAt', () => {
      const c = cache(10, 1000);
      c.upsert(gauge('a', 1));
      now = 800;
      const result = c.upsert(gauge('a', 2));
      expect(result.ok && result.value).toMatchObject({
        createdAt: 0,
        lastAccessAt: 800,
        expiresAt: 1800,
        lastValue: 2,
        lastLabels: { source: 'test' },
      });
    });

    it('an expired key is recreated from scratch', async () => {
      const c = cache(10, 1000);
      c.upsert({ key: 'hits', help: 'h', kind: 'counter', value: 4, labels: {} });
      now = 2000;
      const result = c.upsert({ key: 'hits', help: 'h', kind: 'counter', value: 1, labels: {} });
      if (!result.ok) throw new Error(result.error.type);
      const snapshot = await result.value.instance.metric.get();
      expect(snapshot.values.map((v) => v.value)).toEqual([1]);
      expect(result.value.createdAt).toBe(2000);
    });
  });

  describe('delete and clear', () => {
    it('delete unregisters and reports whether the key existed', () => {
      const c = cache(10);
      c.upsert(gauge('a'));
      expect(c.delete('a')).toBe(true);
      expect(c.delete('a')).toBe(false);
      expect(registered()).toEqual([]);
      expect(removed).toEqual([['a', 'deleted']]);
    });

    it('clear disposes every entry', () => {
      const c = cache(10);
      c.upsert(gauge('a'));
      c.upsert(gauge('b'));
      c.clear();
      expect(c.size()).toBe(0);
      expect(registered()).toEqual([]);
      expect(removed).toEqual([
        ['a', 'cleared'],
        ['b', 'cleared'],
      ]);
    });
  });

  it('surfaces a kind change on an existing key as a conflict', () => {
    const c = cache(10);
    c.upsert(gauge('a'));
    const result = c.upsert({ ...gauge('a'), kind: 'counter' });
    expect(!result.ok && result.error.type).toBe('label_set_conflict');
    expect(c.get('a')?.instance.kind).toBe('gauge');
  });

  it('rejects invalid bounds', () => {
    expect(() => cache(0)).toThrow(RangeError);
    expect(() => cache(1, 0)).toThrow(RangeError);
  });
});
