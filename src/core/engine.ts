/**
 * Metric Engine — the per-request pipeline from event to live metric.
 *
 * RuleMatcher → FieldResolver → MetricCache.upsert, all synchronous, so each
 * request mutates the cache and the registry as one step on the event loop.
 */

import { Registry, collectDefaultMetrics } from 'prom-client';
import type { CacheBounds, EngineError, JsonValue, Result, RuleConfig } from './types.js';
import { err, ok } from './types.js';
import { describeError } from './errors.js';
import { createLogger, type Logger } from './logger.js';
import { ValueExtractor } from './extractor.js';
import { resolveFields } from './field-resolver.js';
import { RuleMatcher, compileRules } from './rule-matcher.js';
import { MetricInstanceFactory, type MetricInstance } from './metric-factory.js';
import { MetricCache, type CachedMetric, type RemovalReason } from './metric-cache.js';

export type EngineChange =
  | { type: 'updated'; key: string }
  | { type: 'removed'; key: string; reason: RemovalReason };

export interface MetricEngineOptions {
  rules: readonly RuleConfig[];
  cache: CacheBounds;
  /** Collect prom-client's default process metrics into the same registry */
  exporterMetrics?: boolean;
  now?: () => number;
  logger?: Logger;
  /** Called after every successful update and every removal */
  onChange?: (change: EngineChange) => void;
}

export class MetricEngine {
  readonly registry = new Registry();
  private readonly matcher: RuleMatcher;
  private readonly cache: MetricCache;
  private readonly logger: Logger;
  private readonly onChange?: (change: EngineChange) => void;

  /** Throws ConfigError when a rule pattern or extractor does not compile. */
  constructor(options: MetricEngineOptions) {
    this.logger = options.logger ?? createLogger('MetricEngine');
    this.onChange = options.onChange;

    const extractor = new ValueExtractor(this.logger.child({ component: 'extractor' }));
    this.matcher = new RuleMatcher(compileRules(options.rules, extractor));

    if (options.exporterMetrics) {
      collectDefaultMetrics({ register: this.registry });
    }

    this.cache = new MetricCache(new MetricInstanceFactory(this.registry), {
      maxSize: options.cache.maxSize,
      ttlMs: options.cache.ttlMs,
      now: options.now,
      onRemove: (entry, reason) => {
        this.logger.info('Metric removed', { metric: entry.key, reason });
        this.onChange?.({ type: 'removed', key: entry.key, reason });
      },
    });
  }

  processEvent(eventName: string, document: JsonValue): Result<CachedMetric, EngineError> {
    const rule = this.matcher.match(eventName);
    if (!rule.ok) return this.rejected(rule.error);

    const fields = resolveFields(rule.value.extractors, eventName, document);
    if (!fields.ok) return this.rejected(fields.error);

    const stored = this.cache.upsert({ key: eventName, ...fields.value });
    if (!stored.ok) return this.rejected(stored.error);

    this.logger.debug('Metric updated', {
      metric: eventName,
      rule: rule.value.source,
      kind: fields.value.kind,
      value: fields.value.value,
    });
    this.onChange?.({ type: 'updated', key: eventName });
    return stored;
  }

  deleteMetric(eventName: string): Result<{ removed: string }, EngineError> {
    if (!this.cache.delete(eventName)) {
      return this.rejected({ type: 'key_not_found', metric: eventName });
    }
    return ok({ removed: eventName });
  }

  /** Live instances, least recently used first. A new array every call. */
  enumerateActiveMetrics(): MetricInstance[] {
    return this.cache.entries().map((entry) => entry.instance);
  }

  /** Prometheus exposition text for every live metric. */
  async render(): Promise<string> {
    // Drop expired entries before the registry is read.
    this.cache.size();
    return this.registry.metrics();
  }

  get contentType(): string {
    return this.registry.contentType;
  }

  configuredPatterns(): string[] {
    return this.matcher.patterns();
  }

  /** Dispose every live metric. */
  close(): void {
    this.cache.clear();
  }

  private rejected<T>(error: EngineError): Result<T, EngineError> {
    this.logger.warn('Event rejected', { type: error.type, error: describeError(error) });
    return err(error);
  }
}
