/**
 * Metric Instance Factory — creates, reuses and disposes prom-client metrics per kind.
 *
 * Kinds form a closed union; each has its own constructor and update rule.
 * Unknown kind strings are turned away by `parseMetricKind` before any
 * instance is built.
 */

import { Counter, Gauge, type Registry } from 'prom-client';
import type { EngineError, JsonValue, Labels, MetricKind, MetricUpdate, Result } from './types.js';
import { METRIC_KINDS, err, ok } from './types.js';

const METRIC_NAME = /^[a-zA-Z_:][a-zA-Z0-9_:]*$/;
const LABEL_NAME = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

interface InstanceBase {
  /** Cache key; also the metric name for gauge and counter */
  key: string;
  /** Name the registry exposes */
  exposedName: string;
  help: string;
  /** Sorted */
  labelNames: readonly string[];
}

export type MetricInstance =
  | (InstanceBase & { kind: 'gauge'; metric: Gauge<string> })
  | (InstanceBase & { kind: 'counter'; metric: Counter<string> })
  | (InstanceBase & { kind: 'info'; metric: Gauge<string> });

export function isValidMetricName(name: string): boolean {
  return METRIC_NAME.test(name);
}

/** Prometheus label names; the `__` prefix is reserved. */
export function isValidLabelName(name: string): boolean {
  return LABEL_NAME.test(name) && !name.startsWith('__');
}

/** Narrow an extracted kind to a MetricKind (trimmed, case-insensitive). */
export function parseMetricKind(value: JsonValue): MetricKind | undefined {
  if (typeof value !== 'string') return undefined;
  const wanted = value.trim().toLowerCase();
  return METRIC_KINDS.find((kind) => kind === wanted);
}

export function exposedNameFor(kind: MetricKind, key: string): string {
  return kind === 'info' ? `${key}_info` : key;
}

export function labelNamesOf(labels: Labels): string[] {
  return Object.keys(labels).sort();
}

function sameLabelNames(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((name, i) => name === b[i]);
}

export class MetricInstanceFactory {
  constructor(private readonly registry: Registry) {}

  /**
   * Apply `update` to `existing`, or to a newly registered instance when
   * there is none. Nothing is created or changed when an error is returned.
   */
  createOrReuse(update: MetricUpdate, existing?: MetricInstance): Result<MetricInstance, EngineError> {
    const invalid = this.validate(update);
    if (invalid) return err(invalid);

    const labelNames = labelNamesOf(update.labels);
    let instance: MetricInstance;
    if (existing) {
      if (existing.kind !== update.kind || !sameLabelNames(existing.labelNames, labelNames)) {
        return err({
          type: 'label_set_conflict',
          metric: update.key,
          existing: { kind: existing.kind, labelNames: [...existing.labelNames] },
          attempted: { kind: update.kind, labelNames },
        });
      }
      instance = existing;
    } else {
      const created = this.create(update, labelNames);
      if (!created.ok) return created;
      instance = created.value;
    }

    this.apply(instance, update);
    return ok(instance);
  }

  /** Clear the instance's series and unregister it. */
  dispose(instance: MetricInstance): void {
    instance.metric.reset();
    this.registry.removeSingleMetric(instance.exposedName);
  }

  private validate(update: MetricUpdate): EngineError | undefined {
    switch (update.kind) {
      case 'gauge':
        return Number.isFinite(update.value)
          ? undefined
          : { type: 'value_parse_error', metric: update.key, value: update.value };
      case 'counter':
        if (!Number.isFinite(update.value)) {
          return { type: 'value_parse_error', metric: update.key, value: update.value };
        }
        return update.value < 0
          ? { type: 'invalid_increment', metric: update.key, value: update.value }
          : undefined;
      case 'info':
        return undefined;
    }
  }

  private create(update: MetricUpdate, labelNames: string[]): Result<MetricInstance, EngineError> {
    if (!isValidMetricName(update.key)) {
      return err({ type: 'invalid_metric_name', metric: update.key });
    }
    const exposedName = exposedNameFor(update.kind, update.key);
    if (this.registry.getSingleMetric(exposedName)) {
      return err({ type: 'metric_name_conflict', metric: update.key, exposedName });
    }

    const base = { key: update.key, exposedName, help: update.help, labelNames };
    const config = { name: exposedName, help: update.help, labelNames, registers: [this.registry] };
    switch (update.kind) {
      case 'gauge':
        return ok({ ...base, kind: 'gauge', metric: new Gauge(config) });
      case 'counter':
        return ok({ ...base, kind: 'counter', metric: new Counter(config) });
      case 'info':
        return ok({ ...base, kind: 'info', metric: new Gauge(config) });
    }
  }

  private apply(instance: MetricInstance, update: MetricUpdate): void {
    switch (instance.kind) {
      case 'gauge':
        instance.metric.set(update.labels, update.value);
        break;
      case 'counter':
        instance.metric.inc(update.labels, update.value);
        break;
      case 'info':
        // The info payload is replaced wholesale, never accumulated.
        instance.metric.reset();
        instance.metric.set(update.labels, 1);
        break;
    }
  }
}
