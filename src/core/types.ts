/**
 * hookmetrics core types
 * Single source of truth for the types shared by the extractor, cache and engine.
 */

// ── Result Type ──

/** Discriminated union result type for error handling without exceptions */
export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

// ── Dynamic Values ──

/** The JSON-like tree every extractor stage reads and produces. */
export type JsonValue =
  | null
  | boolean
  | number
  | string
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ── Extractor Configuration ──

/** One stage as written in configuration: `/regex/`, a structured query, or empty. */
export type StageConfig = string | null;

/**
 * A field extractor as written in configuration.
 * A string is a one-stage chain; a list holds independent chains, each a
 * stage or a list of stages folded left to right.
 */
export type ExtractorConfig = StageConfig | Array<StageConfig | StageConfig[]>;

export interface ExtractorConfigs {
  help?: ExtractorConfig;
  kind?: ExtractorConfig;
  value?: ExtractorConfig;
  labels?: ExtractorConfig;
}

/** A webhook handler as written in configuration. */
export interface RuleConfig {
  /** Start-anchored regular expression matched against the event name */
  eventPattern: string;
  extractors: ExtractorConfigs;
}

// ── Metrics ──

export const METRIC_KINDS = ['gauge', 'counter', 'info'] as const;

export type MetricKind = (typeof METRIC_KINDS)[number];

export type Labels = Record<string, string>;

/** The resolved (help, kind, value, labels) tuple for one event. */
export interface ResolvedFields {
  help: string;
  kind: MetricKind;
  /** Ignored for `info`, where it is always 1 */
  value: number;
  labels: Labels;
}

/** A resolved tuple addressed to a metric key. */
export interface MetricUpdate extends ResolvedFields {
  key: string;
}

export interface CacheBounds {
  /** Maximum number of live metrics */
  maxSize: number;
  /** Time-to-live from last write or access, in milliseconds */
  ttlMs: number;
}

// ── Errors ──

/** Everything a request can fail with. Returned, never thrown. */
export type EngineError =
  | { type: 'rule_not_found'; eventName: string; configuredPatterns: string[] }
  | { type: 'key_not_found'; metric: string }
  | { type: 'value_parse_error'; metric: string; value: JsonValue }
  | { type: 'invalid_labels'; metric: string; detail: string }
  | { type: 'invalid_increment'; metric: string; value: number }
  | { type: 'unsupported_kind'; metric: string; value: JsonValue }
  | { type: 'invalid_metric_name'; metric: string }
  | {
      type: 'label_set_conflict';
      metric: string;
      existing: { kind: MetricKind; labelNames: string[] };
      attempted: { kind: MetricKind; labelNames: string[] };
    }
  | { type: 'metric_name_conflict'; metric: string; exposedName: string };

export type EngineErrorType = EngineError['type'];
