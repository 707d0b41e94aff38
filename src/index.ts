/**
 * hookmetrics — turns JSON webhook events into Prometheus metrics.
 *
 * @packageDocumentation
 */

// ── Core Types ──
export type {
  Result,
  JsonValue,
  JsonObject,
  StageConfig,
  ExtractorConfig,
  ExtractorConfigs,
  RuleConfig,
  MetricKind,
  Labels,
  ResolvedFields,
  MetricUpdate,
  CacheBounds,
  EngineError,
  EngineErrorType,
} from './core/types.js';
export { ok, err, isJsonObject, METRIC_KINDS } from './core/types.js';

// ── Errors ──
export { ConfigError, describeError } from './core/errors.js';

// ── Logging ──
export {
  LogLevel,
  ConsoleLogger,
  createLogger,
  parseLogLevel,
  setGlobalLogLevel,
  getGlobalLogLevel,
  setLogOutput,
  resetLogOutput,
} from './core/logger.js';
export type { Logger, LogEntry } from './core/logger.js';

// ── Query Language ──
export { CompiledQuery, compileQuery, searchQuery } from './query/query-engine.js';
export { QuerySyntaxError, QueryRuntimeError } from './query/errors.js';

// ── Extraction & Rules ──
export { ValueExtractor, CompiledExtractor, compilePattern, toText } from './core/extractor.js';
export { resolveFields, parseMetricValue, DEFAULT_HELP, DEFAULT_KIND, DEFAULT_LABELS } from './core/field-resolver.js';
export type { RuleExtractors } from './core/field-resolver.js';
export { RuleMatcher, compileRules, stripDelimiters } from './core/rule-matcher.js';
export type { CompiledRule } from './core/rule-matcher.js';

// ── Metrics ──
export {
  MetricInstanceFactory,
  parseMetricKind,
  isValidMetricName,
  isValidLabelName,
  exposedNameFor,
} from './core/metric-factory.js';
export type { MetricInstance } from './core/metric-factory.js';
export { MetricCache } from './core/metric-cache.js';
export type { CachedMetric, RemovalReason, MetricCacheOptions } from './core/metric-cache.js';
export { MetricEngine } from './core/engine.js';
export type { MetricEngineOptions, EngineChange } from './core/engine.js';

// ── Configuration ──
export { loadConfig, parseConfig, resolveConfigPath, normaliseBasepath, DEFAULTS } from './config/loader.js';
export type { HookmetricsConfig } from './config/loader.js';

// ── Transport & Output ──
export { WebhookHttpServer, statusFor } from './transport/http-server.js';
export type { WebhookServerConfig } from './transport/http-server.js';
export { TextfileWriter, atomicWrite, TEXTFILE_NAME } from './output/textfile.js';
export { createHookmetrics } from './app.js';
export type { Hookmetrics } from './app.js';
