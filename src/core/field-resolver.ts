/**
 * Field Resolver — turns a matched rule's extractor results into a typed
 * (help, kind, value, labels) tuple, or the first error found.
 */

import type { EngineError, JsonValue, Labels, ResolvedFields, Result } from './types.js';
import { err, isJsonObject, ok } from './types.js';
import type { CompiledExtractor } from './extractor.js';
import { toText } from './extractor.js';
import { isValidLabelName, parseMetricKind } from './metric-factory.js';

export const DEFAULT_HELP = 'default help';
export const DEFAULT_KIND = 'gauge';
export const DEFAULT_LABELS: Readonly<Labels> = { warn: 'label extraction failed' };

const DECIMAL = /^\s*[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?\s*$/;

/** The four compiled extractors of one rule. */
export interface RuleExtractors {
  help: CompiledExtractor;
  kind: CompiledExtractor;
  value: CompiledExtractor;
  labels: CompiledExtractor;
}

/** Numbers as-is, booleans as 1/0, decimal strings parsed; anything else is undefined. */
export function parseMetricValue(value: JsonValue): number | undefined {
  if (typeof value === 'number') return Number.isFinite(value) ? value : undefined;
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (typeof value === 'string' && DECIMAL.test(value)) {
    const parsed = Number(value.trim());
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

export function resolveFields(
  extractors: RuleExtractors,
  key: string,
  document: JsonValue,
): Result<ResolvedFields, EngineError> {
  const rawHelp = extractors.help.evaluate(document, DEFAULT_HELP);
  const helpText = typeof rawHelp === 'string' ? rawHelp : toText(rawHelp);
  // prom-client refuses an empty help string
  const help = helpText.trim() === '' ? DEFAULT_HELP : helpText;

  const rawKind = extractors.kind.evaluate(document, DEFAULT_KIND);
  const kind = parseMetricKind(rawKind);
  if (!kind) return err({ type: 'unsupported_kind', metric: key, value: rawKind });

  const labels = resolveLabels(extractors.labels.evaluate(document, { ...DEFAULT_LABELS }), key);
  if (!labels.ok) return labels;

  if (kind === 'info') {
    return ok({ help, kind, value: 1, labels: labels.value });
  }

  const rawValue = extractors.value.evaluate(document, null);
  const value = parseMetricValue(rawValue);
  if (value === undefined) return err({ type: 'value_parse_error', metric: key, value: rawValue });

  return ok({ help, kind, value, labels: labels.value });
}

function resolveLabels(raw: JsonValue, key: string): Result<Labels, EngineError> {
  const parts = Array.isArray(raw) ? raw : [raw];
  const labels: Labels = {};
  for (const part of parts) {
    if (!isJsonObject(part)) {
      return err({ type: 'invalid_labels', metric: key, detail: `expected a mapping, got ${toText(part)}` });
    }
    for (const [name, value] of Object.entries(part)) {
      if (!isValidLabelName(name)) {
        return err({ type: 'invalid_labels', metric: key, detail: `invalid label name ${JSON.stringify(name)}` });
      }
      labels[name] = typeof value === 'string' ? value : toText(value);
    }
  }
  return ok(labels);
}
