/**
 * Error types — startup failures are thrown, request failures are returned.
 */

import type { EngineError } from './types.js';

/** Invalid configuration. Raised while loading, before any traffic is served. */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly path?: string,
  ) {
    super(path ? `${path}: ${message}` : message);
    this.name = 'ConfigError';
  }
}

/** One-line human readable description of a request failure. */
export function describeError(error: EngineError): string {
  switch (error.type) {
    case 'rule_not_found':
      return `No event handler matches "${error.eventName}"`;
    case 'key_not_found':
      return `Metric "${error.metric}" not found`;
    case 'value_parse_error':
      return `Extracted value ${JSON.stringify(error.value)} for "${error.metric}" is not a finite number`;
    case 'invalid_labels':
      return `Invalid labels for "${error.metric}": ${error.detail}`;
    case 'invalid_increment':
      return `Counter "${error.metric}" cannot be incremented by ${error.value}`;
    case 'unsupported_kind':
      return `Metric kind ${JSON.stringify(error.value)} for "${error.metric}" is not supported`;
    case 'invalid_metric_name':
      return `"${error.metric}" is not a valid metric name`;
    case 'label_set_conflict':
      return (
        `Metric "${error.metric}" is registered as ${error.existing.kind}` +
        ` with labels [${error.existing.labelNames.join(', ')}];` +
        ` got ${error.attempted.kind} with labels [${error.attempted.labelNames.join(', ')}]`
      );
    case 'metric_name_conflict':
      return `Metric name "${error.exposedName}" for "${error.metric}" is already registered`;
  }
}
