/**
 * Rule Matcher — picks the first configured rule whose pattern matches the
 * start of an event name.
 */

import type { EngineError, RuleConfig, Result } from './types.js';
import { err, ok } from './types.js';
import { compilePattern, type ValueExtractor } from './extractor.js';
import type { RuleExtractors } from './field-resolver.js';

export interface CompiledRule {
  /** Pattern as configured */
  source: string;
  pattern: RegExp;
  extractors: RuleExtractors;
}

/** Drop the `/…/` delimiters when both are present. */
export function stripDelimiters(source: string): string {
  return source.length >= 2 && source.startsWith('/') && source.endsWith('/')
    ? source.slice(1, -1)
    : source;
}

/** Compile rules in declaration order. Throws ConfigError on a bad pattern or extractor. */
export function compileRules(configs: readonly RuleConfig[], extractor: ValueExtractor): CompiledRule[] {
  return configs.map((config, i) => {
    const path = `event_handlers[${i}]`;
    const { help, kind, value, labels } = config.extractors;
    return {
      source: config.eventPattern,
      pattern: compilePattern(stripDelimiters(config.eventPattern), `${path}.event_title`),
      extractors: {
        help: extractor.compile(help, `${path}.extractors.help`),
        kind: extractor.compile(kind, `${path}.extractors.type`),
        value: extractor.compile(value, `${path}.extractors.value`),
        labels: extractor.compile(labels, `${path}.extractors.labels`),
      },
    };
  });
}

export class RuleMatcher {
  constructor(private readonly rules: readonly CompiledRule[]) {}

  match(eventName: string): Result<CompiledRule, EngineError> {
    for (const rule of this.rules) {
      // Patterns are not sticky or global, so exec always scans from 0.
      const found = rule.pattern.exec(eventName);
      if (found && found.index === 0) return ok(rule);
    }
    return err({ type: 'rule_not_found', eventName, configuredPatterns: this.patterns() });
  }

  patterns(): string[] {
    return this.rules.map((rule) => rule.source);
  }
}
