/**
 * Value Extractor — compiles configured extractor chains and runs them against event documents.
 *
 * An extractor is a list of independent chains. Each chain folds its stages left to
 * right: a `/regex/` stage searches the JSON text of the current value and
 * yields the first capture group, any other stage is a structured query.
 */

import type { ExtractorConfig, JsonValue, StageConfig } from './types.js';
import { isJsonObject } from './types.js';
import { ConfigError } from './errors.js';
import { createLogger, type Logger } from './logger.js';
import { compileQuery, type CompiledQuery } from '../query/query-engine.js';
import { QueryRuntimeError, QuerySyntaxError } from '../query/errors.js';

export type Stage =
  | { type: 'regex'; source: string; pattern: RegExp }
  | { type: 'query'; source: string; query: CompiledQuery }
  | { type: 'empty' };

/**
 * JSON text with `", "` and `": "` separators, the layout regex stages
 * are written against.
 */
export function toText(value: JsonValue): string {
  if (Array.isArray(value)) {
    return `[${value.map(toText).join(', ')}]`;
  }
  if (isJsonObject(value)) {
    const members = Object.entries(value).map(([key, member]) => `${JSON.stringify(key)}: ${toText(member)}`);
    return `{${members.join(', ')}}`;
  }
  return JSON.stringify(value);
}

/**
 * Compile a regular expression written for the configuration file.
 * `(?P<name>…)` and `(?P=name)` groups are rewritten to their JavaScript spelling.
 */
export function compilePattern(source: string, path?: string): RegExp {
  const body = source
    .replace(/\(\?P<([A-Za-z_][A-Za-z0-9_]*)>/g, '(?<$1>')
    .replace(/\(\?P=([A-Za-z_][A-Za-z0-9_]*)\)/g, '\\k<$1>');
  try {
    return new RegExp(body);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`invalid regular expression ${JSON.stringify(source)}: ${reason}`, path);
  }
}

/** Query results that count as "nothing found". */
function isEmptyResult(value: JsonValue): boolean {
  if (value === null || value === '') return true;
  if (Array.isArray(value)) return value.length === 0;
  if (isJsonObject(value)) return Object.keys(value).length === 0;
  return false;
}

export class CompiledExtractor {
  constructor(
    readonly chains: readonly Stage[][],
    private readonly logger: Logger,
  ) {}

  /**
   * Run every chain against `document`. One chain yields its result
   * directly; several yield a list of results in chain order.
   */
  evaluate(document: JsonValue, fallback: JsonValue): JsonValue {
    const results = this.chains.map((chain) => this.runChain(chain, document, fallback));
    return results.length === 1 ? results[0] : results;
  }

  private runChain(chain: Stage[], document: JsonValue, fallback: JsonValue): JsonValue {
    if (chain.length === 0) return fallback;
    let current = document;
    for (const stage of chain) {
      if (stage.type === 'empty') return fallback;
      current = this.runStage(stage, current, fallback);
    }
    return current;
  }

  private runStage(stage: Exclude<Stage, { type: 'empty' }>, input: JsonValue, fallback: JsonValue): JsonValue {
    if (stage.type === 'regex') {
      const match = stage.pattern.exec(toText(input));
      const group = match?.[1];
      return group === undefined ? fallback : group;
    }

    try {
      const result = stage.query.evaluate(input);
      return isEmptyResult(result) ? fallback : result;
    } catch (error) {
      if (!(error instanceof QueryRuntimeError)) throw error;
      this.logger.warn('Query failed, using default', { query: stage.source, error: error.message });
      return fallback;
    }
  }
}

export class ValueExtractor {
  private readonly logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? createLogger('ValueExtractor');
  }

  /** Compile a configured extractor. Throws ConfigError on a malformed regex or query. */
  compile(definition: ExtractorConfig | undefined, path?: string): CompiledExtractor {
    if (definition === undefined || definition === null || definition === '' || definition.length === 0) {
      return new CompiledExtractor([[{ type: 'empty' }]], this.logger);
    }
    const chains: Array<StageConfig | StageConfig[]> = Array.isArray(definition) ? definition : [definition];
    return new CompiledExtractor(
      chains.map((chain, i) => {
        const stages: StageConfig[] = Array.isArray(chain) ? chain : [chain];
        return stages.map((stage, j) => this.compileStage(stage, path && `${path}[${i}][${j}]`));
      }),
      this.logger,
    );
  }

  /** Compile and run `definition` in one step. */
  evaluate(definition: ExtractorConfig | undefined, document: JsonValue, fallback: JsonValue): JsonValue {
    return this.compile(definition).evaluate(document, fallback);
  }

  private compileStage(stage: StageConfig, path?: string): Stage {
    if (stage === null || stage === '') return { type: 'empty' };
    if (stage.startsWith('/')) {
      const body = stage.replace(/^\/+|\/+$/g, '');
      return { type: 'regex', source: stage, pattern: compilePattern(body, path) };
    }
    try {
      return { type: 'query', source: stage, query: compileQuery(stage) };
    } catch (error) {
      if (error instanceof QuerySyntaxError) {
        throw new ConfigError(`invalid query: ${error.message}`, path);
      }
      throw error;
    }
  }
}
