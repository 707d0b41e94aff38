/**
 * Structured queries: JMESPath expressions compiled once at load time
 * and evaluated per event.
 */

import { compile, TreeInterpreter } from '@jmespath-community/jmespath';
import type { JsonValue } from '../core/types.js';
import { QueryRuntimeError, QuerySyntaxError } from './errors.js';
import { registerExtensions } from './functions.js';

registerExtensions();

type QueryAst = ReturnType<typeof compile>;

export class CompiledQuery {
  constructor(
    readonly expression: string,
    private readonly ast: QueryAst,
  ) {}

  /** Evaluate against `data`. Throws QueryRuntimeError on type mismatches and unknown functions. */
  evaluate(data: JsonValue): JsonValue {
    try {
      return TreeInterpreter.search(this.ast, data);
    } catch (error) {
      if (error instanceof Error) throw new QueryRuntimeError(error.message);
      throw error;
    }
  }
}

/** Parse `expression`. Throws QuerySyntaxError. */
export function compileQuery(expression: string): CompiledQuery {
  try {
    return new CompiledQuery(expression, compile(expression));
  } catch (error) {
    if (error instanceof Error) throw new QuerySyntaxError(error.message, expression);
    throw error;
  }
}

export function searchQuery(expression: string, data: JsonValue): JsonValue {
  return compileQuery(expression).evaluate(data);
}
