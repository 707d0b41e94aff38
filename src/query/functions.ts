/**
 * Query functions added on top of the JMESPath built-ins.
 *
 * - `items(object)` turns an object into `[key, value]` pairs.
 * - `to_object(pairs)` turns `[key, value]` pairs back into an object.
 */

import { registerFunction, TYPE_ARRAY, TYPE_OBJECT } from '@jmespath-community/jmespath';
import type { JsonObject, JsonValue } from '../core/types.js';

type ExtensionFunction = (args: unknown[]) => JsonValue;

interface Extension {
  name: string;
  call: ExtensionFunction;
  argumentType: typeof TYPE_ARRAY | typeof TYPE_OBJECT;
}

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function items([value]: unknown[]): JsonValue {
  if (!isObject(value)) return null;
  return Object.entries(value).map(([key, member]): JsonValue => [key, member]);
}

function toObject([pairs]: unknown[]): JsonValue {
  if (!Array.isArray(pairs)) return null;
  const result: JsonObject = {};
  for (const pair of pairs) {
    if (!Array.isArray(pair) || pair.length !== 2 || typeof pair[0] !== 'string') {
      throw new TypeError('to_object() expects an array of [string, value] pairs');
    }
    result[pair[0]] = toJson(pair[1]);
  }
  return result;
}

function toJson(value: unknown): JsonValue {
  if (value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (Array.isArray(value)) return value.map(toJson);
  if (isObject(value)) return value;
  return null;
}

export const EXTENSION_FUNCTIONS: readonly Extension[] = [
  { name: 'items', call: items, argumentType: TYPE_OBJECT },
  { name: 'to_object', call: toObject, argumentType: TYPE_ARRAY },
];

/**
 * Add the extension functions to the library's function table. Names the
 * library already defines keep their built-in definition.
 */
export function registerExtensions(): void {
  for (const { name, call, argumentType } of EXTENSION_FUNCTIONS) {
    try {
      registerFunction(name, call, [{ types: [argumentType] }]);
    } catch (error) {
      if (!(error instanceof Error && error.message.includes('already defined'))) throw error;
    }
  }
}
