export type JsonPrimitive = string | number | bigint | boolean | null;
export type JsonArray = JsonValue[];
export interface JsonObject {
  [key: string]: JsonValue;
}
export type JsonValue = JsonPrimitive | JsonArray | JsonObject;

/**
 * Closed classification of a JSON node. The parser yields integer literals as
 * `bigint`; a `number` built in code counts as an integer when it is integral.
 */
export type JsonKind = 'null' | 'bool' | 'integer' | 'float' | 'string' | 'array' | 'object';

export function jsonKind(value: JsonValue): JsonKind {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  switch (typeof value) {
    case 'boolean':
      return 'bool';
    case 'bigint':
      return 'integer';
    case 'number':
      return Number.isInteger(value) ? 'integer' : 'float';
    case 'string':
      return 'string';
    default:
      return 'object';
  }
}

export function isJsonObject(value: JsonValue): value is JsonObject {
  return jsonKind(value) === 'object';
}

export function isJsonScalar(value: JsonValue): value is string | number | bigint | boolean {
  return value !== null && typeof value !== 'object';
}
