import * as fs from 'fs/promises';
import { parse, parseNumberAndBigInt } from 'lossless-json';
import { JsonError, type ErrorLocation } from '../errors.ts';
import type { JsonValue } from './json-value.ts';

/**
 * Translate the character offset a parse error reports (`at position N`)
 * into a 1-based line and column.
 */
export function errorLocation(text: string, message: string): ErrorLocation {
  const position = /at position (\d+)/.exec(message);
  if (!position?.[1]) {
    return {};
  }

  const offset = Math.min(Number(position[1]), text.length);
  const before = text.slice(0, offset);
  const lastNewline = before.lastIndexOf('\n');
  return {
    line: before.split('\n').length,
    column: offset - lastNewline,
  };
}

function isJsonValue(value: unknown): value is JsonValue {
  switch (typeof value) {
    case 'string':
    case 'number':
    case 'bigint':
    case 'boolean':
      return true;
    case 'object':
      if (value === null) return true;
      return Array.isArray(value) ? value.every(isJsonValue) : Object.values(value).every(isJsonValue);
    default:
      return false;
  }
}

/**
 * Parse a JSON document. Integer literals become `bigint` so 64-bit ids and
 * values keep every digit; other numbers stay `number`.
 */
export function parseJson(text: string): JsonValue {
  let parsed: unknown;
  try {
    parsed = parse(text, null, parseNumberAndBigInt);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new JsonError(message, errorLocation(text, message));
  }

  if (!isJsonValue(parsed)) {
    throw new JsonError('Unsupported JSON value');
  }
  return parsed;
}

export async function parseJsonFile(filePath: string): Promise<JsonValue> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new JsonError(`File error: ${message}`);
  }
  return parseJson(content);
}
