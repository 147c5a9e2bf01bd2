import { TransformError } from '../errors.ts';
import type { NebulaType } from '../graph/nebula-types.ts';
import type { Scalar } from '../graph/value-formatter.ts';
import type { TransformRule } from '../mapping/types.ts';

export interface TransformValue {
  value: Scalar;
  /** Kind of the value the transform received. */
  sourceType: string;
  targetType: NebulaType;
}

export type TransformParams = Readonly<Record<string, string>>;

export type TransformFunction = (
  input: TransformValue,
  params: TransformParams,
  rules: readonly TransformRule[]
) => TransformValue;

const CONVERSION_FAILED = 'Cannot convert value to requested type';

export function coerceToString(input: TransformValue): string {
  const { value } = input;
  switch (value.kind) {
    case 'string':
      return value.value;
    case 'int':
    case 'double':
      return String(value.value);
    case 'bool':
      return value.value ? 'true' : 'false';
  }
}

export function coerceToNumber(input: TransformValue): number {
  const { value } = input;
  switch (value.kind) {
    case 'int':
      return Number(value.value);
    case 'double':
      return value.value;
    case 'string': {
      const text = value.value.trim();
      const parsed = Number(text);
      if (text === '' || !Number.isFinite(parsed)) {
        throw new TransformError(CONVERSION_FAILED, value.value);
      }
      return parsed;
    }
    case 'bool':
      throw new TransformError(CONVERSION_FAILED, String(value.value));
  }
}

export function stringResult(value: string, targetType: NebulaType = 'STRING'): TransformValue {
  return { value: { kind: 'string', value }, sourceType: 'STRING', targetType };
}
