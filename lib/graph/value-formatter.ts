import type { NebulaType } from './nebula-types.ts';

export type Scalar =
  | { kind: 'string'; value: string }
  | { kind: 'int'; value: bigint }
  | { kind: 'double'; value: number }
  | { kind: 'bool'; value: boolean };

/** One extracted property value, formatted and discarded per record. */
export type Value =
  | { nebulaType: NebulaType; isNull: true }
  | { nebulaType: NebulaType; isNull: false; scalar: Scalar };

export const nullValue = (nebulaType: NebulaType): Value => ({ nebulaType, isNull: true });

export const scalarValue = (nebulaType: NebulaType, scalar: Scalar): Value => ({
  nebulaType,
  isNull: false,
  scalar,
});

const ESCAPES: Record<string, string> = {
  '\\': '\\\\',
  '"': '\\"',
  '\n': '\\n',
  '\r': '\\r',
  '\t': '\\t',
};

export function escapeString(text: string): string {
  return text.replace(/[\\"\n\r\t]/g, (ch) => ESCAPES[ch] ?? ch);
}

export function quoteString(text: string): string {
  return `"${escapeString(text)}"`;
}

function formatDouble(value: number): string {
  const text = String(value);
  // Keep integral doubles recognisable as floating point literals.
  return /^-?\d+$/.test(text) ? `${text}.0` : text;
}

export function formatScalar(scalar: Scalar): string {
  switch (scalar.kind) {
    case 'string':
      return quoteString(scalar.value);
    case 'bool':
      return scalar.value ? 'true' : 'false';
    case 'int':
      return String(scalar.value);
    case 'double':
      return formatDouble(scalar.value);
  }
}

/** Literal text of a value: `NULL`, `"text"`, `true`/`false` or a number. */
export function formatValue(value: Value): string {
  return value.isNull ? 'NULL' : formatScalar(value.scalar);
}
