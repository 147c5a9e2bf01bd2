import { SchemaError } from '../errors.ts';

export const NEBULA_TYPES = [
  'BOOL',
  'INT8',
  'INT16',
  'INT32',
  'INT64',
  'DOUBLE',
  'STRING',
  'FIXED_STRING',
  'TIMESTAMP',
  'DATE',
  'TIME',
  'DATETIME',
] as const;

export type NebulaType = (typeof NEBULA_TYPES)[number];

/** How an extracted JSON value is read for a given target type. */
export type ValueKind = 'int' | 'double' | 'bool' | 'string';

export const MAX_STRING_LENGTH = 65535;
export const MAX_IDENTIFIER_LENGTH = 128;

const DEFAULT_STRING_LENGTHS: Record<string, number> = {
  STRING: 256,
  FIXED_STRING: 32,
  VARCHAR: 256,
};

const TYPE_ALIASES: Record<string, NebulaType> = {
  INT: 'INT64',
  INTEGER: 'INT64',
  FLOAT: 'DOUBLE',
  BOOLEAN: 'BOOL',
  VARCHAR: 'STRING',
};

const RESERVED_KEYWORDS = new Set([
  'SPACE',
  'TAG',
  'EDGE',
  'VERTEX',
  'INDEX',
  'INSERT',
  'UPDATE',
  'DELETE',
  'WHERE',
  'YIELD',
]);

const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

function isNebulaType(name: string): name is NebulaType {
  return (NEBULA_TYPES as readonly string[]).includes(name);
}

/**
 * Resolve a case-insensitive type name from a mapping to its canonical type.
 * @throws SchemaError for names outside the conversion table.
 */
export function canonicalType(type: string): NebulaType {
  const upper = type.trim().toUpperCase();
  const alias = TYPE_ALIASES[upper];
  if (alias) {
    return alias;
  }
  if (isNebulaType(upper)) {
    return upper;
  }
  throw new SchemaError(`Unsupported type: ${type}`);
}

/** Upper-case and de-alias a type name without rejecting unknown names. */
export function normalizeTypeName(type: string): string {
  const upper = type.trim().toUpperCase();
  return TYPE_ALIASES[upper] ?? upper;
}

export function valueKindOf(type: NebulaType): ValueKind {
  switch (type) {
    case 'INT8':
    case 'INT16':
    case 'INT32':
    case 'INT64':
      return 'int';
    case 'DOUBLE':
      return 'double';
    case 'BOOL':
      return 'bool';
    case 'STRING':
    case 'FIXED_STRING':
    case 'TIMESTAMP':
    case 'DATE':
    case 'TIME':
    case 'DATETIME':
      return 'string';
  }
}

export function isStringType(type: NebulaType): boolean {
  return type === 'STRING' || type === 'FIXED_STRING';
}

/**
 * Convert a mapping type name into the column type used in DDL.
 * String types carry their length: `length` when positive, the per-type
 * default otherwise.
 */
export function convertToNebulaType(type: string, length?: number): string {
  const upper = type.trim().toUpperCase();

  const defaultLength = DEFAULT_STRING_LENGTHS[upper];
  if (defaultLength !== undefined) {
    const resolved = length !== undefined && length > 0 ? length : defaultLength;
    if (resolved > MAX_STRING_LENGTH) {
      throw new SchemaError(`String length exceeds maximum allowed: ${resolved}`, type);
    }
    return `${upper}(${resolved})`;
  }

  return canonicalType(type);
}

export function isValidIdentifier(name: string): boolean {
  if (name.length === 0 || name.length > MAX_IDENTIFIER_LENGTH) {
    return false;
  }
  if (RESERVED_KEYWORDS.has(name.toUpperCase())) {
    return false;
  }
  return IDENTIFIER_PATTERN.test(name);
}

/** Back-tick an identifier only when it is not a plain word. */
export function quoteIdentifier(identifier: string): string {
  return IDENTIFIER_PATTERN.test(identifier) ? identifier : `\`${identifier}\``;
}

export function indexName(elementName: string, propertyName: string): string {
  return `${elementName}_${propertyName}_idx`;
}
