export type ErrorKind = 'Config' | 'Data' | 'Transform' | 'Schema' | 'JSON' | 'YAML';

export interface ErrorLocation {
  line?: number;
  column?: number;
}

/**
 * Base class for every failure the mapper reports. The first one thrown aborts
 * the whole generation run.
 */
export class MapperError extends Error {
  public readonly kind: ErrorKind;
  public readonly context?: string;
  public readonly line?: number;
  public readonly column?: number;

  constructor(kind: ErrorKind, message: string, context?: string, location: ErrorLocation = {}) {
    super(message);
    this.name = 'MapperError';
    this.kind = kind;
    this.context = context;
    this.line = location.line;
    this.column = location.column;
  }
}

/** Malformed mapping definition: missing fields, duplicates, bad identifiers. */
export class ConfigError extends MapperError {
  constructor(message: string, context?: string) {
    super('Config', message, context);
    this.name = 'ConfigError';
  }
}

/** JSON path resolution failure, null key, or failed value conversion. */
export class DataError extends MapperError {
  public readonly jsonPath?: string;

  constructor(message: string, jsonPath?: string, context?: string) {
    super('Data', message, context ?? jsonPath);
    this.name = 'DataError';
    this.jsonPath = jsonPath;
  }
}

export class TransformError extends MapperError {
  public readonly sourceValue?: string;

  constructor(message: string, sourceValue?: string, context?: string) {
    super('Transform', message, context ?? sourceValue);
    this.name = 'TransformError';
    this.sourceValue = sourceValue;
  }
}

/** Invalid identifier, unsupported type or oversized string length. */
export class SchemaError extends MapperError {
  constructor(message: string, context?: string) {
    super('Schema', message, context);
    this.name = 'SchemaError';
  }
}

export class JsonError extends MapperError {
  constructor(message: string, location: ErrorLocation = {}) {
    super('JSON', message, undefined, location);
    this.name = 'JsonError';
  }
}

export class YamlError extends MapperError {
  constructor(message: string, location: ErrorLocation = {}) {
    super('YAML', message, undefined, location);
    this.name = 'YamlError';
  }
}

/**
 * Render the one-line diagnostic printed by the CLI, e.g.
 * `Schema Error: Unsupported type: UUID (Person.id)`.
 */
export function describeError(err: unknown): string {
  if (!(err instanceof MapperError)) {
    return `Error: ${err instanceof Error ? err.message : String(err)}`;
  }

  let line = `${err.kind} Error: ${err.message}`;
  if (err.line !== undefined) {
    line += ` at line ${err.line}`;
    if (err.column !== undefined) {
      line += `, column ${err.column}`;
    }
  } else if (err.context) {
    line += ` (${err.context})`;
  }
  return line;
}
