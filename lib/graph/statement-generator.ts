import { ConfigError, DataError } from '../errors.ts';
import { isJsonObject, isJsonScalar, jsonKind, type JsonValue } from '../json/json-value.ts';
import type { PathNavigator } from '../json/path-navigator.ts';
import { createLogger } from '../logger.ts';
import type {
  DynamicFieldsConfig,
  EdgeMapping,
  GraphMapping,
  MappingSettings,
  Property,
  VertexMapping,
} from '../mapping/types.ts';
import type { TransformEngine } from '../transform/transform-engine.ts';
import type { TransformValue } from '../transform/types.ts';
import { canonicalType, quoteIdentifier, valueKindOf, type NebulaType } from './nebula-types.ts';
import { formatValue, nullValue, quoteString, scalarValue, type Scalar, type Value } from './value-formatter.ts';

const logger = createLogger('StatementGenerator');

export const DEFAULT_BATCH_SIZE = 500;

export interface ResolvedProperty {
  property: Property;
  type: NebulaType;
}

/** Accumulates `VALUES` tuples and flushes one INSERT per full batch. */
class InsertBatcher {
  private tuples: string[] = [];

  constructor(
    private readonly header: string,
    private readonly batchSize: number,
    private readonly out: string[]
  ) {}

  add(tuple: string): void {
    this.tuples.push(tuple);
    if (this.tuples.length >= this.batchSize) {
      this.flush();
    }
  }

  flush(): void {
    if (this.tuples.length === 0) return;
    this.out.push(`${this.header} VALUES ${this.tuples.join(', ')};`);
    this.tuples = [];
  }
}

function resolveProperties(properties: readonly Property[]): ResolvedProperty[] {
  return properties.map((property) => ({ property, type: canonicalType(property.nebulaType) }));
}

function inferDynamicType(value: JsonValue): NebulaType | undefined {
  switch (jsonKind(value)) {
    case 'bool':
      return 'BOOL';
    case 'integer':
      return 'INT64';
    case 'float':
      return 'DOUBLE';
    case 'string':
      return 'STRING';
    default:
      return undefined;
  }
}

function scalarOf(value: string | number | bigint | boolean): Scalar {
  if (typeof value === 'string') return { kind: 'string', value };
  if (typeof value === 'boolean') return { kind: 'bool', value };
  if (typeof value === 'bigint') return { kind: 'int', value };
  return Number.isInteger(value) ? { kind: 'int', value: BigInt(value) } : { kind: 'double', value };
}

const truncate = (value: number | bigint): bigint =>
  typeof value === 'bigint' ? value : BigInt(Math.trunc(value));

const firstSegment = (path: string) => path.replace(/^\//, '').split(/[/[]/)[0];

// Top-level keys already covered by the key path or a declared property.
function mappedKeys(vertex: VertexMapping): Set<string> {
  const keys = new Set<string>();
  const addPath = (path: string) => {
    const first = firstSegment(path);
    if (first) keys.add(first);
  };

  addPath(vertex.keyPath);
  for (const prop of vertex.properties) {
    keys.add(prop.name);
    addPath(prop.jsonPath);
  }
  return keys;
}

/**
 * Turns a mapping and a parsed document into INSERT/UPSERT statements.
 * The navigator and transform engine are shared with the caller so the path
 * cache and any custom transforms survive across runs.
 */
export class StatementGenerator {
  constructor(
    private readonly navigator: PathNavigator,
    private readonly transforms: TransformEngine
  ) {}

  generateBatchStatements(
    mapping: GraphMapping,
    document: JsonValue,
    batchSize: number = DEFAULT_BATCH_SIZE
  ): string[] {
    if (!Number.isInteger(batchSize) || batchSize <= 0) {
      throw new ConfigError(`Batch size must be a positive integer: ${batchSize}`);
    }

    const statements: string[] = [];
    // Upserted ids per tag name, shared by every vertex mapping of that tag.
    const processed = new Map<string, Set<string>>();
    for (const vertex of mapping.vertices) {
      let seen = processed.get(vertex.tagName);
      if (!seen) {
        seen = new Set();
        processed.set(vertex.tagName, seen);
      }
      statements.push(...this.generateVertexStatements(vertex, document, mapping.settings, batchSize, seen));
    }
    for (const edge of mapping.edges) {
      statements.push(...this.generateEdgeStatements(edge, document, mapping.settings, batchSize));
    }
    return statements;
  }

  generateVertexStatements(
    vertex: VertexMapping,
    document: JsonValue,
    settings: MappingSettings,
    batchSize: number = DEFAULT_BATCH_SIZE,
    seen: Set<string> = new Set()
  ): string[] {
    const records = this.records(document, vertex.sourcePath);
    const properties = resolveProperties(vertex.properties);
    const names = properties.map((p) => quoteIdentifier(p.property.name));
    const tag = quoteIdentifier(vertex.tagName);

    const statements: string[] = [];
    const batcher = new InsertBatcher(`INSERT VERTEX ${tag} (${names.join(', ')})`, batchSize, statements);
    const dynamic = vertex.dynamicFields.enabled;
    const declared = mappedKeys(vertex);

    for (const record of records) {
      const id = this.vertexId(record, vertex.keyPath);

      if (dynamic) {
        if (seen.has(id)) continue;
        seen.add(id);
      }

      const values = properties.map((p) => formatValue(this.extractValue(record, p, settings)));

      if (dynamic) {
        const extra = this.dynamicProperties(record, vertex.dynamicFields, declared);
        const allNames = [...names, ...extra.map(([name]) => quoteIdentifier(name))];
        const allValues = [...values, ...extra.map(([, value]) => formatValue(value))];
        statements.push(`UPSERT VERTEX ${tag} ${id} (${allNames.join(', ')}) VALUES (${allValues.join(', ')});`);
      } else {
        batcher.add(`${id}:(${values.join(', ')})`);
      }
    }
    batcher.flush();

    logger.debug(`${vertex.tagName}: ${records.length} record(s), ${statements.length} statement(s)`);
    return statements;
  }

  generateEdgeStatements(
    edge: EdgeMapping,
    document: JsonValue,
    settings: MappingSettings,
    batchSize: number = DEFAULT_BATCH_SIZE
  ): string[] {
    const records = this.records(document, edge.sourcePath);
    const properties = resolveProperties(edge.properties);
    const names = properties.map((p) => quoteIdentifier(p.property.name));

    const statements: string[] = [];
    const batcher = new InsertBatcher(
      `INSERT EDGE ${quoteIdentifier(edge.edgeName)} (${names.join(', ')})`,
      batchSize,
      statements
    );

    for (const record of records) {
      const from = this.vertexId(record, edge.from.keyPath);
      const to = this.vertexId(record, edge.to.keyPath);
      const values = properties.map((p) => formatValue(this.extractValue(record, p, settings)));
      batcher.add(`${from} -> ${to}:(${values.join(', ')})`);
    }
    batcher.flush();

    logger.debug(`${edge.edgeName}: ${records.length} record(s), ${statements.length} statement(s)`);
    return statements;
  }

  /** The quoted id literal of a record, e.g. `"v1"` or `"42"`. */
  vertexId(record: JsonValue, keyPath: string): string {
    const result = this.navigator.resolve(record, keyPath);
    if (!result.ok) {
      throw new DataError(`Failed to extract vertex ID: ${result.message}`, keyPath);
    }

    const id = result.value;
    if (id === null) {
      throw new DataError('Vertex ID cannot be null', keyPath);
    }
    if (typeof id === 'string') {
      return quoteString(id);
    }
    if (typeof id === 'number' || typeof id === 'bigint') {
      return quoteString(truncate(id).toString());
    }
    throw new DataError('Invalid vertex ID type', keyPath);
  }

  extractValue(record: JsonValue, resolved: ResolvedProperty, settings: MappingSettings): Value {
    const { property, type } = resolved;
    const result = this.navigator.resolve(record, property.jsonPath);
    if (!result.ok) {
      throw new DataError(`Failed to extract value: ${result.message}`, property.jsonPath);
    }

    const extracted = result.value;
    if (extracted === null) {
      return nullValue(type);
    }

    if (property.transform) {
      const input = this.transformInput(extracted, type, settings, property.jsonPath);
      const { transform } = property;
      const output = this.transforms.apply(transform.function ?? transform.type, input, transform.params, transform.rules);
      return scalarValue(type, output.value);
    }

    return scalarValue(type, this.convert(extracted, type, property.jsonPath));
  }

  private records(document: JsonValue, sourcePath: string): JsonValue[] {
    const result = this.navigator.resolve(document, sourcePath);
    if (!result.ok) {
      throw new DataError(`Failed to extract data: ${result.message}`, sourcePath);
    }
    return Array.isArray(result.value) ? result.value : [result.value];
  }

  private transformInput(
    value: JsonValue,
    targetType: NebulaType,
    settings: MappingSettings,
    jsonPath: string
  ): TransformValue {
    if (isJsonScalar(value)) {
      return { value: scalarOf(value), sourceType: jsonKind(value), targetType };
    }
    if (Array.isArray(value) && value.every(isJsonScalar)) {
      const joined = value.map((item) => String(item)).join(settings.arrayDelimiter);
      return { value: { kind: 'string', value: joined }, sourceType: 'array', targetType };
    }
    throw new DataError(`Unsupported value type for transformation: ${jsonKind(value)}`, jsonPath);
  }

  private convert(value: JsonValue, type: NebulaType, jsonPath: string): Scalar {
    const kind = valueKindOf(type);
    const fail = (): never => {
      throw new DataError(`Value conversion error: cannot read ${jsonKind(value)} as ${type}`, jsonPath);
    };

    switch (kind) {
      case 'int':
        if (typeof value === 'number' || typeof value === 'bigint') return { kind: 'int', value: truncate(value) };
        return fail();
      case 'double':
        if (typeof value === 'bigint') return { kind: 'double', value: Number(value) };
        return typeof value === 'number' ? { kind: 'double', value } : fail();
      case 'bool':
        return typeof value === 'boolean' ? { kind: 'bool', value } : fail();
      case 'string':
        return typeof value === 'string' ? { kind: 'string', value } : fail();
    }
  }

  private dynamicProperties(
    record: JsonValue,
    config: DynamicFieldsConfig,
    declared: ReadonlySet<string>
  ): Array<[string, Value]> {
    if (!isJsonObject(record)) return [];

    const extra: Array<[string, Value]> = [];
    for (const [key, value] of Object.entries(record)) {
      if (declared.has(key) || config.excludedProperties.has(key) || !isJsonScalar(value)) continue;

      const type = inferDynamicType(value);
      if (!type || (config.allowedTypes.size > 0 && !config.allowedTypes.has(type))) continue;

      extra.push([key, scalarValue(type, scalarOf(value))]);
    }
    return extra;
  }
}
