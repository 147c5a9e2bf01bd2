import { generateIndexStatements, generateSchemaStatements } from './graph/schema-manager.ts';
import { DEFAULT_BATCH_SIZE, StatementGenerator } from './graph/statement-generator.ts';
import { parseJsonFile } from './json/json-parser.ts';
import type { JsonValue } from './json/json-value.ts';
import { PathNavigator } from './json/path-navigator.ts';
import { createLogger } from './logger.ts';
import { MappingLoader } from './mapping/mapping-loader.ts';
import type { GraphMapping } from './mapping/types.ts';
import { TransformEngine } from './transform/transform-engine.ts';

const logger = createLogger('Converter');

export interface ConvertOptions {
  /** Skip vertex and edge data statements. */
  schemaOnly?: boolean;
  batchSize?: number;
}

export interface ConversionResult {
  schema: string[];
  indexes: string[];
  data: string[];
}

export interface GraphConverterOptions {
  validate?: boolean;
  navigator?: PathNavigator;
  transforms?: TransformEngine;
}

export interface StatementOrder {
  /** Place index statements between the schema and the data. */
  withIndexes?: boolean;
}

/** The statements of a result in output order: schema, then data. */
export function statementsOf(result: ConversionResult, order: StatementOrder = {}): string[] {
  const indexes = order.withIndexes ? result.indexes : [];
  return [...result.schema, ...indexes, ...result.data];
}

/**
 * One pipeline context: a path navigator, a transform engine and the
 * generator that uses them. Keep a converter around to reuse the path cache
 * across documents.
 */
export class GraphConverter {
  readonly navigator: PathNavigator;
  readonly transforms: TransformEngine;
  private generator: StatementGenerator;
  private loader: MappingLoader;

  constructor(options: GraphConverterOptions = {}) {
    this.navigator = options.navigator ?? new PathNavigator();
    this.transforms = options.transforms ?? new TransformEngine();
    this.generator = new StatementGenerator(this.navigator, this.transforms);
    this.loader = new MappingLoader({ validate: options.validate ?? true });
  }

  loadMapping(filePath: string): Promise<GraphMapping> {
    return this.loader.loadFile(filePath);
  }

  parseMapping(content: string): GraphMapping {
    return this.loader.parse(content);
  }

  convert(mapping: GraphMapping, document: JsonValue, options: ConvertOptions = {}): ConversionResult {
    const schema = generateSchemaStatements(mapping);
    const indexes = generateIndexStatements(mapping);
    const data = options.schemaOnly
      ? []
      : this.generator.generateBatchStatements(mapping, document, options.batchSize ?? DEFAULT_BATCH_SIZE);

    logger.info(`Generated ${schema.length} schema, ${indexes.length} index and ${data.length} data statement(s)`);
    return { schema, indexes, data };
  }

  async convertFiles(mappingPath: string, inputPath: string, options: ConvertOptions = {}): Promise<ConversionResult> {
    const mapping = await this.loadMapping(mappingPath);
    const document = await parseJsonFile(inputPath);
    return this.convert(mapping, document, options);
  }
}
