// Pipeline
export { GraphConverter, statementsOf } from './converter.ts';
export type { ConversionResult, ConvertOptions, GraphConverterOptions, StatementOrder } from './converter.ts';
export { loadConfig, EnvSchema } from './config.ts';
export type { MapperConfig, Env } from './config.ts';

// JSON
export { PathNavigator, splitPath } from './json/path-navigator.ts';
export type { PathSegment, ResolveResult, ResolveFailure } from './json/path-navigator.ts';
export { parseJson, parseJsonFile } from './json/json-parser.ts';
export { jsonKind, isJsonObject, isJsonScalar } from './json/json-value.ts';
export type { JsonValue, JsonObject, JsonArray, JsonPrimitive, JsonKind } from './json/json-value.ts';

// Mapping
export { MappingLoader } from './mapping/mapping-loader.ts';
export type { MappingLoaderOptions } from './mapping/mapping-loader.ts';
export { createMapping, buildMapping, derivePropertyName } from './mapping/mapping-builder.ts';
export { validateMapping } from './mapping/mapping-validator.ts';
export type { MappingIssue } from './mapping/mapping-validator.ts';
export { MappingDefinitionSchema } from './mapping/types.ts';
export type {
  GraphMapping,
  VertexMapping,
  EdgeMapping,
  EdgeEndpoint,
  Property,
  DynamicFieldsConfig,
  MappingSettings,
  TransformDefinition,
  TransformRule,
  TransformType,
  MappingDefinition,
  MappingDefinitionInput,
} from './mapping/types.ts';

// Transforms
export { TransformEngine } from './transform/transform-engine.ts';
export { coerceToNumber, coerceToString, stringResult } from './transform/types.ts';
export type { TransformFunction, TransformValue, TransformParams } from './transform/types.ts';

// Graph
export { StatementGenerator, DEFAULT_BATCH_SIZE } from './graph/statement-generator.ts';
export {
  generateSchemaStatements,
  generateIndexStatements,
  generateCleanupStatements,
} from './graph/schema-manager.ts';
export {
  convertToNebulaType,
  canonicalType,
  isValidIdentifier,
  quoteIdentifier,
  indexName,
  NEBULA_TYPES,
} from './graph/nebula-types.ts';
export type { NebulaType } from './graph/nebula-types.ts';
export { formatValue, escapeString } from './graph/value-formatter.ts';
export type { Value, Scalar } from './graph/value-formatter.ts';

// Errors & logging
export {
  MapperError,
  ConfigError,
  DataError,
  TransformError,
  SchemaError,
  JsonError,
  YamlError,
  describeError,
} from './errors.ts';
export type { ErrorKind } from './errors.ts';
export { logger, createLogger, setLogLevel, resolveLogLevel, LOG_LEVELS } from './logger.ts';
export type { Logger, LogLevel } from './logger.ts';
