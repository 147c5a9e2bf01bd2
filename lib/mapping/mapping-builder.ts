import { z } from 'zod';
import { ConfigError } from '../errors.ts';
import { normalizeTypeName } from '../graph/nebula-types.ts';
import {
  MappingDefinitionSchema,
  type DynamicFieldsConfig,
  type DynamicFieldsDefinition,
  type EdgeMapping,
  type GraphMapping,
  type MappingDefinition,
  type Property,
  type PropertyDefinition,
  type TransformDefinition,
  type TransformObjectDefinition,
  type TransformRuleDefinition,
  type TransformSpec,
  type TransformType,
  type VertexMapping,
} from './types.ts';

type NamedTransforms = ReadonlyMap<string, TransformDefinition>;

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((i: z.ZodIssue) => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message))
    .join('; ');
}

function transformTypeOf(raw: string | undefined): TransformType {
  if (raw === undefined) return 'NONE';
  const upper = raw.toUpperCase();
  if (upper === 'NONE' || upper === 'ARRAY_TO_BOOL' || upper === 'ARRAY_JOIN') {
    return upper;
  }
  return 'CUSTOM';
}

function toRules(rules: TransformRuleDefinition[]): TransformDefinition['rules'] {
  return rules.map((rule) => ({ ...rule, mappings: { ...rule.mappings } }));
}

function fromTransformObject(def: TransformObjectDefinition): TransformDefinition {
  const params: Record<string, string> = { ...def.params };
  if (def.delimiter !== undefined) params['delimiter'] = def.delimiter;
  if (def.format !== undefined) params['format'] = def.format;

  const type = transformTypeOf(def.type);
  const fn = def.function ?? (type === 'ARRAY_JOIN' ? 'array_join' : undefined);

  return {
    type: fn !== undefined && type === 'NONE' ? 'CUSTOM' : type,
    ...(fn !== undefined ? { function: fn } : {}),
    params,
    rules: toRules(def.rules),
  };
}

function resolveTransform(spec: TransformSpec, named: NamedTransforms): TransformDefinition | undefined {
  if (typeof spec === 'string') {
    return named.get(spec) ?? { type: 'CUSTOM', function: spec, params: {}, rules: [] };
  }
  if (Array.isArray(spec)) {
    return { type: 'CUSTOM', params: {}, rules: toRules(spec) };
  }
  const resolved = fromTransformObject(spec);
  return resolved.type === 'NONE' ? undefined : resolved;
}

/** `level.nowLevel` → `level_nowLevel`, `/meta/[0]` → `meta__0_`. */
export function derivePropertyName(jsonPath: string): string {
  return jsonPath.replace(/^\//, '').replace(/[^A-Za-z0-9_]/g, '_');
}

function buildProperty(def: PropertyDefinition, element: string, named: NamedTransforms): Property {
  const name = def.name ?? derivePropertyName(def.json);
  const transform = def.transform === undefined ? undefined : resolveTransform(def.transform, named);
  const nebulaType = def.type ?? transform?.rules[0]?.type;

  if (!nebulaType) {
    throw new ConfigError(`Missing 'type' field in property`, `${element}.${name}`);
  }

  return {
    name,
    jsonPath: def.json,
    nebulaType,
    optional: def.optional,
    indexable: def.index ?? def.indexable ?? false,
    ...(def.default !== undefined ? { defaultValue: def.default } : {}),
    ...(def.max_length !== undefined ? { maxLength: def.max_length } : {}),
    ...(transform ? { transform } : {}),
  };
}

function buildProperties(defs: PropertyDefinition[], element: string, named: NamedTransforms): Property[] {
  const seen = new Set<string>();
  return defs.map((def) => {
    const prop = buildProperty(def, element, named);
    if (seen.has(prop.name)) {
      throw new ConfigError(`Duplicate property name: ${prop.name}`, element);
    }
    seen.add(prop.name);
    return prop;
  });
}

function buildDynamicFields(def: DynamicFieldsDefinition | undefined, enabledByDefault: boolean): DynamicFieldsConfig {
  if (def === undefined || typeof def === 'boolean') {
    return {
      enabled: def ?? enabledByDefault,
      allowedTypes: new Set(),
      excludedProperties: new Set(),
    };
  }
  return {
    enabled: def.enabled,
    allowedTypes: new Set(def.allowed_types.map(normalizeTypeName)),
    excludedProperties: new Set(def.excluded_properties),
  };
}

/**
 * Build the resolved mapping from a parsed definition. Type names are copied
 * as written; they are checked by the validator and again at generation time.
 */
export function createMapping(input: unknown): GraphMapping {
  const parsed = MappingDefinitionSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(`Invalid mapping definition: ${formatIssues(parsed.error)}`);
  }
  return buildMapping(parsed.data);
}

export function buildMapping(definition: MappingDefinition): GraphMapping {
  const transforms = new Map<string, TransformDefinition>();
  for (const [name, def] of Object.entries(definition.transforms)) {
    transforms.set(name, fromTransformObject(def));
  }

  const vertices: VertexMapping[] = Object.entries(definition.tags).map(([tagName, tag]) => ({
    tagName,
    sourcePath: tag.from,
    keyPath: tag.key,
    properties: buildProperties(tag.properties, tagName, transforms),
    dynamicFields: buildDynamicFields(tag.dynamic_fields, definition.settings.dynamic_tags),
  }));

  const edges: EdgeMapping[] = Object.entries(definition.edges).map(([edgeName, edge]) => ({
    edgeName,
    sourcePath: edge.from,
    from: { tag: edge.source_tag, keyPath: edge.source_key },
    to: { tag: edge.target_tag, keyPath: edge.target_key },
    properties: buildProperties(edge.properties, edgeName, transforms),
  }));

  return {
    vertices,
    edges,
    transforms,
    settings: {
      ...(definition.settings.string_length !== undefined ? { stringLength: definition.settings.string_length } : {}),
      arrayDelimiter: definition.settings.array_delimiter,
      allowDynamicTags: definition.settings.dynamic_tags,
    },
  };
}
