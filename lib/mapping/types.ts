import { z } from 'zod';

// YAML scalars such as `default: 0` or `value: true` are kept as literal text.
const ScalarTextSchema = z.union([z.string(), z.number(), z.boolean()]).transform((v) => String(v));

export const TransformRuleSchema = z.object({
  name: z.string().default(''),
  type: z.string().default(''),
  condition: z.string().default(''),
  value: ScalarTextSchema.default(''),
  field: z.string().default(''),
  mappings: z.record(ScalarTextSchema).default({}),
});

export const TransformObjectSchema = z.object({
  type: z.string().optional(),
  function: z.string().optional().describe('Name of a registered transform function'),
  params: z.record(ScalarTextSchema).default({}),
  delimiter: z.string().optional(),
  format: z.string().optional(),
  rules: z.array(TransformRuleSchema).default([]),
});

export const TransformSpecSchema = z.union([
  z.string().min(1),
  z.array(TransformRuleSchema),
  TransformObjectSchema,
]);

export const PropertyDefinitionSchema = z.object({
  json: z.string().min(1).describe('Path of the value relative to the source object'),
  name: z.string().min(1).optional(),
  type: z.string().min(1).optional(),
  optional: z.boolean().default(false),
  index: z.boolean().optional(),
  indexable: z.boolean().optional(),
  max_length: z.number().int().positive().optional(),
  default: ScalarTextSchema.optional(),
  transform: TransformSpecSchema.optional(),
});

const PropertyListSchema = z
  .array(PropertyDefinitionSchema)
  .nullish()
  .transform((props) => props ?? []);

export const DynamicFieldsSchema = z.union([
  z.boolean(),
  z.object({
    enabled: z.boolean().default(false),
    allowed_types: z.array(z.string()).default([]),
    excluded_properties: z.array(z.string()).default([]),
  }),
]);

export const TagDefinitionSchema = z.object({
  from: z.string().describe('Path selecting one object or an array of objects'),
  key: z.string().min(1).default('id'),
  dynamic_fields: DynamicFieldsSchema.optional(),
  properties: PropertyListSchema,
});

export const EdgeDefinitionSchema = z.object({
  from: z.string(),
  source_tag: z.string(),
  target_tag: z.string(),
  source_key: z.string().min(1).default('id'),
  target_key: z.string().min(1).default('id'),
  properties: PropertyListSchema,
});

export const SettingsSchema = z
  .object({
    string_length: z.number().int().positive().optional(),
    array_delimiter: z.string().default(','),
    dynamic_tags: z.boolean().default(false),
  })
  .default({});

export const MappingDefinitionSchema = z.object({
  settings: SettingsSchema,
  transforms: z
    .record(TransformObjectSchema)
    .nullish()
    .transform((t) => t ?? {}),
  tags: z
    .record(TagDefinitionSchema)
    .nullish()
    .transform((t) => t ?? {}),
  edges: z
    .record(EdgeDefinitionSchema)
    .nullish()
    .transform((e) => e ?? {}),
});

export type TransformRuleDefinition = z.infer<typeof TransformRuleSchema>;
export type TransformObjectDefinition = z.infer<typeof TransformObjectSchema>;
export type TransformSpec = z.infer<typeof TransformSpecSchema>;
export type PropertyDefinition = z.infer<typeof PropertyDefinitionSchema>;
export type DynamicFieldsDefinition = z.infer<typeof DynamicFieldsSchema>;
export type TagDefinition = z.infer<typeof TagDefinitionSchema>;
export type EdgeDefinition = z.infer<typeof EdgeDefinitionSchema>;
export type MappingDefinition = z.infer<typeof MappingDefinitionSchema>;
export type MappingDefinitionInput = z.input<typeof MappingDefinitionSchema>;

// --- Resolved mapping ---

export type TransformType = 'NONE' | 'ARRAY_TO_BOOL' | 'ARRAY_JOIN' | 'CUSTOM';

export interface TransformRule {
  readonly name: string;
  readonly type: string;
  readonly condition: string;
  readonly value: string;
  readonly field: string;
  readonly mappings: Readonly<Record<string, string>>;
}

export interface TransformDefinition {
  readonly type: TransformType;
  /** Registry function applied at extraction time. */
  readonly function?: string;
  readonly params: Readonly<Record<string, string>>;
  readonly rules: readonly TransformRule[];
}

export interface Property {
  readonly name: string;
  readonly jsonPath: string;
  /** Type name as written in the mapping; resolved when statements are generated. */
  readonly nebulaType: string;
  readonly optional: boolean;
  readonly indexable: boolean;
  readonly defaultValue?: string;
  readonly maxLength?: number;
  readonly transform?: TransformDefinition;
}

export interface DynamicFieldsConfig {
  readonly enabled: boolean;
  /** Upper-cased canonical type names; empty allows every inferred type. */
  readonly allowedTypes: ReadonlySet<string>;
  readonly excludedProperties: ReadonlySet<string>;
}

export interface VertexMapping {
  readonly tagName: string;
  readonly sourcePath: string;
  readonly keyPath: string;
  readonly properties: readonly Property[];
  readonly dynamicFields: DynamicFieldsConfig;
}

export interface EdgeEndpoint {
  readonly tag: string;
  readonly keyPath: string;
}

export interface EdgeMapping {
  readonly edgeName: string;
  readonly sourcePath: string;
  readonly from: EdgeEndpoint;
  readonly to: EdgeEndpoint;
  readonly properties: readonly Property[];
}

export interface MappingSettings {
  /** Applied to string columns without their own `max_length`. */
  readonly stringLength?: number;
  readonly arrayDelimiter: string;
  readonly allowDynamicTags: boolean;
}

export interface GraphMapping {
  readonly vertices: readonly VertexMapping[];
  readonly edges: readonly EdgeMapping[];
  readonly transforms: ReadonlyMap<string, TransformDefinition>;
  readonly settings: MappingSettings;
}
