import { SchemaError } from '../errors.ts';
import type { GraphMapping, MappingSettings, Property } from '../mapping/types.ts';
import {
  canonicalType,
  convertToNebulaType,
  indexName,
  isStringType,
  isValidIdentifier,
  quoteIdentifier,
} from './nebula-types.ts';
import { quoteString } from './value-formatter.ts';

type ElementKind = 'TAG' | 'EDGE';

interface SchemaElement {
  kind: ElementKind;
  name: string;
  properties: readonly Property[];
}

function elementsOf(mapping: GraphMapping): SchemaElement[] {
  return [
    ...mapping.vertices.map((v): SchemaElement => ({ kind: 'TAG', name: v.tagName, properties: v.properties })),
    ...mapping.edges.map((e): SchemaElement => ({ kind: 'EDGE', name: e.edgeName, properties: e.properties })),
  ];
}

/** String length for a property: its own `max_length`, then the mapping-wide setting. */
export function stringLengthFor(prop: Property, settings: MappingSettings): number | undefined {
  return prop.maxLength ?? settings.stringLength;
}

function validateElement(element: SchemaElement): void {
  if (!isValidIdentifier(element.name)) {
    throw new SchemaError(`Invalid schema element name: ${element.name}`);
  }
  for (const prop of element.properties) {
    if (!isValidIdentifier(prop.name)) {
      throw new SchemaError(`Invalid property name: ${prop.name}`, element.name);
    }
  }
}

// String columns need a quoted default; everything else is written as given.
function formatDefault(prop: Property, defaultValue: string): string {
  if (!isStringType(canonicalType(prop.nebulaType))) {
    return defaultValue;
  }
  return /^".*"$/s.test(defaultValue) ? defaultValue : quoteString(defaultValue);
}

function columnDefinition(prop: Property, settings: MappingSettings): string {
  let column = `${quoteIdentifier(prop.name)} ${convertToNebulaType(prop.nebulaType, stringLengthFor(prop, settings))}`;
  if (!prop.optional) {
    column += ' NOT NULL';
  }
  if (prop.defaultValue !== undefined) {
    column += ` DEFAULT ${formatDefault(prop, prop.defaultValue)}`;
  }
  return column;
}

function createStatement(element: SchemaElement, settings: MappingSettings): string {
  validateElement(element);

  const columns = element.properties.map((prop) => `    ${columnDefinition(prop, settings)}`);
  const body = columns.length > 0 ? `(\n${columns.join(',\n')}\n)` : '()';
  return `CREATE ${element.kind} IF NOT EXISTS ${quoteIdentifier(element.name)} ${body} ttl_duration = 0, ttl_col = "";`;
}

/** `CREATE TAG` for every vertex mapping, then `CREATE EDGE` for every edge mapping. */
export function generateSchemaStatements(mapping: GraphMapping): string[] {
  return elementsOf(mapping).map((element) => createStatement(element, mapping.settings));
}

/**
 * One index per indexable property. String columns are indexed on their full
 * declared length.
 */
export function generateIndexStatements(mapping: GraphMapping): string[] {
  const statements: string[] = [];

  for (const element of elementsOf(mapping)) {
    for (const prop of element.properties) {
      if (!prop.indexable) continue;

      let column = quoteIdentifier(prop.name);
      if (isStringType(canonicalType(prop.nebulaType))) {
        const columnType = convertToNebulaType(prop.nebulaType, stringLengthFor(prop, mapping.settings));
        column += columnType.slice(columnType.indexOf('('));
      }

      statements.push(
        `CREATE ${element.kind} INDEX IF NOT EXISTS ${quoteIdentifier(indexName(element.name, prop.name))} ` +
          `ON ${quoteIdentifier(element.name)}(${column});`
      );
    }
  }

  return statements;
}

/** Drops indexes first, then tags, then edges. */
export function generateCleanupStatements(mapping: GraphMapping): string[] {
  const elements = elementsOf(mapping);
  const statements: string[] = [];

  for (const element of elements) {
    for (const prop of element.properties) {
      if (prop.indexable) {
        statements.push(
          `DROP ${element.kind} INDEX IF EXISTS ${quoteIdentifier(indexName(element.name, prop.name))};`
        );
      }
    }
  }
  for (const element of elements) {
    statements.push(`DROP ${element.kind} IF EXISTS ${quoteIdentifier(element.name)};`);
  }

  return statements;
}
