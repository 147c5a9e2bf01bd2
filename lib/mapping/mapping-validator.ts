import { canonicalType, isValidIdentifier } from '../graph/nebula-types.ts';
import { createLogger } from '../logger.ts';
import type { DynamicFieldsConfig, GraphMapping, Property } from './types.ts';

const logger = createLogger('MappingValidator');

export interface MappingIssue {
  element: string;
  message: string;
}

function hasBalancedBrackets(path: string): boolean {
  let depth = 0;
  for (const ch of path) {
    if (ch === '[') depth++;
    else if (ch === ']') depth--;
    if (depth < 0) return false;
  }
  return depth === 0;
}

function checkPath(path: string, label: string, element: string, issues: MappingIssue[]): void {
  if (path.trim() === '') {
    issues.push({ element, message: `${label} cannot be empty` });
  } else if (!hasBalancedBrackets(path)) {
    issues.push({ element, message: `Invalid ${label.toLowerCase()}: ${path}` });
  }
}

function checkType(type: string, element: string, issues: MappingIssue[]): void {
  try {
    canonicalType(type);
  } catch (err) {
    issues.push({ element, message: err instanceof Error ? err.message : String(err) });
  }
}

function checkProperties(properties: readonly Property[], element: string, issues: MappingIssue[]): void {
  for (const prop of properties) {
    const where = `${element}.${prop.name}`;
    if (!isValidIdentifier(prop.name)) {
      issues.push({ element: where, message: `Invalid property name: ${prop.name}` });
    }
    checkPath(prop.jsonPath, 'Property path', where, issues);
    checkType(prop.nebulaType, where, issues);
  }
}

function checkDynamicFields(config: DynamicFieldsConfig, element: string, issues: MappingIssue[]): void {
  if (!config.enabled) return;

  for (const type of config.allowedTypes) {
    checkType(type, element, issues);
  }
  for (const name of config.excludedProperties) {
    if (!isValidIdentifier(name)) {
      issues.push({ element, message: `Invalid excluded property name: ${name}` });
    }
  }
}

/**
 * Structural checks run before any statement is generated: identifiers, paths,
 * type names and edge endpoints. Returns every issue found, in mapping order.
 */
export function validateMapping(mapping: GraphMapping): MappingIssue[] {
  const issues: MappingIssue[] = [];
  const tagNames = new Set(mapping.vertices.map((v) => v.tagName));

  for (const vertex of mapping.vertices) {
    if (!isValidIdentifier(vertex.tagName)) {
      issues.push({ element: vertex.tagName, message: `Invalid tag name: ${vertex.tagName}` });
    }
    checkPath(vertex.sourcePath, 'Source path', vertex.tagName, issues);
    checkPath(vertex.keyPath, 'Key path', vertex.tagName, issues);
    checkProperties(vertex.properties, vertex.tagName, issues);
    checkDynamicFields(vertex.dynamicFields, vertex.tagName, issues);
  }

  for (const edge of mapping.edges) {
    if (!isValidIdentifier(edge.edgeName)) {
      issues.push({ element: edge.edgeName, message: `Invalid edge name: ${edge.edgeName}` });
    }
    checkPath(edge.sourcePath, 'Source path', edge.edgeName, issues);

    for (const [label, endpoint] of [['Source', edge.from], ['Target', edge.to]] as const) {
      if (!isValidIdentifier(endpoint.tag)) {
        issues.push({ element: edge.edgeName, message: `Invalid ${label.toLowerCase()} tag identifier: ${endpoint.tag}` });
      } else if (!tagNames.has(endpoint.tag)) {
        // Endpoint tags may live in another mapping file; not an error.
        logger.warn(`${label} tag "${endpoint.tag}" of edge "${edge.edgeName}" is not mapped in this file`);
      }
      checkPath(endpoint.keyPath, `${label} key path`, edge.edgeName, issues);
    }

    checkProperties(edge.properties, edge.edgeName, issues);
  }

  return issues;
}
