import { describe, it } from 'node:test';
import { strict as assert } from 'node:assert';
import {
  ConfigError,
  DataError,
  describeError,
  JsonError,
  MapperError,
  SchemaError,
  TransformError,
  YamlError,
} from '../lib/errors.ts';

describe('MapperError subclasses', () => {
  it('should carry kind and name', () => {
    const err = new ConfigError('Duplicate property name: name', 'Person');
    assert.ok(err instanceof MapperError);
    assert.ok(err instanceof Error);
    assert.equal(err.kind, 'Config');
    assert.equal(err.name, 'ConfigError');
    assert.equal(err.context, 'Person');
  });

  it('should use the JSON path as DataError context', () => {
    const err = new DataError('Property not found: name', '/people/name');
    assert.equal(err.jsonPath, '/people/name');
    assert.equal(err.context, '/people/name');
  });

  it('should use the source value as TransformError context', () => {
    const err = new TransformError('Invalid boolean value', 'maybe');
    assert.equal(err.sourceValue, 'maybe');
    assert.equal(err.context, 'maybe');
    assert.equal(err.kind, 'Transform');
  });
});

describe('describeError', () => {
  it('should append context in parentheses', () => {
    assert.equal(
      describeError(new SchemaError('Unsupported type: UUID', 'Person.id')),
      'Schema Error: Unsupported type: UUID (Person.id)'
    );
  });

  it('should append line and column when known', () => {
    assert.equal(
      describeError(new JsonError('Unexpected token', { line: 3, column: 5 })),
      'JSON Error: Unexpected token at line 3, column 5'
    );
  });

  it('should append only the line when the column is unknown', () => {
    assert.equal(describeError(new YamlError('Bad indentation', { line: 2 })), 'YAML Error: Bad indentation at line 2');
  });

  it('should print the bare message without context', () => {
    assert.equal(describeError(new ConfigError('Missing mapping')), 'Config Error: Missing mapping');
  });

  it('should handle foreign errors and values', () => {
    assert.equal(describeError(new Error('boom')), 'Error: boom');
    assert.equal(describeError('boom'), 'Error: boom');
  });
});
