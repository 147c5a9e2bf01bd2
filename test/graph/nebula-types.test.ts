import { describe, it } from 'node:test';
import { strict as assert } from 'node:assert';
import {
  canonicalType,
  convertToNebulaType,
  indexName,
  isValidIdentifier,
  normalizeTypeName,
  quoteIdentifier,
  valueKindOf,
} from '../../lib/graph/nebula-types.ts';
import { SchemaError } from '../../lib/errors.ts';

describe('convertToNebulaType', () => {
  it('should size string types', () => {
    assert.equal(convertToNebulaType('string', 300), 'STRING(300)');
    assert.equal(convertToNebulaType('string'), 'STRING(256)');
    assert.equal(convertToNebulaType('string', 0), 'STRING(256)');
    assert.equal(convertToNebulaType('fixed_string'), 'FIXED_STRING(32)');
    assert.equal(convertToNebulaType('varchar', 10), 'VARCHAR(10)');
    assert.equal(convertToNebulaType('STRING', 65535), 'STRING(65535)');
  });

  it('should reject oversized strings', () => {
    assert.throws(
      () => convertToNebulaType('string', 100000),
      (err: unknown) => err instanceof SchemaError && err.message === 'String length exceeds maximum allowed: 100000'
    );
  });

  it('should convert aliases case-insensitively', () => {
    assert.equal(convertToNebulaType('int'), 'INT64');
    assert.equal(convertToNebulaType('Integer'), 'INT64');
    assert.equal(convertToNebulaType('float'), 'DOUBLE');
    assert.equal(convertToNebulaType('boolean'), 'BOOL');
    assert.equal(convertToNebulaType('bool'), 'BOOL');
    assert.equal(convertToNebulaType('int32'), 'INT32');
    assert.equal(convertToNebulaType('timestamp'), 'TIMESTAMP');
    assert.equal(convertToNebulaType('datetime'), 'DATETIME');
  });

  it('should reject unknown types', () => {
    assert.throws(
      () => convertToNebulaType('unknown_type'),
      (err: unknown) => err instanceof SchemaError && err.message === 'Unsupported type: unknown_type'
    );
  });
});

describe('canonicalType', () => {
  it('should map to the closed type set', () => {
    assert.equal(canonicalType('VarChar'), 'STRING');
    assert.equal(canonicalType(' double '), 'DOUBLE');
    assert.throws(() => canonicalType('uuid'), SchemaError);
  });

  it('should normalize without rejecting', () => {
    assert.equal(normalizeTypeName('int'), 'INT64');
    assert.equal(normalizeTypeName('uuid'), 'UUID');
  });
});

describe('valueKindOf', () => {
  it('should pick the extraction kind', () => {
    assert.equal(valueKindOf('INT8'), 'int');
    assert.equal(valueKindOf('INT64'), 'int');
    assert.equal(valueKindOf('DOUBLE'), 'double');
    assert.equal(valueKindOf('BOOL'), 'bool');
    assert.equal(valueKindOf('DATE'), 'string');
    assert.equal(valueKindOf('FIXED_STRING'), 'string');
  });
});

describe('identifiers', () => {
  it('should quote only names that are not plain words', () => {
    assert.equal(quoteIdentifier('valid_name'), 'valid_name');
    assert.equal(quoteIdentifier('123bad'), '`123bad`');
    assert.equal(quoteIdentifier('has space'), '`has space`');
  });

  it('should validate identifiers', () => {
    assert.equal(isValidIdentifier('Person'), true);
    assert.equal(isValidIdentifier('_private'), true);
    assert.equal(isValidIdentifier('a'.repeat(128)), true);
    assert.equal(isValidIdentifier('a'.repeat(129)), false);
    assert.equal(isValidIdentifier(''), false);
    assert.equal(isValidIdentifier('9lives'), false);
    assert.equal(isValidIdentifier('a-b'), false);
  });

  it('should reject reserved words in any case', () => {
    assert.equal(isValidIdentifier('tag'), false);
    assert.equal(isValidIdentifier('Yield'), false);
    assert.equal(isValidIdentifier('tags'), true);
  });

  it('should name indexes after element and property', () => {
    assert.equal(indexName('Person', 'name'), 'Person_name_idx');
  });
});
