import { describe, it, beforeEach } from 'node:test';
import { strict as assert } from 'node:assert';
import { TransformEngine } from '../../lib/transform/transform-engine.ts';
import { coerceToNumber, coerceToString, stringResult, type TransformValue } from '../../lib/transform/types.ts';
import { TransformError } from '../../lib/errors.ts';
import type { Scalar } from '../../lib/graph/value-formatter.ts';

function input(value: Scalar): TransformValue {
  return { value, sourceType: value.kind, targetType: 'STRING' };
}

const str = (value: string) => input({ kind: 'string', value });

function isTransformError(message: string, sourceValue?: string) {
  return (err: unknown) =>
    err instanceof TransformError && err.message === message && err.sourceValue === sourceValue;
}

describe('TransformEngine', () => {
  let engine: TransformEngine;

  beforeEach(() => {
    engine = new TransformEngine();
  });

  it('should register the built-in transforms', () => {
    assert.deepEqual(engine.names().sort(), [
      'array_join',
      'price_normalize',
      'string_normalize',
      'time_format',
      'to_boolean',
    ]);
  });

  it('should fail for an unknown transform', () => {
    assert.throws(() => engine.apply('nope', str('x')), isTransformError('Transform not found: nope'));
  });

  it('should register custom transforms per engine', () => {
    engine.register('upper', (value) => stringResult(coerceToString(value).toUpperCase()));

    assert.equal(engine.has('upper'), true);
    assert.deepEqual(engine.apply('upper', str('abc')).value, { kind: 'string', value: 'ABC' });
    assert.equal(new TransformEngine().has('upper'), false);
  });

  it('should pass params and rules to the function', () => {
    engine.register('describe', (_value, params, rules) =>
      stringResult(`${params['prefix'] ?? ''}${rules.map((r) => r.name).join('+')}`)
    );
    const rule = { name: 'r1', type: 'BOOL', condition: '', value: '', field: '', mappings: {} };

    assert.deepEqual(engine.apply('describe', str(''), { prefix: '>' }, [rule]).value, {
      kind: 'string',
      value: '>r1',
    });
  });

  describe('to_boolean', () => {
    it('should accept true and false words in any case', () => {
      assert.deepEqual(engine.apply('to_boolean', str('TRUE')), {
        value: { kind: 'bool', value: true },
        sourceType: 'STRING',
        targetType: 'BOOL',
      });
      assert.deepEqual(engine.apply('to_boolean', str('No')).value, { kind: 'bool', value: false });
      assert.deepEqual(engine.apply('to_boolean', str('yes')).value, { kind: 'bool', value: true });
      assert.deepEqual(engine.apply('to_boolean', input({ kind: 'int', value: 0n })).value, {
        kind: 'bool',
        value: false,
      });
    });

    it('should reject other values', () => {
      assert.throws(() => engine.apply('to_boolean', str('maybe')), isTransformError('Invalid boolean value', 'maybe'));
    });
  });

  describe('price_normalize', () => {
    it('should keep digits only', () => {
      assert.deepEqual(engine.apply('price_normalize', str('$1,234.56')), {
        value: { kind: 'int', value: 123456n },
        sourceType: 'STRING',
        targetType: 'INT64',
      });
    });

    it('should fail without digits', () => {
      assert.throws(() => engine.apply('price_normalize', str('free')), isTransformError('Error parsing price: no digits', 'free'));
    });

    it('should keep every digit up to the int64 limit', () => {
      assert.deepEqual(engine.apply('price_normalize', str('9,223,372,036,854,775,807')).value, {
        kind: 'int',
        value: 9223372036854775807n,
      });
      assert.throws(
        () => engine.apply('price_normalize', str('9223372036854775808')),
        isTransformError('Error parsing price: out of range', '9223372036854775808')
      );
    });
  });

  describe('string_normalize', () => {
    it('should trim and collapse whitespace', () => {
      assert.deepEqual(engine.apply('string_normalize', str('  a   b  ')).value, { kind: 'string', value: 'a b' });
      assert.deepEqual(engine.apply('string_normalize', str('\ta\n\nb')).value, { kind: 'string', value: 'a b' });
    });
  });

  describe('array_join', () => {
    it('should trim the parts around the default delimiter', () => {
      assert.deepEqual(engine.apply('array_join', str(' a , b,c ')).value, { kind: 'string', value: 'a,b,c' });
    });

    it('should use the delimiter param', () => {
      assert.deepEqual(engine.apply('array_join', str('x | y'), { delimiter: '|' }).value, {
        kind: 'string',
        value: 'x|y',
      });
    });
  });

  describe('time_format', () => {
    it('should reformat to a timestamp', () => {
      assert.deepEqual(engine.apply('time_format', str('05/03/2024'), { format: '%d/%m/%Y' }), {
        value: { kind: 'string', value: '2024-03-05 00:00:00' },
        sourceType: 'STRING',
        targetType: 'TIMESTAMP',
      });
    });

    it('should require a format', () => {
      assert.throws(() => engine.apply('time_format', str('2024')), isTransformError('Missing required parameter: format'));
    });

    it('should fail on unparsable input', () => {
      assert.throws(
        () => engine.apply('time_format', str('yesterday'), { format: '%Y-%m-%d' }),
        isTransformError('Failed to parse time string', 'yesterday')
      );
    });
  });
});

describe('coercion', () => {
  it('should stringify numbers and booleans', () => {
    assert.equal(coerceToString(input({ kind: 'double', value: 2.5 })), '2.5');
    assert.equal(coerceToString(input({ kind: 'bool', value: false })), 'false');
    assert.equal(coerceToString(str('as is')), 'as is');
  });

  it('should parse numeric strings', () => {
    assert.equal(coerceToNumber(str(' 3.5 ')), 3.5);
    assert.equal(coerceToNumber(input({ kind: 'int', value: 7n })), 7);
  });

  it('should fail when no conversion applies', () => {
    assert.throws(() => coerceToNumber(str('abc')), isTransformError('Cannot convert value to requested type', 'abc'));
    assert.throws(() => coerceToNumber(str('')), isTransformError('Cannot convert value to requested type', ''));
    assert.throws(
      () => coerceToNumber(input({ kind: 'bool', value: true })),
      isTransformError('Cannot convert value to requested type', 'true')
    );
  });
});
