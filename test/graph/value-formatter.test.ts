import { describe, it } from 'node:test';
import { strict as assert } from 'node:assert';
import { escapeString, formatValue, nullValue, scalarValue } from '../../lib/graph/value-formatter.ts';

describe('formatValue', () => {
  it('should print NULL for null values', () => {
    const value = nullValue('STRING');
    assert.equal(value.isNull, true);
    assert.equal(formatValue(value), 'NULL');
  });

  it('should quote strings', () => {
    assert.equal(formatValue(scalarValue('STRING', { kind: 'string', value: 'X' })), '"X"');
    assert.equal(formatValue(scalarValue('STRING', { kind: 'string', value: '' })), '""');
  });

  it('should escape quotes, backslashes and control characters', () => {
    assert.equal(formatValue(scalarValue('STRING', { kind: 'string', value: 'say "hi"' })), '"say \\"hi\\""');
    assert.equal(formatValue(scalarValue('STRING', { kind: 'string', value: 'a\nb\tc' })), '"a\\nb\\tc"');
  });

  it('should print booleans as bare words', () => {
    assert.equal(formatValue(scalarValue('BOOL', { kind: 'bool', value: true })), 'true');
    assert.equal(formatValue(scalarValue('BOOL', { kind: 'bool', value: false })), 'false');
  });

  it('should print numbers as decimal text', () => {
    assert.equal(formatValue(scalarValue('INT64', { kind: 'int', value: -42n })), '-42');
    assert.equal(
      formatValue(scalarValue('INT64', { kind: 'int', value: 9223372036854775807n })),
      '9223372036854775807'
    );
    assert.equal(formatValue(scalarValue('DOUBLE', { kind: 'double', value: 3.5 })), '3.5');
  });

  it('should keep a fractional part on integral doubles', () => {
    assert.equal(formatValue(scalarValue('DOUBLE', { kind: 'double', value: 3 })), '3.0');
    assert.equal(formatValue(scalarValue('DOUBLE', { kind: 'double', value: -2 })), '-2.0');
  });
});

describe('escapeString', () => {
  it('should escape backslashes and carriage returns', () => {
    assert.equal(escapeString('C:\\dir'), 'C:\\\\dir');
    assert.equal(escapeString('\r'), '\\r');
  });
});
