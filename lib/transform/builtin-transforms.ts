import { TransformError } from '../errors.ts';
import { formatTimestamp, parseTime } from './time-format.ts';
import { coerceToString, stringResult, type TransformFunction } from './types.ts';

const INT64_MAX = 9223372036854775807n;

const TRUE_WORDS = new Set(['true', '1', 'yes']);
const FALSE_WORDS = new Set(['false', '0', 'no']);

export const timeFormat: TransformFunction = (input, params) => {
  const format = params['format'];
  if (format === undefined) {
    throw new TransformError('Missing required parameter: format');
  }

  const text = coerceToString(input);
  const fields = parseTime(text, format);
  if (!fields) {
    throw new TransformError('Failed to parse time string', text);
  }
  return stringResult(formatTimestamp(fields), 'TIMESTAMP');
};

/** Keeps the digits only: `"$1,234.56"` becomes 123456. */
export const priceNormalize: TransformFunction = (input) => {
  const text = coerceToString(input);
  const digits = text.replace(/\D/g, '');
  if (digits === '') {
    throw new TransformError('Error parsing price: no digits', text);
  }
  const price = BigInt(digits);
  if (price > INT64_MAX) {
    throw new TransformError('Error parsing price: out of range', text);
  }
  return { value: { kind: 'int', value: price }, sourceType: 'STRING', targetType: 'INT64' };
};

export const stringNormalize: TransformFunction = (input) =>
  stringResult(coerceToString(input).trim().replace(/\s+/g, ' '));

export const arrayJoin: TransformFunction = (input, params) => {
  const delimiter = params['delimiter'] ?? ',';
  const text = coerceToString(input);
  const parts = delimiter === '' ? [text] : text.split(delimiter);
  return stringResult(parts.map((part) => part.trim()).join(delimiter));
};

export const toBoolean: TransformFunction = (input) => {
  const text = coerceToString(input);
  const lower = text.toLowerCase();
  if (!TRUE_WORDS.has(lower) && !FALSE_WORDS.has(lower)) {
    throw new TransformError('Invalid boolean value', text);
  }
  return { value: { kind: 'bool', value: TRUE_WORDS.has(lower) }, sourceType: 'STRING', targetType: 'BOOL' };
};

export const BUILTIN_TRANSFORMS: Readonly<Record<string, TransformFunction>> = {
  time_format: timeFormat,
  price_normalize: priceNormalize,
  string_normalize: stringNormalize,
  array_join: arrayJoin,
  to_boolean: toBoolean,
};
