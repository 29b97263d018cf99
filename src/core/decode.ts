/**
 * Permissive value decoding
 *
 * Int and float tokens decode from their longest numeric prefix, and anything
 * unparseable becomes zero. Rejecting malformed numbers is left to validators.
 */

import {
  type ArgumentValue,
  type ValuedArgumentType,
  floatValue,
  intValue,
  stringValue,
} from './argument-types';

const LEADING_WHITESPACE = '^[\\t\\n\\v\\f\\r ]*';

const INTEGER_PREFIX = new RegExp(`${LEADING_WHITESPACE}([+-]?\\d+)`);

const FLOAT_PREFIX = new RegExp(
  `${LEADING_WHITESPACE}([+-]?(?:(?:\\d+\\.?\\d*|\\.\\d+)(?:e[+-]?\\d+)?|inf(?:inity)?|nan))`,
  'i'
);

/**
 * Decode the leading decimal integer of `raw`, clamped to 32 bits; 0 if none
 */
export function decodeInt(raw: string): number {
  const match = INTEGER_PREFIX.exec(raw);
  if (!match) {
    return 0;
  }
  return intValue(Number.parseInt(match[1], 10)).value;
}

/**
 * Decode the leading decimal float of `raw` at single precision; 0 if none.
 * Hexadecimal floats are not recognised.
 */
export function decodeFloat(raw: string): number {
  const match = FLOAT_PREFIX.exec(raw);
  if (!match) {
    return 0;
  }

  const text = match[1].toLowerCase();
  const negative = text.startsWith('-');
  const unsigned = text.replace(/^[+-]/, '');

  if (unsigned.startsWith('inf')) {
    return negative ? -Infinity : Infinity;
  }
  if (unsigned === 'nan') {
    return NaN;
  }
  return floatValue(Number(text)).value;
}

/**
 * Turn the token following a valued option into its tagged value
 */
export function decodeValue(type: ValuedArgumentType, raw: string): ArgumentValue {
  switch (type) {
    case 'string':
      return stringValue(raw);
    case 'int':
      return intValue(decodeInt(raw));
    case 'float':
      return floatValue(decodeFloat(raw));
  }
}
