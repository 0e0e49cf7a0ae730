/**
 * Inbound Conversion
 *
 * Parses raw argument text handed over by the Arma runtime into host
 * scalars. Failures are returned as data; only `fromArmaOrThrow` throws.
 */

import { ConversionError } from '../../error-classes.js';
import { ERROR_REGISTRY, renderMessage } from '../../error-registry.js';
import type { ArmaScalarTypeName } from '../../value-types.js';
import { roundToFloat32 } from './float32.js';

/** Outcome of parsing one argument */
export type FromArmaResult<T> =
  | { readonly success: true; readonly value: T }
  | { readonly success: false; readonly error: string; readonly errorId: string };

/** Parser for one host scalar type */
export interface FromArma<T> {
  readonly typeName: ArmaScalarTypeName;
  fromArma(text: string): FromArmaResult<T>;
}

/** Value type produced by a parser */
export type FromArmaOutput<P> = P extends FromArma<infer T> ? T : never;

function ok<T>(value: T): FromArmaResult<T> {
  return { success: true, value };
}

function fail<T>(
  errorId: string,
  context: Record<string, unknown> = {}
): FromArmaResult<T> {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  return {
    success: false,
    error: renderMessage(definition.messageTemplate, context),
    errorId,
  };
}

// ============================================================
// INTEGERS
// ============================================================

const INTEGER_PATTERN = /^[+-]?[0-9]+$/;

function integerParser<T>(
  typeName: ArmaScalarTypeName,
  min: bigint,
  max: bigint,
  convert: (value: bigint) => T
): FromArma<T> {
  const signed = min < 0n;
  return {
    typeName,
    fromArma(text) {
      if (text === '') return fail('ARMA-C001', { kind: 'integer' });
      if (!INTEGER_PATTERN.test(text)) return fail('ARMA-C002');
      // Unsigned types have no minus sign, not even for zero
      if (!signed && text.startsWith('-')) return fail('ARMA-C002');

      const value = BigInt(text);
      if (value > max) return fail('ARMA-C003');
      if (value < min) return fail('ARMA-C004');
      return ok(convert(value));
    },
  };
}

// ============================================================
// FLOATS
// ============================================================

const FLOAT_PATTERN =
  /^[+-]?(?:inf|infinity|nan|(?:[0-9]+\.?[0-9]*|\.[0-9]+)(?:e[+-]?[0-9]+)?)$/i;

function parseDouble(text: string): FromArmaResult<number> {
  if (text === '') return fail('ARMA-C001', { kind: 'float' });
  if (!FLOAT_PATTERN.test(text)) return fail('ARMA-C005');

  const negative = text.startsWith('-');
  const body = text.replace(/^[+-]/, '').toLowerCase();
  if (body === 'nan') return ok(Number.NaN);
  if (body === 'inf' || body === 'infinity') {
    return ok(negative ? -Infinity : Infinity);
  }
  return ok(Number(text));
}

function floatParser(
  typeName: ArmaScalarTypeName,
  round: (text: string, value: number) => number
): FromArma<number> {
  return {
    typeName,
    fromArma(text) {
      const result = parseDouble(text);
      return result.success ? ok(round(text, result.value)) : result;
    },
  };
}

// ============================================================
// BOOL AND STRING
// ============================================================

const boolParser: FromArma<boolean> = {
  typeName: 'bool',
  fromArma(text) {
    if (text === 'true') return ok(true);
    if (text === 'false') return ok(false);
    return fail('ARMA-C006');
  },
};

const stringParser: FromArma<string> = {
  typeName: 'string',
  fromArma(text) {
    return ok(text);
  },
};

// ============================================================
// PUBLIC API
// ============================================================

/**
 * Built-in parsers for every supported scalar type.
 * 64-bit integers produce bigint; other numeric types produce number.
 */
export const ARMA_PARSERS = {
  i8: integerParser('i8', -0x80n, 0x7fn, Number),
  i16: integerParser('i16', -0x8000n, 0x7fffn, Number),
  i32: integerParser('i32', -0x8000_0000n, 0x7fff_ffffn, Number),
  i64: integerParser(
    'i64',
    -0x8000_0000_0000_0000n,
    0x7fff_ffff_ffff_ffffn,
    (value) => value
  ),
  u8: integerParser('u8', 0n, 0xffn, Number),
  u16: integerParser('u16', 0n, 0xffffn, Number),
  u32: integerParser('u32', 0n, 0xffff_ffffn, Number),
  u64: integerParser('u64', 0n, 0xffff_ffff_ffff_ffffn, (value) => value),
  f32: floatParser('f32', roundToFloat32),
  f64: floatParser('f64', (_text, value) => value),
  bool: boolParser,
  string: stringParser,
} as const;

/** Parse `text` with `parser` */
export function fromArma<T>(
  parser: FromArma<T>,
  text: string
): FromArmaResult<T> {
  return parser.fromArma(text);
}

/**
 * Parse `text` with `parser`.
 * @throws ConversionError when the text does not match the parser's grammar
 */
export function fromArmaOrThrow<T>(parser: FromArma<T>, text: string): T {
  const result = parser.fromArma(text);
  if (!result.success) {
    throw new ConversionError(result.errorId, result.error, {
      input: text,
      typeName: parser.typeName,
    });
  }
  return result.value;
}
