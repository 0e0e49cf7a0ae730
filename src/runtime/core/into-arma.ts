/**
 * Outbound Conversion
 *
 * Turns host values into ArmaValue trees. Containers convert element by
 * element, so nested lists become nested arrays at any depth.
 */

import {
  createArray,
  createBoolean,
  createNumber,
  createString,
  formatValue,
  isArmaValue,
  NIL,
  type ArmaArray,
  type ArmaValue,
} from './values.js';

/** Host object that knows how to become an ArmaValue */
export interface IntoArma {
  toArma(): ArmaValue;
}

/**
 * Typed arrays with a lossless conversion to doubles.
 * 64-bit integer arrays are left out: values above 2^53 would lose precision.
 */
export type NumericArray =
  | Int8Array
  | Int16Array
  | Int32Array
  | Float32Array
  | Float64Array;

/**
 * Every host value `toValue` accepts.
 * `null` and `undefined` stand for an absent optional and become nil.
 */
export type IntoArmaNative =
  | ArmaValue
  | IntoArma
  | number
  | boolean
  | string
  | null
  | undefined
  | NumericArray
  | readonly IntoArmaNative[];

/** Type guard for IntoArma implementations */
export function isIntoArma(value: unknown): value is IntoArma {
  return (
    typeof value === 'object' &&
    value !== null &&
    'toArma' in value &&
    typeof value.toArma === 'function'
  );
}

function isNumericArray(value: unknown): value is NumericArray {
  return (
    value instanceof Int8Array ||
    value instanceof Int16Array ||
    value instanceof Int32Array ||
    value instanceof Float32Array ||
    value instanceof Float64Array
  );
}

function isNativeList(value: unknown): value is readonly IntoArmaNative[] {
  return Array.isArray(value);
}

function isBareValue(value: IntoArmaNative): value is ArmaValue {
  return isArmaValue(value) && !isIntoArma(value);
}

/**
 * Convert a host value to an ArmaValue.
 *
 * @example
 * toValue([1, [true, 'a'], null])
 * // array(number 1, array(boolean true, string "a"), nil)
 */
export function toValue(native: IntoArmaNative): ArmaValue {
  if (native === null || native === undefined) return NIL;
  if (typeof native === 'number') return createNumber(native);
  if (typeof native === 'boolean') return createBoolean(native);
  if (typeof native === 'string') return createString(native);
  if (isIntoArma(native)) return native.toArma();
  if (isNumericArray(native)) {
    return createArray(Array.from(native, (n) => createNumber(n)));
  }
  if (isNativeList(native)) {
    // Array.from visits holes as undefined; finished values are kept as they are
    return createArray(
      Array.from(native, (item) => (isBareValue(item) ? item : toValue(item)))
    );
  }
  if (isArmaValue(native)) return native;
  throw new TypeError(`Cannot convert ${typeof native} to an Arma value`);
}

/**
 * Convert each item with `convert`, then collect the results into an array.
 * Use for element types that are not IntoArmaNative themselves.
 */
export function toValueArray<T>(
  items: Iterable<T>,
  convert: (item: T) => IntoArmaNative
): ArmaArray {
  return createArray(Array.from(items, (item) => toValue(convert(item))));
}

/** Convert a host value and format it as an Arma literal */
export function toArmaLiteral(native: IntoArmaNative): string {
  return formatValue(toValue(native));
}
