/**
 * Arma Value Types and Utilities
 *
 * Core value types exchanged with the Arma scripting runtime.
 * Public API for host applications.
 */

import type { ArmaTypeName } from '../../value-types.js';

/** Absence of a value (`null` literal) */
export interface ArmaNil {
  readonly type: 'nil';
}

/** Numeric literal; always an IEEE double */
export interface ArmaNumber {
  readonly type: 'number';
  readonly value: number;
}

export interface ArmaBoolean {
  readonly type: 'boolean';
  readonly value: boolean;
}

/** String literal; payload is raw text, escaped only when formatted */
export interface ArmaString {
  readonly type: 'string';
  readonly value: string;
}

export interface ArmaArray {
  readonly type: 'array';
  readonly value: readonly ArmaValue[];
}

/** Any value that can be handed to the Arma runtime as a literal */
export type ArmaValue =
  | ArmaNil
  | ArmaNumber
  | ArmaBoolean
  | ArmaString
  | ArmaArray;

// ============================================================
// CONSTRUCTORS
// ============================================================

/** Shared nil value */
export const NIL: ArmaNil = Object.freeze({ type: 'nil' });

export function createNil(): ArmaNil {
  return NIL;
}

export function createNumber(value: number): ArmaNumber {
  return Object.freeze({ type: 'number', value });
}

export function createBoolean(value: boolean): ArmaBoolean {
  return Object.freeze({ type: 'boolean', value });
}

export function createString(value: string): ArmaString {
  return Object.freeze({ type: 'string', value });
}

/** Create an array value. The element list is copied, so later edits to `items` are not observed. */
export function createArray(items: readonly ArmaValue[]): ArmaArray {
  return Object.freeze({ type: 'array', value: Object.freeze([...items]) });
}

const VARIANTS: readonly ArmaTypeName[] = [
  'nil',
  'number',
  'boolean',
  'string',
  'array',
];

/**
 * Type guard for ArmaValue.
 * Checks the discriminant and payload shape one level deep.
 */
export function isArmaValue(value: unknown): value is ArmaValue {
  if (typeof value !== 'object' || value === null || !('type' in value)) {
    return false;
  }
  const tag = value.type;
  if (typeof tag !== 'string') return false;
  if (!(VARIANTS as readonly string[]).includes(tag)) return false;
  if (tag === 'nil') return true;
  if (!('value' in value)) return false;
  switch (tag) {
    case 'number':
      return typeof value.value === 'number';
    case 'boolean':
      return typeof value.value === 'boolean';
    case 'string':
      return typeof value.value === 'string';
    default:
      return Array.isArray(value.value);
  }
}

// ============================================================
// PREDICATES AND ACCESSORS
// ============================================================

export function isNil(value: ArmaValue): value is ArmaNil {
  return value.type === 'nil';
}

export function isNumber(value: ArmaValue): value is ArmaNumber {
  return value.type === 'number';
}

export function isBoolean(value: ArmaValue): value is ArmaBoolean {
  return value.type === 'boolean';
}

export function isString(value: ArmaValue): value is ArmaString {
  return value.type === 'string';
}

export function isArray(value: ArmaValue): value is ArmaArray {
  return value.type === 'array';
}

/** Returns `null` for nil, `undefined` for every other variant */
export function asNull(value: ArmaValue): null | undefined {
  return value.type === 'nil' ? null : undefined;
}

export function asNumber(value: ArmaValue): number | undefined {
  return value.type === 'number' ? value.value : undefined;
}

export function asBoolean(value: ArmaValue): boolean | undefined {
  return value.type === 'boolean' ? value.value : undefined;
}

export function asString(value: ArmaValue): string | undefined {
  return value.type === 'string' ? value.value : undefined;
}

export function asArray(value: ArmaValue): readonly ArmaValue[] | undefined {
  return value.type === 'array' ? value.value : undefined;
}

/** Infer the Arma type name of a value */
export function inferType(value: ArmaValue): ArmaTypeName {
  return value.type;
}

/**
 * Check if a value is empty in Arma terms.
 * - nil: always
 * - number: exactly zero
 * - boolean: false
 * - string / array: zero length
 */
export function isEmpty(value: ArmaValue): boolean {
  switch (value.type) {
    case 'nil':
      return true;
    case 'number':
      return value.value === 0;
    case 'boolean':
      return !value.value;
    case 'string':
      return value.value.length === 0;
    case 'array':
      return value.value.length === 0;
  }
}

// ============================================================
// FORMATTING
// ============================================================

/** Quote a string the way the runtime does: `"` doubled, no other escapes */
export function quoteString(text: string): string {
  return `"${text.replaceAll('"', '""')}"`;
}

const EXPONENT_FORM = /^(-?)([0-9]+)(?:\.([0-9]+))?e([+-][0-9]+)$/;

/**
 * Format a number in plain decimal notation.
 * Uses the shortest round-trip digits, never an exponent; keeps the sign of -0.
 */
export function formatNumber(value: number): string {
  if (Number.isNaN(value)) return 'NaN';
  if (value === Infinity) return 'inf';
  if (value === -Infinity) return '-inf';
  if (Object.is(value, -0)) return '-0';

  const text = String(value);
  const match = EXPONENT_FORM.exec(text);
  if (!match) return text;

  const [, sign = '', whole = '', fraction = '', exponent = '0'] = match;
  const digits = whole + fraction;
  const point = whole.length + Number(exponent);
  if (point <= 0) return `${sign}0.${'0'.repeat(-point)}${digits}`;
  if (point >= digits.length) {
    return `${sign}${digits}${'0'.repeat(point - digits.length)}`;
  }
  return `${sign}${digits.slice(0, point)}.${digits.slice(point)}`;
}

/**
 * Format a value as an Arma literal.
 *
 * @example
 * formatValue(createArray([createString('a'), createNumber(1), NIL]))
 * // Returns: '["a",1,null]'
 */
export function formatValue(value: ArmaValue): string {
  switch (value.type) {
    case 'nil':
      return 'null';
    case 'number':
      return formatNumber(value.value);
    case 'boolean':
      return value.value ? 'true' : 'false';
    case 'string':
      return quoteString(value.value);
    case 'array':
      return `[${value.value.map(formatValue).join(',')}]`;
  }
}

// ============================================================
// EQUALITY AND ORDERING
// ============================================================

/**
 * Deep structural equality.
 * Numbers compare with `===`, so NaN never equals itself.
 */
export function deepEquals(a: ArmaValue, b: ArmaValue): boolean {
  switch (a.type) {
    case 'nil':
      return b.type === 'nil';
    case 'number':
      return b.type === 'number' && a.value === b.value;
    case 'boolean':
      return b.type === 'boolean' && a.value === b.value;
    case 'string':
      return b.type === 'string' && a.value === b.value;
    case 'array': {
      if (b.type !== 'array') return false;
      const others = b.value;
      if (a.value.length !== others.length) return false;
      return a.value.every((item, i) => {
        const other = others[i];
        return other !== undefined && deepEquals(item, other);
      });
    }
  }
}

/** Result of a partial comparison; `undefined` when the values are unordered */
export type Ordering = -1 | 0 | 1;

/** Variant rank used when comparing values of different types */
const VARIANT_RANK: Readonly<Record<ArmaTypeName, number>> = {
  nil: 0,
  number: 1,
  array: 2,
  boolean: 3,
  string: 4,
};

function compareScalars(
  a: number,
  b: number
): Ordering | undefined {
  if (a < b) return -1;
  if (a > b) return 1;
  if (a === b) return 0;
  return undefined;
}

/** Compare strings by Unicode code point, the order of their UTF-8 bytes */
function compareCodePoints(a: string, b: string): Ordering {
  let i = 0;
  let j = 0;
  while (i < a.length && j < b.length) {
    const left = a.codePointAt(i) ?? 0;
    const right = b.codePointAt(j) ?? 0;
    if (left !== right) return left < right ? -1 : 1;
    i += left > 0xffff ? 2 : 1;
    j += right > 0xffff ? 2 : 1;
  }
  const leftDone = i >= a.length;
  const rightDone = j >= b.length;
  if (leftDone && rightDone) return 0;
  return leftDone ? -1 : 1;
}

/**
 * Structural partial ordering.
 *
 * Different variants order by rank (nil, number, array, boolean, string).
 * Arrays compare element-wise, then by length. Any comparison that reaches
 * a NaN payload is unordered.
 */
export function compareValues(
  a: ArmaValue,
  b: ArmaValue
): Ordering | undefined {
  if (a.type !== b.type) {
    return VARIANT_RANK[a.type] < VARIANT_RANK[b.type] ? -1 : 1;
  }
  switch (a.type) {
    case 'nil':
      return 0;
    case 'number':
      return b.type === 'number' ? compareScalars(a.value, b.value) : undefined;
    case 'boolean':
      return b.type === 'boolean'
        ? compareScalars(Number(a.value), Number(b.value))
        : undefined;
    case 'string':
      return b.type === 'string'
        ? compareCodePoints(a.value, b.value)
        : undefined;
    case 'array': {
      if (b.type !== 'array') return undefined;
      const shared = Math.min(a.value.length, b.value.length);
      for (let i = 0; i < shared; i++) {
        const left = a.value[i];
        const right = b.value[i];
        if (left === undefined || right === undefined) return undefined;
        const ordering = compareValues(left, right);
        if (ordering !== 0) return ordering;
      }
      return compareScalars(a.value.length, b.value.length);
    }
  }
}
