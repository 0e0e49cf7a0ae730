/**
 * Arma Runtime Tests: Value Model
 * Tests for predicates, accessors, emptiness, equality and ordering
 */

import { describe, expect, it } from 'vitest';
import {
  asArray,
  asBoolean,
  asNull,
  asNumber,
  asString,
  compareValues,
  createArray,
  createBoolean,
  createNil,
  createNumber,
  createString,
  deepEquals,
  inferType,
  isArmaValue,
  isArray,
  isBoolean,
  isEmpty,
  isNil,
  isNumber,
  isString,
  NIL,
  type ArmaValue,
} from '../../src/index.js';

const SAMPLES: readonly ArmaValue[] = [
  createNil(),
  createNumber(54),
  createBoolean(false),
  createString('hello'),
  createArray([createString('hello')]),
];

const PREDICATES = [isNil, isNumber, isBoolean, isString, isArray] as const;

const ACCESSORS = [asNull, asNumber, asBoolean, asString, asArray] as const;

describe('Arma Runtime: Value Model', () => {
  describe('predicates', () => {
    it('has exactly one true predicate per variant', () => {
      for (const value of SAMPLES) {
        const matches = PREDICATES.filter((predicate) => predicate(value));
        expect(matches).toHaveLength(1);
      }
    });

    it('pairs each predicate with a present accessor', () => {
      SAMPLES.forEach((value, variant) => {
        ACCESSORS.forEach((accessor, i) => {
          if (i === variant) {
            expect(accessor(value)).not.toBeUndefined();
          } else {
            expect(accessor(value)).toBeUndefined();
          }
        });
      });
    });

    it('recognizes nil', () => {
      expect(isNil(NIL)).toBe(true);
      expect(isNil(createBoolean(false))).toBe(false);
    });

    it('recognizes an empty array as an array', () => {
      expect(isArray(createArray([]))).toBe(true);
      expect(isArray(createBoolean(false))).toBe(false);
    });
  });

  describe('accessors', () => {
    it('returns null for nil', () => {
      expect(asNull(createNil())).toBeNull();
    });

    it('returns the number payload', () => {
      expect(asNumber(createNumber(54))).toBe(54);
    });

    it('returns the boolean payload', () => {
      expect(asBoolean(createBoolean(true))).toBe(true);
    });

    it('returns the string payload', () => {
      expect(asString(createString('hello world'))).toBe('hello world');
    });

    it('returns the array elements', () => {
      const items = asArray(createArray([createString('hello')]));
      expect(items).toHaveLength(1);
      expect(items?.[0]).toEqual(createString('hello'));
    });

    it('returns undefined for a mismatched variant', () => {
      expect(asNumber(createString('54'))).toBeUndefined();
      expect(asString(createNumber(54))).toBeUndefined();
      expect(asNull(createBoolean(false))).toBeUndefined();
    });
  });

  describe('isEmpty', () => {
    it('treats nil as empty', () => {
      expect(isEmpty(NIL)).toBe(true);
    });

    it('treats zero as the only empty number', () => {
      expect(isEmpty(createNumber(0))).toBe(true);
      expect(isEmpty(createNumber(-0))).toBe(true);
      expect(isEmpty(createNumber(55))).toBe(false);
      expect(isEmpty(createNumber(-0.5))).toBe(false);
      expect(isEmpty(createNumber(Number.NaN))).toBe(false);
    });

    it('treats false as empty and true as not', () => {
      expect(isEmpty(createBoolean(false))).toBe(true);
      expect(isEmpty(createBoolean(true))).toBe(false);
    });

    it('checks string length', () => {
      expect(isEmpty(createString(''))).toBe(true);
      expect(isEmpty(createString('test'))).toBe(false);
      expect(isEmpty(createString(' '))).toBe(false);
    });

    it('checks array length', () => {
      expect(isEmpty(createArray([]))).toBe(true);
      expect(isEmpty(createArray([createBoolean(false)]))).toBe(false);
    });
  });

  describe('immutability', () => {
    it('freezes constructed values', () => {
      expect(Object.isFrozen(createNumber(1))).toBe(true);
      expect(Object.isFrozen(createArray([]).value)).toBe(true);
    });

    it('copies the items passed to createArray', () => {
      const items: ArmaValue[] = [createNumber(1)];
      const array = createArray(items);
      items.push(createNumber(2));
      expect(array.value).toHaveLength(1);
    });
  });

  describe('inferType and isArmaValue', () => {
    it('infers the type name of each variant', () => {
      expect(SAMPLES.map(inferType)).toEqual([
        'nil',
        'number',
        'boolean',
        'string',
        'array',
      ]);
    });

    it('accepts constructed values', () => {
      for (const value of SAMPLES) {
        expect(isArmaValue(value)).toBe(true);
      }
    });

    it('rejects other shapes', () => {
      expect(isArmaValue(null)).toBe(false);
      expect(isArmaValue(42)).toBe(false);
      expect(isArmaValue({ type: 'number', value: '42' })).toBe(false);
      expect(isArmaValue({ type: 'object', value: {} })).toBe(false);
      expect(isArmaValue({ type: 'array' })).toBe(false);
    });
  });

  describe('deepEquals', () => {
    it('compares nested arrays structurally', () => {
      const a = createArray([createNumber(1), createArray([createString('x')])]);
      const b = createArray([createNumber(1), createArray([createString('x')])]);
      expect(deepEquals(a, b)).toBe(true);
    });

    it('distinguishes variants with similar payloads', () => {
      expect(deepEquals(createString('1'), createNumber(1))).toBe(false);
      expect(deepEquals(createBoolean(false), NIL)).toBe(false);
    });

    it('distinguishes arrays of different length', () => {
      const a = createArray([createNumber(1)]);
      const b = createArray([createNumber(1), createNumber(1)]);
      expect(deepEquals(a, b)).toBe(false);
    });

    it('never equates NaN with itself', () => {
      const nan = createNumber(Number.NaN);
      expect(deepEquals(nan, nan)).toBe(false);
      expect(deepEquals(createArray([nan]), createArray([nan]))).toBe(false);
    });
  });

  describe('compareValues', () => {
    it('orders variants by rank', () => {
      expect(compareValues(NIL, createNumber(1))).toBe(-1);
      expect(compareValues(createNumber(99), createArray([]))).toBe(-1);
      expect(compareValues(createArray([]), createBoolean(false))).toBe(-1);
      expect(compareValues(createString(''), createBoolean(true))).toBe(1);
    });

    it('orders payloads within a variant', () => {
      expect(compareValues(createNumber(1), createNumber(2))).toBe(-1);
      expect(compareValues(createBoolean(true), createBoolean(false))).toBe(1);
      expect(compareValues(createString('b'), createString('a'))).toBe(1);
      expect(compareValues(NIL, NIL)).toBe(0);
    });

    it('orders strings by code point', () => {
      expect(compareValues(createString('\uFFFF'), createString('\u{10000}'))).toBe(-1);
      expect(compareValues(createString('\u{10000}'), createString('\uFFFF'))).toBe(1);
      expect(compareValues(createString('ab'), createString('abc'))).toBe(-1);
      expect(compareValues(createString('\u{1F600}'), createString('\u{1F600}'))).toBe(0);
    });

    it('compares arrays element-wise, then by length', () => {
      const short = createArray([createNumber(1)]);
      const long = createArray([createNumber(1), createNumber(0)]);
      const larger = createArray([createNumber(2)]);
      expect(compareValues(short, long)).toBe(-1);
      expect(compareValues(larger, long)).toBe(1);
      expect(compareValues(long, long)).toBe(0);
    });

    it('leaves NaN unordered', () => {
      const nan = createNumber(Number.NaN);
      expect(compareValues(nan, createNumber(1))).toBeUndefined();
      expect(compareValues(createArray([nan]), createArray([nan]))).toBeUndefined();
    });
  });
});
