/**
 * Built-in Relations
 *
 * Every relation declares both of its parameters; the chain API tells
 * relations from predicates by their arity. Factories return one shared
 * function value per relation.
 */

import type { Relation } from '../check/types.js';
import { deepEquals, measure } from './helpers.js';

/** Constructor accepted by {@link instanceOf} */
export type Constructor = abstract new (...args: never[]) => unknown;

/** Half-open or closed numeric range, `[from, to]` */
export type Range = readonly [from: number, to: number];

// ============================================================
// EQUALITY AND IDENTITY
// ============================================================

const EQUAL_TO = (value: unknown, target: unknown): boolean =>
  deepEquals(value, target);

const NOT_EQUAL_TO = (value: unknown, target: unknown): boolean =>
  !deepEquals(value, target);

const SAME_AS = (value: unknown, target: unknown): boolean =>
  Object.is(value, target);

const NOT_SAME_AS = (value: unknown, target: unknown): boolean =>
  !Object.is(value, target);

const NULL_OR = (value: unknown, target: unknown): boolean =>
  value === null || value === undefined || deepEquals(value, target);

/** Structural equality for arrays, plain objects and dates */
export function equalTo<T>(): Relation<T, T> {
  return EQUAL_TO;
}

export function notEqualTo<T>(): Relation<T, T> {
  return NOT_EQUAL_TO;
}

/** Reference identity (`Object.is`) */
export function sameAs<T>(): Relation<T, T> {
  return SAME_AS;
}

export function notSameAs<T>(): Relation<T, T> {
  return NOT_SAME_AS;
}

/** Value is null, or equal to the target */
export function nullOr<T>(): Relation<T | null | undefined, T> {
  return NULL_OR;
}

// ============================================================
// NUMBERS
// ============================================================

const GT = (value: number, target: number): boolean => value > target;

const GTE = (value: number, target: number): boolean => value >= target;

const LT = (value: number, target: number): boolean => value < target;

const LTE = (value: number, target: number): boolean => value <= target;

const MULTIPLE_OF = (value: number, target: number): boolean =>
  value % target === 0;

const IN_RANGE = (value: number, range: Range): boolean =>
  value >= range[0] && value < range[1];

const IN_RANGE_CLOSED = (value: number, range: Range): boolean =>
  value >= range[0] && value <= range[1];

export function gt(): Relation<number, number> {
  return GT;
}

export function gte(): Relation<number, number> {
  return GTE;
}

export function lt(): Relation<number, number> {
  return LT;
}

export function lte(): Relation<number, number> {
  return LTE;
}

export function multipleOf(): Relation<number, number> {
  return MULTIPLE_OF;
}

/** `from <= value < to` */
export function inRange(): Relation<number, Range> {
  return IN_RANGE;
}

/** `from <= value <= to` */
export function inRangeClosed(): Relation<number, Range> {
  return IN_RANGE_CLOSED;
}

// ============================================================
// SIZE
// ============================================================

// Size tests accept any subject and reject the ones without a size at run
// time, so they fit checks on values of any declared type.

const SIZE_EQUALS = (value: unknown, target: number): boolean =>
  measure(value, 'sizeEquals').size === target;

const SIZE_NOT_EQUALS = (value: unknown, target: number): boolean =>
  measure(value, 'sizeNotEquals').size !== target;

const SIZE_GT = (value: unknown, target: number): boolean =>
  measure(value, 'sizeGT').size > target;

const SIZE_GTE = (value: unknown, target: number): boolean =>
  measure(value, 'sizeGTE').size >= target;

const SIZE_LT = (value: unknown, target: number): boolean =>
  measure(value, 'sizeLT').size < target;

const SIZE_LTE = (value: unknown, target: number): boolean =>
  measure(value, 'sizeLTE').size <= target;

export function sizeEquals(): Relation<unknown, number> {
  return SIZE_EQUALS;
}

export function sizeNotEquals(): Relation<unknown, number> {
  return SIZE_NOT_EQUALS;
}

export function sizeGT(): Relation<unknown, number> {
  return SIZE_GT;
}

export function sizeGTE(): Relation<unknown, number> {
  return SIZE_GTE;
}

export function sizeLT(): Relation<unknown, number> {
  return SIZE_LT;
}

export function sizeLTE(): Relation<unknown, number> {
  return SIZE_LTE;
}

// ============================================================
// COLLECTIONS
// ============================================================

function includes(collection: Iterable<unknown>, element: unknown): boolean {
  if (typeof collection === 'string') {
    return typeof element === 'string' && collection.includes(element);
  }
  if (collection instanceof Set) {
    return collection.has(element);
  }
  for (const item of collection) {
    if (deepEquals(item, element)) return true;
  }
  return false;
}

function holdsKey(value: object, key: unknown): boolean {
  if (value instanceof Map) {
    return value.has(key);
  }
  if (
    typeof key === 'string' ||
    typeof key === 'number' ||
    typeof key === 'symbol'
  ) {
    return Object.prototype.hasOwnProperty.call(value, key);
  }
  return false;
}

const CONTAINS = (value: Iterable<unknown>, element: unknown): boolean =>
  includes(value, element);

const NOT_CONTAINS = (value: Iterable<unknown>, element: unknown): boolean =>
  !includes(value, element);

const ELEMENT_OF = (value: unknown, collection: Iterable<unknown>): boolean =>
  includes(collection, value);

const NOT_ELEMENT_OF = (
  value: unknown,
  collection: Iterable<unknown>
): boolean => !includes(collection, value);

const HAS_KEY = (value: object, key: unknown): boolean => holdsKey(value, key);

const NOT_HAS_KEY = (value: object, key: unknown): boolean =>
  !holdsKey(value, key);

/** Collection holds an element equal to the target */
export function contains<E>(): Relation<Iterable<E>, E> {
  return CONTAINS;
}

export function notContains<E>(): Relation<Iterable<E>, E> {
  return NOT_CONTAINS;
}

/** Value is equal to an element of the target collection */
export function elementOf<E>(): Relation<E, Iterable<E>> {
  return ELEMENT_OF;
}

export function notElementOf<E>(): Relation<E, Iterable<E>> {
  return NOT_ELEMENT_OF;
}

/** Map has the key, or object has it as an own property */
export function hasKey<K>(): Relation<object, K> {
  return HAS_KEY;
}

export function notHasKey<K>(): Relation<object, K> {
  return NOT_HAS_KEY;
}

// ============================================================
// TYPES
// ============================================================

const INSTANCE_OF = (value: unknown, type: Constructor): boolean =>
  value instanceof type;

export function instanceOf<T>(): Relation<T, Constructor> {
  return INSTANCE_OF;
}

// ============================================================
// STRINGS
// ============================================================

const STARTS_WITH = (value: string, target: string): boolean =>
  value.startsWith(target);

const ENDS_WITH = (value: string, target: string): boolean =>
  value.endsWith(target);

const HAS_SUBSTR = (value: string, target: string): boolean =>
  value.includes(target);

const EQUALS_IGNORE_CASE = (value: string, target: string): boolean =>
  value.toLowerCase() === target.toLowerCase();

// search() ignores the global flag and lastIndex
const MATCHES = (value: string, pattern: RegExp): boolean =>
  value.search(pattern) !== -1;

export function startsWith(): Relation<string, string> {
  return STARTS_WITH;
}

export function endsWith(): Relation<string, string> {
  return ENDS_WITH;
}

export function hasSubstr(): Relation<string, string> {
  return HAS_SUBSTR;
}

export function equalsIgnoreCase(): Relation<string, string> {
  return EQUALS_IGNORE_CASE;
}

/** Pattern matches somewhere in the value */
export function matches(): Relation<string, RegExp> {
  return MATCHES;
}
