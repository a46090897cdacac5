/**
 * Built-in Predicates
 *
 * Every factory returns the same function value on each call. The function
 * is the key the formatter registry looks the message up by, so wrapping it
 * in a new closure loses the prefab message.
 */

import type { Predicate } from '../check/types.js';
import { elementsOf, isPlainObject, sizeOf } from './helpers.js';

// ============================================================
// NULL AND BOOLEAN
// ============================================================

const IS_NULL = (value: unknown): boolean =>
  value === null || value === undefined;

const NOT_NULL = (value: unknown): boolean =>
  value !== null && value !== undefined;

const YES = (value: boolean): boolean => value === true;

const NO = (value: boolean): boolean => value === false;

/** Value is `null` or `undefined` */
export function isNull<T>(): Predicate<T> {
  return IS_NULL;
}

/** Value is neither `null` nor `undefined` */
export function notNull<T>(): Predicate<T> {
  return NOT_NULL;
}

export function yes(): Predicate<boolean> {
  return YES;
}

export function no(): Predicate<boolean> {
  return NO;
}

// ============================================================
// EMPTINESS
// ============================================================

function isEmpty(value: unknown): boolean {
  if (value === null || value === undefined) return true;
  const measurement = sizeOf(value);
  if (measurement !== undefined) return measurement.size === 0;
  if (isPlainObject(value)) return Object.keys(value).length === 0;
  return false;
}

const EMPTY = (value: unknown): boolean => isEmpty(value);

const NOT_EMPTY = (value: unknown): boolean => !isEmpty(value);

const DEEP_NOT_NULL = (value: unknown): boolean => {
  if (value === null || value === undefined) return false;
  const elements = elementsOf(value);
  if (elements === undefined) return true;
  for (const element of elements) {
    if (element === null || element === undefined) return false;
  }
  return true;
};

const DEEP_NOT_EMPTY = (value: unknown): boolean => {
  if (isEmpty(value)) return false;
  const elements = elementsOf(value);
  if (elements === undefined) return true;
  for (const element of elements) {
    if (isEmpty(element)) return false;
  }
  return true;
};

const BLANK = (value: string | null | undefined): boolean =>
  value === null || value === undefined || value.trim() === '';

const NOT_BLANK = (value: string | null | undefined): boolean =>
  !BLANK(value);

/**
 * Value is `null`, `undefined`, an empty string, an empty collection or a
 * plain object without own keys.
 */
export function empty<T>(): Predicate<T> {
  return EMPTY;
}

/** Negation of {@link empty} */
export function notEmpty<T>(): Predicate<T> {
  return NOT_EMPTY;
}

/** Value is not null and, if it is a collection, holds no null elements */
export function deepNotNull<T>(): Predicate<T> {
  return DEEP_NOT_NULL;
}

/** Value is not empty and, if it is a collection, holds no empty elements */
export function deepNotEmpty<T>(): Predicate<T> {
  return DEEP_NOT_EMPTY;
}

/** Value is null or contains whitespace only */
export function blank(): Predicate<string | null | undefined> {
  return BLANK;
}

export function notBlank(): Predicate<string | null | undefined> {
  return NOT_BLANK;
}

// ============================================================
// NUMBERS
// ============================================================

const INTEGER = (value: number): boolean => Number.isInteger(value);

const EVEN = (value: number): boolean => value % 2 === 0;

const ODD = (value: number): boolean => Math.abs(value % 2) === 1;

const POSITIVE = (value: number): boolean => value > 0;

const NEGATIVE = (value: number): boolean => value < 0;

export function integer(): Predicate<number> {
  return INTEGER;
}

export function even(): Predicate<number> {
  return EVEN;
}

export function odd(): Predicate<number> {
  return ODD;
}

export function positive(): Predicate<number> {
  return POSITIVE;
}

export function negative(): Predicate<number> {
  return NEGATIVE;
}

// ============================================================
// TYPES
// ============================================================

const ARRAY = (value: unknown): boolean => Array.isArray(value);

export function array<T>(): Predicate<T> {
  return ARRAY;
}
