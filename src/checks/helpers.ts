/**
 * Shared helpers for the built-in tests
 */

import { createError } from '../error-classes.js';
import type { Measurement } from '../message/phrasing.js';
import { simpleTypeName } from '../message/type-names.js';

// ============================================================
// SIZE
// ============================================================

/** Size of a string, array, typed array, Map or Set; undefined otherwise */
export function sizeOf(value: unknown): Measurement | undefined {
  if (typeof value === 'string' || Array.isArray(value)) {
    return { property: 'length', size: value.length };
  }
  if (value instanceof Map || value instanceof Set) {
    return { property: 'size', size: value.size };
  }
  if (ArrayBuffer.isView(value) && !(value instanceof DataView)) {
    const length: unknown = Reflect.get(value, 'length');
    if (typeof length === 'number') {
      return { property: 'length', size: length };
    }
  }
  return undefined;
}

/**
 * Size of a value that a size test was applied to.
 *
 * @throws UsageError (VOUCH-U002) when the value has no size
 */
export function measure(value: unknown, test: string): Measurement {
  const measurement = sizeOf(value);
  if (measurement === undefined) {
    throw createError('VOUCH-U002', {
      test: `${test}()`,
      type: simpleTypeName(value) ?? String(value),
    });
  }
  return measurement;
}

// ============================================================
// ELEMENTS
// ============================================================

/**
 * Values held by a collection: array and Set elements, Map values, plain
 * object property values. Undefined for anything else.
 */
export function elementsOf(value: unknown): Iterable<unknown> | undefined {
  if (Array.isArray(value) || value instanceof Set) {
    return value;
  }
  if (value instanceof Map) {
    return value.values();
  }
  if (isPlainObject(value)) {
    return Object.values(value);
  }
  return undefined;
}

export function isPlainObject(
  value: unknown
): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

// ============================================================
// EQUALITY
// ============================================================

/**
 * Structural equality for primitives, arrays, plain objects and dates.
 * Other objects compare by reference.
 */
export function deepEquals(a: unknown, b: unknown): boolean {
  if (Object.is(a, b)) return true;
  if (typeof a !== 'object' || typeof b !== 'object') return false;
  if (a === null || b === null) return false;

  if (a instanceof Date || b instanceof Date) {
    return (
      a instanceof Date && b instanceof Date && a.getTime() === b.getTime()
    );
  }

  const aIsArray = Array.isArray(a);
  const bIsArray = Array.isArray(b);
  if (aIsArray !== bIsArray) return false;
  if (Array.isArray(a) && Array.isArray(b)) {
    if (a.length !== b.length) return false;
    for (let i = 0; i < a.length; i++) {
      if (!deepEquals(a[i], b[i])) return false;
    }
    return true;
  }

  if (!isPlainObject(a) || !isPlainObject(b)) return false;
  const aKeys = Object.keys(a);
  const bKeys = Object.keys(b);
  if (aKeys.length !== bKeys.length) return false;
  for (const key of aKeys) {
    if (!Object.prototype.hasOwnProperty.call(b, key)) return false;
    if (!deepEquals(a[key], b[key])) return false;
  }
  return true;
}
