/**
 * Value Rendering
 * Bounded, human-readable text for values shown in failure messages.
 */

import { simpleTypeName } from './type-names.js';

/** Strings longer than this are cut and suffixed with {@link ELLIPSIS} */
export const MAX_TEXT_WIDTH = 40;

/** Collections show at most this many elements */
export const MAX_ELEMENTS = 10;

export const ELLIPSIS = '...';

// ============================================================
// IDENTITY TAGS
// ============================================================

const identities = new WeakMap<object, string>();
let nextIdentity = 1;

/**
 * Per-process tag for an object, stable for its lifetime.
 * Derived from identity, not content: two equal arrays get different tags.
 */
export function identityTag(value: object): string {
  let tag = identities.get(value);
  if (tag === undefined) {
    tag = (nextIdentity++).toString(16);
    identities.set(value, tag);
  }
  return tag;
}

// ============================================================
// VALUE SHAPES
// ============================================================

/** Closed classification of everything {@link renderValue} can be given */
export type ValueShape =
  | { readonly kind: 'nullish'; readonly value: null | undefined }
  | { readonly kind: 'number'; readonly value: number | bigint }
  | { readonly kind: 'boolean'; readonly value: boolean }
  | { readonly kind: 'text'; readonly value: string }
  | { readonly kind: 'symbol'; readonly value: symbol }
  | {
      readonly kind: 'sequence';
      readonly typeName: string;
      readonly tag: string;
      /** First {@link MAX_ELEMENTS} elements */
      readonly items: readonly unknown[];
      readonly size: number;
    }
  | {
      readonly kind: 'mapping';
      readonly typeName: string;
      readonly tag: string;
      /** First {@link MAX_ELEMENTS} entries */
      readonly entries: readonly (readonly [unknown, unknown])[];
      readonly size: number;
    }
  | { readonly kind: 'display'; readonly text: string }
  | { readonly kind: 'opaque'; readonly typeName: string; readonly tag: string };

function take<T>(iterable: Iterable<T>, limit: number): T[] {
  const items: T[] = [];
  for (const item of iterable) {
    if (items.length === limit) break;
    items.push(item);
  }
  return items;
}

function isTypedArray(value: object): value is Iterable<unknown> & {
  readonly length: number;
} {
  return ArrayBuffer.isView(value) && !(value instanceof DataView);
}

/** Text of an object that defines its own toString, if it has one */
function ownDisplayText(value: object): string | undefined {
  const toString: unknown = Reflect.get(value, 'toString');
  if (
    typeof toString !== 'function' ||
    toString === Object.prototype.toString
  ) {
    return undefined;
  }
  try {
    return String(value);
  } catch {
    return undefined;
  }
}

export function classifyValue(value: unknown): ValueShape {
  if (value === null || value === undefined) {
    return { kind: 'nullish', value };
  }

  if (typeof value === 'number' || typeof value === 'bigint') {
    return { kind: 'number', value };
  }
  if (typeof value === 'boolean') {
    return { kind: 'boolean', value };
  }
  if (typeof value === 'string') {
    return { kind: 'text', value };
  }
  if (typeof value === 'symbol') {
    return { kind: 'symbol', value };
  }
  if (typeof value === 'function') {
    return { kind: 'opaque', typeName: 'Function', tag: identityTag(value) };
  }
  if (typeof value !== 'object') {
    return { kind: 'display', text: String(value) };
  }

  const typeName = simpleTypeName(value) ?? 'Object';
  const tag = identityTag(value);

  if (Array.isArray(value)) {
    return {
      kind: 'sequence',
      typeName,
      tag,
      items: value.slice(0, MAX_ELEMENTS),
      size: value.length,
    };
  }
  if (isTypedArray(value)) {
    return {
      kind: 'sequence',
      typeName,
      tag,
      items: take(value, MAX_ELEMENTS),
      size: value.length,
    };
  }
  if (value instanceof Set) {
    return {
      kind: 'sequence',
      typeName,
      tag,
      items: take(value, MAX_ELEMENTS),
      size: value.size,
    };
  }
  if (value instanceof Map) {
    return {
      kind: 'mapping',
      typeName,
      tag,
      entries: take(value, MAX_ELEMENTS),
      size: value.size,
    };
  }

  const text = ownDisplayText(value);
  if (text !== undefined) {
    return { kind: 'display', text };
  }
  return { kind: 'opaque', typeName, tag };
}

// ============================================================
// RENDERING
// ============================================================

/**
 * Cuts text longer than {@link MAX_TEXT_WIDTH} and appends {@link ELLIPSIS}.
 * The cut never splits a surrogate pair.
 */
export function ellipsis(text: string): string {
  if (text.length <= MAX_TEXT_WIDTH) {
    return text;
  }
  let end = MAX_TEXT_WIDTH;
  if (isHighSurrogate(text.charCodeAt(end - 1))) {
    end--;
  }
  return text.slice(0, end) + ELLIPSIS;
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

function joinElements(parts: readonly string[], size: number): string {
  let joined = parts.join(', ');
  if (size > parts.length) {
    joined += `, ${ELLIPSIS}`;
  }
  return ellipsis(joined);
}

/**
 * Renders a value for a failure message.
 *
 * @example
 * renderValue(null)                 // "null"
 * renderValue("")                   // '""'
 * renderValue("  ")                 // '"  "'
 * renderValue([1, 2, 3])            // "Array@1f: [1, 2, 3]"
 * renderValue({ id: 7 })            // "Object@20"
 * renderValue(new Date(0))          // the Date's own text, capped at 40 chars
 */
export function renderValue(value: unknown): string {
  return renderShape(classifyValue(value), false);
}

function renderShape(shape: ValueShape, nested: boolean): string {
  switch (shape.kind) {
    case 'nullish':
      return String(shape.value);
    case 'number':
      return String(shape.value);
    case 'boolean':
      return shape.value ? 'true' : 'false';
    case 'text':
      // Blank text is quoted so it stays visible
      return shape.value.trim() === ''
        ? `"${shape.value}"`
        : ellipsis(shape.value);
    case 'symbol':
      return shape.value.toString();
    case 'sequence': {
      const id = `${shape.typeName}@${shape.tag}`;
      if (nested) return id;
      const parts = shape.items.map((item) => renderNested(item));
      return `${id}: [${joinElements(parts, shape.size)}]`;
    }
    case 'mapping': {
      const id = `${shape.typeName}@${shape.tag}`;
      if (nested) return id;
      const parts = shape.entries.map(
        ([key, val]) => `${renderNested(key)}: ${renderNested(val)}`
      );
      return `${id}: {${joinElements(parts, shape.size)}}`;
    }
    case 'display':
      return ellipsis(shape.text);
    case 'opaque':
      return `${shape.typeName}@${shape.tag}`;
  }
}

// Collections inside collections render as their identity only
function renderNested(value: unknown): string {
  return renderShape(classifyValue(value), true);
}

/**
 * Identity text of a value: `Type@tag` for objects and functions, the
 * rendered value otherwise. Used where reference identity matters.
 */
export function identityText(value: unknown): string {
  if (
    (typeof value === 'object' && value !== null) ||
    typeof value === 'function'
  ) {
    return `${simpleTypeName(value) ?? 'Object'}@${identityTag(value)}`;
  }
  return renderValue(value);
}
