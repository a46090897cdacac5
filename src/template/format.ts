/**
 * Template Rendering
 * Fills compiled template slots from a positional argument vector.
 */

import {
  compileTemplate,
  EXTRA_ARGS_OFFSET,
  type TemplateSegment,
} from './compile.js';

function toText(value: unknown): string {
  try {
    return String(value);
  } catch {
    // Null-prototype objects have no toString
    return Object.prototype.toString.call(value);
  }
}

/**
 * Renders compiled segments against an argument vector.
 * A slot past the end of the vector is emitted as the token it was written as.
 */
export function renderTemplate(
  segments: readonly TemplateSegment[],
  vector: readonly unknown[]
): string {
  let result = '';
  for (const segment of segments) {
    if (segment.kind === 'text') {
      result += segment.text;
    } else if (segment.index < vector.length) {
      result += toText(vector[segment.index]);
    } else {
      result += segment.source;
    }
  }
  return result;
}

/**
 * Formats a custom failure message.
 *
 * Vector layout: `[test, arg, type, name, obj, ...extra]`. `${name}` and the
 * other well-known tokens read the first five slots; `${n}` reads `extra[n]`.
 * Never throws; unresolved and malformed tokens pass through as written.
 *
 * @example
 * formatTemplate("${name} must be >= ${0}", ["gte()", "7", "number", "count", "10", 10])
 * // Returns: "count must be >= 10"
 */
export function formatTemplate(
  template: string,
  vector: readonly unknown[]
): string {
  return renderTemplate(compileTemplate(template), vector);
}

/**
 * Formats a message that has only caller arguments: `${n}` reads `args[n]`.
 * Well-known tokens have nothing to read and stay as written.
 *
 * @example
 * formatArguments("offset ${0} exceeds ${1}", [12, 8])
 * // Returns: "offset 12 exceeds 8"
 */
export function formatArguments(
  template: string,
  args: readonly unknown[]
): string {
  let result = '';
  for (const segment of compileTemplate(template)) {
    if (segment.kind === 'text') {
      result += segment.text;
      continue;
    }
    const index = segment.index - EXTRA_ARGS_OFFSET;
    result +=
      index >= 0 && index < args.length ? toText(args[index]) : segment.source;
  }
  return result;
}
