/**
 * Template Compiler
 * Scans a custom failure message into literal text and positional slots.
 */

/**
 * Named tokens, in vector order. `${test}` reads slot 0, `${obj}` slot 4.
 */
export const WELL_KNOWN_TOKENS = ['test', 'arg', 'type', 'name', 'obj'] as const;

export type WellKnownToken = (typeof WELL_KNOWN_TOKENS)[number];

/** Vector index of `${0}`: caller arguments follow the well-known values */
export const EXTRA_ARGS_OFFSET = WELL_KNOWN_TOKENS.length;

export type TemplateSegment =
  | { readonly kind: 'text'; readonly text: string }
  | {
      readonly kind: 'slot';
      /** Absolute index into the argument vector */
      readonly index: number;
      /** Token as written, emitted when the slot cannot be filled */
      readonly source: string;
    };

const NAMED_SLOTS: ReadonlyMap<string, number> = new Map(
  WELL_KNOWN_TOKENS.map((token, index) => [token, index])
);

const INTEGER_BODY = /^[0-9]+$/;

function slotIndex(body: string): number | undefined {
  const named = NAMED_SLOTS.get(body);
  if (named !== undefined) {
    return named;
  }
  if (INTEGER_BODY.test(body)) {
    return Number.parseInt(body, 10) + EXTRA_ARGS_OFFSET;
  }
  return undefined;
}

/**
 * Compiles a template into segments.
 *
 * A token is `${` followed by a body and `}`. Bodies other than the five
 * well-known names and non-negative integers stay literal text, as do a
 * `$` without `{` and an unterminated token at the end of the template.
 * Never throws. O(n) in the template length.
 *
 * @example
 * compileTemplate("${name} must be >= ${0}")
 * // [{kind: "slot", index: 3, source: "${name}"},
 * //  {kind: "text", text: " must be >= "},
 * //  {kind: "slot", index: 5, source: "${0}"}]
 */
export function compileTemplate(template: string): TemplateSegment[] {
  const segments: TemplateSegment[] = [];
  let text = '';
  let i = 0;

  while (i < template.length) {
    const char = template.charAt(i);

    if (char !== '$' || template.charAt(i + 1) !== '{') {
      text += char;
      i++;
      continue;
    }

    const close = template.indexOf('}', i + 2);
    if (close === -1) {
      // Unterminated token runs to the end of the template
      text += template.slice(i);
      break;
    }

    const source = template.slice(i, close + 1);
    const index = slotIndex(template.slice(i + 2, close));
    if (index === undefined) {
      text += source;
    } else {
      if (text !== '') {
        segments.push({ kind: 'text', text });
        text = '';
      }
      segments.push({ kind: 'slot', index, source });
    }
    i = close + 1;
  }

  if (text !== '') {
    segments.push({ kind: 'text', text });
  }
  return segments;
}
