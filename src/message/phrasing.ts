/**
 * Message Phrasing
 * Building blocks shared by the prefab formatters.
 */

import type { MessageArgs } from './message-args.js';
import { renderValue } from './values.js';

/** Produces a failure message from message arguments */
export type Formatter = (args: MessageArgs) => string;

/**
 * When to append "(was <subject>)".
 * - always / never
 * - affirmative: only when the test ran in its "must" form
 * - negated: only when the test ran in its "must not" form
 */
export type ShowSubject = 'always' | 'never' | 'affirmative' | 'negated';

/** " (was <value>)" */
export function was(value: unknown): string {
  return ` (was ${renderValue(value)})`;
}

function showsSubject(args: MessageArgs, show: ShowSubject): boolean {
  switch (show) {
    case 'always':
      return true;
    case 'never':
      return false;
    case 'affirmative':
      return !args.negated;
    case 'negated':
      return args.negated;
  }
}

/**
 * Formatter for a predicate: "<name> must[ not] <phrase>[ (was <subject>)]".
 *
 * @example
 * predicateMessage("be even", "always")
 * // "count must be even (was 3)"
 */
export function predicateMessage(
  phrase: string,
  show: ShowSubject = 'always'
): Formatter {
  return (args) => {
    const suffix = showsSubject(args, show) ? was(args.subject) : '';
    return `${args.name()} must${args.not()} ${phrase}${suffix}`;
  };
}

/**
 * Formatter for a relation:
 * "<name> must[ not] <phrase> <target>[ (was <subject>)]".
 *
 * @example
 * relationMessage("be >", "always")
 * // "count must be > 10 (was 3)"
 */
export function relationMessage(
  phrase: string,
  show: ShowSubject = 'always'
): Formatter {
  return (args) => {
    const suffix = showsSubject(args, show) ? was(args.subject) : '';
    return `${args.name()} must${args.not()} ${phrase} ${renderValue(args.target)}${suffix}`;
  };
}

/** Size of a subject and the property it is read from ("length", "size") */
export interface Measurement {
  readonly property: string;
  readonly size: number;
}

/**
 * Formatter for a relation on the size of the subject:
 * "<name>.<property> must[ not] <phrase> <target>[ (was <size>)]".
 * A subject without a size is phrased against the subject itself.
 */
export function sizeMessage(
  phrase: string,
  measure: (subject: unknown) => Measurement | undefined,
  show: ShowSubject = 'always'
): Formatter {
  return (args) => {
    const target = renderValue(args.target);
    const measurement = measure(args.subject);
    if (measurement === undefined) {
      const suffix = showsSubject(args, show) ? was(args.subject) : '';
      return `${args.name()} must${args.not()} ${phrase} ${target}${suffix}`;
    }
    const suffix = showsSubject(args, show) ? was(measurement.size) : '';
    return `${args.name()}.${measurement.property} must${args.not()} ${phrase} ${target}${suffix}`;
  };
}
