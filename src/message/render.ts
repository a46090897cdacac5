/**
 * Failure Message Rendering
 * Turns a failed test into the text of the error a check throws.
 */

import { BUILTIN_REGISTRY } from '../checks/catalog.js';
import { formatTemplate } from '../template/index.js';
import {
  MessageArgs,
  type MessageArgsInit,
  type TestIdentity,
} from './message-args.js';
import type { FormatterRegistry } from './registry.js';
import { constructorName } from './type-names.js';
import { renderValue } from './values.js';

/**
 * A failed test as reported by the check API. `message` selects the custom
 * message path; without it the registry supplies the text.
 */
export type Failure = MessageArgsInit & {
  readonly message?: string | undefined;
  readonly msgArgs?: readonly unknown[] | undefined;
};

/** Display name of a test: "gte()" for catalog tests, else the function name */
export function testName(
  test: TestIdentity,
  registry: FormatterRegistry
): string {
  const name = registry.nameOf(test);
  return name === undefined ? constructorName(test) : `${name}()`;
}

/** Message for tests without a registered formatter */
export function fallbackMessage(args: MessageArgs): string {
  return `Invalid value for ${args.name()}: ${renderValue(args.subject)}`;
}

export function prefabMessage(
  args: MessageArgs,
  registry: FormatterRegistry
): string {
  const format = registry.lookup(args.test);
  return format === undefined ? fallbackMessage(args) : format(args);
}

/**
 * Argument vector for a custom message:
 * `[test, arg, type, name, obj, ...msgArgs]`.
 */
export function templateVector(
  args: MessageArgs,
  msgArgs: readonly unknown[],
  registry: FormatterRegistry
): unknown[] {
  return [
    testName(args.test, registry),
    renderValue(args.subject),
    args.typeName() ?? 'null',
    args.name(),
    args.arity === 2 ? renderValue(args.target) : 'null',
    ...msgArgs,
  ];
}

export function customMessage(
  template: string,
  args: MessageArgs,
  msgArgs: readonly unknown[],
  registry: FormatterRegistry
): string {
  return formatTemplate(template, templateVector(args, msgArgs, registry));
}

/**
 * Render the failure message for a failed test.
 *
 * @example
 * renderFailureMessage({
 *   test: gte(), negated: false, name: "count", subject: 7, arity: 2, target: 10,
 * })
 * // Returns: "count must be >= 10 (was 7)"
 *
 * @example
 * renderFailureMessage({
 *   test: gte(), negated: false, name: "count", subject: 7, arity: 2, target: 10,
 *   message: "${name} must be >= ${0}", msgArgs: [10],
 * })
 * // Returns: "count must be >= 10"
 */
export function renderFailureMessage(
  failure: Failure,
  registry: FormatterRegistry = BUILTIN_REGISTRY
): string {
  const args = new MessageArgs(failure);
  if (failure.message === undefined) {
    return prefabMessage(args, registry);
  }
  return customMessage(failure.message, args, failure.msgArgs ?? [], registry);
}
