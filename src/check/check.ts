/**
 * Check Chain
 * Runs tests against one value and throws on the first failure.
 */

import { createError, type ErrorFactory } from '../error-classes.js';
import { DEFAULT_ARG_NAME, MessageArgs } from '../message/message-args.js';
import type { FormatterRegistry } from '../message/registry.js';
import {
  renderFailureMessage,
  testName,
  type Failure,
} from '../message/render.js';
import { renderValue } from '../message/values.js';
import { formatArguments } from '../template/index.js';
import type {
  FailureEvent,
  ObservabilityCallbacks,
  Predicate,
  Relation,
} from './types.js';

/** Checker options with defaults applied */
export interface CheckSettings {
  readonly errorFactory: ErrorFactory;
  readonly registry: FormatterRegistry;
  readonly observability: ObservabilityCallbacks;
}

/**
 * Render the message for a failure, report it and build the error to throw.
 */
export function failureError(settings: CheckSettings, failure: Failure): Error {
  const message = renderFailureMessage(failure, settings.registry);
  const event: FailureEvent = {
    testName: testName(failure.test, settings.registry),
    name: new MessageArgs(failure).name(),
    negated: failure.negated,
    message,
    custom: failure.message !== undefined,
  };
  settings.observability.onFailure?.(event);
  return settings.errorFactory(message);
}

function customMessageOf(value: unknown): string | undefined {
  if (value === undefined || typeof value === 'string') {
    return value;
  }
  throw createError('VOUCH-U001', { actual: renderValue(value) });
}

/**
 * Fluent validation of a single value.
 *
 * Tests declaring two or more parameters are relations and take a target
 * right after the test; a custom message and its arguments follow.
 *
 * @example
 * check(7, 'count').is(gte(), 10)
 * // throws ArgumentError: "count must be >= 10 (was 7)"
 *
 * @example
 * check(name, 'name').isNot(blank(), '${name} is required')
 */
export class Check<T> {
  constructor(
    private readonly value: T,
    private readonly name: string | undefined,
    private readonly settings: CheckSettings,
    private readonly declaredType?: string | undefined
  ) {}

  is(test: Predicate<T>, message?: string, ...msgArgs: unknown[]): this;
  is<U>(
    test: Relation<T, U>,
    target: U,
    message?: string,
    ...msgArgs: unknown[]
  ): this;
  is(test: Relation<T, unknown>, ...rest: unknown[]): this {
    this.run(test, false, rest);
    return this;
  }

  isNot(test: Predicate<T>, message?: string, ...msgArgs: unknown[]): this;
  isNot<U>(
    test: Relation<T, U>,
    target: U,
    message?: string,
    ...msgArgs: unknown[]
  ): this;
  isNot(test: Relation<T, unknown>, ...rest: unknown[]): this {
    this.run(test, true, rest);
    return this;
  }

  /**
   * Test a property of the value, named `<name>.<property>` in messages.
   */
  has<P>(
    getter: (value: T) => P,
    property: string,
    test: Predicate<P>,
    message?: string,
    ...msgArgs: unknown[]
  ): this;
  has<P, U>(
    getter: (value: T) => P,
    property: string,
    test: Relation<P, U>,
    target: U,
    message?: string,
    ...msgArgs: unknown[]
  ): this;
  has<P>(
    getter: (value: T) => P,
    property: string,
    test: Relation<P, unknown>,
    ...rest: unknown[]
  ): this {
    this.property(getter, property).run(test, false, rest);
    return this;
  }

  notHas<P>(
    getter: (value: T) => P,
    property: string,
    test: Predicate<P>,
    message?: string,
    ...msgArgs: unknown[]
  ): this;
  notHas<P, U>(
    getter: (value: T) => P,
    property: string,
    test: Relation<P, U>,
    target: U,
    message?: string,
    ...msgArgs: unknown[]
  ): this;
  notHas<P>(
    getter: (value: T) => P,
    property: string,
    test: Relation<P, unknown>,
    ...rest: unknown[]
  ): this {
    this.property(getter, property).run(test, true, rest);
    return this;
  }

  /**
   * Extra conditions that need not concern the checked value. Fails on the
   * first false condition. A leading message may use `${0}` for the 1-based
   * number of that condition.
   *
   * @throws UsageError (VOUCH-U003) when no condition is given
   *
   * @example
   * check(buffer, 'buffer')
   *   .has((b) => b.length, 'length', gte(), offset + length)
   *   .given(offset >= 0, length >= 0)
   */
  given(...conditions: boolean[]): this;
  given(message: string, ...conditions: boolean[]): this;
  given(...args: (string | boolean)[]): this {
    const [first, ...rest] = args;
    const message = typeof first === 'string' ? first : undefined;
    const conditions = message === undefined ? args : rest;
    if (conditions.length === 0) {
      throw createError('VOUCH-U003', {});
    }

    const failed = conditions.findIndex((condition) => condition !== true);
    if (failed === -1) return this;

    const number = failed + 1;
    const subject = this.name === undefined ? 'Argument' : `Argument ${this.name}`;
    throw this.settings.errorFactory(
      message === undefined
        ? `${subject} not valid given condition ${number}`
        : formatArguments(message, [number])
    );
  }

  /** The checked value, or what `transform` makes of it */
  ok(): T;
  ok<U>(transform: (value: T) => U): U;
  ok<U>(transform?: (value: T) => U): T | U {
    return transform === undefined ? this.value : transform(this.value);
  }

  /** Hand the checked value to `consumer` */
  andThen(consumer: (value: T) => void): void {
    consumer(this.value);
  }

  private property<P>(getter: (value: T) => P, property: string): Check<P> {
    const owner = this.name ?? DEFAULT_ARG_NAME;
    return new Check(getter(this.value), `${owner}.${property}`, this.settings);
  }

  private run(
    test: Relation<T, unknown>,
    negated: boolean,
    rest: readonly unknown[]
  ): void {
    const relation = test.length >= 2;
    const target = relation ? rest[0] : undefined;
    const [candidate, ...msgArgs] = relation ? rest.slice(1) : rest;
    const message = customMessageOf(candidate);

    if (test(this.value, target) !== negated) return;

    const base = {
      test,
      negated,
      name: this.name,
      subject: this.value,
      declaredType: this.declaredType,
      message,
      msgArgs,
    };
    throw failureError(
      this.settings,
      relation ? { ...base, arity: 2, target } : { ...base, arity: 1 }
    );
  }
}
