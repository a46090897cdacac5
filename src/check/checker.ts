/**
 * Checker Factory
 * Entry points bound to one error factory, registry and callback set.
 */

import { illegalArgument, type ErrorFactory } from '../error-classes.js';
import { BUILTIN_REGISTRY } from '../checks/catalog.js';
import { integer, notNull } from '../checks/predicates.js';
import { formatArguments } from '../template/index.js';
import { Check, failureError, type CheckSettings } from './check.js';
import type { CheckerOptions } from './types.js';

export interface Checker {
  /** Start a check chain on a value */
  check<T>(value: T, name?: string): Check<T>;
  /**
   * Check an integer. Fails at once when the value is not an integer; the
   * value's type reads as "int" in messages.
   */
  checkInt(value: number, name?: string): Check<number>;
  /** Fails at once when the value is null or undefined */
  checkNotNull<T>(value: T, name?: string): Check<NonNullable<T>>;
  /**
   * Throw the configured error with `message`, whose `${n}` tokens read
   * `msgArgs[n]`. Usable as a return expression.
   */
  fail(message: string, ...msgArgs: unknown[]): never;
}

/**
 * Create a checker.
 *
 * @example
 * const { check } = createChecker({
 *   errorFactory: (message) => new RangeError(message),
 *   observability: { onFailure: (event) => log.warn(event.message) },
 * });
 */
export function createChecker(options: CheckerOptions = {}): Checker {
  const settings: CheckSettings = {
    errorFactory: options.errorFactory ?? illegalArgument(),
    registry: options.registry ?? BUILTIN_REGISTRY,
    observability: options.observability ?? {},
  };

  return {
    check<T>(value: T, name?: string): Check<T> {
      return new Check(value, name, settings);
    },

    checkInt(value: number, name?: string): Check<number> {
      if (!Number.isInteger(value)) {
        throw failureError(settings, {
          test: integer(),
          negated: false,
          name,
          subject: value,
          declaredType: 'int',
          arity: 1,
        });
      }
      return new Check(value, name, settings, 'int');
    },

    checkNotNull<T>(value: T, name?: string): Check<NonNullable<T>> {
      if (value === null || value === undefined) {
        throw failureError(settings, {
          test: notNull(),
          negated: false,
          name,
          subject: value,
          arity: 1,
        });
      }
      return new Check(value, name, settings);
    },

    fail(message: string, ...msgArgs: unknown[]): never {
      throw settings.errorFactory(formatArguments(message, msgArgs));
    },
  };
}

const defaultChecker = createChecker();

/**
 * Start a check chain that throws `ArgumentError`.
 *
 * @example
 * check(items, 'items').is(sizeGTE(), 1)
 */
export const check = defaultChecker.check;

/** {@link Checker.checkInt} on the default checker */
export const checkInt = defaultChecker.checkInt;

/** {@link Checker.checkNotNull} on the default checker */
export const checkNotNull = defaultChecker.checkNotNull;

/**
 * Start a check chain that throws errors from the given factory.
 *
 * @example
 * checkOn(illegalState(), connection.open, 'open').is(yes())
 */
export function checkOn<T>(
  errorFactory: ErrorFactory,
  value: T,
  name?: string
): Check<T> {
  return createChecker({ errorFactory }).check(value, name);
}

/**
 * Throw `ArgumentError` with `message`.
 *
 * @example
 * return fail('unsupported encoding ${0}', encoding)
 */
export const fail: Checker['fail'] = defaultChecker.fail;

/**
 * Throw an error from the given factory. Without a message the factory
 * receives "Invalid argument".
 *
 * @example
 * failOn(illegalState(), 'stream ${0} is closed', id)
 */
export function failOn(
  errorFactory: ErrorFactory,
  message = 'Invalid argument',
  ...msgArgs: unknown[]
): never {
  throw errorFactory(formatArguments(message, msgArgs));
}
