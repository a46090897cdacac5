/**
 * Check API Types
 */

import type { ErrorFactory } from '../error-classes.js';
import type { FormatterRegistry } from '../message/registry.js';

// ============================================================
// TESTS
// ============================================================

/** Single-value test */
export type Predicate<T> = (value: T) => boolean;

/** Two-value test; the second value is the object of the relation */
export type Relation<T, U> = (value: T, target: U) => boolean;

// ============================================================
// OBSERVABILITY
// ============================================================

/** Reported once for every failed test, before the error is thrown */
export interface FailureEvent {
  /** Display name of the test, e.g. "gte()" */
  readonly testName: string;
  /** Name the value was checked under */
  readonly name: string;
  readonly negated: boolean;
  /** Message handed to the error factory */
  readonly message: string;
  /** Whether the message came from a caller-supplied template */
  readonly custom: boolean;
}

export interface ObservabilityCallbacks {
  onFailure?: ((event: FailureEvent) => void) | undefined;
}

// ============================================================
// CHECKER CONFIGURATION
// ============================================================

export interface CheckerOptions {
  /** Builds the error thrown for a failed test. Default: ArgumentError */
  errorFactory?: ErrorFactory | undefined;
  /** Formatter lookup for prefab messages. Default: the built-in catalog */
  registry?: FormatterRegistry | undefined;
  observability?: ObservabilityCallbacks | undefined;
}
