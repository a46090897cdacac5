/**
 * Vouch Error Classes and Factory
 * Error types with registry-based error IDs
 */

import {
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
} from './error-registry.js';

// ============================================================
// ERROR DATA
// ============================================================

/** Error data exposed to host applications */
export interface VouchErrorData {
  readonly errorId: string;
  readonly message: string;
  readonly context?: Record<string, unknown> | undefined;
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base error class for all errors raised by the library itself.
 */
export class VouchError extends Error {
  readonly errorId: string;
  readonly context?: Record<string, unknown> | undefined;

  constructor(data: VouchErrorData) {
    if (!data.errorId) {
      throw new TypeError('errorId is required');
    }

    if (!ERROR_REGISTRY.has(data.errorId)) {
      throw new TypeError(`Unknown error ID: ${data.errorId}`);
    }

    super(data.message);
    this.name = 'VouchError';
    this.errorId = data.errorId;
    this.context = data.context;
  }

  /** Get error data for custom formatting */
  toData(): VouchErrorData {
    return {
      errorId: this.errorId,
      message: this.message,
      context: this.context,
    };
  }

  /** Format error for display (can be overridden by host) */
  format(formatter?: (data: VouchErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    return this.message;
  }
}

// ============================================================
// VALIDATION ERRORS
// ============================================================

/**
 * Default error produced when a checked argument fails a test.
 * The message is the rendered failure message.
 */
export class ArgumentError extends VouchError {
  constructor(message: string, context?: Record<string, unknown>) {
    super({ errorId: 'VOUCH-V001', message, context });
    this.name = 'ArgumentError';
  }
}

/** Error for failed postconditions and invalid object state */
export class StateError extends VouchError {
  constructor(message: string, context?: Record<string, unknown>) {
    super({ errorId: 'VOUCH-V002', message, context });
    this.name = 'StateError';
  }
}

// ============================================================
// LIBRARY ERRORS
// ============================================================

/** The check API was called with arguments it cannot work with */
export class UsageError extends VouchError {
  constructor(
    errorId: string,
    message: string,
    context?: Record<string, unknown>
  ) {
    super({ errorId, message, context });
    this.name = 'UsageError';
  }
}

/** A formatter registry was built from an inconsistent catalog */
export class RegistryError extends VouchError {
  constructor(
    errorId: string,
    message: string,
    context?: Record<string, unknown>
  ) {
    super({ errorId, message, context });
    this.name = 'RegistryError';
  }
}

// ============================================================
// ERROR FACTORY
// ============================================================

const CATEGORY_FACTORIES: Record<
  ErrorCategory,
  (
    errorId: string,
    message: string,
    context: Record<string, unknown>
  ) => VouchError
> = {
  validation: (errorId, message, context) =>
    errorId === 'VOUCH-V002'
      ? new StateError(message, context)
      : new ArgumentError(message, context),
  usage: (errorId, message, context) =>
    new UsageError(errorId, message, context),
  registry: (errorId, message, context) =>
    new RegistryError(errorId, message, context),
};

/**
 * Factory function for creating errors from the registry.
 *
 * Looks up the error definition, renders its message template with the
 * context, and instantiates the error class of the definition's category.
 *
 * @throws TypeError if errorId is not found in registry
 *
 * @example
 * createError("VOUCH-R001", { test: "gt()" })
 * // Creates RegistryError: "Test gt() cannot be its own complement"
 *
 * @example
 * createError("VOUCH-V002", { message: "connection must be open" })
 * // Creates StateError: "connection must be open"
 */
export function createError(
  errorId: string,
  context: Record<string, unknown>
): VouchError {
  const definition = ERROR_REGISTRY.get(errorId);

  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }

  const message = renderMessage(definition.messageTemplate, context);
  return CATEGORY_FACTORIES[definition.category](errorId, message, context);
}

// ============================================================
// ERROR FACTORIES FOR CHECKS
// ============================================================

/** Turns a failure message into the error a failed check throws */
export type ErrorFactory<E extends Error = Error> = (message: string) => E;

/** Error factory producing {@link ArgumentError} (the default) */
export function illegalArgument(): ErrorFactory<ArgumentError> {
  return (message) => new ArgumentError(message);
}

/** Error factory producing {@link StateError} */
export function illegalState(): ErrorFactory<StateError> {
  return (message) => new StateError(message);
}
