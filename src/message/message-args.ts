/**
 * Message Arguments
 * Everything a formatter needs to describe one failed test.
 */

import { resolveTypeName } from './type-names.js';

/** Name used when neither an argument name nor a type is known */
export const DEFAULT_ARG_NAME = 'argument';

/**
 * Identity of a test. Only compared by reference, never invoked by the
 * message layer.
 */
export type TestIdentity = (...args: never[]) => unknown;

interface MessageArgsBase {
  readonly test: TestIdentity;
  readonly negated: boolean;
  /** Argument name as given by the caller */
  readonly name?: string | undefined;
  readonly subject: unknown;
  /** Type tag overriding the inferred type of the subject (e.g. "int") */
  readonly declaredType?: string | undefined;
}

/** Predicate failures carry no target; relation failures always do */
export type MessageArgsInit =
  | (MessageArgsBase & { readonly arity: 1 })
  | (MessageArgsBase & { readonly arity: 2; readonly target: unknown });

export class MessageArgs {
  readonly test: TestIdentity;
  readonly negated: boolean;
  readonly argName: string | undefined;
  readonly subject: unknown;
  readonly declaredType: string | undefined;
  readonly arity: 1 | 2;
  /** Object of the relation; `undefined` for predicates */
  readonly target: unknown;

  constructor(init: MessageArgsInit) {
    this.test = init.test;
    this.negated = init.negated;
    this.argName = init.name;
    this.subject = init.subject;
    this.declaredType = init.declaredType;
    this.arity = init.arity;
    this.target = init.arity === 2 ? init.target : undefined;
    Object.freeze(this);
  }

  /** Short type name of the subject, if one can be resolved */
  typeName(): string | undefined {
    return resolveTypeName(this.subject, this.declaredType);
  }

  /**
   * Name to use in the message: the argument name, else the subject's type
   * name, else "argument".
   */
  name(): string {
    return this.argName ?? this.typeName() ?? DEFAULT_ARG_NAME;
  }

  /**
   * Argument name prefixed with its type, e.g. "int size". Without an
   * argument name this is just {@link name}.
   */
  typeAndName(): string {
    if (this.argName === undefined) {
      return this.name();
    }
    const type = this.typeName();
    return type === undefined ? this.argName : `${type} ${this.argName}`;
  }

  /** " not" when negated, "" otherwise */
  not(): string {
    return this.negated ? ' not' : '';
  }

  /** Copy with the polarity toggled */
  flip(): MessageArgs {
    return new MessageArgs({ ...this.toInit(), negated: !this.negated });
  }

  /** Copy describing a different test */
  withTest(test: TestIdentity): MessageArgs {
    return new MessageArgs({ ...this.toInit(), test });
  }

  private toInit(): MessageArgsInit {
    const base: MessageArgsBase = {
      test: this.test,
      negated: this.negated,
      name: this.argName,
      subject: this.subject,
      declaredType: this.declaredType,
    };
    return this.arity === 2
      ? { ...base, arity: 2, target: this.target }
      : { ...base, arity: 1 };
  }
}
