/**
 * Formatter Registry
 * Identity-keyed lookup from test functions to prefab message formatters.
 */

import { createError } from '../error-classes.js';
import type { MessageArgs, TestIdentity } from './message-args.js';
import type { Formatter } from './phrasing.js';
import { constructorName } from './type-names.js';

/** Registry entry for one test */
export interface FormatterEntry {
  /** The exact function value the test factory returns */
  readonly test: TestIdentity;
  /** Display name without parentheses, e.g. "gte" */
  readonly name: string;
  /**
   * Message formatter. For tests in a complementary pair it only needs to
   * phrase the affirmative form; the registry handles negation.
   */
  readonly format: Formatter;
}

/** Two tests whose "must" and "must not" forms are each other's opposite */
export type ComplementaryPair = readonly [TestIdentity, TestIdentity];

/**
 * Registry of prefab formatters. Immutable after construction.
 */
export interface FormatterRegistry {
  /** Polarity-aware formatter for a test, if one is registered */
  lookup(test: TestIdentity): Formatter | undefined;
  nameOf(test: TestIdentity): string | undefined;
  complementOf(test: TestIdentity): TestIdentity | undefined;
  has(test: TestIdentity): boolean;
  readonly size: number;
  entries(): IterableIterator<FormatterEntry>;
}

class FormatterRegistryImpl implements FormatterRegistry {
  private readonly byTest: ReadonlyMap<TestIdentity, FormatterEntry>;
  private readonly complements: ReadonlyMap<TestIdentity, TestIdentity>;
  private readonly formatters: ReadonlyMap<TestIdentity, Formatter>;

  constructor(
    entries: readonly FormatterEntry[],
    pairs: readonly ComplementaryPair[]
  ) {
    const byTest = new Map<TestIdentity, FormatterEntry>();
    for (const entry of entries) {
      if (byTest.has(entry.test)) {
        throw createError('VOUCH-R004', { test: entry.name });
      }
      byTest.set(entry.test, entry);
    }

    const complements = new Map<TestIdentity, TestIdentity>();
    for (const [first, second] of pairs) {
      const firstEntry = byTest.get(first);
      const secondEntry = byTest.get(second);
      if (first === second) {
        throw createError('VOUCH-R001', {
          test: firstEntry?.name ?? constructorName(first),
        });
      }
      if (firstEntry === undefined || secondEntry === undefined) {
        throw createError('VOUCH-R003', {
          first: firstEntry?.name ?? constructorName(first),
          second: secondEntry?.name ?? constructorName(second),
        });
      }
      for (const entry of [firstEntry, secondEntry]) {
        if (complements.has(entry.test)) {
          throw createError('VOUCH-R002', { test: entry.name });
        }
      }
      complements.set(first, second);
      complements.set(second, first);
    }

    const formatters = new Map<TestIdentity, Formatter>();
    for (const entry of byTest.values()) {
      const complement = complements.get(entry.test);
      const complementEntry =
        complement === undefined ? undefined : byTest.get(complement);
      formatters.set(
        entry.test,
        complementEntry === undefined
          ? entry.format
          : withComplement(entry.format, complementEntry)
      );
    }

    this.byTest = byTest;
    this.complements = complements;
    this.formatters = formatters;
    Object.freeze(this);
  }

  lookup(test: TestIdentity): Formatter | undefined {
    return this.formatters.get(test);
  }

  nameOf(test: TestIdentity): string | undefined {
    return this.byTest.get(test)?.name;
  }

  complementOf(test: TestIdentity): TestIdentity | undefined {
    return this.complements.get(test);
  }

  has(test: TestIdentity): boolean {
    return this.byTest.has(test);
  }

  get size(): number {
    return this.byTest.size;
  }

  entries(): IterableIterator<FormatterEntry> {
    return this.byTest.values();
  }
}

/**
 * Negated failures of a paired test are phrased by the complement, in its
 * affirmative form. The complement's own formatter is called directly, so
 * delegation never goes more than one step.
 */
function withComplement(
  format: Formatter,
  complement: FormatterEntry
): Formatter {
  return (args: MessageArgs) =>
    args.negated
      ? complement.format(args.flip().withTest(complement.test))
      : format(args);
}

/**
 * Build a registry from formatter entries and complementary pairs.
 *
 * @throws RegistryError (VOUCH-R001) when a test is paired with itself
 * @throws RegistryError (VOUCH-R002) when a test is in more than one pair
 * @throws RegistryError (VOUCH-R003) when a paired test has no formatter
 * @throws RegistryError (VOUCH-R004) when a test is registered twice
 */
export function createFormatterRegistry(
  entries: readonly FormatterEntry[],
  pairs: readonly ComplementaryPair[] = []
): FormatterRegistry {
  return new FormatterRegistryImpl(entries, pairs);
}
