/**
 * Tests for the formatter registry: lookup by identity, polarity
 * delegation through complementary pairs and wiring errors.
 */

import { describe, it, expect } from 'vitest';
import { RegistryError, VouchError } from '../../src/error-classes.js';
import { BUILTIN_PAIRS, BUILTIN_REGISTRY } from '../../src/checks/catalog.js';
import { even } from '../../src/checks/predicates.js';
import {
  MessageArgs,
  type TestIdentity,
} from '../../src/message/message-args.js';
import { predicateMessage } from '../../src/message/phrasing.js';
import {
  createFormatterRegistry,
  type FormatterEntry,
} from '../../src/message/registry.js';

const isOne = (value: number): boolean => value === 1;
const notOne = (value: number): boolean => value !== 1;
const isTwo = (value: number): boolean => value === 2;
const unregistered = (value: number): boolean => value === 4;

const ENTRIES: readonly FormatterEntry[] = [
  { test: isOne, name: 'isOne', format: predicateMessage('be 1') },
  {
    test: notOne,
    name: 'notOne',
    format: (args) => `${args.name()} must not be 1`,
  },
  { test: isTwo, name: 'isTwo', format: predicateMessage('be 2') },
];

function argsFor(
  test: TestIdentity,
  negated: boolean,
  subject: unknown = 3
): MessageArgs {
  return new MessageArgs({ test, negated, name: 'n', subject, arity: 1 });
}

function registryErrorOf(build: () => unknown): RegistryError {
  try {
    build();
  } catch (err) {
    if (err instanceof RegistryError) return err;
    throw err;
  }
  throw new Error('expected a RegistryError');
}

describe('createFormatterRegistry', () => {
  describe('lookup', () => {
    it('finds formatters by test identity', () => {
      const registry = createFormatterRegistry(ENTRIES);
      const format = registry.lookup(isOne);
      expect(format?.(argsFor(isOne, false))).toBe('n must be 1 (was 3)');
    });

    it('treats identical but separate functions as different tests', () => {
      const registry = createFormatterRegistry(ENTRIES);
      const lookalike = (value: number): boolean => value === 1;
      expect(registry.has(lookalike)).toBe(false);
      expect(registry.lookup(lookalike)).toBeUndefined();
    });

    it('reports names, size and entries', () => {
      const registry = createFormatterRegistry(ENTRIES);
      expect(registry.nameOf(isTwo)).toBe('isTwo');
      expect(registry.nameOf(unregistered)).toBeUndefined();
      expect(registry.size).toBe(3);
      expect([...registry.entries()].map((entry) => entry.name)).toEqual([
        'isOne',
        'notOne',
        'isTwo',
      ]);
    });

    it('is frozen', () => {
      expect(Object.isFrozen(createFormatterRegistry(ENTRIES))).toBe(true);
    });
  });

  describe('polarity', () => {
    const registry = createFormatterRegistry(ENTRIES, [[isOne, notOne]]);

    it('links both members of a pair', () => {
      expect(registry.complementOf(isOne)).toBe(notOne);
      expect(registry.complementOf(notOne)).toBe(isOne);
      expect(registry.complementOf(isTwo)).toBeUndefined();
    });

    it('phrases a negated test with its complement', () => {
      expect(registry.lookup(isOne)?.(argsFor(isOne, true, 1))).toBe(
        'n must not be 1'
      );
      expect(registry.lookup(notOne)?.(argsFor(notOne, true, 3))).toBe(
        'n must be 1 (was 3)'
      );
    });

    it('leaves the affirmative form to the test itself', () => {
      expect(registry.lookup(notOne)?.(argsFor(notOne, false, 1))).toBe(
        'n must not be 1'
      );
    });

    it('lets unpaired tests phrase their own negation', () => {
      expect(registry.lookup(isTwo)?.(argsFor(isTwo, true, 2))).toBe(
        'n must not be 2 (was 2)'
      );
    });
  });

  describe('wiring errors', () => {
    it('rejects a test paired with itself', () => {
      const err = registryErrorOf(() =>
        createFormatterRegistry(ENTRIES, [[isOne, isOne]])
      );
      expect(err.errorId).toBe('VOUCH-R001');
      expect(err.message).toBe('Test isOne cannot be its own complement');
    });

    it('rejects a test that appears in two pairs', () => {
      const err = registryErrorOf(() =>
        createFormatterRegistry(ENTRIES, [
          [isOne, notOne],
          [isOne, isTwo],
        ])
      );
      expect(err.errorId).toBe('VOUCH-R002');
      expect(err.message).toBe(
        'Test isOne appears in more than one complementary pair'
      );
    });

    it('rejects a pair with an unregistered member', () => {
      const err = registryErrorOf(() =>
        createFormatterRegistry(ENTRIES, [[isOne, unregistered]])
      );
      expect(err.errorId).toBe('VOUCH-R003');
      expect(err.message).toBe(
        'Complementary pair (isOne, unregistered) references a test without a formatter'
      );
    });

    it('rejects a test registered twice', () => {
      const err = registryErrorOf(() =>
        createFormatterRegistry([
          ...ENTRIES,
          { test: isOne, name: 'isOne', format: predicateMessage('be one') },
        ])
      );
      expect(err.errorId).toBe('VOUCH-R004');
      expect(err.message).toBe('Test isOne is registered more than once');
      expect(err).toBeInstanceOf(VouchError);
    });
  });
});

describe('BUILTIN_REGISTRY', () => {
  it('registers every test of every built-in pair', () => {
    for (const [first, second] of BUILTIN_PAIRS) {
      expect(BUILTIN_REGISTRY.has(first)).toBe(true);
      expect(BUILTIN_REGISTRY.has(second)).toBe(true);
      expect(BUILTIN_REGISTRY.complementOf(first)).toBe(second);
    }
  });

  it('phrases a negated test exactly like its complement', () => {
    for (const [first, second] of BUILTIN_PAIRS) {
      for (const [test, complement] of [
        [first, second],
        [second, first],
      ] as const) {
        const negated = new MessageArgs(
          test.length >= 2
            ? { test, negated: true, name: 'v', subject: 'abc', arity: 2, target: 2 }
            : { test, negated: true, name: 'v', subject: 'abc', arity: 1 }
        );
        const format = BUILTIN_REGISTRY.lookup(test);
        const complementFormat = BUILTIN_REGISTRY.lookup(complement);
        expect(format?.(negated)).toBe(
          complementFormat?.(negated.flip().withTest(complement))
        );
      }
    }
  });

  it('names tests without parentheses', () => {
    expect(BUILTIN_REGISTRY.nameOf(even())).toBe('even');
  });
});
