/**
 * Tests for failure message rendering: prefab path, custom template path
 * and the fallback for unregistered tests.
 */

import { describe, it, expect } from 'vitest';
import { even } from '../../src/checks/predicates.js';
import { gt, gte, sizeGT } from '../../src/checks/relations.js';
import { createFormatterRegistry } from '../../src/message/registry.js';
import {
  renderFailureMessage,
  templateVector,
  testName,
} from '../../src/message/render.js';
import { MessageArgs } from '../../src/message/message-args.js';
import { BUILTIN_REGISTRY } from '../../src/checks/catalog.js';

function isPrime(value: number): boolean {
  for (let i = 2; i * i <= value; i++) {
    if (value % i === 0) return false;
  }
  return value > 1;
}

describe('renderFailureMessage', () => {
  describe('prefab messages', () => {
    it('renders the registered formatter', () => {
      expect(
        renderFailureMessage({
          test: gte(),
          negated: false,
          name: 'count',
          subject: 7,
          arity: 2,
          target: 10,
        })
      ).toBe('count must be >= 10 (was 7)');
    });

    it('renders a negated paired test with its complement', () => {
      expect(
        renderFailureMessage({
          test: gt(),
          negated: true,
          name: 'size',
          subject: 7,
          arity: 2,
          target: 5,
        })
      ).toBe('size must be <= 5 (was 7)');
    });

    it('renders a size test against a value without a size', () => {
      expect(
        renderFailureMessage({
          test: sizeGT(),
          negated: false,
          name: 'n',
          subject: 5,
          arity: 2,
          target: 1,
        })
      ).toBe('n must be > 1 (was 5)');
    });

    it('renders a negated size test against a value without a size', () => {
      expect(
        renderFailureMessage({
          test: sizeGT(),
          negated: true,
          name: 'n',
          subject: true,
          arity: 2,
          target: 1,
        })
      ).toBe('n must be <= 1 (was true)');
    });

    it('falls back to a generic message for unregistered tests', () => {
      expect(
        renderFailureMessage({
          test: isPrime,
          negated: false,
          name: 'n',
          subject: 9,
          arity: 1,
        })
      ).toBe('Invalid value for n: 9');
    });

    it('uses the registry it is given', () => {
      const registry = createFormatterRegistry([
        {
          test: isPrime,
          name: 'isPrime',
          format: (args) => `${args.name()} must be prime`,
        },
      ]);
      expect(
        renderFailureMessage(
          { test: isPrime, negated: false, name: 'n', subject: 9, arity: 1 },
          registry
        )
      ).toBe('n must be prime');
      expect(
        renderFailureMessage(
          { test: even(), negated: false, name: 'n', subject: 9, arity: 1 },
          registry
        )
      ).toBe('Invalid value for n: 9');
    });
  });

  describe('custom messages', () => {
    it('formats the documented comparison message', () => {
      expect(
        renderFailureMessage({
          test: gte(),
          negated: false,
          name: 'count',
          subject: 7,
          arity: 2,
          target: 10,
          message: '${name} must be >= ${0}',
          msgArgs: [10],
        })
      ).toBe('count must be >= 10');
    });

    it('fills every well-known token', () => {
      expect(
        renderFailureMessage({
          test: gte(),
          negated: false,
          name: 'count',
          subject: 7,
          arity: 2,
          target: 10,
          message: '${test}|${arg}|${type}|${name}|${obj}',
        })
      ).toBe('gte()|7|number|count|10');
    });

    it('renders ${obj} as "null" for predicates', () => {
      expect(
        renderFailureMessage({
          test: even(),
          negated: false,
          name: 'n',
          subject: 3,
          arity: 1,
          message: '${name}: ${obj}',
        })
      ).toBe('n: null');
    });

    it('renders ${type} as "null" for a null subject', () => {
      expect(
        renderFailureMessage({
          test: even(),
          negated: false,
          subject: null,
          arity: 1,
          message: '${name} (${type})',
        })
      ).toBe('argument (null)');
    });

    it('keeps tokens past the supplied arguments', () => {
      expect(
        renderFailureMessage({
          test: even(),
          negated: false,
          name: 'n',
          subject: 3,
          arity: 1,
          message: '${arg} is ${5}',
          msgArgs: ['a', 'b', 'c'],
        })
      ).toBe('3 is ${5}');
    });

    it('uses the function name of unregistered tests for ${test}', () => {
      expect(
        renderFailureMessage({
          test: isPrime,
          negated: false,
          subject: 9,
          arity: 1,
          message: '${test} failed',
        })
      ).toBe('isPrime failed');
    });
  });
});

describe('templateVector', () => {
  it('lays out the well-known values before the caller arguments', () => {
    const args = new MessageArgs({
      test: gt(),
      negated: false,
      name: 'size',
      subject: 7,
      declaredType: 'int',
      arity: 2,
      target: 5,
    });
    expect(templateVector(args, ['x'], BUILTIN_REGISTRY)).toEqual([
      'gt()',
      '7',
      'int',
      'size',
      '5',
      'x',
    ]);
  });
});

describe('testName', () => {
  it('adds parentheses to registered names', () => {
    expect(testName(even(), BUILTIN_REGISTRY)).toBe('even()');
  });

  it('uses the function name otherwise', () => {
    expect(testName(isPrime, BUILTIN_REGISTRY)).toBe('isPrime');
  });
});
