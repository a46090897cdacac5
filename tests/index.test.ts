/**
 * Tests for the public entry point.
 */

import { describe, it, expect } from 'vitest';
import * as vouch from '../src/index.js';

describe('public API', () => {
  it('exports the check entry points', () => {
    expect(typeof vouch.check).toBe('function');
    expect(typeof vouch.checkInt).toBe('function');
    expect(typeof vouch.checkNotNull).toBe('function');
    expect(typeof vouch.checkOn).toBe('function');
    expect(typeof vouch.createChecker).toBe('function');
    expect(typeof vouch.fail).toBe('function');
    expect(typeof vouch.failOn).toBe('function');
  });

  it('exports the catalog used by the default checker', () => {
    expect(vouch.BUILTIN_REGISTRY.size).toBe(vouch.BUILTIN_ENTRIES.length);
    expect(vouch.BUILTIN_REGISTRY.lookup(vouch.gte())).toBeDefined();
  });

  it('lets hosts extend the built-in catalog', () => {
    const isPrime = (value: number): boolean =>
      value > 1 && [2, 3, 5, 7].every((p) => value === p || value % p !== 0);
    const { check } = vouch.createChecker({
      registry: vouch.createFormatterRegistry(
        [
          ...vouch.BUILTIN_ENTRIES,
          {
            test: isPrime,
            name: 'isPrime',
            format: vouch.predicateMessage('be prime'),
          },
        ],
        vouch.BUILTIN_PAIRS
      ),
    });

    expect(() => check(9, 'n').is(isPrime)).toThrow('n must be prime (was 9)');
    expect(() => check(9, 'n').is(vouch.lt(), 5)).toThrow(
      'n must be < 5 (was 9)'
    );
  });
});
