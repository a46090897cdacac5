/**
 * Tests for value rendering in failure messages.
 */

import { describe, it, expect } from 'vitest';
import {
  classifyValue,
  ellipsis,
  identityTag,
  identityText,
  renderValue,
  MAX_TEXT_WIDTH,
} from '../../src/message/values.js';

describe('renderValue', () => {
  describe('scalars', () => {
    it('renders null and undefined by name', () => {
      expect(renderValue(null)).toBe('null');
      expect(renderValue(undefined)).toBe('undefined');
    });

    it('renders numbers and bigints', () => {
      expect(renderValue(42)).toBe('42');
      expect(renderValue(-1.5)).toBe('-1.5');
      expect(renderValue(10n)).toBe('10');
      expect(renderValue(Number.NaN)).toBe('NaN');
    });

    it('renders booleans', () => {
      expect(renderValue(true)).toBe('true');
      expect(renderValue(false)).toBe('false');
    });

    it('renders symbols with their description', () => {
      expect(renderValue(Symbol('id'))).toBe('Symbol(id)');
    });

    it('renders strings as is', () => {
      expect(renderValue('hello')).toBe('hello');
    });

    it('renders the empty string as a pair of quotes', () => {
      expect(renderValue('')).toBe('""');
    });

    it('quotes whitespace-only strings', () => {
      expect(renderValue('   ')).toBe('"   "');
      expect(renderValue(' \t\n')).toBe('" \t\n"');
    });

    it('does not quote text with leading or trailing spaces', () => {
      expect(renderValue(' a ')).toBe(' a ');
    });
  });

  describe('long text', () => {
    it('keeps a string of exactly the maximum width', () => {
      const text = 'x'.repeat(MAX_TEXT_WIDTH);
      expect(renderValue(text)).toBe(text);
    });

    it('cuts longer strings and appends an ellipsis', () => {
      const rendered = renderValue('a'.repeat(45));
      expect(rendered).toBe(`${'a'.repeat(40)}...`);
      expect(rendered.length).toBe(43);
    });

    it('never exceeds the width plus the ellipsis', () => {
      for (const length of [41, 100, 1000]) {
        expect(ellipsis('b'.repeat(length)).length).toBe(MAX_TEXT_WIDTH + 3);
      }
    });

    it('does not split a character outside the basic plane', () => {
      const rendered = renderValue(`${'a'.repeat(39)}\u{1F600}xyz`);
      expect(rendered).toBe(`${'a'.repeat(39)}...`);
    });

    it('keeps a character outside the basic plane that fits', () => {
      const rendered = renderValue(`${'a'.repeat(38)}\u{1F600}xyz`);
      expect(rendered).toBe(`${'a'.repeat(38)}\u{1F600}...`);
    });
  });

  describe('collections', () => {
    it('renders arrays with their identity and elements', () => {
      const list = [1, 2, 3];
      expect(renderValue(list)).toBe(`Array@${identityTag(list)}: [1, 2, 3]`);
    });

    it('shows at most ten elements', () => {
      const list = [1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12];
      expect(renderValue(list)).toBe(
        `Array@${identityTag(list)}: [1, 2, 3, 4, 5, 6, 7, 8, 9, 10, ...]`
      );
    });

    it('caps the element text at the maximum width', () => {
      const list = ['abcdefghij', 'abcdefghij', 'abcdefghij', 'abcdefghij'];
      expect(renderValue(list)).toBe(
        `Array@${identityTag(list)}: [abcdefghij, abcdefghij, abcdefghij, abcd...]`
      );
    });

    it('renders nested collections by identity only', () => {
      const first = [1];
      const second = new Map<string, number>();
      const list = [first, second];
      expect(renderValue(list)).toBe(
        `Array@${identityTag(list)}: [Array@${identityTag(first)}, Map@${identityTag(second)}]`
      );
    });

    it('renders empty strings inside collections as quotes', () => {
      const list = ['a', ''];
      expect(renderValue(list)).toBe(`Array@${identityTag(list)}: [a, ""]`);
    });

    it('renders sets and typed arrays as sequences', () => {
      const set = new Set([1, 2]);
      const bytes = new Uint8Array([7, 8]);
      expect(renderValue(set)).toBe(`Set@${identityTag(set)}: [1, 2]`);
      expect(renderValue(bytes)).toBe(`Uint8Array@${identityTag(bytes)}: [7, 8]`);
    });

    it('renders maps as key-value pairs', () => {
      const map = new Map<string, number>([
        ['a', 1],
        ['b', 2],
      ]);
      expect(renderValue(map)).toBe(`Map@${identityTag(map)}: {a: 1, b: 2}`);
    });
  });

  describe('objects', () => {
    it('renders plain objects by identity', () => {
      const obj = { id: 7 };
      expect(renderValue(obj)).toBe(`Object@${identityTag(obj)}`);
    });

    it('uses the class name of instances', () => {
      class Employee {}
      const employee = new Employee();
      expect(renderValue(employee)).toBe(`Employee@${identityTag(employee)}`);
    });

    it('uses the text of objects with their own toString', () => {
      class Point {
        toString(): string {
          return 'Point(1, 2)';
        }
      }
      expect(renderValue(new Point())).toBe('Point(1, 2)');
      expect(renderValue(/ab+c/g)).toBe('/ab+c/g');
    });

    it('renders functions by identity', () => {
      const fn = (): number => 1;
      expect(renderValue(fn)).toBe(`Function@${identityTag(fn)}`);
    });
  });
});

describe('identityTag', () => {
  it('returns the same tag for the same object', () => {
    const obj = {};
    expect(identityTag(obj)).toBe(identityTag(obj));
  });

  it('returns different tags for equal objects', () => {
    expect(identityTag([1])).not.toBe(identityTag([1]));
  });

  it('renders the tag in hexadecimal', () => {
    expect(identityTag({})).toMatch(/^[0-9a-f]+$/);
  });
});

describe('identityText', () => {
  it('renders objects as type and tag without their contents', () => {
    const list = [1, 2];
    expect(identityText(list)).toBe(`Array@${identityTag(list)}`);
  });

  it('renders primitives like renderValue', () => {
    expect(identityText('abc')).toBe('abc');
    expect(identityText(null)).toBe('null');
  });
});

describe('classifyValue', () => {
  it('classifies each kind of value', () => {
    expect(classifyValue(undefined).kind).toBe('nullish');
    expect(classifyValue(3n).kind).toBe('number');
    expect(classifyValue(false).kind).toBe('boolean');
    expect(classifyValue('').kind).toBe('text');
    expect(classifyValue(Symbol.iterator).kind).toBe('symbol');
    expect(classifyValue([]).kind).toBe('sequence');
    expect(classifyValue(new Map()).kind).toBe('mapping');
    expect(classifyValue(new Date(0)).kind).toBe('display');
    expect(classifyValue({}).kind).toBe('opaque');
    expect(classifyValue(new DataView(new ArrayBuffer(2))).kind).toBe('opaque');
  });

  it('records the full size of truncated sequences', () => {
    const shape = classifyValue(Array.from({ length: 15 }, (_, i) => i));
    expect(shape).toMatchObject({ kind: 'sequence', typeName: 'Array', size: 15 });
  });
});
