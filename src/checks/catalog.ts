/**
 * Built-in Formatter Catalog
 *
 * Prefab messages for every built-in test, plus the complementary pairs the
 * registry uses to phrase negated failures. Formatters of paired tests only
 * phrase the affirmative form.
 */

import type { MessageArgs } from '../message/message-args.js';
import {
  predicateMessage,
  relationMessage,
  sizeMessage,
  was,
  type Formatter,
} from '../message/phrasing.js';
import {
  createFormatterRegistry,
  type ComplementaryPair,
  type FormatterEntry,
  type FormatterRegistry,
} from '../message/registry.js';
import { constructorName } from '../message/type-names.js';
import { identityText, renderValue } from '../message/values.js';
import { sizeOf } from './helpers.js';
import {
  array,
  blank,
  deepNotEmpty,
  deepNotNull,
  empty,
  even,
  integer,
  isNull,
  negative,
  no,
  notBlank,
  notEmpty,
  notNull,
  odd,
  positive,
  yes,
} from './predicates.js';
import {
  contains,
  elementOf,
  endsWith,
  equalTo,
  equalsIgnoreCase,
  gt,
  gte,
  hasKey,
  hasSubstr,
  inRange,
  inRangeClosed,
  instanceOf,
  lt,
  lte,
  matches,
  multipleOf,
  notContains,
  notElementOf,
  notEqualTo,
  notHasKey,
  notSameAs,
  nullOr,
  sameAs,
  sizeEquals,
  sizeGT,
  sizeGTE,
  sizeLT,
  sizeLTE,
  sizeNotEquals,
  startsWith,
} from './relations.js';

// ============================================================
// FORMATTERS WITH THEIR OWN SHAPE
// ============================================================

function rangeBounds(args: MessageArgs): readonly [string, string] {
  const range = args.target;
  if (Array.isArray(range)) {
    return [renderValue(range[0]), renderValue(range[1])];
  }
  return [renderValue(range), renderValue(range)];
}

const formatDeepNotNull: Formatter = (args) =>
  args.negated
    ? `${args.name()} must be null or contain one or more null values${was(args.subject)}`
    : `${args.name()} must not be null or contain null values${was(args.subject)}`;

const formatDeepNotEmpty: Formatter = (args) =>
  args.negated
    ? `${args.typeAndName()} must be empty or contain one or more empty values${was(args.subject)}`
    : `${args.typeAndName()} must not be empty or contain empty values${was(args.subject)}`;

const formatArray: Formatter = (args) =>
  args.negated
    ? `${args.name()} must not be an array${was(args.subject)}`
    : `${args.name()} must be an array (was ${args.typeName() ?? 'null'})`;

const formatSameAs: Formatter = (args) =>
  `${args.name()} must be ${identityText(args.target)} (was ${identityText(args.subject)})`;

const formatNotSameAs: Formatter = (args) =>
  `${args.name()} must not be ${identityText(args.target)}`;

const formatInstanceOf: Formatter = (args) => {
  const target = args.target;
  const type =
    typeof target === 'function' ? constructorName(target) : renderValue(target);
  return args.negated
    ? `${args.name()} must not be instance of ${type}${was(args.subject)}`
    : `${args.name()} must be instance of ${type} (was ${args.typeName() ?? 'null'})`;
};

function formatRange(upper: '<' | '<='): Formatter {
  const outside = upper === '<' ? '>=' : '>';
  return (args) => {
    const [from, to] = rangeBounds(args);
    return args.negated
      ? `${args.name()} must be < ${from} or ${outside} ${to}${was(args.subject)}`
      : `${args.name()} must be >= ${from} and ${upper} ${to}${was(args.subject)}`;
  };
}

// ============================================================
// CATALOG
// ============================================================

/** Formatters for every built-in test */
export const BUILTIN_ENTRIES: readonly FormatterEntry[] = [
  // predicates
  { test: isNull(), name: 'isNull', format: predicateMessage('be null') },
  {
    test: notNull(),
    name: 'notNull',
    format: (args) => `${args.name()} must not be null`,
  },
  { test: yes(), name: 'yes', format: predicateMessage('be true') },
  { test: no(), name: 'no', format: predicateMessage('be false') },
  { test: empty(), name: 'empty', format: predicateMessage('be empty') },
  {
    test: notEmpty(),
    name: 'notEmpty',
    format: (args) =>
      `${args.name()} must not be null or empty${was(args.subject)}`,
  },
  { test: deepNotNull(), name: 'deepNotNull', format: formatDeepNotNull },
  { test: deepNotEmpty(), name: 'deepNotEmpty', format: formatDeepNotEmpty },
  { test: blank(), name: 'blank', format: predicateMessage('be null or blank') },
  {
    test: notBlank(),
    name: 'notBlank',
    format: (args) =>
      `${args.name()} must not be null or blank${was(args.subject)}`,
  },
  { test: integer(), name: 'integer', format: predicateMessage('be an integer') },
  { test: even(), name: 'even', format: predicateMessage('be even') },
  { test: odd(), name: 'odd', format: predicateMessage('be odd') },
  { test: positive(), name: 'positive', format: predicateMessage('be positive') },
  { test: negative(), name: 'negative', format: predicateMessage('be negative') },
  { test: array(), name: 'array', format: formatArray },

  // equality and identity
  { test: equalTo(), name: 'equalTo', format: relationMessage('be equal to') },
  {
    test: notEqualTo(),
    name: 'notEqualTo',
    format: (args) =>
      `${args.name()} must not be equal to ${renderValue(args.target)}`,
  },
  { test: sameAs(), name: 'sameAs', format: formatSameAs },
  { test: notSameAs(), name: 'notSameAs', format: formatNotSameAs },
  { test: nullOr(), name: 'nullOr', format: relationMessage('be null or') },

  // numbers
  { test: gt(), name: 'gt', format: relationMessage('be >') },
  { test: gte(), name: 'gte', format: relationMessage('be >=') },
  { test: lt(), name: 'lt', format: relationMessage('be <') },
  { test: lte(), name: 'lte', format: relationMessage('be <=') },
  {
    test: multipleOf(),
    name: 'multipleOf',
    format: relationMessage('be a multiple of'),
  },
  { test: inRange(), name: 'inRange', format: formatRange('<') },
  { test: inRangeClosed(), name: 'inRangeClosed', format: formatRange('<=') },

  // size
  {
    test: sizeEquals(),
    name: 'sizeEquals',
    format: sizeMessage('be equal to', sizeOf),
  },
  {
    test: sizeNotEquals(),
    name: 'sizeNotEquals',
    format: sizeMessage('not be equal to', sizeOf, 'never'),
  },
  { test: sizeGT(), name: 'sizeGT', format: sizeMessage('be >', sizeOf) },
  {
    test: sizeGTE(),
    name: 'sizeGTE',
    format: sizeMessage('be >=', sizeOf),
  },
  { test: sizeLT(), name: 'sizeLT', format: sizeMessage('be <', sizeOf) },
  {
    test: sizeLTE(),
    name: 'sizeLTE',
    format: sizeMessage('be <=', sizeOf),
  },

  // collections
  {
    test: contains(),
    name: 'contains',
    format: relationMessage('contain', 'never'),
  },
  {
    test: notContains(),
    name: 'notContains',
    format: relationMessage('not contain', 'never'),
  },
  {
    test: elementOf(),
    name: 'elementOf',
    format: relationMessage('be element of'),
  },
  {
    test: notElementOf(),
    name: 'notElementOf',
    format: relationMessage('not be element of'),
  },
  {
    test: hasKey(),
    name: 'hasKey',
    format: relationMessage('contain key', 'never'),
  },
  {
    test: notHasKey(),
    name: 'notHasKey',
    format: relationMessage('not contain key', 'never'),
  },

  // types
  { test: instanceOf(), name: 'instanceOf', format: formatInstanceOf },

  // strings
  {
    test: startsWith(),
    name: 'startsWith',
    format: relationMessage('start with'),
  },
  { test: endsWith(), name: 'endsWith', format: relationMessage('end with') },
  { test: hasSubstr(), name: 'hasSubstr', format: relationMessage('contain') },
  {
    test: equalsIgnoreCase(),
    name: 'equalsIgnoreCase',
    format: relationMessage('be equal ignoring case to'),
  },
  { test: matches(), name: 'matches', format: relationMessage('match') },
];

/** Tests whose affirmative phrasings are each other's negation */
export const BUILTIN_PAIRS: readonly ComplementaryPair[] = [
  [isNull(), notNull()],
  [yes(), no()],
  [empty(), notEmpty()],
  [blank(), notBlank()],
  [equalTo(), notEqualTo()],
  [sameAs(), notSameAs()],
  [gt(), lte()],
  [gte(), lt()],
  [sizeEquals(), sizeNotEquals()],
  [sizeGT(), sizeLTE()],
  [sizeGTE(), sizeLT()],
  [contains(), notContains()],
  [elementOf(), notElementOf()],
  [hasKey(), notHasKey()],
];

/** Registry of the built-in catalog, used when a checker is given none */
export const BUILTIN_REGISTRY: FormatterRegistry = createFormatterRegistry(
  BUILTIN_ENTRIES,
  BUILTIN_PAIRS
);
