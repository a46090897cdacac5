/**
 * Vouch Module
 * Exports the check API, the built-in tests, message formatting and errors
 */

// ============================================================
// CHECK API
// ============================================================

export { Check, type CheckSettings } from './check/check.js';
export {
  check,
  checkInt,
  checkNotNull,
  checkOn,
  createChecker,
  fail,
  failOn,
  type Checker,
} from './check/checker.js';
export type {
  CheckerOptions,
  FailureEvent,
  ObservabilityCallbacks,
  Predicate,
  Relation,
} from './check/types.js';

// ============================================================
// BUILT-IN TESTS
// ============================================================

export {
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
} from './checks/predicates.js';
export {
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
  type Constructor,
  type Range,
} from './checks/relations.js';
export {
  BUILTIN_ENTRIES,
  BUILTIN_PAIRS,
  BUILTIN_REGISTRY,
} from './checks/catalog.js';

// ============================================================
// MESSAGES
// ============================================================

export {
  DEFAULT_ARG_NAME,
  MessageArgs,
  type MessageArgsInit,
  type TestIdentity,
} from './message/message-args.js';
export {
  predicateMessage,
  relationMessage,
  sizeMessage,
  was,
  type Formatter,
  type Measurement,
  type ShowSubject,
} from './message/phrasing.js';
export {
  createFormatterRegistry,
  type ComplementaryPair,
  type FormatterEntry,
  type FormatterRegistry,
} from './message/registry.js';
export {
  customMessage,
  fallbackMessage,
  prefabMessage,
  renderFailureMessage,
  templateVector,
  testName,
  type Failure,
} from './message/render.js';
export {
  constructorName,
  resolveTypeName,
  simpleTypeName,
} from './message/type-names.js';
export {
  classifyValue,
  ellipsis,
  identityTag,
  identityText,
  renderValue,
  ELLIPSIS,
  MAX_ELEMENTS,
  MAX_TEXT_WIDTH,
  type ValueShape,
} from './message/values.js';
export {
  compileTemplate,
  formatArguments,
  formatTemplate,
  renderTemplate,
  EXTRA_ARGS_OFFSET,
  WELL_KNOWN_TOKENS,
  type TemplateSegment,
  type WellKnownToken,
} from './template/index.js';

// ============================================================
// ERRORS
// ============================================================

export {
  ArgumentError,
  createError,
  illegalArgument,
  illegalState,
  RegistryError,
  StateError,
  UsageError,
  VouchError,
  type ErrorFactory,
  type VouchErrorData,
} from './error-classes.js';
export {
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorRegistry,
} from './error-registry.js';
