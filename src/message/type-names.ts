/**
 * Type Names
 * Short display names for values and constructors.
 */

/**
 * Name of a constructor or function, `anonymous` when it has none.
 */
export function constructorName(fn: { readonly name: string }): string {
  return fn.name === '' ? 'anonymous' : fn.name;
}

/**
 * Short type name of a value.
 *
 * - primitives: `number`, `string`, `boolean`, `bigint`, `symbol`
 * - functions: `Function`
 * - objects: the constructor name (`Array`, `Map`, `Number`, `Employee`),
 *   `Object` for null-prototype objects
 *
 * Returns `undefined` for `null` and `undefined`: their type cannot be
 * resolved from the value.
 */
export function simpleTypeName(value: unknown): string | undefined {
  if (value === null || value === undefined) {
    return undefined;
  }
  switch (typeof value) {
    case 'function':
      return 'Function';
    case 'object': {
      const proto: unknown = Object.getPrototypeOf(value);
      if (proto === null || typeof proto !== 'object') {
        return 'Object';
      }
      const ctor: unknown = Object.getOwnPropertyDescriptor(
        proto,
        'constructor'
      )?.value;
      return typeof ctor === 'function' && ctor.name !== ''
        ? ctor.name
        : 'Object';
    }
    default:
      return typeof value;
  }
}

/**
 * Declared type if present, otherwise the inferred type of the value.
 */
export function resolveTypeName(
  value: unknown,
  declaredType?: string
): string | undefined {
  return declaredType ?? simpleTypeName(value);
}
