/**
 * Builder transforms for singleton constants.
 *
 * A `Name` spelled `None`, `True` or `False` and a raw `null`/`true`/`false`
 * literal become dedicated variants instead of generic names and constants.
 */

export type SingletonConstant =
  | { readonly kind: 'NoneConst'; readonly value: null }
  | { readonly kind: 'Bool'; readonly value: boolean };

const NONE: SingletonConstant = Object.freeze({ kind: 'NoneConst', value: null });
const TRUE: SingletonConstant = Object.freeze({ kind: 'Bool', value: true });
const FALSE: SingletonConstant = Object.freeze({ kind: 'Bool', value: false });

export const CONST_NAME_TRANSFORMS: ReadonlyMap<string, SingletonConstant> = new Map<string, SingletonConstant>([
  ['None', NONE],
  ['True', TRUE],
  ['False', FALSE],
]);

export const CONST_VALUE_TRANSFORMS: ReadonlyMap<null | boolean, SingletonConstant> = new Map<
  null | boolean,
  SingletonConstant
>([
  [null, NONE],
  [true, TRUE],
  [false, FALSE],
]);
