/***
 * Relational operators over the visible sequences of two arrays.
 *
 * Capacity never takes part: arrays built through different growth
 * histories compare equal when their elements do. Ordering is
 * lexicographic on an element-wise `is_less`; the remaining relations
 * derive from it (a <= b is !(b < a), a > b is b < a, a >= b is !(a < b)).
 *
 * Without an explicit `is_less`, elements must be numbers, strings or
 * bigints; anything else throws ContainerError(INCOMPARABLE_ELEMENTS).
 *
 ***/

import { CONTAINER_ERROR, ContainerError } from "utils/error";
import type { ReadonlyGrowableArray } from "./growable_array";

export type EqualsFn<T> = (a: T, b: T) => boolean;
export type LessFn<T> = (a: T, b: T) => boolean;

/** Element types ordered by the built-in `<`. */
export type Ordered = number | string | bigint;

export interface Relation {
  <T extends Ordered>(
    lhs: ReadonlyGrowableArray<T>,
    rhs: ReadonlyGrowableArray<T>,
  ): boolean;
  <T>(
    lhs: ReadonlyGrowableArray<T>,
    rhs: ReadonlyGrowableArray<T>,
    is_less: LessFn<T>,
  ): boolean;
}

export interface Comparison {
  <T extends Ordered>(
    lhs: ReadonlyGrowableArray<T>,
    rhs: ReadonlyGrowableArray<T>,
  ): -1 | 0 | 1;
  <T>(
    lhs: ReadonlyGrowableArray<T>,
    rhs: ReadonlyGrowableArray<T>,
    is_less: LessFn<T>,
  ): -1 | 0 | 1;
}

const strict_equals = <T>(a: T, b: T): boolean => a === b;

export function equals<T>(
  lhs: ReadonlyGrowableArray<T>,
  rhs: ReadonlyGrowableArray<T>,
  eq: EqualsFn<T> = strict_equals,
): boolean {
  const size = lhs.size;
  if (size !== rhs.size) return false;
  for (let i = 0; i < size; i++) {
    if (!eq(lhs.get(i), rhs.get(i))) return false;
  }
  return true;
}

export function not_equals<T>(
  lhs: ReadonlyGrowableArray<T>,
  rhs: ReadonlyGrowableArray<T>,
  eq: EqualsFn<T> = strict_equals,
): boolean {
  return !equals(lhs, rhs, eq);
}

export const less: Relation = <T>(
  lhs: ReadonlyGrowableArray<T>,
  rhs: ReadonlyGrowableArray<T>,
  is_less: LessFn<T> = natural_less,
): boolean => lexicographical_less(lhs, rhs, is_less);

export const less_equal: Relation = <T>(
  lhs: ReadonlyGrowableArray<T>,
  rhs: ReadonlyGrowableArray<T>,
  is_less: LessFn<T> = natural_less,
): boolean => !lexicographical_less(rhs, lhs, is_less);

export const greater: Relation = <T>(
  lhs: ReadonlyGrowableArray<T>,
  rhs: ReadonlyGrowableArray<T>,
  is_less: LessFn<T> = natural_less,
): boolean => lexicographical_less(rhs, lhs, is_less);

export const greater_equal: Relation = <T>(
  lhs: ReadonlyGrowableArray<T>,
  rhs: ReadonlyGrowableArray<T>,
  is_less: LessFn<T> = natural_less,
): boolean => !lexicographical_less(lhs, rhs, is_less);

/** Three-way form of `less`, shaped for Array.prototype.sort. */
export const compare: Comparison = <T>(
  lhs: ReadonlyGrowableArray<T>,
  rhs: ReadonlyGrowableArray<T>,
  is_less: LessFn<T> = natural_less,
): -1 | 0 | 1 => {
  if (lexicographical_less(lhs, rhs, is_less)) return -1;
  if (lexicographical_less(rhs, lhs, is_less)) return 1;
  return 0;
};

function lexicographical_less<T>(
  lhs: ReadonlyGrowableArray<T>,
  rhs: ReadonlyGrowableArray<T>,
  is_less: LessFn<T>,
): boolean {
  const lhs_size = lhs.size;
  const rhs_size = rhs.size;
  const shared = lhs_size < rhs_size ? lhs_size : rhs_size;
  for (let i = 0; i < shared; i++) {
    const a = lhs.get(i);
    const b = rhs.get(i);
    if (is_less(a, b)) return true;
    if (is_less(b, a)) return false;
  }
  return lhs_size < rhs_size;
}

function natural_less(a: unknown, b: unknown): boolean {
  if (typeof a === "number" && typeof b === "number") return a < b;
  if (typeof a === "string" && typeof b === "string") return a < b;
  if (typeof a === "bigint" && typeof b === "bigint") return a < b;
  throw new ContainerError(
    CONTAINER_ERROR.INCOMPARABLE_ELEMENTS,
    `Cannot order ${typeof a} against ${typeof b} without an is_less function`,
    { lhs: typeof a, rhs: typeof b },
  );
}
