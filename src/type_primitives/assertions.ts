/***
 * Assertions — Dev-only runtime validation and branded casting.
 *
 * All checks are guarded by __DEV__ and tree-shaken in production builds,
 * where a violated precondition is undefined behaviour.
 * validate_and_cast is the primary tool for creating branded values:
 * it validates the input in dev and returns the value as the branded type.
 * unsafe_cast bypasses all checks (used when the caller guarantees validity).
 *
 ***/

import { TYPE_ERROR, TypeError } from "./error";

export const is_non_negative_integer = (v: number): boolean =>
  Number.isInteger(v) && v >= 0;

/** Dev-only precondition check on a plain boolean. */
export function precondition(
  condition: boolean,
  err_message: string,
  context?: Record<string, unknown>,
): void {
  if (__DEV__ && !condition) {
    throw new TypeError(
      TYPE_ERROR.ASSERTION_FAIL_CONDITION,
      `Precondition violated: ${err_message}`,
      context,
    );
  }
}

export function validate_and_cast<T, Result extends T = T>(
  value: T,
  validator: (v: T) => boolean,
  err_message: string,
): Result {
  if (__DEV__ && !validator(value)) {
    throw new TypeError(
      TYPE_ERROR.VALIDATION_FAIL_CONDITION,
      `Expected value to meet validation: ${err_message}`,
    );
  }
  return value as Result;
}

export function unsafe_cast<T>(value: unknown): T {
  return value as T;
}
