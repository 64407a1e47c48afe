/***
 * Assertions — Dev-only runtime checks and branded casting.
 *
 * Every check is guarded by __DEV__ and disappears from production builds.
 * validate_and_cast is how branded IDs are minted; unsafe_cast is reserved
 * for type-erased slots whose key already fixes the value's type.
 *
 ***/

import { TYPE_ERROR, TypeError } from "./error";

export const is_non_negative_integer = (v: number): boolean =>
  Number.isInteger(v) && v >= 0;

export function assert(
  condition: boolean,
  err_message: string,
  context?: Record<string, unknown>,
): asserts condition {
  if (__DEV__ && !condition) {
    throw new TypeError(
      TYPE_ERROR.ASSERTION_FAIL_CONDITION,
      `Assertion failed: ${err_message}`,
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
