/***
 * Assertions — Dev-only runtime validation and narrowing casts.
 *
 * All checks are guarded by __DEV__ and tree-shaken in production builds.
 * `assert` narrows its argument for the compiler in every build, but only
 * verifies the condition in dev. unsafe_cast bypasses all checks (used
 * when the caller guarantees validity).
 *
 ***/

import { TYPE_ERROR, TypeError } from "./error";

export const is_non_null = <T>(v: T | null): v is T => v !== null;

export function assert<T, Result extends T = T>(
  value: T,
  condition: (v: T) => v is Result,
  err_message: string,
): asserts value is Result {
  if (__DEV__ && !condition(value)) {
    throw new TypeError(
      TYPE_ERROR.ASSERTION_FAIL_CONDITION,
      `Expected value to meet condition: ${err_message}`,
    );
  }
}

export function unsafe_cast<T>(value: unknown): T {
  return value as T;
}
