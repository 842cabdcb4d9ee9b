/***
 * Comparator — Total ordering over set values.
 *
 * A comparator returns a negative number when a < b, a positive number
 * when a > b and zero when the two are equivalent. The set treats
 * equivalent values as the same member; it never calls anything else on
 * stored values.
 *
 ***/

import { SET_ERROR, SetError } from "./utils/error";

export type Comparator<T> = (a: T, b: T) => number;

/** Values ordered natively by `<` and `>`. */
export type Comparable = number | string | bigint;

const is_nan = (v: Comparable): boolean =>
  typeof v === "number" && Number.isNaN(v);

// Values reach here through an unchecked cast when a set has no comparator
const is_comparable = (v: unknown): v is Comparable =>
  typeof v === "number" || typeof v === "string" || typeof v === "bigint";

export function default_compare(a: Comparable, b: Comparable): number {
  if (__DEV__) {
    if (!is_comparable(a) || !is_comparable(b)) {
      throw new SetError(
        SET_ERROR.INCOMPARABLE_VALUE,
        "Values other than numbers, strings and bigints need a comparator",
        { types: [typeof a, typeof b] },
      );
    }
    if (is_nan(a) || is_nan(b)) {
      throw new SetError(
        SET_ERROR.INCOMPARABLE_VALUE,
        "NaN has no position in a total order",
      );
    }
  }
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/** Descending order over the same values as `compare`. */
export function reverse<T>(compare: Comparator<T>): Comparator<T> {
  return (a, b) => compare(b, a);
}
