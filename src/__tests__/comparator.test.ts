import { describe, expect, it } from "vitest";
import { unsafe_cast } from "type_primitives";
import { type Comparable, default_compare, reverse } from "../comparator";
import { SET_ERROR, SetError } from "../utils/error";

describe("default_compare", () => {
  it("orders numbers", () => {
    expect(default_compare(1, 2)).toBe(-1);
    expect(default_compare(2, 1)).toBe(1);
    expect(default_compare(3, 3)).toBe(0);
    expect(default_compare(-0, 0)).toBe(0);
  });

  it("orders strings by code unit", () => {
    expect(default_compare("apple", "banana")).toBe(-1);
    expect(default_compare("b", "B")).toBe(1);
    expect(default_compare("same", "same")).toBe(0);
  });

  it("orders bigints", () => {
    expect(default_compare(10n, 9n)).toBe(1);
    expect(default_compare(2n ** 70n, 2n ** 70n)).toBe(0);
  });

  it("orders infinities at the extremes", () => {
    expect(default_compare(-Infinity, -1e308)).toBe(-1);
    expect(default_compare(Infinity, 1e308)).toBe(1);
  });

  it("throws INCOMPARABLE_VALUE for NaN", () => {
    let caught: unknown;
    try {
      default_compare(NaN, 1);
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(SetError);
    expect((caught as SetError).category).toBe(SET_ERROR.INCOMPARABLE_VALUE);
  });

  it("throws INCOMPARABLE_VALUE for values outside numbers, strings and bigints", () => {
    const objects = unsafe_cast<Comparable>({ id: 1 });
    expect(() => default_compare(objects, 2)).toThrow(
      "Values other than numbers, strings and bigints need a comparator",
    );
  });
});

describe("reverse", () => {
  it("flips the sign of the wrapped comparator", () => {
    const desc = reverse(default_compare);
    expect(desc(1, 2)).toBe(1);
    expect(desc(2, 1)).toBe(-1);
    expect(desc(4, 4)).toBe(0);
  });
});
