import { describe, expect, it } from "vitest";
import { assert, is_non_null, unsafe_cast } from "../assertions";
import { TypeError, TYPE_ERROR } from "../error";

describe("assertions", () => {
  //=========================================================
  // is_non_null
  //=========================================================

  it("is_non_null returns false for null", () => {
    expect(is_non_null(null)).toBe(false);
  });

  it("is_non_null returns true for undefined", () => {
    // is_non_null only checks !== null, not == null
    expect(is_non_null(undefined)).toBe(true);
  });

  it("is_non_null returns true for falsy non-null values", () => {
    expect(is_non_null(0)).toBe(true);
    expect(is_non_null("")).toBe(true);
    expect(is_non_null(false)).toBe(true);
    expect(is_non_null({})).toBe(true);
  });

  //=========================================================
  // assert
  //=========================================================

  it("assert does not throw when condition passes", () => {
    const is_positive = (v: number): v is number => v > 0;
    expect(() => assert(5, is_positive, "must be positive")).not.toThrow();
  });

  it("assert throws TypeError when condition fails", () => {
    const is_positive = (v: number): v is number => v > 0;
    expect(() => assert(-1, is_positive, "must be positive")).toThrow(
      TypeError,
    );
  });

  it("assert error has ASSERTION_FAIL_CONDITION category", () => {
    const is_positive = (v: number): v is number => v > 0;
    let caught: unknown;
    try {
      assert(-1, is_positive, "must be positive");
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(TypeError);
    expect((caught as TypeError).category).toBe(
      TYPE_ERROR.ASSERTION_FAIL_CONDITION,
    );
  });

  it("assertion failure is the only TYPE_ERROR category", () => {
    expect(Object.values(TYPE_ERROR)).toEqual([
      TYPE_ERROR.ASSERTION_FAIL_CONDITION,
    ]);
  });

  it("assert error message includes the provided description", () => {
    expect(() =>
      assert<string | null, string>(null, is_non_null, "value required"),
    ).toThrow("Expected value to meet condition: value required");
  });

  it("assert error is not operational", () => {
    let caught: unknown;
    try {
      assert<number | null, number>(null, is_non_null, "number");
    } catch (e) {
      caught = e;
    }
    expect((caught as TypeError).is_operational).toBe(false);
  });

  //=========================================================
  // unsafe_cast
  //=========================================================

  it("unsafe_cast returns the same value unchanged", () => {
    const value = 42;
    const result = unsafe_cast<number>(value);
    expect(result).toBe(42);
  });

  it("unsafe_cast preserves object identity", () => {
    const obj = { a: 1 };
    expect(unsafe_cast<Record<string, number>>(obj)).toBe(obj);
  });
});
