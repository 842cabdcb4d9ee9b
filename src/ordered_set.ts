/***
 * OrderedSet — Sorted, deduplicating set backed by an AA tree.
 *
 * Values are kept in ascending order of the set's comparator; values the
 * comparator reports as equal are the same member. Lookups, inserts and
 * erases are O(log n); size is O(1).
 *
 * Usage:
 *
 *   const primes = new OrderedSet([7, 2, 5, 3, 5]);
 *   primes.size;                       // 4
 *   primes.lower_bound(4).value;       // 5
 *
 *   const words = new OrderedSet<string>([], {
 *     compare: (a, b) => a.length - b.length || a.localeCompare(b),
 *   });
 *
 *   for (const it = primes.begin(); !it.is_end; it.increment()) {
 *     console.log(it.value);
 *   }
 *
 * Cursor invalidation: erase(v) invalidates cursors positioned on v only;
 * clear() and assign() invalidate every cursor of the set.
 *
 ***/

import { unsafe_cast } from "type_primitives";
import { type Comparator, default_compare } from "./comparator";
import { Cursor } from "./cursor";
import { AATree } from "./tree/aa_tree";
import { verify_tree } from "./tree/invariants";
import { SET_ERROR, SetError } from "./utils/error";

export interface OrderedSetOptions<T> {
  /**
   * Ordering of values. Defaults to `<`/`>` on numbers, strings and
   * bigints; any other value type must supply one.
   */
  compare?: Comparator<T>;
}

export class OrderedSet<T> implements Iterable<T> {
  private readonly _tree: AATree<T>;

  constructor(values?: Iterable<T>, options?: OrderedSetOptions<T>) {
    this._tree = new AATree(
      options?.compare ?? unsafe_cast<Comparator<T>>(default_compare),
    );
    if (values !== undefined) {
      for (const value of values) this._tree.insert(value);
    }
  }

  /** Build from the values in [first, last) of another set. */
  static from_range<T>(
    first: Cursor<T>,
    last: Cursor<T>,
    options?: OrderedSetOptions<T>,
  ): OrderedSet<T> {
    if (__DEV__ && !first.same_set(last)) {
      throw new SetError(
        SET_ERROR.FOREIGN_CURSOR,
        "Range bounds belong to different sets",
      );
    }
    const set = new OrderedSet<T>(undefined, options);
    for (const it = first.clone(); !it.equals(last); it.increment()) {
      set.insert(it.value);
    }
    return set;
  }

  get size(): number {
    return this._tree.size;
  }

  get compare(): Comparator<T> {
    return this._tree.compare;
  }

  empty(): boolean {
    return this._tree.size === 0;
  }

  //=========================================================
  // Cursors
  //=========================================================

  /** Cursor at the smallest value; equals end() when empty. */
  begin(): Cursor<T> {
    return new Cursor(this._tree, this._tree.first_node());
  }

  end(): Cursor<T> {
    return new Cursor(this._tree);
  }

  /** Cursor at the smallest value not less than `value`, or end(). */
  lower_bound(value: T): Cursor<T> {
    return new Cursor(this._tree, this._tree.lower_bound_node(value));
  }

  /** Cursor at `value`, or end() if absent. */
  find(value: T): Cursor<T> {
    return new Cursor(this._tree, this._tree.find_node(value));
  }

  has(value: T): boolean {
    return this._tree.find_node(value) !== null;
  }

  //=========================================================
  // Mutation
  //=========================================================

  /** Add `value`. No-op if an equal value is present. */
  insert(value: T): void {
    this._tree.insert(value);
  }

  /** Remove `value`. No-op if absent. */
  erase(value: T): void {
    this._tree.erase(value);
  }

  clear(): void {
    this._tree.clear();
  }

  /**
   * Replace contents with a structural copy of `source`, adopting its
   * comparator. Assigning a set to itself does nothing.
   */
  assign(source: OrderedSet<T>): this {
    this._tree.assign(source._tree);
    return this;
  }

  clone(): OrderedSet<T> {
    return new OrderedSet<T>(undefined, { compare: this.compare }).assign(
      this,
    );
  }

  //=========================================================
  // Iteration
  //=========================================================

  *[Symbol.iterator](): IterableIterator<T> {
    for (const it = this.begin(); !it.is_end; it.increment()) {
      yield it.value;
    }
  }

  for_each(fn: (value: T) => void): void {
    for (const it = this.begin(); !it.is_end; it.increment()) fn(it.value);
  }

  to_array(): T[] {
    return Array.from(this);
  }

  //=========================================================
  // Diagnostics
  //=========================================================

  /** Throw if the underlying tree breaks an ordering or balance rule. */
  validate(): void {
    const violations = verify_tree(
      this._tree.root,
      this._tree.compare,
      this._tree.size,
    );
    if (violations.length > 0) {
      throw new SetError(
        SET_ERROR.INVARIANT_VIOLATION,
        `Tree has ${violations.length} invariant violation(s)`,
        { violations },
      );
    }
  }
}
