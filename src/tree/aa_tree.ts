/***
 * AATree — Balancing engine behind OrderedSet.
 *
 * Owns the root and the node count. Insertion and deletion are recursive
 * descents that repair the AA invariants on the way back up:
 *
 *   insert: skew → split at every level of the insertion path
 *   erase:  decrease_level → skew ×3 down the right spine → split ×2
 *
 * Recursion depth is bounded by the tree height, O(log n).
 *
 * Values are never moved between nodes. Erasing an internal node removes
 * its in-order neighbour (always a leaf in a valid AA tree) and moves that
 * neighbour's node into the vacated position, so the only node that leaves
 * the tree is the one holding the erased value.
 *
 ***/

import { assert, is_non_null } from "type_primitives";
import type { Comparator } from "../comparator";
import {
  AANode,
  copy_subtree,
  detach,
  is_leaf,
  leftmost,
  predecessor,
  rightmost,
  set_left,
  set_right,
  successor,
} from "./node";
import { decrease_level, skew, split } from "./rotation";

export class AATree<T> {
  private _root: AANode<T> | null = null;
  private _size = 0;
  private _compare: Comparator<T>;

  constructor(compare: Comparator<T>) {
    this._compare = compare;
  }

  get root(): AANode<T> | null {
    return this._root;
  }

  get size(): number {
    return this._size;
  }

  get compare(): Comparator<T> {
    return this._compare;
  }

  //=========================================================
  // Mutation
  //=========================================================

  /** Returns true if a node was created, false for a duplicate. */
  insert(value: T): boolean {
    const before = this._size;
    const root = this._insert(this._root, value);
    root.parent = null;
    this._root = root;
    return this._size !== before;
  }

  /** Returns true if a node was removed, false if `value` was absent. */
  erase(value: T): boolean {
    const before = this._size;
    const root = this._erase(this._root, value);
    if (root !== null) root.parent = null;
    this._root = root;
    return this._size !== before;
  }

  clear(): void {
    this._root = null;
    this._size = 0;
  }

  /** Replace contents, ordering and shape with a deep copy of `source`. */
  assign(source: AATree<T>): void {
    if (source === this) return;
    this._compare = source._compare;
    this._root = copy_subtree(source._root);
    this._size = source._size;
  }

  //=========================================================
  // Lookup
  //=========================================================

  first_node(): AANode<T> | null {
    return this._root === null ? null : leftmost(this._root);
  }

  last_node(): AANode<T> | null {
    return this._root === null ? null : rightmost(this._root);
  }

  /** Node holding the smallest value not less than `value`. */
  lower_bound_node(value: T): AANode<T> | null {
    let best: AANode<T> | null = null;
    let node = this._root;
    while (node !== null) {
      if (this._compare(node.value, value) < 0) {
        node = node.right;
      } else {
        best = node;
        node = node.left;
      }
    }
    return best;
  }

  find_node(value: T): AANode<T> | null {
    const node = this.lower_bound_node(value);
    if (node === null || this._compare(value, node.value) !== 0) return null;
    return node;
  }

  //=========================================================
  // Internal
  //=========================================================

  private _insert(node: AANode<T> | null, value: T): AANode<T> {
    if (node === null) {
      this._size++;
      return new AANode(value);
    }

    const c = this._compare(value, node.value);
    if (c < 0) {
      set_left(node, this._insert(node.left, value));
    } else if (c > 0) {
      set_right(node, this._insert(node.right, value));
    } else {
      return node;
    }

    return split(skew(node));
  }

  private _erase(node: AANode<T> | null, value: T): AANode<T> | null {
    if (node === null) return null;

    const c = this._compare(value, node.value);
    if (c < 0) {
      set_left(node, this._erase(node.left, value));
    } else if (c > 0) {
      set_right(node, this._erase(node.right, value));
    } else if (is_leaf(node)) {
      detach(node);
      this._size--;
      return null;
    } else {
      node = this._replace_with_neighbour(node);
    }

    return this._rebalance(node);
  }

  /**
   * Remove the in-order neighbour of internal `node` from the adjacent
   * subtree, then put the neighbour's node in `node`'s place with its
   * level, children and parent.
   */
  private _replace_with_neighbour(node: AANode<T>): AANode<T> {
    const from_right = node.left === null;
    const neighbour = from_right ? successor(node) : predecessor(node);
    assert<AANode<T> | null, AANode<T>>(
      neighbour,
      is_non_null,
      "internal node has an in-order neighbour",
    );

    if (from_right) {
      set_right(node, this._erase(node.right, neighbour.value));
    } else {
      set_left(node, this._erase(node.left, neighbour.value));
    }

    neighbour.level = node.level;
    neighbour.parent = node.parent;
    set_left(neighbour, node.left);
    set_right(neighbour, node.right);
    detach(node);
    return neighbour;
  }

  private _rebalance(node: AANode<T>): AANode<T> {
    decrease_level(node);
    node = skew(node);
    set_right(node, skew(node.right));
    if (node.right !== null) {
      set_right(node.right, skew(node.right.right));
    }
    node = split(node);
    set_right(node, split(node.right));
    return node;
  }
}
