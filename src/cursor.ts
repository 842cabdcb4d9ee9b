/***
 * Cursor — Bidirectional position in an OrderedSet.
 *
 * A cursor is a (tree, node) pair; a null node is the end position, one
 * past the largest value. Stepping uses the nodes' parent links instead
 * of a stack:
 *
 *   increment: right child → leftmost of the right subtree, otherwise
 *              climb while coming up from a right child, then take the
 *              parent (none left → end)
 *   decrement: the mirror image; from end it lands on the largest value
 *
 * Rotations never replace nodes, so a cursor stays valid across inserts
 * and across erasing any value other than the one it is positioned on.
 *
 ***/

import type { AATree } from "./tree/aa_tree";
import { type AANode, leftmost, rightmost } from "./tree/node";
import { SET_ERROR, SetError } from "./utils/error";

export class Cursor<T> {
  /** @internal Cursors are obtained from OrderedSet, not constructed. */
  constructor(
    private readonly _tree: AATree<T>,
    private _node: AANode<T> | null = null,
  ) {}

  get is_end(): boolean {
    return this._node === null;
  }

  /** Value at this position. Throws on the end position. */
  get value(): T {
    return this._current("dereference").value;
  }

  /** Move to the next larger value, or to end after the largest. */
  increment(): this {
    let node = this._current("increment");
    if (node.right !== null) {
      this._node = leftmost(node.right);
      return this;
    }
    let parent = node.parent;
    while (parent !== null && parent.right === node) {
      node = parent;
      parent = node.parent;
    }
    this._node = parent;
    return this;
  }

  /**
   * Move to the next smaller value. From end, moves to the largest value
   * (stays at end when the set is empty); from the smallest, moves to end.
   */
  decrement(): this {
    let node = this._node;
    if (node === null) {
      this._node = this._tree.last_node();
      return this;
    }
    if (node.left !== null) {
      this._node = rightmost(node.left);
      return this;
    }
    let parent = node.parent;
    while (parent !== null && parent.left === node) {
      node = parent;
      parent = node.parent;
    }
    this._node = parent;
    return this;
  }

  /** Same set and same position. */
  equals(other: Cursor<T>): boolean {
    return this._tree === other._tree && this._node === other._node;
  }

  same_set(other: Cursor<T>): boolean {
    return this._tree === other._tree;
  }

  clone(): Cursor<T> {
    return new Cursor(this._tree, this._node);
  }

  private _current(action: string): AANode<T> {
    const node = this._node;
    if (node === null) {
      throw new SetError(
        SET_ERROR.CURSOR_OUT_OF_RANGE,
        `Cannot ${action} the end cursor`,
      );
    }
    return node;
  }
}
