/***
 * Rotations — Local AA tree repairs.
 *
 * skew removes a left horizontal link, split removes two consecutive
 * right horizontal links. Both rewire links on the existing node
 * objects, so node identity survives every rotation. Each returns the
 * root of the repaired subtree, which inherits the old root's `parent`;
 * the caller reattaches it under that parent.
 *
 *   skew(D):                          split(B):
 *
 *        B <── D            B ──> D        B ──> C ──> E          C
 *       / \     \    =>    /     / \      /     /       =>       / \
 *      A   C     F        A     C   F    A     D                B   E
 *                                                              / \
 *                                                             A   D
 *
 ***/

import { AANode, level_of, set_left, set_right } from "./node";

export function skew<T>(node: AANode<T>): AANode<T>;
export function skew<T>(node: AANode<T> | null): AANode<T> | null;
export function skew<T>(node: AANode<T> | null): AANode<T> | null {
  if (node === null || node.left === null || node.left.level !== node.level) {
    return node;
  }
  const left = node.left;
  left.parent = node.parent;
  set_left(node, left.right);
  set_right(left, node);
  return left;
}

export function split<T>(node: AANode<T>): AANode<T>;
export function split<T>(node: AANode<T> | null): AANode<T> | null;
export function split<T>(node: AANode<T> | null): AANode<T> | null {
  if (
    node === null ||
    node.right === null ||
    node.right.right === null ||
    node.right.right.level !== node.level
  ) {
    return node;
  }
  const right = node.right;
  right.parent = node.parent;
  set_right(node, right.left);
  set_left(right, node);
  right.level += 1;
  return right;
}

/**
 * Lower `node` to one above its shallower child after a removal beneath
 * it. A right child sharing the old level is pulled down with it.
 */
export function decrease_level<T>(node: AANode<T>): AANode<T> {
  const expected = Math.min(level_of(node.left), level_of(node.right)) + 1;
  if (expected < node.level) {
    node.level = expected;
    if (node.right !== null && expected < node.right.level) {
      node.right.level = expected;
    }
  }
  return node;
}
