/***
 * AANode — Vertex of the AA tree.
 *
 * `left` and `right` are the owning edges: the tree is exactly the set of
 * nodes reachable from the root through them. `parent` is a back-link used
 * only to walk upward (cursor stepping); it never keeps a node alive on
 * its own and is re-set every time a node is attached under a new parent.
 *
 * Level is the AA rank: leaves are at LEAF_LEVEL, an absent child counts
 * as NULL_LEVEL.
 *
 ***/

import { LEAF_LEVEL, NULL_LEVEL } from "../utils/constants";

export class AANode<T> {
  level: number = LEAF_LEVEL;
  parent: AANode<T> | null = null;
  left: AANode<T> | null = null;
  right: AANode<T> | null = null;

  constructor(public value: T) {}
}

export const level_of = <T>(node: AANode<T> | null): number =>
  node === null ? NULL_LEVEL : node.level;

export const is_leaf = <T>(node: AANode<T>): boolean =>
  node.left === null && node.right === null;

export function set_left<T>(node: AANode<T>, child: AANode<T> | null): void {
  node.left = child;
  if (child !== null) child.parent = node;
}

export function set_right<T>(node: AANode<T>, child: AANode<T> | null): void {
  node.right = child;
  if (child !== null) child.parent = node;
}

export function leftmost<T>(node: AANode<T>): AANode<T> {
  let current = node;
  while (current.left !== null) current = current.left;
  return current;
}

export function rightmost<T>(node: AANode<T>): AANode<T> {
  let current = node;
  while (current.right !== null) current = current.right;
  return current;
}

/** Next node in order within `node`'s right subtree, or null without one. */
export const successor = <T>(node: AANode<T>): AANode<T> | null =>
  node.right === null ? null : leftmost(node.right);

/** Previous node in order within `node`'s left subtree, or null without one. */
export const predecessor = <T>(node: AANode<T>): AANode<T> | null =>
  node.left === null ? null : rightmost(node.left);

/** Drop every link so a removed node no longer reaches into the tree. */
export function detach<T>(node: AANode<T>): void {
  node.parent = null;
  node.left = null;
  node.right = null;
}

/**
 * Deep copy of a subtree, preserving values, levels and shape.
 * The copy's root has no parent.
 */
export function copy_subtree<T>(node: AANode<T> | null): AANode<T> | null {
  if (node === null) return null;
  const copy = new AANode(node.value);
  copy.level = node.level;
  set_left(copy, copy_subtree(node.left));
  set_right(copy, copy_subtree(node.right));
  return copy;
}
