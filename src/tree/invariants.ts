/***
 * Invariants — Full-tree consistency check.
 *
 * Walks every node once, carrying the open interval its value must fall
 * in, and reports each broken rule:
 *
 *   ORDER                   left subtree < node < right subtree
 *   PARENT_LINK             child.parent is the node holding it; root has none
 *   LEAF_LEVEL              leaves sit at level 1
 *   LEFT_LEVEL              left child level < node level
 *   RIGHT_LEVEL             right child level <= node level
 *   RIGHT_GRANDCHILD_LEVEL  right-right grandchild level < node level
 *   TWO_CHILDREN            every node above level 1 has both children
 *   SIZE                    node count matches the expected cardinality
 *
 ***/

import type { Comparator } from "../comparator";
import { LEAF_LEVEL } from "../utils/constants";
import { type AANode, is_leaf } from "./node";

export enum INVARIANT {
  ORDER = "ORDER",
  PARENT_LINK = "PARENT_LINK",
  LEAF_LEVEL = "LEAF_LEVEL",
  LEFT_LEVEL = "LEFT_LEVEL",
  RIGHT_LEVEL = "RIGHT_LEVEL",
  RIGHT_GRANDCHILD_LEVEL = "RIGHT_GRANDCHILD_LEVEL",
  TWO_CHILDREN = "TWO_CHILDREN",
  SIZE = "SIZE",
}

export interface InvariantViolation<T> {
  rule: INVARIANT;
  /** Value of the offending node; absent for whole-tree rules. */
  value?: T;
}

export function count_nodes<T>(node: AANode<T> | null): number {
  if (node === null) return 0;
  return 1 + count_nodes(node.left) + count_nodes(node.right);
}

/**
 * Check the subtree under `root`. When `size` is given, the node count
 * must match it.
 */
export function verify_tree<T>(
  root: AANode<T> | null,
  compare: Comparator<T>,
  size?: number,
): InvariantViolation<T>[] {
  const violations: InvariantViolation<T>[] = [];
  if (root !== null && root.parent !== null) {
    violations.push({ rule: INVARIANT.PARENT_LINK, value: root.value });
  }
  verify_node(root, null, null, compare, violations);
  if (size !== undefined && count_nodes(root) !== size) {
    violations.push({ rule: INVARIANT.SIZE });
  }
  return violations;
}

function verify_node<T>(
  node: AANode<T> | null,
  low: AANode<T> | null,
  high: AANode<T> | null,
  compare: Comparator<T>,
  out: InvariantViolation<T>[],
): void {
  if (node === null) return;
  const { value, level, left, right } = node;
  const report = (rule: INVARIANT) => out.push({ rule, value });

  if (
    (low !== null && compare(low.value, value) >= 0) ||
    (high !== null && compare(value, high.value) >= 0)
  ) {
    report(INVARIANT.ORDER);
  }
  if (
    (left !== null && left.parent !== node) ||
    (right !== null && right.parent !== node)
  ) {
    report(INVARIANT.PARENT_LINK);
  }
  if (is_leaf(node) && level !== LEAF_LEVEL) report(INVARIANT.LEAF_LEVEL);
  if (left !== null && left.level >= level) report(INVARIANT.LEFT_LEVEL);
  if (right !== null && right.level > level) report(INVARIANT.RIGHT_LEVEL);
  if (right !== null && right.right !== null && right.right.level >= level) {
    report(INVARIANT.RIGHT_GRANDCHILD_LEVEL);
  }
  if (level > LEAF_LEVEL && (left === null || right === null)) {
    report(INVARIANT.TWO_CHILDREN);
  }

  verify_node(left, low, node, compare, out);
  verify_node(right, node, high, compare, out);
}
