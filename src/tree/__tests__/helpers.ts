import { AANode, set_left, set_right } from "../node";

/** Hand-built node with the given level and children. */
export function make_node<T>(
  value: T,
  level = 1,
  left: AANode<T> | null = null,
  right: AANode<T> | null = null,
): AANode<T> {
  const node = new AANode(value);
  node.level = level;
  set_left(node, left);
  set_right(node, right);
  return node;
}

/**
 * Compact shape string: `value:level` for a leaf,
 * `value:level(left,right)` otherwise, empty for a missing child.
 */
export function shape<T>(node: AANode<T> | null): string {
  if (node === null) return "";
  const head = `${String(node.value)}:${node.level}`;
  if (node.left === null && node.right === null) return head;
  return `${head}(${shape(node.left)},${shape(node.right)})`;
}

export function in_order<T>(node: AANode<T> | null, out: T[] = []): T[] {
  if (node === null) return out;
  in_order(node.left, out);
  out.push(node.value);
  in_order(node.right, out);
  return out;
}

/** Deterministic PRNG (mulberry32) returning floats in [0, 1). */
export function seeded_random(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export const numeric = (a: number, b: number): number => a - b;
