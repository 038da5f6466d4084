import { OverflowError, assertInteger } from "./errors";

/**
 * Helpers for 1-based heap indexing of complete binary trees: the root is 1 and
 * the children of `i` are `2i` and `2i + 1`. Depths count from 0 at the root.
 */

/** Largest exponent for which 2^e is still a safe integer. */
export const MAX_EXPONENT = 52;

export function pow2(exponent: number): number {
  assertInteger(exponent, "pow2: exponent");
  if (exponent < 0) {
    throw new Error(`pow2: exponent must be non-negative, got ${exponent}`);
  }
  if (exponent > MAX_EXPONENT) {
    throw new OverflowError(`pow2: exponent ${exponent} is too large`);
  }
  return 2 ** exponent;
}

/** Depth of a heap index, i.e. floor(log2(index)). */
export function depthOf(index: number): number {
  assertInteger(index, "depthOf: index");
  if (index <= 0) {
    throw new Error(`depthOf: index must be positive, got ${index}`);
  }
  // log2 can land one off near powers of two once index passes 2^31
  let depth = Math.floor(Math.log2(index));
  if (2 ** depth > index) depth--;
  else if (2 ** (depth + 1) <= index) depth++;
  return depth;
}

/**
 * Inclusive index range covered by the descendants of `root` that sit `depth`
 * levels below it.
 */
export function levelBounds(root: number, depth: number): [number, number] {
  assertInteger(root, "levelBounds: root");
  if (root <= 0) {
    throw new Error(`levelBounds: root must be positive, got ${root}`);
  }
  const width = pow2(depth);
  const left = root * width;
  const right = left + width - 1;
  if (!Number.isSafeInteger(right)) {
    throw new OverflowError("levelBounds: index exceeds the safe integer range");
  }
  return [left, right];
}

/** Whether `index` lies in the subtree rooted at `root` (a node is in its own subtree). */
export function inSubtree(root: number, index: number): boolean {
  if (root <= 0 || index <= 0) return false;
  const rootDepth = depthOf(root);
  const indexDepth = depthOf(index);
  if (indexDepth < rootDepth) return false;

  const [left, right] = levelBounds(root, indexDepth - rootDepth);
  return index >= left && index <= right;
}
