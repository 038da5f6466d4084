import { Configuration } from "./configuration";
import { Distribution, DistributionAccumulator } from "./distribution";
import { OverflowError, assertInteger } from "./errors";
import { depthOf, pow2 } from "./heap";

/**
 * Open subtrees exposed along one root-to-leaf path of a perfect tree of the
 * given depth: one subtree of 2^i leaves for every level i below the root.
 */
export function fullTreeConfiguration(depth: number): Configuration {
  const pairs: Array<[number, number]> = [];
  for (let i = 0; i < depth; i++) pairs.push([pow2(i), 1]);
  return Configuration.canonicalize(pairs);
}

/** Heap depths spanned by the leaves of a complete tree holding `n` leaves. */
function leafDepths(n: number): { depthMin: number; depthMax: number } {
  const leafMax = 2 * n - 1;
  if (!Number.isSafeInteger(leafMax)) {
    throw new OverflowError(`splitDistribution: ${n} leaves exceed the index range`);
  }
  return { depthMin: depthOf(n), depthMax: depthOf(leafMax) };
}

/**
 * Leaf counts of the two children of the root of a complete tree with `n`
 * leaves (n >= 2). The shape is fixed by `n`: one child is always a perfect
 * tree and the other takes the remainder.
 */
export function childSizes(n: number): [left: number, right: number] {
  assertInteger(n, "childSizes: n");
  if (n < 2) {
    throw new Error(`childSizes: n must be at least 2, got ${n}`);
  }
  const { depthMin, depthMax } = leafDepths(n);
  const numShallow = pow2(depthMax) - n;

  if (numShallow <= pow2(depthMin - 1)) {
    const left = pow2(depthMax - 1);
    return [left, n - left];
  }
  const right = pow2(depthMin - 1);
  return [n - right, right];
}

/**
 * Distribution of the open subtrees left behind when one uniformly chosen leaf
 * of an `n`-leaf subtree is revealed.
 *
 * Walking from the root towards the chosen leaf, every sibling passed on the way
 * stays open as a single subtree. The leaf falls into a child with probability
 * proportional to that child's leaf count; perfect subtrees need no branching.
 *
 * Returns the empty distribution for n <= 0.
 */
export function splitDistribution(n: number): Distribution {
  assertInteger(n, "splitDistribution: n");
  if (n <= 0) return Distribution.empty();

  const { depthMin, depthMax } = leafDepths(n);
  if (depthMin === depthMax) {
    return Distribution.point(fullTreeConfiguration(depthMax));
  }

  const acc = new DistributionAccumulator();
  for (const side of childSizes(n)) {
    const rest = Configuration.single(n - side);
    acc.addScaled(splitDistribution(side), side / n, rest);
  }
  return acc.build();
}
