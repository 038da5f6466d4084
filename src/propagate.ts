import { Configuration } from "./configuration";
import { Distribution, DistributionAccumulator } from "./distribution";
import { InvariantError, assertInteger } from "./errors";
import { SplitCache } from "./split-cache";
import { MASS_EPS } from "./types";

/** Progress report passed to `onStep` after every completed step. */
export interface StepEvent {
  /** 1-based index of the step just completed. */
  step: number;
  steps: number;
  /** Leaves that were still unrevealed when this step picked one. */
  remainingLeaves: number;
  distribution: Distribution;
  /** Distinct subtree sizes whose split distribution has been computed. */
  cacheSize: number;
}

export interface PropagateOptions {
  /** Split cache to use instead of a fresh one. */
  cache?: SplitCache;
  onStep?: (event: StepEvent) => void;
  /**
   * Largest allowed distance of the total mass from 1 after any step.
   * Pass Infinity to skip the check.
   */
  massTolerance?: number;
}

/**
 * One split step: a leaf is picked uniformly among `remainingLeaves`, and the
 * open subtree holding it is replaced by the subtrees its split leaves open.
 *
 * Every configuration in `dist` must hold exactly `remainingLeaves` leaves.
 */
export function propagateStep(
  dist: Distribution,
  remainingLeaves: number,
  cache: SplitCache = new SplitCache()
): Distribution {
  assertInteger(remainingLeaves, "propagateStep: remainingLeaves");
  const next = new DistributionAccumulator();

  for (const [config, prob] of dist) {
    if (config.totalLeaves() !== remainingLeaves) {
      throw new InvariantError(
        `propagateStep: ${config.toString()} holds ${config.totalLeaves()} leaves, expected ${remainingLeaves}`
      );
    }
    for (const [size, count] of config) {
      const pickProb = (prob * (size * count)) / remainingLeaves;
      if (pickProb === 0) continue;

      const base = config.decrementOne(size);
      if (base === undefined) {
        throw new InvariantError(
          `propagateStep: subtree size ${size} missing from ${config.toString()}`
        );
      }
      next.addScaled(cache.get(size), pickProb, base);
    }
  }
  return next.build();
}

/**
 * Distribution over open-subtree configurations after `steps` split steps,
 * starting from a single open subtree of `leaves` leaves.
 *
 * Invalid input (leaves <= 0, steps < 0, or more steps than leaves) yields the
 * empty distribution.
 */
export function propagate(
  leaves: number,
  steps: number,
  options: PropagateOptions = {}
): Distribution {
  assertInteger(leaves, "propagate: leaves");
  assertInteger(steps, "propagate: steps");
  if (leaves <= 0 || steps < 0 || steps > leaves) return Distribution.empty();

  const cache = options.cache ?? new SplitCache();
  const tolerance = options.massTolerance ?? MASS_EPS;

  let dist = Distribution.point(Configuration.single(leaves));
  for (let i = 0; i < steps; i++) {
    const remainingLeaves = leaves - i;
    dist = propagateStep(dist, remainingLeaves, cache);

    const drift = Math.abs(dist.mass() - 1);
    if (drift > tolerance) {
      throw new InvariantError(
        `propagate: total mass drifted by ${drift} after step ${i + 1} of ${steps}`
      );
    }

    options.onStep?.({
      step: i + 1,
      steps,
      remainingLeaves,
      distribution: dist,
      cacheSize: cache.size,
    });
  }
  return dist;
}
