import { OverflowError, assertInteger, safeAdd, safeMultiply } from "./errors";
import { pow2 } from "./heap";
import { Histogram, histogram } from "./histogram";
import { propagate, type PropagateOptions } from "./propagate";

/**
 * Split of a `csp`-bit challenge into `tau` chunks: `t0` chunks of `k0` bits and
 * `t1` chunks of `k1` bits, with `k0 = ⌈csp/tau⌉` and `k1 = ⌊csp/tau⌋`.
 */
export interface VcParams {
  t0: number;
  k0: number;
  t1: number;
  k1: number;
}

export function vcParams(csp: number, tau: number): VcParams {
  assertInteger(csp, "vcParams: csp");
  assertInteger(tau, "vcParams: tau");
  if (tau <= 0) throw new Error(`vcParams: tau must be positive, got ${tau}`);
  if (csp < 0) throw new Error(`vcParams: csp must be non-negative, got ${csp}`);

  const k1 = Math.floor(csp / tau);
  const t0 = csp % tau;
  return { t0, k0: t0 === 0 ? k1 : k1 + 1, t1: tau - t0, k1 };
}

/** Number of opened nodes across all chunks: t0·k0 + t1·k1. */
export function openSize(csp: number, tau: number): number {
  const { t0, k0, t1, k1 } = vcParams(csp, tau);
  return t0 * k0 + t1 * k1;
}

/** Total leaf count of the chunk trees: t0·2^k0 + t1·2^k1. */
export function leafCount(csp: number, tau: number): number {
  const { t0, k0, t1, k1 } = vcParams(csp, tau);
  return safeAdd(
    safeMultiply(t0, pow2(k0), "leafCount"),
    safeMultiply(t1, pow2(k1), "leafCount"),
    "leafCount"
  );
}

/** Rounds a bit count up to a whole number of bytes, in bits. */
export function roundToByte(bits: number): number {
  if (!Number.isFinite(bits)) {
    throw new OverflowError(`roundToByte: ${bits} is not finite`);
  }
  return Math.ceil(bits / 8) * 8;
}

export interface OpenSubtreeOptions extends PropagateOptions {
  /** Bits removed from `csp` by grinding before the split. Defaults to 0. */
  grinding?: number;
}

/**
 * Histogram of the open-subtree count after `tau` steps over a tree holding
 * `leafCount(csp - grinding, tau)` leaves. Returns an empty histogram when tau
 * is not positive or grinding leaves no challenge bits.
 */
export function openSubtreeHistogram(
  csp: number,
  tau: number,
  options: OpenSubtreeOptions = {}
): Histogram {
  const { grinding = 0, ...propagateOptions } = options;
  assertInteger(grinding, "openSubtreeHistogram: grinding");
  if (tau <= 0 || csp - grinding < 0) return Histogram.empty();

  const leaves = leafCount(csp - grinding, tau);
  return histogram(propagate(leaves, tau, propagateOptions));
}
