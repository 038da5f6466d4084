/** A `(subtreeSize, multiplicity)` pair inside a configuration. */
export type SizeCount = readonly [size: number, count: number];

/** A `(nodeCount, probability)` row of a histogram. */
export type HistogramEntry = readonly [nodeCount: number, probability: number];

/** Allowed drift of total mass after a propagation step. */
export const MASS_EPS = 1e-6;

/** Allowed drift of total mass of a single split distribution. */
export const SPLIT_MASS_EPS = 1e-9;

/** Test tolerance for floating-point precision errors. */
export const TEST_EPS = 1e-10;
