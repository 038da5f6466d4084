export { LRUCache } from "./common/lru-cache";
export { Configuration } from "./configuration";
export { Distribution, DistributionAccumulator } from "./distribution";
export type { Outcome } from "./distribution";
export { InvariantError, OverflowError } from "./errors";
export { MAX_EXPONENT, depthOf, inSubtree, levelBounds, pow2 } from "./heap";
export { Histogram, histogram } from "./histogram";
export {
  leafCount,
  openSize,
  openSubtreeHistogram,
  roundToByte,
  vcParams,
} from "./params";
export type { OpenSubtreeOptions, VcParams } from "./params";
export { propagate, propagateStep } from "./propagate";
export type { PropagateOptions, StepEvent } from "./propagate";
export { childSizes, fullTreeConfiguration, splitDistribution } from "./split";
export { SplitCache } from "./split-cache";
export { MASS_EPS, SPLIT_MASS_EPS, TEST_EPS } from "./types";
export type { HistogramEntry, SizeCount } from "./types";
