import { Configuration } from "./configuration";

/** A configuration together with the probability mass collected on it. */
export interface Outcome {
  config: Configuration;
  p: number;
}

/**
 * Probability distribution over configurations.
 *
 * Outcomes are keyed by `Configuration.key`, so two derivations of the same
 * multiset always land on the same entry. A Distribution is read-only once built;
 * use DistributionAccumulator to collect mass.
 */
export class Distribution implements Iterable<[Configuration, number]> {
  private _mass?: number;
  private _sorted?: Outcome[];

  private constructor(private readonly outcomes: ReadonlyMap<string, Outcome>) {}

  static empty(): Distribution {
    return new Distribution(new Map());
  }

  /** All mass on one configuration. */
  static point(config: Configuration, p = 1): Distribution {
    return new Distribution(new Map([[config.key, { config, p }]]));
  }

  /** @internal Used by DistributionAccumulator.build(). */
  static fromOutcomes(outcomes: Map<string, Outcome>): Distribution {
    return new Distribution(outcomes);
  }

  *[Symbol.iterator](): IterableIterator<[Configuration, number]> {
    for (const { config, p } of this.outcomes.values()) yield [config, p];
  }

  /** Number of distinct configurations. */
  get size(): number {
    return this.outcomes.size;
  }

  isEmpty(): boolean {
    return this.outcomes.size === 0;
  }

  has(config: Configuration): boolean {
    return this.outcomes.has(config.key);
  }

  probabilityOf(config: Configuration): number {
    return this.outcomes.get(config.key)?.p ?? 0;
  }

  mass(): number {
    if (this._mass === undefined) {
      let total = 0;
      for (const { p } of this.outcomes.values()) total += p;
      this._mass = total;
    }
    return this._mass;
  }

  /** Outcomes ordered by Configuration.compare. */
  sorted(): readonly Outcome[] {
    if (this._sorted === undefined) {
      this._sorted = [...this.outcomes.values()]
        .map(({ config, p }) => ({ config, p }))
        .sort((a, b) => Configuration.compare(a.config, b.config));
    }
    return this._sorted;
  }

  /** Most likely configuration, or undefined when empty. */
  mode(): Outcome | undefined {
    let best: Outcome | undefined;
    for (const outcome of this.sorted()) {
      if (best === undefined || outcome.p > best.p) best = outcome;
    }
    return best === undefined ? undefined : { ...best };
  }

  toJSON(): Array<[Array<[number, number]>, number]> {
    return this.sorted().map(({ config, p }) => [config.toJSON(), p]);
  }
}

/**
 * Collects probability mass per configuration. Mass added for a configuration
 * that is already present is summed, never overwritten.
 */
export class DistributionAccumulator {
  private readonly outcomes = new Map<string, Outcome>();

  /** Number of distinct configurations collected so far. */
  get size(): number {
    return this.outcomes.size;
  }

  add(config: Configuration, p: number): this {
    if (!Number.isFinite(p) || p < 0) {
      throw new Error(`DistributionAccumulator.add: invalid mass ${p}`);
    }
    const existing = this.outcomes.get(config.key);
    if (existing) existing.p += p;
    else this.outcomes.set(config.key, { config, p });
    return this;
  }

  /**
   * Adds every outcome of `dist` scaled by `factor`, after merging each
   * configuration with `extra`.
   */
  addScaled(
    dist: Distribution,
    factor: number,
    extra: Configuration = Configuration.empty()
  ): this {
    if (factor === 0) return this;
    for (const [config, p] of dist) this.add(config.merge(extra), factor * p);
    return this;
  }

  clear(): this {
    this.outcomes.clear();
    return this;
  }

  /** Snapshot of the collected mass; the accumulator can keep collecting. */
  build(): Distribution {
    const copy = new Map<string, Outcome>();
    for (const [key, { config, p }] of this.outcomes) copy.set(key, { config, p });
    return Distribution.fromOutcomes(copy);
  }
}
