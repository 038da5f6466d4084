import type { Distribution } from "./distribution";
import type { HistogramEntry } from "./types";

/**
 * Distribution of the open-subtree ("pnode") count.
 *
 * Entries are sorted by node count ascending. Besides the raw rows it answers
 * the questions the parameter reports ask:
 * - expected node count (`mean()`)
 * - P(X ≤ x) and P(X ≥ x) (`cdf()`, `ccdf()`)
 * - smallest node count reached with a given probability (`quantile()`)
 */
export class Histogram implements Iterable<HistogramEntry> {
  public readonly entries: readonly HistogramEntry[];

  private _mass?: number;
  private _mean?: number;
  private _variance?: number;

  constructor(entries: Iterable<readonly [number, number]> = []) {
    const merged = new Map<number, number>();
    for (const [nodeCount, p] of entries) {
      if (!Number.isInteger(nodeCount) || nodeCount < 0) {
        throw new Error(`Histogram: node count must be a non-negative integer, got ${nodeCount}`);
      }
      merged.set(nodeCount, (merged.get(nodeCount) ?? 0) + p);
    }
    const sorted: HistogramEntry[] = [...merged.entries()].sort((a, b) => a[0] - b[0]);
    this.entries = Object.freeze(sorted);
  }

  static empty(): Histogram {
    return new Histogram();
  }

  [Symbol.iterator](): IterableIterator<HistogramEntry> {
    return this.entries[Symbol.iterator]();
  }

  isEmpty(): boolean {
    return this.entries.length === 0;
  }

  /** Probability mass at exactly `nodeCount`. */
  probabilityAt(nodeCount: number): number {
    for (const [n, p] of this.entries) if (n === nodeCount) return p;
    return 0;
  }

  mass(): number {
    if (this._mass === undefined) {
      let total = 0;
      for (const [, p] of this.entries) total += p;
      this._mass = total;
    }
    return this._mass;
  }

  /** Expected number of open subtrees. */
  mean(): number {
    if (this._mean === undefined) {
      let total = 0;
      for (const [n, p] of this.entries) total += n * p;
      this._mean = total;
    }
    return this._mean;
  }

  variance(): number {
    if (this._variance === undefined) {
      const mean = this.mean();
      let total = 0;
      for (const [n, p] of this.entries) total += (n - mean) * (n - mean) * p;
      this._variance = total;
    }
    return this._variance;
  }

  stddev(): number {
    return Math.sqrt(this.variance());
  }

  min(): number {
    return this.entries.length > 0 ? this.entries[0][0] : 0;
  }

  max(): number {
    return this.entries.length > 0 ? this.entries[this.entries.length - 1][0] : 0;
  }

  /** P(X ≤ x). */
  cdf(x: number): number {
    let acc = 0;
    for (const [n, p] of this.entries) {
      if (n > x) break;
      acc += p;
    }
    return acc;
  }

  /** P(X ≥ x). */
  ccdf(x: number): number {
    let acc = 0;
    for (const [n, p] of this.entries) if (n >= x) acc += p;
    return acc;
  }

  /**
   * Cumulative series over the dense range min..max, so that node counts with
   * no mass still show up as flat steps.
   */
  toCDFSeries(): { support: number[]; data: number[] } {
    if (this.entries.length === 0) return { support: [], data: [] };

    const lo = this.min();
    const support = Array.from({ length: this.max() - lo + 1 }, (_, i) => lo + i);
    const data: number[] = [];
    let acc = 0;
    let cursor = 0;
    for (const n of support) {
      if (cursor < this.entries.length && this.entries[cursor][0] === n) {
        acc += this.entries[cursor][1];
        cursor++;
      }
      data.push(acc);
    }
    return { support, data };
  }

  /**
   * Smallest node count whose CDF reaches `p`; the largest count when rounding
   * keeps the CDF just short of `p`, and 0 for an empty histogram.
   */
  quantile(p: number): number {
    if (this.entries.length === 0) return 0;
    let acc = 0;
    for (const [n, mass] of this.entries) {
      acc += mass;
      if (acc >= p) return n;
    }
    return this.max();
  }

  /** quantile() at several probabilities. */
  thresholds(ps: readonly number[]): number[] {
    return ps.map((p) => this.quantile(p));
  }

  toJSON(): Array<[number, number]> {
    return this.entries.map(([n, p]) => [n, p]);
  }
}

/** Collapses a configuration distribution onto its open-subtree counts. */
export function histogram(dist: Distribution): Histogram {
  const rows: Array<[number, number]> = [];
  for (const [config, p] of dist) rows.push([config.totalCount(), p]);
  return new Histogram(rows);
}
