import { OverflowError, assertInteger, safeAdd } from "./errors";
import type { SizeCount } from "./types";

/**
 * Canonical multiset of open subtree sizes.
 *
 * Entries are `(size, count)` pairs sorted by size, each size at most once and
 * every count at least 1. Instances are frozen: merge() and decrementOne() always
 * build a new value, so a configuration stored as a distribution key never changes.
 *
 * `key` is the canonical string form (`"1x2,4x1"`) and serves as the identity
 * when configurations are used as map keys.
 */
export class Configuration implements Iterable<SizeCount> {
  private static readonly EMPTY = new Configuration([]);

  public readonly key: string;
  private _totalCount?: number;
  private _totalLeaves?: number;

  private constructor(public readonly entries: readonly SizeCount[]) {
    this.key = entries.map(([size, count]) => `${size}x${count}`).join(",");
    for (const pair of entries) Object.freeze(pair);
    Object.freeze(entries);
  }

  static empty(): Configuration {
    return Configuration.EMPTY;
  }

  static single(size: number, count = 1): Configuration {
    return Configuration.canonicalize([[size, count]]);
  }

  /**
   * Builds a configuration from raw `(size, count)` pairs: sorts by size,
   * coalesces duplicate sizes and drops zero counts.
   */
  static canonicalize(pairs: Iterable<readonly [number, number]>): Configuration {
    const counts = new Map<number, number>();
    for (const [size, count] of pairs) {
      assertInteger(size, "Configuration: subtree size");
      assertInteger(count, "Configuration: count");
      if (size <= 0) {
        throw new Error(`Configuration: subtree size must be positive, got ${size}`);
      }
      if (count < 0) {
        throw new Error(`Configuration: count must be non-negative, got ${count}`);
      }
      counts.set(size, safeAdd(counts.get(size) ?? 0, count, "Configuration: count"));
    }

    const entries: SizeCount[] = [];
    for (const [size, count] of counts) {
      if (count > 0) entries.push([size, count]);
    }
    if (entries.length === 0) return Configuration.EMPTY;
    entries.sort((a, b) => a[0] - b[0]);
    return new Configuration(entries);
  }

  /** Lexicographic order over the sorted pairs. */
  static compare(a: Configuration, b: Configuration): number {
    const n = Math.min(a.entries.length, b.entries.length);
    for (let i = 0; i < n; i++) {
      const [sa, ca] = a.entries[i];
      const [sb, cb] = b.entries[i];
      if (sa !== sb) return sa - sb;
      if (ca !== cb) return ca - cb;
    }
    return a.entries.length - b.entries.length;
  }

  [Symbol.iterator](): IterableIterator<SizeCount> {
    return this.entries[Symbol.iterator]();
  }

  /** Number of distinct subtree sizes. */
  get size(): number {
    return this.entries.length;
  }

  isEmpty(): boolean {
    return this.entries.length === 0;
  }

  countOf(size: number): number {
    const index = this.indexOf(size);
    return index < 0 ? 0 : this.entries[index][1];
  }

  has(size: number): boolean {
    return this.indexOf(size) >= 0;
  }

  /** Number of open subtrees, i.e. the sum of all multiplicities. */
  totalCount(): number {
    if (this._totalCount === undefined) {
      let total = 0;
      for (const [, count] of this.entries) total += count;
      this._totalCount = total;
    }
    return this._totalCount;
  }

  /** Number of leaves held by all open subtrees together. */
  totalLeaves(): number {
    if (this._totalLeaves === undefined) {
      let total = 0;
      for (const [size, count] of this.entries) total += size * count;
      if (!Number.isSafeInteger(total)) {
        throw new OverflowError("Configuration: leaf total exceeds the safe integer range");
      }
      this._totalLeaves = total;
    }
    return this._totalLeaves;
  }

  /** Multiset union; counts of shared sizes are summed. */
  merge(other: Configuration): Configuration {
    if (other.isEmpty()) return this;
    if (this.isEmpty()) return other;

    const a = this.entries;
    const b = other.entries;
    const merged: SizeCount[] = [];
    let i = 0;
    let j = 0;
    while (i < a.length && j < b.length) {
      const [sa, ca] = a[i];
      const [sb, cb] = b[j];
      if (sa === sb) {
        merged.push([sa, safeAdd(ca, cb, "Configuration.merge: count")]);
        i++;
        j++;
      } else if (sa < sb) {
        merged.push(a[i++]);
      } else {
        merged.push(b[j++]);
      }
    }
    while (i < a.length) merged.push(a[i++]);
    while (j < b.length) merged.push(b[j++]);
    return new Configuration(merged);
  }

  /**
   * Removes one subtree of `size`. Returns undefined when the size is absent;
   * callers treat that as a bookkeeping bug.
   */
  decrementOne(size: number): Configuration | undefined {
    const index = this.indexOf(size);
    if (index < 0) return undefined;

    const count = this.entries[index][1];
    const next = this.entries.slice();
    if (count === 1) next.splice(index, 1);
    else next[index] = [size, count - 1];
    return next.length === 0 ? Configuration.EMPTY : new Configuration(next);
  }

  equals(other: Configuration): boolean {
    return this === other || this.key === other.key;
  }

  toString(): string {
    return `{${this.entries.map(([size, count]) => `${size}:${count}`).join(", ")}}`;
  }

  toJSON(): Array<[number, number]> {
    return this.entries.map(([size, count]) => [size, count]);
  }

  // Binary search over the sorted sizes.
  private indexOf(size: number): number {
    let lo = 0;
    let hi = this.entries.length - 1;
    while (lo <= hi) {
      const mid = (lo + hi) >> 1;
      const current = this.entries[mid][0];
      if (current === size) return mid;
      if (current < size) lo = mid + 1;
      else hi = mid - 1;
    }
    return -1;
  }
}
