import { LRUCache } from "./common/lru-cache";
import type { Distribution } from "./distribution";
import { splitDistribution } from "./split";

/**
 * Memo table from subtree size to its split distribution.
 *
 * propagate() creates one per call. Split structure depends only on the size, so
 * a cache may also be handed to several calls without changing any result.
 */
export class SplitCache {
  private readonly cache = new LRUCache<number, Distribution>();
  private hitCount = 0;
  private missCount = 0;

  get(size: number): Distribution {
    const { value, hit } = this.cache.getOrCompute(size, splitDistribution);
    if (hit) this.hitCount++;
    else this.missCount++;
    return value;
  }

  has(size: number): boolean {
    return this.cache.has(size);
  }

  get hits(): number {
    return this.hitCount;
  }

  get misses(): number {
    return this.missCount;
  }

  /** Number of distinct sizes stored. */
  get size(): number {
    return this.cache.size;
  }

  clear(): void {
    this.cache.clear();
    this.hitCount = 0;
    this.missCount = 0;
  }
}
