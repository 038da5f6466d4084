import { describe, expect, it } from "vitest";
import { Configuration, OverflowError } from "../src/index";

const cfg = (...pairs: Array<[number, number]>) => Configuration.canonicalize(pairs);

describe("Configuration.canonicalize", () => {
  it("sorts by size, coalesces duplicates and drops zero counts", () => {
    const config = cfg([4, 1], [1, 2], [4, 2], [2, 0]);
    expect(config.toJSON()).toEqual([
      [1, 2],
      [4, 3],
    ]);
    expect(config.key).toBe("1x2,4x3");
    expect(config.has(2)).toBe(false);
  });

  it("collapses an all-zero list to the shared empty configuration", () => {
    const config = cfg([3, 0]);
    expect(config.isEmpty()).toBe(true);
    expect(config).toBe(Configuration.empty());
    expect(config.key).toBe("");
    expect(config.toString()).toBe("{}");
  });

  it("rejects non-positive sizes, negative counts and fractions", () => {
    expect(() => cfg([0, 1])).toThrow("subtree size must be positive");
    expect(() => cfg([2, -1])).toThrow("count must be non-negative");
    expect(() => cfg([1.5, 1])).toThrow("must be an integer");
  });

  it("fails loudly when counts overflow", () => {
    expect(() => cfg([1, Number.MAX_SAFE_INTEGER], [1, 1])).toThrow(OverflowError);
  });

  it("freezes its entries", () => {
    expect(Object.isFrozen(cfg([1, 1], [2, 1]).entries)).toBe(true);
  });

  it("freezes pairs shared between merged configurations", () => {
    const base = cfg([1, 1], [2, 1]);
    const merged = base.merge(Configuration.single(3));

    expect(Object.isFrozen(merged.entries[0])).toBe(true);
    expect(Object.isFrozen(base.decrementOne(1)?.entries[0])).toBe(true);
    expect(Reflect.set(merged.entries[0], 1, 5)).toBe(false);
    expect(base.countOf(1)).toBe(1);
    expect(base.toString()).toBe("{1:1, 2:1}");
  });
});

describe("Configuration queries", () => {
  const config = cfg([1, 2], [4, 3]);

  it("counts open subtrees and the leaves they hold", () => {
    expect(config.totalCount()).toBe(5);
    expect(config.totalLeaves()).toBe(14);
    expect(config.size).toBe(2);
    expect(Configuration.empty().totalCount()).toBe(0);
  });

  it("looks up multiplicities", () => {
    expect(config.countOf(4)).toBe(3);
    expect(config.countOf(2)).toBe(0);
  });

  it("iterates pairs in size order", () => {
    expect([...config]).toEqual([
      [1, 2],
      [4, 3],
    ]);
  });

  it("formats as a readable multiset", () => {
    expect(config.toString()).toBe("{1:2, 4:3}");
  });

  it("orders lexicographically over pairs", () => {
    const sorted = [cfg([2, 1]), cfg([1, 2]), cfg([1, 1], [3, 1]), cfg([1, 1])].sort(
      Configuration.compare
    );
    expect(sorted.map((c) => c.key)).toEqual(["1x1", "1x1,3x1", "1x2", "2x1"]);
  });
});

describe("Configuration.merge", () => {
  const a = cfg([1, 1], [3, 2]);
  const b = cfg([2, 1], [3, 1]);
  const c = cfg([1, 4], [8, 1]);

  it("sums counts of shared sizes", () => {
    expect(a.merge(b).key).toBe("1x1,2x1,3x3");
  });

  it("is commutative", () => {
    expect(a.merge(b).equals(b.merge(a))).toBe(true);
  });

  it("is associative", () => {
    expect(a.merge(b).merge(c).equals(a.merge(b.merge(c)))).toBe(true);
    expect(a.merge(b).merge(c).key).toBe("1x5,2x1,3x3,8x1");
  });

  it("treats the empty configuration as identity", () => {
    expect(a.merge(Configuration.empty())).toBe(a);
    expect(Configuration.empty().merge(a)).toBe(a);
  });

  it("leaves both operands unchanged", () => {
    a.merge(b);
    expect(a.key).toBe("1x1,3x2");
    expect(b.key).toBe("2x1,3x1");
  });
});

describe("Configuration.decrementOne", () => {
  const config = cfg([1, 2], [4, 1]);

  it("removes one subtree of the given size", () => {
    expect(config.decrementOne(1)?.key).toBe("1x1,4x1");
  });

  it("drops an entry whose count reaches zero", () => {
    expect(config.decrementOne(4)?.key).toBe("1x2");
    expect(cfg([5, 1]).decrementOne(5)).toBe(Configuration.empty());
  });

  it("reports an absent size as undefined", () => {
    expect(config.decrementOne(3)).toBeUndefined();
    expect(Configuration.empty().decrementOne(1)).toBeUndefined();
  });

  it("is undone by merging the removed size back", () => {
    for (const [size] of config) {
      const removed = config.decrementOne(size);
      expect(removed?.merge(Configuration.single(size)).equals(config)).toBe(true);
    }
  });

  it("does not touch the original", () => {
    config.decrementOne(1);
    expect(config.key).toBe("1x2,4x1");
  });
});
