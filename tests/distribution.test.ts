import { describe, expect, it } from "vitest";
import { Configuration, Distribution, DistributionAccumulator } from "../src/index";

const cfg = (...pairs: Array<[number, number]>) => Configuration.canonicalize(pairs);

describe("DistributionAccumulator", () => {
  it("sums mass for configurations reached along different paths", () => {
    const acc = new DistributionAccumulator()
      .add(cfg([1, 1], [2, 1]), 0.25)
      .add(cfg([2, 1]).merge(cfg([1, 1])), 0.5)
      .add(cfg([3, 1]), 0.25);

    const dist = acc.build();
    expect(dist.size).toBe(2);
    expect(dist.probabilityOf(cfg([2, 1], [1, 1]))).toBe(0.75);
    expect(dist.probabilityOf(cfg([3, 1]))).toBe(0.25);
    expect(dist.mass()).toBe(1);
  });

  it("rejects negative and non-finite mass", () => {
    const acc = new DistributionAccumulator();
    expect(() => acc.add(cfg([1, 1]), -0.1)).toThrow("invalid mass");
    expect(() => acc.add(cfg([1, 1]), Number.NaN)).toThrow("invalid mass");
  });

  it("scales and merges a whole distribution", () => {
    const source = new DistributionAccumulator()
      .add(cfg([1, 2]), 0.5)
      .add(Configuration.empty(), 0.5)
      .build();
    const dist = new DistributionAccumulator()
      .addScaled(source, 0.5, cfg([4, 1]))
      .build();

    expect(dist.probabilityOf(cfg([1, 2], [4, 1]))).toBe(0.25);
    expect(dist.probabilityOf(cfg([4, 1]))).toBe(0.25);
    expect(dist.mass()).toBe(0.5);
  });

  it("builds snapshots that later additions do not change", () => {
    const acc = new DistributionAccumulator().add(cfg([2, 1]), 0.5);
    const first = acc.build();
    acc.add(cfg([2, 1]), 0.25);

    expect(first.probabilityOf(cfg([2, 1]))).toBe(0.5);
    expect(acc.build().probabilityOf(cfg([2, 1]))).toBe(0.75);
  });
});

describe("Distribution", () => {
  it("point() puts all mass on one configuration", () => {
    const dist = Distribution.point(cfg([4, 1]));
    expect(dist.size).toBe(1);
    expect(dist.has(cfg([4, 1]))).toBe(true);
    expect(dist.probabilityOf(cfg([4, 1]))).toBe(1);
    expect(dist.probabilityOf(cfg([2, 1]))).toBe(0);
  });

  it("empty() has no outcomes and no mass", () => {
    const dist = Distribution.empty();
    expect(dist.isEmpty()).toBe(true);
    expect(dist.mass()).toBe(0);
    expect(dist.mode()).toBeUndefined();
    expect(dist.toJSON()).toEqual([]);
  });

  it("sorts outcomes by configuration and reports the mode", () => {
    const dist = new DistributionAccumulator()
      .add(cfg([2, 1]), 0.25)
      .add(cfg([1, 2]), 0.5)
      .add(cfg([1, 1]), 0.25)
      .build();

    expect(dist.toJSON()).toEqual([
      [[[1, 1]], 0.25],
      [[[1, 2]], 0.5],
      [[[2, 1]], 0.25],
    ]);
    expect(dist.mode()?.config.key).toBe("1x2");
  });
});
