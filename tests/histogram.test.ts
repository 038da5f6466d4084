import { describe, expect, it } from "vitest";
import { Histogram, MASS_EPS, TEST_EPS, histogram, propagate } from "../src/index";

describe("histogram", () => {
  it("gives a single open subtree before any step", () => {
    expect(histogram(propagate(4, 0)).toJSON()).toEqual([[1, 1]]);
  });

  it("adds up configurations with the same open-subtree count", () => {
    // split(5): {1,1,2} 2/5, {2,2} 1/5, {1,3} 2/5
    const hist = histogram(propagate(5, 1));
    expect(hist.entries.map(([n]) => n)).toEqual([2, 3]);
    expect(hist.probabilityAt(2)).toBeCloseTo(3 / 5, 12);
    expect(hist.probabilityAt(3)).toBeCloseTo(2 / 5, 12);
    expect(hist.probabilityAt(4)).toBe(0);
  });

  it("is empty for the empty distribution", () => {
    const hist = histogram(propagate(0, 1));
    expect(hist.isEmpty()).toBe(true);
    expect(hist.mass()).toBe(0);
    expect(hist.mean()).toBe(0);
    expect(hist.quantile(0.5)).toBe(0);
    expect(hist.toCDFSeries()).toEqual({ support: [], data: [] });
  });

  it("sums to one with counts bounded by the remaining leaves", () => {
    for (const [leaves, steps] of [
      [9, 3],
      [13, 5],
      [32, 4],
    ]) {
      const hist = histogram(propagate(leaves, steps));
      expect(Math.abs(hist.mass() - 1)).toBeLessThan(MASS_EPS);
      for (const [n] of hist) {
        expect(Number.isInteger(n)).toBe(true);
        expect(n).toBeGreaterThanOrEqual(0);
        expect(n).toBeLessThanOrEqual(leaves - steps);
      }
    }
  });
});

describe("Histogram", () => {
  const hist = new Histogram([
    [3, 0.2],
    [1, 0.5],
    [3, 0.3],
  ]);

  it("merges and sorts rows", () => {
    expect(hist.toJSON()).toEqual([
      [1, 0.5],
      [3, 0.5],
    ]);
    expect(hist.min()).toBe(1);
    expect(hist.max()).toBe(3);
  });

  it("computes moments", () => {
    expect(hist.mean()).toBe(2);
    expect(hist.variance()).toBe(1);
    expect(hist.stddev()).toBe(1);
  });

  it("answers cumulative queries", () => {
    expect(hist.cdf(0)).toBe(0);
    expect(hist.cdf(1)).toBe(0.5);
    expect(hist.cdf(2)).toBe(0.5);
    expect(hist.cdf(3)).toBe(1);
    expect(hist.ccdf(2)).toBe(0.5);
    expect(hist.ccdf(1)).toBe(1);
  });

  it("fills gaps in the CDF series", () => {
    expect(hist.toCDFSeries()).toEqual({ support: [1, 2, 3], data: [0.5, 0.5, 1] });
  });

  it("finds the smallest count reaching a probability", () => {
    expect(hist.quantile(0.25)).toBe(1);
    expect(hist.quantile(0.5)).toBe(1);
    expect(hist.quantile(0.6)).toBe(3);
    expect(hist.quantile(1.5)).toBe(3);
    expect(hist.thresholds([0.125, 0.75])).toEqual([1, 3]);
  });

  it("rejects non-integer node counts", () => {
    expect(() => new Histogram([[1.5, 1]])).toThrow("non-negative integer");
    expect(() => new Histogram([[-1, 1]])).toThrow("non-negative integer");
  });

  it("gives the expected pnode count of a propagated tree", () => {
    // propagate(4, 2): {2} with 1/3, {1,1} with 2/3
    const mean = histogram(propagate(4, 2)).mean();
    expect(Math.abs(mean - 5 / 3)).toBeLessThan(TEST_EPS);
  });
});
