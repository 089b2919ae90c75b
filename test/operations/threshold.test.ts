import { describe, expect, test } from "vitest";
import {
  bimodalMinimumThreshold,
  estimateThreshold,
  quantileThreshold,
  thresholdSourceClass,
} from "../../src/operations/threshold";
import { makeClassified } from "../helpers";

const BIMODAL = [1, 2, 2, 3, 2, 2, 1, 3, 150, 200, 250, 180, 220, 200, 300, 170];

describe("quantileThreshold", () => {
  test("returns the p-th quantile", () => {
    const estimate = quantileThreshold([1, 2, 3, 4, 5], 0.8);
    expect(estimate.strategy).toBe("quantile");
    expect(estimate.value).toBeCloseTo(4.2, 10);
    expect(estimate.sampleSize).toBe(5);
    expect(estimate.degenerate).toBe(false);
  });

  test("flags an empty sample", () => {
    const estimate = quantileThreshold([]);
    expect(estimate.value).toBeNaN();
    expect(estimate.degenerate).toBe(true);
    expect(estimate.reason).toBe("no OtherGene observations");
  });
});

describe("bimodalMinimumThreshold", () => {
  test("finds the density minimum between two modes", () => {
    const estimate = bimodalMinimumThreshold(BIMODAL);
    expect(estimate.degenerate).toBe(false);
    expect(estimate.sampleSize).toBe(16);
    expect(estimate.value).toBeGreaterThan(10);
    expect(estimate.value).toBeLessThan(40);
  });

  test("flags a minimum on the edge of the search interval", () => {
    const estimate = bimodalMinimumThreshold([400, 500, 600, 700, 800, 900, 1000]);
    expect(estimate.degenerate).toBe(true);
    expect(estimate.reason).toBe("density has no interior minimum on [1, 1000] reads");
    expect(estimate.value).toBeLessThan(1.01);
  });

  test("ignores non-positive values and flags too few remaining", () => {
    const estimate = bimodalMinimumThreshold([0, 0, 4]);
    expect(estimate.value).toBeNaN();
    expect(estimate.sampleSize).toBe(1);
    expect(estimate.degenerate).toBe(true);
  });
});

describe("estimateThreshold", () => {
  test("quantile strategy reads OtherGene support only", () => {
    const observations = [
      makeClassified("AAAC", "WT", "OtherGene", 10),
      makeClassified("AAAC", "WT", "OtherGene", 20),
      makeClassified("AAAC", "WT", "NoGene", 1000),
      makeClassified("AAAC", "WT", "Exact", 1000),
    ];
    const estimate = estimateThreshold(observations, { strategy: "quantile", quantile: 0.5 });
    expect(estimate.value).toBe(15);
    expect(estimate.sampleSize).toBe(2);
  });

  test("bimodal strategy reads NoGene support only", () => {
    const observations = [
      ...BIMODAL.map((value) => makeClassified("CCCG", "MUT", "NoGene", value)),
      makeClassified("CCCG", "MUT", "OtherGene", 5),
    ];
    const estimate = estimateThreshold(observations, { strategy: "bimodal-minimum" });
    expect(estimate.sampleSize).toBe(16);
    expect(estimate).toEqual(bimodalMinimumThreshold(BIMODAL));
  });

  test("is deterministic for both strategies", () => {
    const observations = BIMODAL.flatMap((value) => [
      makeClassified("GGGT", "WT", "NoGene", value),
      makeClassified("GGGT", "WT", "OtherGene", value),
    ]);
    for (const strategy of ["quantile", "bimodal-minimum"] as const) {
      const first = estimateThreshold(observations, { strategy });
      const second = estimateThreshold(observations, { strategy });
      expect(second).toEqual(first);
    }
  });

  test("maps strategies to their source class", () => {
    expect(thresholdSourceClass("quantile")).toBe("OtherGene");
    expect(thresholdSourceClass("bimodal-minimum")).toBe("NoGene");
  });
});
