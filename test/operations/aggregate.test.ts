import { describe, expect, test } from "vitest";
import {
  aggregateLevel,
  applyKeepRule,
  deriveLabel,
  keepAtLevel,
  NO_DATA,
  summarizeBarcodes,
} from "../../src/operations/aggregate";
import { FILTER_LEVELS } from "../../src/types";
import { makeClassified } from "../helpers";

describe("keepAtLevel", () => {
  test("unfiltered keeps everything", () => {
    expect(keepAtLevel(makeClassified("A", "WT", "OtherGene"), "unfiltered", 5)).toBe(true);
    expect(keepAtLevel(makeClassified("A", "WT", "NoGene", 0), "unfiltered", 5)).toBe(true);
  });

  test("gene filtering drops only OtherGene", () => {
    expect(keepAtLevel(makeClassified("A", "WT", "OtherGene"), "geneFiltered", 5)).toBe(false);
    expect(keepAtLevel(makeClassified("A", "WT", "NoGene", 0), "geneFiltered", 5)).toBe(true);
  });

  test("threshold filtering keeps NoGene strictly above the threshold", () => {
    expect(keepAtLevel(makeClassified("A", "WT", "Exact", 0), "thresholdFiltered", 5)).toBe(true);
    expect(keepAtLevel(makeClassified("A", "WT", "Approx", 0), "thresholdFiltered", 5)).toBe(true);
    expect(keepAtLevel(makeClassified("A", "WT", "OtherGene", 99), "thresholdFiltered", 5)).toBe(
      false
    );
    expect(keepAtLevel(makeClassified("A", "WT", "NoGene", 6), "thresholdFiltered", 5)).toBe(true);
    expect(keepAtLevel(makeClassified("A", "WT", "NoGene", 5), "thresholdFiltered", 5)).toBe(false);
  });

  test("a NaN threshold drops every NoGene observation", () => {
    expect(
      keepAtLevel(makeClassified("A", "WT", "NoGene", 1000), "thresholdFiltered", Number.NaN)
    ).toBe(false);
  });
});

describe("deriveLabel", () => {
  test("MUT wins over WT, AMB-only is NA, nothing kept is No Data", () => {
    expect(deriveLabel(3, 1, 4)).toBe("MUT");
    expect(deriveLabel(2, 0, 2)).toBe("WT");
    expect(deriveLabel(0, 0, 3)).toBe("NA");
    expect(deriveLabel(0, 0, 0)).toBe("No Data");
  });
});

describe("aggregateLevel", () => {
  test("counts kept calls and reports filtered-out barcodes with zero counts", () => {
    const observations = [
      makeClassified("DDDD", "WT", "OtherGene"),
      makeClassified("DDDD", "MUT", "OtherGene"),
    ];
    expect(aggregateLevel(observations, "unfiltered", 0).get("DDDD")).toEqual({
      label: "MUT",
      wtCalls: 1,
      mutCalls: 1,
      ambCalls: 0,
      totalCalls: 2,
    });
    expect(aggregateLevel(observations, "geneFiltered", 0).get("DDDD")).toEqual({
      label: "No Data",
      wtCalls: 0,
      mutCalls: 0,
      ambCalls: 0,
      totalCalls: 0,
    });
  });
});

describe("summarizeBarcodes", () => {
  test("two exact WT observations are WT at every level", () => {
    const observations = [makeClassified("AAAA", "WT", "Exact"), makeClassified("AAAA", "WT", "Exact")];
    const [summary] = summarizeBarcodes(["AAAA"], observations, 3);
    for (const level of FILTER_LEVELS) {
      expect(summary?.[level]).toEqual({
        label: "WT",
        wtCalls: 2,
        mutCalls: 0,
        ambCalls: 0,
        totalCalls: 2,
      });
    }
  });

  test("gene filtering removes OtherGene WT calls", () => {
    const observations = [
      makeClassified("BBBB", "MUT", "Exact"),
      makeClassified("BBBB", "WT", "OtherGene"),
      makeClassified("BBBB", "WT", "OtherGene"),
      makeClassified("BBBB", "WT", "OtherGene"),
    ];
    const [summary] = summarizeBarcodes(["BBBB"], observations, 3);
    expect(summary?.unfiltered).toEqual({
      label: "MUT",
      wtCalls: 3,
      mutCalls: 1,
      ambCalls: 0,
      totalCalls: 4,
    });
    expect(summary?.geneFiltered.label).toBe("MUT");
    expect(summary?.geneFiltered.wtCalls).toBe(0);
    expect(summary?.geneFiltered.mutCalls).toBe(1);
    expect(summary?.thresholdFiltered.wtCalls).toBe(0);
  });

  test("threshold filtering removes weakly supported NoGene calls", () => {
    const observations = [
      makeClassified("CCCC", "WT", "NoGene", 5),
      makeClassified("CCCC", "WT", "NoGene", 1),
    ];
    const [summary] = summarizeBarcodes(["CCCC"], observations, 2);
    expect(summary?.geneFiltered.wtCalls).toBe(2);
    expect(summary?.thresholdFiltered).toEqual({
      label: "WT",
      wtCalls: 1,
      mutCalls: 0,
      ambCalls: 0,
      totalCalls: 1,
    });
  });

  test("ambiguous-only barcodes are NA", () => {
    const [summary] = summarizeBarcodes(["FFFF"], [makeClassified("FFFF", "AMB", "Exact")], 0);
    expect(summary?.unfiltered.label).toBe("NA");
    expect(summary?.unfiltered.ambCalls).toBe(1);
  });

  test("reference barcodes without observations are No Data with null counts", () => {
    const summaries = summarizeBarcodes(["EEEE"], [], 0);
    expect(summaries).toEqual([
      { barcode: "EEEE", unfiltered: NO_DATA, geneFiltered: NO_DATA, thresholdFiltered: NO_DATA },
    ]);
  });

  test("follows the universe order and ignores barcodes outside it", () => {
    const observations = [makeClassified("XXXX", "WT", "Exact"), makeClassified("AAAA", "WT", "Exact")];
    const summaries = summarizeBarcodes(["EEEE", "AAAA"], observations, 0);
    expect(summaries.map((summary) => summary.barcode)).toEqual(["EEEE", "AAAA"]);
  });

  test("filtering is monotone per barcode", () => {
    const observations = [
      makeClassified("AAAA", "WT", "Exact", 1),
      makeClassified("AAAA", "MUT", "OtherGene", 8),
      makeClassified("AAAA", "MUT", "NoGene", 2),
      makeClassified("AAAA", "WT", "NoGene", 9),
      makeClassified("AAAA", "AMB", "Approx", 1),
      makeClassified("BBBB", "MUT", "NoGene", 1),
      makeClassified("BBBB", "WT", "OtherGene", 4),
    ];
    for (const summary of summarizeBarcodes(["AAAA", "BBBB"], observations, 3)) {
      const levels = FILTER_LEVELS.map((level) => summary[level]);
      for (let i = 1; i < levels.length; i++) {
        const looser = levels[i - 1];
        const stricter = levels[i];
        expect(stricter?.wtCalls ?? 0).toBeLessThanOrEqual(looser?.wtCalls ?? 0);
        expect(stricter?.mutCalls ?? 0).toBeLessThanOrEqual(looser?.mutCalls ?? 0);
        expect(stricter?.totalCalls ?? 0).toBeLessThanOrEqual(looser?.totalCalls ?? 0);
      }
    }
  });
});

describe("applyKeepRule", () => {
  test("attaches the threshold-level keep decision", () => {
    const refined = applyKeepRule(
      [
        makeClassified("AAAA", "WT", "Exact"),
        makeClassified("AAAA", "WT", "OtherGene"),
        makeClassified("AAAA", "WT", "NoGene", 10),
        makeClassified("AAAA", "WT", "NoGene", 1),
      ],
      4
    );
    expect(refined.map((o) => o.keep)).toEqual([true, false, true, false]);
  });
});

describe("filter levels", () => {
  test("each level keeps a subset of the level before it", () => {
    const observations = [
      makeClassified("A", "WT", "Exact", 1),
      makeClassified("A", "MUT", "Approx", 0),
      makeClassified("A", "WT", "OtherGene", 50),
      makeClassified("A", "MUT", "NoGene", 2),
      makeClassified("A", "WT", "NoGene", 9),
    ];
    const kept = FILTER_LEVELS.map((level) =>
      observations.map((observation) => keepAtLevel(observation, level, 3))
    );
    expect(kept).toEqual([
      [true, true, true, true, true],
      [true, true, false, true, true],
      [true, true, false, false, true],
    ]);
  });
});
