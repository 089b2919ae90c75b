import { describe, expect, test } from "vitest";
import { classDensities, renderReadSupportChart } from "../../src/operations/diagnostics";
import type { ThresholdEstimate } from "../../src/types";
import { makeClassified } from "../helpers";

const observations = [
  makeClassified("AAAA", "WT", "Exact", 40),
  makeClassified("AAAA", "WT", "Exact", 60),
  makeClassified("AAAA", "WT", "NoGene", 2),
  makeClassified("AAAA", "WT", "NoGene", 3),
  makeClassified("AAAA", "WT", "NoGene", 0),
  makeClassified("AAAA", "WT", "OtherGene", 5),
];

const threshold: ThresholdEstimate = {
  strategy: "quantile",
  value: 4.2,
  sampleSize: 5,
  degenerate: false,
};

describe("classDensities", () => {
  test("skips classes with fewer than two positive values", () => {
    const densities = classDensities(observations, 3);
    expect(densities.map((d) => [d.matchClass, d.sampleSize, d.points.length > 0])).toEqual([
      ["Exact", 2, true],
      ["Approx", 0, false],
      ["OtherGene", 1, false],
      ["NoGene", 2, true],
    ]);
  });
});

describe("renderReadSupportChart", () => {
  const svg = renderReadSupportChart(observations, threshold, "DNMT3A");

  test("produces a standalone SVG document", () => {
    expect(svg.startsWith('<svg viewBox="0 0 640 400"')).toBe(true);
    expect(svg.endsWith("</svg>\n")).toBe(true);
  });

  test("draws one curve per class with a density", () => {
    expect(svg.match(/<polyline /g)).toHaveLength(2);
  });

  test("marks the threshold and lists every class in the legend", () => {
    expect(svg).toContain(">threshold 4.20</text>");
    expect(svg).toContain(">OtherGene (n=1)</text>");
    expect(svg).toContain(">Approx (n=0)</text>");
  });

  test("omits the threshold line when there is no estimate", () => {
    const chart = renderReadSupportChart(
      observations,
      { ...threshold, value: Number.NaN, degenerate: true },
      "DNMT3A"
    );
    expect(chart).not.toContain("threshold ");
  });

  test("escapes the gene name", () => {
    const chart = renderReadSupportChart([], threshold, "A<B&C");
    expect(chart).toContain(">A&lt;B&amp;C read support by match class</text>");
  });
});
