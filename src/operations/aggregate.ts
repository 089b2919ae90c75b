/**
 * Per-barcode genotype aggregation
 *
 * Classified observations are folded back into one call summary per barcode
 * at each filtering level. Each level is an independent pure pass over the
 * same observation set; the passes are merged by barcode once, at the end.
 */

import type {
  BarcodeSummary,
  ClassifiedObservation,
  FilterLevel,
  GenotypeLabel,
  LevelSummary,
  RefinedObservation,
} from "../types";

/**
 * Summary for a barcode that never appeared in the genotyping table
 */
export const NO_DATA: LevelSummary = {
  label: "No Data",
  wtCalls: null,
  mutCalls: null,
  ambCalls: null,
  totalCalls: null,
};

/**
 * Whether an observation survives a filtering level
 *
 * - `unfiltered`: everything is kept
 * - `geneFiltered`: OtherGene is dropped
 * - `thresholdFiltered`: Exact and Approx are kept, OtherGene is dropped and
 *   NoGene is kept only with read support strictly above `threshold`
 *
 * A `NaN` threshold drops every NoGene observation.
 */
export function keepAtLevel(
  observation: ClassifiedObservation,
  level: FilterLevel,
  threshold: number
): boolean {
  switch (level) {
    case "unfiltered":
      return true;
    case "geneFiltered":
      return observation.matchClass !== "OtherGene";
    case "thresholdFiltered":
      switch (observation.matchClass) {
        case "Exact":
        case "Approx":
          return true;
        case "OtherGene":
          return false;
        case "NoGene":
          return observation.totalDupsWtMut > threshold;
      }
  }
}

/**
 * Attach the final keep decision to every observation
 */
export function applyKeepRule(
  observations: readonly ClassifiedObservation[],
  threshold: number
): RefinedObservation[] {
  return observations.map((observation) => ({
    ...observation,
    keep: keepAtLevel(observation, "thresholdFiltered", threshold),
  }));
}

/**
 * Genotype label from kept call counts
 *
 * @example
 * ```typescript
 * deriveLabel(2, 0, 2); // "WT"
 * deriveLabel(3, 1, 4); // "MUT"
 * deriveLabel(0, 0, 1); // "NA" (only ambiguous calls)
 * ```
 */
export function deriveLabel(wtCalls: number, mutCalls: number, totalCalls: number): GenotypeLabel {
  if (totalCalls === 0) return "No Data";
  if (mutCalls > 0) return "MUT";
  if (wtCalls >= 1) return "WT";
  return "NA";
}

/**
 * Count kept calls per barcode at one filtering level
 *
 * Every barcode with at least one observation gets an entry, even when all
 * of its observations are filtered out (label "No Data", counts 0).
 */
export function aggregateLevel(
  observations: readonly ClassifiedObservation[],
  level: FilterLevel,
  threshold: number
): Map<string, LevelSummary> {
  const counts = new Map<string, { wt: number; mut: number; amb: number }>();

  for (const observation of observations) {
    let tally = counts.get(observation.barcode);
    if (tally === undefined) {
      tally = { wt: 0, mut: 0, amb: 0 };
      counts.set(observation.barcode, tally);
    }
    if (!keepAtLevel(observation, level, threshold)) continue;

    if (observation.call === "WT") tally.wt++;
    else if (observation.call === "MUT") tally.mut++;
    else tally.amb++;
  }

  const summaries = new Map<string, LevelSummary>();
  for (const [barcode, tally] of counts) {
    const total = tally.wt + tally.mut + tally.amb;
    summaries.set(barcode, {
      label: deriveLabel(tally.wt, tally.mut, total),
      wtCalls: tally.wt,
      mutCalls: tally.mut,
      ambCalls: tally.amb,
      totalCalls: total,
    });
  }
  return summaries;
}

/**
 * One summary per reference barcode across all filtering levels
 *
 * Output follows the order of `barcodeUniverse`. Barcodes absent from the
 * observations resolve to {@link NO_DATA} at every level; observed barcodes
 * outside the universe are not reported.
 */
export function summarizeBarcodes(
  barcodeUniverse: readonly string[],
  observations: readonly ClassifiedObservation[],
  threshold: number
): BarcodeSummary[] {
  const unfiltered = aggregateLevel(observations, "unfiltered", threshold);
  const geneFiltered = aggregateLevel(observations, "geneFiltered", threshold);
  const thresholdFiltered = aggregateLevel(observations, "thresholdFiltered", threshold);

  return barcodeUniverse.map((barcode) => ({
    barcode,
    unfiltered: unfiltered.get(barcode) ?? NO_DATA,
    geneFiltered: geneFiltered.get(barcode) ?? NO_DATA,
    thresholdFiltered: thresholdFiltered.get(barcode) ?? NO_DATA,
  }));
}
