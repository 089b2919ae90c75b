/**
 * Read-support threshold estimation
 *
 * Both strategies look at `totalDupsWtMut` (WT + MUT reads behind a UMI):
 *
 * - `quantile`: the p-th quantile over OtherGene observations. UMIs that the
 *   archive attributes to another gene are treated as background, so the
 *   cutoff sits above most of them.
 * - `bimodal-minimum`: the density minimum between the two modes of the
 *   log10 read support of NoGene observations, searched over [0, 3]
 *   (1 to 1000 reads).
 */

import { DEFAULT_QUANTILE } from "../config";
import type { ClassifiedObservation, MatchClass, ThresholdEstimate, ThresholdStrategy } from "../types";
import { brentMinimize, gaussianKde, quantile } from "./core/statistics";

/**
 * Search interval of the bimodal strategy, in log10 reads
 */
const LOG_SEARCH_INTERVAL = [0, 3] as const;

/**
 * A minimum closer than this to either end of the search interval is treated
 * as the absence of an interior minimum
 */
const BOUNDARY_TOLERANCE = 1e-3;

export interface ThresholdOptions {
  strategy: ThresholdStrategy;
  /** Probability for the quantile strategy (default 0.8) */
  quantile?: number;
}

/**
 * Match class whose read support each strategy looks at
 */
export function thresholdSourceClass(strategy: ThresholdStrategy): MatchClass {
  return strategy === "quantile" ? "OtherGene" : "NoGene";
}

function readSupport(
  observations: readonly ClassifiedObservation[],
  matchClass: MatchClass
): number[] {
  return observations
    .filter((observation) => observation.matchClass === matchClass)
    .map((observation) => observation.totalDupsWtMut);
}

/**
 * Quantile cutoff over the given read-support values
 */
export function quantileThreshold(
  values: readonly number[],
  p: number = DEFAULT_QUANTILE
): ThresholdEstimate {
  if (values.length === 0) {
    return {
      strategy: "quantile",
      value: Number.NaN,
      sampleSize: 0,
      degenerate: true,
      reason: "no OtherGene observations",
    };
  }
  return { strategy: "quantile", value: quantile(values, p), sampleSize: values.length, degenerate: false };
}

/**
 * Density-minimum cutoff over the given read-support values
 *
 * Non-positive values have no logarithm and are ignored. The result is
 * flagged as degenerate when fewer than two values remain or when the
 * minimizer ends on the edge of the search interval, which happens when the
 * density has no interior minimum.
 */
export function bimodalMinimumThreshold(values: readonly number[]): ThresholdEstimate {
  const logs = values.filter((value) => value > 0).map((value) => Math.log10(value));
  if (logs.length < 2) {
    return {
      strategy: "bimodal-minimum",
      value: Number.NaN,
      sampleSize: logs.length,
      degenerate: true,
      reason: `need at least two positive NoGene values, got ${logs.length}`,
    };
  }

  const density = gaussianKde(logs);
  const [lower, upper] = LOG_SEARCH_INTERVAL;
  const minimum = brentMinimize(density, lower, upper);
  const onBoundary = minimum - lower < BOUNDARY_TOLERANCE || upper - minimum < BOUNDARY_TOLERANCE;

  return {
    strategy: "bimodal-minimum",
    value: 10 ** minimum,
    sampleSize: logs.length,
    degenerate: onBoundary,
    ...(onBoundary ? { reason: "density has no interior minimum on [1, 1000] reads" } : {}),
  };
}

/**
 * Estimate the NoGene read-support cutoff with the configured strategy
 *
 * @example
 * ```typescript
 * const estimate = estimateThreshold(classified, { strategy: "quantile", quantile: 0.8 });
 * if (estimate.degenerate) console.warn(estimate.reason);
 * ```
 */
export function estimateThreshold(
  observations: readonly ClassifiedObservation[],
  options: ThresholdOptions
): ThresholdEstimate {
  const values = readSupport(observations, thresholdSourceClass(options.strategy));
  return options.strategy === "quantile"
    ? quantileThreshold(values, options.quantile)
    : bimodalMinimumThreshold(values);
}
