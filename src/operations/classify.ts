/**
 * Match classification
 *
 * Each expanded observation is checked against the molecule index three ways
 * (exact target-gene hit, near target-gene hit, any archive hit) and given a
 * single {@link MatchClass}. The checks are pure, so the observation set is
 * classified through {@link mapConcurrent}.
 */

import { DEFAULT_MAX_EDIT_DISTANCE } from "../config";
import type { ClassifiedObservation, GenotypeObservation, MatchClass } from "../types";
import { type MapConcurrentOptions, mapConcurrent } from "./core/concurrency";
import { withinEditDistance } from "./core/edit-distance";
import { type MoleculeIndex, matchString, moleculeKey } from "./molecule-index";

export interface ClassifyOptions extends MapConcurrentOptions {
  /** Edit-distance budget for approximate matches (default 2) */
  maxEditDistance?: number;
}

/**
 * Fuzzy lookup over the target-gene match strings
 *
 * Candidates are bucketed by length so a query only scans buckets within
 * the edit budget.
 */
export class ApproxMatcher {
  private readonly byLength = new Map<number, string[]>();

  constructor(
    targets: Iterable<string>,
    private readonly maxDistance: number = DEFAULT_MAX_EDIT_DISTANCE
  ) {
    if (!Number.isInteger(maxDistance) || maxDistance < 0) {
      throw new Error(`Edit distance budget must be a non-negative integer, got ${maxDistance}`);
    }
    for (const target of targets) {
      const bucket = this.byLength.get(target.length);
      if (bucket === undefined) {
        this.byLength.set(target.length, [target]);
      } else {
        bucket.push(target);
      }
    }
  }

  /**
   * True when some target lies within the edit budget of `query`
   */
  matches(query: string): boolean {
    const longest = query.length + this.maxDistance;
    for (let length = query.length - this.maxDistance; length <= longest; length++) {
      const bucket = this.byLength.get(length);
      if (bucket === undefined) continue;
      for (const target of bucket) {
        if (withinEditDistance(query, target, this.maxDistance)) return true;
      }
    }
    return false;
  }
}

/**
 * Resolve the match flags to one class; first match wins
 *
 * Exact, then Approx, then OtherGene (seen in the archive under another
 * label), then NoGene.
 */
export function resolveMatchClass(flags: {
  exactMatch: boolean;
  approxMatch: boolean;
  inGex: boolean;
}): MatchClass {
  if (flags.exactMatch) return "Exact";
  if (flags.approxMatch) return "Approx";
  if (flags.inGex) return "OtherGene";
  return "NoGene";
}

/**
 * Classify a single observation
 *
 * The approximate check runs even when the exact check already succeeded.
 */
export function classifyObservation(
  observation: GenotypeObservation,
  index: MoleculeIndex,
  matcher: ApproxMatcher
): ClassifiedObservation {
  const exactMatch = index.targetKeys.has(moleculeKey(observation.barcode, observation.umiSequence));
  const approxMatch = matcher.matches(matchString(observation.barcode, observation.umiSequence));
  const collapsed = index.collapsed.get(moleculeKey(observation.barcode, observation.umiCode));
  const inGex = collapsed !== undefined;

  return {
    ...observation,
    exactMatch,
    approxMatch,
    inGex,
    geneLabel: collapsed?.label ?? null,
    matchClass: resolveMatchClass({ exactMatch, approxMatch, inGex }),
  };
}

/**
 * Classify every observation, preserving input order
 *
 * @example
 * ```typescript
 * const classified = await classifyObservations(observations, index, { maxEditDistance: 2 });
 * classified.filter((o) => o.matchClass === "Exact").length;
 * ```
 */
export async function classifyObservations(
  observations: readonly GenotypeObservation[],
  index: MoleculeIndex,
  options: ClassifyOptions = {}
): Promise<ClassifiedObservation[]> {
  const matcher = new ApproxMatcher(index.targetStrings, options.maxEditDistance);
  return mapConcurrent(
    observations,
    (observation) => classifyObservation(observation, index, matcher),
    { concurrency: options.concurrency, chunkSize: options.chunkSize }
  );
}
