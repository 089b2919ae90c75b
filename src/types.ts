/**
 * Core type definitions for genotype cross-validation
 *
 * The data model follows the life of a genotyping observation: a per-barcode
 * summary row is expanded into one observation per supporting UMI, each
 * observation is classified against the molecule archive, and the classified
 * set is folded back into per-barcode calls at three filtering levels.
 */

import { type } from "arktype";

// =============================================================================
// ENUMERATIONS
// =============================================================================

/**
 * Per-UMI genotype call reported by the amplicon pipeline
 */
export const GenotypeCallSchema = type("'WT' | 'MUT' | 'AMB'");
export type GenotypeCall = typeof GenotypeCallSchema.infer;

/**
 * How an observation relates to the expression archive
 *
 * - `Exact`: the (barcode, UMI) pair was seen for the target gene
 * - `Approx`: a target-gene pair lies within the edit-distance budget
 * - `OtherGene`: the pair was seen, but for some other gene
 * - `NoGene`: the pair was never seen in the archive
 */
export const MATCH_CLASSES = ["Exact", "Approx", "OtherGene", "NoGene"] as const;
export type MatchClass = (typeof MATCH_CLASSES)[number];

/**
 * Per-barcode genotype label
 */
export type GenotypeLabel = "MUT" | "WT" | "NA" | "No Data";

/**
 * Filtering levels, from least to most stringent
 */
export const FILTER_LEVELS = ["unfiltered", "geneFiltered", "thresholdFiltered"] as const;
export type FilterLevel = (typeof FILTER_LEVELS)[number];

/**
 * Read-support cutoff estimation strategy
 */
export const ThresholdStrategySchema = type("'quantile' | 'bimodal-minimum'");
export type ThresholdStrategy = typeof ThresholdStrategySchema.infer;

// =============================================================================
// MOLECULE ARCHIVE
// =============================================================================

/**
 * Columnar molecule archive as stored on disk
 *
 * All per-molecule arrays have the same length. `barcode_idx` and
 * `feature_idx` are zero-based indices into `barcodes` and `features`.
 * `umi` holds 2-bit encoded UMI sequences.
 */
export const MoleculeArchiveSchema = type({
  barcode_idx: "number[]",
  feature_idx: "number[]",
  umi: "number[]",
  count: "number[]",
  barcodes: "string[]",
  features: {
    name: "string[]",
    id: "string[]",
  },
});
export type MoleculeArchive = typeof MoleculeArchiveSchema.infer;

/**
 * One molecule from the expression archive, with indices dereferenced
 */
export interface MoleculeRecord {
  readonly barcode: string;
  readonly umiCode: number;
  readonly geneId: string;
  readonly geneName: string;
  readonly readCount: number;
}

/**
 * Entry of the collapsed (barcode, UMI code) → gene index
 */
export interface CollapsedMolecule {
  readonly barcode: string;
  readonly umiCode: number;
  /** Gene name, or a `Multiple…` label when the UMI appears in several records */
  readonly label: string;
  /** Gene id of the first record of the group */
  readonly geneId: string;
  /** Read count of the first record of the group */
  readonly readCount: number;
  /** Number of distinct gene names among the records; informational only */
  readonly geneCount: number;
}

// =============================================================================
// GENOTYPING TABLE
// =============================================================================

/**
 * Per-UMI duplicate counts within one PCR duplicate group
 */
export interface DupCounts {
  readonly wt: number;
  readonly mut: number;
  readonly amb: number;
}

/**
 * One genotyping summary row, validated against the declared column schema
 *
 * Per-barcode scalars are numbers; per-molecule lists are already split and
 * typed but not yet checked against the call totals.
 */
export interface GenotypingRow {
  readonly barcode: string;
  readonly wtCalls: number;
  readonly mutCalls: number;
  readonly ambCalls: number;
  readonly umis: readonly string[];
  readonly callsInDups: readonly GenotypeCall[];
  readonly wtInDups: readonly number[];
  readonly mutInDups: readonly number[];
  readonly ambInDups: readonly number[];
  /** Source line number for error reporting */
  readonly lineNumber?: number;
}

/**
 * One supporting UMI of a genotyping row
 */
export interface GenotypeObservation {
  readonly barcode: string;
  /** Index of the source row in the genotyping table */
  readonly rowIndex: number;
  /** Position of this UMI within its source row */
  readonly moleculeIndex: number;
  readonly umiSequence: string;
  readonly umiCode: number;
  readonly call: GenotypeCall;
  readonly dupCounts: DupCounts;
  readonly totalDups: number;
  readonly totalDupsWtMut: number;
  readonly wtCalls: number;
  readonly mutCalls: number;
  readonly ambCalls: number;
}

/**
 * Observation after matching against the molecule index
 */
export interface ClassifiedObservation extends GenotypeObservation {
  readonly exactMatch: boolean;
  readonly approxMatch: boolean;
  readonly inGex: boolean;
  /** Gene label from the collapsed index, `null` when not in the archive */
  readonly geneLabel: string | null;
  readonly matchClass: MatchClass;
}

/**
 * Classified observation with the final keep decision applied
 */
export interface RefinedObservation extends ClassifiedObservation {
  readonly keep: boolean;
}

// =============================================================================
// RESULTS
// =============================================================================

/**
 * Genotype call counts for one barcode at one filtering level
 *
 * Counts are `null` only when the barcode never appeared in the genotyping
 * table.
 */
export interface LevelSummary {
  readonly label: GenotypeLabel;
  readonly wtCalls: number | null;
  readonly mutCalls: number | null;
  readonly ambCalls: number | null;
  readonly totalCalls: number | null;
}

/**
 * Per-barcode result across all filtering levels
 */
export type BarcodeSummary = { readonly barcode: string } & {
  readonly [L in FilterLevel]: LevelSummary;
};

/**
 * Result of a threshold estimation
 */
export interface ThresholdEstimate {
  readonly strategy: ThresholdStrategy;
  /** Read-support cutoff; `NaN` when nothing could be estimated */
  readonly value: number;
  /** Number of observations the estimate was computed from */
  readonly sampleSize: number;
  /** True when the input could not support a meaningful estimate */
  readonly degenerate: boolean;
  readonly reason?: string;
}
