/**
 * Tabular run outputs
 *
 * The per-barcode summary and the per-observation detail table, both written
 * as TSV with spreadsheet protection for gene labels.
 */

import type { DSVCell } from "./dsv";
import { TSVWriter } from "./dsv";
import { type ArtifactWriteResult, writeArtifact } from "../io/file-writer";
import type { BarcodeSummary, FilterLevel, LevelSummary, RefinedObservation } from "../types";
import { FILTER_LEVELS } from "../types";

const LEVEL_PREFIXES: Readonly<Record<FilterLevel, string>> = {
  unfiltered: "unfiltered",
  geneFiltered: "gene_filtered",
  thresholdFiltered: "threshold_filtered",
};

const LEVEL_FIELDS = ["genotype", "wt_calls", "mut_calls", "amb_calls", "total_calls"] as const;

/**
 * Summary columns: the barcode, then label and counts for each level
 */
export const SUMMARY_COLUMNS: readonly string[] = [
  "barcode",
  ...FILTER_LEVELS.flatMap((level) =>
    LEVEL_FIELDS.map((field) => `${LEVEL_PREFIXES[level]}_${field}`)
  ),
];

export const OBSERVATION_COLUMNS = [
  "barcode",
  "umi",
  "umi_code",
  "call",
  "num_wt_in_dups",
  "num_mut_in_dups",
  "num_amb_in_dups",
  "total_dups",
  "total_dups_wt_mut",
  "exact_match",
  "approx_match",
  "in_gex",
  "gene_label",
  "match_class",
  "keep",
] as const;

type ObservationColumn = (typeof OBSERVATION_COLUMNS)[number];

function levelCells(level: FilterLevel, summary: LevelSummary): Record<string, DSVCell> {
  const prefix = LEVEL_PREFIXES[level];
  return {
    [`${prefix}_genotype`]: summary.label,
    [`${prefix}_wt_calls`]: summary.wtCalls,
    [`${prefix}_mut_calls`]: summary.mutCalls,
    [`${prefix}_amb_calls`]: summary.ambCalls,
    [`${prefix}_total_calls`]: summary.totalCalls,
  };
}

/**
 * Flatten a barcode summary into one row keyed by {@link SUMMARY_COLUMNS}
 *
 * `null` counts become empty cells.
 */
export function summaryRecord(summary: BarcodeSummary): Record<string, DSVCell> {
  let record: Record<string, DSVCell> = { barcode: summary.barcode };
  for (const level of FILTER_LEVELS) {
    record = { ...record, ...levelCells(level, summary[level]) };
  }
  return record;
}

export function observationRecord(
  observation: RefinedObservation
): Record<ObservationColumn, DSVCell> {
  return {
    barcode: observation.barcode,
    umi: observation.umiSequence,
    umi_code: observation.umiCode,
    call: observation.call,
    num_wt_in_dups: observation.dupCounts.wt,
    num_mut_in_dups: observation.dupCounts.mut,
    num_amb_in_dups: observation.dupCounts.amb,
    total_dups: observation.totalDups,
    total_dups_wt_mut: observation.totalDupsWtMut,
    exact_match: observation.exactMatch,
    approx_match: observation.approxMatch,
    in_gex: observation.inGex,
    gene_label: observation.geneLabel,
    match_class: observation.matchClass,
    keep: observation.keep,
  };
}

/**
 * Format the per-barcode summary as TSV text
 */
export function formatBarcodeSummary(summaries: readonly BarcodeSummary[]): string {
  return new TSVWriter(SUMMARY_COLUMNS, { excelCompatible: true }).formatRecords(
    summaries.map(summaryRecord)
  );
}

/**
 * Write the per-barcode summary unless the file already exists
 */
export async function writeBarcodeSummary(
  path: string,
  summaries: readonly BarcodeSummary[]
): Promise<ArtifactWriteResult> {
  return writeArtifact(path, () => formatBarcodeSummary(summaries));
}

/**
 * Write the per-observation detail table unless the file already exists
 */
export async function writeClassifiedObservations(
  path: string,
  observations: readonly RefinedObservation[]
): Promise<ArtifactWriteResult> {
  return new TSVWriter(OBSERVATION_COLUMNS, { excelCompatible: true }).writeFile(
    path,
    observations.map(observationRecord)
  );
}
