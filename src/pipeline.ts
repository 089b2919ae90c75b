/**
 * Genotype refinement pipeline
 *
 * {@link refineGenotypes} is the pure core: expand, index, classify, estimate
 * the threshold, then aggregate. {@link runPipeline} wraps it with input
 * loading and artifact writing.
 */

import { join } from "node:path";
import type { RefinementConfig, RunConfig } from "./config";
import { readBarcodeList } from "./formats/barcodes";
import { readGenotypingTable } from "./formats/genotype-table";
import { readMoleculeArchive } from "./formats/molecule-archive";
import { writeBarcodeSummary, writeClassifiedObservations } from "./formats/report";
import { ensureDirectory, type ArtifactWriteResult, writeArtifact } from "./io/file-writer";
import { applyKeepRule, summarizeBarcodes } from "./operations/aggregate";
import { classifyObservations } from "./operations/classify";
import { renderReadSupportChart } from "./operations/diagnostics";
import { expandGenotypingTable } from "./operations/expand";
import { buildMoleculeIndex } from "./operations/molecule-index";
import { estimateThreshold } from "./operations/threshold";
import type {
  BarcodeSummary,
  GenotypingRow,
  MatchClass,
  MoleculeArchive,
  RefinedObservation,
  ThresholdEstimate,
} from "./types";

export const OUTPUT_FILES = {
  summary: "barcode_summary.tsv",
  observations: "classified_observations.tsv",
  chart: "read_support.svg",
} as const;

export type OutputArtifact = keyof typeof OUTPUT_FILES;

export interface RefinementInputs {
  readonly genotypingRows: readonly GenotypingRow[];
  readonly archive: MoleculeArchive;
  /** Reference barcodes, suffixes already stripped */
  readonly barcodeUniverse: readonly string[];
}

export interface RefinementResult {
  readonly observations: readonly RefinedObservation[];
  readonly threshold: ThresholdEstimate;
  readonly summaries: readonly BarcodeSummary[];
  readonly classCounts: Readonly<Record<MatchClass, number>>;
  /** Genotyping rows dropped because their barcode is not in the reference list */
  readonly rowsOutsideUniverse: number;
  /** Archive molecules belonging to genotyped reference barcodes */
  readonly moleculeCount: number;
}

export interface PipelineResult extends RefinementResult {
  readonly outputs: Readonly<Record<OutputArtifact, { path: string; status: ArtifactWriteResult }>>;
}

function countClasses(observations: readonly RefinedObservation[]): Record<MatchClass, number> {
  const counts: Record<MatchClass, number> = { Exact: 0, Approx: 0, OtherGene: 0, NoGene: 0 };
  for (const observation of observations) counts[observation.matchClass]++;
  return counts;
}

/**
 * Cross-validate genotyping observations against the molecule archive
 *
 * Genotyping rows for barcodes outside the reference list are excluded. A
 * degenerate threshold is logged and returned as-is; with a `NaN` value
 * every NoGene observation is dropped at the threshold-filtered level.
 *
 * @throws {MissingGeneError} If the target gene is not in the archive
 * @throws {ExpansionError} If a row's lists disagree with its call totals
 * @throws {EncodingError} If a UMI is not a valid nucleotide sequence
 */
export async function refineGenotypes(
  inputs: RefinementInputs,
  config: RefinementConfig
): Promise<RefinementResult> {
  const universe = new Set(inputs.barcodeUniverse);
  const rows = inputs.genotypingRows.filter((row) => universe.has(row.barcode));
  const genotyped = new Set(rows.map((row) => row.barcode));

  const expanded = expandGenotypingTable(rows, { umiLength: config.umiLength });
  const index = buildMoleculeIndex(inputs.archive, {
    targetGene: config.targetGene,
    umiLength: config.umiLength,
    barcodeUniverse: genotyped,
    antibodyPattern: config.antibodyPattern,
  });

  const classified = await classifyObservations(expanded, index, {
    maxEditDistance: config.maxEditDistance,
    concurrency: config.concurrency,
    chunkSize: config.chunkSize,
  });

  const threshold = estimateThreshold(classified, {
    strategy: config.thresholdStrategy,
    quantile: config.quantile,
  });
  if (threshold.degenerate) {
    console.warn(
      `Threshold estimate (${threshold.strategy}) is degenerate: ${threshold.reason ?? "unknown reason"}`
    );
  }

  const observations = applyKeepRule(classified, threshold.value);
  return {
    observations,
    threshold,
    summaries: summarizeBarcodes(inputs.barcodeUniverse, classified, threshold.value),
    classCounts: countClasses(observations),
    rowsOutsideUniverse: inputs.genotypingRows.length - rows.length,
    moleculeCount: index.moleculeCount,
  };
}

/**
 * Load inputs, refine, and write the three output artifacts
 *
 * Artifacts that already exist are left untouched.
 *
 * @example
 * ```typescript
 * const result = await runPipeline(resolveRunConfig({
 *   targetGene: "DNMT3A",
 *   genotypingTable: "genotypes.tsv",
 *   moleculeArchive: "molecules.json.gz",
 *   barcodeList: "barcodes.tsv.gz",
 *   outputDir: "out",
 * }));
 * console.log(result.outputs.summary.status);
 * ```
 */
export async function runPipeline(config: RunConfig): Promise<PipelineResult> {
  const [genotypingRows, archive, barcodeUniverse] = await Promise.all([
    readGenotypingTable(config.genotypingTable, { listDelimiter: config.listDelimiter }),
    readMoleculeArchive(config.moleculeArchive),
    readBarcodeList(config.barcodeList, config.barcodeSuffixSeparator),
  ]);
  console.log(
    `Loaded ${genotypingRows.length} genotyping rows, ${archive.barcode_idx.length} molecules, ${barcodeUniverse.length} reference barcodes`
  );

  const result = await refineGenotypes({ genotypingRows, archive, barcodeUniverse }, config);
  if (result.rowsOutsideUniverse > 0) {
    console.warn(
      `${result.rowsOutsideUniverse} genotyping rows have barcodes outside the reference list and were skipped`
    );
  }

  await ensureDirectory(config.outputDir);
  const pathOf = (artifact: OutputArtifact): string => join(config.outputDir, OUTPUT_FILES[artifact]);

  const summaryPath = pathOf("summary");
  const observationsPath = pathOf("observations");
  const chartPath = pathOf("chart");

  const outputs = {
    summary: { path: summaryPath, status: await writeBarcodeSummary(summaryPath, result.summaries) },
    observations: {
      path: observationsPath,
      status: await writeClassifiedObservations(observationsPath, result.observations),
    },
    chart: {
      path: chartPath,
      status: await writeArtifact(chartPath, () =>
        renderReadSupportChart(result.observations, result.threshold, config.targetGene)
      ),
    },
  };

  return { ...result, outputs };
}
