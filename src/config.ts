/**
 * Run configuration and defaults
 *
 * Options are validated with ArkType once, up front, and then resolved into a
 * fully populated object so nothing downstream has to re-apply defaults.
 */

import { type } from "arktype";
import { ValidationError } from "./errors";
import type { ThresholdStrategy } from "./types";

/**
 * Longest UMI whose 2-bit code is still an exact JavaScript number
 */
export const MAX_UMI_LENGTH = 26;

export const DEFAULT_UMI_LENGTH = 12;
export const DEFAULT_QUANTILE = 0.8;
export const DEFAULT_MAX_EDIT_DISTANCE = 2;
export const DEFAULT_LIST_DELIMITER = ";";
export const DEFAULT_BARCODE_SUFFIX_SEPARATOR = "-";
export const DEFAULT_ANTIBODY_PATTERN = "TotalSeq|ADT";

/**
 * ArkType schema for refinement options
 */
export const RefinementOptionsSchema = type({
  targetGene: "string>0",
  "umiLength?": "1 <= number.integer <= 26",
  "quantile?": "0 < number < 1",
  "thresholdStrategy?": "'quantile' | 'bimodal-minimum'",
  "maxEditDistance?": "number.integer >= 0",
  "listDelimiter?": "string>0",
  "barcodeSuffixSeparator?": "string>0",
  "antibodyPattern?": "string>0",
  "concurrency?": "number.integer >= 1",
  "chunkSize?": "number.integer >= 1",
});
export type RefinementOptions = typeof RefinementOptionsSchema.infer;

/**
 * Refinement options with every default applied
 */
export interface RefinementConfig {
  readonly targetGene: string;
  readonly umiLength: number;
  readonly quantile: number;
  readonly thresholdStrategy: ThresholdStrategy;
  readonly maxEditDistance: number;
  readonly listDelimiter: string;
  readonly barcodeSuffixSeparator: string;
  readonly antibodyPattern: RegExp;
  readonly concurrency: number;
  readonly chunkSize: number;
}

/**
 * ArkType schema for a full run: refinement options plus file locations
 */
export const RunOptionsSchema = RefinementOptionsSchema.and({
  genotypingTable: "string>0",
  moleculeArchive: "string>0",
  barcodeList: "string>0",
  "outputDir?": "string>0",
});
export type RunOptions = typeof RunOptionsSchema.infer;

export interface RunConfig extends RefinementConfig {
  readonly genotypingTable: string;
  readonly moleculeArchive: string;
  readonly barcodeList: string;
  readonly outputDir: string;
}

function compilePattern(source: string): RegExp {
  try {
    return new RegExp(source, "i");
  } catch (error) {
    throw new ValidationError(
      `Invalid antibody pattern: ${error instanceof Error ? error.message : String(error)}`,
      undefined,
      source
    );
  }
}

/**
 * Validate refinement options and fill in defaults
 *
 * @throws {ValidationError} When an option is missing or out of range
 *
 * @example
 * ```typescript
 * const config = resolveRefinementConfig({ targetGene: "DNMT3A" });
 * config.umiLength; // 12
 * ```
 */
export function resolveRefinementConfig(options: RefinementOptions): RefinementConfig {
  const validation = RefinementOptionsSchema(options);
  if (validation instanceof type.errors) {
    throw new ValidationError(`Invalid refinement options: ${validation.summary}`);
  }

  return {
    targetGene: validation.targetGene,
    umiLength: validation.umiLength ?? DEFAULT_UMI_LENGTH,
    quantile: validation.quantile ?? DEFAULT_QUANTILE,
    thresholdStrategy: validation.thresholdStrategy ?? "quantile",
    maxEditDistance: validation.maxEditDistance ?? DEFAULT_MAX_EDIT_DISTANCE,
    listDelimiter: validation.listDelimiter ?? DEFAULT_LIST_DELIMITER,
    barcodeSuffixSeparator: validation.barcodeSuffixSeparator ?? DEFAULT_BARCODE_SUFFIX_SEPARATOR,
    antibodyPattern: compilePattern(validation.antibodyPattern ?? DEFAULT_ANTIBODY_PATTERN),
    concurrency: validation.concurrency ?? 4,
    chunkSize: validation.chunkSize ?? 1000,
  };
}

/**
 * Validate run options and fill in defaults
 *
 * @throws {ValidationError} When an option is missing or out of range
 */
export function resolveRunConfig(options: RunOptions): RunConfig {
  const validation = RunOptionsSchema(options);
  if (validation instanceof type.errors) {
    throw new ValidationError(`Invalid run options: ${validation.summary}`);
  }

  return {
    ...resolveRefinementConfig(validation),
    genotypingTable: validation.genotypingTable,
    moleculeArchive: validation.moleculeArchive,
    barcodeList: validation.barcodeList,
    outputDir: validation.outputDir ?? ".",
  };
}
