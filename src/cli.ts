/**
 * Command-line entry point.
 *
 * Usage:
 *   npx tsx src/cli.ts --genotyping genotypes.tsv --molecules molecules.json.gz \
 *     --barcodes barcodes.tsv.gz --gene DNMT3A [--out results] [--umi-length 12]
 *     [--quantile 0.8] [--strategy quantile|bimodal-minimum] [--max-edit-distance 2]
 */

import { pathToFileURL } from "node:url";
import { parseArgs } from "node:util";
import { type } from "arktype";
import { type RunOptions, resolveRunConfig } from "./config";
import { CrosscheckError, ValidationError } from "./errors";
import { runPipeline } from "./pipeline";
import { MATCH_CLASSES, ThresholdStrategySchema } from "./types";

export const USAGE = `Usage: umi-crosscheck --genotyping <table> --molecules <archive.json[.gz]> --barcodes <list[.gz]> --gene <symbol>
  [--out <dir>] [--umi-length 12] [--quantile 0.8] [--strategy quantile|bimodal-minimum] [--max-edit-distance 2]`;

function requireValue(value: string | undefined, flag: string): string {
  if (value === undefined || value === "") {
    throw new ValidationError(`Missing required option --${flag}`);
  }
  return value;
}

function numberOption(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (value.trim() === "" || Number.isNaN(parsed)) {
    throw new ValidationError(`Option --${flag} expects a number, got "${value}"`);
  }
  return parsed;
}

/**
 * Turn command-line arguments into run options
 *
 * @throws {ValidationError} On a missing required flag or a malformed value
 *
 * @example
 * ```typescript
 * parseCliArgs(["--genotyping", "g.tsv", "--molecules", "m.json", "--barcodes", "b.txt", "--gene", "DNMT3A"]);
 * ```
 */
export function parseCliArgs(args: string[]): RunOptions {
  const { values } = parseArgs({
    args,
    options: {
      genotyping: { type: "string" },
      molecules: { type: "string" },
      barcodes: { type: "string" },
      gene: { type: "string" },
      out: { type: "string" },
      "umi-length": { type: "string" },
      quantile: { type: "string" },
      strategy: { type: "string" },
      "max-edit-distance": { type: "string" },
    },
    strict: true,
  });

  let thresholdStrategy: RunOptions["thresholdStrategy"];
  if (values.strategy !== undefined) {
    const strategy = ThresholdStrategySchema(values.strategy);
    if (strategy instanceof type.errors) {
      throw new ValidationError(
        `Option --strategy must be quantile or bimodal-minimum, got "${values.strategy}"`
      );
    }
    thresholdStrategy = strategy;
  }

  const options: RunOptions = {
    genotypingTable: requireValue(values.genotyping, "genotyping"),
    moleculeArchive: requireValue(values.molecules, "molecules"),
    barcodeList: requireValue(values.barcodes, "barcodes"),
    targetGene: requireValue(values.gene, "gene"),
  };
  if (values.out !== undefined) options.outputDir = values.out;
  if (thresholdStrategy !== undefined) options.thresholdStrategy = thresholdStrategy;

  const umiLength = numberOption(values["umi-length"], "umi-length");
  if (umiLength !== undefined) options.umiLength = umiLength;
  const quantile = numberOption(values.quantile, "quantile");
  if (quantile !== undefined) options.quantile = quantile;
  const maxEditDistance = numberOption(values["max-edit-distance"], "max-edit-distance");
  if (maxEditDistance !== undefined) options.maxEditDistance = maxEditDistance;

  return options;
}

export async function main(args: string[]): Promise<number> {
  let options: RunOptions;
  try {
    options = parseCliArgs(args);
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
    console.error(USAGE);
    return 2;
  }

  try {
    const result = await runPipeline(resolveRunConfig(options));

    const { threshold } = result;
    console.log(
      `\nThreshold (${threshold.strategy}): ${threshold.value.toFixed(3)} from ${threshold.sampleSize} observations`
    );
    console.log("\nObservations by match class:");
    for (const matchClass of MATCH_CLASSES) {
      console.log(`  ${matchClass.padEnd(10)} ${result.classCounts[matchClass]}`);
    }

    console.log("\nBarcodes by genotype (unfiltered / gene-filtered / threshold-filtered):");
    for (const label of ["MUT", "WT", "NA", "No Data"] as const) {
      const counts = (["unfiltered", "geneFiltered", "thresholdFiltered"] as const).map(
        (level) => result.summaries.filter((summary) => summary[level].label === label).length
      );
      console.log(`  ${label.padEnd(10)} ${counts.join(" / ")}`);
    }

    for (const output of Object.values(result.outputs)) {
      console.log(`${output.status === "written" ? "Wrote" : "Kept existing"} ${output.path}`);
    }
    return 0;
  } catch (error) {
    if (error instanceof CrosscheckError) {
      console.error(error.toString());
      return 1;
    }
    throw error;
  }
}

const entry = process.argv[1];
if (entry !== undefined && import.meta.url === pathToFileURL(entry).href) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error(error);
      process.exitCode = 1;
    }
  );
}
