/**
 * Molecule index over the expression archive
 *
 * Turns the columnar archive into {@link MoleculeRecord}s and derives the two
 * lookup structures the classifier needs:
 *
 * - the set of (barcode, UMI) pairs observed for the target gene, and
 * - a collapsed (barcode, UMI code) → gene label index, where a UMI seen
 *   in several records is reduced to a single `Multiple…` label.
 *
 * The collapse is a pure group-by-reduce: records are grouped in first-seen
 * order and each group is folded into one new entry.
 */

import { MissingGeneError, ValidationError } from "../errors";
import type { CollapsedMolecule, MoleculeArchive, MoleculeRecord } from "../types";
import { decodeUmi } from "./core/umi-codec";

export interface ResolveMoleculesOptions {
  /** Keep only molecules whose barcode is in this set */
  barcodes?: ReadonlySet<string>;
}

export interface CollapseOptions {
  /** Gene names matching this pattern mark an antibody/feature-barcoding channel */
  antibodyPattern?: RegExp;
}

/**
 * Suffix appended to `Multiple_<gene>` when the group includes an antibody feature
 */
export const ANTIBODY_SUFFIX = "_Ab";

/**
 * Label for a UMI seen in several records, none of them for the target
 */
export const MULTIPLE_LABEL = "Multiple";

/**
 * Composite key for a (barcode, UMI) pair
 */
export function moleculeKey(barcode: string, umi: string | number): string {
  return `${barcode}:${umi}`;
}

/**
 * Barcode and UMI sequence as the single string compared by fuzzy matching
 */
export function matchString(barcode: string, umiSequence: string): string {
  return barcode + umiSequence;
}

function assertArchiveShape(archive: MoleculeArchive): void {
  const length = archive.barcode_idx.length;
  for (const [name, column] of [
    ["feature_idx", archive.feature_idx],
    ["umi", archive.umi],
    ["count", archive.count],
  ] as const) {
    if (column.length !== length) {
      throw new ValidationError(
        `Molecule archive column ${name} has ${column.length} entries, expected ${length}`
      );
    }
  }
  if (archive.features.name.length !== archive.features.id.length) {
    throw new ValidationError(
      `Feature table has ${archive.features.name.length} names but ${archive.features.id.length} ids`
    );
  }
}

/**
 * Dereference archive index arrays into concrete molecule records
 *
 * Indices are zero-based, matching the on-disk layout, so no adjustment is
 * applied.
 *
 * @throws {ValidationError} On unequal column lengths or an out-of-range index
 */
export function resolveMolecules(
  archive: MoleculeArchive,
  options: ResolveMoleculesOptions = {}
): MoleculeRecord[] {
  assertArchiveShape(archive);

  const records: MoleculeRecord[] = [];
  for (let i = 0; i < archive.barcode_idx.length; i++) {
    const barcodeIndex = archive.barcode_idx[i] ?? -1;
    const featureIndex = archive.feature_idx[i] ?? -1;

    const barcode = archive.barcodes[barcodeIndex];
    if (barcode === undefined) {
      throw new ValidationError(
        `Molecule ${i} references barcode index ${barcodeIndex}, but only ${archive.barcodes.length} barcodes exist`
      );
    }
    if (options.barcodes !== undefined && !options.barcodes.has(barcode)) continue;

    const geneName = archive.features.name[featureIndex];
    const geneId = archive.features.id[featureIndex];
    if (geneName === undefined || geneId === undefined) {
      throw new ValidationError(
        `Molecule ${i} references feature index ${featureIndex}, but only ${archive.features.name.length} features exist`
      );
    }

    records.push({
      barcode,
      umiCode: archive.umi[i] ?? 0,
      geneId,
      geneName,
      readCount: archive.count[i] ?? 0,
    });
  }
  return records;
}

/**
 * All (barcode, UMI sequence) keys observed for the target gene
 *
 * @param featureNames - Archive feature name table, used to verify the gene exists
 * @throws {MissingGeneError} If `geneName` is not in the feature table
 * @throws {DecodingError} If a stored UMI code does not fit `umiLength`
 */
export function targetGeneSet(
  records: readonly MoleculeRecord[],
  featureNames: readonly string[],
  geneName: string,
  umiLength: number
): Set<string> {
  if (!featureNames.includes(geneName)) {
    throw new MissingGeneError(geneName, featureNames.length);
  }

  const keys = new Set<string>();
  for (const record of records) {
    if (record.geneName === geneName) {
      keys.add(moleculeKey(record.barcode, decodeUmi(record.umiCode, umiLength)));
    }
  }
  return keys;
}

function collapseGroup(
  group: readonly MoleculeRecord[],
  targetGene: string,
  antibodyPattern: RegExp | undefined
): CollapsedMolecule {
  const first = group[0];
  if (first === undefined) {
    throw new Error("Cannot collapse an empty molecule group");
  }

  let label = first.geneName;
  if (group.length > 1) {
    if (group.some((record) => record.geneName === targetGene)) {
      const hasAntibody =
        antibodyPattern !== undefined &&
        group.some((record) => antibodyPattern.test(record.geneName));
      label = `${MULTIPLE_LABEL}_${targetGene}${hasAntibody ? ANTIBODY_SUFFIX : ""}`;
    } else {
      label = MULTIPLE_LABEL;
    }
  }

  return {
    barcode: first.barcode,
    umiCode: first.umiCode,
    label,
    geneId: first.geneId,
    readCount: first.readCount,
    geneCount: new Set(group.map((record) => record.geneName)).size,
  };
}

/**
 * Collapse molecules to one gene label per (barcode, UMI code)
 *
 * Only barcodes in `barcodeUniverse` are kept. A single-record group keeps
 * that record's gene name; a group of several records becomes
 * `Multiple_<target>` (with {@link ANTIBODY_SUFFIX} when an antibody feature
 * is involved) if the target is among them, otherwise `Multiple`. This holds
 * even when the records share a gene name. Gene id and read count come from
 * the first record of the group.
 *
 * @returns Map keyed by {@link moleculeKey}(barcode, umiCode), in first-seen order
 */
export function collapseMoleculeIndex(
  records: readonly MoleculeRecord[],
  barcodeUniverse: ReadonlySet<string>,
  targetGene: string,
  options: CollapseOptions = {}
): Map<string, CollapsedMolecule> {
  const groups = new Map<string, MoleculeRecord[]>();
  for (const record of records) {
    if (!barcodeUniverse.has(record.barcode)) continue;
    const key = moleculeKey(record.barcode, record.umiCode);
    const group = groups.get(key);
    if (group === undefined) {
      groups.set(key, [record]);
    } else {
      group.push(record);
    }
  }

  const collapsed = new Map<string, CollapsedMolecule>();
  for (const [key, group] of groups) {
    collapsed.set(key, collapseGroup(group, targetGene, options.antibodyPattern));
  }
  return collapsed;
}

/**
 * Lookup structures built once per run and shared read-only by the classifier
 */
export interface MoleculeIndex {
  readonly targetGene: string;
  /** {@link moleculeKey}(barcode, UMI sequence) for every target-gene molecule */
  readonly targetKeys: ReadonlySet<string>;
  /** {@link matchString} of every target-gene molecule */
  readonly targetStrings: ReadonlySet<string>;
  readonly collapsed: ReadonlyMap<string, CollapsedMolecule>;
  /** Number of archive molecules retained for the barcode universe */
  readonly moleculeCount: number;
}

export interface BuildMoleculeIndexOptions {
  targetGene: string;
  umiLength: number;
  barcodeUniverse: ReadonlySet<string>;
  antibodyPattern?: RegExp;
}

/**
 * Build both lookup structures from a raw archive
 *
 * Every structure is derived from the molecules of `barcodeUniverse` only.
 * The target gene is still checked against the full feature table.
 */
export function buildMoleculeIndex(
  archive: MoleculeArchive,
  options: BuildMoleculeIndexOptions
): MoleculeIndex {
  const records = resolveMolecules(archive, { barcodes: options.barcodeUniverse });
  const targetKeys = targetGeneSet(
    records,
    archive.features.name,
    options.targetGene,
    options.umiLength
  );
  const collapsed = collapseMoleculeIndex(records, options.barcodeUniverse, options.targetGene, {
    antibodyPattern: options.antibodyPattern,
  });

  const targetStrings = new Set<string>();
  for (const record of records) {
    if (record.geneName === options.targetGene) {
      targetStrings.add(matchString(record.barcode, decodeUmi(record.umiCode, options.umiLength)));
    }
  }

  return {
    targetGene: options.targetGene,
    targetKeys,
    targetStrings,
    collapsed,
    moleculeCount: records.length,
  };
}
