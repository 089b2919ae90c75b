/**
 * Genotype table expansion
 *
 * A genotyping row summarizes every UMI supporting one barcode. Expansion
 * turns it back into one {@link GenotypeObservation} per UMI: list cells
 * contribute their i-th element, per-barcode scalars are repeated, and the
 * duplicate totals are derived from the per-class duplicate counts.
 */

import { EncodingError, ExpansionError } from "../errors";
import { GENOTYPING_COLUMNS } from "../formats/genotype-table";
import type { GenotypeObservation, GenotypingRow } from "../types";
import { encodeUmi } from "./core/umi-codec";

export interface ExpandOptions {
  /** Reject UMIs whose length differs from this */
  umiLength?: number;
}

/**
 * Number of observations a row expands into: WT + MUT + ambiguous calls
 */
export function replicationCount(row: GenotypingRow): number {
  return row.wtCalls + row.mutCalls + row.ambCalls;
}

function assertListLengths(row: GenotypingRow, expected: number): void {
  const lists = [
    ["umis", row.umis.length],
    ["callsInDups", row.callsInDups.length],
    ["wtInDups", row.wtInDups.length],
    ["mutInDups", row.mutInDups.length],
    ["ambInDups", row.ambInDups.length],
  ] as const;

  for (const [column, actual] of lists) {
    if (actual !== expected) {
      throw new ExpansionError(
        "Per-molecule list length does not match the call totals",
        row.barcode,
        GENOTYPING_COLUMNS[column].header,
        expected,
        actual
      );
    }
  }
}

/**
 * Expand one genotyping row into per-UMI observations
 *
 * @param rowIndex - Position of the row in the table, carried for traceability
 * @throws {ExpansionError} If any list-valued cell does not hold exactly
 * WT.calls + MUT.calls + amb.calls elements
 * @throws {EncodingError} If a UMI is not a valid nucleotide sequence
 *
 * @example
 * ```typescript
 * const observations = expandRow(row, 0);
 * observations.length === row.wtCalls + row.mutCalls + row.ambCalls; // true
 * ```
 */
export function expandRow(
  row: GenotypingRow,
  rowIndex: number,
  options: ExpandOptions = {}
): GenotypeObservation[] {
  const count = replicationCount(row);
  assertListLengths(row, count);

  const observations: GenotypeObservation[] = [];
  for (let i = 0; i < count; i++) {
    const umiSequence = row.umis[i] ?? "";
    const call = row.callsInDups[i] ?? "AMB";
    const wt = row.wtInDups[i] ?? 0;
    const mut = row.mutInDups[i] ?? 0;
    const amb = row.ambInDups[i] ?? 0;

    if (options.umiLength !== undefined && umiSequence.length !== options.umiLength) {
      throw new EncodingError(
        `UMI has length ${umiSequence.length}, expected ${options.umiLength} (barcode ${row.barcode})`,
        umiSequence
      );
    }

    observations.push({
      barcode: row.barcode,
      rowIndex,
      moleculeIndex: i,
      umiSequence,
      umiCode: encodeUmi(umiSequence),
      call,
      dupCounts: { wt, mut, amb },
      totalDups: wt + mut + amb,
      totalDupsWtMut: wt + mut,
      wtCalls: row.wtCalls,
      mutCalls: row.mutCalls,
      ambCalls: row.ambCalls,
    });
  }
  return observations;
}

/**
 * Expand every row of a genotyping table, preserving row order
 */
export function expandGenotypingTable(
  rows: readonly GenotypingRow[],
  options: ExpandOptions = {}
): GenotypeObservation[] {
  return rows.flatMap((row, rowIndex) => expandRow(row, rowIndex, options));
}
