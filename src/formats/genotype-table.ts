/**
 * Genotyping summary table
 *
 * One row per barcode from the amplicon genotyping pipeline. Which columns hold
 * a single per-barcode value and which hold a delimiter-joined per-molecule
 * list is declared up front in {@link GENOTYPING_COLUMNS}; each row is checked
 * against that declaration once, at load time.
 */

import { type } from "arktype";
import { DEFAULT_LIST_DELIMITER } from "../config";
import { ValidationError } from "../errors";
import { readText } from "../io/file-reader";
import { type GenotypeCall, GenotypeCallSchema, type GenotypingRow } from "../types";
import { DSVParser } from "./dsv";
import type { DSVRecord } from "./dsv";

/**
 * Declared column layout: header name and whether the cell is a per-molecule list
 */
export const GENOTYPING_COLUMNS = {
  barcode: { header: "BC", list: false },
  umis: { header: "UMI", list: true },
  wtCalls: { header: "WT.calls", list: false },
  mutCalls: { header: "MUT.calls", list: false },
  ambCalls: { header: "amb.calls", list: false },
  callsInDups: { header: "call.in.dups", list: true },
  wtInDups: { header: "num.WT.in.dups", list: true },
  mutInDups: { header: "num.MUT.in.dups", list: true },
  ambInDups: { header: "num.amb.in.dups", list: true },
} as const;

export type GenotypingColumn = keyof typeof GENOTYPING_COLUMNS;

export interface GenotypingTableOptions {
  /** Separator inside list-valued cells (default ";") */
  listDelimiter?: string;
}

const COUNT_PATTERN = /^\d+$/;

function cell(record: DSVRecord, column: GenotypingColumn): string {
  return (record.fields[GENOTYPING_COLUMNS[column].header] ?? "").trim();
}

function parseCount(value: string, header: string, lineNumber: number): number {
  if (!COUNT_PATTERN.test(value)) {
    throw new ValidationError(
      `Column ${header} must hold a non-negative integer, got "${value}"`,
      lineNumber,
      value
    );
  }
  return Number.parseInt(value, 10);
}

function splitList(value: string, delimiter: string): string[] {
  if (value === "") return [];
  return value.split(delimiter).map((element) => element.trim());
}

function parseCountList(
  record: DSVRecord,
  column: GenotypingColumn,
  delimiter: string
): number[] {
  const header = GENOTYPING_COLUMNS[column].header;
  return splitList(cell(record, column), delimiter).map((element) =>
    parseCount(element, header, record.lineNumber)
  );
}

function parseCall(value: string, lineNumber: number): GenotypeCall {
  const call = GenotypeCallSchema(value.toUpperCase());
  if (call instanceof type.errors) {
    throw new ValidationError(
      `Column ${GENOTYPING_COLUMNS.callsInDups.header} holds unknown call "${value}"; expected WT, MUT or AMB`,
      lineNumber,
      value
    );
  }
  return call;
}

/**
 * Check that every declared column is present in the header
 *
 * @throws {ValidationError} Naming all missing columns
 */
export function assertGenotypingColumns(headers: readonly string[]): void {
  const present = new Set(headers);
  const missing = Object.values(GENOTYPING_COLUMNS)
    .map((column) => column.header)
    .filter((header) => !present.has(header));
  if (missing.length > 0) {
    throw new ValidationError(`Genotyping table is missing columns: ${missing.join(", ")}`);
  }
}

/**
 * Convert one table record into a typed row
 *
 * List lengths are not compared with the call totals here; that is the
 * expander's contract.
 */
export function toGenotypingRow(record: DSVRecord, listDelimiter: string): GenotypingRow {
  const { lineNumber } = record;
  const barcode = cell(record, "barcode");
  if (barcode === "") {
    throw new ValidationError(
      `Column ${GENOTYPING_COLUMNS.barcode.header} must not be empty`,
      lineNumber
    );
  }

  return {
    barcode,
    wtCalls: parseCount(cell(record, "wtCalls"), GENOTYPING_COLUMNS.wtCalls.header, lineNumber),
    mutCalls: parseCount(cell(record, "mutCalls"), GENOTYPING_COLUMNS.mutCalls.header, lineNumber),
    ambCalls: parseCount(cell(record, "ambCalls"), GENOTYPING_COLUMNS.ambCalls.header, lineNumber),
    umis: splitList(cell(record, "umis"), listDelimiter).map((umi) => umi.toUpperCase()),
    callsInDups: splitList(cell(record, "callsInDups"), listDelimiter).map((value) =>
      parseCall(value, lineNumber)
    ),
    wtInDups: parseCountList(record, "wtInDups", listDelimiter),
    mutInDups: parseCountList(record, "mutInDups", listDelimiter),
    ambInDups: parseCountList(record, "ambInDups", listDelimiter),
    lineNumber,
  };
}

/**
 * Parse a genotyping table from text
 *
 * The delimiter (tab or comma) is detected from the header. Rows whose UMI
 * cell is empty carry no molecules and are dropped.
 *
 * @throws {ValidationError} On missing columns or malformed cells
 * @throws {DSVParseError} On malformed delimited text
 *
 * @example
 * ```typescript
 * const rows = parseGenotypingTable(text, { listDelimiter: ";" });
 * rows[0]?.umis; // ["ACGTACGTACGT", "TTTTACGTACGA"]
 * ```
 */
export function parseGenotypingTable(
  text: string,
  options: GenotypingTableOptions = {}
): GenotypingRow[] {
  const listDelimiter = options.listDelimiter ?? DEFAULT_LIST_DELIMITER;
  const table = new DSVParser({ autoDetectDelimiter: true, raggedRows: "error" }).parseString(
    text
  );
  assertGenotypingColumns(table.headers);

  return table.records
    .filter((record) => cell(record, "umis") !== "")
    .map((record) => toGenotypingRow(record, listDelimiter));
}

/**
 * Read a (possibly gzipped) genotyping table from disk
 */
export async function readGenotypingTable(
  path: string,
  options: GenotypingTableOptions = {}
): Promise<GenotypingRow[]> {
  return parseGenotypingTable(await readText(path), options);
}
