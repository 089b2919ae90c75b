/**
 * @module formats/dsv/writer
 * @description DSV (Delimiter-Separated Values) writer
 *
 * Formats rows with RFC 4180 quoting, optional spreadsheet protection and a
 * header row taken from the declared columns.
 */

import { type } from "arktype";
import { ValidationError } from "../../errors";
import { type ArtifactWriteResult, writeArtifact } from "../../io/file-writer";
import { DEFAULT_DELIMITERS, DEFAULT_QUOTE } from "./constants";
import { needsExcelProtection } from "./excel-protection";
import type { DSVCell, DSVWriterOptions } from "./types";
import { DSVWriterOptionsSchema } from "./validation";

/**
 * DSVWriter - CSV/TSV formatter for a fixed column list
 *
 * @example
 * ```typescript
 * const writer = new DSVWriter(["barcode", "label"]);
 * writer.formatRecords([{ barcode: "AAAC", label: "WT" }]);
 * // "barcode\tlabel\nAAAC\tWT\n"
 * ```
 */
export class DSVWriter<Column extends string = string> {
  private readonly delimiter: string;
  private readonly excelCompatible: boolean;

  constructor(
    private readonly columns: readonly Column[],
    options: DSVWriterOptions = {}
  ) {
    const validation = DSVWriterOptionsSchema(options);
    if (validation instanceof type.errors) {
      throw new ValidationError(`Invalid DSV writer options: ${validation.summary}`);
    }
    if (columns.length === 0) {
      throw new ValidationError("DSV writer needs at least one column");
    }

    this.delimiter = options.delimiter ?? DEFAULT_DELIMITERS.tsv;
    this.excelCompatible = options.excelCompatible ?? false;
  }

  /**
   * Format a single field, quoting it when the text needs it
   *
   * Values a spreadsheet would rewrite are quoted as well when
   * `excelCompatible` is set. Embedded quotes are always doubled.
   */
  private formatField(value: DSVCell): string {
    if (value === null || value === undefined) return "";

    const field = String(value);
    const needsQuoting =
      field.includes(this.delimiter) ||
      field.includes(DEFAULT_QUOTE) ||
      field.includes("\n") ||
      field.includes("\r") ||
      (this.excelCompatible && typeof value === "string" && needsExcelProtection(field));

    if (!needsQuoting) return field;
    const escaped = field.split(DEFAULT_QUOTE).join(DEFAULT_QUOTE + DEFAULT_QUOTE);
    return `${DEFAULT_QUOTE}${escaped}${DEFAULT_QUOTE}`;
  }

  private formatRow(fields: readonly DSVCell[]): string {
    return fields.map((field) => this.formatField(field)).join(this.delimiter);
  }

  /**
   * Format records (header first), each line terminated by a newline
   */
  formatRecords(records: Iterable<Readonly<Record<Column, DSVCell>>>): string {
    const lines = [this.columns.join(this.delimiter)];
    for (const record of records) {
      lines.push(this.formatRow(this.columns.map((column) => record[column])));
    }
    return lines.map((line) => `${line}\n`).join("");
  }

  /**
   * Write records to a new file; an existing file is left in place
   */
  async writeFile(
    path: string,
    records: Iterable<Readonly<Record<Column, DSVCell>>>
  ): Promise<ArtifactWriteResult> {
    return writeArtifact(path, () => this.formatRecords(records));
  }
}

/**
 * TSVWriter - tab-delimited convenience writer
 */
export class TSVWriter<Column extends string = string> extends DSVWriter<Column> {
  constructor(columns: readonly Column[], options: Omit<DSVWriterOptions, "delimiter"> = {}) {
    super(columns, { ...options, delimiter: DEFAULT_DELIMITERS.tsv });
  }
}
