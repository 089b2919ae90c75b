/**
 * @module formats/dsv/parser
 * @description DSV (Delimiter-Separated Values) parser
 *
 * Parses header-first CSV/TSV text into records keyed by column name, with
 * RFC 4180 quoting, quoted fields spanning lines, and delimiter detection.
 */

import { type } from "arktype";
import { DSVParseError, ValidationError } from "../../errors";
import { DEFAULT_DELIMITERS, DEFAULT_QUOTE } from "./constants";
import { endsInsideQuotes, parseCSVRow } from "./state-machine";
import type { DSVParserOptions, DSVRecord, DSVTable } from "./types";
import { detectDelimiter, normalizeLineEndings, removeBOM } from "./utils";
import { DSVParserOptionsSchema, validateFieldSize } from "./validation";

/**
 * DSVParser - header-first CSV/TSV parser
 *
 * Blank lines between rows are skipped.
 *
 * @example
 * ```typescript
 * const parser = new DSVParser({ autoDetectDelimiter: true });
 * const table = parser.parseString("BC\tUMI\nAAAC\tACGT\n");
 * table.records[0]?.fields.UMI; // "ACGT"
 * ```
 */
export class DSVParser {
  private readonly options: Required<DSVParserOptions>;

  constructor(options: DSVParserOptions = {}) {
    const validation = DSVParserOptionsSchema(options);
    if (validation instanceof type.errors) {
      throw new ValidationError(`Invalid DSV parser options: ${validation.summary}`);
    }

    this.options = {
      delimiter: options.delimiter ?? DEFAULT_DELIMITERS.tsv,
      autoDetectDelimiter: options.autoDetectDelimiter ?? false,
      raggedRows: options.raggedRows ?? "pad",
    };
  }

  /**
   * Parse a complete DSV document
   *
   * @throws {DSVParseError} On a missing header, duplicate column names,
   * unbalanced quotes or rows with too many fields
   */
  parseString(text: string): DSVTable {
    const lines = normalizeLineEndings(removeBOM(text)).split("\n");
    const delimiter = this.options.autoDetectDelimiter
      ? (detectDelimiter(lines) ?? this.options.delimiter)
      : this.options.delimiter;

    let headers: string[] | null = null;
    const records: DSVRecord[] = [];

    let accumulatedRow = "";
    let rowStartLine = 0;

    for (let index = 0; index < lines.length; index++) {
      const line = lines[index] ?? "";

      if (accumulatedRow === "") {
        if (line.trim() === "") continue;
        accumulatedRow = line;
        rowStartLine = index + 1;
      } else {
        accumulatedRow += `\n${line}`;
      }

      if (endsInsideQuotes(accumulatedRow, delimiter, DEFAULT_QUOTE)) continue;

      const fields = this.parseRow(accumulatedRow, delimiter, rowStartLine);
      accumulatedRow = "";

      if (headers === null) {
        headers = this.validateHeaders(fields, rowStartLine);
        continue;
      }
      records.push({ fields: this.toRecord(headers, fields, rowStartLine), lineNumber: rowStartLine });
    }

    if (accumulatedRow !== "") {
      throw new DSVParseError("Unclosed quote at end of input", rowStartLine);
    }
    if (headers === null) {
      throw new DSVParseError("Input has no header row");
    }

    return { headers, delimiter, records };
  }

  private parseRow(row: string, delimiter: string, lineNumber: number): string[] {
    const fields = parseCSVRow(row, delimiter, DEFAULT_QUOTE);
    for (const field of fields) validateFieldSize(field, lineNumber);
    return fields;
  }

  private validateHeaders(fields: string[], lineNumber: number): string[] {
    const headers = fields.map((field) => field.trim());
    const seen = new Set<string>();
    for (const [column, header] of headers.entries()) {
      if (seen.has(header)) {
        throw new DSVParseError(`Duplicate column name "${header}"`, lineNumber, column + 1, header);
      }
      seen.add(header);
    }
    return headers;
  }

  private toRecord(
    headers: readonly string[],
    fields: string[],
    lineNumber: number
  ): Record<string, string> {
    if (fields.length > headers.length) {
      throw new DSVParseError(
        `Expected ${headers.length} fields, found ${fields.length}`,
        lineNumber
      );
    }
    if (fields.length < headers.length && this.options.raggedRows === "error") {
      throw new DSVParseError(
        `Expected ${headers.length} fields, found ${fields.length}`,
        lineNumber
      );
    }

    const record: Record<string, string> = {};
    for (const [column, header] of headers.entries()) {
      record[header] = fields[column] ?? "";
    }
    return record;
  }
}
