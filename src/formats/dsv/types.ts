/**
 * DSV Format Type Definitions
 */

/**
 * Parser state for CSV/TSV parsing state machine
 */
export enum CSVParseState {
  FIELD_START,
  UNQUOTED_FIELD,
  QUOTED_FIELD,
  QUOTE_IN_QUOTED,
}

/**
 * One data row keyed by header name
 */
export interface DSVRecord {
  readonly fields: Readonly<Record<string, string>>;
  /** Source line number where the row started */
  readonly lineNumber: number;
}

/**
 * Parsed table with its header
 */
export interface DSVTable {
  readonly headers: readonly string[];
  readonly delimiter: string;
  readonly records: readonly DSVRecord[];
}

/**
 * DSV parser options
 */
export interface DSVParserOptions {
  /** Field delimiter (default tab) */
  delimiter?: string;
  /** Pick the delimiter from the first lines (tab or comma) */
  autoDetectDelimiter?: boolean;
  /** What to do with rows that have fewer fields than the header */
  raggedRows?: "error" | "pad";
}

/**
 * Cell value accepted by the writer
 */
export type DSVCell = string | number | boolean | null | undefined;

/**
 * DSV writer options for output formatting
 */
export interface DSVWriterOptions {
  /** Field delimiter (default tab) */
  delimiter?: string;
  /** Protect gene symbols and similar values from spreadsheet mangling */
  excelCompatible?: boolean;
}
