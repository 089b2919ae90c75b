/**
 * DSV Format Constants
 */

/**
 * Default delimiter for different formats
 */
export const DEFAULT_DELIMITERS = {
  csv: ",",
  tsv: "\t",
} as const;

/**
 * Default quote character (RFC 4180 compliant)
 */
export const DEFAULT_QUOTE = '"';

/**
 * Maximum field size for memory safety (100MB)
 */
export const MAX_FIELD_SIZE = 100_000_000;

/**
 * Maximum number of lines to sample for delimiter detection
 */
export const MAX_DETECTION_LINES = 100;

/**
 * Gene symbols that spreadsheet software silently turns into dates
 * Examples: SEPT1 → Sep-1, MARCH1 → Mar-1
 */
export const EXCEL_GENE_PATTERNS = [
  /^(JAN|FEB|MAR|APR|MAY|JUN|JUL|AUG|SEP|SEPT|OCT|NOV|DEC)\d+$/i,
  /^(JANUARY|FEBRUARY|MARCH|APRIL|MAY|JUNE|JULY|AUGUST|SEPTEMBER|OCTOBER|NOVEMBER|DECEMBER)\d+$/i,
] as const;
