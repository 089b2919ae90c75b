/**
 * Excel Protection Module
 *
 * Gene symbols such as SEPT9 or MARCH1 are converted to dates when a TSV is
 * opened in a spreadsheet; barcodes with leading zeros lose them. The writer
 * quotes such values, which stops the conversion.
 */

import { EXCEL_GENE_PATTERNS } from "./constants";

/**
 * Check whether a spreadsheet would rewrite this value
 */
export function needsExcelProtection(field: string): boolean {
  for (const pattern of EXCEL_GENE_PATTERNS) {
    if (pattern.test(field)) return true;
  }
  // leading zeros, long digit runs (scientific notation), formula prefixes
  return /^0+[0-9A-Za-z]/.test(field) || /^\d{16,}$/.test(field) || /^[=+\-@]/.test(field);
}
