/**
 * Shared fixtures for observation-level tests
 */

import type {
  ClassifiedObservation,
  GenotypeCall,
  GenotypeObservation,
  MatchClass,
  MoleculeArchive,
} from "../src/types";

export function makeObservation(
  overrides: Partial<GenotypeObservation> & Pick<GenotypeObservation, "barcode" | "umiSequence">
): GenotypeObservation {
  return {
    rowIndex: 0,
    moleculeIndex: 0,
    umiCode: 0,
    call: "WT",
    dupCounts: { wt: 1, mut: 0, amb: 0 },
    totalDups: 1,
    totalDupsWtMut: 1,
    wtCalls: 1,
    mutCalls: 0,
    ambCalls: 0,
    ...overrides,
  };
}

export function makeClassified(
  barcode: string,
  call: GenotypeCall,
  matchClass: MatchClass,
  totalDupsWtMut = 1
): ClassifiedObservation {
  return {
    ...makeObservation({ barcode, umiSequence: "ACGT", call, totalDupsWtMut }),
    exactMatch: matchClass === "Exact",
    approxMatch: matchClass === "Exact" || matchClass === "Approx",
    inGex: matchClass !== "NoGene",
    geneLabel: matchClass === "NoGene" ? null : "DNMT3A",
    matchClass,
  };
}

/**
 * Small archive with UMI length 4
 *
 * | molecule | barcode | gene          | UMI  | code | reads |
 * |----------|---------|---------------|------|------|-------|
 * | 0        | AAAC    | DNMT3A        | ACGT | 27   | 5     |
 * | 1        | AAAC    | GAPDH         | ACGT | 27   | 2     |
 * | 2        | CCCG    | GAPDH         | AAAA | 0    | 3     |
 * | 3        | CCCG    | TotalSeqB_CD3 | AAAA | 0    | 1     |
 * | 4        | GGGT    | DNMT3A        | TTTT | 255  | 7     |
 * | 5        | AAAC    | DNMT3A        | CGTA | 108  | 4     |
 * | 6        | AAAC    | TotalSeqB_CD3 | CGTA | 108  | 1     |
 * | 7        | CCCG    | DNMT3A        | TGCA | 228  | 6     |
 */
export function makeArchive(): MoleculeArchive {
  return {
    barcodes: ["AAAC", "CCCG", "GGGT"],
    features: { name: ["DNMT3A", "GAPDH", "TotalSeqB_CD3"], id: ["G1", "G2", "G3"] },
    barcode_idx: [0, 0, 1, 1, 2, 0, 0, 1],
    feature_idx: [0, 1, 1, 2, 0, 0, 2, 0],
    umi: [27, 27, 0, 0, 255, 108, 108, 228],
    count: [5, 2, 3, 1, 7, 4, 1, 6],
  };
}
