import { describe, expect, test } from "vitest";
import { EncodingError, ExpansionError } from "../../src/errors";
import { expandGenotypingTable, expandRow, replicationCount } from "../../src/operations/expand";
import type { GenotypingRow } from "../../src/types";

const row: GenotypingRow = {
  barcode: "AAAC",
  wtCalls: 1,
  mutCalls: 1,
  ambCalls: 0,
  umis: ["ACGT", "CGTA"],
  callsInDups: ["WT", "MUT"],
  wtInDups: [3, 0],
  mutInDups: [0, 5],
  ambInDups: [1, 0],
};

describe("expandRow", () => {
  test("emits one observation per supporting UMI", () => {
    const observations = expandRow(row, 7);
    expect(observations).toHaveLength(replicationCount(row));
    expect(observations[0]).toEqual({
      barcode: "AAAC",
      rowIndex: 7,
      moleculeIndex: 0,
      umiSequence: "ACGT",
      umiCode: 27,
      call: "WT",
      dupCounts: { wt: 3, mut: 0, amb: 1 },
      totalDups: 4,
      totalDupsWtMut: 3,
      wtCalls: 1,
      mutCalls: 1,
      ambCalls: 0,
    });
    expect(observations[1]?.umiCode).toBe(108);
    expect(observations[1]?.call).toBe("MUT");
    expect(observations[1]?.totalDups).toBe(5);
    expect(observations[1]?.totalDupsWtMut).toBe(5);
  });

  test("fails on a list-length mismatch, naming the barcode and column", () => {
    const broken: GenotypingRow = { ...row, umis: ["ACGT", "CGTA", "TTTT"] };
    expect(() => expandRow(broken, 0)).toThrow(ExpansionError);
    expect(() => expandRow(broken, 0)).toThrow(
      "Per-molecule list length does not match the call totals (barcode AAAC: UMI has 3 elements, expected 2)"
    );
  });

  test("checks every list-valued column", () => {
    const broken: GenotypingRow = { ...row, ambInDups: [1] };
    let caught: unknown;
    try {
      expandRow(broken, 0);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ExpansionError);
    if (caught instanceof ExpansionError) {
      expect(caught.field).toBe("num.amb.in.dups");
      expect(caught.expected).toBe(2);
      expect(caught.actual).toBe(1);
    }
  });

  test("propagates malformed UMIs", () => {
    expect(() => expandRow({ ...row, umis: ["ACGT", "CGNA"] }, 0)).toThrow(EncodingError);
  });

  test("enforces the UMI length when given", () => {
    expect(expandRow(row, 0, { umiLength: 4 })).toHaveLength(2);
    expect(() => expandRow(row, 0, { umiLength: 12 })).toThrow(
      "UMI has length 4, expected 12 (barcode AAAC)"
    );
  });
});

describe("expandGenotypingTable", () => {
  test("keeps row order and records the source row", () => {
    const second: GenotypingRow = {
      barcode: "CCCG",
      wtCalls: 0,
      mutCalls: 0,
      ambCalls: 1,
      umis: ["GGGG"],
      callsInDups: ["AMB"],
      wtInDups: [1],
      mutInDups: [1],
      ambInDups: [2],
    };
    const observations = expandGenotypingTable([row, second]);
    expect(observations.map((o) => [o.barcode, o.rowIndex, o.moleculeIndex])).toEqual([
      ["AAAC", 0, 0],
      ["AAAC", 0, 1],
      ["CCCG", 1, 0],
    ]);
    expect(observations[2]?.totalDups).toBe(4);
    expect(observations[2]?.totalDupsWtMut).toBe(2);
  });
});
