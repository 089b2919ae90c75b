/**
 * DSV parser and writer tests
 *
 * RFC 4180 quoting, delimiter detection, header handling and spreadsheet
 * protection of gene symbols.
 */

import { describe, expect, test } from "vitest";
import { DSVParseError, ValidationError } from "../../src/errors";
import { DSVParser, DSVWriter, TSVWriter } from "../../src/formats/dsv";
import { needsExcelProtection } from "../../src/formats/dsv/excel-protection";
import { endsInsideQuotes, parseCSVRow } from "../../src/formats/dsv/state-machine";
import { detectDelimiter, normalizeLineEndings, removeBOM } from "../../src/formats/dsv/utils";

describe("parseCSVRow", () => {
  test("splits plain fields", () => {
    expect(parseCSVRow("AAAC,ACGT,2")).toEqual(["AAAC", "ACGT", "2"]);
  });

  test("keeps empty fields, including a trailing one", () => {
    expect(parseCSVRow("a,,b,", ",")).toEqual(["a", "", "b", ""]);
    expect(parseCSVRow("AAAC\t\t0", "\t")).toEqual(["AAAC", "", "0"]);
  });

  test("handles quoted delimiters and doubled quotes", () => {
    expect(parseCSVRow('AAAC,"ACGT,CGTA",2')).toEqual(["AAAC", "ACGT,CGTA", "2"]);
    expect(parseCSVRow('"say ""hi""",x')).toEqual(['say "hi"', "x"]);
  });

  test("keeps a quote inside an unquoted field as text", () => {
    expect(parseCSVRow('1,5"', ",")).toEqual(["1", '5"']);
  });

  test("rejects an unclosed quote", () => {
    expect(() => parseCSVRow('a,"bc')).toThrow(DSVParseError);
  });
});

describe("endsInsideQuotes", () => {
  test("detects a quoted field left open", () => {
    expect(endsInsideQuotes('1,"first', ",")).toBe(true);
    expect(endsInsideQuotes('a,"x""', ",")).toBe(true);
  });

  test("ignores closed fields and quotes inside unquoted fields", () => {
    expect(endsInsideQuotes('1,"first"', ",")).toBe(false);
    expect(endsInsideQuotes('1,5"', ",")).toBe(false);
    expect(endsInsideQuotes('a"b"c,d', ",")).toBe(false);
  });
});

describe("DSV utilities", () => {
  test("removeBOM and normalizeLineEndings", () => {
    expect(removeBOM("﻿BC")).toBe("BC");
    expect(removeBOM("BC")).toBe("BC");
    expect(normalizeLineEndings("a\r\nb\rc\n")).toBe("a\nb\nc\n");
  });

  test("detectDelimiter prefers the consistent candidate", () => {
    expect(detectDelimiter(["BC\tUMI\tcalls", "AAAC\tACGT,CGTA\t2"])).toBe("\t");
    expect(detectDelimiter(["BC,UMI", "AAAC,ACGT"])).toBe(",");
    expect(detectDelimiter(["BC", "AAAC"])).toBeNull();
  });
});

describe("DSVParser", () => {
  test("keys records by header and tracks line numbers", () => {
    const table = new DSVParser().parseString("BC\tUMI\nAAAC\tACGT\n\nCCCG\tTTTT\n");
    expect(table.headers).toEqual(["BC", "UMI"]);
    expect(table.delimiter).toBe("\t");
    expect(table.records).toEqual([
      { fields: { BC: "AAAC", UMI: "ACGT" }, lineNumber: 2 },
      { fields: { BC: "CCCG", UMI: "TTTT" }, lineNumber: 4 },
    ]);
  });

  test("joins quoted fields that span lines", () => {
    const table = new DSVParser({ delimiter: "," }).parseString(
      'id,note\n1,"first\nsecond"\n2,plain\n'
    );
    expect(table.records[0]?.fields.note).toBe("first\nsecond");
    expect(table.records[1]?.lineNumber).toBe(4);
  });

  test("does not join rows after a literal quote in an unquoted field", () => {
    const table = new DSVParser({ delimiter: "," }).parseString('id,size\n1,5"\n2,7\n');
    expect(table.records).toEqual([
      { fields: { id: "1", size: '5"' }, lineNumber: 2 },
      { fields: { id: "2", size: "7" }, lineNumber: 3 },
    ]);
  });

  test("strips a byte-order mark and CRLF line endings", () => {
    const table = new DSVParser({ delimiter: "," }).parseString("﻿BC,UMI\r\nAAAC,ACGT\r\n");
    expect(table.headers).toEqual(["BC", "UMI"]);
    expect(table.records[0]?.fields.UMI).toBe("ACGT");
  });

  test("auto-detects the delimiter", () => {
    const table = new DSVParser({ autoDetectDelimiter: true }).parseString("a,b\n1,2\n");
    expect(table.delimiter).toBe(",");
    expect(table.records[0]?.fields.b).toBe("2");
  });

  test("pads short rows by default and rejects them on request", () => {
    const csv = new DSVParser({ delimiter: "," });
    expect(csv.parseString("a,b\n1\n").records[0]?.fields).toEqual({ a: "1", b: "" });
    expect(() =>
      new DSVParser({ delimiter: ",", raggedRows: "error" }).parseString("a,b\n1\n")
    ).toThrow("Expected 2 fields, found 1");
  });

  test("rejects rows with too many fields", () => {
    expect(() => new DSVParser({ delimiter: "," }).parseString("a,b\n1,2,3\n")).toThrow(
      DSVParseError
    );
  });

  test("rejects duplicate column names", () => {
    expect(() => new DSVParser({ delimiter: "," }).parseString("a,a\n1,2\n")).toThrow(
      'Duplicate column name "a"'
    );
  });

  test("rejects input without a header", () => {
    expect(() => new DSVParser().parseString("\n\n")).toThrow("Input has no header row");
  });

  test("rejects a quoted field that never closes", () => {
    expect(() => new DSVParser({ delimiter: "," }).parseString('a,b\n1,"open\n')).toThrow(
      "Unclosed quote at end of input"
    );
  });

  test("validates options", () => {
    expect(() => new DSVParser({ delimiter: ";;" })).toThrow(ValidationError);
  });
});

describe("needsExcelProtection", () => {
  test("flags gene symbols that turn into dates", () => {
    for (const gene of ["SEPT9", "MARCH1", "DEC1", "sept2"]) {
      expect(needsExcelProtection(gene)).toBe(true);
    }
  });

  test("leaves ordinary symbols alone", () => {
    expect(needsExcelProtection("DNMT3A")).toBe(false);
    expect(needsExcelProtection("Multiple_DNMT3A")).toBe(false);
  });

  test("flags leading zeros and formula prefixes", () => {
    expect(needsExcelProtection("0123")).toBe(true);
    expect(needsExcelProtection("=SUM(A1)")).toBe(true);
  });
});

describe("DSVWriter", () => {
  test("writes a header and one line per record", () => {
    const writer = new TSVWriter(["gene", "count"], { excelCompatible: true });
    expect(
      writer.formatRecords([
        { gene: "MARCH1", count: 3 },
        { gene: "DNMT3A", count: null },
      ])
    ).toBe('gene\tcount\n"MARCH1"\t3\nDNMT3A\t\n');
  });

  test("doubles quotes inside a protected value", () => {
    const writer = new TSVWriter(["gene", "count"], { excelCompatible: true });
    expect(writer.formatRecords([{ gene: '=HYPERLINK("x")', count: 1 }])).toBe(
      'gene\tcount\n"=HYPERLINK(""x"")"\t1\n'
    );
  });

  test("leaves gene symbols unquoted without spreadsheet protection", () => {
    expect(new TSVWriter(["gene"]).formatRecords([{ gene: "SEPT9" }])).toBe("gene\nSEPT9\n");
  });

  test("quotes fields containing delimiters, quotes or newlines", () => {
    const writer = new DSVWriter(["a", "b"], { delimiter: "," });
    expect(writer.formatRecords([{ a: "x,y", b: 'say "hi"' }])).toBe('a,b\n"x,y","say ""hi"""\n');
    expect(writer.formatRecords([{ a: "line\nbreak", b: true }])).toBe('a,b\n"line\nbreak",true\n');
  });

  test("output parses back to the same fields", () => {
    const text = new DSVWriter(["BC", "note"], { delimiter: "," }).formatRecords([
      { BC: "AAAC", note: 'a "b", c' },
    ]);
    expect(new DSVParser({ delimiter: "," }).parseString(text).records[0]?.fields).toEqual({
      BC: "AAAC",
      note: 'a "b", c',
    });
  });

  test("validates options and needs at least one column", () => {
    expect(() => new DSVWriter(["a"], { delimiter: "" })).toThrow(ValidationError);
    expect(() => new TSVWriter([])).toThrow("DSV writer needs at least one column");
  });
});
