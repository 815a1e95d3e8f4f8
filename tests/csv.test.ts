import { describe, expect, it } from "vitest";
import { parseCsv, parseCsvRecords, toCsv } from "../src/report/csv.js";

describe("toCsv", () => {
  it("quotes only cells that need it", () => {
    const text = toCsv(
      ["Title", "Note"],
      [
        ["Zoom", 'says "hi"'],
        ["A, B", " padded"],
        ["multi\nline", null],
        [42, true]
      ]
    );

    expect(text).toBe(
      'Title,Note\nZoom,"says ""hi"""\n"A, B"," padded"\n"multi\nline",\n42,true\n'
    );
  });

  it("writes only the header for no rows", () => {
    expect(toCsv(["title", "min_version"], [])).toBe("title,min_version\n");
  });
});

describe("parseCsv", () => {
  it("handles quotes, CRLF, a byte-order mark and blank lines", () => {
    const text = '\uFEFFtitle,min_version\r\n"Acrobat, Reader","23.0"\r\n\r\n"say ""x""",\r\n';
    expect(parseCsv(text)).toEqual([
      ["title", "min_version"],
      ["Acrobat, Reader", "23.0"],
      ['say "x"', ""]
    ]);
  });

  it("keeps line breaks inside quoted cells", () => {
    expect(parseCsv('a,b\n"one\ntwo",3')).toEqual([
      ["a", "b"],
      ["one\ntwo", "3"]
    ]);
  });

  it("reads what toCsv writes", () => {
    const rows = [["Zoom", 'q"uote'], ["x,y", ""]];
    expect(parseCsv(toCsv(["a", "b"], rows))).toEqual([["a", "b"], ...rows]);
  });
});

describe("parseCsvRecords", () => {
  it("keys records by trimmed header names and pads short rows", () => {
    expect(parseCsvRecords(" title , min_version\nZoom\n")).toEqual({
      headers: ["title", "min_version"],
      records: [{ title: "Zoom", min_version: "" }]
    });
  });

  it("returns nothing for empty input", () => {
    expect(parseCsvRecords("")).toEqual({ headers: [], records: [] });
  });
});
