import { describe, it, expect } from "vitest";
import { escapeCsvField, parseCsv, parseCsvTable, toCsv } from "../src/csv.js";

describe("parseCsv", () => {
  it("handles quoted commas and doubled quotes", () => {
    expect(parseCsv('a,b\n"x, y","say ""hi"""\n\n')).toEqual([
      ["a", "b"],
      ["x, y", 'say "hi"'],
    ]);
  });

  it("strips a byte-order mark and CRLF line endings", () => {
    expect(parseCsv("\ufeffk,v\r\n1,2\r\n")).toEqual([
      ["k", "v"],
      ["1", "2"],
    ]);
  });

  it("keeps line breaks inside quotes and trims fields", () => {
    expect(parseCsv(' a , b \n"line1\nline2"')).toEqual([["a", "b"], ["line1\nline2"]]);
  });

  it("returns no rows for empty input", () => {
    expect(parseCsv("")).toEqual([]);
  });
});

describe("parseCsvTable", () => {
  it("maps rows onto the header and fills missing cells", () => {
    expect(parseCsvTable("keyword,volume\nseo tools,1200\nrank tracker\n")).toEqual({
      header: ["keyword", "volume"],
      records: [
        { keyword: "seo tools", volume: "1200" },
        { keyword: "rank tracker", volume: "" },
      ],
    });
  });

  it("returns an empty table for empty input", () => {
    expect(parseCsvTable("")).toEqual({ header: [], records: [] });
  });
});

describe("CSV writing", () => {
  it("quotes only fields that need it", () => {
    expect(escapeCsvField(null)).toBe("");
    expect(escapeCsvField(3)).toBe("3");
    expect(escapeCsvField(false)).toBe("false");
    expect(escapeCsvField('a"b')).toBe('"a""b"');
    expect(escapeCsvField("two\nlines")).toBe('"two\nlines"');
  });

  it("joins rows with a trailing newline", () => {
    expect(
      toCsv([
        ["a", 1],
        [undefined, "x,y"],
      ]),
    ).toBe('a,1\n,"x,y"\n');
  });
});
