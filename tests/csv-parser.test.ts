import { describe, it, expect } from "vitest";
import { parseRecords, previewRecord } from "../src/parser/csv-parser.js";
import { ParseError } from "../src/utils/errors.js";

function parseFailure(run: () => unknown): ParseError {
  try {
    run();
  } catch (error) {
    if (error instanceof ParseError) {
      return error;
    }
    throw error;
  }
  throw new Error("Expected a ParseError");
}

describe("parseRecords", () => {
  it("uses the first record as column names", () => {
    const recordSet = parseRecords("x,y\n1,2");

    expect(recordSet).toEqual({
      columns: ["x", "y"],
      rows: [{ x: "1", y: "2" }],
    });
  });

  it("skips blank lines and a trailing newline", () => {
    const recordSet = parseRecords("name,age\n\nAda,36\nAlan,41\n");

    expect(recordSet.rows).toEqual([
      { name: "Ada", age: "36" },
      { name: "Alan", age: "41" },
    ]);
  });

  it("keeps quoted delimiters inside a field", () => {
    const recordSet = parseRecords('city,note\n"Paris","a, b"');

    expect(recordSet.rows).toEqual([{ city: "Paris", note: "a, b" }]);
  });

  it("honours a custom delimiter", () => {
    const recordSet = parseRecords("a;b\n1;2", { delimiter: ";" });

    expect(recordSet.rows).toEqual([{ a: "1", b: "2" }]);
  });

  it("names columns by position when there is no header", () => {
    const recordSet = parseRecords("1,2\n3,4", { header: false });

    expect(recordSet.columns).toEqual(["column_1", "column_2"]);
    expect(recordSet.rows).toEqual([
      { column_1: "1", column_2: "2" },
      { column_1: "3", column_2: "4" },
    ]);
  });

  it("renames blank and repeated column names", () => {
    const recordSet = parseRecords("a,a,\n1,2,3");

    expect(recordSet.columns).toEqual(["a", "a.1", "Unnamed: 2"]);
  });

  it("keeps renamed columns distinct from existing ones", () => {
    const recordSet = parseRecords("a,a,a.1\n1,2,3");

    expect(recordSet.columns).toEqual(["a", "a.1", "a.1.1"]);
    expect(recordSet.rows[0]).toEqual({ a: "1", "a.1": "2", "a.1.1": "3" });
  });

  it("decodes bytes with the requested encoding", () => {
    // "name\ncafé" in latin1
    const bytes = new Uint8Array([
      0x6e, 0x61, 0x6d, 0x65, 0x0a, 0x63, 0x61, 0x66, 0xe9,
    ]);

    const recordSet = parseRecords(bytes, { encoding: "latin1" });

    expect(recordSet.rows).toEqual([{ name: "café" }]);
  });

  it("decodes utf-8 bytes by default", () => {
    const bytes = new TextEncoder().encode("x,y\n1,2");

    expect(parseRecords(bytes).rows).toEqual([{ x: "1", y: "2" }]);
  });

  it("reports bytes that are not valid in the encoding as malformed", () => {
    const bytes = new Uint8Array([0x61, 0x0a, 0xff, 0x41]);

    const error = parseFailure(() => parseRecords(bytes));

    expect(error.kind).toBe("malformed");
    expect(error.message).toBe("Payload is not valid utf-8");
  });

  it("rejects an unknown encoding label", () => {
    const error = parseFailure(() =>
      parseRecords("x,y\n1,2", { encoding: "not-an-encoding" }),
    );

    expect(error.kind).toBe("unsupported-options");
    expect(error.message).toBe('Unsupported encoding "not-an-encoding"');
  });

  it("rejects a delimiter longer than one character", () => {
    const error = parseFailure(() =>
      parseRecords("x,y\n1,2", { delimiter: ";;" }),
    );

    expect(error.kind).toBe("unsupported-options");
    expect(error.code).toBe("PARSE_UNSUPPORTED_OPTIONS");
  });

  it("rejects rows with a different number of fields", () => {
    const error = parseFailure(() => parseRecords("a,b\n1,2,3"));

    expect(error.kind).toBe("malformed");
  });

  it("rejects an unterminated quoted field", () => {
    const error = parseFailure(() => parseRecords('a,b\n"1,2'));

    expect(error.kind).toBe("malformed");
  });

  it("rejects an empty payload", () => {
    const error = parseFailure(() => parseRecords(""));

    expect(error.kind).toBe("malformed");
    expect(error.message).toBe("No columns to parse from payload");
  });

  it("returns the same record set for the same input", () => {
    const text = "k,v\na,1\nb,2";

    expect(parseRecords(text)).toEqual(parseRecords(text));
  });
});

describe("previewRecord", () => {
  it("returns the first five fields of the first row", () => {
    const recordSet = parseRecords("a,b,c,d,e,f,g\n1,2,3,4,5,6,7\n8,9,10,11,12,13,14");

    expect(previewRecord(recordSet)).toEqual({
      a: "1",
      b: "2",
      c: "3",
      d: "4",
      e: "5",
    });
  });

  it("honours a custom field count", () => {
    const recordSet = parseRecords("a,b,c\n1,2,3");

    expect(previewRecord(recordSet, 2)).toEqual({ a: "1", b: "2" });
  });

  it("returns undefined when there are no rows", () => {
    expect(previewRecord(parseRecords("a,b\n"))).toBeUndefined();
  });
});
