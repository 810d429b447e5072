import { TextDecoder } from "node:util";
import { CsvError } from "csv-parse";
import { parse } from "csv-parse/sync";
import { ParseError, getErrorMessage } from "../utils/errors.js";

export interface ParseOptions {
  encoding: string;
  delimiter: string;
  /** First record holds the column names */
  header: boolean;
}

export const DEFAULT_PARSE_OPTIONS: ParseOptions = {
  encoding: "utf-8",
  delimiter: ",",
  header: true,
};

export type RecordRow = Record<string, string>;

export interface RecordSet {
  columns: string[];
  rows: RecordRow[];
}

export type RecordPreview = RecordRow;

function createDecoder(encoding: string): TextDecoder {
  try {
    return new TextDecoder(encoding, { fatal: true });
  } catch (error) {
    throw new ParseError(
      "unsupported-options",
      `Unsupported encoding "${encoding}"`,
      error,
    );
  }
}

function decode(raw: string | Uint8Array, decoder: TextDecoder): string {
  if (typeof raw === "string") {
    return raw;
  }
  try {
    return decoder.decode(raw);
  } catch (error) {
    throw new ParseError(
      "malformed",
      `Payload is not valid ${decoder.encoding}`,
      error,
    );
  }
}

function isStringMatrix(value: unknown): value is string[][] {
  return (
    Array.isArray(value) &&
    value.every(
      (row) =>
        Array.isArray(row) && row.every((cell) => typeof cell === "string"),
    )
  );
}

/**
 * Blank names become `Unnamed: <index>`, repeated names get a `.<n>` suffix.
 */
function normalizeColumns(names: string[]): string[] {
  const taken = new Set<string>();
  const suffixes = new Map<string, number>();
  return names.map((raw, index) => {
    const base = raw.trim() === "" ? `Unnamed: ${index}` : raw.trim();
    let name = base;
    let suffix = suffixes.get(base) ?? 0;
    while (taken.has(name)) {
      suffix++;
      name = `${base}.${suffix}`;
    }
    suffixes.set(base, suffix);
    taken.add(name);
    return name;
  });
}

function toOptionsError(error: CsvError): ParseError {
  return error.code.startsWith("CSV_INVALID_OPTION")
    ? new ParseError("unsupported-options", error.message, error)
    : new ParseError("malformed", error.message, error);
}

/**
 * Parse CSV text (or bytes in `options.encoding`) into a record set.
 */
export function parseRecords(
  raw: string | Uint8Array,
  options: Partial<ParseOptions> = {},
): RecordSet {
  const resolved = { ...DEFAULT_PARSE_OPTIONS, ...options };

  if ([...resolved.delimiter].length !== 1) {
    throw new ParseError(
      "unsupported-options",
      `Delimiter must be a single character, got "${resolved.delimiter}"`,
    );
  }

  const text = decode(raw, createDecoder(resolved.encoding));

  let records: unknown;
  try {
    records = parse(text, {
      delimiter: resolved.delimiter,
      bom: true,
      skip_empty_lines: true,
      relax_column_count: false,
    });
  } catch (error) {
    if (error instanceof CsvError) {
      throw toOptionsError(error);
    }
    throw new ParseError("malformed", getErrorMessage(error), error);
  }

  if (!isStringMatrix(records)) {
    throw new ParseError("malformed", "Parser returned an unexpected shape");
  }

  if (records.length === 0) {
    throw new ParseError("malformed", "No columns to parse from payload");
  }

  const [first, ...rest] = records;
  const columns = resolved.header
    ? normalizeColumns(first)
    : first.map((_cell, index) => `column_${index + 1}`);
  const dataRows = resolved.header ? rest : records;

  return {
    columns,
    rows: dataRows.map((cells) =>
      Object.fromEntries(columns.map((column, index) => [column, cells[index]])),
    ),
  };
}

/**
 * First row restricted to its first `fieldCount` columns.
 */
export function previewRecord(
  recordSet: RecordSet,
  fieldCount = 5,
): RecordPreview | undefined {
  const [first] = recordSet.rows;
  if (!first) {
    return undefined;
  }
  return Object.fromEntries(
    recordSet.columns
      .slice(0, fieldCount)
      .map((column) => [column, first[column]]),
  );
}
