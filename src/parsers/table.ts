import { MalformedTableError } from "../core/errors.js";

/** A single cell. `null` is the only missing-value marker. */
export type CellValue = string | number | boolean | Date | null;

export type ColumnType = "number" | "string" | "boolean" | "date" | "empty" | "mixed";

export interface TableSource {
  kind: "csv" | "sheet" | "word" | "pdf";
  sheetName?: string;
  pageNumber?: number;
  tableIndex?: number;
}

/**
 * Rectangular table: every row holds exactly `columns.length` cells and
 * column names are unique within the table.
 */
export interface Table {
  readonly columns: readonly string[];
  readonly rows: readonly (readonly CellValue[])[];
  readonly source?: TableSource;
}

/**
 * Make header names usable as column keys: blanks become `Column_<n>`,
 * repeats get `.1`, `.2` suffixes in order of appearance.
 */
export function normalizeHeaders(headers: readonly unknown[]): string[] {
  const seen = new Map<string, number>();
  const taken = new Set<string>();
  const out: string[] = [];

  headers.forEach((raw, i) => {
    let name = raw === null || raw === undefined ? "" : String(raw).trim();
    if (name === "") name = `Column_${i + 1}`;

    let candidate = name;
    let n = seen.get(name) ?? 0;
    while (taken.has(candidate)) {
      n++;
      candidate = `${name}.${n}`;
    }
    seen.set(name, n);
    taken.add(candidate);
    out.push(candidate);
  });

  return out;
}

/** Build a table, rejecting ragged rows and duplicate column names. */
export function createTable(
  columns: readonly string[],
  rows: readonly (readonly CellValue[])[],
  source?: TableSource
): Table {
  if (new Set(columns).size !== columns.length) {
    throw new MalformedTableError(`Duplicate column names: ${columns.join(", ")}`);
  }

  rows.forEach((row, i) => {
    if (row.length !== columns.length) {
      throw new MalformedTableError(
        `Row ${i + 1} has ${row.length} cells, expected ${columns.length}`
      );
    }
  });

  return {
    columns: [...columns],
    rows: rows.map((row) => [...row]),
    ...(source ? { source } : {}),
  };
}

export function columnValues(table: Table, index: number): CellValue[] {
  return table.rows.map((row) => row[index] ?? null);
}

export function detectColumnType(values: readonly CellValue[]): ColumnType {
  let type: ColumnType = "empty";

  for (const value of values) {
    if (value === null) continue;

    const current: ColumnType =
      typeof value === "number"
        ? "number"
        : typeof value === "boolean"
          ? "boolean"
          : value instanceof Date
            ? "date"
            : "string";

    if (type === "empty") type = current;
    else if (type !== current) return "mixed";
  }

  return type;
}

export function columnTypes(table: Table): Record<string, ColumnType> {
  const types: Record<string, ColumnType> = {};
  table.columns.forEach((col, i) => {
    types[col] = detectColumnType(columnValues(table, i));
  });
  return types;
}

export function isTextType(type: ColumnType): boolean {
  return type === "string" || type === "mixed";
}

export function formatCell(value: CellValue): string {
  if (value === null) return "";
  if (value instanceof Date) return value.toISOString();
  return String(value);
}

/** Pipe-delimited rendering: header line then one line per row */
export function tableToText(table: Table): string {
  const parts: string[] = [table.columns.join(" | ")];
  for (const row of table.rows) {
    parts.push(row.map(formatCell).join(" | "));
  }
  return parts.join("\n");
}

const NUMERIC = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/** Parse a string as a plain decimal number; null when it is not one */
export function parseNumber(raw: string): number | null {
  const trimmed = raw.trim();
  if (!NUMERIC.test(trimmed)) return null;
  const n = Number(trimmed);
  return Number.isFinite(n) ? n : null;
}

/**
 * Column-wise typing for text sources: empty cells become null, and a column
 * whose remaining cells all parse as numbers becomes numeric.
 */
export function typeTextColumns(rows: readonly (readonly string[])[], width: number): CellValue[][] {
  const typed: CellValue[][] = rows.map((row) =>
    Array.from({ length: width }, (_, c) => {
      const cell = row[c] ?? "";
      return cell.trim() === "" ? null : cell;
    })
  );

  for (let c = 0; c < width; c++) {
    const numbers: (number | null)[] = [];
    let numeric = true;

    for (const row of typed) {
      const cell = row[c];
      if (cell === null || cell === undefined) {
        numbers.push(null);
        continue;
      }
      const n = parseNumber(String(cell));
      if (n === null) {
        numeric = false;
        break;
      }
      numbers.push(n);
    }

    if (numeric && numbers.some((n) => n !== null)) {
      typed.forEach((row, r) => {
        row[c] = numbers[r] ?? null;
      });
    }
  }

  return typed;
}
