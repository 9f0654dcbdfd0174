import ExcelJS from "exceljs";
import * as XLSX from "xlsx";
import { readFile } from "node:fs/promises";
import { extname } from "node:path";
import { DocMergeError, errorMessage } from "../core/errors.js";
import { buildDocument, fileMetadata, requireFile } from "./base.js";
import { columnValues, createTable, detectColumnType, formatCell, normalizeHeaders, tableToText } from "./table.js";
import type { CellValue, Table } from "./table.js";
import type { DocumentExtractor, DocumentMetadata, ParsedDocument } from "./types.js";

export interface SheetData {
  name: string;
  table: Table;
}

export interface ColumnSummary {
  mean: number;
  max: number;
  min: number;
  sum: number;
}

export interface SheetMetrics {
  sheetName: string;
  rowCount: number;
  columnCount: number;
  columns: string[];
  summary: Record<string, ColumnSummary>;
}

/** Reduce an ExcelJS cell value (formula, rich text, hyperlink...) to a plain value */
export function normalizeCellValue(value: ExcelJS.CellValue): CellValue {
  if (value === null || value === undefined) return null;
  if (typeof value === "number" || typeof value === "string" || typeof value === "boolean") return value;
  if (value instanceof Date) return value;

  if ("richText" in value) return value.richText.map((run) => run.text).join("");
  if ("hyperlink" in value) return value.text;
  if ("result" in value) {
    const result = value.result;
    if (result === undefined) return null;
    if (result instanceof Date) return result;
    if (typeof result === "object") return null;
    return result;
  }
  // error cells (#N/A, #DIV/0!...)
  return null;
}

function toCellValue(value: unknown): CellValue {
  if (value === null || value === undefined) return null;
  if (typeof value === "number" || typeof value === "string" || typeof value === "boolean") return value;
  if (value instanceof Date) return value;
  return String(value);
}

/**
 * Shape a raw sheet grid into a table: the first non-blank row is the
 * header, blank rows are dropped and short rows padded to the widest row.
 */
export function gridToTable(grid: readonly (readonly CellValue[])[], sheetName: string): Table {
  const source = { kind: "sheet" as const, sheetName };
  const isBlank = (row: readonly CellValue[]) => row.every((v) => v === null || v === "");
  const rows = grid.filter((row) => !isBlank(row));

  if (rows.length === 0) return createTable([], [], source);

  const width = rows.reduce((max, row) => Math.max(max, row.length), 0);
  const pad = (row: readonly CellValue[]) =>
    Array.from({ length: width }, (_, i) => row[i] ?? null);

  const [header, ...body] = rows.map(pad);
  const columns = normalizeHeaders(header.map((v) => (v === null ? "" : formatCell(v))));

  return createTable(columns, body, source);
}

async function readXlsx(filePath: string): Promise<SheetData[]> {
  const workbook = new ExcelJS.Workbook();
  await workbook.xlsx.readFile(filePath);

  return workbook.worksheets.map((sheet) => {
    const grid: CellValue[][] = [];
    for (let r = 1; r <= sheet.rowCount; r++) {
      const row = sheet.getRow(r);
      const values: CellValue[] = [];
      for (let c = 1; c <= sheet.columnCount; c++) {
        values.push(normalizeCellValue(row.getCell(c).value));
      }
      grid.push(values);
    }
    return { name: sheet.name, table: gridToTable(grid, sheet.name) };
  });
}

async function readLegacyXls(filePath: string): Promise<SheetData[]> {
  const workbook = XLSX.read(await readFile(filePath), { type: "buffer", cellDates: true });

  return workbook.SheetNames.map((name) => {
    const rows = XLSX.utils.sheet_to_json<unknown[]>(workbook.Sheets[name], {
      header: 1,
      defval: null,
      blankrows: false,
      raw: true,
    });
    const grid = rows.map((row) => row.map(toCellValue));
    return { name, table: gridToTable(grid, name) };
  });
}

export class ExcelExtractor implements DocumentExtractor {
  readonly format = "excel" as const;

  private constructor(
    readonly filePath: string,
    private readonly sheets: SheetData[]
  ) {}

  /** Load every sheet up front so a corrupt workbook fails here */
  static async open(filePath: string): Promise<ExcelExtractor> {
    const absolute = requireFile(filePath);
    let sheets: SheetData[];

    try {
      sheets = extname(absolute).toLowerCase() === ".xls"
        ? await readLegacyXls(absolute)
        : await readXlsx(absolute);
    } catch (err) {
      throw new DocMergeError(`Excel parsing failed: ${errorMessage(err)}`, { cause: err });
    }

    return new ExcelExtractor(absolute, sheets);
  }

  get sheetNames(): string[] {
    return this.sheets.map((s) => s.name);
  }

  /** Table for one sheet; the first sheet when no name is given */
  getSheet(name?: string): Table | undefined {
    const sheet = name === undefined ? this.sheets[0] : this.sheets.find((s) => s.name === name);
    return sheet?.table;
  }

  async extractText(): Promise<string> {
    return this.sheets
      .map((s) => `=== ${s.name} ===\n${tableToText(s.table)}`)
      .join("\n\n");
  }

  async extractTables(): Promise<Table[]> {
    return this.sheets.map((s) => s.table);
  }

  /** Shape and numeric column statistics for one sheet (first by default) */
  extractSheetMetrics(name?: string): SheetMetrics | undefined {
    const sheet = name === undefined ? this.sheets[0] : this.sheets.find((s) => s.name === name);
    if (!sheet) return undefined;

    const { table } = sheet;
    const summary: Record<string, ColumnSummary> = {};

    table.columns.forEach((col, i) => {
      const values = columnValues(table, i);
      if (detectColumnType(values) !== "number") return;

      const numbers = values.filter((v): v is number => typeof v === "number");
      const sum = numbers.reduce((a, b) => a + b, 0);
      summary[col] = {
        mean: sum / numbers.length,
        max: numbers.reduce((a, b) => Math.max(a, b), -Infinity),
        min: numbers.reduce((a, b) => Math.min(a, b), Infinity),
        sum,
      };
    });

    return {
      sheetName: sheet.name,
      rowCount: table.rows.length,
      columnCount: table.columns.length,
      columns: [...table.columns],
      summary,
    };
  }

  getMetadata(): DocumentMetadata {
    return fileMetadata(this.filePath, this.format);
  }

  /**
   * Row and column counts describe the first sheet only, while `tables`
   * carries every sheet. Consumers treat the first sheet as primary.
   */
  async parse(): Promise<ParsedDocument> {
    const first = this.getSheet();
    const rowCount = first?.rows.length ?? 0;
    const columnCount = first?.columns.length ?? 0;

    return buildDocument(
      this.getMetadata(),
      {
        text: first && first.columns.length > 0 ? tableToText(first) : "",
        tables: await this.extractTables(),
        structure: {
          sheetNames: this.sheetNames,
          sheetCount: this.sheets.length,
        },
      },
      {
        sheetCount: this.sheets.length,
        rowCount,
        columnCount,
        totalCells: rowCount * columnCount,
      }
    );
  }

  async close(): Promise<void> {
    // workbook is fully read at open; no handle kept
  }
}
