import ExcelJS from "exceljs";
import { mkdirSync, statSync } from "node:fs";
import { basename, dirname, extname, resolve } from "node:path";
import { cleanTable } from "../cleaners/data-cleaner.js";
import type { CleaningConfig } from "../cleaners/data-cleaner.js";
import { errorMessage } from "../core/errors.js";
import { parseFile } from "../parsers/factory.js";
import type { Table } from "../parsers/table.js";
import type { ParsedDocument } from "../parsers/types.js";

/** Excel's hard limit on worksheet name length */
export const MAX_SHEET_NAME = 31;
const FORBIDDEN_SHEET_CHARS = /[[\]:*?/\\]/g;
/** Names Excel keeps for itself, lowercased */
const RESERVED_SHEET_NAMES = new Set(["history"]);

export interface MergerOptions {
  autoClean?: boolean;
  cleaning?: Partial<CleaningConfig>;
}

export interface MergeResult {
  ok: boolean;
  message: string;
  sheetCount: number;
  outputPath?: string;
}

export interface MergedSource {
  filePath: string;
  document: ParsedDocument;
}

const SUMMARY_HEADERS = ["Source File", "Format", "Tables", "Total Rows", "File Size (MB)", "Status"];

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/** Local time as `YYYY-MM-DD HH:mm:ss` */
export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day} ${time}`;
}

/**
 * Turn a desired sheet name into one Excel accepts and that is not yet taken
 * (case-insensitive). Reserved names such as `History` count as taken.
 * Repeats get `_2`, `_3`, ... with the base shortened so the whole name stays
 * within 31 characters.
 */
export function uniqueSheetName(desired: string, taken: Set<string>): string {
  let base = desired.replace(FORBIDDEN_SHEET_CHARS, "_").replace(/^'|'$/g, "_");
  if (base === "") base = "Sheet";
  base = base.slice(0, MAX_SHEET_NAME);

  let candidate = base;
  const isTaken = (name: string): boolean =>
    taken.has(name.toLowerCase()) || RESERVED_SHEET_NAMES.has(name.toLowerCase());
  for (let n = 2; isTaken(candidate); n++) {
    const suffix = `_${n}`;
    candidate = base.slice(0, MAX_SHEET_NAME - suffix.length) + suffix;
  }

  taken.add(candidate.toLowerCase());
  return candidate;
}

function stem(filePath: string): string {
  return basename(filePath, extname(filePath));
}

function totalRows(document: ParsedDocument): number {
  return document.content.tables.reduce((sum, table) => sum + table.rows.length, 0);
}

/**
 * Accumulates parsed documents and writes them out as one workbook: a sheet
 * per extracted table, then a Summary sheet.
 */
export class ExcelMerger {
  private readonly entries: MergedSource[] = [];
  private readonly autoClean: boolean;
  private readonly cleaning: Partial<CleaningConfig>;

  constructor(options: MergerOptions = {}) {
    this.autoClean = options.autoClean ?? false;
    this.cleaning = { ...options.cleaning };
  }

  get sources(): readonly MergedSource[] {
    return this.entries;
  }

  clear(): void {
    this.entries.length = 0;
  }

  async addFile(filePath: string): Promise<boolean> {
    console.log(`  📄 Processing: ${basename(filePath)}`);
    try {
      const document = await parseFile(filePath);
      this.entries.push({ filePath, document });
      console.log(`     ✓ Extracted ${document.content.tables.length} table(s)`);
      return true;
    } catch (err) {
      console.error(`     ✗ Error: ${errorMessage(err)}`);
      return false;
    }
  }

  async addFiles(filePaths: readonly string[]): Promise<number> {
    let added = 0;
    for (const filePath of filePaths) {
      if (await this.addFile(filePath)) added++;
    }
    return added;
  }

  private prepareTable(table: Table, index: number): Table {
    if (!this.autoClean) return table;
    console.log(`     🧹 Cleaning table ${index + 1}...`);
    return cleanTable(table, this.cleaning).table;
  }

  private writeSummary(workbook: ExcelJS.Workbook, name: string, sheetCount: number): void {
    const sheet = workbook.addWorksheet(name);
    sheet.addRow(SUMMARY_HEADERS);

    let rows = 0;
    for (const { document } of this.entries) {
      const { metadata } = document;
      const sourceRows = totalRows(document);
      rows += sourceRows;
      sheet.addRow([
        metadata.fileName,
        metadata.format.toUpperCase(),
        document.content.tables.length,
        sourceRows,
        metadata.fileSizeMb,
        "✓ Merged",
      ]);
    }

    sheet.addRow(["--- MERGE INFO ---"]);
    sheet.addRow(["Total Files Merged", this.entries.length, sheetCount, rows]);
    sheet.addRow(["Merge Timestamp", formatTimestamp(new Date())]);
  }

  async mergeToExcel(outputPath: string): Promise<MergeResult> {
    if (this.entries.length === 0) {
      console.error("❌ Error: No files to merge");
      return { ok: false, message: "No files to merge", sheetCount: 0 };
    }

    const target = resolve(outputPath);
    console.log(`\n📝 Merging ${this.entries.length} file(s) into Excel...`);

    try {
      const workbook = new ExcelJS.Workbook();
      const taken = new Set<string>();
      let sheetCount = 0;

      this.entries.forEach(({ filePath, document }, i) => {
        const name = stem(filePath);
        const { tables } = document.content;
        console.log(`  ${i + 1}. ${name} (${document.metadata.format}): ${tables.length} table(s)`);

        tables.forEach((source, t) => {
          const table = this.prepareTable(source, t);
          const desired = tables.length === 1 ? name : `${name}_T${t + 1}`;
          const sheetName = uniqueSheetName(desired, taken);

          const sheet = workbook.addWorksheet(sheetName);
          sheet.addRow([...table.columns]);
          for (const row of table.rows) sheet.addRow([...row]);
          sheetCount++;

          console.log(`     → Sheet: '${sheetName}' (${table.rows.length} rows × ${table.columns.length} cols)`);
        });
      });

      const summaryName = uniqueSheetName("Summary", taken);
      this.writeSummary(workbook, summaryName, sheetCount);
      console.log(`     → Sheet: '${summaryName}' (metadata)`);

      mkdirSync(dirname(target), { recursive: true });
      await workbook.xlsx.writeFile(target);

      const sizeKb = Math.round((statSync(target).size / 1024) * 100) / 100;
      console.log(`\n✅ Merge complete!`);
      console.log(`   📁 Output: ${target}`);
      console.log(`   📊 Sheets: ${sheetCount} data + 1 summary = ${sheetCount + 1} total`);
      console.log(`   💾 Size: ${sizeKb} KB`);

      return {
        ok: true,
        message: `Merged ${this.entries.length} file(s) into ${sheetCount} sheet(s)`,
        sheetCount,
        outputPath: target,
      };
    } catch (err) {
      const message = `Merge failed: ${errorMessage(err)}`;
      console.error(`\n❌ ${message}`);
      return { ok: false, message, sheetCount: 0 };
    }
  }
}
