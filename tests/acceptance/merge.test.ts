import { describe, it, expect, beforeAll, afterAll } from "vitest";
import ExcelJS from "exceljs";
import { existsSync } from "node:fs";
import { join } from "node:path";
import { ExcelMerger, formatTimestamp, uniqueSheetName } from "../../src/mergers/excel-merger.js";
import { makeTempDir, removeDir, writeText, writeXlsx } from "./helpers.js";

async function readWorkbook(path: string): Promise<ExcelJS.Workbook> {
  const wb = new ExcelJS.Workbook();
  await wb.xlsx.readFile(path);
  return wb;
}

function rowValues(sheet: ExcelJS.Worksheet, row: number, width: number): unknown[] {
  return Array.from({ length: width }, (_, c) => sheet.getRow(row).getCell(c + 1).value);
}

describe("Excel merger", () => {
  let dir: string;
  let csv: string;
  let xlsx: string;
  let multi: string;

  beforeAll(async () => {
    dir = makeTempDir();
    csv = writeText(dir, "a.csv", "Item,Unit Price\npen,2\nink,5\n");
    xlsx = await writeXlsx(dir, "a.xlsx", [
      { name: "Stock", rows: [["Item", "Count"], ["pen", 10], ["ink", 3], ["pad", 7]] },
    ]);
    multi = await writeXlsx(dir, "book.xlsx", [
      { name: "One", rows: [["x"], [1]] },
      { name: "Two", rows: [["y"], [2], [3]] },
    ]);
  });
  afterAll(() => removeDir(dir));

  it("refuses to merge when nothing was added, without writing a file", async () => {
    const out = join(dir, "empty", "merged.xlsx");
    const merger = new ExcelMerger();
    const result = await merger.mergeToExcel(out);

    expect(result.ok).toBe(false);
    expect(result.message).toBe("No files to merge");
    expect(existsSync(out)).toBe(false);
  });

  it("counts successes and skips files that fail", async () => {
    const merger = new ExcelMerger();
    const added = await merger.addFiles([csv, join(dir, "missing.csv"), join(dir, "notes.txt")]);

    expect(added).toBe(1);
    expect(merger.sources).toHaveLength(1);
    expect(merger.sources[0].filePath).toBe(csv);
  });

  it("gives same-stem sources distinct sheets and writes a summary", async () => {
    const out = join(dir, "nested", "deeper", "merged.xlsx");
    const merger = new ExcelMerger();
    await merger.addFiles([csv, xlsx]);
    const result = await merger.mergeToExcel(out);

    expect(result.ok).toBe(true);
    expect(result.sheetCount).toBe(2);
    expect(result.outputPath).toBe(out);

    const wb = await readWorkbook(out);
    expect(wb.worksheets.map((s) => s.name)).toEqual(["a", "a_2", "Summary"]);

    const first = wb.getWorksheet("a");
    expect(first && rowValues(first, 1, 2)).toEqual(["Item", "Unit Price"]);
    expect(first && rowValues(first, 3, 2)).toEqual(["ink", 5]);

    const summary = wb.getWorksheet("Summary");
    if (!summary) throw new Error("Summary sheet missing");
    expect(rowValues(summary, 1, 6)).toEqual([
      "Source File", "Format", "Tables", "Total Rows", "File Size (MB)", "Status",
    ]);
    expect(rowValues(summary, 2, 6)).toEqual(["a.csv", "CSV", 1, 2, 0, "✓ Merged"]);
    expect(rowValues(summary, 3, 6)).toEqual(["a.xlsx", "EXCEL", 1, 3, 0, "✓ Merged"]);
    expect(summary.getCell(4, 1).value).toBe("--- MERGE INFO ---");
    expect(rowValues(summary, 5, 4)).toEqual(["Total Files Merged", 2, 2, 5]);
    expect(summary.getCell(6, 1).value).toBe("Merge Timestamp");
    expect(String(summary.getCell(6, 2).value)).toMatch(/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/);
  });

  it("suffixes sheets of multi-table sources with their table number", async () => {
    const out = join(dir, "multi.xlsx");
    const merger = new ExcelMerger();
    await merger.addFile(multi);
    const result = await merger.mergeToExcel(out);

    expect(result.sheetCount).toBe(2);
    const wb = await readWorkbook(out);
    expect(wb.worksheets.map((s) => s.name)).toEqual(["book_T1", "book_T2", "Summary"]);
  });

  it("cleans tables first when auto-clean is on", async () => {
    const out = join(dir, "clean.xlsx");
    const merger = new ExcelMerger({ autoClean: true });
    await merger.addFile(csv);
    await merger.mergeToExcel(out);

    const sheet = (await readWorkbook(out)).getWorksheet("a");
    expect(sheet && rowValues(sheet, 1, 2)).toEqual(["item", "unit_price"]);
  });

  it("renames a source whose stem is a reserved sheet name", async () => {
    const history = writeText(dir, "History.csv", "Year,Event\n1990,launch\n");
    const sales = writeText(dir, "sales.csv", "Region,Total\nnorth,4\n");
    const out = join(dir, "history.xlsx");
    const merger = new ExcelMerger();
    expect(await merger.addFiles([history, sales])).toBe(2);
    const result = await merger.mergeToExcel(out);

    expect(result.ok).toBe(true);
    expect(result.sheetCount).toBe(2);
    const wb = await readWorkbook(out);
    expect(wb.worksheets.map((s) => s.name)).toEqual(["History_2", "sales", "Summary"]);
    const sheet = wb.getWorksheet("History_2");
    expect(sheet && rowValues(sheet, 2, 2)).toEqual([1990, "launch"]);
  });

  it("forgets its sources on clear", async () => {
    const merger = new ExcelMerger();
    await merger.addFile(csv);
    merger.clear();
    expect(merger.sources).toEqual([]);
    expect((await merger.mergeToExcel(join(dir, "cleared.xlsx"))).ok).toBe(false);
  });
});

describe("Sheet names", () => {
  it("truncates to 31 characters and replaces forbidden characters", () => {
    const taken = new Set<string>();
    expect(uniqueSheetName("q1/q2 [draft]: totals?", taken)).toBe("q1_q2 _draft__ totals_");
    expect(uniqueSheetName("x".repeat(40), taken)).toBe("x".repeat(31));
  });

  it("suffixes repeats without passing the length limit", () => {
    const taken = new Set<string>();
    const long = "y".repeat(40);
    expect(uniqueSheetName(long, taken)).toBe("y".repeat(31));
    expect(uniqueSheetName(long, taken)).toBe(`${"y".repeat(29)}_2`);
    expect(uniqueSheetName("Data", taken)).toBe("Data");
    expect(uniqueSheetName("DATA", taken)).toBe("DATA_2");
  });

  it("never hands out the reserved History name", () => {
    const taken = new Set<string>();
    expect(uniqueSheetName("History", taken)).toBe("History_2");
    expect(uniqueSheetName("history", taken)).toBe("history_3");
  });

  it("formats the merge timestamp", () => {
    expect(formatTimestamp(new Date(2024, 0, 5, 9, 3, 7))).toBe("2024-01-05 09:03:07");
  });
});
