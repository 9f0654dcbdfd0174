import ExcelJS from "exceljs";
import Papa from "papaparse";
import { mkdirSync, writeFileSync } from "node:fs";
import { dirname, extname, resolve } from "node:path";
import { cleanTable } from "../cleaners/data-cleaner.js";
import type { CleaningConfig } from "../cleaners/data-cleaner.js";
import { formatCleaningReport } from "../cleaners/report.js";
import { loadConfig, setConfigValue } from "../core/config.js";
import { DocMergeError } from "../core/errors.js";
import { parseFile } from "../parsers/factory.js";
import { formatCell } from "../parsers/table.js";
import type { Table } from "../parsers/table.js";

export interface CleanOptions {
  table?: string;
  fill?: string;
  outliers?: boolean;
  output?: string;
  /** Config file to read instead of the one under the home directory */
  configPath?: string;
}

/** Write a table as .csv or, for any other extension, a one-sheet .xlsx */
export async function writeTable(table: Table, outputPath: string): Promise<string> {
  const target = resolve(outputPath);
  mkdirSync(dirname(target), { recursive: true });

  if (extname(target).toLowerCase() === ".csv") {
    const csv = Papa.unparse(
      {
        fields: [...table.columns],
        data: table.rows.map((row) => row.map(formatCell)),
      },
      { newline: "\n" }
    );
    writeFileSync(target, csv + "\n", "utf-8");
    return target;
  }

  const workbook = new ExcelJS.Workbook();
  const sheet = workbook.addWorksheet("Cleaned");
  sheet.addRow([...table.columns]);
  for (const row of table.rows) sheet.addRow([...row]);
  await workbook.xlsx.writeFile(target);
  return target;
}

export async function cleanCommand(file: string, options: CleanOptions): Promise<void> {
  let config = loadConfig(options.configPath);
  if (options.fill) config = setConfigValue(config, "fill-strategy", options.fill);

  const cleaning: Partial<CleaningConfig> = {
    ...config.cleaning,
    ...(options.outliers ? { detectOutliers: true } : {}),
  };

  const doc = await parseFile(resolve(file));
  const { tables } = doc.content;
  const index = options.table === undefined ? 1 : Number(options.table);

  if (tables.length === 0) {
    throw new DocMergeError(`No tables found in ${doc.metadata.fileName}`);
  }
  if (!Number.isInteger(index) || index < 1 || index > tables.length) {
    throw new DocMergeError(`Table ${options.table} out of range (found ${tables.length})`);
  }

  console.log(`🧹 Cleaning table ${index} of ${doc.metadata.fileName}`);
  const { table, report } = cleanTable(tables[index - 1], cleaning);
  console.log(formatCleaningReport(report));

  if (options.output) {
    const written = await writeTable(table, options.output);
    console.log(`💾 Saved cleaned table: ${written}`);
  }
}
