import { DocMergeError } from "../core/errors.js";
import { createTable, detectColumnType, isTextType, parseNumber } from "../parsers/table.js";
import type { CellValue, Table } from "../parsers/table.js";
import { freezeReport, newReportDraft } from "./report.js";
import type { CleaningReport, ReportDraft } from "./report.js";
import { cellKey, mean, median, mode, parseDate, quantile, stdDev } from "./stats.js";

export const FILL_STRATEGIES = ["mean", "median", "mode", "ffill", "bfill", "drop", "zero"] as const;
export type FillStrategy = (typeof FILL_STRATEGIES)[number];

export interface CleaningConfig {
  removeDuplicates: boolean;
  duplicateSubset?: string[];
  keepDuplicate: "first" | "last";

  handleNulls: boolean;
  nullThreshold: number;      // drop a column when its null fraction is above this
  fillStrategy: FillStrategy;

  inferTypes: boolean;
  parseDates: boolean;

  normalizeNames: boolean;

  detectOutliers: boolean;
  outlierMethod: "iqr" | "zscore";
  zscoreThreshold: number;
}

export const DEFAULT_CLEANING_CONFIG: Readonly<CleaningConfig> = Object.freeze({
  removeDuplicates: true,
  keepDuplicate: "first",
  handleNulls: true,
  nullThreshold: 0.5,
  fillStrategy: "mean",
  inferTypes: true,
  parseDates: true,
  normalizeNames: true,
  detectOutliers: false,
  outlierMethod: "iqr",
  zscoreThreshold: 3,
});

/** Share of a column's cells that must convert before the column changes type */
const CONVERSION_RATIO = 0.8;

export interface CleaningResult {
  table: Table;
  report: CleaningReport;
}

interface Working {
  columns: string[];
  rows: CellValue[][];
}

export function resolveCleaningConfig(overrides?: Partial<CleaningConfig>): CleaningConfig {
  return { ...DEFAULT_CLEANING_CONFIG, ...overrides };
}

function column(work: Working, index: number): CellValue[] {
  return work.rows.map((row) => row[index]);
}

function removeDuplicates(work: Working, config: CleaningConfig, report: ReportDraft): Working {
  const subset = config.duplicateSubset ?? work.columns;
  const indexes = subset.map((name) => {
    const i = work.columns.indexOf(name);
    if (i === -1) throw new DocMergeError(`Unknown column in duplicate subset: ${name}`);
    return i;
  });

  const seen = new Set<string>();
  const keyOf = (row: CellValue[]) => JSON.stringify(indexes.map((i) => cellKey(row[i])));
  const ordered = config.keepDuplicate === "last" ? [...work.rows].reverse() : work.rows;
  const kept = ordered.filter((row) => {
    const key = keyOf(row);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });

  const rows = config.keepDuplicate === "last" ? kept.reverse() : kept;
  report.duplicatesRemoved = work.rows.length - rows.length;
  return { columns: work.columns, rows };
}

function fillColumn(values: CellValue[], strategy: FillStrategy): CellValue[] {
  const numeric = detectColumnType(values) === "number";
  const numbers = values.filter((v): v is number => typeof v === "number");

  let fill: CellValue;
  switch (strategy) {
    case "mean":
    case "median":
      if (numeric) {
        fill = strategy === "mean" ? mean(numbers) : median(numbers);
        return values.map((v) => v ?? fill);
      }
      break;
    case "mode":
      fill = mode(values);
      return values.map((v) => v ?? fill);
    case "ffill": {
      let last: CellValue = null;
      return values.map((v) => (v === null ? last : (last = v)));
    }
    case "bfill": {
      let next: CellValue = null;
      return values
        .slice()
        .reverse()
        .map((v) => (v === null ? next : (next = v)))
        .reverse();
    }
  }

  fill = numeric ? 0 : "";
  return values.map((v) => v ?? fill);
}

function handleNulls(work: Working, config: CleaningConfig, report: ReportDraft): Working {
  let { columns, rows } = work;

  if (rows.length > 0) {
    const dropped = columns.filter((_, i) => {
      const nulls = rows.filter((row) => row[i] === null).length;
      return nulls / rows.length > config.nullThreshold;
    });

    if (dropped.length > 0) {
      const keep = columns.map((name, i) => (dropped.includes(name) ? -1 : i)).filter((i) => i !== -1);
      columns = keep.map((i) => columns[i]);
      rows = rows.map((row) => keep.map((i) => row[i]));
      report.columnsDropped.push(...dropped);
    }
  }

  columns.forEach((name, c) => {
    const values = rows.map((row) => row[c]);
    const nullCount = values.filter((v) => v === null).length;
    if (nullCount === 0) return;

    if (config.fillStrategy === "drop") {
      rows = rows.filter((row) => row[c] !== null);
    } else {
      const filled = fillColumn(values, config.fillStrategy);
      rows = rows.map((row, r) => {
        const next = [...row];
        next[c] = filled[r];
        return next;
      });
    }

    report.nullsFilled[name] = nullCount;
  });

  return { columns, rows };
}

/** Letters, digits and underscores only; whitespace runs become `_`; lowercase */
export function normalizeColumnName(name: string): string {
  return name
    .replace(/[^\p{L}\p{N}_\s]/gu, "")
    .trim()
    .replace(/\s+/g, "_")
    .toLowerCase();
}

function normalizeNames(work: Working, report: ReportDraft): Working {
  const taken = new Set<string>();

  const columns = work.columns.map((name, i) => {
    const base = normalizeColumnName(name) || `column_${i + 1}`;
    let candidate = base;
    for (let n = 2; taken.has(candidate); n++) candidate = `${base}_${n}`;
    taken.add(candidate);

    if (candidate !== name) report.columnsRenamed[name] = candidate;
    return candidate;
  });

  return { columns, rows: work.rows };
}

function convertedShare(values: readonly CellValue[]): number {
  return values.filter((v) => v !== null).length / values.length;
}

function inferTypes(work: Working, config: CleaningConfig, report: ReportDraft): Working {
  if (work.rows.length === 0) return work;
  let rows = work.rows;

  work.columns.forEach((name, c) => {
    const values = column({ columns: work.columns, rows }, c);
    const original = detectColumnType(values);
    if (!isTextType(original)) return;

    let converted: CellValue[] | undefined;
    let target = "";

    const asNumbers = values.map((v) =>
      typeof v === "number" ? v : typeof v === "string" ? parseNumber(v) : null
    );
    if (convertedShare(asNumbers) >= CONVERSION_RATIO) {
      converted = asNumbers;
      target = "number";
    } else if (config.parseDates) {
      const asDates = values.map((v) =>
        v instanceof Date ? v : typeof v === "string" ? parseDate(v) : null
      );
      if (convertedShare(asDates) >= CONVERSION_RATIO) {
        converted = asDates;
        target = "date";
      }
    }

    if (!converted) return;
    const update = converted;
    rows = rows.map((row, r) => {
      const next = [...row];
      next[c] = update[r];
      return next;
    });
    report.typesConverted[name] = `${original} → ${target}`;
  });

  return { columns: work.columns, rows };
}

function outlierFlags(values: readonly CellValue[], config: CleaningConfig): boolean[] {
  const numbers = values.filter((v): v is number => typeof v === "number");
  if (numbers.length === 0) return values.map(() => false);

  if (config.outlierMethod === "zscore") {
    const m = mean(numbers);
    const sd = stdDev(numbers);
    return values.map((v) => typeof v === "number" && sd > 0 && Math.abs(v - m) / sd > config.zscoreThreshold);
  }

  const q1 = quantile(numbers, 0.25);
  const q3 = quantile(numbers, 0.75);
  const iqr = q3 - q1;
  const lower = q1 - 1.5 * iqr;
  const upper = q3 + 1.5 * iqr;
  return values.map((v) => typeof v === "number" && (v < lower || v > upper));
}

function detectOutliers(work: Working, config: CleaningConfig, report: ReportDraft): Working {
  const columns = [...work.columns];
  let rows = work.rows;
  let total = 0;

  const numericColumns = work.columns
    .map((name, c) => ({ name, c }))
    .filter(({ c }) => detectColumnType(column(work, c)) === "number");

  for (const { name, c } of numericColumns) {
    const flags = outlierFlags(column(work, c), config);
    const flagged = flags.filter(Boolean).length;
    if (flagged === 0) continue;

    total += flagged;
    const base = `${name}_outlier`;
    let flagName = base;
    for (let n = 2; columns.includes(flagName); n++) flagName = `${base}_${n}`;

    columns.push(flagName);
    rows = rows.map((row, r) => [...row, flags[r]]);
  }

  report.outliersDetected = total;
  return { columns, rows };
}

/**
 * One cleaning pass over one table. Steps run in a fixed order
 * (duplicates, nulls, names, types, outliers), each switchable in the
 * config. The input table is left untouched.
 */
export function cleanTable(table: Table, overrides?: Partial<CleaningConfig>): CleaningResult {
  const config = resolveCleaningConfig(overrides);
  const report = newReportDraft([table.rows.length, table.columns.length]);
  let work: Working = {
    columns: [...table.columns],
    rows: table.rows.map((row) => [...row]),
  };

  if (config.removeDuplicates) work = removeDuplicates(work, config, report);
  if (config.handleNulls) work = handleNulls(work, config, report);
  if (config.normalizeNames) work = normalizeNames(work, report);
  if (config.inferTypes) work = inferTypes(work, config, report);
  if (config.detectOutliers) work = detectOutliers(work, config, report);

  report.finalShape = [work.rows.length, work.columns.length];

  return {
    table: createTable(work.columns, work.rows, table.source),
    report: freezeReport(report),
  };
}
