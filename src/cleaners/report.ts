/** What one cleaning pass did to one table. Frozen once the pass completes. */
export interface CleaningReport {
  readonly originalShape: readonly [rows: number, columns: number];
  readonly finalShape: readonly [rows: number, columns: number];
  readonly duplicatesRemoved: number;
  readonly nullsFilled: Readonly<Record<string, number>>;
  readonly columnsDropped: readonly string[];
  readonly typesConverted: Readonly<Record<string, string>>;
  readonly columnsRenamed: Readonly<Record<string, string>>;
  readonly outliersDetected: number;
}

export interface ReportDraft {
  originalShape: [number, number];
  finalShape: [number, number];
  duplicatesRemoved: number;
  nullsFilled: Record<string, number>;
  columnsDropped: string[];
  typesConverted: Record<string, string>;
  columnsRenamed: Record<string, string>;
  outliersDetected: number;
}

export function newReportDraft(shape: [number, number]): ReportDraft {
  return {
    originalShape: shape,
    finalShape: shape,
    duplicatesRemoved: 0,
    nullsFilled: {},
    columnsDropped: [],
    typesConverted: {},
    columnsRenamed: {},
    outliersDetected: 0,
  };
}

export function freezeReport(draft: ReportDraft): CleaningReport {
  return Object.freeze({
    originalShape: [draft.originalShape[0], draft.originalShape[1]] as const,
    finalShape: [draft.finalShape[0], draft.finalShape[1]] as const,
    duplicatesRemoved: draft.duplicatesRemoved,
    nullsFilled: Object.freeze({ ...draft.nullsFilled }),
    columnsDropped: Object.freeze([...draft.columnsDropped]),
    typesConverted: Object.freeze({ ...draft.typesConverted }),
    columnsRenamed: Object.freeze({ ...draft.columnsRenamed }),
    outliersDetected: draft.outliersDetected,
  });
}

const RULE = "=".repeat(60);

function shape([rows, cols]: readonly [number, number]): string {
  return `${rows} rows × ${cols} columns`;
}

/** Fixed-format, human-readable rendering of a report */
export function formatCleaningReport(report: CleaningReport): string {
  const lines = [
    RULE,
    "Data Cleaning Report",
    RULE,
    `Shape: ${shape(report.originalShape)} → ${shape(report.finalShape)}`,
    "",
  ];

  if (report.duplicatesRemoved > 0) {
    lines.push(`✓ Removed ${report.duplicatesRemoved} duplicate rows`);
  }

  const filled = Object.entries(report.nullsFilled);
  if (filled.length > 0) {
    lines.push(`✓ Filled nulls in ${filled.length} columns:`);
    for (const [col, count] of filled) lines.push(`  - ${col}: ${count} values`);
  }

  if (report.columnsDropped.length > 0) {
    lines.push(`✓ Dropped ${report.columnsDropped.length} columns:`);
    for (const col of report.columnsDropped) lines.push(`  - ${col}`);
  }

  const converted = Object.entries(report.typesConverted);
  if (converted.length > 0) {
    lines.push(`✓ Converted data types in ${converted.length} columns:`);
    for (const [col, change] of converted) lines.push(`  - ${col}: ${change}`);
  }

  const renamed = Object.keys(report.columnsRenamed).length;
  if (renamed > 0) {
    lines.push(`✓ Renamed ${renamed} columns`);
  }

  if (report.outliersDetected > 0) {
    lines.push(`✓ Detected ${report.outliersDetected} outliers`);
  }

  lines.push(RULE);
  return lines.join("\n");
}
