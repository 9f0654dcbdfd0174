import type { ColumnType, Table } from "./table.js";

export type DocumentFormat = "excel" | "csv" | "word" | "pdf";

export interface DocumentMetadata {
  fileName: string;     // e.g. "q3_sales.xlsx"
  filePath: string;     // absolute path
  format: DocumentFormat;
  fileSize: number;     // bytes
  fileSizeMb: number;   // rounded to 2 decimals
  modifiedAt: string;   // ISO timestamp
  parsedAt: string;     // ISO timestamp
  pageCount?: number;   // PDF
  pdfInfo?: Record<string, string | number | boolean>; // PDF document info dictionary
}

export interface DocumentStructure {
  columns?: string[];     // CSV
  rows?: number;          // CSV
  encoding?: string;      // CSV
  sheetNames?: string[];  // Excel
  sheetCount?: number;    // Excel
  paragraphs?: number;    // Word
  tables?: number;        // Word
  headings?: number;      // Word
  pages?: number;         // PDF
}

export interface DocumentContent {
  text: string;
  tables: Table[];
  structure: DocumentStructure;
}

export interface DocumentMetrics {
  rowCount?: number;
  columnCount?: number;
  sheetCount?: number;
  totalCells?: number;
  dataTypes?: Record<string, ColumnType>;
  numericColumns?: number;
  textColumns?: number;
  pageCount?: number;
  paragraphCount?: number;
  tableCount?: number;
  wordCount?: number;
  characterCount?: number;
  lineCount?: number;
}

/** The normalized envelope every extractor produces */
export interface ParsedDocument {
  readonly metadata: Readonly<DocumentMetadata>;
  readonly content: Readonly<DocumentContent>;
  readonly metrics: Readonly<DocumentMetrics>;
}

/**
 * Capability set shared by all format extractors. Instances are created with
 * the extractor's static `open()` and must be closed by whoever opened them.
 */
export interface DocumentExtractor {
  readonly filePath: string;
  readonly format: DocumentFormat;
  extractText(): Promise<string>;
  extractTables(): Promise<Table[]>;
  parse(): Promise<ParsedDocument>;
  getMetadata(): DocumentMetadata;
  close(): Promise<void>;
}
