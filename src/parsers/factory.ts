import { existsSync } from "node:fs";
import { extname } from "node:path";
import { FileNotFoundError, UnsupportedFormatError } from "../core/errors.js";
import { CsvExtractor } from "./csv.js";
import { ExcelExtractor } from "./excel.js";
import { PdfExtractor } from "./pdf.js";
import { WordExtractor } from "./word.js";
import type { DocumentExtractor, DocumentFormat, ParsedDocument } from "./types.js";

/** Extension → format. Shared read-only by every pipeline invocation. */
export const FORMATS: Readonly<Record<string, DocumentFormat>> = Object.freeze({
  ".xlsx": "excel",
  ".xls": "excel",
  ".csv": "csv",
  ".docx": "word",
  ".doc": "word",
  ".pdf": "pdf",
});

const OPENERS: Readonly<Record<DocumentFormat, (path: string) => Promise<DocumentExtractor>>> = Object.freeze({
  excel: (path: string) => ExcelExtractor.open(path),
  csv: (path: string) => CsvExtractor.open(path),
  word: (path: string) => WordExtractor.open(path),
  pdf: (path: string) => PdfExtractor.open(path),
});

export function getSupportedFormats(): string[] {
  return Object.keys(FORMATS);
}

export function isSupported(filePath: string): boolean {
  return Object.hasOwn(FORMATS, extname(filePath).toLowerCase());
}

/** Map a path's extension (case-insensitive) to its format */
export function resolveFormat(filePath: string): DocumentFormat {
  const ext = extname(filePath).toLowerCase();
  if (!Object.hasOwn(FORMATS, ext)) {
    throw new UnsupportedFormatError(ext, getSupportedFormats());
  }
  return FORMATS[ext];
}

/**
 * Open the extractor for a file. Existence is checked before the extension,
 * and open failures (corrupt workbook, unreadable PDF) propagate unchanged.
 */
export async function createExtractor(filePath: string): Promise<DocumentExtractor> {
  if (!existsSync(filePath)) {
    throw new FileNotFoundError(filePath);
  }
  const format = resolveFormat(filePath);
  return OPENERS[format](filePath);
}

/** Run `fn` against an open extractor and always close it afterwards */
export async function withExtractor<T>(
  filePath: string,
  fn: (extractor: DocumentExtractor) => Promise<T>
): Promise<T> {
  const extractor = await createExtractor(filePath);
  try {
    return await fn(extractor);
  } finally {
    await extractor.close();
  }
}

export async function parseFile(filePath: string): Promise<ParsedDocument> {
  return withExtractor(filePath, (extractor) => extractor.parse());
}
