import { existsSync, statSync } from "node:fs";
import { basename, resolve } from "node:path";
import { FileNotFoundError } from "../core/errors.js";
import type {
  DocumentContent,
  DocumentFormat,
  DocumentMetadata,
  DocumentMetrics,
  ParsedDocument,
} from "./types.js";

/** Resolve a path and fail with FileNotFoundError if nothing is there */
export function requireFile(filePath: string): string {
  const absolute = resolve(filePath);
  if (!existsSync(absolute)) {
    throw new FileNotFoundError(filePath);
  }
  return absolute;
}

/** File-system metadata common to every format. Re-stats on each call. */
export function fileMetadata(filePath: string, format: DocumentFormat): DocumentMetadata {
  const stat = statSync(filePath);

  return {
    fileName: basename(filePath),
    filePath: resolve(filePath),
    format,
    fileSize: stat.size,
    fileSizeMb: Math.round((stat.size / (1024 * 1024)) * 100) / 100,
    modifiedAt: stat.mtime.toISOString(),
    parsedAt: new Date().toISOString(),
  };
}

export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed === "" ? 0 : trimmed.split(/\s+/).length;
}

/** word/character/line counts shared by the prose formats */
export function textMetrics(text: string): Pick<DocumentMetrics, "wordCount" | "characterCount" | "lineCount"> {
  return {
    wordCount: countWords(text),
    characterCount: text.length,
    lineCount: text.split("\n").length,
  };
}

/** Assemble the envelope. The top level and its three sections are frozen. */
export function buildDocument(
  metadata: DocumentMetadata,
  content: DocumentContent,
  metrics: DocumentMetrics
): ParsedDocument {
  return Object.freeze({
    metadata: Object.freeze({ ...metadata }),
    content: Object.freeze({ ...content, tables: [...content.tables] }),
    metrics: Object.freeze({ ...metrics }),
  });
}
