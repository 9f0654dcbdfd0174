import { getDocument } from "pdfjs-dist/legacy/build/pdf.mjs";
import { readFile } from "node:fs/promises";
import { DocMergeError, errorMessage } from "../core/errors.js";
import { buildDocument, fileMetadata, requireFile, textMetrics } from "./base.js";
import { cleanRawTable, findTableRegions, groupLines, pageText } from "./pdf-layout.js";
import type { PositionedText, TextLine } from "./pdf-layout.js";
import { createTable, normalizeHeaders } from "./table.js";
import type { Table } from "./table.js";
import type { DocumentExtractor, DocumentMetadata, ParsedDocument } from "./types.js";

type PdfDocument = Awaited<ReturnType<typeof getDocument>["promise"]>;
type PdfInfo = Record<string, string | number | boolean>;

function toInfoRecord(info: object): PdfInfo {
  const out: PdfInfo = {};
  for (const [key, value] of Object.entries(info)) {
    if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
      out[key] = value;
    }
  }
  return out;
}

async function readInfo(doc: PdfDocument): Promise<PdfInfo> {
  try {
    const { info } = await doc.getMetadata();
    return toInfoRecord(info);
  } catch (err) {
    console.warn(`  ⚠️  PDF metadata unavailable: ${errorMessage(err)}`);
    return {};
  }
}

/**
 * PDF extractor. Holds the pdf.js document open until `close()`; callers
 * that open one directly must close it (see `withExtractor`).
 */
export class PdfExtractor implements DocumentExtractor {
  readonly format = "pdf" as const;
  private pages?: TextLine[][];
  private closed = false;

  private constructor(
    readonly filePath: string,
    private readonly doc: PdfDocument,
    private readonly info: PdfInfo
  ) {}

  static async open(filePath: string): Promise<PdfExtractor> {
    const absolute = requireFile(filePath);
    const data = new Uint8Array(await readFile(absolute));
    const loadingTask = getDocument({
      data,
      verbosity: 0,
      isEvalSupported: false,
      disableFontFace: true,
      useSystemFonts: false,
    });

    let doc: PdfDocument;
    try {
      doc = await loadingTask.promise;
    } catch (err) {
      await loadingTask.destroy();
      throw err;
    }

    const info = await readInfo(doc);
    return new PdfExtractor(absolute, doc, info);
  }

  get pageCount(): number {
    return this.doc.numPages;
  }

  /** Layout lines for every page, read once */
  private async loadPages(): Promise<TextLine[][]> {
    if (this.pages) return this.pages;
    if (this.closed) throw new DocMergeError(`PDF already closed: ${this.filePath}`);

    const pages: TextLine[][] = [];
    for (let pageNum = 1; pageNum <= this.doc.numPages; pageNum++) {
      const page = await this.doc.getPage(pageNum);
      const content = await page.getTextContent();
      const items: PositionedText[] = [];

      for (const item of content.items) {
        if (!("str" in item)) continue;
        const [, , c, d, x, y] = item.transform.map(Number);
        items.push({
          text: item.str,
          x,
          y,
          width: item.width,
          fontSize: Math.hypot(c, d) || item.height,
        });
      }

      pages.push(groupLines(items));
      page.cleanup();
    }

    this.pages = pages;
    return pages;
  }

  /** Text of one page (1-based); empty for pages out of range */
  async extractPageText(pageNum: number): Promise<string> {
    const pages = await this.loadPages();
    if (pageNum < 1 || pageNum > pages.length) return "";
    return pageText(pages[pageNum - 1]);
  }

  async extractText(): Promise<string> {
    const pages = await this.loadPages();
    const parts: string[] = [];

    pages.forEach((lines, i) => {
      const text = pageText(lines);
      if (text) parts.push(`=== Page ${i + 1} ===\n${text}`);
    });

    return parts.join("\n\n");
  }

  async extractTables(): Promise<Table[]> {
    const pages = await this.loadPages();
    const tables: Table[] = [];

    pages.forEach((lines, i) => {
      const pageNumber = i + 1;
      try {
        findTableRegions(lines).forEach((region, tableIndex) => {
          try {
            const cleaned = cleanRawTable(region);
            if (!cleaned) return;
            const [header, ...rows] = cleaned;
            tables.push(createTable(normalizeHeaders(header), rows, { kind: "pdf", pageNumber, tableIndex }));
          } catch (err) {
            console.warn(`  ⚠️  Page ${pageNumber} table ${tableIndex + 1} parsing failed: ${errorMessage(err)}`);
          }
        });
      } catch (err) {
        console.warn(`  ⚠️  Page ${pageNumber} table scan failed: ${errorMessage(err)}`);
      }
    });

    return tables;
  }

  getMetadata(): DocumentMetadata {
    return {
      ...fileMetadata(this.filePath, this.format),
      pageCount: this.doc.numPages,
      pdfInfo: { ...this.info },
    };
  }

  async parse(): Promise<ParsedDocument> {
    const text = await this.extractText();
    const tables = await this.extractTables();

    return buildDocument(
      this.getMetadata(),
      {
        text,
        tables,
        structure: { pages: this.doc.numPages },
      },
      {
        pageCount: this.doc.numPages,
        ...textMetrics(text),
        tableCount: tables.length,
      }
    );
  }

  /** Release the pdf.js document. Safe to call more than once. */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.doc.destroy();
  }
}
