import Papa from "papaparse";
import { detect } from "chardet";
import iconv from "iconv-lite";
import { open, readFile } from "node:fs/promises";
import { DecodeFailureError, MalformedTableError } from "../core/errors.js";
import { buildDocument, fileMetadata, requireFile } from "./base.js";
import { columnTypes, createTable, isTextType, normalizeHeaders, tableToText, typeTextColumns } from "./table.js";
import type { Table } from "./table.js";
import type { DocumentExtractor, DocumentMetadata, ParsedDocument } from "./types.js";

const SNIFF_BYTES = 10_000;
const FALLBACK_ENCODING = "utf-8";

/** Sniff the encoding from the first bytes of the file */
export async function detectEncoding(filePath: string): Promise<string> {
  const handle = await open(filePath, "r");
  try {
    const { buffer, bytesRead } = await handle.read(Buffer.alloc(SNIFF_BYTES), 0, SNIFF_BYTES, 0);
    return detect(buffer.subarray(0, bytesRead)) ?? FALLBACK_ENCODING;
  } finally {
    await handle.close();
  }
}

/**
 * Decode with the sniffed encoding. If that decode throws, fall back to
 * UTF-8, where undecodable bytes come out as U+FFFD.
 */
export function decodeBuffer(raw: Buffer, encoding: string): { text: string; encoding: string } {
  try {
    return { text: iconv.decode(raw, encoding), encoding };
  } catch (err) {
    const failure = new DecodeFailureError(encoding, { cause: err });
    console.warn(`  ⚠️  ${failure.message}, falling back to ${FALLBACK_ENCODING}`);
    return { text: iconv.decode(raw, FALLBACK_ENCODING), encoding: FALLBACK_ENCODING };
  }
}

/** Turn parsed records into one table: first record is the header, short rows padded */
export function recordsToTable(records: readonly string[][]): Table {
  if (records.length === 0) return createTable([], [], { kind: "csv" });

  const [header, ...body] = records;
  const columns = normalizeHeaders(header);

  body.forEach((row, i) => {
    if (row.length > columns.length) {
      throw new MalformedTableError(
        `Expected ${columns.length} fields in line ${i + 2}, saw ${row.length}`
      );
    }
  });

  return createTable(columns, typeTextColumns(body, columns.length), { kind: "csv" });
}

export class CsvExtractor implements DocumentExtractor {
  readonly format = "csv" as const;
  private loaded?: { table: Table; encoding: string };

  private constructor(
    readonly filePath: string,
    readonly detectedEncoding: string
  ) {}

  static async open(filePath: string): Promise<CsvExtractor> {
    const absolute = requireFile(filePath);
    const encoding = await detectEncoding(absolute);
    return new CsvExtractor(absolute, encoding);
  }

  /** Decode and parse the file once; later calls reuse the result */
  private async load(): Promise<{ table: Table; encoding: string }> {
    if (this.loaded) return this.loaded;

    const raw = await readFile(this.filePath);
    const { text, encoding } = decodeBuffer(raw, this.detectedEncoding);
    const parsed = Papa.parse<string[]>(text, { skipEmptyLines: true });

    if (parsed.errors.length > 0) {
      const firstErr = parsed.errors[0];
      console.warn(`  ⚠️  CSV parse warning (row ${firstErr.row ?? "?"}): ${firstErr.message}`);
    }

    this.loaded = { table: recordsToTable(parsed.data), encoding };
    return this.loaded;
  }

  async extractText(): Promise<string> {
    const { table } = await this.load();
    return tableToText(table);
  }

  async extractTables(): Promise<Table[]> {
    const { table } = await this.load();
    return [table];
  }

  getMetadata(): DocumentMetadata {
    return fileMetadata(this.filePath, this.format);
  }

  async parse(): Promise<ParsedDocument> {
    const { table, encoding } = await this.load();
    const dataTypes = columnTypes(table);
    const types = Object.values(dataTypes);

    return buildDocument(
      this.getMetadata(),
      {
        text: tableToText(table),
        tables: [table],
        structure: {
          columns: [...table.columns],
          rows: table.rows.length,
          encoding,
        },
      },
      {
        rowCount: table.rows.length,
        columnCount: table.columns.length,
        dataTypes,
        numericColumns: types.filter((t) => t === "number").length,
        textColumns: types.filter(isTextType).length,
      }
    );
  }

  async close(): Promise<void> {
    // nothing held open between calls
  }
}
