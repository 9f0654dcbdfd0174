import mammoth from "mammoth";
import * as cheerio from "cheerio";
import type { CheerioAPI } from "cheerio";
import { errorMessage } from "../core/errors.js";
import { buildDocument, fileMetadata, requireFile, textMetrics } from "./base.js";
import { createTable, normalizeHeaders } from "./table.js";
import type { Table } from "./table.js";
import type { DocumentExtractor, DocumentMetadata, ParsedDocument } from "./types.js";

export interface Heading {
  level: number;
  text: string;
}

interface RawCell {
  text: string;
  colspan: number;
  rowspan: number;
}

const BLOCKS = "p, h1, h2, h3, h4, h5, h6, ul, ol";

function spanOf(value: string | undefined): number {
  const n = Number(value ?? 1);
  return Number.isInteger(n) && n > 0 ? n : 1;
}

/**
 * Lay merged cells out on a grid: a colspan repeats the text across the
 * columns it covers and a rowspan repeats it down the rows below.
 */
export function expandSpans(rows: readonly (readonly RawCell[])[]): string[][] {
  const carry: { text: string; remaining: number }[] = [];

  return rows.map((cells) => {
    const out: string[] = [];
    let col = 0;

    const flushCarry = () => {
      while (carry[col] && carry[col].remaining > 0) {
        out.push(carry[col].text);
        carry[col].remaining--;
        col++;
      }
    };

    for (const cell of cells) {
      flushCarry();
      for (let span = 0; span < cell.colspan; span++) {
        out.push(cell.text);
        carry[col] = { text: cell.text, remaining: cell.rowspan - 1 };
        col++;
      }
    }

    while (col < carry.length) {
      if (carry[col] && carry[col].remaining > 0) {
        flushCarry();
      } else {
        col++;
      }
    }

    return out;
  });
}

export class WordExtractor implements DocumentExtractor {
  readonly format = "word" as const;

  private constructor(
    readonly filePath: string,
    private readonly $: CheerioAPI
  ) {}

  /** Convert the document once; an unreadable container fails here */
  static async open(filePath: string): Promise<WordExtractor> {
    const absolute = requireFile(filePath);
    const result = await mammoth.convertToHtml({ path: absolute });
    return new WordExtractor(absolute, cheerio.load(result.value, null, false));
  }

  /** Top-level paragraphs and list items; mammoth has already dropped empty paragraphs */
  private paragraphs(): string[] {
    const { $ } = this;
    const texts: string[] = [];

    $.root().children(BLOCKS).each((_, el) => {
      const node = $(el);
      if (node.is("ul, ol")) {
        node.find("li").each((_, li) => {
          texts.push($(li).clone().children("ul, ol").remove().end().text().trim());
        });
      } else {
        texts.push(node.text().trim());
      }
    });

    return texts;
  }

  private rawTables(): string[][][] {
    const { $ } = this;

    return $.root().children("table").toArray().map((table) => {
      const rows = $(table)
        .find("tr")
        .filter((_, tr) => $(tr).closest("table").is(table))
        .toArray()
        .map((tr) =>
          $(tr)
            .children("td, th")
            .toArray()
            .map((cell): RawCell => ({
              text: $(cell).text().trim(),
              colspan: spanOf($(cell).attr("colspan")),
              rowspan: spanOf($(cell).attr("rowspan")),
            }))
        );
      return expandSpans(rows);
    });
  }

  /** Non-empty paragraphs joined by newlines */
  async extractText(): Promise<string> {
    return this.paragraphs().filter((p) => p !== "").join("\n");
  }

  async extractTables(): Promise<Table[]> {
    const tables: Table[] = [];

    this.rawTables().forEach((data, tableIndex) => {
      if (data.length < 2) return;

      try {
        const [header, ...rows] = data;
        tables.push(createTable(normalizeHeaders(header), rows, { kind: "word", tableIndex }));
      } catch (err) {
        console.warn(`  ⚠️  Table ${tableIndex + 1} parsing failed: ${errorMessage(err)}`);
      }
    });

    return tables;
  }

  extractHeadings(): Heading[] {
    const { $ } = this;
    return $.root()
      .children("h1, h2, h3, h4, h5, h6")
      .toArray()
      .map((el) => ({
        level: Number(el.tagName.slice(1)),
        text: $(el).text().trim(),
      }));
  }

  getMetadata(): DocumentMetadata {
    return fileMetadata(this.filePath, this.format);
  }

  async parse(): Promise<ParsedDocument> {
    const text = await this.extractText();
    const tables = await this.extractTables();
    const paragraphCount = this.paragraphs().length;
    const rawTableCount = this.rawTables().length;

    return buildDocument(
      this.getMetadata(),
      {
        text,
        tables,
        structure: {
          paragraphs: paragraphCount,
          tables: rawTableCount,
          headings: this.extractHeadings().length,
        },
      },
      {
        ...textMetrics(text),
        paragraphCount,
        tableCount: rawTableCount,
      }
    );
  }

  async close(): Promise<void> {
    // converted HTML lives in memory; the file is not held open
  }
}
