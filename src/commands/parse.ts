import { resolve } from "node:path";
import { parseFile } from "../parsers/factory.js";
import type { ParsedDocument } from "../parsers/types.js";

/** Human-readable summary lines for one envelope */
export function formatSummary(doc: ParsedDocument): string[] {
  const { metadata, metrics, content } = doc;
  const lines = [
    `✅ Parsing complete: ${metadata.fileName}`,
    `   - File format: ${metadata.format}`,
    `   - File size: ${metadata.fileSizeMb} MB`,
  ];

  for (const [key, value] of Object.entries(metrics)) {
    if (typeof value === "number") lines.push(`   - ${key}: ${value}`);
  }

  if (content.tables.length === 0) {
    lines.push("⚠️  No table data detected");
  } else {
    content.tables.forEach((table, i) => {
      lines.push(`   - Table ${i + 1}: ${table.rows.length} rows × ${table.columns.length} columns`);
    });
  }

  return lines;
}

export async function parseCommand(file: string, options: { json?: boolean }): Promise<void> {
  const doc = await parseFile(resolve(file));

  if (options.json) {
    console.log(JSON.stringify(doc, null, 2));
    return;
  }

  console.log(`\n📖 Parsing file: ${file}`);
  for (const line of formatSummary(doc)) console.log(line);
}
