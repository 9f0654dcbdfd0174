import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { readFileSync } from "node:fs";
import { join } from "node:path";
import { cleanCommand, writeTable } from "../../src/commands/clean.js";
import { formatSummary } from "../../src/commands/parse.js";
import { parseFile } from "../../src/parsers/factory.js";
import { createTable } from "../../src/parsers/table.js";
import { makeTempDir, removeDir, writeText } from "./helpers.js";

describe("CLI commands", () => {
  let dir: string;
  let scores: string;
  let configPath: string;

  beforeAll(() => {
    dir = makeTempDir();
    scores = writeText(dir, "scores.csv", "Name,Score\nA,1\nA,1\nB,\nC,5\n");
    configPath = join(dir, "config", "missing.json");
  });
  afterAll(() => removeDir(dir));

  it("summarizes a parsed document", async () => {
    const doc = await parseFile(scores);
    expect(formatSummary(doc)).toEqual([
      "✅ Parsing complete: scores.csv",
      "   - File format: csv",
      "   - File size: 0 MB",
      "   - rowCount: 4",
      "   - columnCount: 2",
      "   - numericColumns: 1",
      "   - textColumns: 1",
      "   - Table 1: 4 rows × 2 columns",
    ]);
  });

  it("cleans a table and saves it as CSV", async () => {
    const out = join(dir, "out", "scores.clean.csv");
    await cleanCommand(scores, { output: out, configPath });
    expect(readFileSync(out, "utf-8")).toBe("name,score\nA,1\nB,3\nC,5\n");
  });

  it("takes cleaning settings from the given config file", async () => {
    const saved = writeText(dir, "zero-fill.json", JSON.stringify({ cleaning: { fillStrategy: "zero" } }));
    const out = join(dir, "out", "scores.zero.csv");
    await cleanCommand(scores, { output: out, configPath: saved });
    expect(readFileSync(out, "utf-8")).toBe("name,score\nA,1\nB,0\nC,5\n");
  });

  it("rejects a table number that does not exist", async () => {
    await expect(cleanCommand(scores, { table: "3", configPath })).rejects.toThrow("Table 3 out of range (found 1)");
  });

  it("rejects an unknown fill strategy", async () => {
    await expect(cleanCommand(scores, { fill: "avg", configPath })).rejects.toThrow("Invalid fill strategy");
  });

  it("writes dates in ISO form", async () => {
    const out = join(dir, "dates.csv");
    const table = createTable(["when"], [[new Date(Date.UTC(2024, 5, 1))], [null]]);
    await writeTable(table, out);
    expect(readFileSync(out, "utf-8")).toBe("when\n2024-06-01T00:00:00.000Z\n\n");
  });
});
