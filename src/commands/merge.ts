import { join } from "node:path";
import { loadConfig } from "../core/config.js";
import { MergeFailureError } from "../core/errors.js";
import { ExcelMerger } from "../mergers/excel-merger.js";

const RULE = "=".repeat(60);

export async function mergeCommand(
  files: string[],
  options: { output?: string; clean?: boolean; configPath?: string }
): Promise<void> {
  const config = loadConfig(options.configPath);
  const output = options.output ?? join(config.outputDir, "merged_result.xlsx");

  console.log(RULE);
  console.log("🔀 Multi-File Excel Merger");
  console.log(RULE);
  console.log(`\n📥 Input: ${files.length} file(s)`);

  const merger = new ExcelMerger({
    autoClean: options.clean ?? config.autoClean,
    cleaning: config.cleaning,
  });

  const added = await merger.addFiles(files);
  if (added === 0) {
    throw new MergeFailureError("No files were successfully processed");
  }
  if (added < files.length) {
    console.warn(`\n⚠️  Warning: Only ${added}/${files.length} files processed successfully`);
  }

  const result = await merger.mergeToExcel(output);
  if (!result.ok) {
    throw new MergeFailureError(result.message);
  }
  console.log(`\n${RULE}`);
}
