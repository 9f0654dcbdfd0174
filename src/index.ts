#!/usr/bin/env node

import { Command } from "commander";
import { parseCommand } from "./commands/parse.js";
import { mergeCommand } from "./commands/merge.js";
import { cleanCommand } from "./commands/clean.js";
import { configShow, configSet } from "./commands/config.js";
import { errorMessage } from "./core/errors.js";
import { getSupportedFormats, FORMATS } from "./parsers/factory.js";

/** Run a command action; any failure prints one message to stderr and exits 1 */
function run<A extends unknown[]>(action: (...args: A) => Promise<void>): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await action(...args);
    } catch (err) {
      console.error(`❌ ${errorMessage(err)}`);
      process.exit(1);
    }
  };
}

const program = new Command();

program
  .name("docmerge")
  .description("Parse Excel, CSV, Word and PDF documents, clean their tables and merge them into one workbook")
  .version("0.1.0");

program
  .command("parse <file>")
  .description("Parse a document and show what was extracted")
  .option("-j, --json", "Output the full parsed document as JSON")
  .action(run(async (file: string, options: { json?: boolean }) => {
    await parseCommand(file, options);
  }));

program
  .command("merge <files...>")
  .description("Merge the tables of several documents into one Excel workbook")
  .option("-o, --output <path>", "Output workbook path")
  .option("-c, --clean", "Clean every table before writing it")
  .option("--config <path>", "Config file to use instead of ~/.docmerge/config.json")
  .action(run(async (files: string[], options: { output?: string; clean?: boolean; config?: string }) => {
    await mergeCommand(files, { output: options.output, clean: options.clean, configPath: options.config });
  }));

program
  .command("clean <file>")
  .description("Clean one table of a document and print the cleaning report")
  .option("-t, --table <n>", "Table number to clean (default: 1)")
  .option("-f, --fill <strategy>", "Null fill strategy (mean, median, mode, ffill, bfill, drop, zero)")
  .option("--outliers", "Flag outliers in numeric columns")
  .option("-o, --output <path>", "Save the cleaned table (.csv or .xlsx)")
  .option("--config <path>", "Config file to use instead of ~/.docmerge/config.json")
  .action(run(async (file: string, options: { table?: string; fill?: string; outliers?: boolean; output?: string; config?: string }) => {
    const { config, ...rest } = options;
    await cleanCommand(file, { ...rest, configPath: config });
  }));

program
  .command("formats")
  .description("List supported file extensions")
  .action(() => {
    console.log("Supported formats:");
    for (const ext of getSupportedFormats()) {
      console.log(`  ${ext.padEnd(6)} ${FORMATS[ext]}`);
    }
  });

const configCmd = program
  .command("config")
  .description("View and modify configuration");

configCmd
  .command("show")
  .description("Show current configuration")
  .action(run(async () => {
    await configShow();
  }));

configCmd
  .command("set <key> <value>")
  .description("Set a config value (auto-clean, output-dir, fill-strategy, null-threshold, detect-outliers)")
  .action(run(async (key: string, value: string) => {
    await configSet(key, value);
  }));

// `docmerge config` with no subcommand → show
configCmd.action(run(async () => {
  await configShow();
}));

await program.parseAsync();
