import { readFileSync, writeFileSync, mkdirSync, existsSync } from "node:fs";
import { join, dirname } from "node:path";
import { FILL_STRATEGIES } from "../cleaners/data-cleaner.js";
import type { CleaningConfig, FillStrategy } from "../cleaners/data-cleaner.js";
import { DocMergeError, errorMessage } from "./errors.js";

const HOME = process.env.HOME ?? process.env.USERPROFILE ?? "~";
const CONFIG_PATH = join(HOME, ".docmerge", "config.json");

export interface DocMergeConfig {
  /** Clean every table before it is written by `merge` */
  autoClean: boolean;
  /** Directory for merge output when no `-o` is given */
  outputDir: string;
  cleaning: Partial<CleaningConfig>;
}

const DEFAULT_CONFIG: DocMergeConfig = {
  autoClean: false,
  outputDir: "output",
  cleaning: {},
};

export const CONFIG_KEYS = [
  "auto-clean",
  "output-dir",
  "fill-strategy",
  "null-threshold",
  "detect-outliers",
] as const;

export type ConfigKey = (typeof CONFIG_KEYS)[number];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isFillStrategy(value: unknown): value is FillStrategy {
  return FILL_STRATEGIES.some((s) => s === value);
}

function isConfigKey(value: string): value is ConfigKey {
  return CONFIG_KEYS.some((k) => k === value);
}

function readCleaning(raw: unknown): Partial<CleaningConfig> {
  if (!isRecord(raw)) return {};
  const cleaning: Partial<CleaningConfig> = {};

  if (typeof raw.nullThreshold === "number") cleaning.nullThreshold = raw.nullThreshold;
  if (isFillStrategy(raw.fillStrategy)) cleaning.fillStrategy = raw.fillStrategy;
  if (typeof raw.detectOutliers === "boolean") cleaning.detectOutliers = raw.detectOutliers;
  if (raw.outlierMethod === "iqr" || raw.outlierMethod === "zscore") cleaning.outlierMethod = raw.outlierMethod;
  if (typeof raw.removeDuplicates === "boolean") cleaning.removeDuplicates = raw.removeDuplicates;
  if (typeof raw.normalizeNames === "boolean") cleaning.normalizeNames = raw.normalizeNames;
  if (typeof raw.inferTypes === "boolean") cleaning.inferTypes = raw.inferTypes;

  return cleaning;
}

/** Read config from disk. Returns defaults if the file is missing or unreadable. */
export function loadConfig(path: string = CONFIG_PATH): DocMergeConfig {
  if (!existsSync(path)) {
    return { ...DEFAULT_CONFIG, cleaning: {} };
  }
  try {
    const parsed: unknown = JSON.parse(readFileSync(path, "utf-8"));
    if (!isRecord(parsed)) return { ...DEFAULT_CONFIG, cleaning: {} };

    return {
      autoClean: typeof parsed.autoClean === "boolean" ? parsed.autoClean : DEFAULT_CONFIG.autoClean,
      outputDir: typeof parsed.outputDir === "string" ? parsed.outputDir : DEFAULT_CONFIG.outputDir,
      cleaning: readCleaning(parsed.cleaning),
    };
  } catch (err) {
    console.warn(`⚠️  Ignoring unreadable config ${path}: ${errorMessage(err)}`);
    return { ...DEFAULT_CONFIG, cleaning: {} };
  }
}

/** Write config to disk. Creates parent dirs if needed. */
export function saveConfig(config: DocMergeConfig, path: string = CONFIG_PATH): void {
  const dir = dirname(path);
  if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
  writeFileSync(path, JSON.stringify(config, null, 2) + "\n", "utf-8");
}

function parseBoolean(key: string, value: string): boolean {
  const v = value.trim().toLowerCase();
  if (["true", "yes", "on", "1"].includes(v)) return true;
  if (["false", "no", "off", "0"].includes(v)) return false;
  throw new DocMergeError(`Invalid value for ${key}: "${value}" (expected true or false)`);
}

/**
 * Apply one `config set` to a config object, returning the updated copy.
 * Unknown keys and invalid values throw.
 */
export function setConfigValue(config: DocMergeConfig, key: string, value: string): DocMergeConfig {
  if (!isConfigKey(key)) {
    throw new DocMergeError(`Unknown config key: "${key}"\nValid keys: ${CONFIG_KEYS.join(", ")}`);
  }

  const next: DocMergeConfig = { ...config, cleaning: { ...config.cleaning } };

  switch (key) {
    case "auto-clean":
      next.autoClean = parseBoolean(key, value);
      break;
    case "output-dir":
      if (value.trim() === "") throw new DocMergeError("output-dir cannot be empty");
      next.outputDir = value;
      break;
    case "fill-strategy":
      if (!isFillStrategy(value)) {
        throw new DocMergeError(
          `Invalid fill strategy: "${value}"\nValid strategies: ${FILL_STRATEGIES.join(", ")}`
        );
      }
      next.cleaning.fillStrategy = value;
      break;
    case "null-threshold": {
      const n = Number(value);
      if (value.trim() === "" || !Number.isFinite(n) || n < 0 || n > 1) {
        throw new DocMergeError(`Invalid null threshold: "${value}" (expected a number from 0 to 1)`);
      }
      next.cleaning.nullThreshold = n;
      break;
    }
    case "detect-outliers":
      next.cleaning.detectOutliers = parseBoolean(key, value);
      break;
  }

  return next;
}

export { CONFIG_PATH };
