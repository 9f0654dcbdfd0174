import { loadConfig, saveConfig, setConfigValue, CONFIG_PATH } from "../core/config.js";

const BOLD = "\x1b[1m";
const DIM = "\x1b[2m";
const RESET = "\x1b[0m";

export async function configShow(): Promise<void> {
  const cfg = loadConfig();

  console.log(`${BOLD}docmerge configuration${RESET}`);
  console.log(`${DIM}${CONFIG_PATH}${RESET}\n`);

  console.log(`  Auto-clean:  ${cfg.autoClean ? "on" : "off"}`);
  console.log(`  Output dir:  ${cfg.outputDir}`);

  const cleaning = Object.entries(cfg.cleaning);
  if (cleaning.length === 0) {
    console.log(`  Cleaning:    (defaults)`);
  } else {
    for (const [key, value] of cleaning) {
      console.log(`  Cleaning:    ${key} = ${String(value)}`);
    }
  }
}

export async function configSet(key: string, value: string): Promise<void> {
  const cfg = setConfigValue(loadConfig(), key, value);
  saveConfig(cfg);
  console.log(`${key} set to: ${value}`);
}
