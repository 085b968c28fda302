import path from "path";
import { config as loadEnv } from "dotenv";

loadEnv({ path: ".env.local" });

// Translation platform client, run once per sync
export const TX_COMMAND = process.env.TX_COMMAND || "tx";

export const LOCALE_DIR = path.join(
  process.cwd(),
  process.env.LOCALE_DIR || "src/locale",
);
export const SOURCE_LANG_FILE = process.env.SOURCE_LANG_FILE || "app_en.ts";
export const BACKUP_SUFFIX = ".orig";

// Documents with fewer surviving messages are not shipped
export const MIN_NUM_MESSAGES = 10;

export const MAX_PROMPT_ATTEMPTS = 5;

export const VERBOSE =
  process.env.VERBOSE === "true" || process.env.VERBOSE === "1";
export const DRY_RUN =
  process.env.DRY_RUN === "true" || process.env.DRY_RUN === "1";

// CI summary
export const IS_GITHUB_ACTIONS = process.env.GITHUB_ACTIONS === "true";
export const REPORT_OUTPUT_FILE = "sync-report.json";
export const REPORT_MAX_CHARACTERS = 3000;
export const REPORT_TRUNCATE_SUFFIX = "... See the job log for full details";

export function vlog(msg: string, data?: unknown) {
  if (!VERBOSE) return;
  console.log(`[VERBOSE] ${msg}`);
  if (typeof data !== "undefined") {
    console.log(
      typeof data === "string" ? data : JSON.stringify(data, null, 2),
    );
  }
}
