/**
 * Orchestrates a translation update:
 * - check we are at the repository root
 * - pull every language with the platform client
 * - check, repair and prune each document (originals kept as .orig)
 * - report totals and offer to delete the backups
 */

import {
  DRY_RUN,
  IS_GITHUB_ACTIONS,
  LOCALE_DIR,
  REPORT_OUTPUT_FILE,
} from "./sync/config";
import { fetchAllTranslations } from "./sync/fetch";
import {
  deleteBackups,
  isRepositoryRoot,
  languageCodeOf,
  listTranslationFiles,
  writeJsonAtomic,
} from "./sync/fs-utils";
import { postprocessTranslations } from "./sync/postprocess";
import { askDeleteOriginals } from "./sync/prompt";
import { RunReport } from "./sync/report";

async function writeReport(report: RunReport) {
  if (!IS_GITHUB_ACTIONS) return;
  await writeJsonAtomic(REPORT_OUTPUT_FILE, report.generatePayload());
  console.log(`📤 Report written to ${REPORT_OUTPUT_FILE}`);
}

async function offerBackupDeletion() {
  if (DRY_RUN) return;
  if (!process.stdin.isTTY) {
    console.log("Non-interactive session, original files kept.");
    return;
  }
  if (await askDeleteOriginals()) {
    const n = await deleteBackups(LOCALE_DIR);
    console.log(`Original files deleted. (${n})`);
  } else {
    console.log("Original files not deleted.");
  }
}

export async function run(languageCode?: string): Promise<RunReport> {
  console.log("Starting translation update...");
  const report = new RunReport();

  try {
    if (!(await isRepositoryRoot(process.cwd()))) {
      throw new Error(
        "No .git directory found. Execute this tool at the root of the repository.",
      );
    }

    if (DRY_RUN) {
      console.log("[DRY_RUN] Skipping fetch, checking local files only.");
    } else {
      console.log("Fetching translations...");
      await fetchAllTranslations(languageCode);
    }

    if (languageCode) {
      const available = (await listTranslationFiles(LOCALE_DIR)).map(
        languageCodeOf,
      );
      if (!available.includes(languageCode)) {
        throw new Error(
          `Language code '${languageCode}' not found. Available languages: ${available.join(", ")}`,
        );
      }
    }

    const hasErrors = await postprocessTranslations(report, languageCode);

    console.log("");
    console.log(`Total translations fixed: ${report.translationsFixed}`);
    console.log(`Total languages removed: ${report.documentsRemoved}`);

    await writeReport(report);
    await offerBackupDeletion();

    if (hasErrors) {
      console.log("\n⚠️  Translation update completed with errors.");
      process.exitCode = 1;
    } else {
      console.log("\n✅ Translation update finished successfully.");
    }
    return report;
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    console.error("\n❌ Aborting, a failure occurred.");
    console.error(err instanceof Error ? err.stack : message);
    report.logError(message);

    try {
      await writeReport(report);
    } catch (payloadError) {
      console.error("Failed to write report:", payloadError);
    }

    process.exitCode = 1;
    throw err; // rethrow so tests can assert failure
  }
}

// Auto-run only when invoked directly (not when imported in tests)
if (import.meta.url === `file://${process.argv[1]}`) {
  const languageCode = process.argv[2];
  run(languageCode).catch(() => {
    process.exitCode = 1;
  });
}

export default run;
