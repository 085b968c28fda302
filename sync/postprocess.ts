import path from "path";
import { BACKUP_SUFFIX, DRY_RUN, LOCALE_DIR, MIN_NUM_MESSAGES, vlog } from "./config";
import { findAddress } from "./content-policy";
import {
  languageCodeOf,
  listTranslationFiles,
  readText,
  renameToBackup,
  writeTextAtomic,
} from "./fs-utils";
import { type RepairOutcome, repairTranslation } from "./repair";
import type { RunReport } from "./report";
import { checkFormatSpecifiers } from "./specifiers";
import {
  childElements,
  clearTranslation,
  countMessages,
  elementText,
  firstChildElement,
  isUnfinished,
  parseTranslationDocument,
  removeElement,
  removeInvalidCharacters,
  serializeTranslationDocument,
} from "./ts-document";

export type DocumentOutcome =
  | { keep: true; xml: string; messageCount: number }
  | { keep: false; messageCount: number };

type TranslationCheck = {
  valid: boolean;
  repairable: boolean;
  errors: string[];
};

function checkTranslation(
  source: string,
  translation: string,
  numerus: boolean,
): TranslationCheck {
  const specifiers = checkFormatSpecifiers(source, translation, numerus);
  const address = findAddress(translation);
  return {
    valid: specifiers.valid && address === null,
    repairable: address === null,
    errors: address ? [...specifiers.errors, address] : specifiers.errors,
  };
}

/** Validates and repairs every translation of one message, in place. */
function processMessage(message: Element, filename: string, report: RunReport) {
  const translationNode = firstChildElement(message, "translation");
  if (!translationNode) return;

  const numerus = message.getAttribute("numerus") === "yes";
  const source = elementText(firstChildElement(message, "source")) ?? "";
  const variants = numerus
    ? childElements(translationNode, "numerusform")
    : [translationNode];

  for (const variant of variants) {
    const translation = elementText(variant);
    if (translation === null) continue;

    const check = checkTranslation(source, translation, numerus);
    for (const error of check.errors) {
      console.log(`${filename}: ${error}`);
      report.logFinding(filename, error);
    }
    if (check.valid) continue;

    const outcome: RepairOutcome = check.repairable
      ? repairTranslation(source, translation)
      : { fixed: false };

    if (outcome.fixed) {
      variant.textContent = outcome.text;
      const n = report.recordFix(filename);
      console.log(`Translation #${n} fixed: ${outcome.text}`);
      vlog(`Fixed by ${outcome.step}`, { source, before: translation });
      continue;
    }

    console.log("Translation could not be fixed");
    report.recordIrreparable(filename);
    clearTranslation(translationNode);
    // the remaining plural forms went with it
    break;
  }
}

/**
 * Checks, repairs and prunes one translation document. Returns the XML to
 * write, or `keep: false` when too few messages survive to ship it.
 */
export function postprocessDocument(
  data: string,
  filename: string,
  report: RunReport,
  minMessages: number = MIN_NUM_MESSAGES,
): DocumentOutcome {
  const doc = parseTranslationDocument(removeInvalidCharacters(data), filename);
  const root = doc.documentElement;

  let cleared = 0;
  for (const context of childElements(root, "context")) {
    for (const message of childElements(context, "message")) {
      processMessage(message, filename, report);

      if (isUnfinished(firstChildElement(message, "translation"))) {
        removeElement(message);
        cleared++;
        continue;
      }

      // locations only add diff noise
      for (const location of childElements(message, "location")) {
        removeElement(location);
      }
    }
  }

  const messageCount = countMessages(root);
  report.logDocument(filename, { messagesKept: messageCount });
  vlog(`${filename}: ${messageCount} messages kept, ${cleared} unfinished dropped`);
  if (messageCount < minMessages) return { keep: false, messageCount };

  return {
    keep: true,
    xml: serializeTranslationDocument(doc),
    messageCount,
  };
}

/**
 * Post-processes every translation document in `localeDir`. Unless dry-running,
 * each document is moved to its backup first and rewritten from it.
 */
export async function postprocessTranslations(
  report: RunReport,
  languageCode?: string,
  localeDir: string = LOCALE_DIR,
): Promise<boolean> {
  console.log("Checking and postprocessing...");

  const files = (await listTranslationFiles(localeDir)).filter(
    (f) => !languageCode || languageCodeOf(f) === languageCode,
  );

  if (!DRY_RUN) {
    for (const filename of files) {
      await renameToBackup(path.join(localeDir, filename));
    }
  }

  for (const filename of files) {
    const filePath = path.join(localeDir, filename);
    const data = await readText(DRY_RUN ? filePath : filePath + BACKUP_SUFFIX);
    report.logDocument(filename, { langCode: languageCodeOf(filename) });

    const outcome = postprocessDocument(data, filename, report);

    if (!outcome.keep) {
      const n = report.recordRemoved(filename, outcome.messageCount);
      console.log(
        `# ${n} : Removing ${filePath}, as it contains only ${outcome.messageCount} messages`,
      );
      continue;
    }

    if (DRY_RUN) {
      console.log(`[DRY_RUN] ${filename} checked, not written`);
    } else {
      await writeTextAtomic(filePath, outcome.xml);
      vlog(`Wrote ${filename}`);
    }
  }

  return report.hasErrors;
}
