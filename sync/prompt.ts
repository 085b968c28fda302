import inquirer from "inquirer";
import { MAX_PROMPT_ATTEMPTS } from "./config";

const YES = ["y", "Y", "yes", "Yes"];
const NO = ["n", "N"];

/** true / false for a recognised answer, null otherwise. */
export function parseYesNo(answer: string): boolean | null {
  if (YES.includes(answer)) return true;
  if (NO.includes(answer)) return false;
  return null;
}

/**
 * Asks whether the `.orig` backups should go. Unrecognised answers re-ask,
 * up to `maxAttempts`; after that the backups are kept.
 */
export async function askDeleteOriginals(
  maxAttempts: number = MAX_PROMPT_ATTEMPTS,
): Promise<boolean> {
  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    const { answer } = await inquirer.prompt<{ answer: string }>([
      {
        type: "input",
        name: "answer",
        message: "Would you like to delete original files (Y/N)?",
      },
    ]);
    const decision = parseYesNo(answer.trim());
    if (decision !== null) return decision;
    console.log("No acceptable input given.");
  }
  console.log(`No acceptable input after ${maxAttempts} attempts.`);
  return false;
}
