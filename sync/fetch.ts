import { spawn } from "child_process";
import { TX_COMMAND, vlog } from "./config";

export function pullArgs(languageCode?: string): string[] {
  return languageCode
    ? ["pull", "-f", "-l", languageCode]
    : ["pull", "-f", "-a"];
}

/**
 * Pulls translations with the platform client. Only its exit status matters;
 * its output goes straight to the terminal.
 */
export async function fetchAllTranslations(languageCode?: string) {
  const args = pullArgs(languageCode);
  vlog(`Running ${TX_COMMAND} ${args.join(" ")}`);

  const code = await new Promise<number | null>((resolve, reject) => {
    const child = spawn(TX_COMMAND, args, { stdio: "inherit" });
    child.on("error", reject);
    child.on("close", resolve);
  }).catch((err: unknown) => {
    throw new Error(
      `Error while fetching translations: ${err instanceof Error ? err.message : String(err)}`,
    );
  });

  if (code !== 0) {
    throw new Error(
      `Error while fetching translations: ${TX_COMMAND} exited with code ${code}`,
    );
  }
}
