import { promises as fs } from "fs";
import path from "path";
import { BACKUP_SUFFIX, SOURCE_LANG_FILE } from "./config";

const TS_EXT = ".ts";

/** Translation documents in `dir`, source language excluded, sorted. */
export async function listTranslationFiles(dir: string): Promise<string[]> {
  const entries = await fs.readdir(dir);
  return entries
    .filter((name) => name.endsWith(TS_EXT) && name !== SOURCE_LANG_FILE)
    .sort();
}

/** `app_pt_BR.ts` -> `pt_BR` */
export function languageCodeOf(filename: string): string {
  const base = filename.endsWith(TS_EXT)
    ? filename.slice(0, -TS_EXT.length)
    : filename;
  const sep = base.indexOf("_");
  return sep < 0 ? base : base.slice(sep + 1);
}

export async function readText(filePath: string): Promise<string> {
  return fs.readFile(filePath, "utf-8");
}

export async function writeTextAtomic(filePath: string, text: string) {
  const tmp = `${filePath}.tmp`;
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(tmp, text, "utf-8");
  await fs.rename(tmp, filePath);
}

export async function writeJsonAtomic(filePath: string, obj: object) {
  await writeTextAtomic(filePath, JSON.stringify(obj, null, 2));
}

export async function renameToBackup(filePath: string) {
  await fs.rename(filePath, filePath + BACKUP_SUFFIX);
}

/** Removes every backup in `dir`; returns how many were deleted. */
export async function deleteBackups(dir: string): Promise<number> {
  const backups = (await fs.readdir(dir)).filter((name) =>
    name.endsWith(BACKUP_SUFFIX),
  );
  for (const name of backups) {
    await fs.unlink(path.join(dir, name));
  }
  return backups.length;
}

export async function isRepositoryRoot(dir: string): Promise<boolean> {
  try {
    await fs.access(path.join(dir, ".git"));
    return true;
  } catch (err: unknown) {
    if (isNodeError(err) && err.code === "ENOENT") return false;
    throw err;
  }
}

function isNodeError(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}
