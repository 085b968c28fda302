import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { promises as fs } from "fs";
import os from "os";
import path from "path";

vi.mock("../config", async (importOriginal) => {
  const actual = await importOriginal<typeof import("../config")>();
  return { ...actual, SOURCE_LANG_FILE: "app_en.ts" };
});

import {
  deleteBackups,
  isRepositoryRoot,
  languageCodeOf,
  listTranslationFiles,
  renameToBackup,
  writeTextAtomic,
} from "../fs-utils";

describe("languageCodeOf", () => {
  it("takes everything after the first underscore", () => {
    expect(languageCodeOf("app_de.ts")).toBe("de");
    expect(languageCodeOf("app_pt_BR.ts")).toBe("pt_BR");
    expect(languageCodeOf("fr.ts")).toBe("fr");
  });
});

describe("locale directory helpers", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "qt-locale-sync-fs-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("lists translation documents without the source language", async () => {
    for (const name of ["app_fr.ts", "app_en.ts", "app_de.ts", "app.qrc", "app_it.ts.orig"]) {
      await fs.writeFile(path.join(dir, name), "");
    }
    expect(await listTranslationFiles(dir)).toEqual(["app_de.ts", "app_fr.ts"]);
  });

  it("writes atomically", async () => {
    const file = path.join(dir, "nested", "app_de.ts");
    await writeTextAtomic(file, "<TS/>\n");
    expect(await fs.readFile(file, "utf-8")).toBe("<TS/>\n");
    expect(await fs.readdir(path.dirname(file))).toEqual(["app_de.ts"]);
  });

  it("moves documents to backups and deletes them", async () => {
    await fs.writeFile(path.join(dir, "app_de.ts"), "de");
    await fs.writeFile(path.join(dir, "app_fr.ts"), "fr");
    await renameToBackup(path.join(dir, "app_de.ts"));
    await renameToBackup(path.join(dir, "app_fr.ts"));
    await fs.writeFile(path.join(dir, "app_de.ts"), "de fixed");

    expect(await deleteBackups(dir)).toBe(2);
    expect(await fs.readdir(dir)).toEqual(["app_de.ts"]);
  });

  it("detects the repository root", async () => {
    expect(await isRepositoryRoot(dir)).toBe(false);
    await fs.mkdir(path.join(dir, ".git"));
    expect(await isRepositoryRoot(dir)).toBe(true);
  });
});
