import fs from "fs-extra";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";

import type { CommitRecord } from "./types";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const LANGUAGE_TABLE_PATH = path.join(__dirname, "data", "languages.json");

const languageTableSchema = z.object({
  extensions: z.record(z.string(), z.string()),
  filenames: z.record(z.string(), z.string()),
});

type LanguageTable = z.infer<typeof languageTableSchema>;

let cachedTable: LanguageTable | null = null;

function languageTable(): LanguageTable {
  if (!cachedTable) {
    cachedTable = languageTableSchema.parse(fs.readJsonSync(LANGUAGE_TABLE_PATH));
  }
  return cachedTable;
}

export function detectLanguage(fileName: string): string | null {
  const table = languageTable();
  const base = path.posix.basename(fileName);
  const byName = table.filenames[base];
  if (byName) {
    return byName;
  }
  const extension = path.posix.extname(base).slice(1).toLowerCase();
  if (!extension) {
    return null;
  }
  return table.extensions[extension] ?? null;
}

/** Counts touched files per language, most frequent first. */
export function summarizeLanguages(commits: CommitRecord[]): Record<string, number> {
  const counts = new Map<string, number>();
  for (const commit of commits) {
    for (const fileName of commit.fileNames) {
      const language = detectLanguage(fileName);
      if (language) {
        counts.set(language, (counts.get(language) ?? 0) + 1);
      }
    }
  }
  const ordered = [...counts.entries()].sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]));
  return Object.fromEntries(ordered);
}
