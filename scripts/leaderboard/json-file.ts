import fs from "fs-extra";

import { describeError } from "./errors";

/**
 * Reads a JSON document that the collector owns. A missing or unparsable file
 * yields `null` and a warning; the caller starts from an empty document.
 */
export async function readJsonTolerant(filePath: string, label: string): Promise<unknown> {
  if (!(await fs.pathExists(filePath))) {
    console.warn(`⚠️  No ${label} at ${filePath}; starting from an empty ${label}`);
    return null;
  }
  try {
    const raw: unknown = await fs.readJson(filePath);
    return raw;
  } catch (error) {
    console.warn(`⚠️  Broken ${label} at ${filePath} (${describeError(error)}); resetting`);
    return null;
  }
}

/**
 * Writes the whole document beside the target and moves it into place, so an
 * interrupted write never leaves a truncated file behind.
 */
export async function writeJsonAtomic(filePath: string, data: unknown): Promise<void> {
  const tempPath = `${filePath}.tmp`;
  await fs.outputJson(tempPath, data, { spaces: 2 });
  await fs.move(tempPath, filePath, { overwrite: true });
}
