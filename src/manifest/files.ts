import fs from "node:fs/promises";
import { describeFile } from "../utils/hash.js";
import { safeJoin } from "../utils/paths.js";
import { TrackedFileError } from "./errors.js";
import type { FileEntry } from "./types.js";

async function describeTrackedFile(baseDir: string, name: string): Promise<FileEntry> {
  let absPath: string;
  try {
    absPath = safeJoin(baseDir, name);
  } catch (err) {
    throw new TrackedFileError(`Invalid tracked file name: ${name}`, name, err);
  }
  let stat;
  try {
    stat = await fs.stat(absPath);
  } catch (err) {
    throw new TrackedFileError(`Missing tracked file: ${name}`, name, err);
  }
  if (!stat.isFile()) {
    throw new TrackedFileError(`Tracked file is not a regular file: ${name}`, name);
  }
  try {
    return await describeFile(absPath);
  } catch (err) {
    throw new TrackedFileError(`Unable to read tracked file: ${name}`, name, err);
  }
}

/** Files are described in order; the first failure aborts the whole run. */
export async function describeTrackedFiles(baseDir: string, names: readonly string[]): Promise<Record<string, FileEntry>> {
  const files: Record<string, FileEntry> = {};
  for (const name of names) {
    files[name] = await describeTrackedFile(baseDir, name);
  }
  return files;
}
