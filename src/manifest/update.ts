import path from "node:path";
import { assertDirectory, formatJson, writeFileAtomic } from "../utils/fs.js";
import { safeJoin } from "../utils/paths.js";
import { ManifestFormatError } from "./errors.js";
import { describeTrackedFiles } from "./files.js";
import { MANIFEST_FILENAME, MIN_APP_VERSION, TRACKED_FILES, UNKNOWN_VERSION, type ParserManifest } from "./types.js";
import { readCurrentVersion } from "./validate.js";
import { resolveNextVersion } from "./version.js";

export interface UpdateOptions {
  baseDir: string;
  /** Used verbatim as the new version when non-empty. */
  version?: string;
  trackedFiles?: readonly string[];
  manifestFilename?: string;
  now?: () => Date;
  dryRun?: boolean;
}

export interface UpdateResult {
  previousVersion: string;
  version: string;
  manifest: ParserManifest;
  manifestPath: string;
  content: string;
  written: boolean;
}

// Second precision, e.g. 2026-10-19T08:30:00Z
export function formatTimestamp(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, "Z");
}

// An explicit version replaces an unreadable manifest; only an increment needs the old one.
async function readPreviousVersion(manifestPath: string, explicit: string | undefined): Promise<string> {
  try {
    return await readCurrentVersion(manifestPath);
  } catch (err) {
    if (explicit && err instanceof ManifestFormatError) {
      return UNKNOWN_VERSION;
    }
    throw err;
  }
}

export async function updateManifest(options: UpdateOptions): Promise<UpdateResult> {
  const baseDir = path.resolve(options.baseDir);
  await assertDirectory(baseDir, "Base directory");

  const manifestPath = safeJoin(baseDir, options.manifestFilename ?? MANIFEST_FILENAME);
  const now = options.now ?? (() => new Date());

  const previousVersion = await readPreviousVersion(manifestPath, options.version);
  const version = resolveNextVersion(previousVersion, options.version);
  const files = await describeTrackedFiles(baseDir, options.trackedFiles ?? TRACKED_FILES);

  const manifest: ParserManifest = {
    version,
    updated: formatTimestamp(now()),
    files,
    minAppVersion: MIN_APP_VERSION
  };
  const content = formatJson(manifest);

  if (!options.dryRun) {
    await writeFileAtomic(manifestPath, content);
  }

  return { previousVersion, version, manifest, manifestPath, content, written: !options.dryRun };
}
