import type { FileDigest } from "../utils/hash.js";

export const MANIFEST_FILENAME = "parser_version.json";

export const TRACKED_FILES: readonly string[] = ["parse.py", "custom_parsers.py"];

/** Assumed current version when no manifest has been written yet. */
export const DEFAULT_VERSION = "1.0.0";

export const MIN_APP_VERSION = "1.0.0";

/** Reported as the previous version when an unreadable manifest is replaced. */
export const UNKNOWN_VERSION = "unknown";

export type FileEntry = FileDigest;

export interface ParserManifest {
  version: string;
  updated: string;
  files: Record<string, FileEntry>;
  minAppVersion: string;
}
