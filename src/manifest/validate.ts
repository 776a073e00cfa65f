import { pathExists, readJsonFile } from "../utils/fs.js";
import { ensureSafeRelPath } from "../utils/paths.js";
import { ManifestFormatError } from "./errors.js";
import { DEFAULT_VERSION, type ParserManifest } from "./types.js";

const SHA256_RE = /^[0-9a-f]{64}$/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function assertString(value: unknown, label: string, manifestPath: string): asserts value is string {
  if (typeof value !== "string") {
    throw new ManifestFormatError(`${label} must be a string`, manifestPath);
  }
}

async function readManifestJson(manifestPath: string): Promise<unknown> {
  try {
    return await readJsonFile(manifestPath);
  } catch (err) {
    const reason = err instanceof SyntaxError ? "not valid JSON" : "unreadable";
    throw new ManifestFormatError(reason, manifestPath, err);
  }
}

export function validateManifestShape(value: unknown, manifestPath: string): asserts value is ParserManifest {
  if (!isRecord(value)) {
    throw new ManifestFormatError("expected an object", manifestPath);
  }
  assertString(value.version, "version", manifestPath);
  assertString(value.updated, "updated", manifestPath);
  assertString(value.minAppVersion, "minAppVersion", manifestPath);
  if (!isRecord(value.files)) {
    throw new ManifestFormatError("files must be an object", manifestPath);
  }
  for (const [name, entry] of Object.entries(value.files)) {
    try {
      ensureSafeRelPath(name);
    } catch (err) {
      throw new ManifestFormatError(`files key ${JSON.stringify(name)} is not a safe relative path`, manifestPath, err);
    }
    if (!isRecord(entry)) {
      throw new ManifestFormatError(`files.${name} must be an object`, manifestPath);
    }
    if (typeof entry.sha256 !== "string" || !SHA256_RE.test(entry.sha256)) {
      throw new ManifestFormatError(`files.${name}.sha256 must be a 64-character hex digest`, manifestPath);
    }
    if (typeof entry.size !== "number" || !Number.isSafeInteger(entry.size) || entry.size < 0) {
      throw new ManifestFormatError(`files.${name}.size must be a non-negative integer`, manifestPath);
    }
  }
}

/**
 * Version recorded in the manifest, or the default when none exists yet.
 * The value is returned as written; it is checked only when it has to be incremented.
 */
export async function readCurrentVersion(manifestPath: string): Promise<string> {
  if (!(await pathExists(manifestPath))) {
    return DEFAULT_VERSION;
  }
  const manifest = await readManifestJson(manifestPath);
  if (!isRecord(manifest)) {
    throw new ManifestFormatError("expected an object", manifestPath);
  }
  if (!("version" in manifest)) {
    throw new ManifestFormatError("version is missing", manifestPath);
  }
  assertString(manifest.version, "version", manifestPath);
  return manifest.version;
}

export async function loadManifest(manifestPath: string): Promise<ParserManifest> {
  if (!(await pathExists(manifestPath))) {
    throw new ManifestFormatError("file not found", manifestPath);
  }
  const manifest = await readManifestJson(manifestPath);
  validateManifestShape(manifest, manifestPath);
  return manifest;
}
