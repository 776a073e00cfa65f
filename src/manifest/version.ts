import { VersionFormatError } from "./errors.js";

export interface Version {
  major: number;
  minor: number;
  patch: number;
}

const VERSION_RE = /^(\d+)\.(\d+)\.(\d+)$/;

export function parseVersion(text: string): Version {
  const match = VERSION_RE.exec(text);
  if (!match) {
    throw new VersionFormatError(text);
  }
  const [major, minor, patch] = match.slice(1).map(Number);
  if (![major, minor, patch].every((part) => Number.isSafeInteger(part))) {
    throw new VersionFormatError(text);
  }
  return { major, minor, patch };
}

export function formatVersion(version: Version): string {
  return `${version.major}.${version.minor}.${version.patch}`;
}

// Patch grows without bound; minor and major are only changed by an explicit version.
export function incrementPatch(version: Version): Version {
  return { ...version, patch: version.patch + 1 };
}

/**
 * A non-empty explicit version wins and is taken as given. Without one, the current
 * version must be a well-formed triple and its patch is incremented.
 */
export function resolveNextVersion(current: string, explicit?: string): string {
  if (explicit) {
    return explicit;
  }
  return formatVersion(incrementPatch(parseVersion(current)));
}
