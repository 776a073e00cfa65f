export class VersionFormatError extends Error {
  constructor(public input: string) {
    super(`Invalid version "${input}": expected MAJOR.MINOR.PATCH (e.g. 1.2.3)`);
    this.name = "VersionFormatError";
  }
}

export class ManifestFormatError extends Error {
  constructor(message: string, public manifestPath: string, public cause?: unknown) {
    super(`Invalid manifest ${manifestPath}: ${message}`);
    this.name = "ManifestFormatError";
  }
}

export class TrackedFileError extends Error {
  constructor(message: string, public fileName: string, public cause?: unknown) {
    super(message);
    this.name = "TrackedFileError";
  }
}

export class ManifestMismatchError extends Error {
  constructor(public mismatches: string[]) {
    super(`Manifest does not match tracked files:\n  ${mismatches.join("\n  ")}`);
    this.name = "ManifestMismatchError";
  }
}
