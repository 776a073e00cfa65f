export { updateManifest, formatTimestamp, type UpdateOptions, type UpdateResult } from "./manifest/update.js";
export { verifyManifest, type VerifyResult } from "./manifest/verify.js";
export { parseVersion, formatVersion, incrementPatch, resolveNextVersion, type Version } from "./manifest/version.js";
export { readCurrentVersion, loadManifest, validateManifestShape } from "./manifest/validate.js";
export { ManifestFormatError, ManifestMismatchError, TrackedFileError, VersionFormatError } from "./manifest/errors.js";
export * from "./manifest/types.js";
