import path from "node:path";
import { assertDirectory } from "../utils/fs.js";
import { safeJoin } from "../utils/paths.js";
import { ManifestMismatchError } from "./errors.js";
import { describeTrackedFiles } from "./files.js";
import { MANIFEST_FILENAME } from "./types.js";
import { loadManifest } from "./validate.js";

interface VerifyOptions {
  baseDir: string;
  manifestFilename?: string;
}

export interface VerifyResult {
  version: string;
  files: string[];
}

export async function verifyManifest(options: VerifyOptions): Promise<VerifyResult> {
  const baseDir = path.resolve(options.baseDir);
  await assertDirectory(baseDir, "Base directory");

  const manifest = await loadManifest(safeJoin(baseDir, options.manifestFilename ?? MANIFEST_FILENAME));
  const names = Object.keys(manifest.files);
  const actual = await describeTrackedFiles(baseDir, names);

  const mismatches: string[] = [];
  for (const name of names) {
    const expected = manifest.files[name];
    const found = actual[name];
    if (expected.sha256 !== found.sha256) {
      mismatches.push(`${name}: sha256 expected ${expected.sha256}, got ${found.sha256}`);
    }
    if (expected.size !== found.size) {
      mismatches.push(`${name}: size expected ${expected.size}, got ${found.size}`);
    }
  }
  if (mismatches.length > 0) {
    throw new ManifestMismatchError(mismatches);
  }

  return { version: manifest.version, files: names };
}
