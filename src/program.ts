import { Command } from "commander";
import { TRACKED_FILES, MANIFEST_FILENAME } from "./manifest/types.js";
import { updateManifest, type UpdateResult } from "./manifest/update.js";
import { verifyManifest } from "./manifest/verify.js";

export function nextSteps(version: string): string[] {
  return [
    "Next steps:",
    "1. Commit the updated parser files:",
    `   git add ${[...TRACKED_FILES, MANIFEST_FILENAME].join(" ")}`,
    `   git commit -m "Update parsers to version ${version}"`,
    "",
    "2. Push to the main branch:",
    "   git push origin main",
    "",
    "3. The app will pick up the new parsers on next launch."
  ];
}

function printUpdate(result: UpdateResult): void {
  console.log(`Updating parser version from ${result.previousVersion} to ${result.version}`);
  console.log(result.written ? "Version file updated:" : "Dry run, version file not written:");
  console.log(result.content.trimEnd());
  console.log("");
  for (const line of nextSteps(result.version)) {
    console.log(line);
  }
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name("parser-manifest")
    .description("Bump the parser version and record checksums of the tracked parser files.")
    .version("0.1.0");

  program
    .command("bump", { isDefault: true })
    .description("Write a new parser_version.json with a bumped version and fresh checksums.")
    .argument("[version]", "New version, used as given (default: current version with patch + 1)")
    .option("-d, --dir <dir>", "Directory holding the manifest and tracked files (default: the current working directory)")
    .option("--dry-run", "Print the new manifest without writing it")
    .action(async (version: string | undefined, opts: { dir?: string; dryRun?: boolean }) => {
      try {
        const result = await updateManifest({ baseDir: opts.dir ?? process.cwd(), version, dryRun: opts.dryRun });
        printUpdate(result);
      } catch (err) {
        console.error(err instanceof Error ? err.message : err);
        process.exitCode = 1;
      }
    });

  program
    .command("verify")
    .description("Check that the tracked files still match parser_version.json.")
    .option("-d, --dir <dir>", "Directory holding the manifest and tracked files (default: the current working directory)")
    .action(async (opts: { dir?: string }) => {
      try {
        const result = await verifyManifest({ baseDir: opts.dir ?? process.cwd() });
        console.log(`Verified ${result.files.length} files against version ${result.version}.`);
      } catch (err) {
        console.error(err instanceof Error ? err.message : err);
        process.exitCode = 1;
      }
    });

  return program;
}
