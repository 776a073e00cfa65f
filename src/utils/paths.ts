import path from "node:path";

export function toPosixPath(inputPath: string): string {
  return inputPath.replace(/\\/g, "/");
}

/** Tracked names are plain relative paths: no absolute, drive, empty or `..` segments. */
export function ensureSafeRelPath(relPath: string): void {
  const posixPath = toPosixPath(relPath);
  if (!posixPath || posixPath === "." || posixPath.includes("\0")) {
    throw new Error(`Invalid relative path: ${JSON.stringify(relPath)}`);
  }
  if (posixPath.startsWith("/") || /^[a-zA-Z]:/.test(posixPath)) {
    throw new Error(`Absolute paths are not allowed: ${relPath}`);
  }
  const segments = posixPath.split("/");
  if (segments.some((segment) => segment === "" || segment === "..")) {
    throw new Error(`Path escapes base directory: ${relPath}`);
  }
}

export function safeJoin(baseDir: string, relPath: string): string {
  ensureSafeRelPath(relPath);
  const base = path.resolve(baseDir);
  const target = path.resolve(base, ...toPosixPath(relPath).split("/"));
  const relative = path.relative(base, target);
  if (relative.startsWith("..") || path.isAbsolute(relative)) {
    throw new Error(`Path escapes base directory: ${relPath}`);
  }
  return target;
}
