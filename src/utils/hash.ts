import { createHash } from "node:crypto";
import { createReadStream } from "node:fs";

export interface FileDigest {
  sha256: string;
  size: number;
}

/** Single streaming pass over the file: SHA-256 hex digest plus byte count. */
export async function describeFile(filePath: string): Promise<FileDigest> {
  return new Promise((resolve, reject) => {
    const hash = createHash("sha256");
    let size = 0;
    const stream = createReadStream(filePath);
    stream.on("data", (chunk) => {
      size += Buffer.byteLength(chunk);
      hash.update(chunk);
    });
    stream.on("error", reject);
    stream.on("end", () => resolve({ sha256: hash.digest("hex"), size }));
  });
}
