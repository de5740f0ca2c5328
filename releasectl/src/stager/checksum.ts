import { createHash } from "node:crypto";
import { createReadStream } from "node:fs";
import { asIoError } from "../errors.js";

/** Stream a file through SHA-256; lowercase hex digest. */
export async function computeSha256(filePath: string): Promise<string> {
  const hash = createHash("sha256");
  try {
    for await (const chunk of createReadStream(filePath)) hash.update(chunk);
  } catch (e) {
    throw asIoError(e, `Failed to checksum ${filePath}`, { path: filePath });
  }
  return hash.digest("hex");
}

/** SHA-256 of an in-memory string or buffer. */
export function computeSha256FromContent(content: string | Buffer): string {
  return createHash("sha256").update(content).digest("hex");
}
