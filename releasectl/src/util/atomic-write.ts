import { mkdir, open, rename, rm, type FileHandle } from "node:fs/promises";
import { dirname } from "node:path";
import { errorMessage } from "../errors.js";

/**
 * Write `content` to a sibling temp file, fsync it, then rename over `path`.
 * Readers see either the old file or the complete new one.
 */
export async function atomicWriteFile(path: string, content: string, mode = 0o644): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  const tmp = `${path}.tmp.${process.pid}.${Date.now()}`;

  let fh: FileHandle | null = null;
  try {
    fh = await open(tmp, "w", mode);
    await fh.writeFile(content, "utf8");
    await fh.sync();
    await fh.close();
    fh = null;

    await rename(tmp, path);
  } catch (e) {
    try {
      if (fh) await fh.close();
      await rm(tmp, { force: true });
    } catch (cleanupError) {
      // The write failure stays first; the cleanup failure rides along.
      throw new AggregateError([e, cleanupError], `${errorMessage(e)} (cleanup of ${tmp} also failed)`);
    }
    throw e;
  }
}
