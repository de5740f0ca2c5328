import { chmod, copyFile, mkdir, readdir, rename, rm, stat } from "node:fs/promises";
import type { Dirent } from "node:fs";
import path from "node:path";
import { ReleaseError, asIoError } from "../errors.js";

export type StageOptions = {
  sourceDir: string;
  destDir: string;
  version: string;
  /** Archive extension to pick up, with or without the leading dot. Matched case-insensitively. */
  extension: string;
};

function normalizeExtension(ext: string): string {
  const withDot = ext.startsWith(".") ? ext : `.${ext}`;
  return withDot.toLowerCase();
}

/** `client.zip` at version 1.2.3 → `client-1.2.3.zip`. */
export function versionedName(fileName: string, version: string): string {
  const ext = path.extname(fileName);
  const base = fileName.slice(0, fileName.length - ext.length);
  return `${base}-${version}${ext}`;
}

/**
 * Copy via a temp file so a failed copy never leaves a file at `dst`.
 * Permission bits of `src` are carried over.
 */
async function copyPreservingMode(src: string, dst: string): Promise<void> {
  const tmp = `${dst}.tmp.${process.pid}`;
  try {
    const { mode } = await stat(src);
    await copyFile(src, tmp);
    await chmod(tmp, mode & 0o7777);
    await rename(tmp, dst);
  } catch (e) {
    await rm(tmp, { force: true });
    throw asIoError(e, `Failed to stage ${src}`, { path: src, file: path.basename(dst) });
  }
}

/**
 * Copy every top-level archive in `sourceDir` into `destDir`, renamed to
 * carry the version. Returns the new names in directory listing order.
 */
export async function stageArtifacts(opts: StageOptions): Promise<string[]> {
  const ext = normalizeExtension(opts.extension);

  try {
    await mkdir(opts.destDir, { recursive: true });
  } catch (e) {
    throw asIoError(e, `Failed to create ${opts.destDir}`, { path: opts.destDir });
  }

  let entries: Dirent[];
  try {
    entries = await readdir(opts.sourceDir, { withFileTypes: true });
  } catch (e) {
    throw asIoError(e, `Failed to list ${opts.sourceDir}`, { path: opts.sourceDir });
  }

  const staged: string[] = [];
  for (const entry of entries) {
    if (!entry.isFile()) continue;
    if (path.extname(entry.name).toLowerCase() !== ext) continue;

    const newName = versionedName(entry.name, opts.version);
    await copyPreservingMode(path.join(opts.sourceDir, entry.name), path.join(opts.destDir, newName));
    staged.push(newName);
  }

  if (staged.length === 0) {
    throw new ReleaseError("NoArtifactsFound", `No ${ext} files found in ${opts.sourceDir}`, {
      path: opts.sourceDir,
      version: opts.version,
    });
  }
  return staged;
}
