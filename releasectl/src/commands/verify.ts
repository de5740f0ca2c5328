import { ReleaseError, isNotFound } from "../errors.js";
import { readManifest } from "../manifest/store.js";
import { computeSha256 } from "../stager/checksum.js";
import type { ReleaseEntry } from "../types/manifest.js";
import { highestVersion } from "../version/resolver.js";

export type FileCheck = {
  path: string;
  expected: string;
  /** null when the staged file is gone. */
  actual: string | null;
  ok: boolean;
};

export type VerifyResult =
  | { ok: true; version: string; files: FileCheck[] }
  | { ok: false; version: string; files: FileCheck[]; error: { code: "ChecksumMismatch"; message: string } };

function pickEntry(entries: readonly ReleaseEntry[], version?: string): ReleaseEntry {
  if (version) {
    const found = entries.find((e) => e.version === version);
    if (!found) throw new ReleaseError("InvalidVersion", `No release ${version} in manifest`, { version });
    return found;
  }
  const highest = highestVersion(entries);
  const found = highest ? entries.find((e) => e.version === highest.raw) : undefined;
  if (!found) throw new ReleaseError("InvalidVersion", "Manifest has no releases to verify");
  return found;
}

async function checksumOrNull(filePath: string): Promise<string | null> {
  try {
    return await computeSha256(filePath);
  } catch (e) {
    if (e instanceof ReleaseError && isNotFound(e.cause)) return null;
    throw e;
  }
}

/**
 * Recompute checksums of a release's staged files and compare with the manifest.
 * Defaults to the highest version recorded.
 */
export async function verifyRelease(opts: { manifestPath: string; version?: string }): Promise<VerifyResult> {
  const entries = await readManifest(opts.manifestPath);
  const entry = pickEntry(entries, opts.version);

  const files: FileCheck[] = [];
  for (const link of entry.links) {
    const actual = await checksumOrNull(link.path);
    files.push({ path: link.path, expected: link.checksum, actual, ok: actual === link.checksum });
  }

  const bad = files.filter((f) => !f.ok);
  if (bad.length === 0) return { ok: true, version: entry.version, files };
  return {
    ok: false,
    version: entry.version,
    files,
    error: {
      code: "ChecksumMismatch",
      message: `${bad.length} file(s) of ${entry.version} do not match the manifest: ${bad.map((f) => f.path).join(", ")}`,
    },
  };
}
