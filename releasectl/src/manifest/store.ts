import { readFile } from "node:fs/promises";
import { isInteger, parse as parseLossless, stringify as stringifyLossless } from "lossless-json";
import { ReleaseError, asIoError, errorMessage, isNotFound } from "../errors.js";
import { compileSchema } from "../schema/ajv.js";
import { atomicWriteFile } from "../util/atomic-write.js";
import type { Manifest, ManifestRecord, ReleaseEntry } from "../types/manifest.js";
import { MANIFEST_SCHEMA, type PlainManifest } from "./schema.js";

const manifestSchema = compileSchema<PlainManifest>(MANIFEST_SCHEMA);

/**
 * Parse manifest text. Structure is checked against the schema on a plain
 * JSON parse; timestamps are then taken from a lossless parse because
 * nanosecond epochs exceed Number.MAX_SAFE_INTEGER.
 */
export function parseManifest(text: string, source: string): Manifest {
  let plain: unknown;
  let exact: unknown;
  try {
    plain = JSON.parse(text);
    exact = parseLossless(text, null, (value) => (isInteger(value) ? BigInt(value) : Number(value)));
  } catch (e) {
    throw new ReleaseError("ManifestCorrupt", `Manifest ${source} is not valid JSON: ${errorMessage(e)}`, { path: source });
  }

  if (!manifestSchema.check(plain)) {
    throw new ReleaseError("ManifestCorrupt", `Manifest ${source} does not match schema: ${manifestSchema.explain()}`, {
      path: source,
    });
  }

  const timestamps = exactTimestamps(exact, source);
  return plain.map((record, i) => ({
    version: record.version,
    timestamp: timestamps[i],
    links: record.links.map((l) => ({ path: l.link, checksum: l.sha256 })),
  }));
}

const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

/**
 * Timestamps must be written as plain digits: `5.0` or `1.7e18` would not
 * survive a save unchanged, so they are rejected rather than rewritten.
 */
function exactTimestamps(data: unknown, source: string): bigint[] {
  if (!Array.isArray(data)) return [];
  return data.map((record: unknown, i) => {
    const ts = typeof record === "object" && record !== null && "utc-unixnano" in record ? record["utc-unixnano"] : undefined;
    if (typeof ts !== "bigint") {
      throw new ReleaseError("ManifestCorrupt", `Manifest ${source}: utc-unixnano of entry ${i} must be written as an integer`, {
        path: source,
      });
    }
    if (ts < INT64_MIN || ts > INT64_MAX) {
      throw new ReleaseError("ManifestCorrupt", `Manifest ${source}: utc-unixnano of entry ${i} is out of the 64-bit range`, {
        path: source,
      });
    }
    return ts;
  });
}

/** Deterministic text form: fixed field order, two-space indent, trailing newline. */
export function serializeManifest(entries: readonly ReleaseEntry[]): string {
  const records: ManifestRecord[] = entries.map((e) => ({
    version: e.version,
    "utc-unixnano": e.timestamp,
    links: e.links.map((l) => ({ link: l.path, sha256: l.checksum })),
  }));
  const text = stringifyLossless(records, undefined, 2);
  if (text === undefined) {
    throw new ReleaseError("IOError", "Manifest could not be serialized");
  }
  return text + "\n";
}

/** Read a manifest without side effects; a missing file reads as empty. */
export async function readManifest(path: string): Promise<Manifest> {
  let raw: string;
  try {
    raw = await readFile(path, "utf8");
  } catch (e) {
    if (isNotFound(e)) return [];
    throw asIoError(e, `Failed to read manifest ${path}`, { path });
  }
  return parseManifest(raw, path);
}

/**
 * Load the manifest at `path`. A missing file is created as an empty
 * manifest and reads as []. An unparsable file is fatal (ManifestCorrupt).
 */
export async function loadManifest(path: string): Promise<Manifest> {
  let raw: string;
  try {
    raw = await readFile(path, "utf8");
  } catch (e) {
    if (!isNotFound(e)) throw asIoError(e, `Failed to read manifest ${path}`, { path });
    await saveManifest(path, []);
    return [];
  }
  return parseManifest(raw, path);
}

export async function saveManifest(path: string, entries: readonly ReleaseEntry[]): Promise<void> {
  const text = serializeManifest(entries);
  try {
    await atomicWriteFile(path, text);
  } catch (e) {
    throw asIoError(e, `Failed to write manifest ${path}`, { path });
  }
}

/** Replace the entry with the same version in place, or append. Never mutates `entries`. */
export function upsertEntry(entries: readonly ReleaseEntry[], entry: ReleaseEntry): Manifest {
  const idx = entries.findIndex((e) => e.version === entry.version);
  if (idx === -1) return [...entries, entry];
  return entries.map((e, i) => (i === idx ? entry : e));
}
