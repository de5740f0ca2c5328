import { readManifest } from "../manifest/store.js";

export type ReleaseSummary = {
  version: string;
  publishedAt: string;
  files: number;
};

/** Nanosecond epoch → ISO-8601 (millisecond precision). */
export function formatUnixNano(ns: bigint): string {
  return new Date(Number(ns / 1_000_000n)).toISOString();
}

/**
 * Summaries of every release in manifest order.
 */
export async function listReleases(manifestPath: string): Promise<ReleaseSummary[]> {
  const entries = await readManifest(manifestPath);
  return entries.map((e) => ({
    version: e.version,
    publishedAt: formatUnixNano(e.timestamp),
    files: e.links.length,
  }));
}
