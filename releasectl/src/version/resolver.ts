import semver from "semver";
import type { SemVer } from "semver";
import { ReleaseError } from "../errors.js";
import type { ReleaseEntry } from "../types/manifest.js";

function canonical(v: SemVer): string {
  return v.build.length > 0 ? `${v.version}+${v.build.join(".")}` : v.version;
}

/**
 * Validate an operator-supplied version. Only full major.minor.patch forms
 * are accepted ("1.2" is rejected); the canonical form is returned.
 */
export function parseExplicitVersion(input: string): string {
  const parsed = semver.parse(input.trim());
  if (!parsed) {
    throw new ReleaseError("InvalidVersion", `Invalid version "${input}": expected major.minor.patch`, { version: input });
  }
  return canonical(parsed);
}

/** Highest parsable version in the manifest. Entries that are not semver are skipped. */
export function highestVersion(entries: readonly ReleaseEntry[]): SemVer | null {
  let highest: SemVer | null = null;
  for (const entry of entries) {
    const v = semver.parse(entry.version);
    if (v && (highest === null || semver.gt(v, highest))) highest = v;
  }
  return highest;
}

/** Highest manifest version with patch + 1, pre-release and build dropped. Starts from 0.0.0. */
export function nextVersion(entries: readonly ReleaseEntry[]): string {
  const highest = highestVersion(entries) ?? new semver.SemVer("0.0.0");
  return `${highest.major}.${highest.minor}.${highest.patch + 1}`;
}

export function resolveVersion(entries: readonly ReleaseEntry[], explicit?: string): string {
  if (explicit !== undefined && explicit.trim() !== "") return parseExplicitVersion(explicit);
  return nextVersion(entries);
}
