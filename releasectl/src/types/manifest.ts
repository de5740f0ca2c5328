/** One published artifact: where it was staged and the SHA-256 of its bytes. */
export type ArtifactLink = {
  path: string;
  checksum: string;
};

/** One versioned publication record. `timestamp` is nanoseconds since the Unix epoch. */
export type ReleaseEntry = {
  version: string;
  timestamp: bigint;
  links: ArtifactLink[];
};

export type Manifest = ReleaseEntry[];

/** On-disk shape of a manifest record. */
export type ManifestRecord = {
  version: string;
  "utc-unixnano": bigint;
  links: Array<{ link: string; sha256: string }>;
};
