import type { ReleaseErrorCode } from "../errors.js";

/**
 * CLI exit codes.
 */
export const EXIT = {
  SUCCESS: 0,
  RELEASE_FAILED: 1,
  INVALID_INPUT: 2,
  BUILD_FAILED: 3,
  PUBLISH_FAILED: 4,
  VERIFY_FAILED: 5,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];

export function exitCodeFor(code: ReleaseErrorCode): ExitCode {
  switch (code) {
    case "InvalidVersion":
    case "ConfigInvalid":
    case "ManifestCorrupt":
      return EXIT.INVALID_INPUT;
    case "BuildScriptMissing":
    case "BuildFailed":
      return EXIT.BUILD_FAILED;
    case "RemoteDirError":
    case "TransferError":
    case "AliasUpdateError":
      return EXIT.PUBLISH_FAILED;
    case "ChecksumMismatch":
      return EXIT.VERIFY_FAILED;
    case "IOError":
    case "NoArtifactsFound":
      return EXIT.RELEASE_FAILED;
  }
}
