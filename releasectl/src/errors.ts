export type ReleaseErrorCode =
  | "ManifestCorrupt"
  | "IOError"
  | "InvalidVersion"
  | "BuildScriptMissing"
  | "BuildFailed"
  | "NoArtifactsFound"
  | "RemoteDirError"
  | "TransferError"
  | "AliasUpdateError"
  | "ConfigInvalid"
  | "ChecksumMismatch";

/** Context attached to an error so the operator can find what to fix and re-run. */
export type ReleaseErrorDetails = {
  path?: string;
  version?: string;
  file?: string;
  command?: string;
  exitCode?: number | null;
};

/**
 * Every failure in the release pipeline surfaces as a ReleaseError.
 * None of them are retried; the run stops at the first one.
 */
export class ReleaseError extends Error {
  readonly code: ReleaseErrorCode;
  readonly details: ReleaseErrorDetails;

  constructor(code: ReleaseErrorCode, message: string, details: ReleaseErrorDetails = {}, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ReleaseError";
    this.code = code;
    this.details = details;
  }
}

export function isReleaseError(e: unknown): e is ReleaseError {
  return e instanceof ReleaseError;
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/** Wrap a filesystem failure as IOError unless it is already a ReleaseError. */
export function asIoError(e: unknown, message: string, details: ReleaseErrorDetails): ReleaseError {
  if (isReleaseError(e)) return e;
  return new ReleaseError("IOError", `${message}: ${errorMessage(e)}`, details, { cause: e });
}

export function isNotFound(e: unknown): boolean {
  return e instanceof Error && "code" in e && e.code === "ENOENT";
}
