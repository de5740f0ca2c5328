import path from "node:path";
import { ReleaseError, errorMessage, type ReleaseErrorCode } from "../errors.js";
import { getLogger, type Logger } from "../logging/logger.js";
import { describeCommand, describeExit, succeeded, type RunResult, type Runner } from "../runner/runner.js";
import { mkdirCommand, scpCommand, symlinkCommand, type RemoteCommand, type RemoteTarget } from "./commands.js";

const posix = path.posix;

export type PublishRequest = {
  version: string;
  /** Local directory holding the staged files. */
  localDir: string;
  /** Staged file names, in the order they are transferred. */
  files: readonly string[];
  manifestPath: string;
};

export type AliasUpdate = { alias: string; target: string };

export type PublishReport = {
  remoteVersionDir: string;
  transferred: string[];
  aliases: AliasUpdate[];
};

/**
 * `client-1.2.3.zip` at 1.2.3 → `client-latest.zip`.
 * Names that do not carry the version suffix cannot be aliased.
 */
export function aliasNameFor(file: string, version: string): string {
  const ext = posix.extname(file);
  const stem = file.slice(0, file.length - ext.length);
  const suffix = `-${version}`;
  if (!stem.endsWith(suffix) || stem.length === suffix.length) {
    throw new ReleaseError("AliasUpdateError", `Cannot derive alias for ${file}: expected <name>${suffix}${ext}`, {
      file,
      version,
    });
  }
  return `${stem.slice(0, stem.length - suffix.length)}-latest${ext}`;
}

/**
 * Pushes one staged release to the remote host.
 *
 * Steps run strictly in order and the first failure stops the run:
 * ensure_remote_dir → transfer_artifacts → transfer_manifest → update_aliases.
 * Nothing already done is undone; every step is safe to repeat, so the
 * recovery path is to fix the cause and run again with the same version.
 */
export class RemotePublisher {
  private readonly logger: Logger;

  constructor(
    private readonly target: RemoteTarget,
    private readonly runner: Runner,
    logger?: Logger,
  ) {
    this.logger = logger ?? getLogger("publisher");
  }

  /** `<base>/<downloads>`; a trailing slash on the base is ignored. */
  remoteDownloadsDir(): string {
    const base = this.target.baseDir.replace(/\/+$/, "") || "/";
    return posix.join(base, this.target.downloadsDir);
  }

  remoteVersionDir(version: string): string {
    return posix.join(this.remoteDownloadsDir(), version);
  }

  async publish(req: PublishRequest): Promise<PublishReport> {
    const versionDir = this.remoteVersionDir(req.version);
    const report: PublishReport = { remoteVersionDir: versionDir, transferred: [], aliases: [] };

    this.logger.info(`[ensure_remote_dir] ${versionDir}`);
    await this.exec(mkdirCommand(this.target, versionDir), "RemoteDirError", `Failed to create remote directory ${versionDir}`, {
      path: versionDir,
      version: req.version,
    });

    for (const file of req.files) {
      const local = path.join(req.localDir, file);
      this.logger.info(`[transfer_artifacts] ${file} → ${versionDir}`);
      await this.exec(scpCommand(this.target, local, versionDir), "TransferError", `Failed to transfer ${file}`, {
        path: local,
        file,
        version: req.version,
      });
      report.transferred.push(file);
    }

    const remoteRoot = this.target.baseDir;
    this.logger.info(`[transfer_manifest] ${req.manifestPath} → ${remoteRoot}`);
    await this.exec(scpCommand(this.target, req.manifestPath, remoteRoot), "TransferError", `Failed to transfer manifest ${req.manifestPath}`, {
      path: req.manifestPath,
      version: req.version,
    });

    for (const file of req.files) {
      const update = this.aliasFor(file, req.version);
      this.logger.info(`[update_aliases] ${update.alias} → ${update.target}`);
      await this.exec(symlinkCommand(this.target, update.target, update.alias), "AliasUpdateError", `Failed to update alias for ${file}`, {
        path: update.alias,
        file,
        version: req.version,
      });
      report.aliases.push(update);
    }

    return report;
  }

  private aliasFor(file: string, version: string): AliasUpdate {
    const downloads = this.remoteDownloadsDir();
    return {
      alias: posix.join(downloads, aliasNameFor(file, version)),
      target: posix.join(downloads, version, file),
    };
  }

  private async exec(
    cmd: RemoteCommand,
    code: ReleaseErrorCode,
    message: string,
    details: ReleaseError["details"],
  ): Promise<void> {
    const command = describeCommand(cmd.command, cmd.args);
    let result: RunResult;
    try {
      result = await this.runner.execute(cmd.command, cmd.args);
    } catch (e) {
      throw new ReleaseError(code, `${message}: could not start ${cmd.command}: ${errorMessage(e)}`, { ...details, command });
    }
    if (!succeeded(result)) {
      throw new ReleaseError(code, `${message}: ${cmd.command} ${describeExit(result)}`, {
        ...details,
        command,
        exitCode: result.exitCode,
      });
    }
  }
}
