import path from "node:path";
import { runBuild } from "../build/invoker.js";
import { isReleaseError, type ReleaseErrorCode } from "../errors.js";
import { getLogger, type Logger } from "../logging/logger.js";
import { loadManifest, saveManifest, upsertEntry } from "../manifest/store.js";
import { parseHostPort, type RemoteTarget } from "../remote/commands.js";
import { RemotePublisher, type PublishReport } from "../remote/publisher.js";
import { ProcessRunner, type Runner } from "../runner/runner.js";
import { computeSha256 } from "../stager/checksum.js";
import { stageArtifacts } from "../stager/stager.js";
import type { PipelineConfig } from "../types/config.js";
import type { ArtifactLink, ReleaseEntry } from "../types/manifest.js";
import { resolveVersion } from "../version/resolver.js";

export type PipelineDeps = {
  runner?: Runner;
  logger?: Logger;
  /** Current time in nanoseconds since the Unix epoch. */
  now?: () => bigint;
};

export type PipelineResult =
  | {
      ok: true;
      version: string;
      versionDir: string;
      entry: ReleaseEntry;
      files: string[];
      /** null in dry mode. */
      published: PublishReport | null;
    }
  | { ok: false; version?: string; error: { code: ReleaseErrorCode; message: string } };

export function nowUnixNano(): bigint {
  return BigInt(Date.now()) * 1_000_000n;
}

export function remoteTargetFor(config: PipelineConfig): RemoteTarget {
  const { host, port } = parseHostPort(config.remote.hostPort);
  return {
    host,
    port,
    user: config.remote.user,
    baseDir: config.remote.baseDir,
    downloadsDir: config.remote.downloadsDir,
  };
}

/**
 * One run publishes one version.
 *
 * resolve version → build → stage → checksum → upsert + save manifest → publish.
 * The first failure ends the run; nothing completed before it is rolled back.
 * Dry mode does everything except publish, including writing the manifest.
 */
export class ReleasePipeline {
  private readonly runner: Runner;
  private readonly logger: Logger;
  private readonly now: () => bigint;

  constructor(
    private readonly config: PipelineConfig,
    deps: PipelineDeps = {},
  ) {
    this.runner = deps.runner ?? new ProcessRunner();
    this.logger = deps.logger ?? getLogger("pipeline");
    this.now = deps.now ?? nowUnixNano;
  }

  async run(): Promise<PipelineResult> {
    let version: string | undefined;
    try {
      const cfg = this.config;
      const entries = await loadManifest(cfg.manifestPath);
      version = resolveVersion(entries, cfg.explicitVersion);
      this.logger.info(`Releasing version ${version}`);

      await runBuild({
        script: cfg.buildScript,
        shell: cfg.buildShell,
        version,
        runner: this.runner,
        logger: this.logger.child({ component: "build" }),
      });

      const versionDir = path.join(cfg.downloadsDir, version);
      const files = await stageArtifacts({
        sourceDir: cfg.sourceDir,
        destDir: versionDir,
        version,
        extension: cfg.artifactExt,
      });
      this.logger.info(`Staged ${files.length} file(s) in ${versionDir}`);

      const links: ArtifactLink[] = [];
      for (const file of files) {
        const filePath = path.join(versionDir, file);
        links.push({ path: filePath, checksum: await computeSha256(filePath) });
      }

      const entry: ReleaseEntry = { version, timestamp: this.now(), links };
      await saveManifest(cfg.manifestPath, upsertEntry(entries, entry));
      this.logger.info(`Recorded ${version} in ${cfg.manifestPath}`);

      let published: PublishReport | null = null;
      if (cfg.dryRun) {
        this.logger.info("Dry run: skipping publish");
      } else {
        const publisher = new RemotePublisher(
          remoteTargetFor(cfg),
          this.runner,
          this.logger.child({ component: "publisher" }),
        );
        published = await publisher.publish({
          version,
          localDir: versionDir,
          files,
          manifestPath: cfg.manifestPath,
        });
      }

      return { ok: true, version, versionDir, entry, files, published };
    } catch (e) {
      if (!isReleaseError(e)) throw e;
      this.logger.error(`${e.code}: ${e.message}`);
      return { ok: false, version, error: { code: e.code, message: e.message } };
    }
  }
}
