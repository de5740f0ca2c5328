import { loadConfig, toPipelineConfig } from "../config/loader.js";
import { ReleasePipeline, type PipelineDeps, type PipelineResult } from "../core/pipeline.js";
import { isReleaseError } from "../errors.js";
import type { ReleaseConfig } from "../types/config.js";
import { EXIT, exitCodeFor, type ExitCode } from "./exit-codes.js";

export type PublishOpts = {
  configDir?: string;
  envName?: string;
  version?: string;
  overrides?: Partial<ReleaseConfig>;
  env?: NodeJS.ProcessEnv;
};

export type PublishOutcome = { result: PipelineResult; exitCode: ExitCode };

export async function publish(opts: PublishOpts, deps: PipelineDeps = {}): Promise<PublishOutcome> {
  let config: ReleaseConfig;
  try {
    config = loadConfig({ configDir: opts.configDir, envName: opts.envName, env: opts.env, overrides: opts.overrides });
  } catch (e) {
    if (!isReleaseError(e)) throw e;
    return { result: { ok: false, error: { code: e.code, message: e.message } }, exitCode: exitCodeFor(e.code) };
  }

  const pipeline = new ReleasePipeline(toPipelineConfig(config, opts.version), deps);
  const result = await pipeline.run();
  return { result, exitCode: result.ok ? EXIT.SUCCESS : exitCodeFor(result.error.code) };
}
