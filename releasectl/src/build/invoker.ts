import { stat } from "node:fs/promises";
import { ReleaseError, asIoError, errorMessage, isNotFound } from "../errors.js";
import { getLogger, type Logger } from "../logging/logger.js";
import { describeCommand, describeExit, succeeded, type RunResult, type Runner } from "../runner/runner.js";

export type BuildOptions = {
  script: string;
  shell: string;
  version: string;
  runner: Runner;
  logger?: Logger;
};

async function ensureScript(script: string): Promise<void> {
  try {
    const st = await stat(script);
    if (st.isFile()) return;
  } catch (e) {
    if (!isNotFound(e)) throw asIoError(e, `Cannot inspect build script ${script}`, { path: script });
  }
  throw new ReleaseError("BuildScriptMissing", `Build script not found: ${script}`, { path: script });
}

/**
 * Run `<shell> <script> <version>` with output streamed to the operator.
 * Any non-zero exit is fatal; cleanup of partial output is the script's job.
 */
export async function runBuild(opts: BuildOptions): Promise<void> {
  const logger = opts.logger ?? getLogger("build");
  await ensureScript(opts.script);

  const args = [opts.script, opts.version];
  const command = describeCommand(opts.shell, args);
  logger.info(`Building ${opts.version}: ${command}`);

  let result: RunResult;
  try {
    result = await opts.runner.execute(opts.shell, args);
  } catch (e) {
    throw new ReleaseError("BuildFailed", `Could not start build (${command}): ${errorMessage(e)}`, {
      path: opts.script,
      version: opts.version,
      command,
    });
  }

  if (!succeeded(result)) {
    throw new ReleaseError("BuildFailed", `Build ${describeExit(result)} (${command})`, {
      path: opts.script,
      version: opts.version,
      command,
      exitCode: result.exitCode,
    });
  }
}
