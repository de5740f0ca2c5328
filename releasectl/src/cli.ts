#!/usr/bin/env node

import { Command, Option } from "commander";
import { listReleases } from "./commands/list.js";
import { publish } from "./commands/publish.js";
import { verifyRelease } from "./commands/verify.js";
import { EXIT, exitCodeFor } from "./commands/exit-codes.js";
import { failureOutput } from "./commands/output.js";
import { loadConfig } from "./config/loader.js";
import { isReleaseError } from "./errors.js";
import { initLogging, type LogFormat } from "./logging/logger.js";

type Format = { format: LogFormat };

const formatOption = () =>
  new Option("--format <format>", "Output format: human|jsonl").choices(["human", "jsonl"]).default("human");

function fail(format: LogFormat, code: string, message: string, exitCode: number): never {
  const out = failureOutput(format, code, message);
  process.stderr.write(out.stderr);
  if (out.stdout !== null) process.stdout.write(out.stdout);
  process.exit(exitCode);
}

/** Resolve the manifest path the same way `publish` would. */
function manifestPathFrom(opts: { config: string; env?: string; manifest?: string }): string {
  return loadConfig({ configDir: opts.config, envName: opts.env, overrides: { manifest: opts.manifest } }).manifest;
}

const program = new Command();

program
  .name("releasectl")
  .description("Build, stage, record and publish versioned artifacts")
  .version("0.1.0")
  .enablePositionalOptions();

program
  .command("publish")
  .description("Build, stage and publish a new release")
  .option("--config <path>", "Path to config directory", "config")
  .option("--env <name>", "Config overlay to load (config/<name>.yaml)")
  .option("--dry-run", "Do everything except contacting the remote host")
  .option("--src-dir <dir>", "Directory to scan for build outputs")
  .option("--version <semver>", "Release this exact version (major.minor.patch)")
  .option("--host <host[:port]>", "Remote SSH host")
  .option("--user <name>", "Remote SSH user")
  .option("--remote-dir <dir>", "Remote base directory")
  .option("--manifest <file>", "Manifest file name")
  .addOption(formatOption())
  .action(
    async (
      opts: Format & {
        config: string;
        env?: string;
        dryRun?: boolean;
        srcDir?: string;
        version?: string;
        host?: string;
        user?: string;
        remoteDir?: string;
        manifest?: string;
      },
    ) => {
      initLogging({ format: opts.format });
      const { result, exitCode } = await publish({
        configDir: opts.config,
        envName: opts.env,
        version: opts.version,
        overrides: {
          dry_run: opts.dryRun,
          src_dir: opts.srcDir,
          remote_host: opts.host,
          remote_user: opts.user,
          remote_dir: opts.remoteDir,
          manifest: opts.manifest,
        },
      });

      if (!result.ok) fail(opts.format, result.error.code, result.error.message, exitCode);

      if (opts.format === "jsonl") {
        process.stdout.write(
          JSON.stringify({
            level: "info",
            code: "OK",
            version: result.version,
            files: result.files,
            published: result.published !== null,
          }) + "\n",
        );
      } else {
        const suffix = result.published ? "" : " (dry run, not published)";
        console.log(`Released version ${result.version} in ${result.versionDir} with ${result.files.length} file(s)${suffix}`);
      }
    },
  );

program
  .command("list")
  .description("List releases recorded in the manifest")
  .option("--config <path>", "Path to config directory", "config")
  .option("--env <name>", "Config overlay to load")
  .option("--manifest <file>", "Manifest file name")
  .addOption(formatOption())
  .action(async (opts: Format & { config: string; env?: string; manifest?: string }) => {
    initLogging({ format: opts.format });
    const releases = await listReleases(manifestPathFrom(opts));
    if (opts.format === "jsonl") {
      for (const r of releases) process.stdout.write(JSON.stringify(r) + "\n");
      return;
    }
    if (releases.length === 0) {
      console.log("No releases found.");
      return;
    }
    for (const r of releases) console.log(`${r.version}  ${r.publishedAt}  ${r.files} file(s)`);
  });

program
  .command("verify")
  .description("Recompute checksums of a staged release and compare with the manifest")
  .argument("[version]", "Version to verify (default: highest recorded)")
  .option("--config <path>", "Path to config directory", "config")
  .option("--env <name>", "Config overlay to load")
  .option("--manifest <file>", "Manifest file name")
  .addOption(formatOption())
  .action(async (version: string | undefined, opts: Format & { config: string; env?: string; manifest?: string }) => {
    initLogging({ format: opts.format });
    const res = await verifyRelease({ manifestPath: manifestPathFrom(opts), version });
    if (opts.format === "jsonl") {
      for (const f of res.files) process.stdout.write(JSON.stringify(f) + "\n");
    } else {
      for (const f of res.files) console.log(`${f.ok ? "OK      " : "MISMATCH"}  ${f.path}`);
    }
    if (!res.ok) fail(opts.format, res.error.code, res.error.message, EXIT.VERIFY_FAILED);
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  if (isReleaseError(err)) {
    console.error(`${err.code}: ${err.message}`);
    process.exit(exitCodeFor(err.code));
  }
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(JSON.stringify({ ok: false, error: message }) + "\n");
  process.exit(EXIT.RELEASE_FAILED);
});
