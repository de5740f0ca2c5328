import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import { ReleaseError, errorMessage } from "../errors.js";
import type { PipelineConfig, ReleaseConfig } from "../types/config.js";
import { validateConfig } from "./validator.js";

export const ENV_PREFIX = "RELEASECTL_";

/** Built-in defaults; config/base.yaml and later layers override them. */
export const DEFAULT_CONFIG: ReleaseConfig = {
  src_dir: "../client",
  downloads_dir: "downloads",
  manifest: "releases.json",
  artifact_ext: ".zip",
  build_script: "../client/build/build-all.sh",
  build_shell: "bash",
  remote_host: "host.example",
  remote_user: "deploy",
  remote_dir: "/var/www/html",
  dry_run: false,
};

type ConfigLayer = Record<string, unknown>;

function isRecord(value: unknown): value is ConfigLayer {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Load a YAML file and return its mapping, or an empty layer if the file does not exist. */
function loadYaml(filePath: string): ConfigLayer {
  if (!fs.existsSync(filePath)) return {};
  let doc: unknown;
  try {
    doc = YAML.parse(fs.readFileSync(filePath, "utf8"));
  } catch (e) {
    throw new ReleaseError("ConfigInvalid", `Failed to read config ${filePath}: ${errorMessage(e)}`, { path: filePath });
  }
  if (doc === null || doc === undefined) return {};
  if (!isRecord(doc)) {
    throw new ReleaseError("ConfigInvalid", `Config ${filePath} must be a mapping`, { path: filePath });
  }
  return doc;
}

const BOOLEAN_KEYS = new Set(
  Object.entries(DEFAULT_CONFIG)
    .filter(([, v]) => typeof v === "boolean")
    .map(([k]) => k),
);

function coerceEnvValue(key: string, value: string): unknown {
  if (!BOOLEAN_KEYS.has(key)) return value;
  const v = value.trim().toLowerCase();
  if (v === "true" || v === "1" || v === "yes") return true;
  if (v === "false" || v === "0" || v === "no" || v === "") return false;
  return value;
}

/** RELEASECTL_REMOTE_HOST → remote_host. Only keys the config knows are taken. */
function envLayer(env: NodeJS.ProcessEnv): ConfigLayer {
  const layer: ConfigLayer = {};
  for (const [name, value] of Object.entries(env)) {
    if (!name.startsWith(ENV_PREFIX) || value === undefined) continue;
    const key = name.slice(ENV_PREFIX.length).toLowerCase();
    if (!(key in DEFAULT_CONFIG)) continue;
    layer[key] = coerceEnvValue(key, value);
  }
  return layer;
}

function definedOnly(layer: ConfigLayer): ConfigLayer {
  return Object.fromEntries(Object.entries(layer).filter(([, v]) => v !== undefined));
}

export type LoadConfigOptions = {
  configDir?: string;
  /** Loads `<configDir>/<envName>.yaml` over base.yaml. */
  envName?: string;
  env?: NodeJS.ProcessEnv;
  /** Highest-precedence layer, typically from CLI flags. Undefined values are ignored. */
  overrides?: Partial<ReleaseConfig>;
};

/**
 * Load layered config: defaults ← base.yaml ← <env>.yaml ← RELEASECTL_* ← overrides.
 * Throws ConfigInvalid if the merged result does not satisfy the schema.
 */
export function loadConfig(opts: LoadConfigOptions = {}): ReleaseConfig {
  const dir = opts.configDir ?? "config";

  let merged: ConfigLayer = { ...DEFAULT_CONFIG, ...loadYaml(path.join(dir, "base.yaml")) };
  if (opts.envName) {
    merged = { ...merged, ...loadYaml(path.join(dir, `${opts.envName}.yaml`)) };
  }
  merged = { ...merged, ...envLayer(opts.env ?? process.env), ...definedOnly(opts.overrides ?? {}) };

  const res = validateConfig(merged);
  if (!res.valid) {
    throw new ReleaseError("ConfigInvalid", `Config invalid: ${res.errors}`, { path: dir });
  }
  return res.config;
}

export function toPipelineConfig(config: ReleaseConfig, explicitVersion?: string): PipelineConfig {
  return {
    sourceDir: config.src_dir,
    downloadsDir: config.downloads_dir,
    manifestPath: config.manifest,
    artifactExt: config.artifact_ext,
    buildScript: config.build_script,
    buildShell: config.build_shell,
    explicitVersion,
    dryRun: config.dry_run,
    remote: {
      hostPort: config.remote_host,
      user: config.remote_user,
      baseDir: config.remote_dir,
      downloadsDir: config.downloads_dir,
    },
  };
}
