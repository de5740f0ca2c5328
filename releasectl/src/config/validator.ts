import { compileSchema } from "../schema/ajv.js";
import type { ReleaseConfig } from "../types/config.js";

const CONFIG_SCHEMA = {
  type: "object",
  required: [
    "src_dir",
    "downloads_dir",
    "manifest",
    "artifact_ext",
    "build_script",
    "build_shell",
    "remote_host",
    "remote_user",
    "remote_dir",
    "dry_run",
  ],
  additionalProperties: false,
  properties: {
    src_dir: { type: "string", minLength: 1 },
    // Mirrored on the remote host under remote_dir, so it must be relative.
    // Remote paths reach scp unquoted: no whitespace or quotes in either.
    downloads_dir: { type: "string", pattern: "^[^/\\s'\"][^\\s'\"]*$" },
    manifest: { type: "string", minLength: 1 },
    artifact_ext: { type: "string", pattern: "^\\.?[A-Za-z0-9]+$" },
    build_script: { type: "string", minLength: 1 },
    build_shell: { type: "string", minLength: 1 },
    remote_host: { type: "string", pattern: "^[^:\\s]+(:[0-9]+)?$" },
    remote_user: { type: "string", minLength: 1 },
    remote_dir: { type: "string", pattern: "^[^\\s'\"]+$" },
    dry_run: { type: "boolean" },
  },
};

const configSchema = compileSchema<ReleaseConfig>(CONFIG_SCHEMA);

export type ConfigValidationResult =
  | { valid: true; config: ReleaseConfig; errors: null }
  | { valid: false; errors: string };

/** Validate a merged config object against the config schema. */
export function validateConfig(config: unknown): ConfigValidationResult {
  if (configSchema.check(config)) return { valid: true, config, errors: null };
  return { valid: false, errors: configSchema.explain() };
}
