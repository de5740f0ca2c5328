/** File/env configuration, snake_case as written in config/*.yaml. */
export type ReleaseConfig = {
  src_dir: string;
  downloads_dir: string;
  manifest: string;
  artifact_ext: string;
  build_script: string;
  build_shell: string;
  remote_host: string;
  remote_user: string;
  remote_dir: string;
  dry_run: boolean;
};

/** Resolved settings handed to the pipeline at construction. */
export type PipelineConfig = {
  sourceDir: string;
  downloadsDir: string;
  manifestPath: string;
  artifactExt: string;
  buildScript: string;
  buildShell: string;
  explicitVersion?: string;
  dryRun: boolean;
  remote: {
    hostPort: string;
    user: string;
    baseDir: string;
    /** Relative to baseDir; mirrors the local downloads layout. */
    downloadsDir: string;
  };
};
