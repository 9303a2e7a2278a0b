/** Layered configuration (base.yaml, env overlay, REGEN_* variables). */

export type RepoRefConfig = {
  remote: string;
  ref: string;
};

export type UpstreamRepoConfig = {
  url: string;
  path: string;
  depth: number;
  /** Left unset to follow the upstream default branch. */
  ref?: string | null;
};

export type RuntimeConfig = {
  python_version: string;
  candidates: string[];
  venv_dir?: string | null;
};

export type InstallConfig = {
  requirements: string;
};

export type GenerateConfig = {
  module: string;
  command: string;
};

export type CommitConfig = {
  message: string;
  push: boolean;
  committer_name: string;
  committer_email: string;
};

export type StepTimeouts = Record<string, number>;

export type RegenConfig = {
  schema_version: string;
  runs_root: string;
  main_repo: RepoRefConfig;
  upstream_repo: UpstreamRepoConfig;
  pinned_sources: Record<string, string>;
  runtime: RuntimeConfig;
  install: InstallConfig;
  generate: GenerateConfig;
  artifacts: string[];
  commit: CommitConfig;
  timeouts?: StepTimeouts;
  max_concurrent?: number;
  passthrough_env?: string[];
};
