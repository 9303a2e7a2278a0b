import type { CommitRequest, GitCallOptions, RepoClient, StageResult } from "../src/git/operations.js";
import { Reporter } from "../src/log/reporter.js";
import type { CommandRunner, ExecOptions, ExecResult } from "../src/proc/exec.js";
import type { RegenConfig } from "../src/types/config.js";

export const ARTIFACTS = [
  "results",
  "README.md",
  "RESULTS.md",
  "longitudinal.png",
  "longitudinal.json",
  "profiling/profiling.png",
  "profiling/profiling.md",
];

export const PINNED = {
  PYPERFORMANCE_HASH: "f7f36509e2e81e9a20cfeadddd6608f2378ff26c",
  PYSTON_BENCHMARKS_HASH: "ee8adbd7846ec67d1a8a362e6a5e876df372431d",
};

export function testConfig(overrides: Partial<RegenConfig> = {}): RegenConfig {
  return {
    schema_version: "1.0.0",
    runs_root: ".regen/runs",
    main_repo: { remote: "origin", ref: "main" },
    upstream_repo: { url: "https://example.invalid/upstream.git", path: "cpython", depth: 1 },
    pinned_sources: { ...PINNED },
    runtime: { python_version: "3.11", candidates: ["python3.11", "python3"], venv_dir: null },
    install: { requirements: "requirements.txt" },
    generate: { module: "bench_runner", command: "generate_results" },
    artifacts: [...ARTIFACTS],
    commit: {
      message: "Benchmarking results for @{actor}",
      push: false,
      committer_name: "results-bot",
      committer_email: "results-bot@example.com",
    },
    ...overrides,
  };
}

export class FakeRepo implements RepoClient {
  calls: string[] = [];
  commits: CommitRequest[] = [];
  headSha = "1111111111111111111111111111111111111111";
  commitSha = "2222222222222222222222222222222222222222";
  /** What stagePaths reports as changed. */
  staged: string[] = ["results/run-1.json", "README.md", "RESULTS.md", "longitudinal.png"];
  /** Overrides the file list reported for the new commit. */
  committedFiles: string[] | null = null;
  syncError: Error | null = null;
  commitError: Error | null = null;
  /** Makes syncBranch wait until its signal aborts, like a stalled fetch. */
  stallSync = false;
  signals: AbortSignal[] = [];

  async syncBranch(remote: string, ref: string, opts?: GitCallOptions): Promise<string> {
    this.calls.push(`sync ${remote}/${ref}`);
    const signal = opts?.signal;
    if (signal) this.signals.push(signal);
    if (this.stallSync && signal) {
      await new Promise<never>((_, reject) => {
        signal.addEventListener("abort", () => reject(new Error("Abort signal received")), { once: true });
      });
    }
    if (this.syncError) throw this.syncError;
    return this.headSha;
  }

  async stagePaths(paths: string[]): Promise<StageResult> {
    this.calls.push(`stage ${paths.join(",")}`);
    return { pathspecs: [...paths], files: [...this.staged] };
  }

  async unstagePaths(pathspecs: string[]): Promise<void> {
    this.calls.push(`unstage ${pathspecs.join(",")}`);
  }

  async commit(req: CommitRequest): Promise<string> {
    this.calls.push("commit");
    if (this.commitError) throw this.commitError;
    this.commits.push(req);
    return this.commitSha;
  }

  async commitFiles(sha: string): Promise<string[]> {
    this.calls.push(`show ${sha}`);
    return this.committedFiles ?? [...this.staged];
  }

  async push(remote: string, ref: string): Promise<void> {
    this.calls.push(`push ${remote}/${ref}`);
  }
}

export type ExecCall = { cmd: string; args: string[]; opts: ExecOptions };

export type ExecReply = Partial<Omit<ExecResult, "durationMs">>;

/**
 * Scripted command runner. `reply` answers each call; by default every
 * `--version` probe reports Python 3.11.9 and everything else exits 0.
 */
export function fakeExec(reply: (cmd: string, args: string[]) => ExecReply | undefined = () => undefined): {
  exec: CommandRunner;
  calls: ExecCall[];
} {
  const calls: ExecCall[] = [];
  const exec: CommandRunner = async (cmd, args, opts = {}) => {
    calls.push({ cmd, args, opts });
    const fallback: ExecReply = args[0] === "--version" ? { stdout: "Python 3.11.9\n" } : {};
    const r = reply(cmd, args) ?? fallback;
    return {
      code: r.code === undefined ? 0 : r.code,
      stdout: r.stdout ?? "",
      stderr: r.stderr ?? "",
      timedOut: r.timedOut ?? false,
      durationMs: 1,
      spawnError: r.spawnError,
    };
  };
  return { exec, calls };
}

export function captureReporter(format: "human" | "jsonl" = "jsonl"): { reporter: Reporter; out: string[]; err: string[] } {
  const out: string[] = [];
  const err: string[] = [];
  const reporter = new Reporter(format, { out: (l) => out.push(l), err: (l) => err.push(l) });
  return { reporter, out, err };
}
