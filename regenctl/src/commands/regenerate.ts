import os from "node:os";
import path from "node:path";
import { loadConfig } from "../config/validator.js";
import type { RegenErrorCode } from "../core/errors.js";
import { Orchestrator } from "../core/orchestrator.js";
import type { RunStatus } from "../core/pipeline.js";
import type { StepDeps } from "../core/steps/context.js";
import { GitOperations, mirrorRepository } from "../git/operations.js";
import { Reporter } from "../log/reporter.js";
import { execCommand } from "../proc/exec.js";
import { EXIT, type ExitCode } from "./exit-codes.js";

export type RegenerateOpts = {
  force?: boolean;
  dryRun?: boolean;
  actor?: string;
  /** Overrides `commit.push` from config when set. */
  push?: boolean;
  configDir?: string;
  envName?: string;
  workspace?: string;
  reporter?: Reporter;
  /** Injected collaborators; real git and processes when omitted. */
  deps?: StepDeps;
  env?: NodeJS.ProcessEnv;
};

export type RegenerateResult =
  | { ok: true; runId: string; statePath: string; status: RunStatus; commitSha: string | null }
  | {
      ok: false;
      exitCode: ExitCode;
      error: string;
      code?: RegenErrorCode;
      runId?: string;
      statePath?: string;
    };

const ACTOR_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*(\[bot\])?$/;

/** `--actor`, then GITHUB_ACTOR, then the local user name. */
export function resolveActor(explicit: string | undefined, env: NodeJS.ProcessEnv): string {
  return explicit ?? env.GITHUB_ACTOR ?? os.userInfo().username;
}

export async function regenerate(opts: RegenerateOpts = {}): Promise<RegenerateResult> {
  const env = opts.env ?? process.env;
  const workspace = path.resolve(opts.workspace ?? process.cwd());
  const reporter = opts.reporter ?? new Reporter("human");

  const loaded = await loadConfig({ configDir: opts.configDir, envName: opts.envName, env });
  if (!loaded.ok) {
    return { ok: false, exitCode: EXIT.INVALID_ARGS, error: loaded.error };
  }
  const config = loaded.config;

  const actor = resolveActor(opts.actor, env);
  if (!ACTOR_PATTERN.test(actor)) {
    return { ok: false, exitCode: EXIT.INVALID_ARGS, error: `Invalid actor name: ${JSON.stringify(actor)}` };
  }

  const deps: StepDeps = opts.deps ?? {
    repo: new GitOperations(workspace),
    mirror: mirrorRepository,
    exec: execCommand,
  };

  const orch = new Orchestrator({ config, workspace, deps, reporter });
  const result = await orch.run({
    force: opts.force ?? false,
    dryRun: opts.dryRun ?? false,
    actor,
    push: opts.push ?? config.commit.push,
  });

  if (!result.started) {
    return { ok: false, exitCode: EXIT.CONCURRENT_CONFLICT, error: result.reason };
  }

  if (result.success) {
    return {
      ok: true,
      runId: result.run_id,
      statePath: result.state_path,
      status: result.final_status,
      commitSha: result.commit_sha,
    };
  }

  return {
    ok: false,
    exitCode: EXIT.RUN_FAILED,
    error: result.error?.message ?? `Run ended in ${result.final_status}`,
    code: result.error?.code,
    runId: result.run_id,
    statePath: result.state_path,
  };
}
