import path from "node:path";
import type { Reporter } from "../log/reporter.js";
import type { RegenConfig } from "../types/config.js";
import { checkConcurrency, isPidAlive, type PidProbe } from "./concurrency.js";
import { RegenError, errorMessage, type RegenErrorCode } from "./errors.js";
import { ALL_STEPS, getStepTimeout, isTerminal, nextState, type RunStatus, type StepId } from "./pipeline.js";
import { makeRunId, runDirFor, saveState, statePathFor, type RunState } from "./state.js";
import type { RegenParams, StepContext, StepDeps, StepTable } from "./steps/context.js";
import { DEFAULT_STEPS } from "./steps/index.js";

export type OrchestratorOptions = {
  config: RegenConfig;
  workspace: string;
  deps: StepDeps;
  reporter: Reporter;
  steps?: StepTable;
  pidAlive?: PidProbe;
  /** Extra time a step gets beyond its own budget before it is abandoned. */
  timeoutGraceMs?: number;
};

export type OrchestratorResult =
  | { started: false; reason: string; activeId?: string }
  | {
      started: true;
      success: boolean;
      run_id: string;
      state_path: string;
      final_status: RunStatus;
      step_results: RunState["step_results"];
      commit_sha: string | null;
      error: RunState["error"];
    };

const FAILURE_CODES: Record<StepId, RegenErrorCode> = {
  checkout_main: "CHECKOUT_FAILED",
  checkout_upstream: "CHECKOUT_FAILED",
  provision: "PROVISION_FAILED",
  install: "INSTALL_FAILED",
  generate: "GENERATE_FAILED",
  commit: "COMMIT_FAILED",
};

const DEFAULT_GRACE_MS = 10_000;

function nowIso(): string {
  return new Date().toISOString();
}

/**
 * Drives one regeneration run through the fixed step order.
 *
 * Main loop: persist → execute step → record → advance. The first failing
 * step ends the run; nothing after it executes.
 */
export class Orchestrator {
  private readonly steps: StepTable;
  private readonly pidAlive: PidProbe;
  private readonly graceMs: number;

  constructor(private readonly opts: OrchestratorOptions) {
    this.steps = opts.steps ?? DEFAULT_STEPS;
    this.pidAlive = opts.pidAlive ?? isPidAlive;
    this.graceMs = opts.timeoutGraceMs ?? DEFAULT_GRACE_MS;
  }

  async run(params: RegenParams): Promise<OrchestratorResult> {
    const { config, workspace, reporter } = this.opts;
    const runsRoot = path.resolve(workspace, config.runs_root);

    const concurrency = checkConcurrency(runsRoot, config.max_concurrent ?? 1, this.pidAlive);
    if (!concurrency.allowed) {
      return { started: false, reason: concurrency.reason ?? "Run limit reached", activeId: concurrency.activeId };
    }

    const runId = makeRunId();
    const runDir = runDirFor(runsRoot, runId);
    const statePath = statePathFor(runsRoot, runId);
    const pinnedSources = Object.freeze({ ...config.pinned_sources });

    const state: RunState = {
      run_id: runId,
      pid: process.pid,
      status: ALL_STEPS[0],
      actor: params.actor,
      force: params.force,
      dry_run: params.dryRun,
      pinned_sources: { ...pinnedSources },
      started_at: nowIso(),
      updated_at: nowIso(),
      step_started_at: null,
      step_results: {},
      commit_sha: null,
      error: null,
    };
    saveState(statePath, state);
    reporter.attachLogFile(path.join(runDir, "progress.log"));
    reporter.info("RUN_STARTED", `Run ${runId} (force=${params.force}, dry_run=${params.dryRun})`, {
      run_id: runId,
    });

    const ctx: StepContext = {
      config,
      params: Object.freeze({ ...params }),
      pinnedSources,
      workspace,
      runDir,
      deps: this.opts.deps,
      reporter,
      timeoutMs: 0,
      signal: new AbortController().signal,
      interpreter: null,
    };

    for (const step of ALL_STEPS) {
      ctx.timeoutMs = getStepTimeout(step, config.timeouts) * 1000;
      const budget = new AbortController();
      ctx.signal = budget.signal;
      const budgetTimer = setTimeout(() => budget.abort(), ctx.timeoutMs);
      state.status = step;
      state.step_started_at = nowIso();
      state.updated_at = nowIso();
      saveState(statePath, state);
      reporter.info("STEP_STARTED", `[${step}]`, { run_id: runId, step });

      const stepStart = Date.now();
      try {
        const outcome = await this.withTimeout(this.steps[step](ctx), ctx.timeoutMs + this.graceMs, step);
        state.step_results[step] = {
          status: outcome.status,
          duration_ms: Date.now() - stepStart,
          outputs: outcome.outputs,
        };
        state.status = nextState(step, outcome.status === "skipped" ? "skipped" : "success");
        const sha = outcome.outputs?.sha;
        if (step === "commit" && typeof sha === "string") state.commit_sha = sha;
      } catch (e) {
        const timedOut = e instanceof RegenError && e.code === "STEP_TIMEOUT";
        const message = errorMessage(e);
        state.step_results[step] = {
          status: timedOut ? "timeout" : "failed",
          duration_ms: Date.now() - stepStart,
          error: message,
        };
        state.status = nextState(step, timedOut ? "timeout" : "failure");
        state.error = {
          code: e instanceof RegenError ? e.code : FAILURE_CODES[step],
          step,
          message,
        };
        reporter.error(state.error.code, message, { run_id: runId, step });
      } finally {
        clearTimeout(budgetTimer);
      }

      state.step_started_at = null;
      state.updated_at = nowIso();
      saveState(statePath, state);

      if (isTerminal(state.status)) break;
    }

    const success = state.status === "done";
    if (success) {
      reporter.info("RUN_DONE", `Run ${runId} finished`, { run_id: runId, commit_sha: state.commit_sha });
    }

    return {
      started: true,
      success,
      run_id: runId,
      state_path: statePath,
      final_status: state.status,
      step_results: state.step_results,
      commit_sha: state.commit_sha,
      error: state.error,
    };
  }

  private async withTimeout<T>(work: Promise<T>, ms: number, step: StepId): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    let abandoned = false;
    void work.catch((e: unknown) => {
      if (abandoned) {
        this.opts.reporter.warn("STEP_ABANDONED", `Step ${step} failed after its timeout: ${errorMessage(e)}`, { step });
      }
    });
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        abandoned = true;
        reject(new RegenError("STEP_TIMEOUT", `Step ${step} exceeded ${ms}ms`, { step }));
      }, ms);
    });
    try {
      return await Promise.race([work, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}
