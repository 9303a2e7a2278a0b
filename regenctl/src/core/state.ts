import crypto from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import type { RegenErrorCode } from "./errors.js";
import type { RunStatus, StepId } from "./pipeline.js";

export type StepStatus = "ok" | "skipped" | "failed" | "timeout";

export type StepResult = {
  status: StepStatus;
  duration_ms: number;
  error?: string;
  outputs?: Record<string, unknown>;
};

/** Persistent run state stored in {runs_root}/{run_id}/state.json */
export type RunState = {
  run_id: string;
  pid: number;
  status: RunStatus;
  actor: string;
  force: boolean;
  dry_run: boolean;
  pinned_sources: Record<string, string>;
  started_at: string;
  updated_at: string;
  step_started_at: string | null;
  step_results: Partial<Record<StepId, StepResult>>;
  commit_sha: string | null;
  error: { code: RegenErrorCode; step: StepId | null; message: string } | null;
};

export function makeRunId(now: Date = new Date()): string {
  const ts = now.toISOString().replace(/[:.]/g, "-");
  return `${ts}-${crypto.randomBytes(3).toString("hex")}`;
}

export function runDirFor(runsRoot: string, runId: string): string {
  return path.join(runsRoot, runId);
}

export function statePathFor(runsRoot: string, runId: string): string {
  return path.join(runsRoot, runId, "state.json");
}

export function saveState(statePath: string, state: RunState): void {
  fs.mkdirSync(path.dirname(statePath), { recursive: true });
  fs.writeFileSync(statePath, JSON.stringify(state, null, 2) + "\n", "utf8");
}

function isRunState(value: unknown): value is RunState {
  return (
    value !== null &&
    typeof value === "object" &&
    !Array.isArray(value) &&
    "status" in value &&
    typeof value.status === "string"
  );
}

export function loadState(statePath: string): RunState {
  const parsed: unknown = JSON.parse(fs.readFileSync(statePath, "utf8"));
  if (!isRunState(parsed)) {
    throw new Error(`Invalid run state: ${statePath}`);
  }
  return parsed;
}
