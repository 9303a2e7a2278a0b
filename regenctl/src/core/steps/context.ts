import type { RepoClient, RepoMirror } from "../../git/operations.js";
import type { Reporter } from "../../log/reporter.js";
import type { CommandRunner } from "../../proc/exec.js";
import type { Interpreter } from "../../runtime/python.js";
import type { RegenConfig } from "../../types/config.js";
import type { StepId } from "../pipeline.js";

export type RegenParams = {
  force: boolean;
  dryRun: boolean;
  actor: string;
  push: boolean;
};

export type StepDeps = {
  repo: RepoClient;
  mirror: RepoMirror;
  exec: CommandRunner;
};

/** Shared, sequentially-mutated context handed to every step of one run. */
export type StepContext = {
  config: RegenConfig;
  params: Readonly<RegenParams>;
  pinnedSources: Readonly<Record<string, string>>;
  workspace: string;
  runDir: string;
  deps: StepDeps;
  reporter: Reporter;
  /** Current step's time budget. */
  timeoutMs: number;
  /** Aborted once the current step's budget runs out. */
  signal: AbortSignal;
  /** Filled by the provision step. */
  interpreter: Interpreter | null;
};

export type StepOutcome = {
  status: "ok" | "skipped";
  outputs?: Record<string, unknown>;
};

export type StepHandler = (ctx: StepContext) => Promise<StepOutcome>;

export type StepTable = Record<StepId, StepHandler>;
