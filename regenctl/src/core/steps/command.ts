import { RegenError, errorMessage, type RegenErrorCode } from "../errors.js";
import type { StepId } from "../pipeline.js";
import { formatCommand, sanitizeEnv, type ExecResult } from "../../proc/exec.js";
import { tail } from "../../log/redact.js";
import type { Interpreter } from "../../runtime/python.js";
import type { StepContext } from "./context.js";

export const DEFAULT_PASSTHROUGH_ENV = ["PATH", "HOME", "USER", "LANG", "LC_ALL", "TERM"];

/** Child environment: allowlisted keys from ours plus the pinned source ids. */
export function childEnv(ctx: StepContext, base: NodeJS.ProcessEnv = process.env): NodeJS.ProcessEnv {
  const allow = ctx.config.passthrough_env ?? DEFAULT_PASSTHROUGH_ENV;
  return sanitizeEnv(base, allow, { ...ctx.pinnedSources });
}

/**
 * Wrap a failure from in-process work such as git. Once the step's signal has
 * fired the failure is the budget running out, whatever `e` says.
 */
export function stepFailure(
  ctx: StepContext,
  step: StepId,
  code: RegenErrorCode,
  message: string,
  e?: unknown,
): RegenError {
  if (ctx.signal.aborted) {
    return new RegenError("STEP_TIMEOUT", `${message}: step exceeded ${ctx.timeoutMs}ms`, { step, cause: e });
  }
  const full = e === undefined ? message : `${message}: ${errorMessage(e)}`;
  return new RegenError(code, full, { step, cause: e });
}

export function requireInterpreter(ctx: StepContext, step: StepId, code: RegenErrorCode): Interpreter {
  if (!ctx.interpreter) {
    throw new RegenError(code, `No interpreter provisioned before ${step}`, { step });
  }
  return ctx.interpreter;
}

/**
 * Run one external command for `step` in the workspace. Exit code 0 is
 * success; anything else raises `code`, a timeout raises STEP_TIMEOUT.
 */
export async function runStepCommand(
  ctx: StepContext,
  step: StepId,
  code: RegenErrorCode,
  cmd: string,
  args: string[],
): Promise<ExecResult> {
  const display = formatCommand(cmd, args);
  ctx.reporter.info("COMMAND", `$ ${display}`, { step });

  const res = await ctx.deps.exec(cmd, args, {
    cwd: ctx.workspace,
    env: childEnv(ctx),
    timeoutMs: ctx.timeoutMs,
  });

  if (res.stdout.trim()) ctx.reporter.info("STDOUT", tail(res.stdout), { step });
  if (res.stderr.trim()) ctx.reporter.warn("STDERR", tail(res.stderr), { step });

  if (res.timedOut) {
    throw new RegenError("STEP_TIMEOUT", `${display} timed out after ${ctx.timeoutMs}ms`, { step });
  }
  if (res.spawnError) {
    throw new RegenError(code, `${display} could not start: ${res.spawnError}`, { step });
  }
  if (res.code !== 0) {
    throw new RegenError(code, `${display} exited with code ${res.code}`, {
      step,
      detail: { exit_code: res.code },
    });
  }
  return res;
}
