import { describeArtifacts, writeArtifactRecord } from "../../artifacts/artifact-set.js";
import { requireInterpreter, runStepCommand } from "./command.js";
import type { StepContext, StepOutcome } from "./context.js";

/** Arguments for the generation entry point; `--force` only when asked for. */
export function generateArgs(module: string, command: string, force: boolean): string[] {
  const args = ["-m", module, command];
  if (force) args.push("--force");
  return args;
}

/**
 * Invoke the external generation tool, then record what it left behind.
 * Missing artifacts are reported, not fatal: the tool decides what it produces.
 */
export async function runGenerate(ctx: StepContext): Promise<StepOutcome> {
  const python = requireInterpreter(ctx, "generate", "GENERATE_FAILED");
  const { module, command } = ctx.config.generate;
  const args = generateArgs(module, command, ctx.params.force);

  const res = await runStepCommand(ctx, "generate", "GENERATE_FAILED", python.executable, args);

  const entries = describeArtifacts(ctx.workspace, ctx.config.artifacts);
  for (const entry of entries) {
    if (!entry.present) {
      ctx.reporter.warn("ARTIFACT_MISSING", `Expected artifact not produced: ${entry.path}`, { step: "generate" });
    }
  }
  const recordPath = writeArtifactRecord(ctx.runDir, entries);

  return {
    status: "ok",
    outputs: {
      args,
      duration_ms: res.durationMs,
      artifacts_present: entries.filter((e) => e.present).length,
      artifact_record: recordPath,
    },
  };
}
