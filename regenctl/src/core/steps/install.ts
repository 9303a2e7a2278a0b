import { requireInterpreter, runStepCommand } from "./command.js";
import type { StepContext, StepOutcome } from "./context.js";

export async function runInstall(ctx: StepContext): Promise<StepOutcome> {
  const python = requireInterpreter(ctx, "install", "INSTALL_FAILED");
  const requirements = ctx.config.install.requirements;
  const res = await runStepCommand(ctx, "install", "INSTALL_FAILED", python.executable, [
    "-m",
    "pip",
    "install",
    "-r",
    requirements,
  ]);
  return { status: "ok", outputs: { requirements, duration_ms: res.durationMs } };
}
