import path from "node:path";
import { RegenError } from "../errors.js";
import { ensureVenv, locateInterpreter } from "../../runtime/python.js";
import type { StepContext, StepOutcome } from "./context.js";

/**
 * Find an interpreter on the pinned minor version and, unless disabled,
 * put a virtual environment on top of it.
 */
export async function runProvision(ctx: StepContext): Promise<StepOutcome> {
  const { python_version, candidates, venv_dir } = ctx.config.runtime;

  const located = await locateInterpreter(ctx.deps.exec, candidates, python_version);
  if (!located.ok) {
    const seen = located.probes.map((p) => `${p.candidate}=${p.version ?? p.error ?? "unknown"}`).join(", ");
    throw new RegenError("PROVISION_FAILED", `No Python ${python_version} interpreter found (${seen})`, {
      step: "provision",
      detail: { probes: located.probes },
    });
  }

  if (!venv_dir) {
    ctx.interpreter = located.interpreter;
    ctx.reporter.info("PROVISION", `Using ${located.interpreter.executable} (${located.interpreter.version})`, {
      step: "provision",
    });
    return { status: "ok", outputs: { ...located.interpreter, venv: null } };
  }

  const dir = path.resolve(ctx.workspace, venv_dir);
  const venv = await ensureVenv(ctx.deps.exec, located.interpreter, dir, python_version, ctx.timeoutMs);
  if (!venv.ok) {
    throw new RegenError("PROVISION_FAILED", `Could not prepare virtual environment ${dir}: ${venv.error}`, {
      step: "provision",
    });
  }

  ctx.interpreter = venv.interpreter;
  ctx.reporter.info(
    "PROVISION",
    `${venv.created ? "Created" : "Reusing"} ${dir} (${venv.interpreter.version})`,
    { step: "provision" },
  );
  return { status: "ok", outputs: { ...venv.interpreter, venv: dir, created: venv.created } };
}
