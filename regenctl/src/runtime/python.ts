import fs from "node:fs";
import path from "node:path";
import type { CommandRunner } from "../proc/exec.js";

export type Interpreter = {
  executable: string;
  version: string;
};

export type ProbeResult = { candidate: string; version: string | null; error?: string };

/** Extract "3.11.9" from `python --version` output (older releases print to stderr). */
export function parsePythonVersion(output: string): string | null {
  const m = /Python\s+(\d+\.\d+\.\d+)/.exec(output);
  return m ? m[1] : null;
}

/** True when a full version such as "3.11.9" belongs to the wanted "3.11" line. */
export function matchesMinor(version: string, wanted: string): boolean {
  const [major, minor] = version.split(".");
  return `${major}.${minor}` === wanted;
}

export async function probeInterpreter(exec: CommandRunner, candidate: string): Promise<ProbeResult> {
  const res = await exec(candidate, ["--version"], { timeoutMs: 30_000 });
  if (res.spawnError) return { candidate, version: null, error: res.spawnError };
  if (res.code !== 0) return { candidate, version: null, error: `exit code ${res.code}` };
  return { candidate, version: parsePythonVersion(`${res.stdout}\n${res.stderr}`) };
}

export type LocateResult =
  | { ok: true; interpreter: Interpreter; probes: ProbeResult[] }
  | { ok: false; probes: ProbeResult[] };

/**
 * Probe candidates in order and return the first whose major.minor matches.
 */
export async function locateInterpreter(
  exec: CommandRunner,
  candidates: string[],
  wanted: string,
): Promise<LocateResult> {
  const probes: ProbeResult[] = [];
  for (const candidate of candidates) {
    const probe = await probeInterpreter(exec, candidate);
    probes.push(probe);
    if (probe.version && matchesMinor(probe.version, wanted)) {
      return { ok: true, interpreter: { executable: candidate, version: probe.version }, probes };
    }
  }
  return { ok: false, probes };
}

export function venvPython(venvDir: string, platform: NodeJS.Platform = process.platform): string {
  return platform === "win32"
    ? path.join(venvDir, "Scripts", "python.exe")
    : path.join(venvDir, "bin", "python");
}

export type VenvResult =
  | { ok: true; interpreter: Interpreter; created: boolean }
  | { ok: false; error: string };

/**
 * Reuse the virtual environment at `venvDir` when its interpreter is on the
 * wanted minor version, otherwise (re)create it from `base`.
 */
export async function ensureVenv(
  exec: CommandRunner,
  base: Interpreter,
  venvDir: string,
  wanted: string,
  timeoutMs: number,
): Promise<VenvResult> {
  const python = venvPython(venvDir);

  if (fs.existsSync(python)) {
    const probe = await probeInterpreter(exec, python);
    if (probe.version && matchesMinor(probe.version, wanted)) {
      return { ok: true, interpreter: { executable: python, version: probe.version }, created: false };
    }
  }

  const res = await exec(base.executable, ["-m", "venv", "--clear", venvDir], { timeoutMs });
  if (res.spawnError || res.code !== 0) {
    return { ok: false, error: res.spawnError ?? `venv creation exited with ${res.code}: ${res.stderr.trim()}` };
  }

  const probe = await probeInterpreter(exec, python);
  if (!probe.version || !matchesMinor(probe.version, wanted)) {
    return { ok: false, error: `venv interpreter ${python} reports ${probe.version ?? probe.error ?? "no version"}` };
  }
  return { ok: true, interpreter: { executable: python, version: probe.version }, created: true };
}
