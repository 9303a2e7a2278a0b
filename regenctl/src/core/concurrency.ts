import fs from "node:fs";
import path from "node:path";
import { isTerminal } from "./pipeline.js";

export type ConcurrencyCheck = {
  allowed: boolean;
  activeId?: string;
  reason?: string;
};

export type PidProbe = (pid: number) => boolean;

/** True when a process with `pid` exists (signal 0 only checks). */
export const isPidAlive: PidProbe = (pid) => {
  try {
    process.kill(pid, 0);
    return true;
  } catch (e) {
    // EPERM: the process exists but belongs to someone else
    return e instanceof Error && "code" in e && e.code === "EPERM";
  }
};

function readRunHeader(statePath: string): { status: string; pid: number | null } | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(statePath, "utf8"));
  } catch {
    // unreadable state never blocks a new run
    return null;
  }
  if (parsed === null || typeof parsed !== "object") return null;
  const status = "status" in parsed ? String(parsed.status) : "";
  const pid = "pid" in parsed && typeof parsed.pid === "number" ? parsed.pid : null;
  return { status, pid };
}

/**
 * Only `maxConcurrent` live runs per runs root. A non-terminal run whose
 * process is gone is stale and does not count.
 */
export function checkConcurrency(
  runsRoot: string,
  maxConcurrent: number = 1,
  pidAlive: PidProbe = isPidAlive,
): ConcurrencyCheck {
  if (!fs.existsSync(runsRoot)) {
    return { allowed: true };
  }

  const entries = fs.readdirSync(runsRoot, { withFileTypes: true });
  let activeCount = 0;

  for (const entry of entries) {
    if (!entry.isDirectory()) continue;

    const statePath = path.join(runsRoot, entry.name, "state.json");
    if (!fs.existsSync(statePath)) continue;

    const header = readRunHeader(statePath);
    if (!header || isTerminal(header.status)) continue;
    if (header.pid !== null && !pidAlive(header.pid)) continue;

    activeCount++;
    if (activeCount >= maxConcurrent) {
      return {
        allowed: false,
        activeId: entry.name,
        reason: `Active run already in progress: ${entry.name} (status: ${header.status})`,
      };
    }
  }

  return { allowed: true };
}
