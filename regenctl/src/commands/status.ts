import fs from "node:fs";
import path from "node:path";
import { loadState, statePathFor, type RunState } from "../core/state.js";

export type StatusResult =
  | { ok: true; state: RunState }
  | { ok: false; error: string };

export type RunSummary = { id: string; status: string; updated_at: string };

/**
 * Read run state for a given ID.
 */
export function status(opts: { runsRoot: string; runId: string }): StatusResult {
  if (opts.runId.includes("/") || opts.runId.includes("\\") || opts.runId.includes("..")) {
    return { ok: false, error: `Invalid run id: ${opts.runId}` };
  }

  const statePath = statePathFor(opts.runsRoot, opts.runId);
  if (!fs.existsSync(statePath)) {
    return { ok: false, error: `No run found: ${opts.runId}` };
  }

  try {
    return { ok: true, state: loadState(statePath) };
  } catch (e) {
    return { ok: false, error: `Failed to read state: ${e instanceof Error ? e.message : String(e)}` };
  }
}

/**
 * List all runs with their current status, newest first.
 */
export function listRuns(runsRoot: string): RunSummary[] {
  if (!fs.existsSync(runsRoot)) return [];

  const entries = fs.readdirSync(runsRoot, { withFileTypes: true });
  const results: RunSummary[] = [];

  for (const entry of entries) {
    if (!entry.isDirectory()) continue;
    const statePath = path.join(runsRoot, entry.name, "state.json");
    if (!fs.existsSync(statePath)) continue;

    try {
      const state = loadState(statePath);
      results.push({
        id: entry.name,
        status: String(state.status ?? "unknown"),
        updated_at: String(state.updated_at ?? ""),
      });
    } catch {
      results.push({ id: entry.name, status: "corrupted", updated_at: "" });
    }
  }

  return results.sort((a, b) => b.updated_at.localeCompare(a.updated_at));
}
