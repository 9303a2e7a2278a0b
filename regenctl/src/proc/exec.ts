/**
 * Process runner with timeout support
 */
import { spawn } from "node:child_process";

export interface ExecOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  timeoutMs?: number;
}

export interface ExecResult {
  code: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  durationMs: number;
  /** Set when the process could not be started at all (e.g. ENOENT). */
  spawnError?: string;
}

export type CommandRunner = (cmd: string, args: string[], opts?: ExecOptions) => Promise<ExecResult>;

const KILL_GRACE_MS = 5000;

/** Run a command without a shell. Never rejects; inspect the result instead. */
export const execCommand: CommandRunner = async (cmd, args, opts = {}) => {
  const { cwd, env, timeoutMs = 120_000 } = opts;
  const start = Date.now();

  return new Promise((resolve) => {
    const proc = spawn(cmd, args, {
      cwd,
      env: env ?? process.env,
      stdio: ["ignore", "pipe", "pipe"],
      shell: false,
    });

    let stdout = "";
    let stderr = "";
    let timedOut = false;
    let killTimer: NodeJS.Timeout | undefined;

    proc.stdout.on("data", (data: Buffer) => (stdout += data.toString()));
    proc.stderr.on("data", (data: Buffer) => (stderr += data.toString()));

    const timer = setTimeout(() => {
      timedOut = true;
      proc.kill("SIGTERM");
      killTimer = setTimeout(() => proc.kill("SIGKILL"), KILL_GRACE_MS);
    }, timeoutMs);

    const finish = (result: Omit<ExecResult, "durationMs">) => {
      clearTimeout(timer);
      if (killTimer) clearTimeout(killTimer);
      resolve({ ...result, durationMs: Date.now() - start });
    };

    proc.on("close", (code) => {
      finish({ code, stdout, stderr, timedOut });
    });

    proc.on("error", (err) => {
      finish({ code: null, stdout, stderr, timedOut: false, spawnError: err.message });
    });
  });
};

/**
 * Reduce an environment to an allowlist of keys, then layer `extra` on top.
 */
export function sanitizeEnv(
  env: NodeJS.ProcessEnv,
  allow: readonly string[],
  extra: Record<string, string> = {},
): NodeJS.ProcessEnv {
  const safe: NodeJS.ProcessEnv = {};
  for (const key of allow) {
    const value = env[key];
    if (value !== undefined) safe[key] = value;
  }
  return { ...safe, ...extra };
}

export function formatCommand(cmd: string, args: string[]): string {
  return [cmd, ...args].join(" ");
}
