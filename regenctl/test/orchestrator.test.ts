import { describe, expect, it, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import path from "node:path";
import os from "node:os";
import { Orchestrator, type OrchestratorOptions } from "../src/core/orchestrator.js";
import { loadState } from "../src/core/state.js";
import { DEFAULT_STEPS } from "../src/core/steps/index.js";
import type { RegenParams } from "../src/core/steps/context.js";
import { ARTIFACTS, captureReporter, fakeExec, FakeRepo, PINNED, testConfig } from "./helpers.js";

describe("orchestrator", () => {
  let tmpDir: string;
  let repo: FakeRepo;
  let mirrored: Array<{ url: string; dir: string; depth: number; ref: string | null | undefined }>;

  const params = (over: Partial<RegenParams> = {}): RegenParams => ({
    force: false,
    dryRun: false,
    actor: "octo",
    push: false,
    ...over,
  });

  function build(
    exec = fakeExec().exec,
    extra: Partial<OrchestratorOptions> = {},
  ): { orch: Orchestrator; out: string[] } {
    const { reporter, out } = captureReporter();
    const orch = new Orchestrator({
      config: testConfig(),
      workspace: tmpDir,
      deps: {
        repo,
        exec,
        mirror: async (url, dir, opts) => {
          mirrored.push({ url, dir, depth: opts.depth, ref: opts.ref });
          return "3333333333333333333333333333333333333333";
        },
      },
      reporter,
      pidAlive: () => true,
      ...extra,
    });
    return { orch, out };
  }

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "regen-orch-"));
    repo = new FakeRepo();
    mirrored = [];
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("force=false, dry_run=false: generates without --force and commits the artifact set", async () => {
    const { exec, calls } = fakeExec();
    const { orch } = build(exec);

    const result = await orch.run(params());

    expect(result.started).toBe(true);
    if (!result.started) return;
    expect(result.success).toBe(true);
    expect(result.final_status).toBe("done");

    expect(calls.map((c) => [c.cmd, ...c.args].join(" "))).toEqual([
      "python3.11 --version",
      "python3.11 -m pip install -r requirements.txt",
      "python3.11 -m bench_runner generate_results",
    ]);

    expect(repo.commits).toHaveLength(1);
    expect(repo.commits[0].message).toBe("Benchmarking results for @octo");
    expect(repo.commits[0].author).toEqual({ name: "octo", email: "octo@users.noreply.github.com" });
    expect(repo.commits[0].committer).toEqual({ name: "results-bot", email: "results-bot@example.com" });
    expect(repo.commits[0].pathspecs).toEqual(ARTIFACTS);
    expect(repo.calls[1]).toBe(
      "stage results,README.md,RESULTS.md,longitudinal.png,longitudinal.json,profiling/profiling.png,profiling/profiling.md",
    );
    expect(result.commit_sha).toBe(repo.commitSha);
  });

  it("force=true: generation carries --force and still commits", async () => {
    const { exec, calls } = fakeExec();
    const { orch } = build(exec);

    const result = await orch.run(params({ force: true }));

    expect(result.started && result.success).toBe(true);
    const gen = calls.find((c) => c.args.includes("bench_runner"));
    expect(gen?.args).toEqual(["-m", "bench_runner", "generate_results", "--force"]);
    expect(repo.commits).toHaveLength(1);
  });

  it("dry_run=true: generation runs but nothing is staged or committed", async () => {
    const { exec, calls } = fakeExec();
    const { orch } = build(exec);

    const result = await orch.run(params({ dryRun: true, force: true }));

    expect(result.started).toBe(true);
    if (!result.started) return;
    expect(result.success).toBe(true);
    expect(result.step_results.commit?.status).toBe("skipped");
    expect(calls.some((c) => c.args.includes("generate_results"))).toBe(true);
    expect(repo.calls).toEqual(["sync origin/main"]);
    expect(repo.commits).toHaveLength(0);
    expect(result.commit_sha).toBeNull();
  });

  it("generation exiting nonzero halts the run before any commit", async () => {
    const { exec } = fakeExec((_cmd, args) => (args.includes("generate_results") ? { code: 2, stderr: "boom" } : undefined));
    const { orch } = build(exec);

    const result = await orch.run(params());

    expect(result.started).toBe(true);
    if (!result.started) return;
    expect(result.success).toBe(false);
    expect(result.final_status).toBe("failed_generate");
    expect(result.error).toEqual({
      code: "GENERATE_FAILED",
      step: "generate",
      message: "python3.11 -m bench_runner generate_results exited with code 2",
    });
    expect(result.step_results.commit).toBeUndefined();
    expect(repo.commits).toHaveLength(0);
    expect(repo.calls).toEqual(["sync origin/main"]);
  });

  it("generation failure under dry run also ends without commit", async () => {
    const { exec } = fakeExec((_cmd, args) => (args.includes("generate_results") ? { code: 1 } : undefined));
    const { orch } = build(exec);

    const result = await orch.run(params({ dryRun: true }));

    expect(result.started && result.final_status).toBe("failed_generate");
    expect(repo.commits).toHaveLength(0);
  });

  it("passes pinned sources unchanged to checkout and into the command environment", async () => {
    const { exec, calls } = fakeExec();
    const { orch } = build(exec);

    const result = await orch.run(params());

    expect(result.started).toBe(true);
    if (!result.started) return;
    expect(result.step_results.checkout_main?.outputs).toEqual({
      ref: "main",
      sha: repo.headSha,
      pinned_sources: PINNED,
    });
    const gen = calls.find((c) => c.args.includes("generate_results"));
    expect(gen?.opts.env?.PYPERFORMANCE_HASH).toBe(PINNED.PYPERFORMANCE_HASH);
    expect(gen?.opts.env?.PYSTON_BENCHMARKS_HASH).toBe(PINNED.PYSTON_BENCHMARKS_HASH);
    expect(gen?.opts.cwd).toBe(tmpDir);
  });

  it("fetches the upstream repository without pinning a ref", async () => {
    const { orch } = build();

    await orch.run(params());

    expect(mirrored).toEqual([
      { url: "https://example.invalid/upstream.git", dir: path.join(tmpDir, "cpython"), depth: 1, ref: null },
    ]);
  });

  it("checkout failure stops before anything runs", async () => {
    repo.syncError = new Error("Not possible to fast-forward, aborting.");
    const { exec, calls } = fakeExec();
    const { orch } = build(exec);

    const result = await orch.run(params());

    expect(result.started).toBe(true);
    if (!result.started) return;
    expect(result.final_status).toBe("failed_checkout_main");
    expect(result.error?.code).toBe("CHECKOUT_FAILED");
    expect(result.error?.message).toBe("Could not sync origin/main: Not possible to fast-forward, aborting.");
    expect(calls).toHaveLength(0);
    expect(mirrored).toHaveLength(0);
  });

  it("aborts a stalled checkout once its budget runs out", async () => {
    repo.stallSync = true;
    const { exec, calls } = fakeExec();
    const { orch } = build(exec, {
      config: testConfig({ timeouts: { checkout_main: 0.01 } }),
      timeoutGraceMs: 60_000,
    });

    const result = await orch.run(params());

    expect(result.started).toBe(true);
    if (!result.started) return;
    expect(repo.signals).toHaveLength(1);
    expect(repo.signals[0].aborted).toBe(true);
    expect(result.final_status).toBe("timeout_checkout_main");
    expect(result.error).toEqual({
      code: "STEP_TIMEOUT",
      step: "checkout_main",
      message: "Could not sync origin/main: step exceeded 10ms",
    });
    expect(result.step_results.checkout_main?.status).toBe("timeout");
    expect(calls).toHaveLength(0);
    expect(mirrored).toHaveLength(0);
  });

  it("fails provisioning when no candidate is on the pinned minor version", async () => {
    const { exec, calls } = fakeExec((_cmd, args) => (args[0] === "--version" ? { stdout: "Python 3.12.1" } : undefined));
    const { orch } = build(exec);

    const result = await orch.run(params());

    expect(result.started).toBe(true);
    if (!result.started) return;
    expect(result.final_status).toBe("failed_provision");
    expect(result.error?.code).toBe("PROVISION_FAILED");
    expect(result.error?.message).toBe("No Python 3.11 interpreter found (python3.11=3.12.1, python3=3.12.1)");
    expect(calls).toHaveLength(2);
  });

  it("install failure is reported as INSTALL_FAILED", async () => {
    const { exec } = fakeExec((_cmd, args) => (args.includes("pip") ? { code: 1 } : undefined));
    const { orch } = build(exec);

    const result = await orch.run(params());

    expect(result.started && result.error?.code).toBe("INSTALL_FAILED");
    expect(repo.commits).toHaveLength(0);
  });

  it("records unchanged artifacts without creating a commit", async () => {
    repo.staged = [];
    const { orch } = build();

    const result = await orch.run(params());

    expect(result.started).toBe(true);
    if (!result.started) return;
    expect(result.success).toBe(true);
    expect(result.step_results.commit?.outputs).toEqual({ committed: false, files: [] });
    expect(repo.commits).toHaveLength(0);
    expect(result.commit_sha).toBeNull();
  });

  it("rejects a commit that touches files outside the artifact set", async () => {
    repo.committedFiles = ["results/run-1.json", "setup.py"];
    const { orch } = build();

    const result = await orch.run(params());

    expect(result.started).toBe(true);
    if (!result.started) return;
    expect(result.final_status).toBe("failed_commit");
    expect(result.error?.message).toBe(
      `Commit ${repo.commitSha} touches files outside the artifact set: setup.py`,
    );
  });

  it("unstages the artifacts when the commit cannot be created", async () => {
    repo.commitError = new Error("unable to write new index file");
    const { orch } = build();

    const result = await orch.run(params());

    expect(result.started).toBe(true);
    if (!result.started) return;
    expect(result.final_status).toBe("failed_commit");
    expect(result.error?.message).toBe("Could not create commit: unable to write new index file");
    expect(repo.calls.slice(-2)).toEqual(["commit", `unstage ${ARTIFACTS.join(",")}`]);
  });

  it("pushes after committing when push is enabled", async () => {
    const { orch } = build();

    const result = await orch.run(params({ push: true }));

    expect(result.started && result.success).toBe(true);
    expect(repo.calls.slice(-2)).toEqual([`show ${repo.commitSha}`, "push origin/main"]);
  });

  it("marks a step that outlives its budget as timed out", async () => {
    const { orch } = build(fakeExec().exec, {
      config: testConfig({ timeouts: { provision: 0.01 } }),
      steps: { ...DEFAULT_STEPS, provision: () => new Promise(() => undefined) },
      timeoutGraceMs: 0,
    });

    const result = await orch.run(params());

    expect(result.started).toBe(true);
    if (!result.started) return;
    expect(result.final_status).toBe("timeout_provision");
    expect(result.error?.code).toBe("STEP_TIMEOUT");
    expect(result.step_results.provision?.status).toBe("timeout");
    expect(result.step_results.install).toBeUndefined();
  });

  it("persists the final state and a progress log", async () => {
    const { orch } = build();

    const result = await orch.run(params());

    expect(result.started).toBe(true);
    if (!result.started) return;
    const state = loadState(result.state_path);
    expect(state.status).toBe("done");
    expect(state.actor).toBe("octo");
    expect(state.pid).toBe(process.pid);
    expect(state.step_started_at).toBeNull();
    expect(Object.keys(state.step_results)).toEqual([
      "checkout_main",
      "checkout_upstream",
      "provision",
      "install",
      "generate",
      "commit",
    ]);

    const runDir = path.dirname(result.state_path);
    expect(fs.existsSync(path.join(runDir, "progress.log"))).toBe(true);
    expect(fs.existsSync(path.join(runDir, "artifacts.json"))).toBe(true);
  });

  it("refuses to start while another live run is active", async () => {
    const activeDir = path.join(tmpDir, ".regen", "runs", "earlier-run");
    fs.mkdirSync(activeDir, { recursive: true });
    fs.writeFileSync(path.join(activeDir, "state.json"), JSON.stringify({ status: "generate", pid: 4242 }));
    const { exec, calls } = fakeExec();
    const { orch } = build(exec);

    const result = await orch.run(params());

    expect(result).toEqual({
      started: false,
      reason: "Active run already in progress: earlier-run (status: generate)",
      activeId: "earlier-run",
    });
    expect(calls).toHaveLength(0);
    expect(repo.calls).toHaveLength(0);
  });

  it("ignores a stale run whose process is gone", async () => {
    const staleDir = path.join(tmpDir, ".regen", "runs", "stale-run");
    fs.mkdirSync(staleDir, { recursive: true });
    fs.writeFileSync(path.join(staleDir, "state.json"), JSON.stringify({ status: "install", pid: 4242 }));
    const { orch } = build(fakeExec().exec, { pidAlive: () => false });

    const result = await orch.run(params());

    expect(result.started && result.success).toBe(true);
  });
});
