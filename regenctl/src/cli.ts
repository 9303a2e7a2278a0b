#!/usr/bin/env node

import path from "node:path";
import { Command, Option } from "commander";
import { regenerate } from "./commands/regenerate.js";
import { status, listRuns } from "./commands/status.js";
import { validateAll } from "./commands/validate.js";
import { EXIT } from "./commands/exit-codes.js";
import { loadConfig } from "./config/validator.js";
import { Reporter, type OutputFormat } from "./log/reporter.js";

const formatOption = () =>
  new Option("--format <format>", "Output format").choices(["human", "jsonl"]).default("human");

const program = new Command();

program
  .name("regenctl")
  .description("Regenerate benchmarking result artifacts and commit them")
  .version("0.1.0");

program
  .command("regenerate")
  .description("Check out, provision, install, regenerate results and commit them")
  .option("--force", "Regenerate all of the derived data, even if it already exists", false)
  .option("--dry-run", "Dry run: do not commit to the repo", false)
  .option("--actor <name>", "Actor the results commit is attributed to (default: $GITHUB_ACTOR)")
  .option("--no-push", "Commit locally without pushing")
  .option("--config <path>", "Path to config directory")
  .option("--env <name>", "Config environment overlay (loads <config>/<name>.yaml)")
  .option("--workspace <path>", "Repository to regenerate in", ".")
  .addOption(formatOption())
  .action(
    async (opts: {
      force: boolean;
      dryRun: boolean;
      actor?: string;
      push: boolean;
      config?: string;
      env?: string;
      workspace: string;
      format: OutputFormat;
    }) => {
      const reporter = new Reporter(opts.format);
      const res = await regenerate({
        force: opts.force,
        dryRun: opts.dryRun,
        actor: opts.actor,
        // --no-push only ever lowers the configured setting
        push: opts.push ? undefined : false,
        configDir: opts.config,
        envName: opts.env,
        workspace: opts.workspace,
        reporter,
      });

      if (!res.ok) {
        reporter.error(res.code ?? "RUN_FAILED", res.error, { run_id: res.runId, state_path: res.statePath });
        process.exit(res.exitCode);
      }

      if (opts.format === "jsonl") {
        process.stdout.write(
          JSON.stringify({ level: "info", code: "OK", runId: res.runId, statePath: res.statePath, commitSha: res.commitSha }) +
            "\n",
        );
      } else {
        console.log(res.commitSha ? `Run ${res.runId}: committed ${res.commitSha}` : `Run ${res.runId}: ${res.status}`);
      }
    },
  );

program
  .command("status")
  .description("Show run status")
  .argument("[id]", "Run ID (omit to list all)")
  .option("--config <path>", "Path to config directory")
  .option("--env <name>", "Config environment overlay")
  .option("--workspace <path>", "Repository the runs belong to", ".")
  .addOption(formatOption())
  .action(
    async (id: string | undefined, opts: { config?: string; env?: string; workspace: string; format: OutputFormat }) => {
      const loaded = await loadConfig({ configDir: opts.config, envName: opts.env });
      if (!loaded.ok) {
        console.error(loaded.error);
        process.exit(EXIT.INVALID_ARGS);
      }
      const runsRoot = path.resolve(opts.workspace, loaded.config.runs_root);

      if (id) {
        const res = status({ runsRoot, runId: id });
        if (!res.ok) {
          if (opts.format === "jsonl") {
            process.stdout.write(JSON.stringify({ level: "error", error: res.error }) + "\n");
          } else {
            console.error(res.error);
          }
          process.exit(EXIT.RUN_FAILED);
        }
        if (opts.format === "jsonl") {
          process.stdout.write(JSON.stringify(res.state) + "\n");
        } else {
          console.log(JSON.stringify(res.state, null, 2));
        }
        return;
      }

      const list = listRuns(runsRoot);
      if (opts.format === "jsonl") {
        for (const item of list) process.stdout.write(JSON.stringify(item) + "\n");
      } else {
        if (list.length === 0) {
          console.log("No runs found.");
          return;
        }
        for (const item of list) console.log(`${item.id}  ${item.status}  ${item.updated_at}`);
      }
    },
  );

program
  .command("validate")
  .description("Validate the layered configuration")
  .option("--config <path>", "Path to config directory")
  .option("--env <name>", "Config environment overlay")
  .option("--workspace <path>", "Also check workspace inputs (requirements file)")
  .addOption(formatOption())
  .action(async (opts: { config?: string; env?: string; workspace?: string; format: OutputFormat }) => {
    const res = await validateAll({ configDir: opts.config, envName: opts.env, workspace: opts.workspace });

    if (!res.ok) {
      if (opts.format === "jsonl") {
        for (const err of res.errors) process.stdout.write(JSON.stringify(err) + "\n");
      } else {
        for (const err of res.errors) console.error(err.message);
      }
      process.exit(EXIT.INVALID_ARGS);
    }

    if (opts.format === "jsonl") {
      for (const w of res.warnings) process.stdout.write(JSON.stringify(w) + "\n");
      process.stdout.write(JSON.stringify({ level: "info", code: "OK", message: "OK" }) + "\n");
    } else {
      for (const w of res.warnings) console.error(`warn: ${w.message}`);
      console.log("OK");
    }
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(JSON.stringify({ ok: false, error: message }) + "\n");
  process.exit(1);
});
