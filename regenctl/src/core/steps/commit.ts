import { filesOutsideSet } from "../../artifacts/artifact-set.js";
import type { StageResult } from "../../git/operations.js";
import { errorMessage } from "../errors.js";
import { stepFailure } from "./command.js";
import type { StepContext, StepOutcome } from "./context.js";

/** Fill `{actor}` in the commit message template. */
export function renderCommitMessage(template: string, actor: string): string {
  return template.split("{actor}").join(actor);
}

/** Author identity for the triggering actor. */
export function actorIdentity(actor: string): { name: string; email: string } {
  return { name: actor, email: `${actor}@users.noreply.github.com` };
}

/**
 * Stage the artifact set and record it as a single commit by the actor.
 * Dry runs never touch the index.
 */
export async function runCommit(ctx: StepContext): Promise<StepOutcome> {
  if (ctx.params.dryRun) {
    ctx.reporter.info("COMMIT_SKIPPED", "Dry run: results not committed", { step: "commit" });
    return { status: "skipped", outputs: { reason: "dry_run" } };
  }

  const { repo } = ctx.deps;
  const paths = ctx.config.artifacts;
  const git = { signal: ctx.signal };
  const fail = (message: string, e?: unknown) => stepFailure(ctx, "commit", "COMMIT_FAILED", message, e);

  let stage: StageResult;
  try {
    stage = await repo.stagePaths(paths, git);
  } catch (e) {
    throw fail("Could not stage artifacts", e);
  }

  if (stage.files.length === 0) {
    ctx.reporter.info("COMMIT_UNCHANGED", "Artifacts unchanged; nothing to commit", { step: "commit" });
    return { status: "ok", outputs: { committed: false, files: [] } };
  }
  ctx.reporter.info("STAGED", `${stage.files.length} changed file(s) under ${stage.pathspecs.join(", ")}`, {
    step: "commit",
  });

  const message = renderCommitMessage(ctx.config.commit.message, ctx.params.actor);
  let sha: string;
  try {
    sha = await repo.commit(
      {
        message,
        pathspecs: stage.pathspecs,
        author: actorIdentity(ctx.params.actor),
        committer: { name: ctx.config.commit.committer_name, email: ctx.config.commit.committer_email },
      },
      git,
    );
  } catch (e) {
    const failure = fail("Could not create commit", e);
    // no signal: the budget may already be spent
    try {
      await repo.unstagePaths(stage.pathspecs);
    } catch (resetError) {
      ctx.reporter.warn("UNSTAGE_FAILED", `Artifacts left staged: ${errorMessage(resetError)}`, { step: "commit" });
    }
    throw failure;
  }

  let files: string[];
  try {
    files = await repo.commitFiles(sha, git);
  } catch (e) {
    throw fail(`Could not list files of ${sha}`, e);
  }
  const outside = filesOutsideSet(files, paths);
  if (outside.length > 0) {
    throw fail(`Commit ${sha} touches files outside the artifact set: ${outside.join(", ")}`);
  }

  ctx.reporter.info("COMMITTED", `${sha} ${message}`, { step: "commit", sha, files: files.length });

  if (ctx.params.push) {
    const { remote, ref } = ctx.config.main_repo;
    try {
      await repo.push(remote, ref, git);
    } catch (e) {
      throw fail(`Could not push to ${remote}/${ref}`, e);
    }
    ctx.reporter.info("PUSHED", `Pushed ${sha} to ${remote}/${ref}`, { step: "commit" });
  }

  return { status: "ok", outputs: { committed: true, sha, message, files, pushed: ctx.params.push } };
}
