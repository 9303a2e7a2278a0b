import path from "node:path";
import { stepFailure } from "./command.js";
import type { StepContext, StepOutcome } from "./context.js";

/**
 * Bring the orchestrating repository to the latest state of its tracked ref.
 * The ref is fetched explicitly because it may have moved since the run was requested.
 */
export async function runCheckoutMain(ctx: StepContext): Promise<StepOutcome> {
  const { remote, ref } = ctx.config.main_repo;
  let sha: string;
  try {
    sha = await ctx.deps.repo.syncBranch(remote, ref, { signal: ctx.signal });
  } catch (e) {
    throw stepFailure(ctx, "checkout_main", "CHECKOUT_FAILED", `Could not sync ${remote}/${ref}`, e);
  }

  ctx.reporter.info("CHECKOUT", `${ref} at ${sha}`, { step: "checkout_main", sha });
  return {
    status: "ok",
    outputs: { ref, sha, pinned_sources: { ...ctx.pinnedSources } },
  };
}

/** Acquire the upstream repository at its default branch (or configured ref). */
export async function runCheckoutUpstream(ctx: StepContext): Promise<StepOutcome> {
  const upstream = ctx.config.upstream_repo;
  const dir = path.resolve(ctx.workspace, upstream.path);
  let sha: string;
  try {
    sha = await ctx.deps.mirror(upstream.url, dir, {
      depth: upstream.depth,
      ref: upstream.ref ?? null,
      signal: ctx.signal,
    });
  } catch (e) {
    throw stepFailure(ctx, "checkout_upstream", "CHECKOUT_FAILED", `Could not fetch ${upstream.url}`, e);
  }

  ctx.reporter.info("CHECKOUT", `${upstream.path} at ${sha}`, { step: "checkout_upstream", sha });
  return { status: "ok", outputs: { url: upstream.url, path: upstream.path, sha } };
}
