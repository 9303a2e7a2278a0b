import fs from "node:fs";
import path from "node:path";
import { simpleGit, type SimpleGit } from "simple-git";

/** Aborting `signal` kills the running git process. */
export type GitCallOptions = {
  signal?: AbortSignal;
};

export type CommitRequest = {
  message: string;
  /** Restricts the commit; never the per-file list, which can outgrow the argument limit. */
  pathspecs: string[];
  author: { name: string; email: string };
  committer: { name: string; email: string };
};

export type StageResult = {
  /** Configured paths that exist or are tracked. */
  pathspecs: string[];
  /** Files with staged changes under `pathspecs`. */
  files: string[];
};

/** Operations the pipeline needs on the orchestrating repository. */
export interface RepoClient {
  /** Fetch `remote/ref` and fast-forward the local `ref` to it. Returns the new HEAD sha. */
  syncBranch(remote: string, ref: string, opts?: GitCallOptions): Promise<string>;
  stagePaths(paths: string[], opts?: GitCallOptions): Promise<StageResult>;
  /** Drop staged changes under `pathspecs`, leaving the working tree as is. */
  unstagePaths(pathspecs: string[], opts?: GitCallOptions): Promise<void>;
  /** Returns the new commit sha. */
  commit(req: CommitRequest, opts?: GitCallOptions): Promise<string>;
  /** Files touched by a commit. */
  commitFiles(sha: string, opts?: GitCallOptions): Promise<string[]>;
  push(remote: string, ref: string, opts?: GitCallOptions): Promise<void>;
}

export type MirrorOptions = GitCallOptions & {
  depth: number;
  ref?: string | null;
};

/** Clone-or-update a secondary repository into `dir`. Returns its HEAD sha. */
export type RepoMirror = (url: string, dir: string, opts: MirrorOptions) => Promise<string>;

function gitAt(baseDir: string, signal?: AbortSignal): SimpleGit {
  return simpleGit(signal ? { baseDir, abort: signal } : { baseDir });
}

/** Split `-z` output; names come back unquoted whatever their characters. */
function splitNul(out: string): string[] {
  return out.split("\0").filter((l) => l.length > 0);
}

/**
 * Git access for the workspace repository, over simple-git.
 */
export class GitOperations implements RepoClient {
  constructor(private readonly repoPath: string) {}

  private git(opts?: GitCallOptions): SimpleGit {
    return gitAt(this.repoPath, opts?.signal);
  }

  async syncBranch(remote: string, ref: string, opts?: GitCallOptions): Promise<string> {
    const git = this.git(opts);
    await git.fetch(remote, ref);
    await git.checkout(ref);
    await git.merge(["--ff-only", `${remote}/${ref}`]);
    return (await git.revparse(["HEAD"])).trim();
  }

  async stagePaths(paths: string[], opts?: GitCallOptions): Promise<StageResult> {
    const git = this.git(opts);
    const tracked = splitNul(await git.raw(["ls-files", "-z", "--", ...paths]));
    const pathspecs = paths.filter(
      (p) => fs.existsSync(path.join(this.repoPath, p)) || tracked.some((t) => t === p || t.startsWith(`${p}/`)),
    );
    if (pathspecs.length === 0) return { pathspecs, files: [] };

    await git.raw(["add", "-A", "--", ...pathspecs]);
    const files = splitNul(await git.raw(["diff", "--cached", "--name-only", "-z", "--", ...pathspecs]));
    return { pathspecs, files };
  }

  async unstagePaths(pathspecs: string[], opts?: GitCallOptions): Promise<void> {
    if (pathspecs.length === 0) return;
    await this.git(opts).raw(["reset", "-q", "--", ...pathspecs]);
  }

  async commit(req: CommitRequest, opts?: GitCallOptions): Promise<string> {
    const git = this.git(opts);
    await git.raw([
      "-c",
      `user.name=${req.committer.name}`,
      "-c",
      `user.email=${req.committer.email}`,
      "commit",
      "-m",
      req.message,
      `--author=${req.author.name} <${req.author.email}>`,
      "--",
      ...req.pathspecs,
    ]);
    return (await git.revparse(["HEAD"])).trim();
  }

  async commitFiles(sha: string, opts?: GitCallOptions): Promise<string[]> {
    const out = await this.git(opts).raw(["diff-tree", "--no-commit-id", "--name-only", "-r", "-z", "--root", sha]);
    return splitNul(out);
  }

  async push(remote: string, ref: string, opts?: GitCallOptions): Promise<void> {
    await this.git(opts).push(remote, `HEAD:${ref}`);
  }
}

/**
 * Shallow-clone `url` into `dir`, or refresh an existing clone to the tip of
 * `ref` (the remote's default branch when unset).
 */
export const mirrorRepository: RepoMirror = async (url, dir, opts) => {
  const target = path.resolve(dir);
  const depthArgs = opts.depth > 0 ? ["--depth", String(opts.depth)] : [];

  if (fs.existsSync(path.join(target, ".git"))) {
    const git = gitAt(target, opts.signal);
    await git.fetch(["origin", opts.ref ?? "HEAD", ...depthArgs]);
    await git.reset(["--hard", "FETCH_HEAD"]);
    return (await git.revparse(["HEAD"])).trim();
  }

  fs.mkdirSync(path.dirname(target), { recursive: true });
  const cloneArgs = opts.ref ? [...depthArgs, "--branch", opts.ref] : depthArgs;
  await gitAt(path.dirname(target), opts.signal).clone(url, target, cloneArgs);
  return (await gitAt(target, opts.signal).revparse(["HEAD"])).trim();
};
