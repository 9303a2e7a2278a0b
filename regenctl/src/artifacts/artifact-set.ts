import { createHash } from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import { Minimatch } from "minimatch";

export type ArtifactEntry =
  | { path: string; kind: "file"; present: true; bytes: number; sha256: string }
  | { path: string; kind: "directory"; present: true; files: number }
  | { path: string; kind: "missing"; present: false };

export type ArtifactRecord = {
  recorded_at: string;
  artifacts: ArtifactEntry[];
};

function sha256Of(file: string): string {
  return createHash("sha256").update(fs.readFileSync(file)).digest("hex");
}

function countFiles(dir: string): number {
  let count = 0;
  for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
    if (entry.isDirectory()) count += countFiles(path.join(dir, entry.name));
    else if (entry.isFile()) count++;
  }
  return count;
}

/** Describe each configured artifact path as it exists under `root`. */
export function describeArtifacts(root: string, paths: string[]): ArtifactEntry[] {
  return paths.map((p): ArtifactEntry => {
    const full = path.join(root, p);
    if (!fs.existsSync(full)) return { path: p, kind: "missing", present: false };
    const st = fs.statSync(full);
    if (st.isDirectory()) return { path: p, kind: "directory", present: true, files: countFiles(full) };
    return { path: p, kind: "file", present: true, bytes: st.size, sha256: sha256Of(full) };
  });
}

/** Write `artifacts.json` into the run directory. */
export function writeArtifactRecord(runDir: string, entries: ArtifactEntry[]): string {
  const record: ArtifactRecord = { recorded_at: new Date().toISOString(), artifacts: entries };
  const out = path.join(runDir, "artifacts.json");
  fs.mkdirSync(runDir, { recursive: true });
  fs.writeFileSync(out, JSON.stringify(record, null, 2) + "\n", "utf8");
  return out;
}

/** Glob patterns covering the artifact set; a directory entry covers everything below it. */
export function artifactPatterns(paths: string[]): string[] {
  return paths.flatMap((p) => {
    const clean = p.replace(/\/+$/, "");
    return [clean, `${clean}/**`];
  });
}

/** Files from `files` that fall outside the artifact set. */
export function filesOutsideSet(files: string[], paths: string[]): string[] {
  const matchers = artifactPatterns(paths).map((pat) => new Minimatch(pat, { dot: true }));
  return files.filter((f) => !matchers.some((m) => m.match(f)));
}
