import path from "node:path";
import * as fss from "node:fs";
import { execFileSync } from "node:child_process";
import { ConflictError, IOError } from "../errors.js";
import { sanitizeForPath } from "../home.js";
import { git, isAncestorRef, refExists } from "../utils.js";
import type { FileChange, MergeResult, PatchEntry, PatchSet, VersionedTree, WorkspaceHandle } from "./types.js";
import { workspaceBranch } from "./types.js";

function stderrOf(e: unknown): string {
  if (e instanceof Error && "stderr" in e) {
    const s = String(e.stderr ?? "").trim();
    if (s) return s;
  }
  return e instanceof Error ? e.message : String(e);
}

const STATUS_KIND: Record<string, PatchEntry["kind"]> = { A: "added", M: "modified", D: "deleted", T: "modified" };

/**
 * Git-backed tree. Trunk is the repository's main checkout; every workspace is
 * a `git worktree` on `workspace/<workerId>` under `worktreeBase`.
 *
 * All git calls are synchronous, so one operation never interleaves with
 * another inside this process.
 */
export class GitTree implements VersionedTree {
  constructor(
    readonly repoRoot: string,
    readonly trunk: string,
    readonly worktreeBase: string,
  ) {}

  private run(args: string[], cwd = this.repoRoot): string {
    try {
      return git(args, { cwd });
    } catch (e) {
      throw new IOError(`git ${args.join(" ")} failed: ${stderrOf(e)}`, { cause: e });
    }
  }

  /** Directory where `branch` is currently checked out, if any. */
  private checkoutDir(branch: string): string | null {
    const out = this.run(["worktree", "list", "--porcelain"]);
    let dir: string | null = null;
    for (const line of out.split("\n")) {
      if (line.startsWith("worktree ")) dir = line.slice("worktree ".length);
      else if (line === `branch refs/heads/${branch}`) return dir;
    }
    return null;
  }

  private requireCheckout(branch: string): string {
    const dir = this.checkoutDir(branch);
    if (!dir) throw new IOError(`branch ${branch} is not checked out in any worktree`);
    return dir;
  }

  private writeChanges(dir: string, changes: FileChange[]) {
    for (const ch of changes) {
      const abs = path.resolve(dir, ch.path);
      if (!abs.startsWith(path.resolve(dir) + path.sep)) throw new IOError(`path escapes the workspace: ${ch.path}`);
      if (ch.content === null) fss.rmSync(abs, { force: true });
      else {
        fss.mkdirSync(path.dirname(abs), { recursive: true });
        fss.writeFileSync(abs, ch.content, "utf8");
      }
    }
  }

  async revision(ref: string): Promise<string> {
    return this.run(["rev-parse", "--verify", `${ref}^{commit}`]);
  }

  async isAncestor(ancestor: string, descendant: string): Promise<boolean> {
    return isAncestorRef(ancestor, descendant, this.repoRoot);
  }

  async createBranch(name: string, base: string): Promise<string> {
    this.run(["branch", name, base]);
    return name;
  }

  async commit(branch: string, changes: FileChange[], message: string): Promise<string> {
    const dir = this.requireCheckout(branch);
    this.writeChanges(dir, changes);
    if (changes.length) this.run(["add", "-A", "--", ...changes.map((c) => c.path)], dir);
    const staged = this.run(["diff", "--cached", "--name-only"], dir);
    if (!staged) return this.run(["rev-parse", "HEAD"], dir);
    this.run(["commit", "-m", message], dir);
    return this.run(["rev-parse", "HEAD"], dir);
  }

  async diff(a: string, b: string): Promise<PatchSet> {
    const out = this.run(["diff", "--no-renames", "--name-status", `${a}...${b}`]);
    const entries: PatchEntry[] = [];
    for (const line of out.split("\n")) {
      if (!line.trim()) continue;
      const [status, file] = line.split("\t");
      if (!file) continue;
      entries.push({ path: file, kind: STATUS_KIND[status.charAt(0)] ?? "modified" });
    }
    return { entries: entries.sort((x, y) => x.path.localeCompare(y.path)) };
  }

  async merge(source: string, target: string, message: string, resolutions: FileChange[] = []): Promise<MergeResult> {
    const dir = this.requireCheckout(target);
    try {
      git(["merge", "--no-ff", "-m", message, source], { cwd: dir });
    } catch (e) {
      const conflicted = this.run(["diff", "--name-only", "--diff-filter=U"], dir)
        .split("\n").map((s) => s.trim()).filter(Boolean).sort();
      if (!conflicted.length) throw new IOError(`git merge ${source} into ${target} failed: ${stderrOf(e)}`, { cause: e });
      const covered = new Set(resolutions.map((r) => r.path));
      const open = conflicted.filter((p) => !covered.has(p));
      if (open.length) {
        this.run(["merge", "--abort"], dir);
        return { success: false, conflictingPaths: open };
      }
      this.writeChanges(dir, resolutions.filter((r) => conflicted.includes(r.path)));
      this.run(["add", "-A", "--", ...conflicted], dir);
      this.run(["commit", "--no-edit", "-m", message], dir);
    }
    return { success: true, revision: this.run(["rev-parse", "HEAD"], dir) };
  }

  async fastForward(workspace: WorkspaceHandle, targetRevision: string): Promise<string> {
    if (isAncestorRef(targetRevision, workspace.branch, this.repoRoot)) return this.revision(workspace.branch);
    if (!isAncestorRef(workspace.branch, targetRevision, this.repoRoot)) {
      const ours = await this.diff(targetRevision, workspace.branch);
      throw new ConflictError(ours.entries.map((e) => e.path), `${workspace.branch} has diverged from ${targetRevision}`);
    }
    this.run(["merge", "--ff-only", targetRevision], workspace.root);
    return this.run(["rev-parse", "HEAD"], workspace.root);
  }

  async readFile(ref: string, file: string): Promise<string | null> {
    if (!refExists(`${ref}:${file}`, this.repoRoot)) return null;
    try {
      // untrimmed: file content is returned byte for byte
      return execFileSync("git", ["show", `${ref}:${file}`], { cwd: this.repoRoot, stdio: "pipe", encoding: "utf8" });
    } catch (e) {
      throw new IOError(`git show ${ref}:${file} failed: ${stderrOf(e)}`, { cause: e });
    }
  }

  async provisionWorkspace(workerId: string, base: string): Promise<WorkspaceHandle> {
    const branch = workspaceBranch(workerId);
    const root = path.join(this.worktreeBase, sanitizeForPath(workerId));
    fss.mkdirSync(this.worktreeBase, { recursive: true });
    this.run(["worktree", "add", "-b", branch, root, base]);
    return { workerId, branch, root };
  }

  async destroyWorkspace(handle: WorkspaceHandle): Promise<void> {
    if (this.checkoutDir(handle.branch)) this.run(["worktree", "remove", "--force", handle.root]);
    this.run(["worktree", "prune"]);
    if (refExists(`refs/heads/${handle.branch}`, this.repoRoot)) this.run(["branch", "-D", handle.branch]);
  }
}
