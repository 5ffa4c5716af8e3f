import { ConflictError, IOError, NotFoundError } from "../errors.js";
import { sleep } from "../retry.js";
import type { FileChange, MergeResult, PatchEntry, PatchSet, VersionedTree, WorkspaceHandle } from "./types.js";
import { workspaceBranch } from "./types.js";

type Files = Record<string, string>;

type Commit = {
  id: string;
  parents: string[];
  generation: number;
  files: Files;
  message: string;
};

type FaultableOp = "commit" | "diff" | "merge" | "fastForward";

/**
 * In-process versioned tree: whole-snapshot commits with parent links and a
 * path-level three-way merge. Used for tests and for embedding the engine
 * without a git checkout.
 */
export class MemoryTree implements VersionedTree {
  private commits = new Map<string, Commit>();
  private branches = new Map<string, string>();
  private seq = 0;
  private faults = new Map<FaultableOp, number>();

  constructor(
    readonly trunk = "main",
    initialFiles: Files = {},
    private latencyMs = 0,
  ) {
    const root = this.addCommit([], { ...initialFiles }, "initial");
    this.branches.set(trunk, root.id);
  }

  /** Make the next `count` calls of `op` fail with an IOError. */
  injectFailures(op: FaultableOp, count: number) {
    this.faults.set(op, count);
  }

  private async enter(op: FaultableOp) {
    if (this.latencyMs > 0) await sleep(this.latencyMs);
    const left = this.faults.get(op) ?? 0;
    if (left > 0) {
      this.faults.set(op, left - 1);
      throw new IOError(`injected ${op} failure`);
    }
  }

  private addCommit(parents: string[], files: Files, message: string): Commit {
    const generation = parents.reduce((g, p) => Math.max(g, this.commitOf(p).generation + 1), 0);
    const commit: Commit = { id: `r${++this.seq}`, parents, generation, files, message };
    this.commits.set(commit.id, commit);
    return commit;
  }

  private commitOf(id: string): Commit {
    const c = this.commits.get(id);
    if (!c) throw new NotFoundError("revision", id);
    return c;
  }

  private resolve(ref: string): Commit {
    return this.commitOf(this.branches.get(ref) ?? ref);
  }

  private headOf(branch: string): Commit {
    const id = this.branches.get(branch);
    if (!id) throw new NotFoundError("branch", branch);
    return this.commitOf(id);
  }

  private ancestors(id: string): Set<string> {
    const seen = new Set<string>();
    const stack = [id];
    while (stack.length) {
      const cur = stack.pop();
      if (cur === undefined || seen.has(cur)) continue;
      seen.add(cur);
      stack.push(...this.commitOf(cur).parents);
    }
    return seen;
  }

  private mergeBase(a: Commit, b: Commit): Commit {
    const fromB = this.ancestors(b.id);
    let best: Commit | null = null;
    for (const id of this.ancestors(a.id)) {
      if (!fromB.has(id)) continue;
      const c = this.commitOf(id);
      if (!best || c.generation > best.generation) best = c;
    }
    // every commit descends from the initial one
    if (!best) throw new IOError(`no common ancestor for ${a.id} and ${b.id}`);
    return best;
  }

  private changes(from: Files, to: Files): PatchEntry[] {
    const entries: PatchEntry[] = [];
    for (const p of new Set([...Object.keys(from), ...Object.keys(to)])) {
      if (!(p in from)) entries.push({ path: p, kind: "added" });
      else if (!(p in to)) entries.push({ path: p, kind: "deleted" });
      else if (from[p] !== to[p]) entries.push({ path: p, kind: "modified" });
    }
    return entries.sort((x, y) => x.path.localeCompare(y.path));
  }

  async revision(ref: string): Promise<string> {
    return this.resolve(ref).id;
  }

  async isAncestor(ancestor: string, descendant: string): Promise<boolean> {
    return this.ancestors(this.resolve(descendant).id).has(this.resolve(ancestor).id);
  }

  async createBranch(name: string, base: string): Promise<string> {
    if (this.branches.has(name)) throw new IOError(`branch already exists: ${name}`);
    this.branches.set(name, this.resolve(base).id);
    return name;
  }

  async commit(branch: string, changes: FileChange[], message: string): Promise<string> {
    await this.enter("commit");
    const head = this.headOf(branch);
    const files: Files = { ...head.files };
    for (const ch of changes) {
      if (ch.content === null) delete files[ch.path];
      else files[ch.path] = ch.content;
    }
    if (this.changes(head.files, files).length === 0) return head.id;
    const c = this.addCommit([head.id], files, message);
    this.branches.set(branch, c.id);
    return c.id;
  }

  async diff(a: string, b: string): Promise<PatchSet> {
    await this.enter("diff");
    const ca = this.resolve(a);
    const cb = this.resolve(b);
    const base = this.mergeBase(ca, cb);
    return { entries: this.changes(base.files, cb.files) };
  }

  async merge(source: string, target: string, message: string, resolutions: FileChange[] = []): Promise<MergeResult> {
    await this.enter("merge");
    const s = this.resolve(source);
    const t = this.headOf(target);
    if (this.ancestors(t.id).has(s.id)) return { success: true, revision: t.id };

    const base = this.mergeBase(s, t).files;
    const resolved = new Map(resolutions.map((r) => [r.path, r.content]));
    const merged: Files = {};
    const conflicts: string[] = [];
    for (const p of new Set([...Object.keys(base), ...Object.keys(s.files), ...Object.keys(t.files)])) {
      const b = base[p];
      const sv = s.files[p];
      const tv = t.files[p];
      let out: string | undefined;
      if (sv === tv) out = sv;
      else if (sv === b) out = tv;
      else if (tv === b) out = sv;
      else if (resolved.has(p)) out = resolved.get(p) ?? undefined;
      else { conflicts.push(p); continue; }
      if (out !== undefined) merged[p] = out;
    }
    if (conflicts.length) return { success: false, conflictingPaths: conflicts.sort() };

    const c = this.addCommit([t.id, s.id], merged, message);
    this.branches.set(target, c.id);
    return { success: true, revision: c.id };
  }

  async fastForward(workspace: WorkspaceHandle, targetRevision: string): Promise<string> {
    await this.enter("fastForward");
    const head = this.headOf(workspace.branch);
    const target = this.resolve(targetRevision);
    const headAncestors = this.ancestors(head.id);
    if (headAncestors.has(target.id)) return head.id;
    if (!this.ancestors(target.id).has(head.id)) {
      const base = this.mergeBase(head, target);
      throw new ConflictError(this.changes(base.files, head.files).map((e) => e.path), `${workspace.branch} has diverged from ${target.id}`);
    }
    this.branches.set(workspace.branch, target.id);
    return target.id;
  }

  async readFile(ref: string, path: string): Promise<string | null> {
    return this.resolve(ref).files[path] ?? null;
  }

  async provisionWorkspace(workerId: string, base: string): Promise<WorkspaceHandle> {
    const branch = await this.createBranch(workspaceBranch(workerId), base);
    return { workerId, branch, root: `memory://${workerId}` };
  }

  async destroyWorkspace(handle: WorkspaceHandle): Promise<void> {
    this.branches.delete(handle.branch);
  }
}
