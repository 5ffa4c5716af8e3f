import { describe, it, expect } from "vitest";
import { parseConfig } from "../config.js";
import { Engine } from "../engine.js";
import { InvalidTransitionError } from "../errors.js";
import { MemoryTree } from "../tree/memory.js";
import type { FileChange, MergeResult } from "../tree/types.js";
import { captureLogger, FakeClock, FAST_RETRY } from "./helpers.js";

/** Counts merges into trunk that are running at the same time. */
class TrackingTree extends MemoryTree {
  running = 0;
  peak = 0;

  async merge(source: string, target: string, message: string, resolutions?: FileChange[]): Promise<MergeResult> {
    if (target !== this.trunk) return super.merge(source, target, message, resolutions);
    this.running++;
    this.peak = Math.max(this.peak, this.running);
    try {
      return await super.merge(source, target, message, resolutions);
    } finally {
      this.running--;
    }
  }
}

function setup(tree: MemoryTree = new MemoryTree("main", { "foo.py": "base\n", "README.md": "hi\n" })) {
  const clock = new FakeClock();
  const logs = captureLogger();
  const engine = new Engine({ tree, config: parseConfig({ retry: FAST_RETRY }), clock: clock.clock, logger: logs.logger });
  return { engine, tree, clock, logs };
}

/** Provision, create a task, claim it, commit and submit. */
async function work(engine: Engine, worker: string, title: string, changes: FileChange[]) {
  await engine.provisionWorkspace(worker);
  const taskId = await engine.createTask(title);
  const claim = await engine.claim(worker);
  if (claim.kind !== "claimed" || claim.task.id !== taskId) throw new Error(`${worker} did not get ${taskId}`);
  await engine.commit(worker, changes, title);
  const proposalId = await engine.submitProposal(worker, taskId);
  return { taskId, proposalId };
}

describe("MergeCoordinator", () => {
  it("merges an approved proposal and completes its task", async () => {
    const { engine, tree } = setup();
    await engine.provisionWorkspace("B");
    const { taskId, proposalId } = await work(engine, "A", "edit foo", [{ path: "foo.py", content: "A\n" }]);
    expect((await engine.getTask(taskId)).status).toBe("in_review");

    const outcome = await engine.approve(proposalId, { reviewer: "lead", comment: "ship it" });
    const trunk = await tree.revision("main");
    expect(outcome).toMatchObject({ kind: "merged", revision: trunk });

    const p = await engine.getProposal(proposalId);
    expect(p.status).toBe("merged");
    expect(p.mergeRevision).toBe(trunk);
    expect(p.touchedPaths).toEqual(["foo.py"]);
    expect(p.comments.map((c) => [c.author, c.kind, c.verdict, c.body])).toEqual([
      ["lead", "review", "approved", "ship it"],
      ["coderelay", "system", undefined, `Merged into main at ${trunk}`],
    ]);
    const t = await engine.getTask(taskId);
    expect(t.status).toBe("completed");
    expect(t.archivedAt).toBeDefined();
    expect(await tree.readFile("main", "foo.py")).toBe("A\n");

    await engine.drain();
    const b = await engine.workspaces.get("B");
    expect(b).toMatchObject({ syncedRevision: trunk, status: "synced" });
    // the source workspace catches up when it is next synced
    expect((await engine.syncWorkspace("A")).syncedRevision).toBe(trunk);
  });

  it("skips proposals that are not approved", async () => {
    const { engine } = setup();
    const { proposalId } = await work(engine, "A", "edit foo", [{ path: "foo.py", content: "A\n" }]);
    expect(await engine.merge(proposalId)).toMatchObject({ kind: "skipped", reason: "proposal is open" });
  });

  it("rejects with feedback and reopens only after new commits", async () => {
    const { engine } = setup();
    const { taskId, proposalId } = await work(engine, "A", "edit foo", [{ path: "foo.py", content: "A\n" }]);
    const rejected = await engine.reject(proposalId, "needs a test", "lead");
    expect(rejected.status).toBe("rejected");
    expect(await engine.getTask(taskId)).toMatchObject({ status: "assigned", owner: "A" });

    await expect(engine.submitProposal("A", taskId)).rejects.toBeInstanceOf(InvalidTransitionError);

    await engine.commit("A", [{ path: "test_foo.py", content: "assert True\n" }], "add test");
    expect(await engine.submitProposal("A", taskId)).toBe(proposalId);
    const p = await engine.getProposal(proposalId);
    expect(p.status).toBe("open");
    expect(p.comments.map((c) => c.kind)).toEqual(["review", "system"]);
    expect(p.comments[0].body).toBe("needs a test");
    expect(await engine.getTask(taskId)).toMatchObject({ status: "in_review", proposalId });
    expect((await engine.pendingReviews()).map((r) => r.patch.entries.map((e) => e.path))).toEqual([["foo.py", "test_foo.py"]]);
  });

  it("refreshes an open proposal's head on resubmission", async () => {
    const { engine, tree } = setup();
    const { taskId, proposalId } = await work(engine, "A", "edit foo", [{ path: "foo.py", content: "A\n" }]);
    await engine.commit("A", [{ path: "foo.py", content: "A2\n" }], "tweak");
    expect(await engine.submitProposal("A", taskId, { title: "edit foo, take 2" })).toBe(proposalId);
    const p = await engine.getProposal(proposalId);
    expect(p.headRevision).toBe(await tree.revision("workspace/A"));
    expect(p.title).toBe("edit foo, take 2");
  });

  it("returns a conflicting proposal to its author and merges the resolution", async () => {
    const { engine, tree } = setup();
    const p1 = await work(engine, "A", "A edits foo", [{ path: "foo.py", content: "A\n" }]);
    const p2 = await work(engine, "C", "C edits foo", [{ path: "foo.py", content: "C\n" }]);

    expect((await engine.approve(p1.proposalId)).kind).toBe("merged");
    await engine.drain();
    const outcome = await engine.approve(p2.proposalId);
    expect(outcome).toMatchObject({ kind: "conflict", conflictingPaths: ["foo.py"] });

    const p = await engine.getProposal(p2.proposalId);
    expect(p.status).toBe("open");
    expect(p.conflictingPaths).toEqual(["foo.py"]);
    expect(p.comments[p.comments.length - 1]).toMatchObject({
      author: "coderelay",
      kind: "system",
      body: "Merge into main conflicts on: foo.py. Sync the workspace with main and resubmit.",
    });
    expect(await engine.getTask(p2.taskId)).toMatchObject({ status: "assigned", owner: "C" });
    expect(await tree.readFile("main", "foo.py")).toBe("A\n");
    expect(await engine.pendingReviews()).toEqual([]);

    // the broadcast could not fast-forward C and the trunk merge conflicted
    expect(await engine.workspaces.get("C")).toMatchObject({ status: "diverged", conflictingPaths: ["foo.py"] });
    expect((await engine.claim("C")).kind).toBe("blocked");

    const synced = await engine.syncWorkspace("C", [{ path: "foo.py", content: "A\nC\n" }]);
    expect(synced).toMatchObject({ status: "synced", syncedRevision: await tree.revision("main") });
    await engine.submitProposal("C", p2.taskId);
    expect((await engine.getProposal(p2.proposalId)).conflictingPaths).toEqual([]);
    expect((await engine.approve(p2.proposalId)).kind).toBe("merged");
    expect(await tree.readFile("main", "foo.py")).toBe("A\nC\n");
  });

  it("serializes merges whose paths overlap", async () => {
    const tree = new TrackingTree("main", { "shared.txt": "base" }, 5);
    const { engine } = setup(tree);
    const a = await work(engine, "A", "a", [{ path: "shared.txt", content: "A" }, { path: "a.txt", content: "a" }]);
    const b = await work(engine, "B", "b", [{ path: "shared.txt", content: "B" }, { path: "b.txt", content: "b" }]);
    await engine.approve(a.proposalId, { merge: false });
    await engine.approve(b.proposalId, { merge: false });
    const outcomes = await Promise.all([engine.merge(a.proposalId), engine.merge(b.proposalId)]);
    expect(tree.peak).toBe(1);
    expect(outcomes.map((o) => o.kind)).toEqual(["merged", "conflict"]);
    await engine.drain();
  });

  it("merges disjoint proposals in parallel", async () => {
    const tree = new TrackingTree("main", {}, 5);
    const { engine } = setup(tree);
    const a = await work(engine, "A", "a", [{ path: "a.txt", content: "a" }]);
    const b = await work(engine, "B", "b", [{ path: "b.txt", content: "b" }]);
    await engine.approve(a.proposalId, { merge: false });
    await engine.approve(b.proposalId, { merge: false });
    const outcomes = await engine.mergeApproved();
    expect(tree.peak).toBe(2);
    expect(outcomes.map((o) => o.kind)).toEqual(["merged", "merged"]);
    expect(await tree.readFile("main", "a.txt")).toBe("a");
    expect(await tree.readFile("main", "b.txt")).toBe("b");
    await engine.drain();
  });

  it("retries transient merge failures", async () => {
    const { engine, tree, logs } = setup();
    const { proposalId } = await work(engine, "A", "edit foo", [{ path: "foo.py", content: "A\n" }]);
    tree.injectFailures("merge", 2);
    expect((await engine.approve(proposalId)).kind).toBe("merged");
    expect(logs.out.filter((l) => l.includes(`WARN: merge of ${proposalId} failed`))).toHaveLength(2);
    expect(logs.err).toEqual([]);
  });

  it("leaves the proposal approved once retries run out", async () => {
    const { engine, tree, logs } = setup();
    const { taskId, proposalId } = await work(engine, "A", "edit foo", [{ path: "foo.py", content: "A\n" }]);
    tree.injectFailures("merge", 3);
    const outcome = await engine.approve(proposalId);
    expect(outcome.kind).toBe("failed");
    const p = await engine.getProposal(proposalId);
    expect(p.status).toBe("approved");
    expect(p.lastError).toBe("gave up after 3 attempts: injected merge failure");
    expect(logs.err).toHaveLength(1);
    expect(logs.err[0]).toContain(`ERROR: merge of ${proposalId} failed; left approved: injected merge failure`);
    expect((await engine.getTask(taskId)).status).toBe("in_review");

    expect((await engine.merge(proposalId)).kind).toBe("merged");
    expect((await engine.getProposal(proposalId)).lastError).toBeUndefined();
  });

  it("records a diff that keeps failing and merges on the next attempt", async () => {
    const { engine, tree, logs } = setup();
    const { taskId, proposalId } = await work(engine, "A", "edit foo", [{ path: "foo.py", content: "A\n" }]);
    tree.injectFailures("diff", 3);
    const outcome = await engine.approve(proposalId);
    expect(outcome).toMatchObject({ kind: "failed", proposal: { id: proposalId, status: "approved" } });
    const p = await engine.getProposal(proposalId);
    expect(p.status).toBe("approved");
    expect(p.lastError).toBe("gave up after 3 attempts: injected diff failure");
    expect(logs.err).toHaveLength(1);
    expect(logs.err[0]).toContain(`ERROR: merge of ${proposalId} failed; left approved: injected diff failure`);
    expect((await engine.getTask(taskId)).status).toBe("in_review");

    expect((await engine.merge(proposalId)).kind).toBe("merged");
    expect((await engine.getProposal(proposalId)).lastError).toBeUndefined();
    await engine.drain();
  });

  it("keeps every outcome when one of several approved proposals fails", async () => {
    const { engine, tree, logs } = setup(new MemoryTree("main", {}));
    const a = await work(engine, "A", "a", [{ path: "a.txt", content: "a" }]);
    const b = await work(engine, "B", "b", [{ path: "b.txt", content: "b" }]);
    await engine.approve(a.proposalId, { merge: false });
    await engine.approve(b.proposalId, { merge: false });
    // three attempts each: one proposal runs out, the other gets through
    tree.injectFailures("diff", 5);

    const outcomes = await engine.mergeApproved();
    expect(outcomes.map((o) => o.kind).sort()).toEqual(["failed", "merged"]);
    const failed = outcomes.find((o) => o.kind === "failed");
    const merged = outcomes.find((o) => o.kind === "merged");
    expect((await engine.getProposal(failed?.proposal.id ?? "")).lastError).toBe("gave up after 3 attempts: injected diff failure");
    expect((await engine.getProposal(merged?.proposal.id ?? "")).status).toBe("merged");
    expect(logs.err).toHaveLength(1);
    await engine.drain();
  });

  it("completes a task that another worker took over after its lease ran out", async () => {
    const { engine, tree, clock, logs } = setup();
    await engine.provisionWorkspace("B");
    const { taskId, proposalId } = await work(engine, "A", "edit foo", [{ path: "foo.py", content: "A\n" }]);
    await engine.reject(proposalId, "wrong approach", "lead");

    clock.advanceMinutes(31);
    expect(await engine.reap()).toEqual([taskId]);
    const claim = await engine.claim("B");
    expect(claim.kind === "claimed" && claim.task.id).toBe(taskId);
    await engine.commit("B", [{ path: "foo.py", content: "B\n" }], "redo foo");
    expect(await engine.submitProposal("B", taskId)).toBe(proposalId);
    expect(await engine.getProposal(proposalId)).toMatchObject({
      status: "open",
      author: "B",
      workspaceId: "B",
      sourceBranch: "workspace/B",
      headRevision: await tree.revision("workspace/B"),
    });
    expect(await engine.getTask(taskId)).toMatchObject({ status: "in_review", owner: "B" });

    expect(await engine.approve(proposalId)).toMatchObject({ kind: "merged" });
    expect(await engine.getTask(taskId)).toMatchObject({ status: "completed", owner: "B" });
    expect(await tree.readFile("main", "foo.py")).toBe("B\n");
    expect(logs.err).toEqual([]);

    await engine.drain();
    // the broadcast skips B, the new author, and reaches A's abandoned edit
    expect(await engine.workspaces.get("A")).toMatchObject({ status: "diverged", conflictingPaths: ["foo.py"] });
  });

  it("recovers proposals left merging by an interrupted run", async () => {
    const { engine, tree } = setup();
    const one = await work(engine, "A", "one", [{ path: "one.txt", content: "1" }]);
    const two = await work(engine, "B", "two", [{ path: "two.txt", content: "2" }]);
    for (const { proposalId } of [one, two]) {
      await engine.approve(proposalId, { merge: false });
      await engine.proposals.transition(proposalId, "approved", "merging");
    }
    // `two` reached trunk before the crash, `one` did not
    const p2 = await engine.getProposal(two.proposalId);
    await tree.merge(p2.headRevision, "main", "merge two");

    const recovered = await engine.recover();
    expect(recovered.map((p) => [p.id, p.status])).toEqual(
      [[one.proposalId, "approved"], [two.proposalId, "merged"]].sort((x, y) => x[0].localeCompare(y[0])),
    );
    expect((await engine.getProposal(one.proposalId)).lastError).toBe("interrupted merge");
    expect((await engine.getTask(two.taskId)).status).toBe("completed");
    await engine.drain();
  });
});
