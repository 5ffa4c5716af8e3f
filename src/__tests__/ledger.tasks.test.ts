import { describe, it, expect, beforeEach } from "vitest";
import { InvalidTransitionError, NotFoundError, StaleStateError } from "../errors.js";
import { TaskLedger } from "../ledger/tasks.js";
import { MemoryRecordStore } from "../store/memory.js";
import type { Task } from "../types.js";
import { FakeClock } from "./helpers.js";

let clock: FakeClock;
let ledger: TaskLedger;

beforeEach(() => {
  clock = new FakeClock();
  ledger = new TaskLedger(new MemoryRecordStore<Task>("task"), clock.clock);
});

describe("TaskLedger", () => {
  it("creates open, unowned tasks", async () => {
    const id = await ledger.createTask("Fix login", "the form 500s", { priority: 2 });
    expect(id).toMatch(/^T-20260101T000000-fix-login-[0-9a-f]{4}$/);
    const t = await ledger.getTask(id);
    expect(t).toMatchObject({
      title: "Fix login",
      description: "the form 500s",
      status: "open",
      owner: null,
      leaseExpiresAt: null,
      attempts: 0,
      metadata: { priority: 2 },
      version: 1,
    });
  });

  it("lists open tasks oldest first", async () => {
    const a = await ledger.createTask("first");
    clock.advance(1000);
    const b = await ledger.createTask("second");
    await ledger.updateStatus(a, "open", "assigned", "w1");
    clock.advance(1000);
    const c = await ledger.createTask("third");
    expect((await ledger.listOpenTasks()).map((t) => t.id)).toEqual([b, c]);
  });

  it("assigns through compare-and-swap on status and owner", async () => {
    const id = await ledger.createTask("t");
    const lease = "2026-01-01T00:30:00.000Z";
    const t = await ledger.updateStatus(id, "open", "assigned", "w1", { leaseExpiresAt: lease });
    expect(t).toMatchObject({ status: "assigned", owner: "w1", leaseExpiresAt: lease, attempts: 1, version: 2 });

    await expect(ledger.updateStatus(id, "open", "assigned", "w2")).rejects.toBeInstanceOf(StaleStateError);
    await expect(ledger.updateStatus(id, "assigned", "open", "w2")).rejects.toBeInstanceOf(StaleStateError);
  });

  it("clears owner and lease when a task reopens", async () => {
    const id = await ledger.createTask("t");
    await ledger.updateStatus(id, "open", "assigned", "w1", { leaseExpiresAt: "2026-01-01T00:30:00.000Z" });
    const t = await ledger.updateStatus(id, "assigned", "open", "w1");
    expect(t).toMatchObject({ status: "open", owner: null, leaseExpiresAt: null });
  });

  it("rejects transitions outside the state machine", async () => {
    const id = await ledger.createTask("t");
    await expect(ledger.updateStatus(id, "open", "completed", "w1")).rejects.toBeInstanceOf(InvalidTransitionError);
    await expect(ledger.updateStatus(id, "open", "in_review", "w1")).rejects.toBeInstanceOf(InvalidTransitionError);
  });

  it("archives completed tasks instead of deleting them", async () => {
    const id = await ledger.createTask("t");
    await ledger.updateStatus(id, "open", "assigned", "w1");
    await ledger.updateStatus(id, "assigned", "in_review", "w1", { proposalId: "P-1" });
    clock.advance(5000);
    const done = await ledger.updateStatus(id, "in_review", "completed", "w1");
    expect(done.completedAt).toBe("2026-01-01T00:00:05.000Z");
    expect(done.archivedAt).toBe("2026-01-01T00:00:05.000Z");
    expect(done.proposalId).toBe("P-1");
    expect(done.owner).toBe("w1");
    expect(await ledger.listTasks()).toEqual([]);
    expect((await ledger.listTasks({ includeArchived: true })).map((t) => t.id)).toEqual([id]);
    expect((await ledger.listTasks({ status: "completed" })).map((t) => t.id)).toEqual([id]);
  });

  it("filters by owner", async () => {
    const a = await ledger.createTask("a");
    await ledger.createTask("b");
    await ledger.updateStatus(a, "open", "assigned", "w1");
    expect((await ledger.listTasks({ owner: "w1" })).map((t) => t.id)).toEqual([a]);
  });

  it("reports unknown tasks", async () => {
    await expect(ledger.getTask("T-missing")).rejects.toBeInstanceOf(NotFoundError);
  });
});
