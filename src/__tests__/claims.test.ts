import { describe, it, expect, beforeEach } from "vitest";
import { ClaimCoordinator } from "../claims.js";
import type { SyncGate } from "../claims.js";
import { LeaseExpiredError, StaleStateError } from "../errors.js";
import { TaskLedger } from "../ledger/tasks.js";
import { MemoryRecordStore } from "../store/memory.js";
import type { Stored } from "../store/record-store.js";
import type { Task, Workspace } from "../types.js";
import { captureLogger, FakeClock } from "./helpers.js";

function workspace(id: string, patch: Partial<Workspace> = {}): Stored<Workspace> {
  return {
    id,
    workerId: id,
    branch: `workspace/${id}`,
    root: `memory://${id}`,
    syncedRevision: "r1",
    status: "synced",
    conflictingPaths: [],
    createdAt: "2026-01-01T00:00:00.000Z",
    updatedAt: "2026-01-01T00:00:00.000Z",
    version: 1,
    ...patch,
  };
}

class StubGate implements SyncGate {
  diverged = new Set<string>();
  calls: string[] = [];
  async ensureSynced(id: string) {
    this.calls.push(id);
    return this.diverged.has(id) ? workspace(id, { status: "diverged", conflictingPaths: ["foo.py"] }) : workspace(id);
  }
}

let clock: FakeClock;
let tasks: TaskLedger;
let gate: StubGate;
let claims: ClaimCoordinator;
let logs: ReturnType<typeof captureLogger>;

beforeEach(() => {
  clock = new FakeClock();
  tasks = new TaskLedger(new MemoryRecordStore<Task>("task"), clock.clock);
  gate = new StubGate();
  logs = captureLogger();
  claims = new ClaimCoordinator(tasks, gate, { leaseMinutes: 30, clock: clock.clock, logger: logs.logger });
});

async function seed(n: number) {
  const ids: string[] = [];
  for (let i = 1; i <= n; i++) {
    ids.push(await tasks.createTask(`task ${i}`));
    clock.advance(1000);
  }
  return ids;
}

describe("ClaimCoordinator.claim", () => {
  it("gives concurrent workers distinct tasks without surfacing lost races", async () => {
    const ids = await seed(3);
    const results = await Promise.all(["A", "B", "C"].map((w) => claims.claim(w)));
    const owned = results.map((r) => (r.kind === "claimed" ? r.task.id : null));
    expect(new Set(owned)).toEqual(new Set(ids));
    for (const id of ids) {
      const t = await tasks.getTask(id);
      expect(t.status).toBe("assigned");
      expect(t.attempts).toBe(1);
    }
    expect(logs.err).toEqual([]);
  });

  it("lets exactly one of K workers win a single open task", async () => {
    const [id] = await seed(1);
    const results = await Promise.all(["A", "B", "C", "D"].map((w) => claims.claim(w)));
    expect(results.filter((r) => r.kind === "claimed")).toHaveLength(1);
    expect(results.filter((r) => r.kind === "idle")).toHaveLength(3);
    const t = await tasks.getTask(id);
    expect(t.owner).not.toBeNull();
    expect(logs.err).toEqual([]);
  });

  it("moves past a task lost since the snapshot was read", async () => {
    const [t1, t2] = await seed(2);
    const snapshot = await tasks.listOpenTasks();
    const a = await claims.tryClaim("A", snapshot);
    expect(a.kind === "claimed" && a.task.id).toBe(t1);
    const b = await claims.tryClaim("B", snapshot);
    expect(b).toMatchObject({ kind: "claimed", lostRaces: 1 });
    expect(b.kind === "claimed" && b.task.id).toBe(t2);
    expect(logs.out.some((l) => l.includes(`DEBUG: B lost ${t1}`))).toBe(true);
    expect(logs.err).toEqual([]);
  });

  it("returns the task a worker already holds", async () => {
    await seed(2);
    const first = await claims.claim("A");
    const again = await claims.claim("A");
    expect(again).toMatchObject({ kind: "claimed", resumed: true });
    expect(first.kind === "claimed" && again.kind === "claimed" && again.task.id === first.task.id).toBe(true);
    expect((await tasks.listTasks({ owner: "A" })).length).toBe(1);
  });

  it("syncs the workspace first and blocks while it is diverged", async () => {
    await seed(1);
    gate.diverged.add("A");
    const res = await claims.claim("A");
    expect(res.kind).toBe("blocked");
    expect(gate.calls).toEqual(["A"]);
    expect((await tasks.listOpenTasks()).length).toBe(1);
  });

  it("reports idle when nothing is open", async () => {
    expect(await claims.claim("A")).toEqual({ kind: "idle", lostRaces: 0 });
  });
});

describe("leases", () => {
  it("sets a lease on claim and extends it on renew", async () => {
    const [id] = await seed(1);
    await claims.claim("A");
    expect((await tasks.getTask(id)).leaseExpiresAt).toBe("2026-01-01T00:30:01.000Z");
    clock.advanceMinutes(20);
    const renewed = await claims.renew(id, "A");
    expect(renewed.leaseExpiresAt).toBe("2026-01-01T00:50:01.000Z");
  });

  it("reopens the task when renewing an expired lease", async () => {
    const [id] = await seed(1);
    await claims.claim("A");
    clock.advanceMinutes(31);
    await expect(claims.renew(id, "A")).rejects.toBeInstanceOf(LeaseExpiredError);
    expect(await tasks.getTask(id)).toMatchObject({ status: "open", owner: null });
  });

  it("reaps expired claims so another worker can take them", async () => {
    const [t1, t2] = await seed(2);
    await claims.claim("A");
    clock.advanceMinutes(10);
    await claims.claim("B");
    clock.advanceMinutes(25);
    expect(await claims.reapExpired()).toEqual([t1]);
    expect((await tasks.getTask(t2)).status).toBe("assigned");
    const c = await claims.claim("C");
    expect(c.kind === "claimed" && c.task.id).toBe(t1);
    expect((await tasks.getTask(t1)).attempts).toBe(2);
  });

  it("does not hand back an expired task as the one a worker holds", async () => {
    const [t1, t2] = await seed(2);
    await claims.claim("A");
    clock.advanceMinutes(31);
    const res = await claims.claim("A");
    expect(res.kind === "claimed" && res.task.id).toBe(t2);
    expect((await tasks.getTask(t1)).owner).toBe("A");
  });
});

describe("release", () => {
  it("only the owner can release", async () => {
    const [id] = await seed(1);
    await claims.claim("A");
    await expect(claims.release(id, "B")).rejects.toBeInstanceOf(StaleStateError);
    expect((await claims.release(id, "A")).status).toBe("open");
  });
});
