import { InvalidTransitionError, NotFoundError, StaleStateError } from "../errors.js";
import type { RecordStore, Stored } from "../store/record-store.js";
import type { Metadata, Task, TaskStatus } from "../types.js";
import { makeId, systemClock } from "../utils.js";
import type { Clock } from "../utils.js";

export type TaskFilter = {
  status?: TaskStatus | TaskStatus[];
  owner?: string;
  includeArchived?: boolean;
};

export type TaskPatch = {
  leaseExpiresAt?: string | null;
  proposalId?: string;
  metadata?: Metadata;
};

// assigned -> assigned renews the lease
const TRANSITIONS: Record<TaskStatus, readonly TaskStatus[]> = {
  open: ["assigned"],
  assigned: ["assigned", "open", "in_review"],
  in_review: ["assigned", "completed"],
  completed: [],
};

function byCreation(a: Task, b: Task) {
  return a.createdAt.localeCompare(b.createdAt) || a.id.localeCompare(b.id);
}

export class TaskLedger {
  constructor(
    private store: RecordStore<Task>,
    private clock: Clock = systemClock,
  ) {}

  async createTask(title: string, description = "", metadata: Metadata = {}): Promise<string> {
    const now = this.clock();
    const stamp = now.toISOString();
    const task: Task = {
      id: makeId("T", title, now),
      title,
      description,
      status: "open",
      owner: null,
      createdAt: stamp,
      updatedAt: stamp,
      leaseExpiresAt: null,
      attempts: 0,
      metadata,
    };
    await this.store.create(task);
    return task.id;
  }

  async getTask(id: string): Promise<Stored<Task>> {
    const t = await this.store.get(id);
    if (!t) throw new NotFoundError("task", id);
    return t;
  }

  /** Snapshot of claimable tasks, oldest first. May be stale by the time it is used. */
  async listOpenTasks(): Promise<Stored<Task>[]> {
    return this.listTasks({ status: "open" });
  }

  async listTasks(filter: TaskFilter = {}): Promise<Stored<Task>[]> {
    const statuses = filter.status === undefined ? null : Array.isArray(filter.status) ? filter.status : [filter.status];
    const wantsArchived = filter.includeArchived || statuses?.includes("completed");
    return (await this.store.list())
      .filter((t) => !statuses || statuses.includes(t.status))
      .filter((t) => filter.owner === undefined || t.owner === filter.owner)
      .filter((t) => wantsArchived || !t.archivedAt)
      .sort(byCreation);
  }

  /**
   * Compare-and-swap on (status, owner). The expected owner is `null` when
   * `expectedStatus` is `open`, otherwise `owner`; the new owner is `null`
   * when `newStatus` is `open`, otherwise `owner`.
   */
  async updateStatus(
    id: string,
    expectedStatus: TaskStatus,
    newStatus: TaskStatus,
    owner: string,
    patch: TaskPatch = {},
  ): Promise<Stored<Task>> {
    if (!TRANSITIONS[expectedStatus].includes(newStatus)) throw new InvalidTransitionError("task", id, expectedStatus, newStatus);
    const cur = await this.getTask(id);
    const expectedOwner = expectedStatus === "open" ? null : owner;
    if (cur.status !== expectedStatus || cur.owner !== expectedOwner) {
      throw new StaleStateError(id, `task ${id} is ${cur.status}/${cur.owner ?? "-"}, expected ${expectedStatus}/${expectedOwner ?? "-"}`);
    }

    const stamp = this.clock().toISOString();
    const next: Task = {
      ...cur,
      status: newStatus,
      owner: newStatus === "open" ? null : owner,
      updatedAt: stamp,
      leaseExpiresAt: newStatus === "assigned" ? (patch.leaseExpiresAt ?? cur.leaseExpiresAt) : null,
      attempts: expectedStatus === "open" ? cur.attempts + 1 : cur.attempts,
      proposalId: patch.proposalId ?? cur.proposalId,
      metadata: patch.metadata ? { ...cur.metadata, ...patch.metadata } : cur.metadata,
    };
    if (newStatus === "completed") {
      next.completedAt = stamp;
      next.archivedAt = stamp;
    }
    return this.store.compareAndSwap(id, cur.version, next);
  }
}
