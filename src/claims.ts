import { LeaseExpiredError, StaleStateError } from "./errors.js";
import type { TaskLedger } from "./ledger/tasks.js";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";
import type { Stored } from "./store/record-store.js";
import type { Task, Workspace } from "./types.js";
import { addMinutes, systemClock } from "./utils.js";
import type { Clock } from "./utils.js";

export type ClaimResult =
  | { kind: "claimed"; task: Stored<Task>; lostRaces: number; resumed: boolean }
  | { kind: "idle"; lostRaces: number }
  | { kind: "blocked"; workspace: Stored<Workspace> };

/** What the coordinator needs from the broadcaster before it hands out work. */
export interface SyncGate {
  ensureSynced(workspaceId: string): Promise<Stored<Workspace>>;
}

export type ClaimOptions = {
  leaseMinutes?: number;
  clock?: Clock;
  logger?: Logger;
};

export class ClaimCoordinator {
  private leaseMinutes: number;
  private clock: Clock;
  private logger: Logger;

  constructor(
    private tasks: TaskLedger,
    private sync: SyncGate,
    opts: ClaimOptions = {},
  ) {
    this.leaseMinutes = opts.leaseMinutes ?? 30;
    this.clock = opts.clock ?? systemClock;
    this.logger = opts.logger ?? silentLogger;
  }

  private lease() {
    return addMinutes(this.clock(), this.leaseMinutes).toISOString();
  }

  private expired(t: Task) {
    return t.leaseExpiresAt !== null && Date.parse(t.leaseExpiresAt) <= this.clock().getTime();
  }

  /**
   * Hand `workerId` a task. The worker's workspace (keyed by worker id) is
   * synced to trunk first; a task it already holds is returned as is.
   */
  async claim(workerId: string): Promise<ClaimResult> {
    const workspace = await this.sync.ensureSynced(workerId);
    if (workspace.status === "diverged") {
      this.logger.warn(`${workerId} cannot claim: workspace conflicts on ${workspace.conflictingPaths.join(", ")}`);
      return { kind: "blocked", workspace };
    }
    const held = await this.tasks.listTasks({ status: "assigned", owner: workerId });
    const current = held.find((t) => !this.expired(t));
    if (current) return { kind: "claimed", task: current, lostRaces: 0, resumed: true };
    return this.tryClaim(workerId, await this.tasks.listOpenTasks());
  }

  /** CAS through `candidates` in order; a lost race moves on to the next one. */
  async tryClaim(workerId: string, candidates: Task[]): Promise<ClaimResult> {
    let lostRaces = 0;
    for (const c of candidates) {
      try {
        const task = await this.tasks.updateStatus(c.id, "open", "assigned", workerId, { leaseExpiresAt: this.lease() });
        this.logger.log(`${workerId} claimed ${task.id}`);
        return { kind: "claimed", task, lostRaces, resumed: false };
      } catch (e) {
        if (!(e instanceof StaleStateError)) throw e;
        lostRaces++;
        this.logger.debug(`${workerId} lost ${c.id}: ${e.message}`);
      }
    }
    return { kind: "idle", lostRaces };
  }

  async renew(taskId: string, workerId: string): Promise<Stored<Task>> {
    const t = await this.tasks.getTask(taskId);
    if (t.status !== "assigned" || t.owner !== workerId) throw new StaleStateError(taskId, `task ${taskId} is not assigned to ${workerId}`);
    if (t.leaseExpiresAt !== null && this.expired(t)) {
      await this.reopen(t);
      throw new LeaseExpiredError(taskId, t.leaseExpiresAt);
    }
    return this.tasks.updateStatus(taskId, "assigned", "assigned", workerId, { leaseExpiresAt: this.lease() });
  }

  async release(taskId: string, workerId: string): Promise<Stored<Task>> {
    const task = await this.tasks.updateStatus(taskId, "assigned", "open", workerId);
    this.logger.log(`${workerId} released ${taskId}`);
    return task;
  }

  /** Return every assigned task whose lease has run out to the open pool. */
  async reapExpired(): Promise<string[]> {
    const reaped: string[] = [];
    for (const t of await this.tasks.listTasks({ status: "assigned" })) {
      if (this.expired(t) && (await this.reopen(t))) reaped.push(t.id);
    }
    return reaped;
  }

  private async reopen(t: Task): Promise<boolean> {
    if (t.owner === null) return false;
    try {
      await this.tasks.updateStatus(t.id, "assigned", "open", t.owner);
      this.logger.log(`lease on ${t.id} held by ${t.owner} expired; task reopened`);
      return true;
    } catch (e) {
      if (e instanceof StaleStateError) return false;
      throw e;
    }
  }

  async markInReview(taskId: string, workerId: string, proposalId: string): Promise<Stored<Task>> {
    return this.tasks.updateStatus(taskId, "assigned", "in_review", workerId, { proposalId });
  }

  /** After a rejection or a merge conflict the same owner continues, on a fresh lease. */
  async returnToOwner(taskId: string, owner: string): Promise<Stored<Task>> {
    return this.tasks.updateStatus(taskId, "in_review", "assigned", owner, { leaseExpiresAt: this.lease() });
  }

  async complete(taskId: string, owner: string): Promise<Stored<Task>> {
    return this.tasks.updateStatus(taskId, "in_review", "completed", owner);
  }
}
