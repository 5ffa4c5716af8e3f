import path from "node:path";
import { ClaimCoordinator } from "./claims.js";
import type { ClaimResult } from "./claims.js";
import { defaultConfig } from "./config.js";
import type { Config } from "./config.js";
import { InvalidTransitionError, StaleStateError } from "./errors.js";
import { ProposalLedger } from "./ledger/proposals.js";
import { TaskLedger } from "./ledger/tasks.js";
import type { TaskFilter } from "./ledger/tasks.js";
import { WorkspaceLedger } from "./ledger/workspaces.js";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";
import { MergeCoordinator } from "./merge/coordinator.js";
import type { MergeOutcome } from "./merge/coordinator.js";
import { MergeSlots } from "./merge/slots.js";
import { retry } from "./retry.js";
import { MemoryRecordStore } from "./store/memory.js";
import type { RecordStore, Stored } from "./store/record-store.js";
import { YamlRecordStore } from "./store/yaml.js";
import type { YamlStoreOptions } from "./store/yaml.js";
import { ProposalSchema, TaskSchema, WorkspaceSchema } from "./schemas.js";
import { SyncBroadcaster } from "./sync.js";
import type { FileChange, PatchSet, VersionedTree } from "./tree/types.js";
import type { Metadata, Proposal, Task, Workspace } from "./types.js";
import { systemClock } from "./utils.js";
import type { Clock } from "./utils.js";

export type EngineStores = {
  tasks: RecordStore<Task>;
  proposals: RecordStore<Proposal>;
  workspaces: RecordStore<Workspace>;
};

export function memoryStores(): EngineStores {
  return {
    tasks: new MemoryRecordStore<Task>("task"),
    proposals: new MemoryRecordStore<Proposal>("proposal"),
    workspaces: new MemoryRecordStore<Workspace>("workspace"),
  };
}

/** One directory per record kind under `stateDir`. */
export function yamlStores(stateDir: string, opts: Partial<YamlStoreOptions> = {}): EngineStores {
  return {
    tasks: new YamlRecordStore<Task>("task", path.join(stateDir, "tasks"), TaskSchema, opts),
    proposals: new YamlRecordStore<Proposal>("proposal", path.join(stateDir, "proposals"), ProposalSchema, opts),
    workspaces: new YamlRecordStore<Workspace>("workspace", path.join(stateDir, "workspaces"), WorkspaceSchema, opts),
  };
}

export type EngineOptions = {
  tree: VersionedTree;
  stores?: EngineStores;
  config?: Config;
  clock?: Clock;
  logger?: Logger;
};

export type SubmitOptions = {
  title?: string;
  description?: string;
  metadata?: Metadata;
};

export type PendingReview = {
  proposal: Stored<Proposal>;
  task: Stored<Task>;
  patch: PatchSet;
};

/**
 * Entry point for collaborators: task generation, workers and the reviewer
 * all go through here.
 */
export class Engine {
  readonly tree: VersionedTree;
  readonly config: Config;
  readonly tasks: TaskLedger;
  readonly proposals: ProposalLedger;
  readonly workspaces: WorkspaceLedger;
  readonly claims: ClaimCoordinator;
  readonly slots = new MergeSlots();
  readonly sync: SyncBroadcaster;
  readonly merges: MergeCoordinator;
  private logger: Logger;

  constructor(opts: EngineOptions) {
    const stores = opts.stores ?? memoryStores();
    const clock = opts.clock ?? systemClock;
    this.tree = opts.tree;
    this.config = opts.config ?? defaultConfig();
    this.logger = opts.logger ?? silentLogger;
    this.tasks = new TaskLedger(stores.tasks, clock);
    this.proposals = new ProposalLedger(stores.proposals, clock);
    this.workspaces = new WorkspaceLedger(stores.workspaces, clock);
    this.sync = new SyncBroadcaster(this.tree, this.workspaces, { retry: this.config.retry, logger: this.logger });
    this.claims = new ClaimCoordinator(this.tasks, this.sync, { leaseMinutes: this.config.leaseMinutes, clock, logger: this.logger });
    this.merges = new MergeCoordinator(this.tree, this.tasks, this.proposals, this.claims, this.slots, this.sync, {
      retry: this.config.retry,
      mergeSlotTimeoutMs: this.config.mergeSlotTimeoutMs,
      logger: this.logger,
    });
  }

  // ---------- Task generation ----------

  createTask(title: string, description = "", metadata: Metadata = {}) {
    return this.tasks.createTask(title, description, metadata);
  }

  listOpenTasks() {
    return this.tasks.listOpenTasks();
  }

  listTasks(filter?: TaskFilter) {
    return this.tasks.listTasks(filter);
  }

  getTask(id: string) {
    return this.tasks.getTask(id);
  }

  // ---------- Workspaces ----------

  /**
   * Create the worker's workspace from the current trunk. With `recreate` an
   * existing one is destroyed first, as on a worker restart.
   */
  async provisionWorkspace(workerId: string, opts: { recreate?: boolean } = {}): Promise<Stored<Workspace>> {
    const existing = await this.workspaces.find(workerId);
    if (existing && !opts.recreate) return existing;
    if (existing) {
      await this.tree.destroyWorkspace(this.workspaces.handleOf(existing));
      this.logger.log(`destroyed workspace ${existing.id} (${existing.root})`);
    }
    const trunk = await this.tree.revision(this.tree.trunk);
    const handle = await this.tree.provisionWorkspace(workerId, trunk);
    const ws = await this.workspaces.register(handle, trunk);
    this.logger.ok(`workspace ${ws.id} on ${ws.branch} at ${trunk}`);
    return ws;
  }

  listWorkspaces() {
    return this.workspaces.list();
  }

  /** Sync a workspace with trunk now; `resolutions` settle paths that conflict. */
  syncWorkspace(workspaceId: string, resolutions: FileChange[] = []) {
    return this.sync.ensureSynced(workspaceId, resolutions);
  }

  async commit(workspaceId: string, changes: FileChange[], message: string): Promise<string> {
    const ws = await this.workspaces.get(workspaceId);
    return retry(() => this.tree.commit(ws.branch, changes, message), this.config.retry);
  }

  // ---------- Claims ----------

  claim(workerId: string): Promise<ClaimResult> {
    return this.claims.claim(workerId);
  }

  renew(taskId: string, workerId: string) {
    return this.claims.renew(taskId, workerId);
  }

  release(taskId: string, workerId: string) {
    return this.claims.release(taskId, workerId);
  }

  reap() {
    return this.claims.reapExpired();
  }

  // ---------- Proposals ----------

  /**
   * Open a proposal for the task from the workspace's branch head, or refresh
   * the task's existing one. A rejected proposal reopens only on new commits.
   */
  async submitProposal(workspaceId: string, taskId: string, opts: SubmitOptions = {}): Promise<string> {
    const ws = await this.workspaces.get(workspaceId);
    const task = await this.tasks.getTask(taskId);
    if (task.owner !== ws.workerId || (task.status !== "assigned" && task.status !== "in_review")) {
      throw new StaleStateError(taskId, `task ${taskId} is ${task.status}/${task.owner ?? "-"}, not held by ${ws.workerId}`);
    }
    const head = await this.tree.revision(ws.branch);
    // a task reclaimed after its lease ran out carries the old owner's proposal
    const patch = {
      author: ws.workerId,
      workspaceId: ws.id,
      sourceBranch: ws.branch,
      headRevision: head,
      conflictingPaths: [],
      ...pickDefined(opts),
    };
    const existing = await this.proposals.activeForTask(taskId);

    let proposal: Stored<Proposal>;
    if (!existing) {
      proposal = await this.proposals.create({
        taskId,
        author: ws.workerId,
        workspaceId: ws.id,
        sourceBranch: ws.branch,
        targetBranch: this.tree.trunk,
        title: opts.title ?? task.title,
        description: opts.description ?? task.description,
        headRevision: head,
        metadata: opts.metadata,
      });
      this.logger.log(`${ws.workerId} opened ${proposal.id} for ${taskId}`);
    } else if (existing.status === "open") {
      const unchanged = existing.headRevision === head && existing.author === ws.workerId && !existing.conflictingPaths.length;
      proposal = unchanged
        ? existing
        : await this.proposals.transition(existing.id, "open", "open", patch);
    } else if (existing.status === "rejected") {
      if (existing.headRevision === head && existing.author === ws.workerId) {
        throw new InvalidTransitionError("proposal", existing.id, "rejected", "open");
      }
      proposal = await this.proposals.transition(existing.id, "rejected", "open", patch, {
        author: ws.workerId,
        kind: "system",
        body: `Resubmitted at ${head}`,
      });
      this.logger.log(`${ws.workerId} resubmitted ${proposal.id}`);
    } else {
      if (existing.headRevision !== head) throw new InvalidTransitionError("proposal", existing.id, existing.status, "open");
      return existing.id;
    }

    if (existing && existing.author !== ws.workerId) this.logger.log(`${ws.workerId} took over ${proposal.id} from ${existing.author}`);
    if (task.status === "assigned") await this.claims.markInReview(taskId, ws.workerId, proposal.id);
    return proposal.id;
  }

  getProposal(id: string) {
    return this.proposals.get(id);
  }

  listProposals(filter?: { status?: Proposal["status"]; taskId?: string }) {
    return this.proposals.list(filter);
  }

  /** Open proposals with the diff a reviewer needs. */
  async pendingReviews(): Promise<PendingReview[]> {
    const out: PendingReview[] = [];
    for (const proposal of await this.proposals.list({ status: "open" })) {
      const task = await this.tasks.getTask(proposal.taskId);
      // waiting on its author to resolve a conflict
      if (task.status !== "in_review") continue;
      const patch = await retry(() => this.tree.diff(this.tree.trunk, proposal.headRevision), this.config.retry);
      out.push({ proposal, task, patch });
    }
    return out;
  }

  approve(id: string, opts: { reviewer?: string; comment?: string; merge?: boolean } = {}): Promise<MergeOutcome> {
    return this.merges.approve(id, opts);
  }

  reject(id: string, comments: string, reviewer?: string) {
    return this.merges.reject(id, comments, reviewer);
  }

  merge(id: string) {
    return this.merges.merge(id);
  }

  mergeApproved() {
    return this.merges.mergeApproved();
  }

  recover() {
    return this.merges.recoverInterrupted();
  }

  /** Wait for background workspace syncs. */
  drain() {
    return this.sync.drain();
  }
}

function pickDefined(opts: SubmitOptions): { title?: string; description?: string } {
  const out: { title?: string; description?: string } = {};
  if (opts.title !== undefined) out.title = opts.title;
  if (opts.description !== undefined) out.description = opts.description;
  return out;
}

export function createEngine(opts: EngineOptions) {
  return new Engine(opts);
}
