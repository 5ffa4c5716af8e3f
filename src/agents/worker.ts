import type { Engine } from "../engine.js";
import { LeaseExpiredError, errorMessage, isExpected } from "../errors.js";
import type { Logger } from "../logger.js";
import { silentLogger } from "../logger.js";
import type { Stored } from "../store/record-store.js";
import type { FileChange } from "../tree/types.js";
import type { ReviewComment, Task, Workspace } from "../types.js";
import { pause } from "./loop.js";

export type WorkContext = {
  workspace: Workspace;
  /** Review and conflict comments from an earlier round on the same task. */
  feedback: ReviewComment[];
  /** Extends the claim lease; call it while work is in progress. */
  renew: () => Promise<void>;
};

export type WorkResult = {
  changes: FileChange[];
  message?: string;
  title?: string;
  description?: string;
};

export type ConflictContext = {
  workspace: Workspace;
  /** File content at a branch or revision, null where the path is absent. */
  read: (ref: string, path: string) => Promise<string | null>;
};

/** The worker's code-generation logic. Returning null gives the task back. */
export interface Implementer {
  implement(task: Task, ctx: WorkContext): Promise<WorkResult | null>;
  /**
   * Settle paths where trunk and the workspace both changed. The returned
   * content is used for those paths when trunk is merged in; null leaves
   * the workspace diverged.
   */
  resolve?(conflictingPaths: string[], ctx: ConflictContext): Promise<FileChange[] | null>;
}

export type WorkerStep =
  | { kind: "submitted"; taskId: string; proposalId: string }
  | { kind: "released"; taskId: string }
  | { kind: "expired"; taskId: string }
  | { kind: "idle" }
  | { kind: "blocked"; conflictingPaths: string[] };

export type WorkerOptions = {
  pollIntervalMs?: number;
  logger?: Logger;
};

/** Poll, claim, implement, commit, submit. */
export class WorkerAgent {
  private pollIntervalMs: number;
  private logger: Logger;

  constructor(
    private engine: Engine,
    readonly workerId: string,
    private implementer: Implementer,
    opts: WorkerOptions = {},
  ) {
    this.pollIntervalMs = opts.pollIntervalMs ?? engine.config.pollIntervalMs;
    this.logger = opts.logger ?? silentLogger;
  }

  async step(): Promise<WorkerStep> {
    let claim = await this.engine.claim(this.workerId);
    if (claim.kind === "blocked") {
      const ws = await this.resolveConflicts(claim.workspace);
      if (ws.status !== "synced") return { kind: "blocked", conflictingPaths: ws.conflictingPaths };
      claim = await this.engine.claim(this.workerId);
    }
    if (claim.kind === "idle") return { kind: "idle" };
    if (claim.kind === "blocked") return { kind: "blocked", conflictingPaths: claim.workspace.conflictingPaths };

    const task = claim.task;
    const workspace = await this.engine.workspaces.get(this.workerId);
    const active = await this.engine.proposals.activeForTask(task.id);
    // bounced on a merge conflict that the workspace sync has since settled
    if (claim.resumed && active?.status === "open" && active.conflictingPaths.length) {
      const proposalId = await this.engine.submitProposal(workspace.id, task.id);
      this.logger.ok(`${this.workerId} resubmitted ${proposalId} for ${task.id}`);
      return { kind: "submitted", taskId: task.id, proposalId };
    }
    const renew = async () => {
      await this.engine.renew(task.id, this.workerId);
    };

    try {
      const result = await this.implementer.implement(task, { workspace, feedback: active?.comments ?? [], renew });
      if (!result) {
        await this.engine.release(task.id, this.workerId);
        return { kind: "released", taskId: task.id };
      }
      await renew();
      await this.engine.commit(workspace.id, result.changes, result.message ?? task.title);
      const proposalId = await this.engine.submitProposal(workspace.id, task.id, {
        title: result.title,
        description: result.description,
      });
      this.logger.ok(`${this.workerId} submitted ${proposalId} for ${task.id}`);
      return { kind: "submitted", taskId: task.id, proposalId };
    } catch (e) {
      if (e instanceof LeaseExpiredError) {
        this.logger.warn(`${this.workerId} lost ${task.id}: ${e.message}`);
        return { kind: "expired", taskId: task.id };
      }
      throw e;
    }
  }

  private async resolveConflicts(ws: Stored<Workspace>): Promise<Stored<Workspace>> {
    if (!this.implementer.resolve) return ws;
    const resolutions = await this.implementer.resolve(ws.conflictingPaths, {
      workspace: ws,
      read: (ref, path) => this.engine.tree.readFile(ref, path),
    });
    if (!resolutions) return ws;
    this.logger.log(`${this.workerId} resolving ${ws.conflictingPaths.join(", ")} against ${this.engine.tree.trunk}`);
    return this.engine.syncWorkspace(ws.id, resolutions);
  }

  /** Loop until `signal` aborts. Unexpected errors are logged and the loop carries on. */
  async run(signal?: AbortSignal): Promise<void> {
    await this.engine.provisionWorkspace(this.workerId);
    while (!signal?.aborted) {
      let busy = false;
      try {
        const res = await this.step();
        busy = res.kind === "submitted" || res.kind === "released";
        if (res.kind === "blocked") this.logger.warn(`${this.workerId} waits on conflicts in ${res.conflictingPaths.join(", ")}`);
      } catch (e) {
        if (isExpected(e)) this.logger.debug(`${this.workerId}: ${errorMessage(e)}`);
        else this.logger.err(`${this.workerId}: ${errorMessage(e)}`);
      }
      if (!busy && !(await pause(this.pollIntervalMs, signal))) break;
    }
  }
}
