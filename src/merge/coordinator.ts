import { mergeMessage } from "../builder.js";
import type { ClaimCoordinator } from "../claims.js";
import { RetryExhaustedError, StaleStateError, errorMessage } from "../errors.js";
import type { ProposalLedger } from "../ledger/proposals.js";
import type { TaskLedger } from "../ledger/tasks.js";
import type { Logger } from "../logger.js";
import { silentLogger } from "../logger.js";
import { DEFAULT_RETRY, retry } from "../retry.js";
import type { RetryPolicy } from "../retry.js";
import type { Stored } from "../store/record-store.js";
import type { MergeResult, PatchSet, VersionedTree } from "../tree/types.js";
import { touchedPaths } from "../tree/types.js";
import type { Proposal } from "../types.js";
import type { MergeSlots } from "./slots.js";

export const SYSTEM_AUTHOR = "coderelay";

export type MergeOutcome =
  | { kind: "merged"; proposal: Stored<Proposal>; revision: string }
  | { kind: "conflict"; proposal: Stored<Proposal>; conflictingPaths: string[] }
  | { kind: "failed"; proposal: Stored<Proposal>; error: unknown }
  | { kind: "skipped"; proposal: Stored<Proposal>; reason: string };

/** Receives new trunk revisions after each merge. */
export interface Broadcaster {
  schedule(revision: string, opts?: { exclude?: string[] }): void;
}

export type MergeCoordinatorOptions = {
  retry?: RetryPolicy;
  mergeSlotTimeoutMs?: number;
  logger?: Logger;
};

export class MergeCoordinator {
  private policy: RetryPolicy;
  private slotTimeoutMs: number;
  private logger: Logger;

  constructor(
    private tree: VersionedTree,
    private tasks: TaskLedger,
    private proposals: ProposalLedger,
    private claims: ClaimCoordinator,
    private slots: MergeSlots,
    private broadcaster: Broadcaster,
    opts: MergeCoordinatorOptions = {},
  ) {
    this.policy = opts.retry ?? DEFAULT_RETRY;
    this.slotTimeoutMs = opts.mergeSlotTimeoutMs ?? 600_000;
    this.logger = opts.logger ?? silentLogger;
  }

  /** Review verdict: approve and, unless `merge` is false, merge right away. */
  async approve(
    id: string,
    opts: { reviewer?: string; comment?: string; merge?: boolean } = {},
  ): Promise<MergeOutcome> {
    const reviewer = opts.reviewer ?? "reviewer";
    const approved = await this.proposals.transition(id, "open", "approved", { reviewer }, {
      author: reviewer,
      kind: "review",
      verdict: "approved",
      body: opts.comment ?? "Approved",
    });
    this.logger.log(`${reviewer} approved ${id}`);
    if (opts.merge === false) return { kind: "skipped", proposal: approved, reason: "merge deferred" };
    return this.merge(id);
  }

  /** Review verdict: reject with feedback; the task goes back to its owner. */
  async reject(id: string, comments: string, reviewer = "reviewer"): Promise<Stored<Proposal>> {
    const rejected = await this.proposals.transition(id, "open", "rejected", { reviewer }, {
      author: reviewer,
      kind: "review",
      verdict: "rejected",
      body: comments,
    });
    await this.handBack(rejected);
    this.logger.log(`${reviewer} rejected ${id}`);
    return rejected;
  }

  async merge(id: string): Promise<MergeOutcome> {
    const p = await this.proposals.get(id);
    if (p.status !== "approved") return { kind: "skipped", proposal: p, reason: `proposal is ${p.status}` };

    let patch: PatchSet;
    let paths: string[];
    let release: () => void;
    try {
      patch = await retry(() => this.tree.diff(this.tree.trunk, p.headRevision), this.policy);
      paths = touchedPaths(patch);
      release = await this.slots.acquire(paths, this.slotTimeoutMs);
    } catch (e) {
      return this.fail(id, "approved", e);
    }
    try {
      let merging: Stored<Proposal>;
      try {
        merging = await this.proposals.transition(id, "approved", "merging", { touchedPaths: paths, lastError: undefined });
      } catch (e) {
        if (!(e instanceof StaleStateError)) throw e;
        return { kind: "skipped", proposal: await this.proposals.get(id), reason: "merged or changed concurrently" };
      }
      this.logger.debug(`merging ${id} (${paths.length} path(s))`);

      let result: MergeResult;
      try {
        const task = await this.tasks.getTask(p.taskId);
        const message = mergeMessage(task, merging, patch);
        result = await retry(() => this.tree.merge(p.headRevision, this.tree.trunk, message), this.policy, (err, attempt, delay) =>
          this.logger.warn(`merge of ${id} failed (attempt ${attempt}): ${err.message}; retrying in ${delay}ms`),
        );
      } catch (e) {
        return await this.fail(id, "merging", e);
      }

      if (!result.success) return await this.bounce(merging, result.conflictingPaths);
      return await this.finish(merging, result.revision);
    } finally {
      release();
    }
  }

  /** Merge every approved proposal; the slots decide what runs together. */
  async mergeApproved(): Promise<MergeOutcome[]> {
    const approved = await this.proposals.list({ status: "approved" });
    return Promise.all(
      approved.map((p) =>
        this.merge(p.id).catch((e: unknown): MergeOutcome => {
          this.logger.err(`merge of ${p.id} failed: ${errorMessage(e)}`);
          return { kind: "failed", proposal: p, error: e };
        }),
      ),
    );
  }

  /**
   * Settle proposals a crashed coordinator left `merging`: finish those whose
   * head already reached trunk, return the rest to `approved`.
   */
  async recoverInterrupted(): Promise<Stored<Proposal>[]> {
    const out: Stored<Proposal>[] = [];
    for (const p of await this.proposals.list({ status: "merging" })) {
      if (await this.tree.isAncestor(p.headRevision, this.tree.trunk)) {
        const trunk = await this.tree.revision(this.tree.trunk);
        await this.finish(p, trunk);
        out.push(await this.proposals.get(p.id));
      } else {
        out.push(await this.proposals.transition(p.id, "merging", "approved", { lastError: "interrupted merge" }));
        this.logger.warn(`proposal ${p.id} was left merging; returned to approved`);
      }
    }
    return out;
  }

  private async finish(p: Stored<Proposal>, revision: string): Promise<MergeOutcome> {
    const merged = await this.proposals.transition(p.id, "merging", "merged", { mergeRevision: revision, conflictingPaths: [] }, {
      author: SYSTEM_AUTHOR,
      kind: "system",
      body: `Merged into ${this.tree.trunk} at ${revision}`,
    });
    try {
      await this.claims.complete(p.taskId, p.author);
    } catch (e) {
      if (!(e instanceof StaleStateError)) throw e;
      // the change is on trunk either way; the task needs an operator
      this.logger.err(`task ${p.taskId} not completed after ${p.id} merged: ${e.message}`);
    }
    this.logger.ok(`merged ${p.id} into ${this.tree.trunk} at ${revision}`);
    this.broadcaster.schedule(revision, { exclude: [p.workspaceId] });
    return { kind: "merged", proposal: merged, revision };
  }

  /** Leave the proposal approved with the error recorded, for a later attempt. */
  private async fail(id: string, from: "approved" | "merging", e: unknown): Promise<MergeOutcome> {
    const detail = e instanceof RetryExhaustedError ? errorMessage(e.lastError) : errorMessage(e);
    let proposal: Stored<Proposal>;
    try {
      proposal = await this.proposals.transition(id, from, "approved", { lastError: errorMessage(e) });
    } catch (err) {
      if (!(err instanceof StaleStateError)) throw err;
      proposal = await this.proposals.get(id);
    }
    this.logger.err(`merge of ${id} failed; left ${proposal.status}: ${detail}`);
    return { kind: "failed", proposal, error: e };
  }

  private async bounce(p: Stored<Proposal>, conflictingPaths: string[]): Promise<MergeOutcome> {
    const reopened = await this.proposals.transition(p.id, "merging", "open", { conflictingPaths }, {
      author: SYSTEM_AUTHOR,
      kind: "system",
      body: `Merge into ${this.tree.trunk} conflicts on: ${conflictingPaths.join(", ")}. Sync the workspace with ${this.tree.trunk} and resubmit.`,
    });
    await this.handBack(p);
    this.logger.log(`proposal ${p.id} conflicts on ${conflictingPaths.join(", ")}; returned to ${p.author}`);
    return { kind: "conflict", proposal: reopened, conflictingPaths };
  }

  private async handBack(p: Proposal) {
    try {
      await this.claims.returnToOwner(p.taskId, p.author);
    } catch (e) {
      if (!(e instanceof StaleStateError)) throw e;
      this.logger.warn(`task ${p.taskId} could not be returned to ${p.author}: ${e.message}`);
    }
  }
}
