import { InvalidTransitionError, NotFoundError, StaleStateError } from "../errors.js";
import type { RecordStore, Stored } from "../store/record-store.js";
import type { Metadata, Proposal, ProposalStatus, ReviewComment } from "../types.js";
import { makeId, systemClock } from "../utils.js";
import type { Clock } from "../utils.js";

export type NewProposal = {
  taskId: string;
  author: string;
  workspaceId: string;
  sourceBranch: string;
  targetBranch: string;
  title: string;
  description?: string;
  headRevision: string;
  metadata?: Metadata;
};

export type ProposalPatch = Partial<
  Pick<
    Proposal,
    | "author"
    | "workspaceId"
    | "sourceBranch"
    | "headRevision"
    | "touchedPaths"
    | "conflictingPaths"
    | "reviewer"
    | "mergeRevision"
    | "lastError"
    | "title"
    | "description"
  >
>;

export type ProposalFilter = { status?: ProposalStatus; taskId?: string };

// open -> open refreshes the head of an unreviewed proposal;
// approved -> approved records a merge that failed before it started
const TRANSITIONS: Record<ProposalStatus, readonly ProposalStatus[]> = {
  open: ["open", "approved", "rejected"],
  approved: ["approved", "merging"],
  merging: ["merged", "open", "approved"],
  rejected: ["open"],
  merged: [],
};

export class ProposalLedger {
  constructor(
    private store: RecordStore<Proposal>,
    private clock: Clock = systemClock,
  ) {}

  async create(input: NewProposal): Promise<Stored<Proposal>> {
    const now = this.clock();
    const stamp = now.toISOString();
    return this.store.create({
      id: makeId("P", input.title, now),
      taskId: input.taskId,
      author: input.author,
      workspaceId: input.workspaceId,
      sourceBranch: input.sourceBranch,
      targetBranch: input.targetBranch,
      title: input.title,
      description: input.description ?? "",
      status: "open",
      headRevision: input.headRevision,
      touchedPaths: [],
      conflictingPaths: [],
      comments: [],
      createdAt: stamp,
      updatedAt: stamp,
      metadata: input.metadata ?? {},
    });
  }

  async get(id: string): Promise<Stored<Proposal>> {
    const p = await this.store.get(id);
    if (!p) throw new NotFoundError("proposal", id);
    return p;
  }

  async list(filter: ProposalFilter = {}): Promise<Stored<Proposal>[]> {
    return (await this.store.list())
      .filter((p) => !filter.status || p.status === filter.status)
      .filter((p) => !filter.taskId || p.taskId === filter.taskId)
      .sort((a, b) => a.createdAt.localeCompare(b.createdAt) || a.id.localeCompare(b.id));
  }

  /** The task's proposal that has not been merged yet, if any. */
  async activeForTask(taskId: string): Promise<Stored<Proposal> | null> {
    const found = (await this.list({ taskId })).filter((p) => p.status !== "merged");
    return found[found.length - 1] ?? null;
  }

  /** CAS on status; `comment` is appended to the review thread in the same write. */
  async transition(
    id: string,
    from: ProposalStatus,
    to: ProposalStatus,
    patch: ProposalPatch = {},
    comment?: Omit<ReviewComment, "createdAt">,
  ): Promise<Stored<Proposal>> {
    if (!TRANSITIONS[from].includes(to)) throw new InvalidTransitionError("proposal", id, from, to);
    const cur = await this.get(id);
    if (cur.status !== from) throw new StaleStateError(id, `proposal ${id} is ${cur.status}, expected ${from}`);
    const stamp = this.clock().toISOString();
    const next: Proposal = {
      ...cur,
      ...patch,
      status: to,
      updatedAt: stamp,
      comments: comment ? [...cur.comments, { ...comment, createdAt: stamp }] : cur.comments,
    };
    return this.store.compareAndSwap(id, cur.version, next);
  }
}
