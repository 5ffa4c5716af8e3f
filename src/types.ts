export type TaskStatus = "open" | "assigned" | "in_review" | "completed";

export type ProposalStatus = "open" | "approved" | "merging" | "merged" | "rejected";

export type WorkspaceStatus = "synced" | "syncing" | "diverged";

export type Metadata = Record<string, unknown>;

export type Task = {
  id: string;
  title: string;
  description: string;
  status: TaskStatus;
  owner: string | null;
  createdAt: string;
  updatedAt: string;
  leaseExpiresAt: string | null;
  completedAt?: string;
  // Completed tasks are archived, never deleted
  archivedAt?: string;
  proposalId?: string;
  attempts: number;
  metadata: Metadata;
};

export type ReviewComment = {
  author: string;
  kind: "review" | "system";
  verdict?: "approved" | "rejected";
  body: string;
  createdAt: string;
};

export type Proposal = {
  id: string;
  taskId: string;
  author: string;
  workspaceId: string;
  sourceBranch: string;
  targetBranch: string;
  title: string;
  description: string;
  status: ProposalStatus;
  headRevision: string;
  touchedPaths: string[];
  conflictingPaths: string[];
  reviewer?: string;
  comments: ReviewComment[];
  mergeRevision?: string;
  lastError?: string;
  createdAt: string;
  updatedAt: string;
  metadata: Metadata;
};

export type Workspace = {
  id: string;
  workerId: string;
  branch: string;
  root: string;
  syncedRevision: string;
  status: WorkspaceStatus;
  conflictingPaths: string[];
  createdAt: string;
  updatedAt: string;
};
