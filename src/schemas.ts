import { z } from "zod";

const isoDate = z.string().min(1);
const metadata = z.record(z.unknown()).default({});

export const TaskSchema = z.object({
  id: z.string().min(1),
  title: z.string(),
  description: z.string().default(""),
  status: z.enum(["open", "assigned", "in_review", "completed"]),
  owner: z.string().nullable(),
  createdAt: isoDate,
  updatedAt: isoDate,
  leaseExpiresAt: isoDate.nullable().default(null),
  completedAt: isoDate.optional(),
  archivedAt: isoDate.optional(),
  proposalId: z.string().optional(),
  attempts: z.number().int().nonnegative().default(0),
  metadata,
});

export const ReviewCommentSchema = z.object({
  author: z.string(),
  kind: z.enum(["review", "system"]),
  verdict: z.enum(["approved", "rejected"]).optional(),
  body: z.string(),
  createdAt: isoDate,
});

export const ProposalSchema = z.object({
  id: z.string().min(1),
  taskId: z.string().min(1),
  author: z.string().min(1),
  workspaceId: z.string().min(1),
  sourceBranch: z.string().min(1),
  targetBranch: z.string().min(1),
  title: z.string(),
  description: z.string().default(""),
  status: z.enum(["open", "approved", "merging", "merged", "rejected"]),
  headRevision: z.string(),
  touchedPaths: z.array(z.string()).default([]),
  conflictingPaths: z.array(z.string()).default([]),
  reviewer: z.string().optional(),
  comments: z.array(ReviewCommentSchema).default([]),
  mergeRevision: z.string().optional(),
  lastError: z.string().optional(),
  createdAt: isoDate,
  updatedAt: isoDate,
  metadata,
});

export const WorkspaceSchema = z.object({
  id: z.string().min(1),
  workerId: z.string().min(1),
  branch: z.string().min(1),
  root: z.string(),
  syncedRevision: z.string(),
  status: z.enum(["synced", "syncing", "diverged"]),
  conflictingPaths: z.array(z.string()).default([]),
  createdAt: isoDate,
  updatedAt: isoDate,
});

export const VersionSchema = z.object({ version: z.number().int().positive() });

export function describeIssues(err: z.ZodError): string {
  return err.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
}
