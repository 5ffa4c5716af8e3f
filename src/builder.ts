import type { PatchSet } from "./tree/types.js";
import type { Proposal, Task } from "./types.js";
import { unique } from "./utils.js";

export type DiffSummary = {
  all: string[];
  byDir: Record<string, string[]>;
};

/** Group changed paths by their top-level directory ("." for files at the root). */
export function summariseByDir(patch: PatchSet): DiffSummary {
  const byDir: Record<string, string[]> = {};
  const files = unique(patch.entries.map((e) => e.path)).sort();
  for (const f of files) {
    const slash = f.indexOf("/");
    const dir = slash > 0 ? f.slice(0, slash) : ".";
    (byDir[dir] ??= []).push(f);
  }
  return { all: files, byDir };
}

export function makeTitle(proposal: Proposal): string {
  return `${proposal.title || proposal.taskId} (coderelay:${proposal.taskId})`;
}

export function makeBody(task: Task, proposal: Proposal, diff: DiffSummary): string {
  const lines: string[] = [];
  lines.push("## Summary");
  lines.push(proposal.description || task.description || "(no description)");
  lines.push("");
  lines.push("## Scope");
  lines.push(`- Task: ${task.id} ${task.title}`);
  lines.push(`- Author: ${proposal.author}`);
  lines.push(`- Branch: ${proposal.sourceBranch} @ ${proposal.headRevision}`);
  lines.push("");
  lines.push("## Changes");
  if (diff.all.length === 0) {
    lines.push("- (no changes vs base)");
  } else {
    for (const [dir, files] of Object.entries(diff.byDir)) {
      lines.push(`- ${dir}`);
      for (const f of files) lines.push(`  - ${f}`);
    }
  }
  const reviews = proposal.comments.filter((c) => c.kind === "review");
  if (reviews.length) {
    lines.push("");
    lines.push("## Review");
    for (const c of reviews) lines.push(`- ${c.author}${c.verdict ? ` (${c.verdict})` : ""}: ${c.body}`);
  }
  return lines.join("\n");
}

export function mergeMessage(task: Task, proposal: Proposal, patch: PatchSet): string {
  return `${makeTitle(proposal)}\n\n${makeBody(task, proposal, summariseByDir(patch))}`;
}
