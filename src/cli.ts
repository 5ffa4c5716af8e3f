#!/usr/bin/env node
import path from "node:path";
import fs from "node:fs/promises";
import * as fss from "node:fs";
import { fileURLToPath } from "node:url";
import { Command } from "commander";
import { writeDefaultConfig } from "./config.js";
import { errorMessage } from "./errors.js";
import type { MergeOutcome } from "./merge/coordinator.js";
import { findRepoRoot, openRepoEngine } from "./repo.js";
import type { Task, TaskStatus } from "./types.js";
import { STATE_DIRNAME } from "./utils.js";

// Resolve package version without JSON import attributes
function readPkgVersion(): string {
  try {
    const pkgPath = fileURLToPath(new URL("../package.json", import.meta.url));
    const raw: unknown = JSON.parse(fss.readFileSync(pkgPath, "utf8"));
    if (raw && typeof raw === "object" && "version" in raw && typeof raw.version === "string") return raw.version;
  } catch {
    return "0.0.0";
  }
  return "0.0.0";
}

const pkgVersion = readPkgVersion();

const TASK_STATUSES: readonly TaskStatus[] = ["open", "assigned", "in_review", "completed"];

function parseStatus(s: string): TaskStatus {
  const found = TASK_STATUSES.find((x) => x === s);
  if (!found) throw new Error(`unknown status '${s}' (expected ${TASK_STATUSES.join("|")})`);
  return found;
}

function action<A extends unknown[]>(name: string, fn: (...args: A) => Promise<void>) {
  return async (...args: A) => {
    try {
      await fn(...args);
    } catch (e) {
      console.error(`✖ ${name} failed: ${errorMessage(e)}`);
      process.exitCode = 1;
    }
  };
}

function taskLine(t: Task) {
  const owner = t.owner ? ` @${t.owner}` : "";
  return `${t.status.padEnd(9)} ${t.id} ${t.title}${owner}`;
}

function printOutcome(o: MergeOutcome) {
  switch (o.kind) {
    case "merged":
      console.log(`✔ merged ${o.proposal.id} at ${o.revision}`);
      break;
    case "conflict":
      console.log(`conflict ${o.proposal.id}: ${o.conflictingPaths.join(", ")} (returned to ${o.proposal.author})`);
      break;
    case "failed":
      console.error(`✖ merge of ${o.proposal.id} failed: ${errorMessage(o.error)}`);
      process.exitCode = 1;
      break;
    case "skipped":
      console.log(`skipped ${o.proposal.id}: ${o.reason}`);
      break;
  }
}

const program = new Command();

program
  .name("coderelay")
  .description("Task claiming, change proposals and serialized merges for agents sharing a git repository")
  .version(pkgVersion);

program
  .command("init")
  .description("Create .coderelay/config.yml and keep engine state out of git")
  .action(action("init", async () => {
    const root = await findRepoRoot();
    const { file, created } = await writeDefaultConfig(root);
    const exclude = path.join(root, ".git", "info", "exclude");
    const current = fss.existsSync(exclude) ? await fs.readFile(exclude, "utf8") : "";
    const wanted = [`/${STATE_DIRNAME}/`, "/.worktrees/"].filter((l) => !current.split(/\r?\n/).includes(l));
    if (wanted.length) {
      await fs.mkdir(path.dirname(exclude), { recursive: true });
      await fs.appendFile(exclude, `${current && !current.endsWith("\n") ? "\n" : ""}${wanted.join("\n")}\n`);
    }
    console.log(`${created ? "✔ Created" : "Using existing"} ${path.relative(root, file)}`);
  }));

const task = program.command("task").description("Manage tasks");

task
  .command("add")
  .description("Create an open task")
  .argument("<title>", "task title")
  .option("-d, --description <text>", "task description", "")
  .action(action("task add", async (title: string, opts: { description: string }) => {
    const { engine } = await openRepoEngine();
    const id = await engine.createTask(title, opts.description);
    console.log(`✔ Created task ${id}`);
  }));

task
  .command("list")
  .description("List tasks (open by default)")
  .option("--all", "show every status, archived included")
  .option("--status <status>", "open|assigned|in_review|completed")
  .option("--owner <worker>", "only tasks held by this worker")
  .action(action("task list", async (opts: { all?: boolean; status?: string; owner?: string }) => {
    const { engine } = await openRepoEngine();
    const status = opts.status ? parseStatus(opts.status) : opts.all ? undefined : "open";
    const tasks = await engine.listTasks({ status, owner: opts.owner, includeArchived: Boolean(opts.all) });
    for (const t of tasks) console.log(taskLine(t));
  }));

task
  .command("show")
  .description("Show a task as JSON")
  .argument("<id>", "task id")
  .action(action("task show", async (id: string) => {
    const { engine } = await openRepoEngine();
    console.log(JSON.stringify(await engine.getTask(id), null, 2));
  }));

task
  .command("release")
  .description("Give an assigned task back to the open pool")
  .argument("<id>", "task id")
  .argument("<worker>", "worker holding the task")
  .action(action("task release", async (id: string, worker: string) => {
    const { engine } = await openRepoEngine();
    const t = await engine.release(id, worker);
    console.log(taskLine(t));
  }));

program
  .command("claim")
  .description("Claim an open task for a worker (its workspace is synced first)")
  .argument("<worker>", "worker id")
  .action(action("claim", async (worker: string) => {
    const { engine } = await openRepoEngine();
    const res = await engine.claim(worker);
    if (res.kind === "claimed") console.log(`${res.resumed ? "holding" : "✔ claimed"} ${taskLine(res.task)}`);
    else if (res.kind === "idle") console.log("no open tasks");
    else console.log(`blocked: workspace ${res.workspace.id} conflicts on ${res.workspace.conflictingPaths.join(", ")}`);
    await engine.drain();
  }));

program
  .command("renew")
  .description("Extend a worker's lease on a task")
  .argument("<task>", "task id")
  .argument("<worker>", "worker id")
  .action(action("renew", async (taskId: string, worker: string) => {
    const { engine } = await openRepoEngine();
    const t = await engine.renew(taskId, worker);
    console.log(`lease on ${t.id} until ${t.leaseExpiresAt}`);
  }));

const workspace = program.command("workspace").description("Manage worker workspaces");

workspace
  .command("add")
  .description("Provision a worker's workspace (git worktree) from trunk")
  .argument("<worker>", "worker id")
  .option("--recreate", "destroy an existing workspace first")
  .action(action("workspace add", async (worker: string, opts: { recreate?: boolean }) => {
    const { engine } = await openRepoEngine();
    const ws = await engine.provisionWorkspace(worker, { recreate: Boolean(opts.recreate) });
    console.log(`✔ ${ws.id} ${ws.branch} ${ws.root}`);
  }));

workspace
  .command("list")
  .description("List workspaces with their sync state")
  .action(action("workspace list", async () => {
    const { engine } = await openRepoEngine();
    for (const w of await engine.listWorkspaces()) {
      const extra = w.conflictingPaths.length ? ` (${w.conflictingPaths.join(", ")})` : "";
      console.log(`${w.status.padEnd(9)} ${w.id} ${w.branch} @ ${w.syncedRevision}${extra}`);
    }
  }));

workspace
  .command("sync")
  .description("Bring a workspace up to the current trunk")
  .argument("<worker>", "worker id")
  .action(action("workspace sync", async (worker: string) => {
    const { engine } = await openRepoEngine();
    const w = await engine.syncWorkspace(worker);
    console.log(`${w.status} ${w.id} @ ${w.syncedRevision}`);
    if (w.status === "diverged") process.exitCode = 1;
  }));

program
  .command("submit")
  .description("Open (or refresh) the proposal for a task from the worker's branch")
  .argument("<worker>", "worker id")
  .argument("<task>", "task id")
  .option("-t, --title <text>", "proposal title")
  .option("-d, --description <text>", "proposal description")
  .action(action("submit", async (worker: string, taskId: string, opts: { title?: string; description?: string }) => {
    const { engine } = await openRepoEngine();
    const id = await engine.submitProposal(worker, taskId, opts);
    console.log(`✔ ${id}`);
  }));

const review = program.command("review").description("Review queue");

review
  .command("list")
  .description("Open proposals awaiting review, with changed paths")
  .action(action("review list", async () => {
    const { engine } = await openRepoEngine();
    for (const { proposal, task: t, patch } of await engine.pendingReviews()) {
      console.log(`${proposal.id} ${proposal.title} [${t.id}] by ${proposal.author}`);
      for (const e of patch.entries) console.log(`  ${e.kind.padEnd(8)} ${e.path}`);
    }
  }));

program
  .command("approve")
  .description("Approve a proposal and merge it into trunk")
  .argument("<id>", "proposal id")
  .option("-m, --message <text>", "review comment")
  .option("--reviewer <name>", "reviewer name", "reviewer")
  .option("--no-merge", "approve only")
  .action(action("approve", async (id: string, opts: { message?: string; reviewer: string; merge: boolean }) => {
    const { engine } = await openRepoEngine();
    printOutcome(await engine.approve(id, { reviewer: opts.reviewer, comment: opts.message, merge: opts.merge }));
    await engine.drain();
  }));

program
  .command("reject")
  .description("Reject a proposal with feedback for its author")
  .argument("<id>", "proposal id")
  .requiredOption("-m, --message <text>", "review comments")
  .option("--reviewer <name>", "reviewer name", "reviewer")
  .action(action("reject", async (id: string, opts: { message: string; reviewer: string }) => {
    const { engine } = await openRepoEngine();
    const p = await engine.reject(id, opts.message, opts.reviewer);
    console.log(`rejected ${p.id}; ${p.taskId} back with ${p.author}`);
  }));

program
  .command("merge")
  .description("Merge one approved proposal, or all of them")
  .argument("[id]", "proposal id")
  .action(action("merge", async (id: string | undefined) => {
    const { engine } = await openRepoEngine();
    const outcomes = id ? [await engine.merge(id)] : await engine.mergeApproved();
    if (!outcomes.length) console.log("nothing to merge");
    outcomes.forEach(printOutcome);
    await engine.drain();
  }));

program
  .command("reap")
  .description("Reopen tasks whose claim lease has expired")
  .action(action("reap", async () => {
    const { engine } = await openRepoEngine();
    const ids = await engine.reap();
    console.log(ids.length ? `reopened ${ids.join(", ")}` : "no expired claims");
  }));

program
  .command("recover")
  .description("Settle proposals left merging by an interrupted run")
  .action(action("recover", async () => {
    const { engine } = await openRepoEngine();
    const settled = await engine.recover();
    for (const p of settled) console.log(`${p.status.padEnd(9)} ${p.id}`);
    if (!settled.length) console.log("nothing to recover");
    await engine.drain();
  }));

program
  .command("dump")
  .description("Dump tasks, proposals and workspaces as JSON (for automation)")
  .option("--ndjson", "newline-delimited JSON (1 object per line)")
  .action(action("dump", async (opts: { ndjson?: boolean }) => {
    const { engine } = await openRepoEngine();
    const rows = [
      ...(await engine.listTasks({ includeArchived: true })).map((r) => ({ kind: "task", ...r })),
      ...(await engine.listProposals()).map((r) => ({ kind: "proposal", ...r })),
      ...(await engine.listWorkspaces()).map((r) => ({ kind: "workspace", ...r })),
    ];
    if (opts.ndjson) {
      for (const r of rows) console.log(JSON.stringify(r));
    } else {
      console.log(JSON.stringify(rows, null, 2));
    }
  }));

program.parseAsync(process.argv).catch((e) => {
  console.error(e);
  process.exit(1);
});
