import { ConflictError, errorMessage } from "./errors.js";
import type { WorkspaceLedger } from "./ledger/workspaces.js";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";
import { DEFAULT_RETRY, retry } from "./retry.js";
import type { RetryPolicy } from "./retry.js";
import type { Stored } from "./store/record-store.js";
import type { FileChange, VersionedTree } from "./tree/types.js";
import type { Workspace } from "./types.js";

export type SyncOptions = {
  retry?: RetryPolicy;
  logger?: Logger;
};

/**
 * Fans trunk updates out to worker workspaces. Work for one workspace is
 * chained, so two syncs of the same workspace never run at once.
 */
export class SyncBroadcaster {
  private inflight = new Map<string, Promise<void>>();
  private jobs = new Set<Promise<void>>();
  private policy: RetryPolicy;
  private logger: Logger;

  constructor(
    private tree: VersionedTree,
    private workspaces: WorkspaceLedger,
    opts: SyncOptions = {},
  ) {
    this.policy = opts.retry ?? DEFAULT_RETRY;
    this.logger = opts.logger ?? silentLogger;
  }

  /** Fire-and-forget: advance every workspace not in `exclude` to `revision`. */
  schedule(revision: string, opts: { exclude?: string[] } = {}): void {
    const job = this.fanOut(revision, new Set(opts.exclude ?? []));
    this.jobs.add(job);
    void job.then(() => this.jobs.delete(job));
  }

  /** Bring one workspace up to the current trunk, waiting for any sync already queued for it. */
  async ensureSynced(workspaceId: string, resolutions: FileChange[] = []): Promise<Stored<Workspace>> {
    await this.inflight.get(workspaceId);
    const trunk = await retry(() => this.tree.revision(this.tree.trunk), this.policy);
    return this.enqueue(workspaceId, trunk, resolutions);
  }

  /** Resolves once every scheduled broadcast has settled. */
  async drain(): Promise<void> {
    while (this.jobs.size || this.inflight.size) {
      await Promise.all([...this.jobs, ...this.inflight.values()]);
    }
  }

  private async fanOut(revision: string, exclude: Set<string>): Promise<void> {
    try {
      const targets = (await this.workspaces.list()).filter((w) => !exclude.has(w.id));
      await Promise.all(
        targets.map((w) =>
          this.enqueue(w.id, revision).then(
            (ws) => this.logger.debug(`workspace ${ws.id} at ${ws.syncedRevision} (${ws.status})`),
            (e) => this.logger.err(`sync of workspace ${w.id} to ${revision} failed: ${errorMessage(e)}`),
          ),
        ),
      );
    } catch (e) {
      this.logger.err(`broadcast of ${revision} failed: ${errorMessage(e)}`);
    }
  }

  private enqueue(id: string, revision: string, resolutions: FileChange[] = []): Promise<Stored<Workspace>> {
    const prev = this.inflight.get(id) ?? Promise.resolve();
    const run = prev.then(() => this.advance(id, revision, resolutions));
    const settled = run.then(
      () => undefined,
      () => undefined,
    );
    this.inflight.set(id, settled);
    void settled.then(() => {
      if (this.inflight.get(id) === settled) this.inflight.delete(id);
    });
    return run;
  }

  private async advance(id: string, revision: string, resolutions: FileChange[]): Promise<Stored<Workspace>> {
    const ws = await this.workspaces.get(id);
    if (ws.syncedRevision === revision) {
      return ws.status === "synced" ? ws : this.workspaces.update(id, () => ({ status: "synced", conflictingPaths: [] }));
    }
    // an older trunk revision arriving late never moves the marker back
    if (await this.tree.isAncestor(revision, ws.syncedRevision)) return ws;

    const handle = this.workspaces.handleOf(ws);
    await this.workspaces.update(id, () => ({ status: "syncing" }));
    try {
      await retry(() => this.tree.fastForward(handle, revision), this.policy);
    } catch (e) {
      if (!(e instanceof ConflictError)) throw e;
      // local commits on the workspace branch: bring trunk in as a merge
      const result = await retry(
        () => this.tree.merge(revision, ws.branch, `Merge ${this.tree.trunk} ${revision} into ${ws.branch}`, resolutions),
        this.policy,
      );
      if (!result.success) {
        this.logger.warn(`workspace ${id} diverged from ${this.tree.trunk}: ${result.conflictingPaths.join(", ")}`);
        return this.workspaces.update(id, () => ({ status: "diverged", conflictingPaths: result.conflictingPaths }));
      }
    }

    return this.workspaces.update(id, async (cur) => {
      if (cur.syncedRevision === revision) return cur.status === "synced" ? null : { status: "synced", conflictingPaths: [] };
      // moved past `revision` by another writer meanwhile
      if (!(await this.tree.isAncestor(cur.syncedRevision, revision))) return { status: "synced", conflictingPaths: [] };
      return { syncedRevision: revision, status: "synced", conflictingPaths: [] };
    });
  }
}
