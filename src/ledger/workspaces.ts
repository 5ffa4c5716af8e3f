import { NotFoundError, StaleStateError } from "../errors.js";
import type { RecordStore, Stored } from "../store/record-store.js";
import type { WorkspaceHandle } from "../tree/types.js";
import type { Workspace } from "../types.js";
import { systemClock } from "../utils.js";
import type { Clock } from "../utils.js";

const CAS_ATTEMPTS = 5;

/** One workspace record per worker, keyed by worker id. */
export class WorkspaceLedger {
  constructor(
    private store: RecordStore<Workspace>,
    private clock: Clock = systemClock,
  ) {}

  async get(id: string): Promise<Stored<Workspace>> {
    const w = await this.store.get(id);
    if (!w) throw new NotFoundError("workspace", id);
    return w;
  }

  async find(id: string): Promise<Stored<Workspace> | null> {
    return this.store.get(id);
  }

  async list(): Promise<Stored<Workspace>[]> {
    return (await this.store.list()).sort((a, b) => a.id.localeCompare(b.id));
  }

  /** Record a freshly provisioned workspace, replacing any earlier one for the same worker. */
  async register(handle: WorkspaceHandle, syncedRevision: string): Promise<Stored<Workspace>> {
    const stamp = this.clock().toISOString();
    const record: Workspace = {
      id: handle.workerId,
      workerId: handle.workerId,
      branch: handle.branch,
      root: handle.root,
      syncedRevision,
      status: "synced",
      conflictingPaths: [],
      createdAt: stamp,
      updatedAt: stamp,
    };
    const cur = await this.store.get(record.id);
    if (!cur) return this.store.create(record);
    return this.store.compareAndSwap(record.id, cur.version, record);
  }

  /**
   * Read-modify-write with CAS, re-reading on a lost race. `fn` returning
   * null leaves the record untouched.
   */
  async update(
    id: string,
    fn: (cur: Stored<Workspace>) => Promise<Partial<Workspace> | null> | Partial<Workspace> | null,
  ): Promise<Stored<Workspace>> {
    for (let attempt = 1; ; attempt++) {
      const cur = await this.get(id);
      const change = await fn(cur);
      if (!change) return cur;
      try {
        return await this.store.compareAndSwap(id, cur.version, {
          ...cur,
          ...change,
          id,
          updatedAt: this.clock().toISOString(),
        });
      } catch (e) {
        if (!(e instanceof StaleStateError) || attempt >= CAS_ATTEMPTS) throw e;
      }
    }
  }

  handleOf(w: Workspace): WorkspaceHandle {
    return { workerId: w.workerId, branch: w.branch, root: w.root };
  }
}
