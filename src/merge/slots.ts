import { MergeSlotTimeoutError } from "../errors.js";

type Waiter = {
  paths: Set<string>;
  admit: () => void;
};

function overlaps(a: Set<string>, b: Set<string>) {
  for (const p of a) if (b.has(p)) return true;
  return false;
}

/**
 * Per-path-set admission for merges. A request is admitted when it overlaps
 * neither an active slot nor an earlier waiter, so overlapping merges run
 * strictly one after another in arrival order and disjoint ones run together.
 */
export class MergeSlots {
  private active = new Set<Set<string>>();
  private queue: Waiter[] = [];

  /** Resolves to a release function; rejects with `MergeSlotTimeoutError` after `timeoutMs`. */
  acquire(paths: string[], timeoutMs = Infinity): Promise<() => void> {
    const set = new Set(paths);
    if (this.admissible(set, this.queue.length)) return Promise.resolve(this.grant(set));

    return new Promise((resolve, reject) => {
      let timer: ReturnType<typeof setTimeout> | undefined;
      const waiter: Waiter = {
        paths: set,
        admit: () => {
          if (timer) clearTimeout(timer);
          resolve(this.grant(set));
        },
      };
      if (Number.isFinite(timeoutMs)) {
        timer = setTimeout(() => {
          this.queue = this.queue.filter((w) => w !== waiter);
          reject(new MergeSlotTimeoutError(paths, timeoutMs));
          this.pump();
        }, timeoutMs);
      }
      this.queue.push(waiter);
    });
  }

  get activeCount() {
    return this.active.size;
  }

  get waiting() {
    return this.queue.length;
  }

  private admissible(set: Set<string>, position: number) {
    for (const a of this.active) if (overlaps(a, set)) return false;
    for (let i = 0; i < position; i++) if (overlaps(this.queue[i].paths, set)) return false;
    return true;
  }

  private grant(set: Set<string>): () => void {
    this.active.add(set);
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.active.delete(set);
      this.pump();
    };
  }

  private pump() {
    let i = 0;
    while (i < this.queue.length) {
      const w = this.queue[i];
      if (this.admissible(w.paths, i)) {
        this.queue.splice(i, 1);
        w.admit();
      } else i++;
    }
  }
}
