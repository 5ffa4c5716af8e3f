import { NotFoundError, StaleStateError } from "../errors.js";
import type { RecordStore, Stored } from "./record-store.js";

/** Single-process store. Each operation completes without yielding, so CAS is atomic. */
export class MemoryRecordStore<T extends { id: string }> implements RecordStore<T> {
  private records = new Map<string, Stored<T>>();

  constructor(readonly kind: string) {}

  async get(id: string): Promise<Stored<T> | null> {
    const rec = this.records.get(id);
    return rec ? structuredClone(rec) : null;
  }

  async list(): Promise<Stored<T>[]> {
    return Array.from(this.records.values(), (r) => structuredClone(r));
  }

  async create(record: T): Promise<Stored<T>> {
    if (this.records.has(record.id)) throw new StaleStateError(record.id, `${this.kind} ${record.id} already exists`);
    const stored: Stored<T> = { ...structuredClone(record), version: 1 };
    this.records.set(record.id, stored);
    return structuredClone(stored);
  }

  async compareAndSwap(id: string, expectedVersion: number, next: T): Promise<Stored<T>> {
    const cur = this.records.get(id);
    if (!cur) throw new NotFoundError(this.kind, id);
    if (cur.version !== expectedVersion) throw new StaleStateError(id);
    const stored: Stored<T> = { ...structuredClone(next), id, version: expectedVersion + 1 };
    this.records.set(id, stored);
    return structuredClone(stored);
  }
}
