import type { z } from "zod";

/** A record as persisted: the payload plus its optimistic version (1 on create). */
export type Stored<T> = T & { version: number };

export type RecordSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

/**
 * Keyed record store with atomic per-key compare-and-swap. The ledgers are the
 * only callers; nothing else gets read-then-write access to records.
 */
export interface RecordStore<T extends { id: string }> {
  readonly kind: string;
  get(id: string): Promise<Stored<T> | null>;
  list(): Promise<Stored<T>[]>;
  /** Throws `StaleStateError` when a record with the same id exists. */
  create(record: T): Promise<Stored<T>>;
  /**
   * Replace the record only if its version still equals `expectedVersion`.
   * Throws `StaleStateError` on mismatch and `NotFoundError` when absent.
   */
  compareAndSwap(id: string, expectedVersion: number, next: T): Promise<Stored<T>>;
}
