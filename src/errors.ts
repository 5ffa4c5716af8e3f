export type ErrorCode =
  | "STALE_STATE"
  | "CONFLICT"
  | "LEASE_EXPIRED"
  | "IO"
  | "RETRY_EXHAUSTED"
  | "LEDGER_CORRUPTION"
  | "NOT_FOUND"
  | "INVALID_TRANSITION"
  | "MERGE_SLOT_TIMEOUT"
  | "CONFIG";

export class CollaborationError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** A compare-and-swap lost: the record changed between read and write. */
export class StaleStateError extends CollaborationError {
  constructor(readonly recordId: string, message = `record ${recordId} changed concurrently`) {
    super("STALE_STATE", message);
  }
}

export class ConflictError extends CollaborationError {
  constructor(readonly paths: string[], message = `conflicting paths: ${paths.join(", ") || "(unknown)"}`) {
    super("CONFLICT", message);
  }
}

export class LeaseExpiredError extends CollaborationError {
  constructor(readonly taskId: string, readonly expiredAt: string) {
    super("LEASE_EXPIRED", `claim on ${taskId} expired at ${expiredAt}`);
  }
}

export class IOError extends CollaborationError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("IO", message, options);
  }
}

export class RetryExhaustedError extends CollaborationError {
  constructor(readonly attempts: number, readonly lastError: unknown) {
    super("RETRY_EXHAUSTED", `gave up after ${attempts} attempts: ${errorMessage(lastError)}`, { cause: lastError });
  }
}

export class LedgerCorruptionError extends CollaborationError {
  constructor(readonly recordId: string, detail: string) {
    super("LEDGER_CORRUPTION", `record ${recordId} is corrupt: ${detail}`);
  }
}

export class NotFoundError extends CollaborationError {
  constructor(kind: string, id: string) {
    super("NOT_FOUND", `${kind} not found: ${id}`);
  }
}

export class InvalidTransitionError extends CollaborationError {
  constructor(kind: string, id: string, from: string, to: string) {
    super("INVALID_TRANSITION", `${kind} ${id}: cannot move from '${from}' to '${to}'`);
  }
}

export class MergeSlotTimeoutError extends CollaborationError {
  constructor(readonly paths: string[], waitedMs: number) {
    super("MERGE_SLOT_TIMEOUT", `no merge slot for ${paths.length} path(s) after ${waitedMs}ms`);
  }
}

export class ConfigError extends CollaborationError {
  constructor(message: string) {
    super("CONFIG", message);
  }
}

const EXPECTED: ReadonlySet<ErrorCode> = new Set(["STALE_STATE", "CONFLICT", "LEASE_EXPIRED"]);

/** Expected conditions are part of normal operation and are never reported as failures. */
export function isExpected(err: unknown): boolean {
  return err instanceof CollaborationError && EXPECTED.has(err.code);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
