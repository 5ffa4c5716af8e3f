import { setTimeout as delay } from "node:timers/promises";

/** Wait `ms` unless `signal` aborts first. Returns false once aborted. */
export async function pause(ms: number, signal?: AbortSignal): Promise<boolean> {
  if (signal?.aborted) return false;
  try {
    await delay(ms, undefined, { signal });
    return true;
  } catch (e) {
    if (e instanceof Error && e.name === "AbortError") return false;
    throw e;
  }
}
