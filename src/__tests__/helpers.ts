import { execFileSync } from "node:child_process";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { Logger } from "../logger.js";
import type { Clock } from "../utils.js";

export function runGit(args: string[], cwd: string) {
  return execFileSync("git", args, { cwd, encoding: "utf8" }).trim();
}

export async function makeTempDir(prefix = "coderelay-test-"): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function makeTempRepo(): Promise<string> {
  const tmp = await makeTempDir();
  runGit(["init", "-q"], tmp);
  runGit(["config", "user.email", "test@example.com"], tmp);
  runGit(["config", "user.name", "Test User"], tmp);
  await fs.writeFile(path.join(tmp, "README.md"), "# temp\n");
  await fs.writeFile(path.join(tmp, "foo.py"), "print('base')\n");
  runGit(["add", "."], tmp);
  runGit(["commit", "-q", "-m", "init"], tmp);
  runGit(["branch", "-M", "main"], tmp);
  return tmp;
}

/** Manually advanced clock. */
export class FakeClock {
  private now: number;

  constructor(start = "2026-01-01T00:00:00.000Z") {
    this.now = Date.parse(start);
  }

  readonly clock: Clock = () => new Date(this.now);

  advance(ms: number) {
    this.now += ms;
  }

  advanceMinutes(minutes: number) {
    this.advance(minutes * 60_000);
  }
}

export function captureLogger() {
  const out: string[] = [];
  const err: string[] = [];
  const logger = new Logger({ stdout: (m) => out.push(m), stderr: (m) => err.push(m), debug: true });
  return { logger, out, err };
}

/** Retry policy without real waiting. */
export const FAST_RETRY = { attempts: 3, baseDelayMs: 1, factor: 2, maxDelayMs: 4 };
