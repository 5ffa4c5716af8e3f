import fs from "node:fs/promises";
import crypto from "node:crypto";
import { execFileSync } from "node:child_process";
import YAML from "yaml";

export const STATE_DIRNAME = ".coderelay";

export async function ensureDir(p: string) {
  await fs.mkdir(p, { recursive: true });
}

export async function pathExists(p: string) {
  try { await fs.access(p); return true; } catch { return false; }
}

export function slugify(s: string) {
  return s.toLowerCase().trim().replace(/[^a-z0-9]+/g, "-").replace(/^-+|-+$/g, "");
}

// e.g. T-20261019T140312-fix-login-form-3fa2
export function makeId(prefix: string, title: string, now = new Date()) {
  const stamp = now.toISOString().replace(/[-:]/g, "").replace(/\.\d+Z$/, "");
  const slug = slugify(title).slice(0, 32).replace(/-+$/, "") || "item";
  return `${prefix}-${stamp}-${slug}-${crypto.randomBytes(2).toString("hex")}`;
}

export async function writeYamlAtomic(filePath: string, data: unknown) {
  const tmp = `${filePath}.tmp-${process.pid}-${Math.random().toString(36).slice(2)}`;
  await fs.writeFile(tmp, YAML.stringify(data), "utf8");
  await fs.rename(tmp, filePath);
}

export async function readYaml(filePath: string): Promise<unknown> {
  const raw = await fs.readFile(filePath, "utf8");
  return YAML.parse(raw);
}

export function unique<T>(arr: T[]) { return Array.from(new Set(arr)); }

// ---------- Git helpers ----------

export function git(args: string[], opts?: { cwd?: string }) {
  return execFileSync("git", args, { stdio: "pipe", encoding: "utf8", cwd: opts?.cwd }).trim();
}

export function refExists(ref: string, cwd?: string): boolean {
  try {
    git(["rev-parse", "--verify", "--quiet", ref], { cwd });
    return true;
  } catch {
    return false;
  }
}

export function isAncestorRef(ancestor: string, descendant: string, cwd?: string): boolean {
  try {
    execFileSync("git", ["merge-base", "--is-ancestor", ancestor, descendant], { cwd, stdio: "ignore" });
    return true; // exit code 0 -> ancestor
  } catch {
    return false;
  }
}

// ---------- Time ----------

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

export function addMinutes(d: Date, minutes: number) {
  return new Date(d.getTime() + minutes * 60_000);
}
