import os from "node:os";
import path from "node:path";
import crypto from "node:crypto";
import * as fss from "node:fs";

export type WorktreeMode = "sibling" | "repo-subdir" | "home";

export function sha8(s: string) {
  return crypto.createHash("sha256").update(s).digest("hex").slice(0, 8);
}

export function detectProjectName(cwd?: string) {
  try {
    const raw: unknown = JSON.parse(fss.readFileSync(path.join(cwd ?? process.cwd(), "package.json"), "utf8"));
    if (raw && typeof raw === "object" && "name" in raw && typeof raw.name === "string" && raw.name) return raw.name;
  } catch {
    // no package.json; fall back to the directory name
    return path.basename(cwd ?? process.cwd());
  }
  return path.basename(cwd ?? process.cwd());
}

export function resolveDefaultHome() {
  const env = (process.env.CODERELAY_HOME || "").trim();
  if (env) return path.resolve(env);
  if (process.platform === "win32") {
    const appdata = process.env.APPDATA || path.join(os.homedir(), "AppData", "Roaming");
    return path.join(appdata, "coderelay");
  }
  if (process.platform === "darwin") {
    return path.join(os.homedir(), "Library", "Application Support", "coderelay");
  }
  const xdg = process.env.XDG_CONFIG_HOME || path.join(os.homedir(), ".config");
  return path.join(xdg, "coderelay");
}

export function projectKeyFromPath(projectName: string, repoRoot: string) {
  const p = process.platform === "win32" ? repoRoot.toLowerCase() : repoRoot;
  return `${projectName}-${sha8(p)}`;
}

export function sanitizeForPath(s: string) {
  return String(s).replace(/[^A-Za-z0-9._-]+/g, "-");
}

/** Directory that holds one worktree per worker. */
export function resolveWorktreeBase(repoRoot: string, mode: WorktreeMode, home = resolveDefaultHome()) {
  switch (mode) {
    case "sibling":
      return `${repoRoot.replace(/[\\/]+$/, "")}-wt`;
    case "repo-subdir":
      return path.join(repoRoot, ".worktrees");
    case "home":
      return path.join(home, "workTrees", projectKeyFromPath(detectProjectName(repoRoot), repoRoot));
  }
}
