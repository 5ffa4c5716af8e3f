import path from "node:path";
import * as fss from "node:fs";
import { loadConfig } from "./config.js";
import type { Config } from "./config.js";
import { Engine, yamlStores } from "./engine.js";
import { resolveWorktreeBase } from "./home.js";
import { Logger } from "./logger.js";
import { GitTree } from "./tree/git.js";
import { STATE_DIRNAME } from "./utils.js";

export async function findRepoRoot(start = process.cwd()): Promise<string> {
  let dir = path.resolve(start);
  // walk up to .git
  while (true) {
    if (fss.existsSync(path.join(dir, ".git"))) return dir;
    const parent = path.dirname(dir);
    if (parent === dir) throw new Error("Failed to find git repo root (.git)");
    dir = parent;
  }
}

export type RepoEngine = {
  root: string;
  stateDir: string;
  config: Config;
  engine: Engine;
};

/** Engine over the git repository containing `cwd`, with state under `.coderelay/`. */
export async function openRepoEngine(cwd = process.cwd(), logger = new Logger()): Promise<RepoEngine> {
  const root = await findRepoRoot(cwd);
  const config = await loadConfig(root);
  const stateDir = path.join(root, STATE_DIRNAME);
  const tree = new GitTree(root, config.trunk, resolveWorktreeBase(root, config.worktrees.mode));
  const engine = new Engine({ tree, config, logger, stores: yamlStores(stateDir, { ...config.store, logger }) });
  return { root, stateDir, config, engine };
}
