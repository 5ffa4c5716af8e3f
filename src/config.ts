import path from "node:path";
import { z } from "zod";
import { ConfigError, errorMessage } from "./errors.js";
import { describeIssues } from "./schemas.js";
import { pathExists, readYaml, STATE_DIRNAME, writeYamlAtomic, ensureDir } from "./utils.js";

const RetrySchema = z
  .object({
    attempts: z.number().int().min(1).default(3),
    baseDelayMs: z.number().int().nonnegative().default(500),
    factor: z.number().min(1).default(2),
    maxDelayMs: z.number().int().nonnegative().default(8000),
  })
  .strict();

const StoreSchema = z
  .object({
    lockStaleMs: z.number().int().positive().default(30_000),
    lockRetries: z.number().int().nonnegative().default(50),
    lockRetryDelayMs: z.number().int().nonnegative().default(20),
  })
  .strict();

export const ConfigSchema = z
  .object({
    trunk: z.string().min(1).default("main"),
    leaseMinutes: z.number().positive().default(30),
    pollIntervalMs: z.number().int().positive().default(5000),
    mergeSlotTimeoutMs: z.number().int().positive().default(600_000),
    retry: RetrySchema.default({}),
    store: StoreSchema.default({}),
    worktrees: z.object({ mode: z.enum(["sibling", "repo-subdir", "home"]).default("sibling") }).strict().default({}),
  })
  .strict();

export type Config = z.infer<typeof ConfigSchema>;

export function parseConfig(raw: unknown, source = "config"): Config {
  const res = ConfigSchema.safeParse(raw ?? {});
  if (!res.success) throw new ConfigError(`invalid ${source}: ${describeIssues(res.error)}`);
  return res.data;
}

export function defaultConfig(): Config {
  return parseConfig({});
}

export function configPath(repoRoot: string, env: NodeJS.ProcessEnv = process.env) {
  const override = (env.CODERELAY_CONFIG || "").trim();
  return override ? path.resolve(repoRoot, override) : path.join(repoRoot, STATE_DIRNAME, "config.yml");
}

/** Missing file means defaults; a file that does not parse or validate is a ConfigError. */
export async function loadConfig(repoRoot: string, env: NodeJS.ProcessEnv = process.env): Promise<Config> {
  const file = configPath(repoRoot, env);
  if (!(await pathExists(file))) return defaultConfig();
  let raw: unknown;
  try {
    raw = await readYaml(file);
  } catch (e) {
    throw new ConfigError(`cannot read ${file}: ${errorMessage(e)}`);
  }
  return parseConfig(raw, file);
}

export async function writeDefaultConfig(repoRoot: string, env: NodeJS.ProcessEnv = process.env) {
  const file = configPath(repoRoot, env);
  if (await pathExists(file)) return { file, created: false };
  await ensureDir(path.dirname(file));
  await writeYamlAtomic(file, defaultConfig());
  return { file, created: true };
}
