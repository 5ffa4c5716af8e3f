export * from "./errors.js";
export * from "./types.js";
export { Logger, silentLogger } from "./logger.js";
export { retry, DEFAULT_RETRY } from "./retry.js";
export type { RetryPolicy } from "./retry.js";
export { ConfigSchema, defaultConfig, loadConfig, parseConfig } from "./config.js";
export type { Config } from "./config.js";
export { Engine, createEngine, memoryStores, yamlStores } from "./engine.js";
export type { EngineOptions, EngineStores, PendingReview, SubmitOptions } from "./engine.js";
export type { ClaimResult } from "./claims.js";
export type { MergeOutcome } from "./merge/coordinator.js";
export type { RecordStore, Stored } from "./store/record-store.js";
export { MemoryRecordStore } from "./store/memory.js";
export { YamlRecordStore } from "./store/yaml.js";
export type { FileChange, MergeResult, PatchSet, VersionedTree, WorkspaceHandle } from "./tree/types.js";
export { MemoryTree } from "./tree/memory.js";
export { GitTree } from "./tree/git.js";
export { WorkerAgent } from "./agents/worker.js";
export type { ConflictContext, Implementer, WorkContext, WorkResult } from "./agents/worker.js";
export { ReviewerAgent } from "./agents/reviewer.js";
export type { Reviewer, Verdict } from "./agents/reviewer.js";
export { openRepoEngine } from "./repo.js";
