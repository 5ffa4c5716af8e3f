export type FileChange = {
  path: string;
  // null deletes the path
  content: string | null;
};

export type PatchEntry = {
  path: string;
  kind: "added" | "modified" | "deleted";
};

export type PatchSet = {
  entries: PatchEntry[];
};

export type MergeResult =
  | { success: true; revision: string }
  | { success: false; conflictingPaths: string[] };

export type WorkspaceHandle = {
  workerId: string;
  branch: string;
  root: string;
};

/**
 * Branch/commit/merge/diff primitives of the underlying versioned tree.
 *
 * Backend failures surface as `IOError` (retryable) or `ConflictError`.
 */
export interface VersionedTree {
  /** Branch holding the authoritative, merged history. */
  readonly trunk: string;
  revision(ref: string): Promise<string>;
  isAncestor(ancestor: string, descendant: string): Promise<boolean>;
  createBranch(name: string, base: string): Promise<string>;
  commit(branch: string, changes: FileChange[], message: string): Promise<string>;
  /** Changes on `b` since its merge base with `a`. */
  diff(a: string, b: string): Promise<PatchSet>;
  /**
   * Merge `source` into the `target` branch. Conflicted paths covered by
   * `resolutions` take the resolved content; any others abort the merge.
   */
  merge(source: string, target: string, message: string, resolutions?: FileChange[]): Promise<MergeResult>;
  /** Throws `ConflictError` when the workspace branch cannot fast-forward. */
  fastForward(workspace: WorkspaceHandle, targetRevision: string): Promise<string>;
  readFile(ref: string, path: string): Promise<string | null>;
  provisionWorkspace(workerId: string, base: string): Promise<WorkspaceHandle>;
  destroyWorkspace(handle: WorkspaceHandle): Promise<void>;
}

export function touchedPaths(patch: PatchSet): string[] {
  return Array.from(new Set(patch.entries.map((e) => e.path))).sort();
}

export function workspaceBranch(workerId: string) {
  return `workspace/${workerId}`;
}
