/**
 * Worktree types shared by the registry, the lifecycle manager and the CLI.
 */

export const WORKTREE_STATUSES = ["Active", "Paused", "Completed"] as const;

/** Only Active is produced today; Paused and Completed are reserved. */
export type WorktreeStatus = (typeof WORKTREE_STATUSES)[number];

/** project_root value for records recovered from legacy sidecar files. */
export const UNKNOWN_PROJECT_ROOT = "unknown";

/** Agent tag recorded for worktrees created as part of a workspace. */
export const NO_AGENT = "none";

export interface WorktreeRecord {
  id: string;
  branch: string;
  /** Absolute path of the worktree directory. */
  path: string;
  /** Absolute path of the origin repository, or UNKNOWN_PROJECT_ROOT. */
  projectRoot: string;
  projectName: string;
  agent: string;
  /** UTC, ISO-8601. Kept as written so re-saving never rewrites it. */
  createdAt: string;
  status: WorktreeStatus;
}

/** A worktree as git reports it. */
export interface LiveWorktree {
  path: string;
  branch: string;
}

export function newestFirst(a: WorktreeRecord, b: WorktreeRecord): number {
  return Date.parse(b.createdAt) - Date.parse(a.createdAt);
}
