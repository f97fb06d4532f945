import {homedir} from "os";
import {join, resolve} from "path";

export interface ArborConfig {
  /** Root of everything arbor keeps on disk. */
  baseDir: string;
  /** Directory under which worktrees are created. */
  worktreeBasePath: string;
  workspacesDir: string;
  aliasDir: string;
  promptsDir: string;
  registryPath: string;
}

export type Env = Record<string, string | undefined>;

/**
 * Resolve on-disk locations from the environment.
 * ARBOR_HOME moves the whole tree; ARBOR_WORKTREE_PATH moves only the worktrees.
 */
export function resolveConfig(env: Env = process.env): ArborConfig {
  const baseDir = env.ARBOR_HOME ? resolve(env.ARBOR_HOME) : join(homedir(), ".arbor");
  const worktreeBasePath = env.ARBOR_WORKTREE_PATH
    ? resolve(env.ARBOR_WORKTREE_PATH)
    : join(baseDir, "worktrees");

  return {
    baseDir,
    worktreeBasePath,
    workspacesDir: join(baseDir, "workspaces"),
    aliasDir: join(baseDir, "alias"),
    promptsDir: join(baseDir, "prompts"),
    registryPath: join(baseDir, "registry.json")
  };
}
