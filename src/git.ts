import {execaSync} from "execa";
import {existsSync} from "fs";
import {join} from "path";
import {DetachedHeadError, GitCommandError} from "./errors.js";
import {logger} from "./utils/logger.js";
import type {LiveWorktree} from "./worktree.js";

/**
 * The git operations the lifecycle manager depends on.
 * Everything is synchronous: each call blocks until git exits.
 */
export interface WorktreeGateway {
  isRepository(dir: string): boolean;
  branchExists(repo: string, branch: string): boolean;
  /** With `base`, creates `branch` from it; without, checks out the existing `branch`. */
  addWorktree(repo: string, path: string, branch: string, base?: string): void;
  /** Also deletes the local branch, best effort. */
  removeWorktree(repo: string, path: string, branch: string, force: boolean): void;
  /** Advisory: returns [] when git fails. */
  listActiveWorktrees(repo: string): LiveWorktree[];
  currentBranch(repo: string): string;
}

interface GitResult {
  ok: boolean;
  stdout: string;
  stderr: string;
}

const LOCAL_BRANCH_PREFIX = "refs/heads/";

/**
 * Parse `git worktree list --porcelain`.
 * Blocks without a local branch (detached HEAD, bare repository) are dropped.
 */
export function parseWorktreeList(output: string): LiveWorktree[] {
  const worktrees: LiveWorktree[] = [];

  for (const block of output.split(/\r?\n\r?\n/)) {
    if (!block.trim()) continue;

    let path: string | undefined;
    let branch: string | undefined;

    for (const line of block.split(/\r?\n/)) {
      if (line.startsWith("worktree ")) {
        path = line.slice("worktree ".length);
      } else if (line.startsWith("branch ")) {
        const ref = line.slice("branch ".length);
        if (ref.startsWith(LOCAL_BRANCH_PREFIX)) {
          branch = ref.slice(LOCAL_BRANCH_PREFIX.length);
        }
      }
    }

    if (path && branch) {
      worktrees.push({path, branch});
    }
  }

  return worktrees;
}

export class GitCli implements WorktreeGateway {
  private run(repo: string, args: string[]): GitResult {
    logger.debug(`git ${args.join(" ")}`, "git", {cwd: repo});
    const result = execaSync("git", args, {cwd: repo, reject: false});
    return {
      ok: !result.failed,
      stdout: result.stdout,
      stderr: result.stderr
    };
  }

  isRepository(dir: string): boolean {
    return existsSync(join(dir, ".git"));
  }

  branchExists(repo: string, branch: string): boolean {
    return this.run(repo, ["show-ref", "--verify", "--quiet", `${LOCAL_BRANCH_PREFIX}${branch}`]).ok;
  }

  addWorktree(repo: string, path: string, branch: string, base?: string): void {
    const args = ["worktree", "add"];
    if (base === undefined) {
      args.push(path, branch);
    } else {
      args.push("-b", branch, path, base);
    }

    const result = this.run(repo, args);
    if (!result.ok) {
      throw new GitCommandError("Failed to create worktree", result.stderr, {repo, path, branch});
    }
  }

  removeWorktree(repo: string, path: string, branch: string, force: boolean): void {
    const args = ["worktree", "remove"];
    if (force) {
      args.push("--force");
    }
    args.push(path);

    const result = this.run(repo, args);
    if (!result.ok) {
      throw new GitCommandError("Failed to remove worktree", result.stderr, {repo, path});
    }

    const deleted = this.run(repo, ["branch", "-D", branch]);
    if (!deleted.ok) {
      logger.debug(`Branch ${branch} was not deleted: ${deleted.stderr.trim()}`, "git");
    }
  }

  listActiveWorktrees(repo: string): LiveWorktree[] {
    const result = this.run(repo, ["worktree", "list", "--porcelain"]);
    if (!result.ok) {
      logger.debug(`git worktree list failed: ${result.stderr.trim()}`, "git");
      return [];
    }
    return parseWorktreeList(result.stdout);
  }

  currentBranch(repo: string): string {
    const result = this.run(repo, ["branch", "--show-current"]);
    if (!result.ok) {
      throw new GitCommandError("Failed to get current branch", result.stderr, {repo});
    }

    const branch = result.stdout.trim();
    if (!branch) {
      throw new DetachedHeadError(repo);
    }
    return branch;
  }
}
