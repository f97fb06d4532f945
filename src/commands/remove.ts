import type {ArborContext} from "../context.js";
import {GitCommandError} from "../errors.js";
import {confirm} from "../utils/prompt.js";

export async function removeWorktree(
  ctx: ArborContext,
  branch: string | undefined,
  force: boolean
): Promise<number> {
  if (!branch) {
    const worktrees = ctx.manager.list();
    if (worktrees.length === 0) {
      console.error("No active worktrees found to remove.");
      return 1;
    }

    console.error("Please specify a branch name to remove. Available worktrees:");
    for (const worktree of worktrees) {
      console.error(`  ${worktree.branch}`);
    }
    return 1;
  }

  const record = ctx.manager.find(branch);
  try {
    ctx.manager.removeRecord(record, force);
  } catch (error) {
    // git refuses to remove worktrees with local changes unless forced.
    if (force || !(error instanceof GitCommandError)) {
      throw error;
    }
    console.error(error.message);
    const shouldForce = await confirm(`Force removal of ${record.path}?`);
    if (!shouldForce) {
      return 1;
    }
    ctx.manager.removeRecord(record, true);
  }

  console.log(`Removed worktree for branch '${branch}'`);
  return 0;
}
