import type {ArborContext} from "../context.js";

/**
 * Inside a repository, that project's worktrees; elsewhere, all of them.
 */
export function listWorktrees(ctx: ArborContext): number {
  const worktrees = ctx.manager.list();

  if (worktrees.length === 0) {
    console.error("No active worktrees found.");
    return 1;
  }

  for (const worktree of worktrees) {
    console.log(`${worktree.projectName} - ${worktree.branch} (${worktree.agent})`);
  }
  return 0;
}
