import type {ArborContext} from "../context.js";
import type {WorktreeRecord} from "../worktree.js";

export function formatTimestamp(iso: string): string {
  return `${new Date(iso).toISOString().slice(0, 19).replace("T", " ")} UTC`;
}

export function formatStatus(worktree: WorktreeRecord): string[] {
  return [
    `  Branch: ${worktree.branch}`,
    `    Path: ${worktree.path}`,
    `    Agent: ${worktree.agent}`,
    `    Status: ${worktree.status}`,
    `    Created: ${formatTimestamp(worktree.createdAt)}`,
    ""
  ];
}

export function showStatus(ctx: ArborContext): number {
  console.log("Worktree Status:");
  for (const worktree of ctx.manager.list()) {
    console.log(formatStatus(worktree).join("\n"));
  }
  return 0;
}
