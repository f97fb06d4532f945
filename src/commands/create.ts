import {getLauncher, launchAgent} from "../agents.js";
import type {ArborContext} from "../context.js";

export interface CreateOptions {
  agent: string;
  /** Command line for the custom agent. */
  command?: string;
  systemPrompt?: string;
  baseBranch?: string;
  /** Start the agent once the worktree exists. */
  launch: boolean;
  agentArgs: string[];
}

/**
 * Create a worktree for `branch` and hand it to the agent.
 * Resolves with the exit status the process should end with.
 */
export async function createWorktree(
  ctx: ArborContext,
  branch: string,
  options: CreateOptions
): Promise<number> {
  // Resolve the agent before touching git so a bad tag leaves nothing behind.
  const systemPrompt = options.systemPrompt ? ctx.prompts.load(options.systemPrompt) : undefined;
  const launcher = getLauncher(options.agent, {command: options.command, systemPrompt});

  const record = ctx.manager.create(branch, launcher.tag, options.baseBranch);
  console.log(`Created worktree for branch '${branch}' at: ${record.path}`);

  if (!options.launch) {
    return 0;
  }
  if (options.systemPrompt) {
    console.log(`Using system prompt: ${options.systemPrompt}`);
  }
  return launchAgent(record, launcher, options.agentArgs);
}
