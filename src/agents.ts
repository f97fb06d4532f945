import {execa} from "execa";
import {AgentConfigError} from "./errors.js";
import {logger} from "./utils/logger.js";
import type {WorktreeRecord} from "./worktree.js";

export const AGENT_TAGS = ["claude", "gemini", "custom"] as const;

export type AgentTag = (typeof AGENT_TAGS)[number];

export function isAgentTag(value: string): value is AgentTag {
  return (AGENT_TAGS as readonly string[]).includes(value);
}

/**
 * Runs an agent in a worktree with the terminal handed over to it.
 * Resolves with the agent's exit status.
 */
export interface AgentLauncher {
  readonly tag: AgentTag;
  start(workDir: string, env: Record<string, string>, args: string[]): Promise<number>;
}

export interface LauncherOptions {
  /** Command line for the `custom` agent, run through the shell. */
  command?: string;
  /** System prompt content passed to claude. */
  systemPrompt?: string;
}

class CommandLauncher implements AgentLauncher {
  constructor(
    readonly tag: AgentTag,
    private readonly command: string,
    private readonly leadingArgs: string[] = [],
    private readonly shell = false
  ) {}

  async start(workDir: string, env: Record<string, string>, args: string[]): Promise<number> {
    logger.debug(`Launching ${this.command}`, "agent", {workDir, args});

    const result = await execa(this.command, [...this.leadingArgs, ...args], {
      cwd: workDir,
      env: {...process.env, ...env},
      stdio: "inherit",
      shell: this.shell,
      reject: false
    });

    if (result.signal) {
      logger.warn(`${this.tag} exited due to signal ${result.signal}`, "agent");
      return 1;
    }
    if (result.exitCode === undefined) {
      throw new AgentConfigError(`Failed to start agent command '${this.command}'`, {tag: this.tag});
    }
    return result.exitCode;
  }
}

/**
 * Select the launcher for `tag`. Unknown tags are a configuration error.
 */
export function getLauncher(tag: string, options: LauncherOptions = {}): AgentLauncher {
  if (!isAgentTag(tag)) {
    throw new AgentConfigError(`Unknown agent '${tag}'. Expected one of: ${AGENT_TAGS.join(", ")}`, {tag});
  }

  switch (tag) {
    case "claude":
      return new CommandLauncher(
        "claude",
        "claude",
        options.systemPrompt === undefined ? [] : ["--system-prompt", options.systemPrompt]
      );
    case "gemini":
      if (options.systemPrompt !== undefined) {
        logger.warn("gemini does not take a system prompt; ignoring it", "agent");
      }
      return new CommandLauncher("gemini", "gemini");
    case "custom":
      if (!options.command) {
        throw new AgentConfigError("The custom agent needs a command (--command)", {tag});
      }
      return new CommandLauncher("custom", options.command, [], true);
  }
}

/** Variables every agent sees about the worktree it runs in. */
export function agentEnv(record: WorktreeRecord): Record<string, string> {
  return {
    ARBOR_WORKTREE_DIR: record.path,
    ARBOR_BRANCH: record.branch,
    ARBOR_PROJECT: record.projectName,
    ARBOR_WORKTREE_ID: record.id,
    ARBOR_AGENT: record.agent
  };
}

export async function launchAgent(
  record: WorktreeRecord,
  launcher: AgentLauncher,
  args: string[]
): Promise<number> {
  console.log(`Starting ${launcher.tag} agent for branch: ${record.branch}`);
  return launcher.start(record.path, agentEnv(record), args);
}
