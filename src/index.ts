#!/usr/bin/env node
import {Command} from "commander";
import {AGENT_TAGS} from "./agents.js";
import {createAlias, listAliases, removeAlias} from "./commands/alias.js";
import {createWorktree} from "./commands/create.js";
import {listWorktrees} from "./commands/list.js";
import {printPath} from "./commands/path.js";
import {listPrompts} from "./commands/prompts.js";
import {removeWorktree} from "./commands/remove.js";
import {showStatus} from "./commands/status.js";
import {createWorkspace, listWorkspaces, removeWorkspace} from "./commands/workspace.js";
import {resolveConfig} from "./config.js";
import {createContext, type ArborContext} from "./context.js";
import {formatError} from "./errors.js";

interface CreateCommandOptions {
  agent: string;
  command?: string;
  systemPrompt?: string;
  baseBranch?: string;
  launch: boolean;
}

function context(): ArborContext {
  return createContext(resolveConfig(), process.cwd());
}

function finish(code: number): void {
  process.exitCode = code;
}

const program = new Command();

program
  .name("arbor")
  .description("Manage git worktrees with coding agents for parallel development")
  .action(() => {
    finish(listWorktrees(context()));
  });

program
  .command("create")
  .description("Create a worktree for a branch and start an agent in it")
  .argument("<branch>", "Branch name for the worktree")
  .argument("[agentArgs...]", "Arguments passed to the agent (after --)")
  .option("--agent <agent>", `Agent to use (${AGENT_TAGS.join(", ")})`, "claude")
  .option("--command <command>", "Command line to run for the custom agent")
  .option("--system-prompt <name>", "System prompt from the prompts directory")
  .option("--base-branch <branch>", "Branch to start from (defaults to the current branch)")
  .option("--no-launch", "Create the worktree without starting the agent")
  .action(async (branch: string, agentArgs: string[], options: CreateCommandOptions) => {
    finish(await createWorktree(context(), branch, {...options, agentArgs}));
  });

program
  .command("ls")
  .description("List worktrees")
  .action(() => {
    finish(listWorktrees(context()));
  });

program
  .command("status")
  .description("Show status of this project's worktrees")
  .action(() => {
    finish(showStatus(context()));
  });

program
  .command("path")
  .description("Print the path of the worktree for a branch")
  .argument("<branch>", "Branch name of the worktree")
  .action((branch: string) => {
    finish(printPath(context(), branch));
  });

program
  .command("rm")
  .description("Remove a worktree and its branch")
  .argument("[branch]", "Branch name of the worktree to remove")
  .option("-f, --force", "Remove even if the worktree has local changes", false)
  .action(async (branch: string | undefined, options: {force: boolean}) => {
    finish(await removeWorktree(context(), branch, options.force));
  });

const workspace = program.command("workspace").description("Manage multi-project workspaces");

workspace
  .command("create")
  .description("Create a worktree named after the workspace in every project")
  .argument("<name>", "Workspace name, also used as the branch name")
  .option("--alias <alias>", "Take the project list from an alias")
  .option("--project <paths...>", "Project paths (skips the editor)")
  .action(async (name: string, options: {alias?: string; project?: string[]}) => {
    finish(await createWorkspace(context(), name, options));
  });

workspace
  .command("rm")
  .description("Remove a workspace and its worktrees")
  .argument("<name>", "Workspace name")
  .option("-f, --force", "Remove worktrees even if they have local changes", false)
  .action((name: string, options: {force: boolean}) => {
    finish(removeWorkspace(context(), name, options.force));
  });

workspace
  .command("ls")
  .description("List workspaces")
  .action(() => {
    finish(listWorkspaces(context()));
  });

const alias = program.command("alias").description("Manage reusable project lists");

alias
  .command("create")
  .description("Create an alias in your editor")
  .argument("<name>", "Alias name")
  .action(async (name: string) => {
    finish(await createAlias(context(), name));
  });

alias
  .command("ls")
  .description("List aliases")
  .action(() => {
    finish(listAliases(context()));
  });

alias
  .command("rm")
  .description("Remove an alias")
  .argument("<name>", "Alias name")
  .action((name: string) => {
    finish(removeAlias(context(), name));
  });

program
  .command("prompts")
  .description("List available system prompts")
  .action(() => {
    finish(listPrompts(context()));
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(formatError(error));
  process.exit(1);
});
