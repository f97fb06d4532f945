import type {ArborContext} from "../context.js";
import {formatTimestamp} from "./status.js";

export interface CreateWorkspaceCommandOptions {
  alias?: string;
  project?: string[];
}

export async function createWorkspace(
  ctx: ArborContext,
  name: string,
  options: CreateWorkspaceCommandOptions
): Promise<number> {
  const {record, outcomes} = await ctx.workspaces.create(name, {
    alias: options.alias,
    projects: options.project
  });

  const failed = outcomes.filter((outcome) => !outcome.ok).length;
  console.log(
    failed > 0
      ? `Workspace '${record.name}' created with ${record.projects.length} of ${outcomes.length} projects.`
      : `Workspace '${record.name}' created.`
  );
  return 0;
}

export function removeWorkspace(ctx: ArborContext, name: string, force: boolean): number {
  const {outcomes} = ctx.workspaces.remove(name, force);

  if (outcomes.some((outcome) => !outcome.ok)) {
    console.log(`Workspace '${name}' removed with some errors (see warnings above).`);
  } else {
    console.log(`Workspace '${name}' removed.`);
  }
  return 0;
}

export function listWorkspaces(ctx: ArborContext): number {
  const workspaces = ctx.workspaces.list();

  if (workspaces.length === 0) {
    console.error("No workspaces found.");
    return 1;
  }

  for (const workspace of workspaces) {
    const alias = workspace.alias ? ` [alias: ${workspace.alias}]` : "";
    console.log(`${workspace.name}${alias} - created ${formatTimestamp(workspace.createdAt)}`);
    for (const project of workspace.projects) {
      console.log(`  ${project}`);
    }
  }
  return 0;
}
