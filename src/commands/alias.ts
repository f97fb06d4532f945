import type {ArborContext} from "../context.js";

export async function createAlias(ctx: ArborContext, name: string): Promise<number> {
  const alias = await ctx.aliases.create(name, ctx.editor);
  console.log(`Alias '${alias.name}' created with ${alias.projects.length} project(s).`);
  return 0;
}

export function listAliases(ctx: ArborContext): number {
  const aliases = ctx.aliases.list();
  if (aliases.length === 0) {
    console.error("No aliases found.");
    return 1;
  }
  for (const alias of aliases) {
    console.log(alias);
  }
  return 0;
}

export function removeAlias(ctx: ArborContext, name: string): number {
  ctx.aliases.remove(name);
  console.log(`Alias '${name}' removed.`);
  return 0;
}
