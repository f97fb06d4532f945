import type {ArborContext} from "../context.js";

export function printPath(ctx: ArborContext, branch: string): number {
  console.log(ctx.manager.find(branch).path);
  return 0;
}
