import type {ArborContext} from "../context.js";

export function listPrompts(ctx: ArborContext): number {
  const prompts = ctx.prompts.list();
  if (prompts.length === 0) {
    console.error(`No system prompts found in ${ctx.prompts.promptsDir}`);
    return 1;
  }
  for (const prompt of prompts) {
    console.log(prompt);
  }
  return 0;
}
