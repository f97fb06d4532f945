import {existsSync, readFileSync, readdirSync} from "fs";
import {extname, join} from "path";
import {PromptNotFoundError} from "./errors.js";

const PROMPT_EXTENSION = ".md";

/**
 * Markdown system prompts the claude agent can be started with.
 */
export class SystemPromptStore {
  constructor(readonly promptsDir: string) {}

  pathFor(name: string): string {
    const file = name.endsWith(PROMPT_EXTENSION) ? name : `${name}${PROMPT_EXTENSION}`;
    return join(this.promptsDir, file);
  }

  load(name: string): string {
    const path = this.pathFor(name);
    if (!existsSync(path)) {
      throw new PromptNotFoundError(name, path);
    }
    return readFileSync(path, "utf-8");
  }

  list(): string[] {
    if (!existsSync(this.promptsDir)) {
      return [];
    }
    return readdirSync(this.promptsDir, {withFileTypes: true})
      .filter((entry) => entry.isFile() && extname(entry.name) === PROMPT_EXTENSION)
      .map((entry) => entry.name.slice(0, -PROMPT_EXTENSION.length))
      .sort();
  }
}
