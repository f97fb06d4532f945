import {execa} from "execa";
import {basename} from "path";
import {EditorError} from "../errors.js";
import {waitForEnter} from "./prompt.js";

/**
 * Lets a human edit a file in place. Resolves once the edit is finished.
 */
export interface FileEditor {
  edit(path: string): Promise<void>;
}

const VIM_LIKE = new Set(["vi", "vim", "nvim"]);

export function getEditor(env: Record<string, string | undefined> = process.env): string {
  return env.EDITOR || "vi";
}

/** Terminal editors own the screen until they exit; GUI ones return at once. */
export function isVimLike(editor: string): boolean {
  return VIM_LIKE.has(basename(editor));
}

export class TerminalEditor implements FileEditor {
  constructor(private readonly command: string = getEditor()) {}

  async edit(path: string): Promise<void> {
    const result = await execa(this.command, [path], {
      stdio: "inherit",
      reject: false
    });

    if (result.failed) {
      throw new EditorError(`Editor ${this.command} exited with a non-zero status`, {
        path,
        exitCode: result.exitCode
      });
    }

    if (!isVimLike(this.command)) {
      await waitForEnter();
    }
  }
}
