import {mkdtempSync, readFileSync, rmSync, writeFileSync} from "fs";
import {tmpdir} from "os";
import {join} from "path";
import type {FileEditor} from "../../src/utils/editor.js";
import type {WorktreeRecord} from "../../src/worktree.js";

export interface Sandbox {
  root: string;
  cleanup: () => void;
}

export function createSandbox(name: string): Sandbox {
  const root = mkdtempSync(join(tmpdir(), `arbor-${name}-`));
  return {
    root,
    cleanup: () => rmSync(root, {recursive: true, force: true})
  };
}

export function makeRecord(overrides: Partial<WorktreeRecord> = {}): WorktreeRecord {
  return {
    id: "00000000-0000-4000-8000-000000000001",
    branch: "feature-a",
    path: "/tmp/worktrees/repo-feature-a",
    projectRoot: "/tmp/repo",
    projectName: "repo",
    agent: "claude",
    createdAt: "2025-03-01T10:00:00.000Z",
    status: "Active",
    ...overrides
  };
}

/**
 * Stands in for a human in an editor: replaces the file with `content`.
 */
export class ScriptedEditor implements FileEditor {
  readonly seen: string[] = [];

  constructor(private readonly content: string) {}

  async edit(path: string): Promise<void> {
    this.seen.push(readFileSync(path, "utf-8"));
    writeFileSync(path, this.content);
  }
}
