import {existsSync, mkdirSync, mkdtempSync, readFileSync, readdirSync, rmSync, unlinkSync, writeFileSync} from "fs";
import {tmpdir} from "os";
import {extname, join, resolve} from "path";
import {z} from "zod";
import {parseProjectList, validateProjects, type AliasStore} from "./alias.js";
import {
  AliasValidationError,
  WorkspaceCreationError,
  WorkspaceExistsError,
  WorkspaceNotFoundError,
  errorMessage
} from "./errors.js";
import type {WorktreeManager} from "./manager.js";
import type {FileEditor} from "./utils/editor.js";
import {logger} from "./utils/logger.js";
import {sanitizeName} from "./utils/sanitize.js";
import {NO_AGENT} from "./worktree.js";

const workspaceDocumentSchema = z.object({
  name: z.string().min(1),
  safe_name: z.string().min(1),
  projects: z.array(z.string().min(1)),
  alias: z.string().nullish(),
  created_at: z.string().datetime({offset: true})
});

export interface WorkspaceRecord {
  name: string;
  /** File key, `sanitizeName(name)`. */
  safeName: string;
  /** Project roots that received a worktree. */
  projects: string[];
  alias?: string;
  createdAt: string;
}

export type ProjectOutcome =
  | {project: string; ok: true; path: string}
  | {project: string; ok: false; error: string};

export interface WorkspaceResult {
  record: WorkspaceRecord;
  outcomes: ProjectOutcome[];
}

export function workspaceTemplate(): string {
  return `# arbor workspace
# Add the full paths to the git repositories for this workspace.

projects:
#  - /path/to/your/first/project
#  - /path/to/your/second/project
`;
}

/**
 * Workspace records, one JSON file per workspace named after its safe name.
 */
export class WorkspaceStore {
  constructor(readonly workspacesDir: string) {}

  pathFor(name: string): string {
    return join(this.workspacesDir, `${sanitizeName(name)}.json`);
  }

  exists(name: string): boolean {
    return existsSync(this.pathFor(name));
  }

  load(name: string): WorkspaceRecord {
    const path = this.pathFor(name);
    if (!existsSync(path)) {
      throw new WorkspaceNotFoundError(name);
    }
    return this.read(path);
  }

  save(record: WorkspaceRecord): void {
    mkdirSync(this.workspacesDir, {recursive: true});
    const document = {
      name: record.name,
      safe_name: record.safeName,
      projects: record.projects,
      alias: record.alias ?? null,
      created_at: record.createdAt
    };
    writeFileSync(this.pathFor(record.name), `${JSON.stringify(document, null, 2)}\n`);
  }

  delete(name: string): void {
    unlinkSync(this.pathFor(name));
  }

  /** Newest first. Files that do not parse are skipped. */
  list(): WorkspaceRecord[] {
    if (!existsSync(this.workspacesDir)) {
      return [];
    }

    const records: WorkspaceRecord[] = [];
    for (const entry of readdirSync(this.workspacesDir, {withFileTypes: true})) {
      if (!entry.isFile() || extname(entry.name) !== ".json") continue;
      const path = join(this.workspacesDir, entry.name);
      try {
        records.push(this.read(path));
      } catch (error) {
        logger.debug(`Ignoring ${path}: ${errorMessage(error)}`, "workspace");
      }
    }

    return records.sort((a, b) => Date.parse(b.createdAt) - Date.parse(a.createdAt));
  }

  private read(path: string): WorkspaceRecord {
    const document = workspaceDocumentSchema.parse(JSON.parse(readFileSync(path, "utf-8")));
    return {
      name: document.name,
      safeName: document.safe_name,
      projects: document.projects,
      alias: document.alias ?? undefined,
      createdAt: document.created_at
    };
  }
}

export interface CreateWorkspaceOptions {
  /** Take the project list from this alias. */
  alias?: string;
  /** Explicit project list; when neither is given the editor is opened. */
  projects?: string[];
}

export interface WorkspaceCoordinatorOptions {
  workspaces: WorkspaceStore;
  aliases: AliasStore;
  managerFor: (projectRoot: string) => WorktreeManager;
  editor: FileEditor;
  isRepository: (dir: string) => boolean;
}

/**
 * Creates and removes one branch-named worktree per project.
 *
 * Individual projects may fail without failing the workspace; only the
 * projects that got a worktree are recorded.
 */
export class WorkspaceCoordinator {
  private readonly workspaces: WorkspaceStore;
  private readonly aliases: AliasStore;
  private readonly managerFor: (projectRoot: string) => WorktreeManager;
  private readonly editor: FileEditor;
  private readonly isRepository: (dir: string) => boolean;

  constructor(options: WorkspaceCoordinatorOptions) {
    this.workspaces = options.workspaces;
    this.aliases = options.aliases;
    this.managerFor = options.managerFor;
    this.editor = options.editor;
    this.isRepository = options.isRepository;
  }

  async create(name: string, options: CreateWorkspaceOptions = {}): Promise<WorkspaceResult> {
    if (this.workspaces.exists(name)) {
      throw new WorkspaceExistsError(name);
    }

    const projects = await this.resolveProjects(name, options);
    if (projects.length === 0) {
      throw new AliasValidationError("No projects specified for workspace", this.workspaces.pathFor(name));
    }
    validateProjects(projects, this.isRepository);

    const outcomes: ProjectOutcome[] = [];
    for (const project of projects) {
      try {
        const record = this.managerFor(project).create(name, NO_AGENT);
        logger.info(`Created worktree for ${project} at ${record.path}`, "workspace");
        outcomes.push({project, ok: true, path: record.path});
      } catch (error) {
        logger.warn(`Failed to create worktree for ${project}: ${errorMessage(error)}`, "workspace");
        outcomes.push({project, ok: false, error: errorMessage(error)});
      }
    }

    const created = outcomes.filter((outcome) => outcome.ok).map((outcome) => outcome.project);
    if (created.length === 0) {
      const failures: Record<string, string> = {};
      for (const outcome of outcomes) {
        if (!outcome.ok) failures[outcome.project] = outcome.error;
      }
      throw new WorkspaceCreationError(name, failures);
    }

    const record: WorkspaceRecord = {
      name,
      safeName: sanitizeName(name),
      projects: created,
      alias: options.alias,
      createdAt: new Date().toISOString()
    };
    this.workspaces.save(record);
    return {record, outcomes};
  }

  /**
   * Attempt removal in every project, then drop the record regardless of
   * how many attempts failed.
   */
  remove(name: string, force = false): WorkspaceResult {
    const record = this.workspaces.load(name);
    const outcomes: ProjectOutcome[] = [];

    for (const project of record.projects) {
      const manager = this.managerFor(project);
      const path = manager.worktreePathFor(record.name);
      try {
        manager.removeAt(path, record.name, force);
        logger.info(`Removed worktree for ${project}`, "workspace");
        outcomes.push({project, ok: true, path});
      } catch (error) {
        logger.warn(`Failed to remove worktree for ${project}: ${errorMessage(error)}`, "workspace");
        outcomes.push({project, ok: false, error: errorMessage(error)});
      }
    }

    this.workspaces.delete(name);
    return {record, outcomes};
  }

  list(): WorkspaceRecord[] {
    return this.workspaces.list();
  }

  /** Relative entries are resolved against the working directory. */
  private async resolveProjects(name: string, options: CreateWorkspaceOptions): Promise<string[]> {
    let projects: string[];
    if (options.alias) {
      projects = this.aliases.load(options.alias).projects;
    } else if (options.projects) {
      projects = options.projects;
    } else {
      projects = await this.projectsFromEditor(name);
    }
    return projects.map((project) => resolve(project));
  }

  private async projectsFromEditor(name: string): Promise<string[]> {
    const dir = mkdtempSync(join(tmpdir(), "arbor-workspace-"));
    const file = join(dir, `${sanitizeName(name)}.yml`);
    try {
      writeFileSync(file, workspaceTemplate());
      await this.editor.edit(file);
      return parseProjectList(readFileSync(file, "utf-8"), file);
    } finally {
      rmSync(dir, {recursive: true, force: true});
    }
  }
}
