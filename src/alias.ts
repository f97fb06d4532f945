import {existsSync, mkdirSync, readFileSync, readdirSync, unlinkSync, writeFileSync} from "fs";
import {extname, join, resolve} from "path";
import {parse} from "yaml";
import {z} from "zod";
import {AliasExistsError, AliasNotFoundError, AliasValidationError, errorMessage} from "./errors.js";
import type {FileEditor} from "./utils/editor.js";

const ALIAS_EXTENSION = ".yml";

export const projectListSchema = z.object({
  projects: z.array(z.string().min(1)).nullish().transform((projects) => projects ?? [])
});

export const aliasSchema = projectListSchema.extend({
  name: z.string().min(1)
});

export interface AliasRecord {
  name: string;
  projects: string[];
}

export function aliasTemplate(name: string): string {
  return `# arbor workspace alias
# Add the full paths to the git repositories for this alias.

name: ${name}
projects:
#  - /path/to/your/first/project
#  - /path/to/your/second/project
`;
}

/**
 * Parse a YAML project list. Anything that is not a mapping with a list of
 * paths is reported as an AliasValidationError against `source`.
 */
export function parseProjectList(content: string, source: string): string[] {
  let raw: unknown;
  try {
    raw = parse(content);
  } catch (error) {
    throw new AliasValidationError(`Failed to parse ${source}: ${errorMessage(error)}`, source);
  }

  const parsed = projectListSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new AliasValidationError(`Failed to parse ${source}: expected a list of projects`, source);
  }
  return parsed.data.projects;
}

/**
 * Every path must exist and be a git repository. Fails on the first that is not.
 */
export function validateProjects(projects: string[], isRepository: (dir: string) => boolean): void {
  for (const project of projects) {
    if (!existsSync(project)) {
      throw new AliasValidationError(`Project path does not exist: ${project}`, project);
    }
    if (!isRepository(project)) {
      throw new AliasValidationError(`Project path is not a git repository: ${project}`, project);
    }
  }
}

export interface AliasStoreOptions {
  aliasDir: string;
  isRepository: (dir: string) => boolean;
}

/**
 * Named, reusable project lists kept as one YAML file each.
 */
export class AliasStore {
  readonly aliasDir: string;
  private readonly isRepository: (dir: string) => boolean;

  constructor(options: AliasStoreOptions) {
    this.aliasDir = options.aliasDir;
    this.isRepository = options.isRepository;
  }

  pathFor(name: string): string {
    return join(this.aliasDir, `${name}${ALIAS_EXTENSION}`);
  }

  exists(name: string): boolean {
    return existsSync(this.pathFor(name));
  }

  /**
   * Write the template, let the user fill it in, then validate. The file is
   * deleted again if what the user saved is not usable.
   */
  async create(name: string, editor: FileEditor): Promise<AliasRecord> {
    const path = this.pathFor(name);
    if (existsSync(path)) {
      throw new AliasExistsError(name);
    }

    mkdirSync(this.aliasDir, {recursive: true});
    writeFileSync(path, aliasTemplate(name));

    try {
      await editor.edit(path);
      const projects = parseProjectList(readFileSync(path, "utf-8"), path).map((project) => resolve(project));
      if (projects.length === 0) {
        throw new AliasValidationError("Alias must have at least one project", path);
      }
      validateProjects(projects, this.isRepository);
      return {name, projects};
    } catch (error) {
      unlinkSync(path);
      throw error;
    }
  }

  load(name: string): AliasRecord {
    const path = this.pathFor(name);
    if (!existsSync(path)) {
      throw new AliasNotFoundError(name);
    }

    const content = readFileSync(path, "utf-8");
    let raw: unknown;
    try {
      raw = parse(content);
    } catch (error) {
      throw new AliasValidationError(`Failed to parse alias '${name}': ${errorMessage(error)}`, path);
    }

    const parsed = aliasSchema.safeParse(raw);
    if (!parsed.success) {
      throw new AliasValidationError(`Failed to parse alias '${name}'`, path);
    }

    const projects = parsed.data.projects.map((project) => resolve(project));
    validateProjects(projects, this.isRepository);
    return {name: parsed.data.name, projects};
  }

  list(): string[] {
    if (!existsSync(this.aliasDir)) {
      return [];
    }
    return readdirSync(this.aliasDir)
      .filter((file) => extname(file) === ALIAS_EXTENSION)
      .map((file) => file.slice(0, -ALIAS_EXTENSION.length))
      .sort();
  }

  remove(name: string): void {
    const path = this.pathFor(name);
    if (!existsSync(path)) {
      throw new AliasNotFoundError(name);
    }
    unlinkSync(path);
  }
}
