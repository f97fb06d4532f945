import {randomUUID} from "crypto";
import {copyFileSync, existsSync, mkdirSync, readdirSync, realpathSync} from "fs";
import {basename, join, resolve} from "path";
import {WorktreeExistsError, WorktreeNotFoundError} from "./errors.js";
import type {WorktreeGateway} from "./git.js";
import type {RegistryStore} from "./registry.js";
import {logger} from "./utils/logger.js";
import {sanitizeName} from "./utils/sanitize.js";
import {UNKNOWN_PROJECT_ROOT, newestFirst, type WorktreeRecord} from "./worktree.js";

export interface WorktreeManagerOptions {
  projectRoot: string;
  /** Directory new worktrees are created under. */
  basePath: string;
  gateway: WorktreeGateway;
  registry: RegistryStore;
}

const ENV_FILE_PREFIX = ".env";

function canonicalPath(path: string): string {
  return existsSync(path) ? realpathSync(path) : resolve(path);
}

/**
 * Creates, lists and removes the worktrees of one project.
 *
 * git owns which worktrees exist; the registry owns what arbor knows about
 * them. A worktree is only reported when both agree.
 */
export class WorktreeManager {
  readonly projectRoot: string;
  readonly basePath: string;
  private readonly gateway: WorktreeGateway;
  private readonly registry: RegistryStore;

  constructor(options: WorktreeManagerOptions) {
    this.projectRoot = resolve(options.projectRoot);
    this.basePath = resolve(options.basePath);
    this.gateway = options.gateway;
    this.registry = options.registry;
  }

  get projectName(): string {
    return basename(this.projectRoot) || "project";
  }

  isRepository(): boolean {
    return this.gateway.isRepository(this.projectRoot);
  }

  /** Where `create(branch, ...)` puts the worktree. */
  worktreePathFor(branch: string): string {
    return join(this.basePath, `${this.projectName}-${sanitizeName(branch)}`);
  }

  /**
   * Create a worktree for `branch`. An existing branch is checked out as is;
   * a new one starts from `baseBranch`, or from the current branch.
   *
   * Nothing is rolled back if recording the worktree or copying env files
   * fails after git has created it.
   */
  create(branch: string, agent: string, baseBranch?: string): WorktreeRecord {
    const path = this.worktreePathFor(branch);
    if (existsSync(path)) {
      throw new WorktreeExistsError(path);
    }

    mkdirSync(this.basePath, {recursive: true});
    const base = baseBranch ?? this.gateway.currentBranch(this.projectRoot);

    if (this.gateway.branchExists(this.projectRoot, branch)) {
      logger.debug(`Attaching existing branch ${branch}`, "worktree");
      this.gateway.addWorktree(this.projectRoot, path, branch);
    } else {
      logger.debug(`Creating branch ${branch} from ${base}`, "worktree");
      this.gateway.addWorktree(this.projectRoot, path, branch, base);
    }

    const record: WorktreeRecord = {
      id: randomUUID(),
      branch,
      path,
      projectRoot: this.projectRoot,
      projectName: this.projectName,
      agent,
      createdAt: new Date().toISOString(),
      status: "Active"
    };

    this.registry.add(record);
    this.copyEnvFiles(path);
    return record;
  }

  /**
   * Inside a repository: this project's worktrees that git still reports and
   * the registry knows about. Outside: every registered worktree, newest first.
   */
  list(): WorktreeRecord[] {
    if (!this.isRepository()) {
      return this.registry.load().sort(newestFirst);
    }

    const live = new Set(
      this.gateway.listActiveWorktrees(this.projectRoot).map((worktree) => canonicalPath(worktree.path))
    );

    return this.registry
      .load()
      .filter((record) => record.projectRoot === this.projectRoot && live.has(canonicalPath(record.path)));
  }

  find(branch: string): WorktreeRecord {
    const worktrees = this.list();
    const match = worktrees.find((worktree) => worktree.branch === branch);
    if (!match) {
      throw new WorktreeNotFoundError(
        branch,
        worktrees.map((worktree) => worktree.branch)
      );
    }
    return match;
  }

  remove(branch: string, force = false): WorktreeRecord {
    const record = this.find(branch);
    this.removeRecord(record, force);
    return record;
  }

  /**
   * Remove a registered worktree through the repository it was created from,
   * so records listed from outside any repository can still be removed.
   */
  removeRecord(record: WorktreeRecord, force = false): void {
    const repo = record.projectRoot === UNKNOWN_PROJECT_ROOT ? this.projectRoot : record.projectRoot;
    this.removeAt(record.path, record.branch, force, repo);
  }

  /**
   * Remove the worktree at `path`, running git in `repo`. The registry is
   * only touched once git has removed it.
   */
  removeAt(path: string, branch: string, force = false, repo = this.projectRoot): void {
    this.gateway.removeWorktree(repo, path, branch, force);
    if (!this.registry.removeByPath(path)) {
      logger.debug(`No registry record for ${path}`, "worktree");
    }
  }

  private copyEnvFiles(worktreePath: string): void {
    const entries = readdirSync(this.projectRoot, {withFileTypes: true});
    for (const entry of entries) {
      if (entry.isFile() && entry.name.startsWith(ENV_FILE_PREFIX)) {
        copyFileSync(join(this.projectRoot, entry.name), join(worktreePath, entry.name));
        logger.debug(`Copied ${entry.name}`, "worktree");
      }
    }
  }
}
