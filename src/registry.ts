import {existsSync, mkdirSync, readFileSync, renameSync, writeFileSync} from "fs";
import {dirname} from "path";
import {z} from "zod";
import {RegistryCorruptError, errorMessage} from "./errors.js";
import {migrateLegacySidecars, type LegacyLocations} from "./migration.js";
import {logger} from "./utils/logger.js";
import {WORKTREE_STATUSES, type WorktreeRecord} from "./worktree.js";

export const REGISTRY_VERSION = 1;

/** One worktree as stored on disk. */
export const storedRecordSchema = z.object({
  id: z.string().min(1),
  branch: z.string().min(1),
  path: z.string().min(1),
  project_root: z.string().min(1),
  project_name: z.string(),
  agent: z.string(),
  created_at: z.string().datetime({offset: true}),
  status: z.enum(WORKTREE_STATUSES)
});

export type StoredRecord = z.infer<typeof storedRecordSchema>;

/** Documents written before the version field existed are read as version 1. */
const registryDocumentSchema = z.object({
  version: z.number().int().positive().optional(),
  worktrees: z.array(storedRecordSchema)
});

export function fromStored(stored: StoredRecord): WorktreeRecord {
  return {
    id: stored.id,
    branch: stored.branch,
    path: stored.path,
    projectRoot: stored.project_root,
    projectName: stored.project_name,
    agent: stored.agent,
    createdAt: stored.created_at,
    status: stored.status
  };
}

export function toStored(record: WorktreeRecord): StoredRecord {
  return {
    id: record.id,
    branch: record.branch,
    path: record.path,
    project_root: record.projectRoot,
    project_name: record.projectName,
    agent: record.agent,
    created_at: record.createdAt,
    status: record.status
  };
}

export interface RegistryStoreOptions {
  registryPath: string;
  /** Where pre-registry sidecar files may still be lying around. */
  legacy: LegacyLocations;
}

/**
 * The JSON registry of worktree metadata.
 *
 * Each mutation is a full load-modify-save cycle with no locking; two arbor
 * processes mutating at once can lose an update.
 */
export class RegistryStore {
  readonly registryPath: string;
  private readonly legacy: LegacyLocations;

  constructor(options: RegistryStoreOptions) {
    this.registryPath = options.registryPath;
    this.legacy = options.legacy;
  }

  load(): WorktreeRecord[] {
    if (!existsSync(this.registryPath)) {
      return this.migrate();
    }

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(this.registryPath, "utf-8"));
    } catch (error) {
      throw new RegistryCorruptError(
        this.registryPath,
        errorMessage(error),
        error instanceof Error ? error : undefined
      );
    }

    const parsed = registryDocumentSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
      throw new RegistryCorruptError(this.registryPath, `${issue?.message ?? "invalid document"}${where}`);
    }

    const version = parsed.data.version ?? REGISTRY_VERSION;
    if (version > REGISTRY_VERSION) {
      throw new RegistryCorruptError(
        this.registryPath,
        `version ${version} is newer than supported version ${REGISTRY_VERSION}`
      );
    }

    return parsed.data.worktrees.map(fromStored);
  }

  /**
   * Replace the registry with `records`. The document is written beside the
   * target and renamed over it.
   */
  save(records: WorktreeRecord[]): void {
    mkdirSync(dirname(this.registryPath), {recursive: true});
    const document = {
      version: REGISTRY_VERSION,
      worktrees: records.map(toStored)
    };
    const tempPath = `${this.registryPath}.${process.pid}.tmp`;
    writeFileSync(tempPath, `${JSON.stringify(document, null, 2)}\n`);
    renameSync(tempPath, this.registryPath);
  }

  /** A record already stored under the same path is replaced. */
  add(record: WorktreeRecord): void {
    const records = this.load().filter((existing) => existing.path !== record.path);
    records.push(record);
    this.save(records);
  }

  /** Returns whether a record was removed. */
  removeByPath(path: string): boolean {
    const records = this.load();
    const remaining = records.filter((record) => record.path !== path);
    if (remaining.length === records.length) {
      return false;
    }
    this.save(remaining);
    return true;
  }

  private migrate(): WorktreeRecord[] {
    const migrated = migrateLegacySidecars(this.legacy);
    if (migrated.length > 0) {
      this.save(migrated);
      logger.info(`Migrated ${migrated.length} worktree(s) into ${this.registryPath}`, "registry");
    }
    return migrated;
  }
}
