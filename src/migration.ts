/**
 * One-shot upgrade from per-worktree sidecar files to the central registry.
 *
 * Older releases wrote `.arbor-info.json` into every worktree directory:
 * directly under the worktree base, and for workspaces one level deeper
 * (`workspaces/<workspace>/<project>/`). The sidecar schema is the registry
 * record minus `project_root`, which is unknowable after the fact.
 */

import {existsSync, readFileSync, readdirSync, unlinkSync} from "fs";
import {join} from "path";
import {z} from "zod";
import {errorMessage} from "./errors.js";
import {logger} from "./utils/logger.js";
import {UNKNOWN_PROJECT_ROOT, WORKTREE_STATUSES, type WorktreeRecord} from "./worktree.js";

export const LEGACY_SIDECAR_FILE = ".arbor-info.json";

const legacySidecarSchema = z.object({
  id: z.string().min(1),
  branch: z.string().min(1),
  path: z.string().min(1),
  project_name: z.string(),
  agent: z.string(),
  created_at: z.string().datetime({offset: true}),
  status: z.enum(WORKTREE_STATUSES)
});

export interface LegacyLocations {
  worktreeBasePath: string;
  workspacesDir: string;
}

function subdirectories(dir: string): string[] {
  if (!existsSync(dir)) {
    return [];
  }
  return readdirSync(dir, {withFileTypes: true})
    .filter((entry) => entry.isDirectory())
    .map((entry) => join(dir, entry.name))
    .sort();
}

/**
 * Every sidecar file currently on disk, worktree base first.
 */
export function findLegacySidecars(locations: LegacyLocations): string[] {
  const candidates = [
    ...subdirectories(locations.worktreeBasePath),
    ...subdirectories(locations.workspacesDir).flatMap(subdirectories)
  ];
  return candidates
    .map((dir) => join(dir, LEGACY_SIDECAR_FILE))
    .filter((file) => existsSync(file));
}

export function parseLegacySidecar(content: string): WorktreeRecord {
  const legacy = legacySidecarSchema.parse(JSON.parse(content));
  return {
    id: legacy.id,
    branch: legacy.branch,
    path: legacy.path,
    projectRoot: UNKNOWN_PROJECT_ROOT,
    projectName: legacy.project_name,
    agent: legacy.agent,
    createdAt: legacy.created_at,
    status: legacy.status
  };
}

/**
 * Convert and delete every legacy sidecar. A file is deleted as soon as it
 * parses; files that fail to parse stay where they are.
 */
export function migrateLegacySidecars(locations: LegacyLocations): WorktreeRecord[] {
  const records: WorktreeRecord[] = [];

  for (const file of findLegacySidecars(locations)) {
    let record: WorktreeRecord;
    try {
      record = parseLegacySidecar(readFileSync(file, "utf-8"));
    } catch (error) {
      logger.warn(`Skipping unreadable legacy metadata ${file}: ${errorMessage(error)}`, "migration");
      continue;
    }

    unlinkSync(file);
    records.push(record);
    logger.debug(`Migrated ${file}`, "migration");
  }

  return records;
}
