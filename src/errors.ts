/**
 * Error types for arbor.
 *
 * Every failure the CLI reports is an ArborError (or a subclass) so the
 * top-level handler can print a category and, in debug mode, context.
 */

export type ErrorCategory =
  | "git" // Non-zero exit from a git invocation
  | "registry" // Registry document problems
  | "worktree" // Lifecycle lookups and conflicts
  | "workspace" // Workspace records and coordination
  | "alias" // Alias files and project validation
  | "agent" // Agent selection and launch
  | "config" // Configuration and editor
  | "internal";

export class ArborError extends Error {
  readonly category: ErrorCategory;
  readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    category: ErrorCategory,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message);
    this.name = "ArborError";
    this.category = category;
    this.context = context;
    if (cause) {
      this.cause = cause;
      if (cause.stack) {
        this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
      }
    }
  }
}

export class GitCommandError extends ArborError {
  readonly stderr: string;

  constructor(message: string, stderr: string, context?: Record<string, unknown>) {
    const detail = stderr.trim();
    super(detail ? `${message}: ${detail}` : message, "git", context);
    this.name = "GitCommandError";
    this.stderr = stderr;
  }
}

export class DetachedHeadError extends ArborError {
  constructor(repo: string) {
    super(
      `No current branch found in ${repo} (detached HEAD?). Pass --base-branch explicitly.`,
      "git",
      {repo}
    );
    this.name = "DetachedHeadError";
  }
}

export class RegistryCorruptError extends ArborError {
  constructor(registryPath: string, reason: string, cause?: Error) {
    super(`Registry at ${registryPath} is corrupt: ${reason}`, "registry", {registryPath}, cause);
    this.name = "RegistryCorruptError";
  }
}

export class WorktreeNotFoundError extends ArborError {
  readonly known: string[];

  constructor(branch: string, known: string[]) {
    super(`Worktree for branch '${branch}' not found`, "worktree", {branch, known});
    this.name = "WorktreeNotFoundError";
    this.known = known;
  }
}

export class WorktreeExistsError extends ArborError {
  constructor(path: string) {
    super(`Worktree directory already exists: ${path}`, "worktree", {path});
    this.name = "WorktreeExistsError";
  }
}

export class AliasValidationError extends ArborError {
  readonly projectPath: string;

  constructor(message: string, projectPath: string) {
    super(message, "alias", {projectPath});
    this.name = "AliasValidationError";
    this.projectPath = projectPath;
  }
}

export class AliasNotFoundError extends ArborError {
  constructor(name: string) {
    super(`Alias '${name}' not found`, "alias", {name});
    this.name = "AliasNotFoundError";
  }
}

export class AliasExistsError extends ArborError {
  constructor(name: string) {
    super(`Alias '${name}' already exists`, "alias", {name});
    this.name = "AliasExistsError";
  }
}

export class WorkspaceExistsError extends ArborError {
  constructor(name: string) {
    super(`Workspace '${name}' already exists`, "workspace", {name});
    this.name = "WorkspaceExistsError";
  }
}

export class WorkspaceNotFoundError extends ArborError {
  constructor(name: string) {
    super(`Workspace '${name}' not found`, "workspace", {name});
    this.name = "WorkspaceNotFoundError";
  }
}

export class WorkspaceCreationError extends ArborError {
  constructor(name: string, failures: Record<string, string>) {
    super(`Failed to create any worktrees for workspace '${name}'`, "workspace", {name, failures});
    this.name = "WorkspaceCreationError";
  }
}

export class AgentConfigError extends ArborError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "agent", context);
    this.name = "AgentConfigError";
  }
}

export class PromptNotFoundError extends ArborError {
  constructor(name: string, path: string) {
    super(`Prompt file '${name}' not found at ${path}`, "config", {name, path});
    this.name = "PromptNotFoundError";
  }
}

export class EditorError extends ArborError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "config", context);
    this.name = "EditorError";
  }
}

/**
 * Check if debug mode is enabled via environment variable
 */
export function isDebugMode(): boolean {
  return process.env.ARBOR_DEBUG === "1" || process.env.ARBOR_DEBUG === "true";
}

/**
 * Format an error for the terminal.
 * In debug mode, includes context and stack traces. Otherwise, just the message.
 */
export function formatError(error: unknown): string {
  const debug = isDebugMode();

  if (error instanceof WorktreeNotFoundError && error.known.length > 0) {
    const known = error.known.map((branch) => `  ${branch}`).join("\n");
    return `Error: ${error.message}. Available worktrees:\n${known}`;
  }

  if (error instanceof ArborError) {
    let response = `Error: ${error.message}`;
    if (debug) {
      response = `Error [${error.category}]: ${error.message}`;
      if (error.context) {
        response += `\n\nContext: ${JSON.stringify(error.context, null, 2)}`;
      }
      if (error.stack) {
        response += `\n\nStack trace:\n${error.stack}`;
      }
    }
    return response;
  }

  if (error instanceof Error) {
    let response = `Error: ${error.message}`;
    if (debug && error.stack) {
      response += `\n\nStack trace:\n${error.stack}`;
    }
    return response;
  }

  return `Error: ${String(error)}`;
}

/**
 * Render an unknown thrown value as a one-line reason.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
