import {AliasStore} from "./alias.js";
import type {ArborConfig} from "./config.js";
import {GitCli, type WorktreeGateway} from "./git.js";
import {WorktreeManager} from "./manager.js";
import {RegistryStore} from "./registry.js";
import {SystemPromptStore} from "./system-prompts.js";
import {TerminalEditor, type FileEditor} from "./utils/editor.js";
import {WorkspaceCoordinator, WorkspaceStore} from "./workspace.js";

/**
 * Everything a command needs, built once per invocation.
 */
export interface ArborContext {
  config: ArborConfig;
  gateway: WorktreeGateway;
  registry: RegistryStore;
  aliases: AliasStore;
  prompts: SystemPromptStore;
  editor: FileEditor;
  /** Manager for the project the command was run from. */
  manager: WorktreeManager;
  managerFor: (projectRoot: string) => WorktreeManager;
  workspaces: WorkspaceCoordinator;
}

export interface ContextOverrides {
  gateway?: WorktreeGateway;
  editor?: FileEditor;
}

export function createContext(
  config: ArborConfig,
  cwd: string,
  overrides: ContextOverrides = {}
): ArborContext {
  const gateway = overrides.gateway ?? new GitCli();
  const editor = overrides.editor ?? new TerminalEditor();
  const isRepository = (dir: string) => gateway.isRepository(dir);

  const registry = new RegistryStore({
    registryPath: config.registryPath,
    legacy: {
      worktreeBasePath: config.worktreeBasePath,
      workspacesDir: config.workspacesDir
    }
  });
  const aliases = new AliasStore({aliasDir: config.aliasDir, isRepository});
  const managerFor = (projectRoot: string) =>
    new WorktreeManager({projectRoot, basePath: config.worktreeBasePath, gateway, registry});

  return {
    config,
    gateway,
    registry,
    aliases,
    prompts: new SystemPromptStore(config.promptsDir),
    editor,
    manager: managerFor(cwd),
    managerFor,
    workspaces: new WorkspaceCoordinator({
      workspaces: new WorkspaceStore(config.workspacesDir),
      aliases,
      managerFor,
      editor,
      isRepository
    })
  };
}
