import {existsSync, writeFileSync} from "fs";
import {join} from "path";
import {afterEach, beforeEach, describe, expect, it} from "vitest";
import {DetachedHeadError, GitCommandError} from "../../src/errors.js";
import {GitCli} from "../../src/git.js";
import {WorktreeManager} from "../../src/manager.js";
import {RegistryStore} from "../../src/registry.js";
import {createSandbox, type Sandbox} from "../support/fixtures.js";
import {
  branchExists,
  createTestEnvFile,
  createTestRepo,
  fileExists,
  getCurrentBranch,
  git,
  gitAvailable,
  readFile
} from "./setup.js";

describe.skipIf(!gitAvailable())("worktree lifecycle against git", () => {
  let sandbox: Sandbox;
  let repo: string;
  let basePath: string;
  let registry: RegistryStore;
  let gateway: GitCli;
  let manager: WorktreeManager;

  beforeEach(() => {
    sandbox = createSandbox("e2e");
    repo = createTestRepo(sandbox.root);
    basePath = join(sandbox.root, "worktrees");
    registry = new RegistryStore({
      registryPath: join(sandbox.root, "home", "registry.json"),
      legacy: {worktreeBasePath: basePath, workspacesDir: join(sandbox.root, "home", "workspaces")}
    });
    gateway = new GitCli();
    manager = new WorktreeManager({projectRoot: repo, basePath, gateway, registry});
  });

  afterEach(() => {
    sandbox.cleanup();
  });

  it("creates a branch from main, a worktree and a record, and copies env files", () => {
    createTestEnvFile(repo);
    createTestEnvFile(repo, ".env.production", "MODE=prod\n");

    const record = manager.create("feature-x", "claude");

    const worktreePath = join(basePath, "repo-feature-x");
    expect(record.path).toBe(worktreePath);
    expect(branchExists(repo, "feature-x")).toBe(true);
    expect(getCurrentBranch(worktreePath)).toBe("feature-x");
    expect(git(repo, "rev-parse feature-x")).toBe(git(repo, "rev-parse main"));
    expect(readFile(worktreePath, ".env")).toBe("TEST_VAR=test_value\n");
    expect(readFile(worktreePath, ".env.production")).toBe("MODE=prod\n");
    expect(fileExists(worktreePath, "README.md")).toBe(true);
    expect(registry.load()).toEqual([record]);
    expect(record.status).toBe("Active");
    expect(manager.list()).toEqual([record]);
  });

  it("attaches an existing branch", () => {
    git(repo, "branch existing");

    const record = manager.create("existing", "gemini");

    expect(getCurrentBranch(record.path)).toBe("existing");
  });

  it("removes the worktree, its branch and its record", () => {
    const record = manager.create("feature-x", "claude");

    manager.remove("feature-x");

    expect(manager.list()).toEqual([]);
    expect(existsSync(record.path)).toBe(false);
    expect(branchExists(repo, "feature-x")).toBe(false);
    expect(registry.load()).toEqual([]);
  });

  it("keeps dirty worktrees unless forced", () => {
    const record = manager.create("dirty", "claude");
    writeFileSync(join(record.path, "scratch.txt"), "work in progress\n");

    expect(() => manager.remove("dirty")).toThrow(GitCommandError);
    expect(registry.load()).toEqual([record]);
    expect(existsSync(record.path)).toBe(true);

    manager.remove("dirty", true);
    expect(existsSync(record.path)).toBe(false);
    expect(registry.load()).toEqual([]);
  });

  it("stops reporting a worktree removed outside arbor", () => {
    const record = manager.create("manual", "claude");
    git(repo, `worktree remove "${record.path}"`);

    expect(manager.list()).toEqual([]);
    expect(registry.load()).toEqual([record]);
  });

  it("keeps one record when a branch removed outside arbor is created again", () => {
    const first = manager.create("again", "claude");
    git(repo, `worktree remove "${first.path}"`);

    const second = manager.create("again", "gemini");

    expect(registry.load()).toEqual([second]);
    expect(manager.list()).toEqual([second]);
    expect(manager.find("again").id).toBe(second.id);
  });

  it("removes a worktree from outside the repository", () => {
    const record = manager.create("remote", "claude");
    const outside = new WorktreeManager({projectRoot: sandbox.root, basePath, gateway, registry});

    outside.remove("remote");

    expect(existsSync(record.path)).toBe(false);
    expect(branchExists(repo, "remote")).toBe(false);
    expect(registry.load()).toEqual([]);
  });

  it("needs a base branch on a detached HEAD", () => {
    git(repo, "checkout --detach");

    expect(() => manager.create("no-base", "claude")).toThrow(DetachedHeadError);
    expect(manager.create("with-base", "claude", "main").branch).toBe("with-base");
  });

  it("reports no live worktrees outside a repository", () => {
    expect(gateway.isRepository(sandbox.root)).toBe(false);
    expect(gateway.listActiveWorktrees(sandbox.root)).toEqual([]);
  });
});
