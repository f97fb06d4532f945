import {join} from "path";
import {afterEach, beforeEach, describe, expect, it, vi} from "vitest";
import {createWorktree} from "../../src/commands/create.js";
import {listWorktrees} from "../../src/commands/list.js";
import {printPath} from "../../src/commands/path.js";
import {removeWorktree} from "../../src/commands/remove.js";
import {createWorkspace, listWorkspaces, removeWorkspace} from "../../src/commands/workspace.js";
import {resolveConfig} from "../../src/config.js";
import {createContext, type ArborContext} from "../../src/context.js";
import {AgentConfigError} from "../../src/errors.js";
import {confirm} from "../../src/utils/prompt.js";
import {FakeGateway} from "../support/fake-gateway.js";
import {ScriptedEditor, createSandbox, type Sandbox} from "../support/fixtures.js";

vi.mock("../../src/utils/prompt.js", async (importOriginal) => ({
  ...(await importOriginal<typeof import("../../src/utils/prompt.js")>()),
  confirm: vi.fn()
}));

describe("commands", () => {
  let sandbox: Sandbox;
  let gateway: FakeGateway;
  let repo: string;
  let ctx: ArborContext;

  beforeEach(() => {
    vi.mocked(confirm).mockReset();
    sandbox = createSandbox("commands");
    gateway = new FakeGateway();
    repo = gateway.addRepo(join(sandbox.root, "repo"), "main");
    const config = resolveConfig({ARBOR_HOME: join(sandbox.root, "home")});
    ctx = createContext(config, repo, {gateway, editor: new ScriptedEditor("projects: []\n")});
  });

  afterEach(() => {
    sandbox.cleanup();
  });

  function create(branch: string, agent = "claude"): Promise<number> {
    return createWorktree(ctx, branch, {agent, launch: false, agentArgs: []});
  }

  it("wires every store under the configured home", () => {
    const home = join(sandbox.root, "home");

    expect(ctx.config.worktreeBasePath).toBe(join(home, "worktrees"));
    expect(ctx.registry.registryPath).toBe(join(home, "registry.json"));
    expect(ctx.aliases.aliasDir).toBe(join(home, "alias"));
    expect(ctx.manager.projectRoot).toBe(repo);
    expect(ctx.managerFor(repo).basePath).toBe(join(home, "worktrees"));
  });

  describe("create", () => {
    it("creates without launching and reports the path", async () => {
      const log = vi.spyOn(console, "log").mockImplementation(() => {});
      const path = join(sandbox.root, "home", "worktrees", "repo-feature-x");

      expect(await create("feature-x", "gemini")).toBe(0);

      expect(log).toHaveBeenCalledWith(`Created worktree for branch 'feature-x' at: ${path}`);
      expect(ctx.registry.load().map((record) => record.agent)).toEqual(["gemini"]);
    });

    it("rejects an unknown agent before touching git", async () => {
      await expect(create("feature-x", "copilot")).rejects.toThrow(AgentConfigError);
      expect(gateway.addCalls).toEqual([]);
    });

    it("exits with the agent's exit status", async () => {
      vi.spyOn(console, "log").mockImplementation(() => {});

      const code = await createWorktree(ctx, "feature-x", {
        agent: "custom",
        command: "exit 3",
        launch: true,
        agentArgs: []
      });

      expect(code).toBe(3);
    });
  });

  describe("ls and path", () => {
    it("exits 1 when there is nothing to list", () => {
      const errors = vi.spyOn(console, "error").mockImplementation(() => {});

      expect(listWorktrees(ctx)).toBe(1);
      expect(errors).toHaveBeenCalledWith("No active worktrees found.");
    });

    it("prints one line per worktree and the path of a branch", async () => {
      await create("feature-x", "gemini");
      const log = vi.spyOn(console, "log").mockImplementation(() => {});

      expect(listWorktrees(ctx)).toBe(0);
      expect(printPath(ctx, "feature-x")).toBe(0);

      expect(log.mock.calls).toEqual([
        ["repo - feature-x (gemini)"],
        [join(sandbox.root, "home", "worktrees", "repo-feature-x")]
      ]);
    });
  });

  describe("rm", () => {
    it("lists the branches and exits 1 without a branch", async () => {
      await create("one");
      await create("two");
      const errors = vi.spyOn(console, "error").mockImplementation(() => {});

      expect(await removeWorktree(ctx, undefined, false)).toBe(1);
      expect(errors.mock.calls).toEqual([
        ["Please specify a branch name to remove. Available worktrees:"],
        ["  one"],
        ["  two"]
      ]);
    });

    it("exits 1 without a branch when nothing exists", async () => {
      const errors = vi.spyOn(console, "error").mockImplementation(() => {});

      expect(await removeWorktree(ctx, undefined, false)).toBe(1);
      expect(errors).toHaveBeenCalledWith("No active worktrees found to remove.");
    });

    it("forces the removal of a dirty worktree once confirmed", async () => {
      await create("dirty");
      const [record] = ctx.registry.load();
      const path = record?.path ?? "";
      gateway.failRemove.add(path);
      vi.mocked(confirm).mockResolvedValue(true);
      vi.spyOn(console, "log").mockImplementation(() => {});

      expect(await removeWorktree(ctx, "dirty", false)).toBe(0);

      expect(confirm).toHaveBeenCalledWith(`Force removal of ${path}?`);
      expect(gateway.removeCalls.map((call) => call.force)).toEqual([false, true]);
      expect(ctx.registry.load()).toEqual([]);
    });

    it("keeps a dirty worktree when forcing is declined", async () => {
      await create("dirty");
      const records = ctx.registry.load();
      gateway.failRemove.add(records[0]?.path ?? "");
      vi.mocked(confirm).mockResolvedValue(false);

      expect(await removeWorktree(ctx, "dirty", false)).toBe(1);

      expect(gateway.removeCalls.map((call) => call.force)).toEqual([false]);
      expect(ctx.registry.load()).toEqual(records);
    });

    it("does not ask when forced up front", async () => {
      await create("dirty");
      gateway.failRemove.add(ctx.registry.load()[0]?.path ?? "");
      vi.spyOn(console, "log").mockImplementation(() => {});

      expect(await removeWorktree(ctx, "dirty", true)).toBe(0);
      expect(confirm).not.toHaveBeenCalled();
    });
  });

  describe("workspace", () => {
    it("creates, lists and removes a workspace", async () => {
      const other = gateway.addRepo(join(sandbox.root, "other"), "main");
      const log = vi.spyOn(console, "log").mockImplementation(() => {});
      const errors = vi.spyOn(console, "error").mockImplementation(() => {});

      expect(await createWorkspace(ctx, "shared", {project: [repo, other]})).toBe(0);
      expect(log).toHaveBeenLastCalledWith("Workspace 'shared' created.");

      expect(listWorkspaces(ctx)).toBe(0);
      expect(log).toHaveBeenLastCalledWith(`  ${other}`);

      expect(removeWorkspace(ctx, "shared", false)).toBe(0);
      expect(log).toHaveBeenLastCalledWith("Workspace 'shared' removed.");

      expect(listWorkspaces(ctx)).toBe(1);
      expect(errors).toHaveBeenLastCalledWith("No workspaces found.");
    });
  });
});
