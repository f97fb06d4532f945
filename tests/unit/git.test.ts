import {describe, expect, it} from "vitest";
import {parseWorktreeList} from "../../src/git.js";

describe("parseWorktreeList", () => {
  it("reads path and local branch from each block", () => {
    const output = [
      "worktree /work/repo",
      "HEAD 1111111111111111111111111111111111111111",
      "branch refs/heads/main",
      "",
      "worktree /work/worktrees/repo-feature-x",
      "HEAD 2222222222222222222222222222222222222222",
      "branch refs/heads/feature/x",
      ""
    ].join("\n");

    expect(parseWorktreeList(output)).toEqual([
      {path: "/work/repo", branch: "main"},
      {path: "/work/worktrees/repo-feature-x", branch: "feature/x"}
    ]);
  });

  it("drops detached and bare entries", () => {
    const output = [
      "worktree /work/bare.git",
      "bare",
      "",
      "worktree /work/detached",
      "HEAD 3333333333333333333333333333333333333333",
      "detached",
      "",
      "worktree /work/ok",
      "HEAD 4444444444444444444444444444444444444444",
      "branch refs/heads/ok",
      ""
    ].join("\n");

    expect(parseWorktreeList(output)).toEqual([{path: "/work/ok", branch: "ok"}]);
  });

  it("ignores branch refs outside refs/heads", () => {
    const output = "worktree /work/remote\nbranch refs/remotes/origin/main\n";
    expect(parseWorktreeList(output)).toEqual([]);
  });

  it("keeps spaces in paths", () => {
    const output = "worktree /work/my repo\nbranch refs/heads/main\n";
    expect(parseWorktreeList(output)).toEqual([{path: "/work/my repo", branch: "main"}]);
  });

  it("returns nothing for empty output", () => {
    expect(parseWorktreeList("")).toEqual([]);
    expect(parseWorktreeList("\n\n")).toEqual([]);
  });

  it("accepts CRLF line endings", () => {
    const output = "worktree C:/work/repo\r\nbranch refs/heads/main\r\n\r\nworktree C:/work/wt\r\nbranch refs/heads/wt\r\n";
    expect(parseWorktreeList(output)).toEqual([
      {path: "C:/work/repo", branch: "main"},
      {path: "C:/work/wt", branch: "wt"}
    ]);
  });
});
