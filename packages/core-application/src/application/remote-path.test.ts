import { describe, expect, it } from "vitest";
import {
  joinRemote,
  normalizeRemotePath,
  remoteBaseName,
  remoteParent,
  remotePathsOverlap,
} from "./remote-path";

describe("remote paths", () => {
  it("normalizes separators and empty segments", () => {
    expect(normalizeRemotePath("games\\saves//slot1/")).toBe("/games/saves/slot1");
    expect(normalizeRemotePath("")).toBe("/");
    expect(normalizeRemotePath("./a/./b")).toBe("/a/b");
  });

  it("joins, splits and finds parents", () => {
    expect(joinRemote("/a", "b/c", "d.txt")).toBe("/a/b/c/d.txt");
    expect(joinRemote("/a", "")).toBe("/a");
    expect(remoteBaseName("/a/b/d.txt")).toBe("d.txt");
    expect(remoteParent("/a/b/d.txt")).toBe("/a/b");
    expect(remoteParent("/d.txt")).toBe("/");
  });

  it("detects nested or equal roots", () => {
    expect(remotePathsOverlap("/Games", "/games/saves")).toBe(true);
    expect(remotePathsOverlap("/a", "/a/")).toBe(true);
    expect(remotePathsOverlap("/", "/anything")).toBe(true);
    expect(remotePathsOverlap("/games", "/games2")).toBe(false);
  });
});
