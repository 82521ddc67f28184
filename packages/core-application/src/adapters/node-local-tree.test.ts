import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { NodeLocalTree } from "./node-local-tree";

let root: string;

beforeEach(async () => {
  root = await fs.mkdtemp(path.join(os.tmpdir(), "dirsync-local-"));
});

afterEach(async () => {
  await fs.rm(root, { recursive: true, force: true });
});

describe("NodeLocalTree", () => {
  const tree = new NodeLocalTree();

  it("lists files and folders of one level", async () => {
    await fs.mkdir(path.join(root, "sub"));
    await fs.writeFile(path.join(root, "a.txt"), "hello");
    await fs.writeFile(path.join(root, "sub", "deep.txt"), "x");

    const files = await tree.listFiles(root);
    expect(files.map((f) => [f.name, f.sizeBytes])).toEqual([["a.txt", 5]]);
    expect(await tree.listFolders(root)).toEqual(["sub"]);
  });

  it("lists a missing directory as empty", async () => {
    expect(await tree.listFiles(path.join(root, "nope"))).toEqual([]);
    expect(await tree.listFolders(path.join(root, "nope"))).toEqual([]);
  });

  it("sets the modification time", async () => {
    const fp = path.join(root, "a.txt");
    await fs.writeFile(fp, "x");
    const when = Date.UTC(2024, 0, 1, 10, 0, 0);

    await tree.setModifiedTime(fp, when);

    const [entry] = await tree.listFiles(root);
    expect(entry?.modifiedAtMs).toBe(when);
  });

  it("creates nested directories", async () => {
    await tree.ensureDir(path.join(root, "x", "y"));
    await tree.ensureDir(path.join(root, "x", "y"));
    expect(await tree.listFolders(path.join(root, "x"))).toEqual(["y"]);
  });
});
