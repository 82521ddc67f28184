import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { FolderStorageProvider } from "./folder-storage-provider";

let tmp: string;
let store: FolderStorageProvider;

beforeEach(async () => {
  tmp = await fs.mkdtemp(path.join(os.tmpdir(), "dirsync-store-"));
  store = new FolderStorageProvider(path.join(tmp, "store"));
});

afterEach(async () => {
  await fs.rm(tmp, { recursive: true, force: true });
});

describe("FolderStorageProvider", () => {
  it("uploads into folders and lists them", async () => {
    const local = path.join(tmp, "a.txt");
    await fs.writeFile(local, "hello");

    await store.createFolder("/games/saves");
    await store.upload(local, "/games/saves/a.txt");

    const files = await store.list("/games/saves");
    expect(files.map((f) => [f.name, f.sizeBytes])).toEqual([["a.txt", 5]]);
    expect(await store.listFolders("/games")).toEqual(["saves"]);
    expect(await fs.readFile(path.join(tmp, "store", "games", "saves", "a.txt"), "utf-8")).toBe("hello");
  });

  it("downloads to a local path, creating its folder", async () => {
    await store.writeText("remote text", "/r/b.txt");
    const target = path.join(tmp, "out", "b.txt");

    await store.download("/r/b.txt", target);

    expect(await fs.readFile(target, "utf-8")).toBe("remote text");
    expect((await fs.readdir(path.join(tmp, "out"))).sort()).toEqual(["b.txt"]);
  });

  it("reads and writes text, null when missing", async () => {
    expect(await store.readText("/r/meta")).toBeNull();
    await store.writeText("one", "/r/meta");
    await store.writeText("two", "/r/meta");
    expect(await store.readText("/r/meta")).toBe("two");
  });

  it("lists missing folders as empty and deletes idempotently", async () => {
    expect(await store.list("/missing")).toEqual([]);
    expect(await store.listFolders("/missing")).toEqual([]);

    await store.writeText("x", "/r/c.txt");
    await store.delete("/r/c.txt");
    await store.delete("/r/c.txt");
    expect(await store.list("/r")).toEqual([]);
  });

  it("refuses paths that leave the store", async () => {
    await expect(store.readText("/../outside.txt")).rejects.toThrow("Remote path escapes the store");
  });
});
