import fs from "node:fs/promises";
import type { Dirent } from "node:fs";
import path from "node:path";

import type { LocalTree } from "../ports/local-tree";
import type { StoredFileEntry } from "../ports/storage-provider";

function isMissing(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}

/**
 * Node implementation of the LocalTree port. Paths are absolute; a directory that does
 * not exist yet lists as empty, any other read error is thrown to the caller.
 */
export class NodeLocalTree implements LocalTree {
  private async entries(absDir: string): Promise<Dirent[]> {
    try {
      return await fs.readdir(absDir, { withFileTypes: true });
    } catch (err) {
      if (isMissing(err)) return [];
      throw err;
    }
  }

  async ensureDir(absDir: string): Promise<void> {
    await fs.mkdir(absDir, { recursive: true });
  }

  async listFiles(absDir: string): Promise<StoredFileEntry[]> {
    const out: StoredFileEntry[] = [];
    for (const entry of await this.entries(absDir)) {
      if (!entry.isFile()) continue;
      try {
        const stat = await fs.stat(path.join(absDir, entry.name));
        out.push({ name: entry.name, sizeBytes: stat.size, modifiedAtMs: stat.mtimeMs });
      } catch (err) {
        // removed between readdir and stat
        if (!isMissing(err)) throw err;
      }
    }
    return out;
  }

  async listFolders(absDir: string): Promise<string[]> {
    return (await this.entries(absDir)).filter((e) => e.isDirectory()).map((e) => e.name);
  }

  async setModifiedTime(absPath: string, mtimeMs: number): Promise<void> {
    const when = new Date(mtimeMs);
    await fs.utimes(absPath, when, when);
  }
}
