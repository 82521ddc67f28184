import fs from "node:fs/promises";
import path from "node:path";
import crypto from "node:crypto";

import type { StorageProvider, StoredFileEntry } from "../ports/storage-provider";
import { remoteSegments } from "../application/remote-path";
import { PARTIAL_SUFFIX } from "./sync-ignore";

function isMissing(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}

/** Copies to a hidden sibling first so the destination only ever holds a complete file. */
export async function copyFileAtomic(from: string, to: string): Promise<void> {
  await fs.mkdir(path.dirname(to), { recursive: true });
  const tmp = `${to}.${crypto.randomUUID().slice(0, 8)}${PARTIAL_SUFFIX}`;
  try {
    await fs.copyFile(from, tmp);
    await fs.rename(tmp, to);
  } catch (err) {
    await fs.rm(tmp, { force: true });
    throw err;
  }
}

async function writeFileAtomic(to: string, content: string): Promise<void> {
  await fs.mkdir(path.dirname(to), { recursive: true });
  const tmp = `${to}.${crypto.randomUUID().slice(0, 8)}${PARTIAL_SUFFIX}`;
  try {
    await fs.writeFile(tmp, content, "utf-8");
    await fs.rename(tmp, to);
  } catch (err) {
    await fs.rm(tmp, { force: true });
    throw err;
  }
}

/**
 * Remote store backed by a plain directory (network share, removable drive, a folder
 * synced by another tool). Remote paths are resolved under `remoteRootDir`.
 * Modification times are whatever the copy leaves, which is why the timestamp
 * strategies never rely on them for uploaded files.
 */
export class FolderStorageProvider implements StorageProvider {
  readonly name = "folder";

  constructor(private readonly remoteRootDir: string) {}

  private abs(remotePath: string): string {
    const segments = remoteSegments(remotePath);
    if (segments.includes("..")) {
      throw new Error(`Remote path escapes the store: ${remotePath}`);
    }
    return path.join(this.remoteRootDir, ...segments);
  }

  async list(remoteDir: string): Promise<StoredFileEntry[]> {
    const dir = this.abs(remoteDir);
    let names: string[];
    try {
      names = (await fs.readdir(dir, { withFileTypes: true }))
        .filter((e) => e.isFile())
        .map((e) => e.name);
    } catch (err) {
      if (isMissing(err)) return [];
      throw err;
    }

    const out: StoredFileEntry[] = [];
    for (const name of names) {
      const stat = await fs.stat(path.join(dir, name));
      out.push({ name, sizeBytes: stat.size, modifiedAtMs: stat.mtimeMs });
    }
    return out;
  }

  async listFolders(remoteDir: string): Promise<string[]> {
    try {
      return (await fs.readdir(this.abs(remoteDir), { withFileTypes: true }))
        .filter((e) => e.isDirectory())
        .map((e) => e.name);
    } catch (err) {
      if (isMissing(err)) return [];
      throw err;
    }
  }

  async upload(localPath: string, remotePath: string): Promise<void> {
    await copyFileAtomic(localPath, this.abs(remotePath));
  }

  async download(remotePath: string, localPath: string): Promise<void> {
    await copyFileAtomic(this.abs(remotePath), localPath);
  }

  async createFolder(remotePath: string): Promise<void> {
    await fs.mkdir(this.abs(remotePath), { recursive: true });
  }

  async delete(remotePath: string): Promise<void> {
    await fs.rm(this.abs(remotePath), { force: true });
  }

  async readText(remotePath: string): Promise<string | null> {
    try {
      return await fs.readFile(this.abs(remotePath), "utf-8");
    } catch (err) {
      if (isMissing(err)) return null;
      throw err;
    }
  }

  async writeText(content: string, remotePath: string): Promise<void> {
    await writeFileAtomic(this.abs(remotePath), content);
  }
}
