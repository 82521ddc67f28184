import type { StoredFileEntry } from "./storage-provider";

export interface LocalTree {
  ensureDir(absDir: string): Promise<void>;

  /** Regular files directly inside `absDir`; a missing directory lists as empty. */
  listFiles(absDir: string): Promise<StoredFileEntry[]>;
  listFolders(absDir: string): Promise<string[]>;

  setModifiedTime(absPath: string, mtimeMs: number): Promise<void>;
}
