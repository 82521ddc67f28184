/** One file entry as reported by a store, before any timestamp decoding. */
export type StoredFileEntry = {
  name: string;
  sizeBytes: number;
  /** The store's own modification time (UTC epoch ms), whatever precision it keeps. */
  modifiedAtMs: number;
};

/**
 * Primitive remote operations. Paths are "/"-separated and absolute within the store.
 * Implementations throw on failure; the core reaches them only through RemoteGateway.
 */
export interface StorageProvider {
  readonly name: string;

  /** Files directly inside `remoteDir`, all pages. A missing folder lists as empty. */
  list(remoteDir: string): Promise<StoredFileEntry[]>;
  /** Names of the folders directly inside `remoteDir`. */
  listFolders(remoteDir: string): Promise<string[]>;

  upload(localPath: string, remotePath: string): Promise<void>;
  download(remotePath: string, localPath: string): Promise<void>;

  /** Creates the folder and its parents; an existing folder is not an error. */
  createFolder(remotePath: string): Promise<void>;
  delete(remotePath: string): Promise<void>;

  readText(remotePath: string): Promise<string | null>;
  writeText(content: string, remotePath: string): Promise<void>;
}
