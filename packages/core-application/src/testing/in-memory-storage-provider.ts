import fs from "node:fs/promises";
import path from "node:path";

import type { StorageProvider, StoredFileEntry } from "../ports/storage-provider";
import type { RemoteOperation } from "../application/remote-gateway";
import { normalizeRemotePath, remoteParent, remoteSegments } from "../application/remote-path";

export type InMemoryRemoteFile = {
  content: Buffer;
  modifiedAtMs: number;
};

type InjectedFailure = {
  operation: RemoteOperation;
  matches: (remotePath: string) => boolean;
  error: Error;
  remaining: number;
};

/**
 * Remote store held in memory, for tests. Like most cloud stores it stamps every write
 * with its own clock instead of keeping the uploader's modification time. Writes into a
 * folder that was never created fail, as they would on a real store.
 */
export class InMemoryStorageProvider implements StorageProvider {
  readonly name = "memory";

  readonly files = new Map<string, InMemoryRemoteFile>();
  readonly folders = new Set<string>(["/"]);
  /** "<operation> <path>" for every call, in call order. */
  readonly calls: string[] = [];

  private failures: InjectedFailure[] = [];

  constructor(private readonly now: () => number = Date.now) {}

  /* ---------------- test helpers ---------------- */

  putFile(remotePath: string, content: string | Buffer, modifiedAtMs = this.now()): void {
    const p = normalizeRemotePath(remotePath);
    this.addFolder(remoteParent(p));
    this.files.set(p, {
      content: typeof content === "string" ? Buffer.from(content) : content,
      modifiedAtMs,
    });
  }

  addFolder(remotePath: string): void {
    let current = "";
    this.folders.add("/");
    for (const segment of remoteSegments(remotePath)) {
      current = `${current}/${segment}`;
      this.folders.add(current);
    }
  }

  readFile(remotePath: string): string | undefined {
    return this.files.get(normalizeRemotePath(remotePath))?.content.toString("utf-8");
  }

  fileNames(remoteDir: string): string[] {
    const dir = normalizeRemotePath(remoteDir);
    return [...this.files.keys()]
      .filter((p) => remoteParent(p) === dir)
      .map((p) => p.slice(dir === "/" ? 1 : dir.length + 1))
      .sort();
  }

  callsOf(operation: RemoteOperation): string[] {
    return this.calls.filter((c) => c.startsWith(`${operation} `)).map((c) => c.slice(operation.length + 1));
  }

  /** Makes matching calls throw `error`, `times` times (forever by default). */
  fail(
    operation: RemoteOperation,
    target: string | ((remotePath: string) => boolean),
    error: Error = new Error(`simulated ${operation} failure`),
    times = Number.POSITIVE_INFINITY
  ): void {
    const matches =
      typeof target === "string"
        ? (p: string) => p === normalizeRemotePath(target)
        : target;
    this.failures.push({ operation, matches, error, remaining: times });
  }

  /* ---------------- StorageProvider ---------------- */

  async list(remoteDir: string): Promise<StoredFileEntry[]> {
    const dir = this.enter("list", remoteDir);
    return [...this.files.entries()]
      .filter(([p]) => remoteParent(p) === dir)
      .map(([p, f]) => ({
        name: p.slice(dir === "/" ? 1 : dir.length + 1),
        sizeBytes: f.content.length,
        modifiedAtMs: f.modifiedAtMs,
      }));
  }

  async listFolders(remoteDir: string): Promise<string[]> {
    const dir = this.enter("listFolders", remoteDir);
    return [...this.folders]
      .filter((p) => p !== "/" && remoteParent(p) === dir)
      .map((p) => p.slice(dir === "/" ? 1 : dir.length + 1));
  }

  async upload(localPath: string, remotePath: string): Promise<void> {
    const p = this.enter("upload", remotePath);
    this.requireParent(p);
    this.files.set(p, { content: await fs.readFile(localPath), modifiedAtMs: this.now() });
  }

  async download(remotePath: string, localPath: string): Promise<void> {
    const p = this.enter("download", remotePath);
    const file = this.files.get(p);
    if (!file) throw new Error(`No such remote file: ${p}`);
    await fs.mkdir(path.dirname(localPath), { recursive: true });
    await fs.writeFile(localPath, file.content);
  }

  async createFolder(remotePath: string): Promise<void> {
    this.addFolder(this.enter("createFolder", remotePath));
  }

  async delete(remotePath: string): Promise<void> {
    this.files.delete(this.enter("delete", remotePath));
  }

  async readText(remotePath: string): Promise<string | null> {
    return this.files.get(this.enter("readText", remotePath))?.content.toString("utf-8") ?? null;
  }

  async writeText(content: string, remotePath: string): Promise<void> {
    const p = this.enter("writeText", remotePath);
    this.requireParent(p);
    this.files.set(p, { content: Buffer.from(content), modifiedAtMs: this.now() });
  }

  private enter(operation: RemoteOperation, remotePath: string): string {
    const p = normalizeRemotePath(remotePath);
    this.calls.push(`${operation} ${p}`);

    const failure = this.failures.find((f) => f.operation === operation && f.remaining > 0 && f.matches(p));
    if (failure) {
      failure.remaining--;
      throw failure.error;
    }
    return p;
  }

  private requireParent(p: string) {
    const parent = remoteParent(p);
    if (!this.folders.has(parent)) throw new Error(`Remote folder does not exist: ${parent}`);
  }
}
