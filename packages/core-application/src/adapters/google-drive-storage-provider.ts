import fs from "node:fs/promises";
import { createReadStream, createWriteStream } from "node:fs";
import path from "node:path";
import crypto from "node:crypto";
import { pipeline } from "node:stream/promises";
import type { OAuth2Client } from "google-auth-library";
import type { drive_v3 } from "googleapis";

import type { StorageProvider, StoredFileEntry } from "../ports/storage-provider";
import { KeyedLock } from "../application/keyed-lock";
import { remoteBaseName, remoteParent, remoteSegments } from "../application/remote-path";
import {
  APP_ROOT_NAME,
  createDriveClient,
  createFolder,
  createTextFile,
  downloadText,
  ensureAppRootFolder,
  findChildByName,
  isGoogleAppsFile,
  listChildren,
  toRemoteError,
  uploadText,
} from "./google-drive-files";
import { PARTIAL_SUFFIX } from "./sync-ignore";

/**
 * StorageProvider on Google Drive.
 *
 * Remote paths are resolved below the app folder:
 * dirsync/
 *   <remoteRoot>/
 *     ...
 * Folder ids are cached per path for the lifetime of the provider.
 */
export class GoogleDriveStorageProvider implements StorageProvider {
  readonly name = "google-drive";

  private readonly drive: drive_v3.Drive;
  private readonly folderIds = new Map<string, string>();
  private readonly folderLocks = new KeyedLock();

  constructor(
    auth: OAuth2Client,
    private readonly appRootName = APP_ROOT_NAME
  ) {
    this.drive = createDriveClient(auth);
  }

  async list(remoteDir: string): Promise<StoredFileEntry[]> {
    return this.call(`listing ${remoteDir}`, async () => {
      const folderId = await this.resolveFolder(remoteDir, false);
      if (!folderId) return [];

      const files = await listChildren(this.drive, folderId, "file");
      return files
        .filter((f) => f.name && !isGoogleAppsFile(f.mimeType))
        .map((f) => ({
          name: f.name ?? "",
          sizeBytes: Number(f.size ?? 0),
          modifiedAtMs: f.modifiedTime ? Date.parse(f.modifiedTime) : 0,
        }));
    });
  }

  async listFolders(remoteDir: string): Promise<string[]> {
    return this.call(`listing folders of ${remoteDir}`, async () => {
      const folderId = await this.resolveFolder(remoteDir, false);
      if (!folderId) return [];

      const folders = await listChildren(this.drive, folderId, "folder");
      return folders.map((f) => f.name ?? "").filter(Boolean);
    });
  }

  async upload(localPath: string, remotePath: string): Promise<void> {
    await this.call(`uploading ${remotePath}`, async () => {
      const parentId = await this.requireFolder(remoteParent(remotePath), true);
      const name = remoteBaseName(remotePath);
      const existing = await findChildByName(this.drive, parentId, name, "file");

      if (existing?.id) {
        await this.drive.files.update({
          fileId: existing.id,
          media: { body: createReadStream(localPath) },
        });
        return;
      }

      await this.drive.files.create({
        requestBody: { name, parents: [parentId] },
        media: { body: createReadStream(localPath) },
        fields: "id",
      });
    });
  }

  async download(remotePath: string, localPath: string): Promise<void> {
    await this.call(`downloading ${remotePath}`, async () => {
      const fileId = await this.requireFileId(remotePath);

      await fs.mkdir(path.dirname(localPath), { recursive: true });
      const tmp = `${localPath}.${crypto.randomUUID().slice(0, 8)}${PARTIAL_SUFFIX}`;
      try {
        const res = await this.drive.files.get({ fileId, alt: "media" }, { responseType: "stream" });
        await pipeline(res.data, createWriteStream(tmp));
        await fs.rename(tmp, localPath);
      } catch (err) {
        await fs.rm(tmp, { force: true });
        throw err;
      }
    });
  }

  async createFolder(remotePath: string): Promise<void> {
    await this.call(`creating folder ${remotePath}`, async () => {
      await this.resolveFolder(remotePath, true);
    });
  }

  async delete(remotePath: string): Promise<void> {
    await this.call(`deleting ${remotePath}`, async () => {
      const parentId = await this.resolveFolder(remoteParent(remotePath), false);
      if (!parentId) return;

      const found = await findChildByName(this.drive, parentId, remoteBaseName(remotePath), "file");
      if (found?.id) await this.drive.files.delete({ fileId: found.id });
    });
  }

  async readText(remotePath: string): Promise<string | null> {
    return this.call(`reading ${remotePath}`, async () => {
      const parentId = await this.resolveFolder(remoteParent(remotePath), false);
      if (!parentId) return null;

      const found = await findChildByName(this.drive, parentId, remoteBaseName(remotePath), "file");
      return found?.id ? downloadText(this.drive, found.id) : null;
    });
  }

  async writeText(content: string, remotePath: string): Promise<void> {
    await this.call(`writing ${remotePath}`, async () => {
      const parentId = await this.requireFolder(remoteParent(remotePath), true);
      const name = remoteBaseName(remotePath);
      const found = await findChildByName(this.drive, parentId, name, "file");

      if (found?.id) {
        await uploadText(this.drive, found.id, content);
      } else {
        await createTextFile(this.drive, parentId, name, content);
      }
    });
  }

  /* ------------------------------------------------------------------ */
  /* Path resolution                                                     */
  /* ------------------------------------------------------------------ */

  private async resolveFolder(remoteDir: string, create: boolean): Promise<string | null> {
    let parentId = await this.cachedFolder("", async () => ensureAppRootFolder(this.drive, this.appRootName));
    let current = "";

    for (const segment of remoteSegments(remoteDir)) {
      current = `${current}/${segment}`;
      const id: string | null = await this.cachedFolder(current, async () => {
        const found = await findChildByName(this.drive, parentId, segment, "folder");
        if (found?.id) return found.id;
        return create ? createFolder(this.drive, parentId, segment) : null;
      });
      if (!id) return null;
      parentId = id;
    }

    return parentId;
  }

  // one lookup (or creation) per folder path at a time, so concurrent runs never create twins
  private async cachedFolder<T extends string | null>(key: string, resolve: () => Promise<T>): Promise<string | T> {
    return this.folderLocks.run(key, async () => {
      const cached = this.folderIds.get(key);
      if (cached) return cached;

      const id = await resolve();
      if (id) this.folderIds.set(key, id);
      return id;
    });
  }

  private async requireFolder(remoteDir: string, create: boolean): Promise<string> {
    const id = await this.resolveFolder(remoteDir, create);
    if (!id) throw new Error(`Remote folder not found: ${remoteDir}`);
    return id;
  }

  private async requireFileId(remotePath: string): Promise<string> {
    const parentId = await this.requireFolder(remoteParent(remotePath), false);
    const found = await findChildByName(this.drive, parentId, remoteBaseName(remotePath), "file");
    if (!found?.id) throw new Error(`Remote file not found: ${remotePath}`);
    return found.id;
  }

  private async call<T>(what: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      throw toRemoteError(err, `Error ${what}`);
    }
  }
}
