import path from "node:path";
import {
  actionBytes,
  isTransfer,
  type DirectorySnapshot,
  type FileRecord,
  type SyncAction,
  type UploadAction,
} from "@dirsync/core-domain";

import { joinRemote } from "../application/remote-path";

export type ReconcileTarget = {
  localDir: string;
  remoteDir: string;
  /** Physical remote name for a logical file name uploaded with the given instant. */
  storedNameFor(name: string, mtimeMs: number): string;
};

export type ActionTotals = {
  files: number;
  bytes: number;
};

function baseName(relPath: string): string {
  return path.posix.basename(relPath);
}

function storedNameOf(record: FileRecord): string {
  return record.storedName ?? baseName(record.path);
}

function upload(local: FileRecord, remote: FileRecord | undefined, target: ReconcileTarget): UploadAction {
  const name = baseName(local.path);
  let storedName = target.storedNameFor(name, local.mtimeMs);
  let supersedes: string | undefined;

  if (remote) {
    const previous = storedNameOf(remote);
    if (previous.toLowerCase() === storedName.toLowerCase()) {
      // same physical object: overwrite in place, never upload-then-delete it
      storedName = previous;
    } else {
      supersedes = joinRemote(target.remoteDir, previous);
    }
  }

  return {
    kind: "upload",
    path: local.path,
    localPath: path.join(target.localDir, name),
    remotePath: joinRemote(target.remoteDir, storedName),
    sizeBytes: local.sizeBytes,
    mtimeMs: local.mtimeMs,
    ...(supersedes ? { supersedes } : {}),
  };
}

function download(remote: FileRecord, local: FileRecord | undefined, target: ReconcileTarget): SyncAction {
  return {
    kind: "download",
    path: local?.path ?? remote.path,
    remotePath: joinRemote(target.remoteDir, storedNameOf(remote)),
    localPath: path.join(target.localDir, baseName(local?.path ?? remote.path)),
    sizeBytes: remote.sizeBytes,
    mtimeMs: remote.mtimeMs,
  };
}

/**
 * Decides, per logical file of one directory level, what brings both sides to the newest
 * copy. Instants are compared at whole-second precision; equal instants never transfer.
 * When either side could not be listed nothing is transferred for this level.
 */
export function reconcile(
  local: DirectorySnapshot,
  remote: DirectorySnapshot,
  target: ReconcileTarget
): SyncAction[] {
  const keys = [...new Set([...local.files.keys(), ...remote.files.keys()])].sort();
  const transfersAllowed = local.complete && remote.complete;

  const actions: SyncAction[] = [];

  if (transfersAllowed) {
    const stale = [...remote.duplicates].sort((a, b) => storedNameOf(a).localeCompare(storedNameOf(b)));
    for (const dup of stale) {
      actions.push({
        kind: "delete",
        path: dup.path,
        remotePath: joinRemote(target.remoteDir, storedNameOf(dup)),
      });
    }
  }

  for (const key of keys) {
    const l = local.files.get(key);
    const r = remote.files.get(key);

    if (!transfersAllowed) {
      const known = l ?? r;
      if (known) actions.push({ kind: "skip", path: known.path, mtimeMs: known.mtimeMs });
      continue;
    }

    if (l && !r) {
      actions.push(upload(l, undefined, target));
    } else if (!l && r) {
      actions.push(download(r, undefined, target));
    } else if (l && r) {
      // an undecodable remote name is compared by the time the store reported for it
      if (l.mtimeMs > r.mtimeMs) {
        actions.push(upload(l, r, target));
      } else if (r.mtimeMs > l.mtimeMs) {
        actions.push(download(r, l, target));
      } else {
        actions.push({ kind: "skip", path: l.path, mtimeMs: l.mtimeMs });
      }
    }
  }

  return actions;
}

export function summarizeActions(actions: readonly SyncAction[]): ActionTotals {
  let files = 0;
  let bytes = 0;
  for (const action of actions) {
    if (!isTransfer(action)) continue;
    files++;
    bytes += actionBytes(action);
  }
  return { files, bytes };
}
