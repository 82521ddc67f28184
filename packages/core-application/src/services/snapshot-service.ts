import path from "node:path";
import {
  emptySnapshot,
  recordKey,
  type DirectorySnapshot,
  type FileRecord,
  type SyncSide,
} from "@dirsync/core-domain";

import type { LocalTree } from "../ports/local-tree";
import type { Logger } from "../ports/logger";
import type { RemoteFailure, RemoteGateway } from "../application/remote-gateway";
import { joinRemote } from "../application/remote-path";
import { SyncAbortedError, errorMessage } from "../application/errors";
import { createSyncIgnore } from "../adapters/sync-ignore";
import { truncateToSecond } from "./timestamp-codec";
import type { DirectoryTimestamps, TimestampStrategy } from "./timestamp-strategy";

/** One directory level of a sync pair, on both sides. */
export type DirectoryLocation = {
  /** Relative to the pair root, "/"-separated, "" for the root itself. */
  relDir: string;
  localDir: string;
  remoteDir: string;
};

export type RemoteScan = {
  snapshot: DirectorySnapshot;
  /** Null when the directory could not be read. */
  timestamps: DirectoryTimestamps | null;
};

function byFolderName(a: string, b: string) {
  return a.toLowerCase().localeCompare(b.toLowerCase());
}

/** Newest instant wins; on a tie a decoded timestamp beats one taken from the store. */
function preferRecord(a: FileRecord, b: FileRecord): FileRecord {
  if (a.mtimeMs !== b.mtimeMs) return a.mtimeMs > b.mtimeMs ? a : b;
  if (a.timestampKnown !== b.timestampKnown) return a.timestampKnown ? a : b;
  return (a.storedName ?? a.path) > (b.storedName ?? b.path) ? a : b;
}

function collect(records: FileRecord[]): Pick<DirectorySnapshot, "files" | "duplicates"> {
  const files = new Map<string, FileRecord>();
  const duplicates: FileRecord[] = [];

  for (const record of records) {
    const key = recordKey(record.path);
    const current = files.get(key);
    if (!current) {
      files.set(key, record);
      continue;
    }
    const winner = preferRecord(current, record);
    duplicates.push(winner === current ? record : current);
    files.set(key, winner);
  }

  return { files, duplicates };
}

export class SnapshotService {
  private readonly ignore: (name: string) => boolean;

  constructor(
    private readonly deps: {
      local: LocalTree;
      remote: RemoteGateway;
      strategy: TimestampStrategy;
      logger: Logger;
    }
  ) {
    this.ignore = createSyncIgnore(deps.strategy.reservedNames);
  }

  async scanLocal(loc: DirectoryLocation): Promise<DirectorySnapshot> {
    const { local, logger } = this.deps;
    try {
      const [entries, folders] = await Promise.all([
        local.listFiles(loc.localDir),
        local.listFolders(loc.localDir),
      ]);

      const records: FileRecord[] = entries
        .filter((e) => !this.ignore(e.name))
        .map((e) => ({
          path: loc.relDir ? `${loc.relDir}/${e.name}` : e.name,
          mtimeMs: truncateToSecond(e.modifiedAtMs),
          sizeBytes: e.sizeBytes,
          timestampKnown: true,
        }));

      const { files, duplicates } = collect(records);
      for (const dup of duplicates) {
        logger.warn(`Local name differs only by case, ignoring "${dup.path}"`);
      }

      return {
        ...emptySnapshot("local", loc.localDir, true),
        files,
        folders: folders.filter((f) => !this.ignore(f)).sort(byFolderName),
      };
    } catch (err) {
      logger.error(`Error listing local directory ${loc.localDir}: ${errorMessage(err)}`);
      return emptySnapshot("local", loc.localDir, false);
    }
  }

  /**
   * Lists one remote level. Transient failures give an incomplete empty snapshot;
   * a fatal one aborts the run.
   */
  async scanRemote(loc: DirectoryLocation, existing = true): Promise<RemoteScan> {
    const { remote, strategy } = this.deps;

    const opened = await strategy.open(loc.remoteDir, existing);
    if (!opened.ok) return this.failedRemote(loc, opened.error);
    const timestamps = opened.value;

    if (!existing) {
      return { snapshot: emptySnapshot("remote", loc.remoteDir, true), timestamps };
    }

    const [listed, folders] = await Promise.all([
      remote.list(loc.remoteDir),
      remote.listFolders(loc.remoteDir),
    ]);
    if (!listed.ok) return this.failedRemote(loc, listed.error);
    if (!folders.ok) return this.failedRemote(loc, folders.error);

    const entries = listed.value.filter((e) => !this.ignore(e.name));
    const { files, duplicates } = collect(timestamps.resolve(entries, loc.relDir));

    return {
      snapshot: {
        ...emptySnapshot("remote", loc.remoteDir, true),
        files,
        duplicates,
        folders: folders.value.filter((f) => !this.ignore(f)).sort(byFolderName),
      },
      timestamps,
    };
  }

  /** Every file under `root`, keyed by lower-cased relative path. */
  async scanTree(side: SyncSide, root: string): Promise<Map<string, FileRecord>> {
    const out = new Map<string, FileRecord>();

    const walk = async (relDir: string): Promise<void> => {
      const loc: DirectoryLocation = {
        relDir,
        localDir: relDir ? path.join(root, ...relDir.split("/")) : root,
        remoteDir: joinRemote(root, relDir),
      };
      const snapshot =
        side === "local" ? await this.scanLocal(loc) : (await this.scanRemote(loc)).snapshot;

      for (const [key, record] of snapshot.files) out.set(key, record);
      for (const folder of snapshot.folders) {
        await walk(relDir ? `${relDir}/${folder}` : folder);
      }
    };

    await walk("");
    return out;
  }

  private failedRemote(loc: DirectoryLocation, error: RemoteFailure): RemoteScan {
    if (error.kind === "fatal") {
      throw new SyncAbortedError(`Remote access failed: ${error.message}`, error.cause);
    }
    this.deps.logger.error(
      `Error listing files in ${loc.remoteDir}: ${error.message}; treating it as unknown this run`
    );
    return { snapshot: emptySnapshot("remote", loc.remoteDir, false), timestamps: null };
  }
}
