import type { FileRecord, SyncSide } from './file-record';

export interface DirectorySnapshot {
  side: SyncSide;
  /** Directory this snapshot was taken of (local absolute path or remote path). */
  root: string;

  /** Keyed by lower-cased logical path. */
  files: Map<string, FileRecord>;
  /** Direct child folder names (one level). */
  folders: string[];
  /** Remote copies of a logical file that lost to a newer copy of the same file. */
  duplicates: FileRecord[];

  /** False when listing failed and the contents are unknown. */
  complete: boolean;
}

export function emptySnapshot(
  side: SyncSide,
  root: string,
  complete: boolean
): DirectorySnapshot {
  return {
    side,
    root,
    files: new Map(),
    folders: [],
    duplicates: [],
    complete,
  };
}
