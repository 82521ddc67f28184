export type SyncSide = "local" | "remote";

export interface FileRecord {
  /** Logical path relative to the directory pair root, always with "/" separators. */
  path: string;
  /** UTC epoch milliseconds, truncated to a whole second. */
  mtimeMs: number;
  sizeBytes: number;

  // remote only: physical name in the store (may differ from the logical name)
  storedName?: string;
  // false when the instant could not be recovered from the stored name / metadata
  timestampKnown: boolean;
}

export function recordKey(relPath: string): string {
  return relPath.replaceAll("\\", "/").toLowerCase();
}
