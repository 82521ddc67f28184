/** Marks a local tree as being synced so two runs never apply into it at once. */
export interface RunLock {
  /** Returns false when another, non-stale run holds the lock. */
  acquire(localRoot: string): Promise<boolean>;
  release(localRoot: string): Promise<void>;
}
