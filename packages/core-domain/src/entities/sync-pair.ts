export interface SyncPair {
  /** Absolute path of the local tree. */
  localRoot: string;
  /** Path of the remote tree, "/"-separated. */
  remoteRoot: string;
}
