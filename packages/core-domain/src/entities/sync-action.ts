export type UploadAction = {
  kind: "upload";
  path: string;
  localPath: string;
  remotePath: string;
  sizeBytes: number;
  mtimeMs: number;
  /** Remote object replaced by this upload, deleted once the upload succeeded. */
  supersedes?: string;
};

export type DownloadAction = {
  kind: "download";
  path: string;
  remotePath: string;
  localPath: string;
  sizeBytes: number;
  mtimeMs: number;
};

export type DeleteAction = {
  kind: "delete";
  path: string;
  remotePath: string;
};

export type SkipAction = {
  kind: "skip";
  path: string;
  mtimeMs: number;
};

export type SyncAction = UploadAction | DownloadAction | DeleteAction | SkipAction;

export type TransferAction = Exclude<SyncAction, SkipAction>;

export function isTransfer(action: SyncAction): action is TransferAction {
  return action.kind !== "skip";
}

export function actionBytes(action: SyncAction): number {
  return action.kind === "upload" || action.kind === "download" ? action.sizeBytes : 0;
}
