import { actionBytes, isTransfer, type SyncAction } from "@dirsync/core-domain";
import type { ActionTotals } from "../services/reconciler";

export type SyncProgress = Readonly<{
  filesTotal: number;
  bytesTotal: number;

  // actions processed so far, successful or not
  filesDone: number;
  bytesDone: number;

  failed: number;
}>;

export type ProgressPercentages = {
  filesPercent: number;
  bytesPercent: number;
};

const MB = 1024 * 1024;

export function startProgress(totals: ActionTotals): SyncProgress {
  return {
    filesTotal: totals.files,
    bytesTotal: totals.bytes,
    filesDone: 0,
    bytesDone: 0,
    failed: 0,
  };
}

export function advanceProgress(progress: SyncProgress, action: SyncAction, ok: boolean): SyncProgress {
  if (!isTransfer(action)) return progress;
  return {
    ...progress,
    filesDone: progress.filesDone + 1,
    bytesDone: progress.bytesDone + actionBytes(action),
    failed: progress.failed + (ok ? 0 : 1),
  };
}

export function combineProgress(parts: readonly SyncProgress[]): SyncProgress {
  return parts.reduce<SyncProgress>(
    (acc, p) => ({
      filesTotal: acc.filesTotal + p.filesTotal,
      bytesTotal: acc.bytesTotal + p.bytesTotal,
      filesDone: acc.filesDone + p.filesDone,
      bytesDone: acc.bytesDone + p.bytesDone,
      failed: acc.failed + p.failed,
    }),
    startProgress({ files: 0, bytes: 0 })
  );
}

/** File and byte completion are reported separately; an empty total counts as done. */
export function progressPercentages(progress: SyncProgress): ProgressPercentages {
  return {
    filesPercent: progress.filesTotal === 0 ? 100 : (100 * progress.filesDone) / progress.filesTotal,
    bytesPercent: progress.bytesTotal === 0 ? 100 : (100 * progress.bytesDone) / progress.bytesTotal,
  };
}

export function formatMegabytes(bytes: number): string {
  return (bytes / MB).toFixed(2);
}

export function formatProgressLines(progress: SyncProgress): [string, string] {
  const { filesPercent, bytesPercent } = progressPercentages(progress);
  return [
    `Progress: ${progress.filesDone}/${progress.filesTotal} files synced (${filesPercent.toFixed(1)}%)`,
    `Data: ${formatMegabytes(progress.bytesDone)}/${formatMegabytes(progress.bytesTotal)} MB synced (${bytesPercent.toFixed(1)}%)`,
  ];
}
