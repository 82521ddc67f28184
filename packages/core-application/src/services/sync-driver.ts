import path from "node:path";
import {
  emptySnapshot,
  isTransfer,
  type SyncAction,
  type SyncPair,
  type TransferAction,
} from "@dirsync/core-domain";

import type { LocalTree } from "../ports/local-tree";
import type { Logger } from "../ports/logger";
import type { RunLock } from "../ports/run-lock";
import type { RemoteFailure, RemoteGateway } from "../application/remote-gateway";
import { joinRemote, remoteBaseName } from "../application/remote-path";
import { KeyedLock } from "../application/keyed-lock";
import { runWithConcurrencyLimit } from "../application/concurrency";
import { SyncAbortedError, errorMessage } from "../application/errors";
import {
  advanceProgress,
  combineProgress,
  formatMegabytes,
  formatProgressLines,
  startProgress,
  type SyncProgress,
} from "../value-objects/sync-progress";
import { SnapshotService, type DirectoryLocation } from "./snapshot-service";
import { reconcile, summarizeActions, type ActionTotals } from "./reconciler";
import type { DirectoryTimestamps, TimestampStrategy } from "./timestamp-strategy";

export const DEFAULT_CONCURRENCY = 2;

export type DirectoryPlan = {
  location: DirectoryLocation;

  // the folder is missing on that side and must exist before any action runs
  createLocal: boolean;
  createRemote: boolean;

  remoteComplete: boolean;
  actions: SyncAction[];
  timestamps: DirectoryTimestamps | null;
};

export type PairPlan = {
  pair: SyncPair;
  /** Parent directories always come before their children. */
  directories: DirectoryPlan[];
  totals: ActionTotals;
};

export type SyncRunOptions = {
  dryRun?: boolean;
};

export type SyncRunSummary = {
  dryRun: boolean;
  plans: PairPlan[];
  skippedPairs: SyncPair[];
  totals: ActionTotals;
  progress: SyncProgress;
};

export type ProgressListener = (progress: SyncProgress, action: TransferAction, ok: boolean) => void;

export type SyncDriverDeps = {
  gateway: RemoteGateway;
  local: LocalTree;
  strategy: TimestampStrategy;
  runLock: RunLock;
  logger: Logger;
  concurrency?: number;
  onProgress?: ProgressListener;
};

function rootLocation(pair: SyncPair): DirectoryLocation {
  return { relDir: "", localDir: pair.localRoot, remoteDir: joinRemote(pair.remoteRoot) };
}

function childLocation(parent: DirectoryLocation, localName: string, remoteName: string): DirectoryLocation {
  return {
    relDir: parent.relDir ? `${parent.relDir}/${localName}` : localName,
    localDir: path.join(parent.localDir, localName),
    remoteDir: joinRemote(parent.remoteDir, remoteName),
  };
}

/**
 * Runs one batch reconciliation over a list of sync pairs: plan every directory level of
 * every pair, report totals, then apply parent-first. Re-running after an interruption
 * is safe because both sides are re-listed from scratch.
 */
export class SyncDriver {
  private readonly snapshots: SnapshotService;
  private readonly remoteLocks = new KeyedLock();
  private aborted: SyncAbortedError | null = null;

  constructor(private readonly deps: SyncDriverDeps) {
    this.snapshots = new SnapshotService({
      local: deps.local,
      remote: deps.gateway,
      strategy: deps.strategy,
      logger: deps.logger,
    });
  }

  async run(pairs: readonly SyncPair[], options: SyncRunOptions = {}): Promise<SyncRunSummary> {
    const dryRun = options.dryRun ?? false;
    const { logger, runLock } = this.deps;
    const concurrency = this.deps.concurrency ?? DEFAULT_CONCURRENCY;

    this.aborted = null;
    const planned: (PairPlan | null)[] = pairs.map(() => null);
    const skippedPairs: SyncPair[] = [];
    const locked: SyncPair[] = [];

    try {
      /* ---------------- 1) prepare + plan ---------------- */
      await runWithConcurrencyLimit(pairs, concurrency, async (pair, i) => {
        const ok = await this.guard(pair, async () => {
          if (!dryRun) {
            if (!(await runLock.acquire(pair.localRoot))) {
              logger.warn(`Another sync is running on ${pair.localRoot}, skipping it`);
              return false;
            }
            locked.push(pair);
            if (!(await this.prepareRoots(pair))) return false;
          }
          planned[i] = await this.planPair(pair);
          return true;
        });
        if (!ok) skippedPairs.push(pair);
      });
      this.throwIfAborted();

      const plans = planned.filter((p): p is PairPlan => p !== null);
      const totals = plans.reduce<ActionTotals>(
        (acc, p) => ({ files: acc.files + p.totals.files, bytes: acc.bytes + p.totals.bytes }),
        { files: 0, bytes: 0 }
      );

      logger.info("Sync Analysis Complete:");
      logger.info(`Total Files to Sync: ${totals.files}`);
      logger.info(`Total Size to Sync: ${formatMegabytes(totals.bytes)} MB`);

      const pairProgress = plans.map((p) => startProgress(p.totals));
      if (dryRun) {
        return { dryRun, plans, skippedPairs, totals, progress: combineProgress(pairProgress) };
      }

      /* ---------------- 2) apply ---------------- */
      await runWithConcurrencyLimit(plans, concurrency, async (plan, i) => {
        const ok = await this.guard(plan.pair, async () => {
          for (const dir of plan.directories) {
            if (this.aborted) return false;
            const before = pairProgress[i] ?? startProgress(plan.totals);
            pairProgress[i] = await this.applyPlan(dir, before, (p, action, done) => {
              pairProgress[i] = p;
              this.reportProgress(combineProgress(pairProgress), action, done);
            });
          }
          return true;
        });
        if (!ok && !skippedPairs.includes(plan.pair)) skippedPairs.push(plan.pair);
      });
      this.throwIfAborted();

      return { dryRun, plans, skippedPairs, totals, progress: combineProgress(pairProgress) };
    } finally {
      for (const pair of locked) {
        try {
          await runLock.release(pair.localRoot);
        } catch (err) {
          logger.warn(`Could not release the run lock of ${pair.localRoot}: ${errorMessage(err)}`);
        }
      }
    }
  }

  /** Walks both trees level by level; a level is planned before any of its subfolders. */
  async planPair(pair: SyncPair): Promise<PairPlan> {
    const directories: DirectoryPlan[] = [];
    const { logger } = this.deps;

    const walk = async (loc: DirectoryLocation, localExists: boolean, remoteExists: boolean) => {
      const local = localExists
        ? await this.snapshots.scanLocal(loc)
        : emptySnapshot("local", loc.localDir, true);
      const { snapshot: remote, timestamps } = await this.snapshots.scanRemote(loc, remoteExists);

      const actions = reconcile(local, remote, {
        localDir: loc.localDir,
        remoteDir: loc.remoteDir,
        storedNameFor: (name, mtimeMs) => timestamps?.storedNameFor(name, mtimeMs) ?? name,
      });

      directories.push({
        location: loc,
        createLocal: !localExists,
        createRemote: !remoteExists,
        remoteComplete: remote.complete,
        actions,
        timestamps,
      });

      if (!local.complete || !remote.complete) {
        logger.warn(`Skipping the subfolders of ${loc.relDir || "/"}: one side could not be listed`);
        return;
      }

      // union of subfolders, matched case-insensitively
      const children = new Map<string, { localName?: string; remoteName?: string }>();
      for (const name of local.folders) {
        children.set(name.toLowerCase(), { localName: name });
      }
      for (const name of remote.folders) {
        const entry = children.get(name.toLowerCase()) ?? {};
        children.set(name.toLowerCase(), { ...entry, remoteName: name });
      }

      for (const key of [...children.keys()].sort()) {
        const { localName, remoteName } = children.get(key) ?? {};
        const name = localName ?? remoteName;
        if (!name) continue;
        await walk(
          childLocation(loc, localName ?? name, remoteName ?? name),
          localName !== undefined,
          remoteName !== undefined
        );
      }
    };

    await walk(rootLocation(pair), true, true);

    return {
      pair,
      directories,
      totals: summarizeActions(directories.flatMap((d) => d.actions)),
    };
  }

  /**
   * Applies one directory level and returns the advanced progress. Work on the same remote
   * directory is serialized, so its metadata is never read and written concurrently.
   */
  async applyPlan(
    plan: DirectoryPlan,
    progress: SyncProgress,
    onStep?: ProgressListener
  ): Promise<SyncProgress> {
    return this.remoteLocks.run(plan.location.remoteDir.toLowerCase(), async () => {
      let current = progress;
      const ready = await this.ensureFolders(plan);

      for (const action of plan.actions) {
        if (!isTransfer(action)) continue;
        if (this.aborted) break;

        const ok = ready && (await this.applyAction(action, plan.timestamps));
        current = advanceProgress(current, action, ok);
        onStep?.(current, action, ok);
      }

      if (ready && plan.remoteComplete && plan.timestamps) {
        const written = await plan.timestamps.finalize();
        if (!written.ok) {
          this.failed(written.error, `writing timestamp metadata for ${plan.location.remoteDir}`);
        } else if (written.value) {
          this.deps.logger.debug(`Updated timestamp metadata in ${plan.location.remoteDir}`);
        }
      }

      return current;
    });
  }

  private async applyAction(action: TransferAction, timestamps: DirectoryTimestamps | null): Promise<boolean> {
    const { gateway, local, logger } = this.deps;

    switch (action.kind) {
      case "upload": {
        const res = await gateway.upload(action.localPath, action.remotePath);
        if (!res.ok) return this.failed(res.error, `uploading ${action.localPath} to ${action.remotePath}`);

        logger.info(`Uploaded ${action.localPath} to ${action.remotePath}`);
        timestamps?.recordUpload(remoteBaseName(action.remotePath), action.mtimeMs);

        // the replacement is in place before the old copy goes away
        if (action.supersedes) {
          const del = await gateway.delete(action.supersedes);
          if (del.ok) {
            logger.info(`Deleted superseded ${action.supersedes}`);
            timestamps?.recordDelete(remoteBaseName(action.supersedes));
          } else {
            this.failed(del.error, `deleting superseded ${action.supersedes}`);
          }
        }
        return true;
      }

      case "download": {
        const res = await gateway.download(action.remotePath, action.localPath);
        if (!res.ok) return this.failed(res.error, `downloading ${action.remotePath} to ${action.localPath}`);

        try {
          await local.setModifiedTime(action.localPath, action.mtimeMs);
        } catch (err) {
          logger.warn(`Could not set the modification time of ${action.localPath}: ${errorMessage(err)}`);
        }
        logger.info(`Downloaded ${action.remotePath} to ${action.localPath}`);
        timestamps?.recordDownload(remoteBaseName(action.remotePath), action.mtimeMs);
        return true;
      }

      case "delete": {
        const res = await gateway.delete(action.remotePath);
        if (!res.ok) return this.failed(res.error, `deleting duplicate ${action.remotePath}`);

        logger.info(`Deleted duplicate ${action.remotePath}`);
        timestamps?.recordDelete(remoteBaseName(action.remotePath));
        return true;
      }
    }
  }

  private async prepareRoots(pair: SyncPair): Promise<boolean> {
    const { local, gateway, logger } = this.deps;

    try {
      await local.ensureDir(pair.localRoot);
    } catch (err) {
      logger.error(`Error creating local folder ${pair.localRoot}: ${errorMessage(err)}`);
      return false;
    }

    const created = await gateway.createFolder(joinRemote(pair.remoteRoot));
    return created.ok || this.failed(created.error, `creating folder ${pair.remoteRoot}`);
  }

  private async ensureFolders(plan: DirectoryPlan): Promise<boolean> {
    const { local, gateway, logger } = this.deps;
    let ready = true;

    if (plan.createLocal) {
      try {
        await local.ensureDir(plan.location.localDir);
        logger.info(`Created folder: ${plan.location.localDir}`);
      } catch (err) {
        logger.error(`Error creating local folder ${plan.location.localDir}: ${errorMessage(err)}`);
        ready = false;
      }
    }

    if (plan.createRemote) {
      const created = await gateway.createFolder(plan.location.remoteDir);
      if (created.ok) {
        logger.info(`Created folder: ${plan.location.remoteDir}`);
      } else {
        ready = this.failed(created.error, `creating folder ${plan.location.remoteDir}`);
      }
    }

    return ready;
  }

  /** Logs a transient failure and returns false; a fatal one aborts the run. */
  private failed(error: RemoteFailure, what: string): false {
    if (error.kind === "fatal") {
      throw new SyncAbortedError(`Remote access failed while ${what}: ${error.message}`, error.cause);
    }
    this.deps.logger.error(`Error ${what}: ${error.message}`);
    return false;
  }

  private reportProgress(progress: SyncProgress, action: TransferAction, ok: boolean) {
    for (const line of formatProgressLines(progress)) this.deps.logger.info(line);
    this.deps.onProgress?.(progress, action, ok);
  }

  private async guard(pair: SyncPair, work: () => Promise<boolean>): Promise<boolean> {
    try {
      return await work();
    } catch (err) {
      if (err instanceof SyncAbortedError) {
        this.aborted ??= err;
      } else {
        this.deps.logger.error(`Error syncing ${pair.localRoot}: ${errorMessage(err)}`);
      }
      return false;
    }
  }

  private throwIfAborted() {
    if (this.aborted) throw this.aborted;
  }
}
