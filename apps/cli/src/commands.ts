import {
  ConfigError,
  ConsoleLogger,
  NodeApplyLock,
  NodeLocalTree,
  RemoteGateway,
  SnapshotService,
  SyncAbortedError,
  SyncDriver,
  createTimestampStrategy,
  errorMessage,
  formatMegabytes,
  type Logger,
  type PairPlan,
  type StorageProvider,
} from "@dirsync/core-application";
import { isTransfer, type SyncAction } from "@dirsync/core-domain";

import { loadConfig, type DirsyncConfig } from "./config";
import { createStorageProvider } from "./provider-factory";

export type CommandOptions = {
  config: string;
  dryRun?: boolean;
};

export type CommandEnv = {
  /** Replaces the console logger built from the configured level. */
  logger?: Logger;
  /** Replaces the provider built from the configuration. */
  provider?: StorageProvider;
};

type Session = {
  config: DirsyncConfig;
  logger: Logger;
  driver: SyncDriver;
  snapshots: SnapshotService;
};

async function openSession(options: CommandOptions, env: CommandEnv): Promise<Session> {
  const config = await loadConfig(options.config);
  const logger = env.logger ?? new ConsoleLogger(config.logLevel);
  const provider = env.provider ?? (await createStorageProvider(config, logger));

  const gateway = new RemoteGateway(provider, { timeoutMs: config.requestTimeoutMs });
  const strategy = createTimestampStrategy(config.timestampStrategy, gateway, logger);
  const local = new NodeLocalTree();

  return {
    config,
    logger,
    driver: new SyncDriver({
      gateway,
      local,
      strategy,
      runLock: new NodeApplyLock(config.lockStaleMs),
      logger,
      concurrency: config.concurrency,
    }),
    snapshots: new SnapshotService({ local, remote: gateway, strategy, logger }),
  };
}

function describeAction(action: SyncAction): string {
  switch (action.kind) {
    case "upload":
      return action.supersedes
        ? `upload   ${action.path} -> ${action.remotePath} (replaces ${action.supersedes})`
        : `upload   ${action.path} -> ${action.remotePath}`;
    case "download":
      return `download ${action.remotePath} -> ${action.localPath}`;
    case "delete":
      return `delete   ${action.remotePath}`;
    case "skip":
      return `skip     ${action.path}`;
  }
}

function logPlan(plan: PairPlan, logger: Logger) {
  logger.info(`${plan.pair.localRoot} <-> ${plan.pair.remoteRoot}`);
  for (const dir of plan.directories) {
    for (const action of dir.actions.filter(isTransfer)) {
      logger.info(`  ${describeAction(action)}`);
    }
  }
  logger.info(`  ${plan.totals.files} file(s), ${formatMegabytes(plan.totals.bytes)} MB`);
}

/** Logs the failure and maps it to the process exit code. */
function reportFailure(err: unknown, logger: Logger): number {
  if (err instanceof ConfigError) {
    logger.error(`Configuration error: ${err.message}`);
  } else if (err instanceof SyncAbortedError) {
    logger.error(`Sync aborted: ${err.message}`);
  } else {
    logger.error(`Sync failed: ${errorMessage(err)}`);
  }
  return 1;
}

export async function syncCommand(options: CommandOptions, env: CommandEnv = {}): Promise<number> {
  let logger: Logger = env.logger ?? new ConsoleLogger();
  try {
    const session = await openSession(options, env);
    logger = session.logger;

    const summary = await session.driver.run(session.config.pairs, { dryRun: options.dryRun });

    if (summary.dryRun) {
      for (const plan of summary.plans) logPlan(plan, logger);
      logger.info("Dry run: nothing was transferred.");
      return 0;
    }

    if (summary.progress.failed > 0 || summary.skippedPairs.length > 0) {
      logger.error(
        `Sync finished with ${summary.progress.failed} failed action(s) and ${summary.skippedPairs.length} skipped pair(s).`
      );
      return 1;
    }

    logger.info("Sync completed successfully.");
    return 0;
  } catch (err) {
    return reportFailure(err, logger);
  }
}

/** Lists both trees of every pair and the actions a sync would take. */
export async function planCommand(options: CommandOptions, env: CommandEnv = {}): Promise<number> {
  let logger: Logger = env.logger ?? new ConsoleLogger();
  try {
    const session = await openSession(options, env);
    logger = session.logger;

    for (const pair of session.config.pairs) {
      const [localFiles, remoteFiles] = await Promise.all([
        session.snapshots.scanTree("local", pair.localRoot),
        session.snapshots.scanTree("remote", pair.remoteRoot),
      ]);
      logger.info(`${pair.localRoot}: ${localFiles.size} local file(s), ${remoteFiles.size} remote file(s)`);
    }

    const summary = await session.driver.run(session.config.pairs, { dryRun: true });
    for (const plan of summary.plans) logPlan(plan, logger);
    return 0;
  } catch (err) {
    return reportFailure(err, logger);
  }
}
