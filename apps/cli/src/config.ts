import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import {
  ConfigError,
  DEFAULT_CONCURRENCY,
  DEFAULT_LOCK_STALE_MS,
  DEFAULT_REQUEST_TIMEOUT_MS,
  errorMessage,
  normalizeRemotePath,
  remotePathsOverlap,
  type LogLevel,
  type TimestampStrategyKind,
} from "@dirsync/core-application";
import type { SyncPair } from "@dirsync/core-domain";

export const DEFAULT_CONFIG_FILE = "dirsync.config.json";

export const SUPPORTED_PROVIDERS = ["google-drive", "folder"] as const;
export type CloudProvider = (typeof SUPPORTED_PROVIDERS)[number];

export const SyncPairSchema = z.object({
  localPath: z.string().min(1, "localPath must not be empty"),
  remotePath: z.string().min(1, "remotePath must not be empty"),
});

// cloudProvider stays a plain string here so an unknown one gets its own message
export const ConfigSchema = z.object({
  syncPairs: z.array(SyncPairSchema).min(1, "at least one sync pair is required"),
  cloudProvider: z.string(),
  credentials: z.string().min(1, "credentials must not be empty"),
  timestampStrategy: z.enum(["filename", "sidecar"]).default("filename"),
  concurrency: z.number().int().min(1).default(DEFAULT_CONCURRENCY),
  requestTimeoutMs: z.number().int().min(0).default(DEFAULT_REQUEST_TIMEOUT_MS),
  lockStaleMs: z.number().int().min(0).default(DEFAULT_LOCK_STALE_MS),
  logLevel: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

export type RawConfig = z.infer<typeof ConfigSchema>;

export type DirsyncConfig = {
  configPath: string;
  pairs: SyncPair[];
  cloudProvider: CloudProvider;
  /** Absolute: OAuth client file for google-drive, store root for folder. */
  credentials: string;
  timestampStrategy: TimestampStrategyKind;
  concurrency: number;
  requestTimeoutMs: number;
  lockStaleMs: number;
  logLevel: LogLevel;
};

function isSupportedProvider(value: string): value is CloudProvider {
  return SUPPORTED_PROVIDERS.some((p) => p === value);
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "config"}: ${issue.message}`)
    .join("; ");
}

/**
 * Validates parsed JSON and resolves every local path against `baseDir`
 * (the directory of the configuration file).
 */
export function parseConfig(input: unknown, baseDir: string, configPath = ""): DirsyncConfig {
  const parsed = ConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration: ${describeIssues(parsed.error)}`, parsed.error);
  }
  const raw = parsed.data;

  if (!isSupportedProvider(raw.cloudProvider)) {
    throw new ConfigError(`Cloud provider '${raw.cloudProvider}' is not supported.`);
  }

  const pairs: SyncPair[] = raw.syncPairs.map((p) => ({
    localRoot: path.resolve(baseDir, p.localPath),
    remoteRoot: normalizeRemotePath(p.remotePath),
  }));

  for (let i = 0; i < pairs.length; i++) {
    for (let j = i + 1; j < pairs.length; j++) {
      const a = pairs[i];
      const b = pairs[j];
      if (a && b && remotePathsOverlap(a.remoteRoot, b.remoteRoot)) {
        throw new ConfigError(
          `Sync pairs ${i + 1} and ${j + 1} use overlapping remote paths (${a.remoteRoot}, ${b.remoteRoot})`
        );
      }
    }
  }

  return {
    configPath,
    pairs,
    cloudProvider: raw.cloudProvider,
    credentials: path.resolve(baseDir, raw.credentials),
    timestampStrategy: raw.timestampStrategy,
    concurrency: raw.concurrency,
    requestTimeoutMs: raw.requestTimeoutMs,
    lockStaleMs: raw.lockStaleMs,
    logLevel: raw.logLevel,
  };
}

export async function loadConfig(configPath: string = DEFAULT_CONFIG_FILE): Promise<DirsyncConfig> {
  const abs = path.resolve(configPath);

  let text: string;
  try {
    text = await fs.readFile(abs, "utf-8");
  } catch (err) {
    throw new ConfigError(`Cannot read configuration file ${abs}: ${errorMessage(err)}`, err);
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(`Configuration file ${abs} is not valid JSON: ${errorMessage(err)}`, err);
  }

  return parseConfig(json, path.dirname(abs), abs);
}
