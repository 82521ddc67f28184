import type { RetryPolicy, Sleeper } from "../ports/retry-policy";
import type { StorageProvider, StoredFileEntry } from "../ports/storage-provider";
import { defaultNetworkRetryPolicy } from "./default-network-retry-policy";
import { RemoteAuthError, errorMessage } from "./errors";
import { withRetry } from "./with-retry";
import { withTimeout } from "./with-timeout";
import { sleep as realSleep } from "../infra/sleep";

export type RemoteOperation =
  | "list"
  | "listFolders"
  | "upload"
  | "download"
  | "createFolder"
  | "delete"
  | "readText"
  | "writeText";

/**
 * `transient`: log, skip this operation, keep going (next run retries it).
 * `fatal`: credentials are no longer usable, the run must stop.
 */
export type RemoteFailure = {
  kind: "transient" | "fatal";
  operation: RemoteOperation;
  path: string;
  message: string;
  cause: unknown;
};

export type RemoteResult<T> = { ok: true; value: T } | { ok: false; error: RemoteFailure };

export type RemoteGatewayOptions = {
  timeoutMs?: number;
  retryPolicy?: RetryPolicy;
  sleep?: Sleeper;
};

export const DEFAULT_REQUEST_TIMEOUT_MS = 60_000;

// transfers run as long as the data takes; the timeout covers listing and metadata calls
const UNTIMED_OPERATIONS: ReadonlySet<RemoteOperation> = new Set<RemoteOperation>(["upload", "download"]);

export function classifyRemoteError(err: unknown): RemoteFailure["kind"] {
  return err instanceof RemoteAuthError ? "fatal" : "transient";
}

/**
 * Wraps a StorageProvider with retry and explicit result values. Every call except
 * upload and download is also bounded by `timeoutMs`.
 */
export class RemoteGateway {
  private readonly timeoutMs: number;
  private readonly retryPolicy: RetryPolicy;
  private readonly sleep: Sleeper;

  constructor(
    readonly provider: StorageProvider,
    options: RemoteGatewayOptions = {}
  ) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.retryPolicy = options.retryPolicy ?? defaultNetworkRetryPolicy();
    this.sleep = options.sleep ?? realSleep;
  }

  list(remoteDir: string): Promise<RemoteResult<StoredFileEntry[]>> {
    return this.call("list", remoteDir, () => this.provider.list(remoteDir));
  }

  listFolders(remoteDir: string): Promise<RemoteResult<string[]>> {
    return this.call("listFolders", remoteDir, () => this.provider.listFolders(remoteDir));
  }

  upload(localPath: string, remotePath: string): Promise<RemoteResult<void>> {
    return this.call("upload", remotePath, () => this.provider.upload(localPath, remotePath));
  }

  download(remotePath: string, localPath: string): Promise<RemoteResult<void>> {
    return this.call("download", remotePath, () => this.provider.download(remotePath, localPath));
  }

  createFolder(remotePath: string): Promise<RemoteResult<void>> {
    return this.call("createFolder", remotePath, () => this.provider.createFolder(remotePath));
  }

  delete(remotePath: string): Promise<RemoteResult<void>> {
    return this.call("delete", remotePath, () => this.provider.delete(remotePath));
  }

  readText(remotePath: string): Promise<RemoteResult<string | null>> {
    return this.call("readText", remotePath, () => this.provider.readText(remotePath));
  }

  writeText(content: string, remotePath: string): Promise<RemoteResult<void>> {
    return this.call("writeText", remotePath, () => this.provider.writeText(content, remotePath));
  }

  private async call<T>(
    operation: RemoteOperation,
    path: string,
    fn: () => Promise<T>
  ): Promise<RemoteResult<T>> {
    try {
      const value = await withRetry(
        () => {
          if (UNTIMED_OPERATIONS.has(operation)) return fn();
          return withTimeout(fn(), this.timeoutMs, `${operation} ${path}`);
        },
        this.retryPolicy,
        this.sleep
      );
      return { ok: true, value };
    } catch (err) {
      return {
        ok: false,
        error: {
          kind: classifyRemoteError(err),
          operation,
          path,
          message: errorMessage(err),
          cause: err,
        },
      };
    }
  }
}
