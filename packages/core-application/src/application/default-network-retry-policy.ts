import type { RetryPolicy } from "../ports/retry-policy";
import {
  NetworkError,
  RemoteRateLimitedError,
  RemoteServerError,
  RemoteTimeoutError,
} from "./errors";

export function isTransientRemoteError(err: unknown): boolean {
  return (
    err instanceof NetworkError ||
    err instanceof RemoteRateLimitedError ||
    err instanceof RemoteServerError ||
    err instanceof RemoteTimeoutError
  );
}

export function defaultNetworkRetryPolicy(overrides: Partial<RetryPolicy> = {}): RetryPolicy {
  return {
    maxAttempts: 4,
    baseDelayMs: 300,
    maxDelayMs: 5000,
    jitterRatio: 0.2,
    shouldRetry: isTransientRemoteError,
    retryAfterMs: (err) =>
      err instanceof RemoteRateLimitedError && err.retryAfterSeconds !== undefined
        ? err.retryAfterSeconds * 1000
        : undefined,
    ...overrides,
  };
}
