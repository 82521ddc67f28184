export type RetryContext = {
  attempt: number;
  startedAt: number;
  lastError?: unknown;
};

export type RetryPolicy = {
  maxAttempts: number;            // first call included
  baseDelayMs: number;            // delay after the first failure, doubled per attempt
  maxDelayMs: number;             // cap for both the backoff and server hints
  jitterRatio: number;            // 0.2 = up to 20% either way
  shouldRetry: (err: unknown) => boolean;
  /** Delay the store asked for (e.g. Retry-After); replaces the backoff when present. */
  retryAfterMs?: (err: unknown) => number | undefined;
};

export type Sleeper = (ms: number) => Promise<void>;
