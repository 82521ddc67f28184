export class NetworkError extends Error {
  constructor(message: string, public cause?: unknown) {
    super(message);
    this.name = "NetworkError";
  }
}

export class RemoteRateLimitedError extends Error {
  constructor(message: string, public retryAfterSeconds?: number, public cause?: unknown) {
    super(message);
    this.name = "RemoteRateLimitedError";
  }
}

export class RemoteServerError extends Error {
  constructor(message: string, public statusCode?: number, public cause?: unknown) {
    super(message);
    this.name = "RemoteServerError";
  }
}

export class RemoteAuthError extends Error {
  constructor(message: string, public cause?: unknown) {
    super(message);
    this.name = "RemoteAuthError";
  }
}

export class RemoteTimeoutError extends Error {
  constructor(message: string, public timeoutMs: number) {
    super(message);
    this.name = "RemoteTimeoutError";
  }
}

export class ConfigError extends Error {
  constructor(message: string, public cause?: unknown) {
    super(message);
    this.name = "ConfigError";
  }
}

export class SyncAbortedError extends Error {
  constructor(message: string, public cause?: unknown) {
    super(message);
    this.name = "SyncAbortedError";
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
