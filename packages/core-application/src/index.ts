// Public API of the core-application package: ports, application helpers, services and
// the Node adapters. Test doubles live under the "./testing" entry point.

// Ports (interfaces)
export * from "./ports/logger";
export * from "./ports/storage-provider";
export * from "./ports/local-tree";
export * from "./ports/run-lock";
export type { RetryContext, RetryPolicy, Sleeper } from "./ports/retry-policy";

// Application
export * from "./application/errors";
export * from "./application/remote-gateway";
export * from "./application/remote-path";
export * from "./application/with-retry";
export * from "./application/with-timeout";
export * from "./application/default-network-retry-policy";
export * from "./application/concurrency";
export * from "./application/keyed-lock";

// Value objects
export * from "./value-objects/sync-progress";

// Services
export * from "./services/timestamp-codec";
export * from "./services/sidecar-metadata";
export * from "./services/timestamp-strategy";
export * from "./services/snapshot-service";
export * from "./services/reconciler";
export * from "./services/sync-driver";

// Node adapters
export * from "./adapters/sync-ignore";
export * from "./adapters/node-local-tree";
export * from "./adapters/apply-lock";
export * from "./adapters/folder-storage-provider";
export * from "./adapters/console-logger";
export * from "./adapters/google-auth";
export * from "./adapters/google-drive-files";
export * from "./adapters/google-drive-storage-provider";
