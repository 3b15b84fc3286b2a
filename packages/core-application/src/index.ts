// Public API of the core-application package: ports, services and the Node
// adapters, so applications never reach into internal file paths.

// Ports (interfaces)
export * from "./ports/logger";
export * from "./ports/remote-endpoint";
export type { ContentDigest, FileHasher, HashAlgorithm } from "./ports/file-hasher";
export type { SnapshotStore } from "./ports/snapshot-store";
export type { TreeScanner } from "./ports/tree-scanner";
export type {
  FileChangeType,
  FileChangeEvent,
  FileWatcherOptions,
  FileWatcher,
} from "./ports/file-watcher";

// Errors
export * from "./application/errors";

// Services
export * from "./services/operation-diff";
export * from "./services/operation-executor";
export * from "./services/push-service";
export * from "./services/push-on-change";

// Node adapters
export * from "./adapters/console-logger";
export * from "./adapters/node-file-hasher";
export * from "./adapters/node-tree-scanner";
export * from "./adapters/node-snapshot-store";
export * from "./adapters/sync-ignore";
export * from "./adapters/local-folder-remote-endpoint";
export * from "./adapters/sftp-remote-endpoint";
export * from "./adapters/chokidar-file-watcher";
