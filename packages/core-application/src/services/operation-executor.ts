import path from "node:path";
import {
  ancestorsOf,
  toSegments,
  type OperationSet,
  type RelativePath,
} from "@synk/core-domain";
import type { RemoteEndpoint, RemoteFailure, RemoteResult } from "../ports/remote-endpoint";
import { noopLogger, type Logger } from "../ports/logger";

export type RemoteOperation =
  | { type: "delete_directory"; path: RelativePath }
  | { type: "delete_file"; path: RelativePath }
  | { type: "create_directory"; path: RelativePath }
  | { type: "upload_file"; path: RelativePath };

export type ExecutionResult =
  | { type: "ok"; completed: RemoteOperation[] }
  | {
      type: "failed";
      completed: RemoteOperation[];
      failed: { operation: RemoteOperation; failure: RemoteFailure };
      pending: RemoteOperation[];
    };

export type OperationExecutorOptions = {
  /** Absolute local sync root; upload sources are resolved against it. */
  localRootAbs: string;
  logger?: Logger;
};

/**
 * Flatten an operation set into the order it must run in: deletes strictly
 * before creates, so a path removed and re-created in the same push never
 * collides with itself.
 */
export function planOperations(ops: OperationSet): RemoteOperation[] {
  return [
    ...ops.dirsToDelete.map((p): RemoteOperation => ({ type: "delete_directory", path: p })),
    ...ops.filesToDelete.map((p): RemoteOperation => ({ type: "delete_file", path: p })),
    ...ops.dirsToCreate.map((p): RemoteOperation => ({ type: "create_directory", path: p })),
    ...ops.filesToUpload.map((p): RemoteOperation => ({ type: "upload_file", path: p })),
  ];
}

function joinRemote(dir: RelativePath, name: string): RelativePath {
  return dir === "" ? name : `${dir}/${name}`;
}

/**
 * Applies an operation set against a remote endpoint, one call at a time.
 *
 * The run stops at the first operation that fails; nothing already applied is
 * rolled back. `not_found` on a delete and `already_exists` on a mkdir count
 * as done, which keeps a re-run after a partial push convergent.
 */
export class OperationExecutor {
  private readonly logger: Logger;
  private readonly knownDirectories = new Set<RelativePath>();

  constructor(
    private readonly remote: RemoteEndpoint,
    private readonly options: OperationExecutorOptions
  ) {
    this.logger = options.logger ?? noopLogger;
  }

  async execute(ops: OperationSet): Promise<ExecutionResult> {
    this.knownDirectories.clear();

    const plan = planOperations(ops);
    const completed: RemoteOperation[] = [];

    for (const [i, operation] of plan.entries()) {
      const failure = await this.apply(operation);

      if (failure) {
        this.logger.error(`${operation.type} failed: ${operation.path}`, {
          kind: failure.kind,
          message: failure.message,
        });
        return {
          type: "failed",
          completed,
          failed: { operation, failure },
          pending: plan.slice(i + 1),
        };
      }

      this.logger.debug(`${operation.type}: ${operation.path}`);
      completed.push(operation);
    }

    return { type: "ok", completed };
  }

  private apply(operation: RemoteOperation): Promise<RemoteFailure | null> {
    switch (operation.type) {
      case "delete_directory":
        return this.deleteDirectoryTree(operation.path);
      case "delete_file":
        return this.deleteFile(operation.path);
      case "create_directory":
        return this.createDirectory(operation.path);
      case "upload_file":
        return this.uploadFile(operation.path);
    }
  }

  /* ---------------- deletes ---------------- */

  private async deleteFile(p: RelativePath): Promise<RemoteFailure | null> {
    return this.tolerate(await this.remote.deleteFile(p), "not_found");
  }

  /**
   * Plain delete first; a `not_empty` answer means the remote has no
   * recursive delete, so empty the directory child by child and try again.
   */
  private async deleteDirectoryTree(p: RelativePath): Promise<RemoteFailure | null> {
    const first = await this.remote.deleteDirectory(p);
    if (first.type === "ok") return null;
    if (first.failure.kind === "not_found") return null;
    if (first.failure.kind !== "not_empty") return first.failure;

    this.logger.debug(`directory not empty, deleting contents: ${p}`);

    const listing = await this.remote.listDirectory(p);
    if (listing.type === "error") return listing.failure;

    for (const entry of listing.value) {
      const child = joinRemote(p, entry.name);
      const failure =
        entry.type === "directory" ? await this.deleteDirectoryTree(child) : await this.deleteFile(child);
      if (failure) return failure;
    }

    const retry = await this.remote.deleteDirectory(p);
    return this.tolerate(retry, "not_found");
  }

  /* ---------------- creates ---------------- */

  private async makeDirectory(p: RelativePath): Promise<RemoteFailure | null> {
    if (this.knownDirectories.has(p)) return null;

    const failure = this.tolerate(await this.remote.makeDirectory(p), "already_exists");
    if (!failure) this.knownDirectories.add(p);
    return failure;
  }

  private async ensureAncestors(p: RelativePath): Promise<RemoteFailure | null> {
    for (const dir of ancestorsOf(p)) {
      const failure = await this.makeDirectory(dir);
      if (failure) return failure;
    }
    return null;
  }

  private async createDirectory(p: RelativePath): Promise<RemoteFailure | null> {
    return (await this.ensureAncestors(p)) ?? (await this.makeDirectory(p));
  }

  private async uploadFile(p: RelativePath): Promise<RemoteFailure | null> {
    const failure = await this.ensureAncestors(p);
    if (failure) return failure;

    const localPath = path.join(this.options.localRootAbs, ...toSegments(p));
    const result = await this.remote.uploadFile(localPath, p);
    return result.type === "ok" ? null : result.failure;
  }

  private tolerate(result: RemoteResult, kind: RemoteFailure["kind"]): RemoteFailure | null {
    if (result.type === "ok") return null;
    if (result.failure.kind === kind) return null;
    return result.failure;
  }
}
