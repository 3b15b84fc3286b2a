import path from "node:path";

import {
  countOperations,
  type OperationSet,
  type Snapshot,
  type TreeState,
} from "@synk/core-domain";
import type { RemoteEndpoint } from "../ports/remote-endpoint";
import type { SnapshotStore } from "../ports/snapshot-store";
import type { TreeScanner } from "../ports/tree-scanner";
import { noopLogger, type Logger } from "../ports/logger";
import { NodeTreeScanner } from "../adapters/node-tree-scanner";
import { computeOperationSet, diffFiles, type DiffOptions } from "./operation-diff";
import { OperationExecutor, type ExecutionResult } from "./operation-executor";

export type PlanParams = {
  /** Absolute, symlink-resolved sync root. */
  rootAbs: string;
  snapshotStore: SnapshotStore;
  scanner?: TreeScanner;
  logger?: Logger;
  diff?: DiffOptions;
};

export type PushParams = PlanParams & {
  remote: RemoteEndpoint;
};

export type PushPlan = {
  previous: Snapshot;
  current: TreeState;
  operations: OperationSet;
};

export type PushOutcome = {
  /** The committed snapshot after this call: the new one on success, the previous one otherwise. */
  snapshot: Snapshot;
  operations: OperationSet;
  result: ExecutionResult;
};

/**
 * Load the committed snapshot, scan the root and diff them. Touches nothing
 * remote; local I/O and snapshot corruption errors propagate.
 */
export async function planPush(params: PlanParams): Promise<PushPlan> {
  const logger = params.logger ?? noopLogger;
  const scanner = params.scanner ?? new NodeTreeScanner({ logger });
  const rootAbs = path.resolve(params.rootAbs);

  const previous = await params.snapshotStore.load();
  const current = await scanner.scan(rootAbs);
  const operations = computeOperationSet(current, previous, params.diff);

  const changes = diffFiles(current, previous);
  logger.info("plan ready", {
    added: changes.added.length,
    modified: changes.modified.length,
    deleted: changes.deleted.length,
    dirsToCreate: operations.dirsToCreate.length,
    dirsToDelete: operations.dirsToDelete.length,
  });

  return { previous, current, operations };
}

/**
 * One push: plan, apply against the remote, and commit the scanned state as
 * the new snapshot only when every operation went through.
 *
 * A failed run leaves the previous snapshot in place; the next push diffs
 * against it again and picks up whatever is still missing remotely.
 */
export async function push(params: PushParams): Promise<PushOutcome> {
  const logger = params.logger ?? noopLogger;
  const { previous, current, operations } = await planPush(params);

  if (countOperations(operations) === 0) {
    logger.info("nothing to push");
    return { snapshot: previous, operations, result: { type: "ok", completed: [] } };
  }

  const executor = new OperationExecutor(params.remote, {
    localRootAbs: path.resolve(params.rootAbs),
    logger,
  });
  const result = await executor.execute(operations);

  if (result.type === "failed") {
    logger.error("push stopped, snapshot not updated", {
      completed: result.completed.length,
      pending: result.pending.length,
      failed: `${result.failed.operation.type} ${result.failed.operation.path}`,
    });
    return { snapshot: previous, operations, result };
  }

  await params.snapshotStore.save(current);
  logger.info("push complete", { operations: result.completed.length });

  return { snapshot: current, operations, result };
}
