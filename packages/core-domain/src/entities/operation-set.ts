import type { RelativePath } from "../value-objects/relative-path";

/**
 * The four-list plan derived from diffing a scan against the committed
 * snapshot. Lists are disjoint and consumed once by the executor.
 */
export interface OperationSet {
  dirsToCreate: RelativePath[];
  dirsToDelete: RelativePath[];
  filesToUpload: RelativePath[];
  filesToDelete: RelativePath[];
}

export function emptyOperationSet(): OperationSet {
  return { dirsToCreate: [], dirsToDelete: [], filesToUpload: [], filesToDelete: [] };
}

export function countOperations(ops: OperationSet): number {
  return (
    ops.dirsToCreate.length +
    ops.dirsToDelete.length +
    ops.filesToUpload.length +
    ops.filesToDelete.length
  );
}

export function isEmptyOperationSet(ops: OperationSet): boolean {
  return countOperations(ops) === 0;
}
