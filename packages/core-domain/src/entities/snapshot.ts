import type { RelativePath } from "../value-objects/relative-path";
import type { FileRecord } from "./file-record";

/**
 * State of a sync root at one point in time: every regular file with its
 * content hash and every directory below the root (the root itself excluded).
 *
 * The same shape is produced by a scan and persisted as the committed
 * snapshot, so a successful push simply stores what it scanned.
 */
export interface TreeState {
  files: FileRecord[];
  directories: RelativePath[];
}

export type Snapshot = TreeState;

export function emptySnapshot(): Snapshot {
  return { files: [], directories: [] };
}

export function isEmptySnapshot(snapshot: Snapshot): boolean {
  return snapshot.files.length === 0 && snapshot.directories.length === 0;
}
