import type { Snapshot } from "@synk/core-domain";

export interface SnapshotStore {
  /** Last committed snapshot, or an empty one before the first push. */
  load(): Promise<Snapshot>;
  save(snapshot: Snapshot): Promise<void>;
}
