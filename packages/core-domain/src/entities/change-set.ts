import type { RelativePath } from "../value-objects/relative-path";

export interface FileChangeSet {
  added: RelativePath[];
  modified: RelativePath[];
  deleted: RelativePath[];
}
