import type { RelativePath } from "../value-objects/relative-path";

export type FileHash = string;

export interface FileRecord {
  path: RelativePath;
  hash: FileHash;
}
