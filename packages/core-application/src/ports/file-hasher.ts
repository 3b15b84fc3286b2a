import type { FileHash } from "@synk/core-domain";

export type HashAlgorithm = "sha256";

/** Digest of a file's bytes; `value` is what a snapshot stores. */
export type ContentDigest = {
  algorithm: HashAlgorithm;
  value: FileHash;
};

export interface FileHasher {
  /** Rejects with LocalIOError when the file cannot be read. */
  hashFile(absolutePath: string): Promise<ContentDigest>;
}
