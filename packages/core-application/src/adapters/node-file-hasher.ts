import { createHash } from "crypto";
import { createReadStream } from "fs";
import type { ContentDigest, FileHasher, HashAlgorithm } from "../ports/file-hasher";
import { LocalIOError } from "../application/errors";

/** Read size per chunk; memory use stays flat whatever the file size. */
export const HASH_CHUNK_SIZE = 64 * 1024;

export class NodeFileHasher implements FileHasher {
  async hashFile(absolutePath: string): Promise<ContentDigest> {
    const algo: HashAlgorithm = "sha256";

    return new Promise((resolve, reject) => {
      const hash = createHash(algo);
      const stream = createReadStream(absolutePath, { highWaterMark: HASH_CHUNK_SIZE });

      stream.on("data", (chunk) => hash.update(chunk));
      stream.on("error", (err) => {
        reject(new LocalIOError(`Cannot read file ${absolutePath}: ${err.message}`, absolutePath, err));
      });
      stream.on("end", () => {
        resolve({ algorithm: algo, value: hash.digest("hex") });
      });
    });
  }
}
