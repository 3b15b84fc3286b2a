import fs from "node:fs/promises";
import type { Dirent } from "node:fs";
import path from "node:path";

import { comparePaths, type FileRecord, type TreeState } from "@synk/core-domain";
import type { TreeScanner } from "../ports/tree-scanner";
import type { FileHasher } from "../ports/file-hasher";
import { noopLogger, type Logger } from "../ports/logger";
import { LocalIOError } from "../application/errors";
import { NodeFileHasher } from "./node-file-hasher";
import { createSyncIgnore, type SyncIgnore } from "./sync-ignore";

export type NodeTreeScannerOptions = {
  hasher?: FileHasher;
  ignore?: SyncIgnore;
  logger?: Logger;
};

/**
 * Walks the sync root and hashes every regular file.
 *
 * Symbolic links are never followed, whether they point at files or
 * directories; they are left out of the result altogether. Following them
 * would make the scan depend on what lies outside the root.
 */
export class NodeTreeScanner implements TreeScanner {
  private readonly hasher: FileHasher;
  private readonly ignore: SyncIgnore;
  private readonly logger: Logger;

  constructor(options: NodeTreeScannerOptions = {}) {
    this.hasher = options.hasher ?? new NodeFileHasher();
    this.ignore = options.ignore ?? createSyncIgnore();
    this.logger = options.logger ?? noopLogger;
  }

  async scan(rootAbs: string): Promise<TreeState> {
    const files: FileRecord[] = [];
    const directories: string[] = [];

    await this.walk(path.resolve(rootAbs), "", files, directories);

    files.sort((a, b) => comparePaths(a.path, b.path));
    directories.sort(comparePaths);
    return { files, directories };
  }

  /**
   * `dirAbs` is the native path of the directory being read; `relDir` its
   * POSIX path below the root. Entry names are used verbatim in both, so a
   * name holding "\\" is never split.
   */
  private async walk(dirAbs: string, relDir: string, files: FileRecord[], directories: string[]) {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(dirAbs, { withFileTypes: true });
    } catch (err) {
      throw new LocalIOError(`Cannot read directory ${dirAbs}: ${String(err)}`, dirAbs, err);
    }

    for (const entry of entries) {
      const rel = relDir === "" ? entry.name : `${relDir}/${entry.name}`;
      const entryAbs = path.join(dirAbs, entry.name);
      if (this.ignore(rel)) continue;

      if (entry.isSymbolicLink()) {
        this.logger.debug(`skipping symlink: ${rel}`);
      } else if (entry.isDirectory()) {
        directories.push(rel);
        await this.walk(entryAbs, rel, files, directories);
      } else if (entry.isFile()) {
        const hash = await this.hasher.hashFile(entryAbs);
        files.push({ path: rel, hash: hash.value });
      }
    }
  }
}
