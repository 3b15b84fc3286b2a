import { isSameOrAncestorOf, normalizeRelativePath, toSegments } from "@synk/core-domain";

/** Directory under the sync root holding synk's own state. Never synced. */
export const STATE_DIR_NAME = ".synk";

export type SyncIgnoreOptions = {
  /** Extra relative paths to skip; a directory entry skips everything below it. */
  extra?: string[];
};

/**
 * Predicate over POSIX paths relative to the sync root.
 */
export function createSyncIgnore(options: SyncIgnoreOptions = {}) {
  const extra = (options.extra ?? []).map(normalizeRelativePath).filter((p) => p !== "");

  return (relPath: string): boolean => {
    const segments = toSegments(relPath);
    if (segments.length === 0) return false;

    if (segments[0] === STATE_DIR_NAME) return true;

    // temporários comuns
    const name = segments[segments.length - 1];
    if (name === ".DS_Store") return true;
    if (name.endsWith("~")) return true;
    if (name.endsWith(".swp")) return true;

    return extra.some((p) => isSameOrAncestorOf(p, relPath));
  };
}

export type SyncIgnore = ReturnType<typeof createSyncIgnore>;
