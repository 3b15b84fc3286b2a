import {
  ancestorsOf,
  compareByDepth,
  comparePaths,
  normalizeRelativePath,
  type FileChangeSet,
  type FileHash,
  type OperationSet,
  type RelativePath,
  type Snapshot,
  type TreeState,
} from "@synk/core-domain";

export type DiffOptions = {
  /**
   * Drop a new directory from `dirsToCreate` when an upload lands inside it,
   * since the executor creates missing ancestors before every upload.
   */
  omitDirsImpliedByUploads?: boolean;
};

/* ---------------- helpers ---------------- */

function indexFiles(state: TreeState): Map<RelativePath, FileHash> {
  const map = new Map<RelativePath, FileHash>();
  for (const f of state.files) map.set(normalizeRelativePath(f.path), f.hash);
  return map;
}

function directorySet(state: TreeState): Set<RelativePath> {
  return new Set(state.directories.map(normalizeRelativePath));
}

/** Every proper ancestor of every path; `d` has a descendant in `paths` iff it is in here. */
function ancestorSet(paths: Iterable<RelativePath>): Set<RelativePath> {
  const out = new Set<RelativePath>();
  for (const p of paths) {
    for (const a of ancestorsOf(p)) out.add(a);
  }
  return out;
}

function hasAncestorIn(p: RelativePath, candidates: ReadonlySet<RelativePath>): boolean {
  return ancestorsOf(p).some((a) => candidates.has(a));
}

/* ---------------- file diff ---------------- */

export function diffFiles(current: TreeState, previous: Snapshot): FileChangeSet {
  const cur = indexFiles(current);
  const prev = indexFiles(previous);

  const added: RelativePath[] = [];
  const modified: RelativePath[] = [];
  const deleted: RelativePath[] = [];

  for (const [p, hash] of cur) {
    const before = prev.get(p);
    if (before === undefined) added.push(p);
    else if (before !== hash) modified.push(p);
  }
  for (const p of prev.keys()) {
    if (!cur.has(p)) deleted.push(p);
  }

  return {
    added: added.sort(comparePaths),
    modified: modified.sort(comparePaths),
    deleted: deleted.sort(comparePaths),
  };
}

/* ---------------- pruning ---------------- */

/**
 * Keeps only the deepest new directory on each branch, and, when asked, only
 * those no upload will create implicitly.
 */
export function pruneDirsToCreate(
  dirsToCreate: RelativePath[],
  filesToUpload: RelativePath[],
  options: DiffOptions = {}
): RelativePath[] {
  const hasNewSubdir = ancestorSet(dirsToCreate);
  const holdsUpload = options.omitDirsImpliedByUploads ? ancestorSet(filesToUpload) : new Set<RelativePath>();

  return dirsToCreate.filter((d) => {
    const key = normalizeRelativePath(d);
    return !hasNewSubdir.has(key) && !holdsUpload.has(key);
  });
}

/** Keeps only the shallowest deleted directory on each branch. */
export function pruneDirsToDelete(dirsToDelete: RelativePath[]): RelativePath[] {
  const gone = new Set(dirsToDelete.map(normalizeRelativePath));
  return dirsToDelete.filter((d) => !hasAncestorIn(d, gone));
}

/** Files whose removal already follows from a recursive directory delete are dropped. */
export function pruneFilesToDelete(
  filesToDelete: RelativePath[],
  prunedDirsToDelete: RelativePath[]
): RelativePath[] {
  const gone = new Set(prunedDirsToDelete.map(normalizeRelativePath));
  return filesToDelete.filter((f) => !hasAncestorIn(f, gone));
}

/* ---------------- operation set ---------------- */

/**
 * Plan the remote operations that bring the remote side from `previous`
 * (the last committed snapshot) to `current` (a fresh scan).
 *
 * A path that changed kind between runs (file <-> directory) shows up as an
 * independent delete plus create; deletes always run first.
 */
export function computeOperationSet(
  current: TreeState,
  previous: Snapshot,
  options: DiffOptions = {}
): OperationSet {
  const changes = diffFiles(current, previous);
  const filesToUpload = [...changes.added, ...changes.modified].sort(comparePaths);

  const curDirs = directorySet(current);
  const prevDirs = directorySet(previous);
  const newDirs = [...curDirs].filter((d) => !prevDirs.has(d));
  const goneDirs = [...prevDirs].filter((d) => !curDirs.has(d));

  const dirsToCreate = pruneDirsToCreate(newDirs, filesToUpload, options).sort(compareByDepth);
  const dirsToDelete = pruneDirsToDelete(goneDirs).sort(comparePaths);
  const filesToDelete = pruneFilesToDelete(changes.deleted, dirsToDelete);

  return { dirsToCreate, dirsToDelete, filesToUpload, filesToDelete };
}
