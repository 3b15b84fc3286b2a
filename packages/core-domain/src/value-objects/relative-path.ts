/**
 * Relative POSIX path below the sync root ("docs/notes/a.txt").
 * Never starts with "/", never contains "." or ".." segments.
 */
export type RelativePath = string;

export type PathSegments = readonly string[];

export class InvalidRelativePathError extends Error {
  constructor(public readonly input: string) {
    super(`Invalid relative path: "${input}"`);
    this.name = "InvalidRelativePathError";
  }
}

/**
 * Host path (as `path.relative` returns it) to a relative POSIX path. Only the
 * given host separator is rewritten; on POSIX hosts "\\" is a legal name
 * character and stays.
 */
export function toPosix(p: string, hostSeparator: string): string {
  return hostSeparator === "/" ? p : p.split(hostSeparator).join("/");
}

/**
 * Split a relative path into segments on "/". Empty and "." segments are
 * dropped, ".." is rejected since it would escape the root.
 */
export function toSegments(p: RelativePath): PathSegments {
  const segments = p
    .split("/")
    .filter((s) => s.length > 0 && s !== ".");

  if (segments.includes("..")) {
    throw new InvalidRelativePathError(p);
  }
  return segments;
}

export function fromSegments(segments: PathSegments): RelativePath {
  return segments.join("/");
}

export function normalizeRelativePath(p: string): RelativePath {
  return fromSegments(toSegments(p));
}

export function depthOf(p: RelativePath): number {
  return toSegments(p).length;
}

/**
 * Strict ancestry on segments: "a" is an ancestor of "a/b" but not of "a"
 * itself, and "ab" is not an ancestor of "abc".
 */
export function isAncestorOf(ancestor: RelativePath, descendant: RelativePath): boolean {
  const a = toSegments(ancestor);
  const d = toSegments(descendant);
  if (a.length >= d.length) return false;
  return a.every((segment, i) => segment === d[i]);
}

export function isSameOrAncestorOf(ancestor: RelativePath, descendant: RelativePath): boolean {
  return normalizeRelativePath(ancestor) === normalizeRelativePath(descendant) || isAncestorOf(ancestor, descendant);
}

export function parentOf(p: RelativePath): RelativePath | null {
  const segments = toSegments(p);
  if (segments.length <= 1) return null;
  return fromSegments(segments.slice(0, -1));
}

/** Proper ancestors of `p`, root-to-leaf: "a/b/c.txt" => ["a", "a/b"]. */
export function ancestorsOf(p: RelativePath): RelativePath[] {
  const segments = toSegments(p);
  const out: RelativePath[] = [];
  for (let i = 1; i < segments.length; i++) {
    out.push(fromSegments(segments.slice(0, i)));
  }
  return out;
}

export function comparePaths(a: RelativePath, b: RelativePath): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/** Shallower first, then lexicographic; ancestors always precede descendants. */
export function compareByDepth(a: RelativePath, b: RelativePath): number {
  return depthOf(a) - depthOf(b) || comparePaths(a, b);
}
