import type { TreeState } from "@synk/core-domain";

export interface TreeScanner {
  /** Full walk of `rootAbs`; the root itself is not listed as a directory. */
  scan(rootAbs: string): Promise<TreeState>;
}
