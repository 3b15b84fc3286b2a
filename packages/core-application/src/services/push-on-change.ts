import path from "node:path";

import { toPosix } from "@synk/core-domain";
import type { FileWatcher } from "../ports/file-watcher";
import { noopLogger, type Logger } from "../ports/logger";
import type { SyncIgnore } from "../adapters/sync-ignore";

export const DEFAULT_DEBOUNCE_MS = 1000;

export type PushOnChangeOptions = {
  watcher: FileWatcher;
  rootAbs: string;
  ignore: SyncIgnore;
  /** Runs one full push. Rejections are logged, never rethrown. */
  runPush: () => Promise<unknown>;
  debounceMs?: number;
  logger?: Logger;
};

/**
 * Turns filesystem events into full pushes. Events are debounced, pushes
 * never overlap, and changes seen while a push runs schedule one more.
 * The watcher only decides *when* to push; every push still rescans the
 * whole root.
 */
export class PushOnChange {
  private readonly rootAbs: string;
  private readonly debounceMs: number;
  private readonly logger: Logger;

  private timer: ReturnType<typeof setTimeout> | null = null;
  private running: Promise<void> | null = null;
  private dirty = false;
  private stopped = true;

  constructor(private readonly options: PushOnChangeOptions) {
    this.rootAbs = path.resolve(options.rootAbs);
    this.debounceMs = options.debounceMs ?? DEFAULT_DEBOUNCE_MS;
    this.logger = options.logger ?? noopLogger;
  }

  /** Absolute path => should the watcher skip it. */
  isIgnored(absPath: string): boolean {
    const rel = toPosix(path.relative(this.rootAbs, path.resolve(absPath)), path.sep);
    if (rel === "") return false;
    if (rel.startsWith("../") || rel === ".." || path.isAbsolute(rel)) return true;
    return this.options.ignore(rel);
  }

  async start(): Promise<void> {
    this.stopped = false;
    this.options.watcher.onEvent((e) => {
      if (this.isIgnored(e.path)) return;
      this.logger.debug(`${e.type}: ${e.path}`);
      this.schedule();
    });
    await this.options.watcher.start({
      rootDir: this.rootAbs,
      ignore: (p) => this.isIgnored(p),
    });
    this.logger.info(`watching ${this.rootAbs}`);
  }

  async stop(): Promise<void> {
    this.stopped = true;
    if (this.timer) clearTimeout(this.timer);
    this.timer = null;
    await this.options.watcher.stop();
    if (this.running) await this.running;
  }

  private schedule() {
    if (this.stopped) return;
    if (this.timer) clearTimeout(this.timer);
    this.timer = setTimeout(() => {
      this.timer = null;
      this.flush();
    }, this.debounceMs);
  }

  private flush() {
    if (this.running) {
      this.dirty = true;
      return;
    }
    this.running = this.runOnce();
  }

  private async runOnce(): Promise<void> {
    try {
      await this.options.runPush();
    } catch (err) {
      this.logger.error("push failed", { error: err instanceof Error ? err.message : String(err) });
    } finally {
      this.running = null;
      if (this.dirty) {
        this.dirty = false;
        this.schedule();
      }
    }
  }
}
