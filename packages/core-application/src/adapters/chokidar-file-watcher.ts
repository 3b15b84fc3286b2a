import chokidar from "chokidar";
import type { FSWatcher } from "chokidar";
import path from "path";
import type {
  FileWatcher,
  FileWatcherOptions,
  FileChangeEvent,
  FileChangeType,
} from "../ports/file-watcher";
import { noopLogger, type Logger } from "../ports/logger";

export type ChokidarFileWatcherOptions = {
  /** ms a file size must stay unchanged before its event fires. */
  stabilityThresholdMs?: number;
  logger?: Logger;
};

export class ChokidarFileWatcher implements FileWatcher {
  private watcher: FSWatcher | null = null;
  private handler: ((event: FileChangeEvent) => void) | null = null;
  private readonly logger: Logger;

  constructor(private readonly options: ChokidarFileWatcherOptions = {}) {
    this.logger = options.logger ?? noopLogger;
  }

  onEvent(handler: (event: FileChangeEvent) => void): void {
    this.handler = handler;
  }

  /** Resolves once the initial directory walk is done and events are live. */
  async start(options: FileWatcherOptions): Promise<void> {
    if (this.watcher) return;

    const rootDir = path.resolve(options.rootDir);

    const watcher = chokidar.watch(rootDir, {
      persistent: true,
      ignoreInitial: true,
      followSymlinks: false,
      awaitWriteFinish: {
        stabilityThreshold: this.options.stabilityThresholdMs ?? 250,
        pollInterval: 50,
      },
      ignored: (p: string) => options.ignore(path.resolve(p)),
    });
    this.watcher = watcher;

    const emit = (type: FileChangeType, filePath: string) => {
      if (!this.handler) return;

      this.handler({
        type,
        path: path.resolve(filePath),
        occurredAt: new Date(),
      });
    };

    // diretórios também contam: um diretório vazio é sincronizado
    watcher
      .on("add", (p: string) => emit("created", p))
      .on("addDir", (p: string) => emit("created", p))
      .on("change", (p: string) => emit("modified", p))
      .on("unlink", (p: string) => emit("deleted", p))
      .on("unlinkDir", (p: string) => emit("deleted", p))
      .on("error", (err: unknown) => {
        this.logger.warn("watcher error", { error: err instanceof Error ? err.message : String(err) });
      });

    await new Promise<void>((resolve) => watcher.once("ready", () => resolve()));
  }

  async stop(): Promise<void> {
    if (!this.watcher) return;
    await this.watcher.close();
    this.watcher = null;
  }
}
