import fs from "node:fs/promises";
import path from "node:path";

import { countOperations } from "@synk/core-domain";
import {
  ChokidarFileWatcher,
  ConsoleLogger,
  LocalIOError,
  NodeSnapshotStore,
  NodeTreeScanner,
  PushOnChange,
  createSyncIgnore,
  planPush,
  push,
  type Logger,
  type PlanParams,
} from "@synk/core-application";
import {
  ConfigError,
  loadConfig,
  parsePort,
  resolveSyncRoot,
  saveConfig,
  type SynkConfig,
  type SynkConfigInput,
} from "./config";
import { openRemote } from "./remote";
import { formatFailure, formatPlan } from "./format";

export type CommandContext = {
  configFile: string;
  verbose: boolean;
  out: (line: string) => void;
  /** Overrides the logger built from the config (tests). */
  logger?: Logger;
  env?: NodeJS.ProcessEnv;
};

export type InitArgs = {
  path?: string;
  remote?: string;
  port?: string;
  username?: string;
  password?: string;
  folder?: string;
  remoteRoot?: string;
  privateKey?: string;
};

function loggerFor(ctx: CommandContext, config: SynkConfig): Logger {
  return ctx.logger ?? new ConsoleLogger(ctx.verbose ? "debug" : config.logLevel);
}

async function syncRootOf(config: SynkConfig): Promise<string> {
  try {
    return await fs.realpath(path.resolve(config.localPath));
  } catch (err) {
    throw new LocalIOError(`Sync root ${config.localPath} cannot be resolved.`, config.localPath, err);
  }
}

async function planParams(ctx: CommandContext, config: SynkConfig): Promise<PlanParams> {
  const logger = loggerFor(ctx, config);
  const rootAbs = await syncRootOf(config);
  return {
    rootAbs,
    snapshotStore: new NodeSnapshotStore(rootAbs),
    scanner: new NodeTreeScanner({ ignore: createSyncIgnore({ extra: config.ignore }), logger }),
    logger,
    diff: { omitDirsImpliedByUploads: config.omitDirsImpliedByUploads },
  };
}

/** Write the config file. Arguments are required; there is no prompting. */
export async function runInit(ctx: CommandContext, args: InitArgs): Promise<SynkConfig> {
  if (!args.path) throw new ConfigError("Local path was not specified.");

  const localPath = await resolveSyncRoot(args.path);

  let remote: SynkConfigInput["remote"];
  if (args.folder) {
    remote = { type: "folder", path: path.resolve(args.folder) };
  } else {
    if (!args.remote) throw new ConfigError("Remote was not specified. Give the SFTP server address or --folder.");
    if (!args.username) throw new ConfigError("Username was not specified.");
    remote = {
      type: "sftp",
      host: args.remote,
      port: parsePort(args.port ?? "22"),
      username: args.username,
      password: args.password,
      privateKeyPath: args.privateKey ? path.resolve(args.privateKey) : undefined,
      remoteRoot: args.remoteRoot ?? ".",
    };
  }

  const config = await saveConfig(ctx.configFile, { version: 1, localPath, remote });
  ctx.out(`Wrote ${ctx.configFile} (sync root ${localPath}).`);
  return config;
}

/** Print what a push would do without connecting. Exit code 0. */
export async function runStatus(ctx: CommandContext): Promise<number> {
  const config = await loadConfig(ctx.configFile, ctx.env);
  const { operations } = await planPush(await planParams(ctx, config));

  if (countOperations(operations) === 0) {
    ctx.out("Everything up to date.");
    return 0;
  }
  ctx.out(`${countOperations(operations)} operation(s) pending:`);
  for (const line of formatPlan(operations)) ctx.out(`  ${line}`);
  return 0;
}

export async function runPush(ctx: CommandContext, opts: { dryRun?: boolean } = {}): Promise<number> {
  if (opts.dryRun) return runStatus(ctx);

  const config = await loadConfig(ctx.configFile, ctx.env);
  const params = await planParams(ctx, config);
  const remote = await openRemote(config.remote, params.logger ?? loggerFor(ctx, config));

  try {
    const outcome = await push({ ...params, remote: remote.endpoint });

    if (outcome.result.type === "failed") {
      for (const line of formatFailure(outcome.result)) ctx.out(line);
      return 1;
    }

    const done = outcome.result.completed.length;
    ctx.out(done === 0 ? "Everything up to date." : `Pushed ${done} operation(s).`);
    return 0;
  } finally {
    await remote.close();
  }
}

/**
 * Push once, then push again whenever the tree changes. Resolves with the
 * running scheduler; the caller stops it.
 */
export async function runWatch(ctx: CommandContext, opts: { debounceMs?: number } = {}): Promise<PushOnChange> {
  const config = await loadConfig(ctx.configFile, ctx.env);
  const params = await planParams(ctx, config);
  const logger = params.logger ?? loggerFor(ctx, config);

  const runOnce = async () => {
    const remote = await openRemote(config.remote, logger);
    try {
      const outcome = await push({ ...params, remote: remote.endpoint });
      if (outcome.result.type === "failed") {
        for (const line of formatFailure(outcome.result)) ctx.out(line);
      }
    } finally {
      await remote.close();
    }
  };

  await runOnce();

  const scheduler = new PushOnChange({
    watcher: new ChokidarFileWatcher({ logger }),
    rootAbs: params.rootAbs,
    ignore: createSyncIgnore({ extra: config.ignore }),
    runPush: runOnce,
    debounceMs: opts.debounceMs,
    logger,
  });
  await scheduler.start();
  return scheduler;
}
