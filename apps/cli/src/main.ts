import { Command, InvalidArgumentError } from "commander";

import {
  LocalIOError,
  RemoteConnectionError,
  SnapshotCorruptedError,
} from "@synk/core-application";
import { ConfigError, DEFAULT_CONFIG_FILE } from "./config";
import { runInit, runPush, runStatus, runWatch, type CommandContext, type InitArgs } from "./commands";

type GlobalOptions = { config: string; verbose: boolean };
type InitOptions = Pick<InitArgs, "password" | "privateKey" | "remoteRoot" | "folder">;

function parseMilliseconds(raw: string): number {
  const ms = Number(raw);
  if (!Number.isInteger(ms) || ms < 0) throw new InvalidArgumentError("Expected a number of milliseconds.");
  return ms;
}

function contextOf(program: Command): CommandContext {
  const opts = program.opts<GlobalOptions>();
  return {
    configFile: opts.config,
    verbose: opts.verbose,
    out: (line) => console.log(line),
  };
}

function buildProgram(): Command {
  const program = new Command();

  program
    .name("synk")
    .description("Back up your files to your own server with ease.")
    .option("-c, --config <file>", "config file", DEFAULT_CONFIG_FILE)
    .option("-v, --verbose", "log every remote operation", false);

  program
    .command("init")
    .description("Initialize the client")
    .argument("[path]", "local folder path to sync")
    .argument("[remote]", "remote location (SFTP server address)")
    .argument("[port]", "the port the remote is hosted on", "22")
    .argument("[username]", "the username for the SFTP server")
    .option("--password <password>", "store a password (prefer the SYNK_PASSWORD variable)")
    .option("--private-key <file>", "private key used to log in")
    .option("--remote-root <dir>", "directory on the server mirroring the local folder", ".")
    .option("--folder <dir>", "mirror onto a local or mounted directory instead of SFTP")
    .action(
      async (
        localPath: string | undefined,
        remote: string | undefined,
        port: string,
        username: string | undefined,
        opts: InitOptions
      ) => {
        await runInit(contextOf(program), { ...opts, path: localPath, remote, port, username });
      }
    );

  program
    .command("push")
    .description("Push changes to remote")
    .option("-n, --dry-run", "only show what would be done", false)
    .action(async (opts: { dryRun: boolean }) => {
      process.exitCode = await runPush(contextOf(program), opts);
    });

  program
    .command("status")
    .description("Show sync status")
    .action(async () => {
      process.exitCode = await runStatus(contextOf(program));
    });

  program
    .command("watch")
    .description("Push now, then again after every change")
    .option("--debounce <ms>", "quiet period before pushing", parseMilliseconds, 1000)
    .action(async (opts: { debounce: number }) => {
      const scheduler = await runWatch(contextOf(program), { debounceMs: opts.debounce });
      await new Promise<void>((resolve) => {
        process.once("SIGINT", resolve);
        process.once("SIGTERM", resolve);
      });
      await scheduler.stop();
    });

  return program;
}

const KNOWN_ERRORS = [ConfigError, LocalIOError, SnapshotCorruptedError, RemoteConnectionError];

buildProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    if (KNOWN_ERRORS.some((E) => err instanceof E) && err instanceof Error) {
      console.error(`Error: ${err.message}`);
    } else {
      console.error(err);
    }
    process.exitCode = 1;
  });
