import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";

export const DEFAULT_CONFIG_FILE = "synk.config.json";
export const PASSWORD_ENV = "SYNK_PASSWORD";

const SftpRemoteSchema = z.object({
  type: z.literal("sftp"),
  host: z.string().min(1),
  port: z.number().int().min(1).max(65535).default(22),
  username: z.string().min(1),
  password: z.string().optional(),
  privateKeyPath: z.string().optional(),
  remoteRoot: z.string().min(1).default("."),
});

const FolderRemoteSchema = z.object({
  type: z.literal("folder"),
  path: z.string().min(1),
});

export const SynkConfigSchema = z.object({
  version: z.literal(1).default(1),
  localPath: z.string().min(1),
  remote: z.discriminatedUnion("type", [SftpRemoteSchema, FolderRemoteSchema]),
  ignore: z.array(z.string()).default([]),
  logLevel: z.enum(["debug", "info", "warn", "error"]).default("info"),
  omitDirsImpliedByUploads: z.boolean().default(false),
});

export type SynkConfig = z.infer<typeof SynkConfigSchema>;
export type SynkConfigInput = z.input<typeof SynkConfigSchema>;
export type RemoteConfig = SynkConfig["remote"];

export class ConfigError extends Error {
  constructor(message: string, public readonly file?: string, public cause?: unknown) {
    super(message);
    this.name = "ConfigError";
  }
}

function isMissingFile(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}

export function parsePort(raw: string): number {
  if (!/^\d+$/.test(raw)) throw new ConfigError("The port must be a numerical value 1-65535.");
  const port = Number(raw);
  if (port < 1 || port > 65535) throw new ConfigError("The port must be a numerical value 1-65535.");
  return port;
}

/**
 * Read and validate the config file. `SYNK_PASSWORD` in `env` takes
 * precedence over a password stored in the file.
 */
export async function loadConfig(file: string, env: NodeJS.ProcessEnv = process.env): Promise<SynkConfig> {
  let raw: string;
  try {
    raw = await fs.readFile(file, "utf-8");
  } catch (err) {
    if (isMissingFile(err)) {
      throw new ConfigError(`Config file ${file} does not exist. Maybe try 'synk init' first.`, file, err);
    }
    throw new ConfigError(`Cannot read config file ${file}.`, file, err);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`Config file ${file} is not valid JSON. Maybe try 'synk init'.`, file, err);
  }

  const parsed = SynkConfigSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at "${issue.path.join(".")}"` : "";
    throw new ConfigError(
      `Invalid or incomplete config file ${file}${where}: ${issue?.message ?? "invalid"}`,
      file,
      parsed.error
    );
  }

  const config = parsed.data;
  const password = env[PASSWORD_ENV];
  if (config.remote.type === "sftp" && password) {
    return { ...config, remote: { ...config.remote, password } };
  }
  return config;
}

export async function saveConfig(file: string, config: SynkConfigInput): Promise<SynkConfig> {
  const valid = SynkConfigSchema.parse(config);
  await fs.mkdir(path.dirname(path.resolve(file)), { recursive: true });
  await fs.writeFile(file, JSON.stringify(valid, null, 2) + "\n", "utf-8");
  return valid;
}

/**
 * Absolute, symlink-resolved sync root. The directory is created when it
 * does not exist yet.
 */
export async function resolveSyncRoot(localPath: string): Promise<string> {
  const abs = path.resolve(localPath);
  await fs.mkdir(abs, { recursive: true });
  return fs.realpath(abs);
}
