import path from "node:path";
import SftpClient from "ssh2-sftp-client";

import { toSegments, type RelativePath } from "@synk/core-domain";
import {
  fail,
  ok,
  okValue,
  type RemoteEndpoint,
  type RemoteEntry,
  type RemoteFailureKind,
  type RemoteResult,
} from "../ports/remote-endpoint";
import { RemoteConnectionError } from "../application/errors";
import { noopLogger, type Logger } from "../ports/logger";

export type SftpConnectOptions = {
  host: string;
  port: number;
  username: string;
  password?: string;
  privateKey?: string | Buffer;
  readyTimeout?: number;
};

/** The slice of ssh2-sftp-client this endpoint talks to. */
export interface SftpClientLike {
  connect(options: SftpConnectOptions): Promise<unknown>;
  end(): Promise<unknown>;
  mkdir(remotePath: string): Promise<unknown>;
  rmdir(remotePath: string): Promise<unknown>;
  delete(remotePath: string): Promise<unknown>;
  list(remotePath: string): Promise<Array<{ name: string; type: string }>>;
  exists(remotePath: string): Promise<false | string>;
  fastPut(localPath: string, remotePath: string): Promise<unknown>;
  fastGet(remotePath: string, localPath: string): Promise<unknown>;
}

export type SftpEndpointOptions = SftpConnectOptions & {
  /** Directory on the server that mirrors the sync root. */
  remoteRoot: string;
  logger?: Logger;
};

const CONNECTION_CODES = new Set<string | number>([
  "ERR_NOT_CONNECTED",
  "ECONNRESET",
  "ECONNREFUSED",
  "ETIMEDOUT",
  "EPIPE",
  6, // SSH_FX_NO_CONNECTION
  7, // SSH_FX_CONNECTION_LOST
]);

function errorCode(err: unknown): string | number | undefined {
  if (typeof err === "object" && err !== null && "code" in err) {
    const code = err.code;
    if (typeof code === "string" || typeof code === "number") return code;
  }
  return undefined;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function sftpFailureKind(err: unknown): RemoteFailureKind {
  const code = errorCode(err);
  if (code === undefined) return "failure";

  if (code === 2 || code === "ENOENT" || code === "ERR_BAD_PATH") return "not_found";
  if (code === 3 || code === "EACCES" || code === "EPERM") return "permission_denied";
  if (CONNECTION_CODES.has(code)) return "connection_lost";
  return "failure";
}

function toFailure<T = void>(err: unknown): RemoteResult<T> {
  return fail<T>(sftpFailureKind(err), errorMessage(err));
}

/**
 * Remote endpoint over SFTP (ssh2-sftp-client). SFTP has no recursive rmdir,
 * and servers report a non-empty `rmdir` inconsistently (OpenSSH answers a
 * generic failure, others a permission error), so a failed directory delete
 * is followed by a listing: entries left means `not_empty`.
 */
export class SftpRemoteEndpoint implements RemoteEndpoint {
  private readonly logger: Logger;

  private constructor(
    private readonly client: SftpClientLike,
    private readonly remoteRoot: string,
    logger?: Logger
  ) {
    this.logger = logger ?? noopLogger;
  }

  static async connect(
    options: SftpEndpointOptions,
    client: SftpClientLike = new SftpClient()
  ): Promise<SftpRemoteEndpoint> {
    const { remoteRoot, logger, ...login } = options;
    try {
      await client.connect(login);
    } catch (err) {
      throw new RemoteConnectionError(
        `Cannot connect to ${login.username}@${login.host}:${login.port}: ${errorMessage(err)}`,
        login.host,
        err
      );
    }
    logger?.debug("sftp connected", { host: login.host, port: login.port, remoteRoot });
    return new SftpRemoteEndpoint(client, remoteRoot, logger);
  }

  async close(): Promise<void> {
    await this.client.end();
  }

  private remote(p: RelativePath): string {
    return path.posix.join(this.remoteRoot, ...toSegments(p));
  }

  async makeDirectory(p: RelativePath): Promise<RemoteResult> {
    const target = this.remote(p);
    try {
      await this.client.mkdir(target);
      return ok();
    } catch (err) {
      const kind = sftpFailureKind(err);
      if (kind === "connection_lost") return toFailure(err);
      if ((await this.typeOf(target)) === "d") return fail("already_exists", `${target} already exists`);
      return toFailure(err);
    }
  }

  async deleteDirectory(p: RelativePath): Promise<RemoteResult> {
    const target = this.remote(p);
    try {
      await this.client.rmdir(target);
      return ok();
    } catch (err) {
      const kind = sftpFailureKind(err);
      if (kind === "not_found" || kind === "connection_lost") return toFailure(err);

      const listing = await this.listDirectory(p);
      if (listing.type === "ok" && listing.value.length > 0) {
        this.logger.debug("rmdir refused on non-empty directory", { path: target, code: errorCode(err) });
        return fail("not_empty", `${target} is not empty`);
      }
      return toFailure(err);
    }
  }

  async listDirectory(p: RelativePath): Promise<RemoteResult<RemoteEntry[]>> {
    try {
      const entries = await this.client.list(this.remote(p));
      return okValue(
        entries
          .filter((e) => e.name !== "." && e.name !== "..")
          .map((e): RemoteEntry => ({ name: e.name, type: e.type === "d" ? "directory" : "file" }))
      );
    } catch (err) {
      return toFailure<RemoteEntry[]>(err);
    }
  }

  async uploadFile(localPath: string, remotePath: RelativePath): Promise<RemoteResult> {
    try {
      await this.client.fastPut(localPath, this.remote(remotePath));
      return ok();
    } catch (err) {
      return toFailure(err);
    }
  }

  async downloadFile(remotePath: RelativePath, localPath: string): Promise<RemoteResult> {
    try {
      await this.client.fastGet(this.remote(remotePath), localPath);
      return ok();
    } catch (err) {
      return toFailure(err);
    }
  }

  async deleteFile(p: RelativePath): Promise<RemoteResult> {
    try {
      await this.client.delete(this.remote(p));
      return ok();
    } catch (err) {
      return toFailure(err);
    }
  }

  private async typeOf(target: string): Promise<false | string> {
    try {
      return await this.client.exists(target);
    } catch {
      return false;
    }
  }
}
