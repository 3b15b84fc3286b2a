import fs from "node:fs/promises";

import {
  LocalFolderRemoteEndpoint,
  SftpRemoteEndpoint,
  type Logger,
  type RemoteEndpoint,
} from "@synk/core-application";
import { ConfigError, PASSWORD_ENV, type RemoteConfig } from "./config";

export type OpenedRemote = {
  endpoint: RemoteEndpoint;
  close(): Promise<void>;
};

/**
 * Connect to the configured remote. Connection problems surface here, before
 * any snapshot is read or any operation is planned.
 */
export async function openRemote(remote: RemoteConfig, logger: Logger): Promise<OpenedRemote> {
  if (remote.type === "folder") {
    const endpoint = new LocalFolderRemoteEndpoint(remote.path);
    return { endpoint, close: async () => {} };
  }

  if (!remote.password && !remote.privateKeyPath) {
    throw new ConfigError(`No credentials for ${remote.username}@${remote.host}: set ${PASSWORD_ENV} or privateKeyPath.`);
  }

  let privateKey: Buffer | undefined;
  if (remote.privateKeyPath) {
    try {
      privateKey = await fs.readFile(remote.privateKeyPath);
    } catch (err) {
      throw new ConfigError(`Cannot read private key ${remote.privateKeyPath}.`, remote.privateKeyPath, err);
    }
  }

  const endpoint = await SftpRemoteEndpoint.connect({
    host: remote.host,
    port: remote.port,
    username: remote.username,
    password: remote.password,
    privateKey,
    remoteRoot: remote.remoteRoot,
    logger,
  });
  return { endpoint, close: () => endpoint.close() };
}
