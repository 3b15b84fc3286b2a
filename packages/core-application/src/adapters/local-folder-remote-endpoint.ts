import fs from "node:fs/promises";
import path from "node:path";

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

function errorCode(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

function kindOf(err: unknown): RemoteFailureKind {
  switch (errorCode(err)) {
    case "ENOENT":
    case "ENOTDIR":
      return "not_found";
    case "EACCES":
    case "EPERM":
      return "permission_denied";
    case "ENOTEMPTY":
      return "not_empty";
    case "EEXIST":
      return "already_exists";
    default:
      return "failure";
  }
}

function toFailure<T = void>(err: unknown): RemoteResult<T> {
  return fail<T>(kindOf(err), err instanceof Error ? err.message : String(err));
}

/**
 * Remote endpoint backed by a plain directory (a mounted share, a USB drive).
 * Same contract as the SFTP endpoint: no recursive delete, so removing a
 * non-empty directory answers `not_empty`.
 */
export class LocalFolderRemoteEndpoint implements RemoteEndpoint {
  private readonly rootAbs: string;

  constructor(rootAbs: string) {
    this.rootAbs = path.resolve(rootAbs);
  }

  private abs(p: RelativePath): string {
    return path.join(this.rootAbs, ...toSegments(p));
  }

  private async isDirectory(p: RelativePath): Promise<boolean> {
    try {
      return (await fs.stat(this.abs(p))).isDirectory();
    } catch {
      return false;
    }
  }

  async makeDirectory(p: RelativePath): Promise<RemoteResult> {
    try {
      await fs.mkdir(this.abs(p));
      return ok();
    } catch (err) {
      if (kindOf(err) === "already_exists" && !(await this.isDirectory(p))) {
        return fail("failure", `${p} exists and is not a directory`);
      }
      return toFailure(err);
    }
  }

  async deleteDirectory(p: RelativePath): Promise<RemoteResult> {
    try {
      await fs.rmdir(this.abs(p));
      return ok();
    } catch (err) {
      // alguns sistemas respondem EEXIST para diretório não vazio
      if (errorCode(err) === "EEXIST") return fail("not_empty", `${p} is not empty`);
      return toFailure(err);
    }
  }

  async listDirectory(p: RelativePath): Promise<RemoteResult<RemoteEntry[]>> {
    try {
      const entries = await fs.readdir(this.abs(p), { withFileTypes: true });
      return okValue(
        entries.map((e): RemoteEntry => ({ name: e.name, type: e.isDirectory() ? "directory" : "file" }))
      );
    } catch (err) {
      return toFailure<RemoteEntry[]>(err);
    }
  }

  async uploadFile(localPath: string, remotePath: RelativePath): Promise<RemoteResult> {
    try {
      await fs.copyFile(localPath, this.abs(remotePath));
      return ok();
    } catch (err) {
      return toFailure(err);
    }
  }

  async downloadFile(remotePath: RelativePath, localPath: string): Promise<RemoteResult> {
    try {
      await fs.mkdir(path.dirname(localPath), { recursive: true });
      await fs.copyFile(this.abs(remotePath), localPath);
      return ok();
    } catch (err) {
      return toFailure(err);
    }
  }

  async deleteFile(p: RelativePath): Promise<RemoteResult> {
    try {
      await fs.unlink(this.abs(p));
      return ok();
    } catch (err) {
      return toFailure(err);
    }
  }
}
