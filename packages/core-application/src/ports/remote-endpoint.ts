import type { RelativePath } from "@synk/core-domain";

export type RemoteFailureKind =
  | "not_found"
  | "permission_denied"
  | "not_empty"
  | "already_exists"
  | "connection_lost"
  | "failure";

export type RemoteFailure = {
  kind: RemoteFailureKind;
  message: string;
};

export type RemoteResult<T = void> =
  | { type: "ok"; value: T }
  | { type: "error"; failure: RemoteFailure };

export type RemoteEntry = {
  name: string;
  type: "file" | "directory";
};

/**
 * An authenticated, already connected session on the remote side. Paths are
 * relative to the remote root; the endpoint decides where that root lives.
 *
 * Failures come back as values so callers can branch on the kind (a
 * `not_empty` on `deleteDirectory` is an expected answer, not an error).
 */
export interface RemoteEndpoint {
  makeDirectory(path: RelativePath): Promise<RemoteResult>;
  deleteDirectory(path: RelativePath): Promise<RemoteResult>;
  listDirectory(path: RelativePath): Promise<RemoteResult<RemoteEntry[]>>;
  uploadFile(localPath: string, remotePath: RelativePath): Promise<RemoteResult>;
  downloadFile(remotePath: RelativePath, localPath: string): Promise<RemoteResult>;
  deleteFile(path: RelativePath): Promise<RemoteResult>;
}

export function ok(): RemoteResult {
  return { type: "ok", value: undefined };
}

export function okValue<T>(value: T): RemoteResult<T> {
  return { type: "ok", value };
}

export function fail<T = void>(kind: RemoteFailureKind, message: string): RemoteResult<T> {
  return { type: "error", failure: { kind, message } };
}
