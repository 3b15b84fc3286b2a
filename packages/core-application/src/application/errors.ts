/** A local file or directory could not be read. Aborts the push. */
export class LocalIOError extends Error {
  constructor(message: string, public readonly path: string, public cause?: unknown) {
    super(message);
    this.name = "LocalIOError";
  }
}

/** The committed snapshot exists but cannot be parsed. Never read as empty. */
export class SnapshotCorruptedError extends Error {
  constructor(message: string, public readonly file: string, public cause?: unknown) {
    super(message);
    this.name = "SnapshotCorruptedError";
  }
}

/** Refused, unauthenticated or otherwise failed connection; no operation ran. */
export class RemoteConnectionError extends Error {
  constructor(message: string, public readonly host?: string, public cause?: unknown) {
    super(message);
    this.name = "RemoteConnectionError";
  }
}
