import fs from "fs/promises";
import path from "path";
import crypto from "crypto";
import { z } from "zod";

import { comparePaths, emptySnapshot, type Snapshot } from "@synk/core-domain";
import type { SnapshotStore } from "../ports/snapshot-store";
import { LocalIOError, SnapshotCorruptedError } from "../application/errors";
import { STATE_DIR_NAME } from "./sync-ignore";

const SnapshotFileSchema = z.object({
  version: z.literal(1),
  savedAtIso: z.string(),
  // lista e não objeto: um nome como "__proto__" precisa sobreviver ao parse
  files: z.array(
    z.object({
      path: z.string().min(1),
      hash: z.string().regex(/^[0-9a-f]{64}$/),
    })
  ),
  directories: z.array(z.string()),
});

type SnapshotFile = z.infer<typeof SnapshotFileSchema>;

function isMissingFile(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}

/**
 * Node implementation of the SnapshotStore port. The committed snapshot of a
 * sync root lives inside that root, under `.synk/state/snapshot.json`; the
 * scanner never descends into `.synk`.
 *
 * Saves go through a temporary file in the same directory followed by a
 * rename, so a reader sees either the old snapshot or the new one.
 */
export class NodeSnapshotStore implements SnapshotStore {
  private readonly rootAbs: string;

  constructor(rootAbs: string) {
    this.rootAbs = path.resolve(rootAbs);
  }

  get filePath(): string {
    return path.join(this.rootAbs, STATE_DIR_NAME, "state", "snapshot.json");
  }

  async load(): Promise<Snapshot> {
    const file = this.filePath;

    let raw: string;
    try {
      raw = await fs.readFile(file, "utf-8");
    } catch (err) {
      if (isMissingFile(err)) return emptySnapshot();
      throw new LocalIOError(`Cannot read snapshot ${file}`, file, err);
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new SnapshotCorruptedError(`Snapshot is not valid JSON: ${file}`, file, err);
    }

    const parsed = SnapshotFileSchema.safeParse(json);
    if (!parsed.success) {
      throw new SnapshotCorruptedError(
        `Snapshot has an unexpected shape: ${file} (${parsed.error.issues[0]?.message ?? "invalid"})`,
        file,
        parsed.error
      );
    }

    return {
      files: parsed.data.files.map((f) => ({ path: f.path, hash: f.hash })),
      directories: parsed.data.directories,
    };
  }

  async save(snapshot: Snapshot): Promise<void> {
    const file = this.filePath;
    const payload: SnapshotFile = {
      version: 1,
      savedAtIso: new Date().toISOString(),
      files: [...snapshot.files]
        .sort((a, b) => comparePaths(a.path, b.path))
        .map((f) => ({ path: f.path, hash: f.hash })),
      directories: [...snapshot.directories].sort(comparePaths),
    };

    const tmp = `${file}.${process.pid}.${crypto.randomUUID()}.tmp`;
    try {
      await fs.mkdir(path.dirname(file), { recursive: true });
      await fs.writeFile(tmp, JSON.stringify(payload, null, 2), "utf-8");
      await fs.rename(tmp, file);
    } catch (err) {
      await fs.rm(tmp, { force: true });
      throw new LocalIOError(`Cannot write snapshot ${file}`, file, err);
    }
  }
}
