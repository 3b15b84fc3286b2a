import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { NodeSnapshotStore } from "./node-snapshot-store";
import { SnapshotCorruptedError } from "../application/errors";

const H1 = "a".repeat(64);
const H2 = "b".repeat(64);

describe("NodeSnapshotStore", () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), "synk-store-"));
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it("returns an empty snapshot before the first save", async () => {
    const store = new NodeSnapshotStore(root);

    expect(await store.load()).toEqual({ files: [], directories: [] });
  });

  it("loads what it saved", async () => {
    const store = new NodeSnapshotStore(root);
    await store.save({
      files: [
        { path: "z.txt", hash: H2 },
        { path: "d/a.txt", hash: H1 },
      ],
      directories: ["d"],
    });

    expect(await store.load()).toEqual({
      files: [
        { path: "d/a.txt", hash: H1 },
        { path: "z.txt", hash: H2 },
      ],
      directories: ["d"],
    });
  });

  it("keeps file names that collide with object keys", async () => {
    const store = new NodeSnapshotStore(root);
    const snapshot = {
      files: [
        { path: "__proto__", hash: H1 },
        { path: "constructor", hash: H2 },
        { path: "d/__proto__", hash: H2 },
      ],
      directories: ["d"],
    };
    await store.save(snapshot);

    expect(await store.load()).toEqual(snapshot);
  });

  it("also rejects the keyed-object layout for files", async () => {
    const store = new NodeSnapshotStore(root);
    await fs.mkdir(path.dirname(store.filePath), { recursive: true });
    await fs.writeFile(
      store.filePath,
      JSON.stringify({ version: 1, savedAtIso: "2026-01-01T00:00:00.000Z", files: { "a.txt": H1 }, directories: [] }),
      "utf-8"
    );

    await expect(store.load()).rejects.toBeInstanceOf(SnapshotCorruptedError);
  });

  it("replaces the previous snapshot and leaves no temporary files", async () => {
    const store = new NodeSnapshotStore(root);
    await store.save({ files: [{ path: "old.txt", hash: H1 }], directories: [] });
    await store.save({ files: [{ path: "new.txt", hash: H2 }], directories: ["n"] });

    expect(await store.load()).toEqual({ files: [{ path: "new.txt", hash: H2 }], directories: ["n"] });
    expect(await fs.readdir(path.dirname(store.filePath))).toEqual(["snapshot.json"]);
  });

  it("reports unparsable JSON as corruption, not as a first push", async () => {
    const store = new NodeSnapshotStore(root);
    await fs.mkdir(path.dirname(store.filePath), { recursive: true });
    await fs.writeFile(store.filePath, "{ not json", "utf-8");

    await expect(store.load()).rejects.toBeInstanceOf(SnapshotCorruptedError);
  });

  it("reports a snapshot with the wrong shape as corruption", async () => {
    const store = new NodeSnapshotStore(root);
    await fs.mkdir(path.dirname(store.filePath), { recursive: true });
    await fs.writeFile(
      store.filePath,
      JSON.stringify({ version: 1, savedAtIso: "2026-01-01T00:00:00.000Z", files: [{ path: "a.txt", hash: "short" }], directories: [] }),
      "utf-8"
    );

    await expect(store.load()).rejects.toBeInstanceOf(SnapshotCorruptedError);
  });
});
