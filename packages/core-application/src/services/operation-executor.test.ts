import path from "node:path";
import { describe, it, expect, vi } from "vitest";
import { emptyOperationSet, type OperationSet } from "@synk/core-domain";
import { fail, ok, okValue, type RemoteEndpoint, type RemoteEntry } from "../ports/remote-endpoint";
import { OperationExecutor, planOperations } from "./operation-executor";

/**
 * Remote tree kept in memory. Mirrors a server without recursive delete:
 * removing a directory that still has children answers `not_empty`.
 */
class MemoryRemote implements RemoteEndpoint {
  readonly dirs = new Set<string>();
  readonly files = new Map<string, string>();
  readonly calls: string[] = [];

  private children(p: string): RemoteEntry[] {
    const prefix = `${p}/`;
    const direct = (x: string) => x.startsWith(prefix) && !x.slice(prefix.length).includes("/");
    return [
      ...[...this.dirs].filter(direct).map((d): RemoteEntry => ({ name: d.slice(prefix.length), type: "directory" })),
      ...[...this.files.keys()].filter(direct).map((f): RemoteEntry => ({ name: f.slice(prefix.length), type: "file" })),
    ];
  }

  private parentExists(p: string) {
    const i = p.lastIndexOf("/");
    return i < 0 || this.dirs.has(p.slice(0, i));
  }

  async makeDirectory(p: string) {
    this.calls.push(`mkdir ${p}`);
    if (this.dirs.has(p)) return fail("already_exists", p);
    if (!this.parentExists(p)) return fail("not_found", p);
    this.dirs.add(p);
    return ok();
  }

  async deleteDirectory(p: string) {
    this.calls.push(`rmdir ${p}`);
    if (!this.dirs.has(p)) return fail("not_found", p);
    if (this.children(p).length > 0) return fail("not_empty", p);
    this.dirs.delete(p);
    return ok();
  }

  async listDirectory(p: string) {
    this.calls.push(`ls ${p}`);
    if (!this.dirs.has(p)) return fail<RemoteEntry[]>("not_found", p);
    return okValue(this.children(p));
  }

  async uploadFile(localPath: string, remotePath: string) {
    this.calls.push(`put ${remotePath}`);
    if (!this.parentExists(remotePath)) return fail("not_found", remotePath);
    this.files.set(remotePath, localPath);
    return ok();
  }

  async downloadFile() {
    return fail("failure", "not used");
  }

  async deleteFile(p: string) {
    this.calls.push(`rm ${p}`);
    if (!this.files.delete(p)) return fail("not_found", p);
    return ok();
  }
}

const localRootAbs = path.resolve("/sync/root");

function ops(partial: Partial<OperationSet>): OperationSet {
  return { ...emptyOperationSet(), ...partial };
}

describe("OperationExecutor", () => {
  it("orders deletes before creates", () => {
    const plan = planOperations(
      ops({ dirsToCreate: ["n"], dirsToDelete: ["o"], filesToUpload: ["n/f"], filesToDelete: ["g"] })
    );

    expect(plan.map((o) => o.type)).toEqual(["delete_directory", "delete_file", "create_directory", "upload_file"]);
  });

  it("creates missing ancestors root-to-leaf before uploading", async () => {
    const remote = new MemoryRemote();
    const executor = new OperationExecutor(remote, { localRootAbs });

    const result = await executor.execute(ops({ filesToUpload: ["a/b/c.txt"] }));

    expect(result.type).toBe("ok");
    expect(remote.calls).toEqual(["mkdir a", "mkdir a/b", "put a/b/c.txt"]);
    expect(remote.files.get("a/b/c.txt")).toBe(path.join(localRootAbs, "a", "b", "c.txt"));
  });

  it("treats an existing directory as created", async () => {
    const remote = new MemoryRemote();
    remote.dirs.add("b");
    const executor = new OperationExecutor(remote, { localRootAbs });

    const result = await executor.execute(ops({ dirsToCreate: ["b"], filesToUpload: ["b/c.txt"] }));

    expect(result).toEqual({
      type: "ok",
      completed: [
        { type: "create_directory", path: "b" },
        { type: "upload_file", path: "b/c.txt" },
      ],
    });
    // b is cached after the first mkdir, so the upload does not ask again
    expect(remote.calls).toEqual(["mkdir b", "put b/c.txt"]);
  });

  it("empties a non-empty directory before deleting it", async () => {
    const remote = new MemoryRemote();
    remote.dirs.add("d");
    remote.dirs.add("d/sub");
    remote.files.set("d/e.txt", "x");
    remote.files.set("d/sub/f.txt", "x");
    const deleteDirectory = vi.spyOn(remote, "deleteDirectory");
    const executor = new OperationExecutor(remote, { localRootAbs });

    const result = await executor.execute(ops({ dirsToDelete: ["d"] }));

    expect(result.type).toBe("ok");
    expect(remote.calls).toEqual([
      "rmdir d",
      "ls d",
      "rmdir d/sub",
      "ls d/sub",
      "rm d/sub/f.txt",
      "rmdir d/sub",
      "rm d/e.txt",
      "rmdir d",
    ]);
    expect(deleteDirectory).toHaveBeenLastCalledWith("d");
    expect(remote.dirs.size).toBe(0);
    expect(remote.files.size).toBe(0);
  });

  it("counts deletes of entries that are already gone as done", async () => {
    const remote = new MemoryRemote();
    const executor = new OperationExecutor(remote, { localRootAbs });

    const result = await executor.execute(ops({ dirsToDelete: ["d"], filesToDelete: ["x.txt"] }));

    expect(result.type).toBe("ok");
    expect(remote.calls).toEqual(["rmdir d", "rm x.txt"]);
  });

  it("stops at the first failure and reports what ran and what did not", async () => {
    const remote = new MemoryRemote();
    vi.spyOn(remote, "uploadFile").mockResolvedValueOnce(fail("permission_denied", "a.txt: denied"));
    const executor = new OperationExecutor(remote, { localRootAbs });

    const result = await executor.execute(ops({ dirsToCreate: ["d"], filesToUpload: ["a.txt", "b.txt"] }));

    expect(result).toEqual({
      type: "failed",
      completed: [{ type: "create_directory", path: "d" }],
      failed: {
        operation: { type: "upload_file", path: "a.txt" },
        failure: { kind: "permission_denied", message: "a.txt: denied" },
      },
      pending: [{ type: "upload_file", path: "b.txt" }],
    });
    expect(remote.files.size).toBe(0);
  });

  it("fails when a directory cannot be emptied", async () => {
    const remote = new MemoryRemote();
    remote.dirs.add("d");
    remote.files.set("d/locked.txt", "x");
    vi.spyOn(remote, "deleteFile").mockResolvedValue(fail("permission_denied", "locked"));
    const executor = new OperationExecutor(remote, { localRootAbs });

    const result = await executor.execute(ops({ dirsToDelete: ["d"], filesToUpload: ["n.txt"] }));

    expect(result.type).toBe("failed");
    if (result.type !== "failed") return;
    expect(result.failed.operation).toEqual({ type: "delete_directory", path: "d" });
    expect(result.failed.failure.kind).toBe("permission_denied");
    expect(result.completed).toEqual([]);
    expect(result.pending).toEqual([{ type: "upload_file", path: "n.txt" }]);
  });

  it("aborts on a lost connection", async () => {
    const remote = new MemoryRemote();
    vi.spyOn(remote, "makeDirectory").mockResolvedValue(fail("connection_lost", "socket closed"));
    const executor = new OperationExecutor(remote, { localRootAbs });

    const result = await executor.execute(ops({ dirsToCreate: ["a"] }));

    expect(result.type).toBe("failed");
    if (result.type !== "failed") return;
    expect(result.failed.failure).toEqual({ kind: "connection_lost", message: "socket closed" });
  });
});
