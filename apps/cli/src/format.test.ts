import { describe, expect, it } from "vitest";
import { formatFailure, formatPlan } from "./format";

describe("format", () => {
  it("lists operations in execution order", () => {
    const lines = formatPlan({
      dirsToCreate: ["new"],
      dirsToDelete: ["old"],
      filesToUpload: ["new/a.txt"],
      filesToDelete: ["b.txt"],
    });

    expect(lines).toEqual(["- dir  old/", "- file b.txt", "+ dir  new/", "^ file new/a.txt"]);
  });

  it("describes a stopped push", () => {
    const lines = formatFailure({
      type: "failed",
      completed: [{ type: "create_directory", path: "d" }],
      failed: {
        operation: { type: "upload_file", path: "d/a.txt" },
        failure: { kind: "permission_denied", message: "denied" },
      },
      pending: [{ type: "upload_file", path: "d/b.txt" }],
    });

    expect(lines).toEqual([
      "Push stopped after 1 operation(s).",
      "Failed: ^ file d/a.txt (permission_denied: denied)",
      "Not attempted (1):",
      "  ^ file d/b.txt",
      "The snapshot was not updated; run 'synk push' again to finish.",
    ]);
  });
});
