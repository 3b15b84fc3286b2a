import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { noopLogger } from "@synk/core-application";
import { runInit, runPush, runStatus, type CommandContext } from "./commands";
import { ConfigError } from "./config";

describe("commands", () => {
  let dir: string;
  let lines: string[];
  let ctx: CommandContext;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "synk-cli-"));
    lines = [];
    ctx = {
      configFile: path.join(dir, "synk.config.json"),
      verbose: false,
      out: (line) => lines.push(line),
      logger: noopLogger,
      env: {},
    };
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  async function initFolderMirror() {
    const config = await runInit(ctx, { path: path.join(dir, "local"), folder: path.join(dir, "remote") });
    await fs.mkdir(path.join(dir, "remote"));
    return config;
  }

  it("init writes a folder config and creates the sync root", async () => {
    const config = await initFolderMirror();

    expect(config.remote).toEqual({ type: "folder", path: path.join(dir, "remote") });
    expect(config.localPath).toBe(await fs.realpath(path.join(dir, "local")));
    expect(JSON.parse(await fs.readFile(ctx.configFile, "utf-8")).localPath).toBe(config.localPath);
  });

  it("init requires a remote or a folder", async () => {
    await expect(runInit(ctx, { path: path.join(dir, "local") })).rejects.toBeInstanceOf(ConfigError);
    await expect(
      runInit(ctx, { path: path.join(dir, "local"), remote: "h", username: "u", port: "99999" })
    ).rejects.toThrow("The port must be a numerical value 1-65535.");
  });

  it("status shows the pending plan, push applies it", async () => {
    const { localPath } = await initFolderMirror();
    await fs.mkdir(path.join(localPath, "docs"));
    await fs.writeFile(path.join(localPath, "docs", "a.md"), "# a");
    lines = [];

    expect(await runStatus(ctx)).toBe(0);
    expect(lines).toEqual(["2 operation(s) pending:", "  + dir  docs/", "  ^ file docs/a.md"]);

    lines = [];
    expect(await runPush(ctx)).toBe(0);
    expect(lines).toEqual(["Pushed 2 operation(s)."]);
    expect(await fs.readFile(path.join(dir, "remote", "docs", "a.md"), "utf-8")).toBe("# a");

    lines = [];
    expect(await runPush(ctx, { dryRun: true })).toBe(0);
    expect(lines).toEqual(["Everything up to date."]);
  });

  it("push reports a failure and exits non-zero", async () => {
    const { localPath } = await initFolderMirror();
    await fs.writeFile(path.join(localPath, "a.txt"), "a");
    await fs.rm(path.join(dir, "remote"), { recursive: true });
    lines = [];

    expect(await runPush(ctx)).toBe(1);
    expect(lines[0]).toBe("Push stopped after 0 operation(s).");
    expect(lines[1]).toMatch(/^Failed: \^ file a\.txt \(not_found: /);
  });
});
