/**
 * Tests for listing the ignored files git never transfers
 */

import { describe, it, expect, beforeEach, afterEach } from "@jest/globals";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { createCommandRunner } from "../../src/sync/commandRunner.js";
import { buildListCommand, listUntrackedFiles, parseFileList } from "../../src/sync/untrackedFiles.js";
import { createEnv, createFakeRunner, createProject, fail, listing, LOCAL_LIST, REMOTE_LIST } from "../helpers/fakes.js";

describe("parseFileList", () => {
  it("should split NUL-terminated names without touching their whitespace", () => {
    expect(parseFileList(" lead.env\0trail.env \0café.env\0")).toEqual([" lead.env", "trail.env ", "café.env"]);
  });

  it("should drop trailing output that is not NUL-terminated", () => {
    expect(parseFileList("a.env\0Warning: Permanently added 'devbox'\n")).toEqual(["a.env"]);
  });

  it("should return nothing for empty output", () => {
    expect(parseFileList("")).toEqual([]);
  });
});

describe("buildListCommand", () => {
  const project = createProject("/home/dev/demo");

  it("should run git locally inside the working tree", () => {
    expect(buildListCommand(project, "local")).toEqual({ command: LOCAL_LIST, cwd: "/home/dev/demo" });
  });

  it("should run git over ssh from the remote path", () => {
    expect(buildListCommand(project, "remote")).toEqual({ command: REMOTE_LIST });
  });
});

describe("listUntrackedFiles", () => {
  it("should ask the runner to keep the raw listing", async () => {
    const seen: Array<boolean | undefined> = [];
    const { runner } = createFakeRunner([
      {
        match: LOCAL_LIST,
        respond: (_command, options) => {
          seen.push(options.untrimmed);
          return listing("a.env");
        },
      },
    ]);

    const result = await listUntrackedFiles(createEnv(runner), createProject("/home/dev/demo"), "local");

    expect(seen).toEqual([true]);
    expect(result.files).toEqual(["a.env"]);
  });

  it("should report a failed listing with its trimmed output", async () => {
    const { runner } = createFakeRunner([{ match: REMOTE_LIST, respond: fail("Permission denied (publickey).\n") }]);

    const result = await listUntrackedFiles(createEnv(runner), createProject("/home/dev/demo"), "remote");

    expect(result).toEqual({ success: false, files: [], output: "Permission denied (publickey)." });
  });

  describe("against a real repository", () => {
    let workTree: string;
    const runner = createCommandRunner(10_000);

    beforeEach(async () => {
      workTree = await fs.mkdtemp(path.join(os.tmpdir(), "syncpair-listing-"));
      const init = await runner("git init --quiet", { cwd: workTree });
      expect(init.success).toBe(true);
      await fs.writeFile(path.join(workTree, ".gitignore"), "*.env\n", "utf-8");
      await fs.writeFile(path.join(workTree, "café.env"), "SECRET=test-secret\n", "utf-8");
      await fs.writeFile(path.join(workTree, " spaced.env"), "SECRET=test-secret\n", "utf-8");
      await fs.writeFile(path.join(workTree, "notes.md"), "not ignored\n", "utf-8");
    });

    afterEach(async () => {
      await fs.rm(workTree, { recursive: true, force: true });
    });

    it("should return ignored names exactly as they are on disk", async () => {
      const result = await listUntrackedFiles(createEnv(runner), createProject(workTree), "local");

      expect(result.success).toBe(true);
      expect(result.files).toEqual([" spaced.env", "café.env"]);
    });
  });
});
