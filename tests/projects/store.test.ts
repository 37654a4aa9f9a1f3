/**
 * Tests for ProjectStore
 *
 * Every test works on its own temporary directory: one for projects.json,
 * one standing in for a local working tree.
 */

import { describe, it, expect, beforeEach, afterEach } from "@jest/globals";
import path from "node:path";
import os from "node:os";
import fs from "node:fs/promises";
import { ProjectStore } from "../../src/projects/store.js";
import { validateProjectInput } from "../../src/projects/schema.js";
import { ErrorCode, SyncPairError, ValidationError } from "../../src/utils/errors.js";
import type { ProjectInput } from "../../src/projects/types.js";

describe("ProjectStore", () => {
  let tempDir: string;
  let workTree: string;
  let filePath: string;
  let store: ProjectStore;

  function input(overrides: Partial<ProjectInput> = {}): ProjectInput {
    return {
      name: "demo",
      localPath: workTree,
      remoteHost: "devbox",
      remotePath: "/srv/demo",
      ...overrides,
    };
  }

  async function readFile(): Promise<unknown> {
    return JSON.parse(await fs.readFile(filePath, "utf-8"));
  }

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "syncpair-store-"));
    workTree = path.join(tempDir, "work");
    await fs.mkdir(workTree);
    filePath = path.join(tempDir, "config", "projects.json");
    store = new ProjectStore(filePath);
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe("load", () => {
    it("should start empty when the file does not exist", async () => {
      await expect(store.load()).resolves.toEqual([]);
    });

    it("should start empty when the file is not valid JSON", async () => {
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      await fs.writeFile(filePath, "{ projects: [", "utf-8");

      await expect(store.load()).resolves.toEqual([]);
    });

    it("should start empty when an entry is missing a field", async () => {
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      await fs.writeFile(filePath, JSON.stringify({ projects: [{ name: "demo" }] }), "utf-8");

      await expect(store.load()).resolves.toEqual([]);
    });

    it("should read snake_case entries and default the branch", async () => {
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      await fs.writeFile(
        filePath,
        JSON.stringify({
          projects: [{ name: "api", local_path: "/home/dev/api", remote_host: "build01", remote_path: "~/api" }],
        }),
        "utf-8"
      );

      await expect(store.load()).resolves.toEqual([
        { name: "api", localPath: "/home/dev/api", remoteHost: "build01", remotePath: "~/api", gitBranch: "main" },
      ]);
    });
  });

  describe("add", () => {
    it("should persist the project in snake_case", async () => {
      await store.add(input({ gitBranch: "develop" }));

      expect(await readFile()).toEqual({
        projects: [
          { name: "demo", local_path: workTree, remote_host: "devbox", remote_path: "/srv/demo", git_branch: "develop" },
        ],
      });
    });

    it("should survive a reload", async () => {
      await store.add(input());

      const reloaded = new ProjectStore(filePath);
      await reloaded.load();

      expect(reloaded.get("demo")).toEqual({
        name: "demo",
        localPath: workTree,
        remoteHost: "devbox",
        remotePath: "/srv/demo",
        gitBranch: "main",
      });
    });

    it("should reject a local path that is not a directory and write nothing", async () => {
      const missing = path.join(tempDir, "nowhere");

      await expect(store.add(input({ localPath: missing }))).rejects.toMatchObject({
        code: ErrorCode.VALIDATION_INVALID_PATH,
        message: `Local path does not exist or is not a directory: ${missing}`,
      });
      expect(store.list()).toEqual([]);
      await expect(fs.access(filePath)).rejects.toThrow();
    });

    it("should reject a duplicate name", async () => {
      await store.add(input());

      const error = await store.add(input()).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({
        code: ErrorCode.VALIDATION_DUPLICATE_NAME,
        message: "A project named demo already exists",
      });
      expect(store.list()).toHaveLength(1);
    });
  });

  describe("update", () => {
    it("should move the selection along with a rename", async () => {
      await store.add(input());
      store.select("demo");

      await store.update("demo", input({ name: "demo-renamed" }));

      expect(store.current()?.name).toBe("demo-renamed");
      expect(store.get("demo")).toBeUndefined();
    });

    it("should refuse to rename onto another project", async () => {
      await store.add(input());
      await store.add(input({ name: "other" }));

      await expect(store.update("other", input({ name: "demo" }))).rejects.toMatchObject({
        code: ErrorCode.VALIDATION_DUPLICATE_NAME,
      });
      expect(store.list().map((project) => project.name)).toEqual(["demo", "other"]);
    });

    it("should fail for an unknown project", async () => {
      await expect(store.update("ghost", input())).rejects.toMatchObject({
        code: ErrorCode.PROJECT_NOT_FOUND,
        message: "No project named ghost",
      });
    });
  });

  describe("remove", () => {
    it("should delete the project and clear a selection pointing at it", async () => {
      await store.add(input());
      await store.add(input({ name: "other" }));
      store.select("demo");

      await store.remove("demo");

      expect(store.current()).toBeUndefined();
      expect(await readFile()).toEqual({
        projects: [
          { name: "other", local_path: workTree, remote_host: "devbox", remote_path: "/srv/demo", git_branch: "main" },
        ],
      });
    });

    it("should keep an unrelated selection", async () => {
      await store.add(input());
      await store.add(input({ name: "other" }));
      store.select("other");

      await store.remove("demo");

      expect(store.current()?.name).toBe("other");
    });
  });

  describe("select", () => {
    it("should throw for an unknown name", () => {
      expect(() => store.select("ghost")).toThrow(SyncPairError);
      expect(() => store.select("ghost")).toThrow("No project named ghost");
    });
  });

  it("should hand out copies of the list", async () => {
    await store.add(input());

    const listed = store.list();
    listed.pop();

    expect(store.list()).toHaveLength(1);
  });
});

describe("validateProjectInput", () => {
  let workTree: string;

  beforeEach(async () => {
    workTree = await fs.mkdtemp(path.join(os.tmpdir(), "syncpair-input-"));
  });

  afterEach(async () => {
    await fs.rm(workTree, { recursive: true, force: true });
  });

  it("should trim fields and default a blank branch", () => {
    const project = validateProjectInput({
      name: "  demo ",
      localPath: ` ${workTree} `,
      remoteHost: " devbox",
      remotePath: "/srv/demo ",
      gitBranch: "   ",
    });

    expect(project).toEqual({
      name: "demo",
      localPath: workTree,
      remoteHost: "devbox",
      remotePath: "/srv/demo",
      gitBranch: "main",
    });
  });

  it("should name the first blank required field", () => {
    expect(() =>
      validateProjectInput({ name: " ", localPath: workTree, remoteHost: "devbox", remotePath: "/srv/demo" })
    ).toThrow("Name is required");

    expect(() =>
      validateProjectInput({ name: "demo", localPath: workTree, remoteHost: "", remotePath: "/srv/demo" })
    ).toThrow("Remote host is required");
  });
});
