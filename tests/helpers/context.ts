/**
 * CommandContext wired to a temporary project store and a scripted shell.
 */

import { jest } from "@jest/globals";
import path from "node:path";
import os from "node:os";
import fs from "node:fs/promises";
import type { CommandContext, CommandPrompter } from "../../src/commands/types.js";
import { ProjectStore } from "../../src/projects/store.js";
import type { ProjectInput } from "../../src/projects/types.js";
import { createSyncManager } from "../../src/sync/manager.js";
import { DEFAULT_CONFIG } from "../../src/utils/config.js";
import { createFakeRunner, createPrompter, type FakeRule } from "./fakes.js";

export interface TestContext {
  context: CommandContext;
  store: ProjectStore;
  prompter: CommandPrompter;
  count(pattern: RegExp): number;
  /** Local working tree of the "demo" project */
  workTree: string;
  cleanup(): Promise<void>;
}

export async function createTestContext(
  rules: FakeRule[] = [],
  prompterOverrides: Partial<CommandPrompter> = {}
): Promise<TestContext> {
  const tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "syncpair-cmd-"));
  const workTree = path.join(tempDir, "work");
  await fs.mkdir(workTree);

  const store = new ProjectStore(path.join(tempDir, "projects.json"));
  const { runner, count } = createFakeRunner(rules);
  const editProject: CommandPrompter["editProject"] = prompterOverrides.editProject ?? (async () => null);
  const prompter: CommandPrompter = {
    ...createPrompter(prompterOverrides),
    editProject: jest.fn(editProject),
  };

  const context: CommandContext = {
    store,
    manager: createSyncManager({ config: DEFAULT_CONFIG, prompter, runner }),
    prompter,
    setStatus: jest.fn(),
    refreshProjects: jest.fn(),
    exit: jest.fn(),
  };

  return {
    context,
    store,
    prompter,
    count,
    workTree,
    cleanup: () => fs.rm(tempDir, { recursive: true, force: true }),
  };
}

export function demoInput(workTree: string, overrides: Partial<ProjectInput> = {}): ProjectInput {
  return { name: "demo", localPath: workTree, remoteHost: "devbox", remotePath: "/srv/demo", ...overrides };
}
