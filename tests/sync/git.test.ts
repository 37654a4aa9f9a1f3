/**
 * Tests for git push/pull steps
 */

import { describe, it, expect } from "@jest/globals";
import { gitPush, gitPull, buildCommitCommand } from "../../src/sync/git.js";
import { createEnv, createFakeRunner, createProject, createPrompter, fail, ok } from "../helpers/fakes.js";

const project = createProject("/home/dev/demo");

describe("buildCommitCommand", () => {
  it("should stage everything and quote the message", () => {
    expect(buildCommitCommand("wip")).toBe("git add -A && git commit -m wip");
    expect(buildCommitCommand("don't panic")).toBe("git add -A && git commit -m 'don'\\''t panic'");
  });
});

describe("gitPush", () => {
  it("should push a clean tree without asking for a message", async () => {
    const { runner, calls } = createFakeRunner([
      { match: "git status --porcelain", respond: ok("") },
      { match: "git push origin main", respond: ok("Everything up-to-date") },
    ]);
    const prompter = createPrompter();

    const outcome = await gitPush(createEnv(runner, prompter), project);

    expect(outcome).toEqual({ status: "success", message: "Pushed" });
    expect(prompter.askCommitMessage).not.toHaveBeenCalled();
    expect(calls).toEqual([
      { command: "git status --porcelain", cwd: "/home/dev/demo" },
      { command: "git push origin main", cwd: "/home/dev/demo" },
    ]);
  });

  it("should commit with the given message before pushing a dirty tree", async () => {
    const { runner, calls } = createFakeRunner([
      { match: "git status --porcelain", respond: ok("M src/app.ts\n?? notes.md") },
      { match: /^git add -A && git commit/, respond: ok("[main 1a2b3c4] fix build") },
      { match: "git push origin main", respond: ok("") },
    ]);
    const prompter = createPrompter({ askCommitMessage: async () => "  fix build  " });

    const outcome = await gitPush(createEnv(runner, prompter), project);

    expect(outcome.status).toBe("success");
    expect(prompter.askCommitMessage).toHaveBeenCalledWith("M src/app.ts\n?? notes.md");
    expect(calls.map((call) => call.command)).toEqual([
      "git status --porcelain",
      "git add -A && git commit -m 'fix build'",
      "git push origin main",
    ]);
  });

  it("should cancel without committing when no message is given", async () => {
    const { runner, count } = createFakeRunner([{ match: "git status --porcelain", respond: ok("M a.ts") }]);
    const prompter = createPrompter({ askCommitMessage: async () => null });

    const outcome = await gitPush(createEnv(runner, prompter), project);

    expect(outcome).toEqual({ status: "cancelled", message: "Push cancelled" });
    expect(count(/commit|push/)).toBe(0);
  });

  it("should treat a blank message as cancel", async () => {
    const { runner } = createFakeRunner([{ match: "git status --porcelain", respond: ok("M a.ts") }]);
    const prompter = createPrompter({ askCommitMessage: async () => "   " });

    const outcome = await gitPush(createEnv(runner, prompter), project);

    expect(outcome.status).toBe("cancelled");
  });

  it("should stop when the commit fails", async () => {
    const { runner, count } = createFakeRunner([
      { match: "git status --porcelain", respond: ok("M a.ts") },
      { match: /^git add/, respond: fail("Author identity unknown") },
    ]);

    const outcome = await gitPush(createEnv(runner), project);

    expect(outcome).toEqual({ status: "failed", message: "git commit failed", output: "Author identity unknown" });
    expect(count(/^git push/)).toBe(0);
  });

  it("should fail when the status query fails", async () => {
    const { runner, count } = createFakeRunner([
      { match: "git status --porcelain", respond: fail("fatal: not a git repository (or any of the parent directories): .git") },
    ]);

    const outcome = await gitPush(createEnv(runner), project);

    expect(outcome).toEqual({
      status: "failed",
      message: "git status failed",
      output: "fatal: not a git repository (or any of the parent directories): .git",
    });
    expect(count(/^git push/)).toBe(0);
  });

  it("should surface the push output verbatim on failure", async () => {
    const rejected = "! [rejected]        main -> main (fetch first)";
    const { runner } = createFakeRunner([
      { match: "git status --porcelain", respond: ok("") },
      { match: "git push origin main", respond: fail(rejected) },
    ]);

    const outcome = await gitPush(createEnv(runner), project);

    expect(outcome).toEqual({ status: "failed", message: "git push failed", output: rejected });
  });

  it("should push to the configured remote and branch", async () => {
    const { runner, count } = createFakeRunner([
      { match: "git status --porcelain", respond: ok("") },
      { match: "git push upstream release/2.x", respond: ok("") },
    ]);
    const env = { ...createEnv(runner), settings: { sshConnectTimeoutSec: 10, gitRemote: "upstream", rsyncFlags: ["-avz"] } };

    const outcome = await gitPush(env, createProject("/home/dev/demo", { gitBranch: "release/2.x" }));

    expect(outcome.status).toBe("success");
    expect(count(/^git push upstream release\/2\.x$/)).toBe(1);
  });
});

describe("gitPull", () => {
  it("should pull a clean tree without confirmation", async () => {
    const { runner } = createFakeRunner([
      { match: "git status --porcelain", respond: ok("") },
      { match: "git pull origin main", respond: ok("Already up to date.") },
    ]);
    const prompter = createPrompter();

    const outcome = await gitPull(createEnv(runner, prompter), project);

    expect(outcome).toEqual({ status: "success", message: "Pulled" });
    expect(prompter.confirm).not.toHaveBeenCalled();
  });

  it("should ask before pulling into a dirty tree", async () => {
    const { runner, count } = createFakeRunner([
      { match: "git status --porcelain", respond: ok("M a.ts") },
      { match: "git pull origin main", respond: ok("") },
    ]);
    const prompter = createPrompter({ confirm: async () => true });

    const outcome = await gitPull(createEnv(runner, prompter), project);

    expect(prompter.confirm).toHaveBeenCalledWith("You have uncommitted changes. Pull anyway?");
    expect(outcome.status).toBe("success");
    expect(count(/^git pull/)).toBe(1);
  });

  it("should cancel when the user declines", async () => {
    const { runner, count } = createFakeRunner([{ match: "git status --porcelain", respond: ok("M a.ts") }]);
    const prompter = createPrompter({ confirm: async () => false });

    const outcome = await gitPull(createEnv(runner, prompter), project);

    expect(outcome).toEqual({ status: "cancelled", message: "Pull cancelled" });
    expect(count(/^git pull/)).toBe(0);
  });

  it("should surface merge conflicts from git", async () => {
    const conflictOutput = "CONFLICT (content): Merge conflict in src/app.ts\nAutomatic merge failed; fix conflicts and then commit the result.";
    const { runner } = createFakeRunner([
      { match: "git status --porcelain", respond: ok("") },
      { match: "git pull origin main", respond: fail(conflictOutput) },
    ]);

    const outcome = await gitPull(createEnv(runner), project);

    expect(outcome).toEqual({ status: "failed", message: "git pull failed", output: conflictOutput });
  });
});
