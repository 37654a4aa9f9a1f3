/**
 * Tests for the ssh connection check
 */

import { describe, it, expect } from "@jest/globals";
import { testConnection } from "../../src/sync/connection.js";
import { createEnv, createFakeRunner, createProject, fail, ok } from "../helpers/fakes.js";

const project = createProject("/home/dev/demo");
const SSH_CHECK = "ssh -o ConnectTimeout=10 -o BatchMode=yes devbox 'echo connected'";

describe("testConnection", () => {
  it("should succeed when the remote echoes the sentinel", async () => {
    const { runner } = createFakeRunner([{ match: SSH_CHECK, respond: ok("connected") }]);

    const outcome = await testConnection(createEnv(runner), project);

    expect(outcome).toEqual({ status: "success", message: "Connected to devbox" });
  });

  it("should fail when ssh exits non-zero", async () => {
    const { runner } = createFakeRunner([
      { match: SSH_CHECK, respond: fail("ssh: Could not resolve hostname devbox: Name or service not known") },
    ]);

    const outcome = await testConnection(createEnv(runner), project);

    expect(outcome).toEqual({
      status: "failed",
      message: "Could not connect to devbox",
      output: "ssh: Could not resolve hostname devbox: Name or service not known",
    });
  });

  it("should fail when the sentinel is missing", async () => {
    const { runner } = createFakeRunner([{ match: SSH_CHECK, respond: ok("Welcome to devbox") }]);

    const outcome = await testConnection(createEnv(runner), project);

    expect(outcome.status).toBe("failed");
  });
});
