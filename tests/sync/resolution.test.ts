/**
 * Tests for the conflict resolution flow and transfer exclusions
 */

import { describe, it, expect, jest } from "@jest/globals";
import { resolveConflicts, excludedFiles, winningChoice } from "../../src/sync/resolution.js";
import type { Conflict, ConflictDecider, ConflictDecision, Resolution } from "../../src/sync/types.js";

function conflict(file: string): Conflict {
  return { file, localTime: "2024-01-01 10:00:00", remoteTime: "2024-01-01 11:00:00" };
}

const CONFLICTS = ["a.env", "b.key", "c.bin", "d.db"].map(conflict);

describe("resolveConflicts", () => {
  it("should resolve an empty list without asking", async () => {
    const decide = jest.fn<ConflictDecider>(() => null);
    const result = await resolveConflicts([], decide);

    expect(decide).not.toHaveBeenCalled();
    expect(result.kind).toBe("resolved");
    if (result.kind === "resolved") {
      expect(result.resolution.size).toBe(0);
    }
  });

  it("should record one decision per conflict in order", async () => {
    const choices: ConflictDecision[] = [
      { choice: "local", applyToRemaining: false },
      { choice: "remote", applyToRemaining: false },
      { choice: "skip", applyToRemaining: false },
      { choice: "local", applyToRemaining: false },
    ];
    const decide = jest.fn<ConflictDecider>((_conflict, position) => choices[position.index]);

    const result = await resolveConflicts(CONFLICTS, decide);

    expect(decide).toHaveBeenCalledTimes(4);
    expect(decide.mock.calls[2][1]).toEqual({ index: 2, total: 4 });
    expect(result).toEqual({
      kind: "resolved",
      resolution: new Map([
        ["a.env", "local"],
        ["b.key", "remote"],
        ["c.bin", "skip"],
        ["d.db", "local"],
      ]),
    });
  });

  it("should apply a choice to all remaining conflicts and stop asking", async () => {
    const decide = jest.fn<ConflictDecider>((_conflict, position) =>
      position.index === 0
        ? { choice: "skip", applyToRemaining: false }
        : { choice: "remote", applyToRemaining: true }
    );

    const result = await resolveConflicts(CONFLICTS, decide);

    expect(decide).toHaveBeenCalledTimes(2);
    expect(result).toEqual({
      kind: "resolved",
      resolution: new Map([
        ["a.env", "skip"],
        ["b.key", "remote"],
        ["c.bin", "remote"],
        ["d.db", "remote"],
      ]),
    });
  });

  it("should discard every decision when cancelled", async () => {
    const decide = jest.fn<ConflictDecider>((_conflict, position) =>
      position.index < 2 ? { choice: "local", applyToRemaining: false } : null
    );

    const result = await resolveConflicts(CONFLICTS, decide);

    expect(decide).toHaveBeenCalledTimes(3);
    expect(result).toEqual({ kind: "cancelled" });
  });

  it("should accept asynchronous decisions", async () => {
    const result = await resolveConflicts([conflict("a.env")], async () => ({
      choice: "remote",
      applyToRemaining: false,
    }));
    expect(result).toEqual({ kind: "resolved", resolution: new Map([["a.env", "remote"]]) });
  });
});

describe("excludedFiles", () => {
  const resolution: Resolution = new Map([
    ["a.env", "local"],
    ["b.key", "remote"],
    ["c.bin", "skip"],
  ]);

  it("should exclude everything not chosen as local when pushing to remote", () => {
    expect(excludedFiles(resolution, "to_remote")).toEqual(new Set(["b.key", "c.bin"]));
  });

  it("should exclude everything not chosen as remote when pulling from remote", () => {
    expect(excludedFiles(resolution, "from_remote")).toEqual(new Set(["a.env", "c.bin"]));
  });

  it("should exclude nothing for an empty resolution", () => {
    expect(excludedFiles(new Map(), "to_remote").size).toBe(0);
  });

  it("should map directions to the side they copy from", () => {
    expect(winningChoice("to_remote")).toBe("local");
    expect(winningChoice("from_remote")).toBe("remote");
  });
});
