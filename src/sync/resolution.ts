import type {
  Conflict,
  ConflictChoice,
  ConflictDecider,
  Resolution,
  ResolutionResult,
  SyncDirection,
} from "./types.js";

/**
 * Walk the user through each conflict in turn.
 *
 * Every conflict ends up with a decision unless the user cancels, in which
 * case nothing decided so far survives. Choosing "apply to all remaining"
 * on a decision copies that choice to every later conflict and ends the walk.
 * An empty list resolves immediately without asking anything.
 */
export async function resolveConflicts(
  conflicts: readonly Conflict[],
  decide: ConflictDecider
): Promise<ResolutionResult> {
  const resolution: Resolution = new Map();

  for (let index = 0; index < conflicts.length; index++) {
    const conflict = conflicts[index];
    const decision = await decide(conflict, { index, total: conflicts.length });

    if (!decision) {
      return { kind: "cancelled" };
    }

    resolution.set(conflict.file, decision.choice);

    if (decision.applyToRemaining) {
      for (const remaining of conflicts.slice(index + 1)) {
        resolution.set(remaining.file, decision.choice);
      }
      break;
    }
  }

  return { kind: "resolved", resolution };
}

/**
 * The side whose copy a transfer in `direction` writes over the other.
 */
export function winningChoice(direction: SyncDirection): ConflictChoice {
  return direction === "to_remote" ? "local" : "remote";
}

/**
 * Files to leave out of a transfer: every decided file whose choice is not
 * the side this transfer copies from. Undecided files are never excluded.
 */
export function excludedFiles(resolution: Resolution, direction: SyncDirection): Set<string> {
  const keep = winningChoice(direction);
  const excluded = new Set<string>();
  for (const [file, choice] of resolution) {
    if (choice !== keep) {
      excluded.add(file);
    }
  }
  return excluded;
}
