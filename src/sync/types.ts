import type { SyncPairConfig } from "../utils/config.js";
import type { CommandRunner } from "./commandRunner.js";

// ==================== Directions ====================

export type SyncDirection = "to_remote" | "from_remote";

export type Side = "local" | "remote";

// ==================== Conflicts ====================

/**
 * An ignored file present on both machines whose modification times differ.
 */
export interface Conflict {
  /** Path relative to the project root */
  file: string;
  /** `YYYY-MM-DD HH:mm:ss`, local time zone */
  localTime: string;
  remoteTime: string;
}

export type ConflictChoice = "local" | "remote" | "skip";

/** Decision per conflicting file */
export type Resolution = Map<string, ConflictChoice>;

export interface ConflictDecision {
  choice: ConflictChoice;
  /** Apply the same choice to every conflict after this one */
  applyToRemaining: boolean;
}

export interface ConflictPosition {
  /** Zero-based index of the conflict being presented */
  index: number;
  total: number;
}

/**
 * Asks the user about one conflict. `null` cancels the whole flow.
 */
export type ConflictDecider = (
  conflict: Conflict,
  position: ConflictPosition
) => ConflictDecision | null | Promise<ConflictDecision | null>;

export type ResolutionResult =
  | { kind: "resolved"; resolution: Resolution }
  | { kind: "cancelled" };

// ==================== Outcomes ====================

export type StepStatus = "success" | "nothing_to_do" | "cancelled" | "failed";

export interface StepOutcome {
  status: StepStatus;
  /** Short, translated summary for the status line */
  message: string;
  /** Raw combined output of the external tool that failed */
  output?: string;
  /** Files handed to the transfer tool */
  files?: string[];
}

// ==================== Collaborators ====================

export type StatusTone = "info" | "progress" | "success" | "warning" | "error";

/**
 * Request/response dialogs the sync operations need from the user.
 * The terminal UI implements these as modal prompts; tests script them.
 */
export interface SyncPrompter {
  decideConflict: ConflictDecider;
  /** Resolves to the commit message, or null when the user cancels */
  askCommitMessage(changesSummary: string): Promise<string | null>;
  confirm(message: string): Promise<boolean>;
}

export interface SyncReporter {
  status(message: string, tone: StatusTone): void;
}

export type SyncSettings = Pick<SyncPairConfig, "sshConnectTimeoutSec" | "gitRemote" | "rsyncFlags">;

/**
 * Everything a sync operation touches outside its own process.
 */
export interface SyncEnvironment {
  runner: CommandRunner;
  prompter: SyncPrompter;
  reporter?: SyncReporter;
  settings: SyncSettings;
}
