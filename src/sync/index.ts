/**
 * Sync module
 *
 * Pairs git push/pull for tracked files with rsync transfers of the ignored
 * files git never carries, plus conflict detection for the latter.
 */

export {
  // Main class
  SyncManager,
  createSyncManager,
  isFullSyncResult,
  type SyncManagerOptions,
} from "./manager.js";

export {
  runCommand,
  createCommandRunner,
  escapeShellArg,
  escapeRemotePath,
  remoteShellCommand,
  DEFAULT_COMMAND_TIMEOUT_MS,
  TIMED_OUT_MESSAGE,
  type CommandRunner,
  type RunOptions,
  type RunResult,
} from "./commandRunner.js";

export { detectConflicts } from "./conflicts.js";
export { resolveConflicts, excludedFiles, winningChoice } from "./resolution.js";
export { syncUntrackedFiles, buildTransferCommand } from "./transfer.js";
export { gitPush, gitPull, getWorkingTreeStatus } from "./git.js";
export { runFullSync, stepLabel, FULL_SYNC_STEPS, type FullSyncResult, type FullSyncStepId } from "./fullSync.js";
export { testConnection, CONNECTION_SENTINEL } from "./connection.js";
export { isSuccessful } from "./outcome.js";

export type {
  Conflict,
  ConflictChoice,
  ConflictDecision,
  ConflictDecider,
  ConflictPosition,
  Resolution,
  ResolutionResult,
  StatusTone,
  StepOutcome,
  StepStatus,
  SyncDirection,
  SyncEnvironment,
  SyncPrompter,
  SyncReporter,
  SyncSettings,
} from "./types.js";
