import type { Message } from "../components/MessageLog.js";
import type { Project, ProjectInput } from "../projects/types.js";
import type { ProjectStore } from "../projects/store.js";
import type { SyncManager } from "../sync/manager.js";
import type { StatusTone, StepStatus, SyncPrompter } from "../sync/types.js";

/**
 * Dialogs the commands need on top of the ones sync operations use.
 */
export interface CommandPrompter extends SyncPrompter {
  /** Resolves to the filled-in form, or null when the user cancels */
  editProject(initial?: Project): Promise<ProjectInput | null>;
}

/**
 * CommandContext provides all the state and utilities a command needs to execute.
 * This is the single source of truth for command handlers.
 */
export interface CommandContext {
  // Core services
  store: ProjectStore;
  manager: SyncManager;
  prompter: CommandPrompter;

  // Status line
  setStatus: (message: string, tone: StatusTone) => void;

  // Re-read the project list into UI state after a mutation
  refreshProjects: () => void;

  // Leave the application
  exit: () => void;
}

/**
 * CommandResult indicates the outcome of command execution.
 */
export interface CommandResult {
  /** Whether the command was handled (true) or should fall through to default handling (false) */
  handled: boolean;

  /** Optional response message to add to the log */
  response?: Message;

  /** Optional error message if command failed */
  error?: string;

  /** How the underlying sync step ended, for commands that run one */
  status?: StepStatus;
}

/**
 * Command interface defines the contract for all commands in the system.
 * Commands are responsible for handling specific user inputs (e.g., /help, /push).
 */
export interface Command {
  /** Primary command name (e.g., "help", "push") */
  name: string;

  /** Alternative names for this command (e.g., ["exit"] for quit) */
  aliases?: string[];

  /** Human-readable description for help text */
  description: string;

  /** Usage example (e.g., "/use <name>") */
  usage: string;

  /** Whether this command requires arguments */
  requiresArgs?: boolean;

  /**
   * Execute the command with given arguments and context.
   * @param args - Command arguments (everything after the command name)
   */
  execute(args: string[], context: CommandContext): Promise<CommandResult>;

  /**
   * Check if this command can handle the given command name.
   * @param commandName - The command name to check (without leading /)
   */
  canHandle(commandName: string): boolean;
}
