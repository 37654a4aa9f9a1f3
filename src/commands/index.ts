import type { Command, CommandContext, CommandResult } from "./types.js";
import { t } from "../i18n/index.js";
import { helpCommand } from "./HelpCommand.js";
import { projectsCommand } from "./ProjectsCommand.js";
import { useCommand } from "./UseCommand.js";
import { addCommand } from "./AddCommand.js";
import { editCommand } from "./EditCommand.js";
import { removeCommand } from "./RemoveCommand.js";
import { testSshCommand } from "./TestSshCommand.js";
import { conflictsCommand } from "./ConflictsCommand.js";
import { syncToCommand, syncFromCommand } from "./SyncCommand.js";
import { pushCommand, pullCommand } from "./GitCommands.js";
import { fullSyncCommand } from "./FullSyncCommand.js";
import { quitCommand } from "./QuitCommand.js";

// Re-export types
export type { Command, CommandContext, CommandResult, CommandPrompter } from "./types.js";

// Re-export base class
export { BaseCommand } from "./BaseCommand.js";

// Export command implementations
export { HelpCommand, helpCommand } from "./HelpCommand.js";
export { ProjectsCommand, projectsCommand } from "./ProjectsCommand.js";
export { UseCommand, useCommand } from "./UseCommand.js";
export { AddCommand, addCommand } from "./AddCommand.js";
export { EditCommand, editCommand } from "./EditCommand.js";
export { RemoveCommand, removeCommand } from "./RemoveCommand.js";
export { TestSshCommand, testSshCommand } from "./TestSshCommand.js";
export { ConflictsCommand, conflictsCommand } from "./ConflictsCommand.js";
export { SyncCommand, syncToCommand, syncFromCommand, NO_RESOLVE_FLAG } from "./SyncCommand.js";
export { PushCommand, PullCommand, pushCommand, pullCommand } from "./GitCommands.js";
export { FullSyncCommand, fullSyncCommand } from "./FullSyncCommand.js";
export { QuitCommand, quitCommand } from "./QuitCommand.js";

export interface ParsedCommand {
  name: string;
  args: string[];
}

/**
 * Split `/name arg1 arg2` into its parts. Input without a leading slash is
 * not a command.
 */
export function parseCommandInput(input: string): ParsedCommand | null {
  const trimmed = input.trim();
  if (!trimmed.startsWith("/")) {
    return null;
  }
  const [name = "", ...args] = trimmed.slice(1).split(/\s+/);
  if (!name) {
    return null;
  }
  return { name: name.toLowerCase(), args };
}

/**
 * CommandRegistry manages all registered commands and routes execution.
 * This is the central hub for command handling in the application.
 */
export class CommandRegistry {
  private commands: Map<string, Command> = new Map();
  private aliasMap: Map<string, string> = new Map();

  /**
   * Register a command with the registry.
   * @param command - The command to register
   */
  register(command: Command): void {
    this.commands.set(command.name.toLowerCase(), command);

    // Register aliases
    if (command.aliases) {
      for (const alias of command.aliases) {
        this.aliasMap.set(alias.toLowerCase(), command.name.toLowerCase());
      }
    }
  }

  /**
   * Register multiple commands at once.
   * @param commands - Array of commands to register
   */
  registerAll(commands: Command[]): void {
    for (const command of commands) {
      this.register(command);
    }
  }

  /**
   * Get a command by name or alias.
   * @param name - Command name or alias (without leading /)
   * @returns The command if found, undefined otherwise
   */
  get(name: string): Command | undefined {
    const normalizedName = name.toLowerCase();

    // Try direct lookup first
    const directCommand = this.commands.get(normalizedName);
    if (directCommand) {
      return directCommand;
    }

    // Try alias lookup
    const aliasTarget = this.aliasMap.get(normalizedName);
    if (aliasTarget) {
      return this.commands.get(aliasTarget);
    }

    return undefined;
  }

  /**
   * Check if a command exists by name or alias.
   * @param name - Command name or alias (without leading /)
   */
  has(name: string): boolean {
    return this.get(name) !== undefined;
  }

  /**
   * Find commands by prefix matching.
   * Returns exact match if found, otherwise returns all commands that start with the prefix.
   * @param prefix - Command prefix (without leading /)
   * @returns Array of matching command names (primary names only, not aliases)
   */
  findByPrefix(prefix: string): string[] {
    const normalizedPrefix = prefix.toLowerCase();

    // Check for exact match first (including aliases)
    if (this.has(normalizedPrefix)) {
      const command = this.get(normalizedPrefix);
      if (command) {
        return [command.name];
      }
    }

    // Find all commands and aliases that start with the prefix
    const matches = new Set<string>();

    // Check command names
    for (const name of this.commands.keys()) {
      if (name.startsWith(normalizedPrefix)) {
        matches.add(name);
      }
    }

    // Check aliases and resolve to primary names
    for (const [alias, primaryName] of this.aliasMap.entries()) {
      if (alias.startsWith(normalizedPrefix)) {
        matches.add(primaryName);
      }
    }

    return Array.from(matches);
  }

  /**
   * Execute a command by name.
   * @param commandName - Command name (without leading /)
   * @param args - Command arguments
   * @param context - Execution context
   * @returns CommandResult or null if command not found
   */
  async execute(
    commandName: string,
    args: string[],
    context: CommandContext
  ): Promise<CommandResult | null> {
    const command = this.get(commandName);

    if (!command) {
      return null;
    }

    // Check if command requires args but none provided
    if (command.requiresArgs && args.length === 0) {
      return {
        handled: true,
        error: t("commands:registry.usage_hint", { usage: command.usage }),
        response: {
          role: "assistant",
          content: t("commands:registry.usage_hint", { usage: command.usage }),
          tone: "error",
        },
      };
    }

    return command.execute(args, context);
  }

  /**
   * Get all registered commands.
   */
  getAll(): Command[] {
    return Array.from(this.commands.values());
  }

}

/**
 * Registry holding every built-in command.
 */
export function createDefaultRegistry(): CommandRegistry {
  const registry = new CommandRegistry();
  registry.registerAll([
    helpCommand,
    projectsCommand,
    useCommand,
    addCommand,
    editCommand,
    removeCommand,
    testSshCommand,
    conflictsCommand,
    syncToCommand,
    syncFromCommand,
    pushCommand,
    pullCommand,
    fullSyncCommand,
    quitCommand,
  ]);
  return registry;
}

const SYNCING_COMMANDS = new Set(["sync-to", "sync-from", "push", "pull", "full-sync"]);

/**
 * Whether a finished command leaves both machines in step: a sync command
 * that succeeded or found nothing to do. Cancelled and failed runs do not
 * count.
 */
export function completedSync(commandName: string, result: CommandResult): boolean {
  return SYNCING_COMMANDS.has(commandName) && (result.status === "success" || result.status === "nothing_to_do");
}

/**
 * Default global command registry instance.
 * Use this for the main application.
 */
export const commandRegistry = createDefaultRegistry();
