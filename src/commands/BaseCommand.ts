import { t } from "../i18n/index.js";
import type { Project } from "../projects/types.js";
import type { StepOutcome } from "../sync/types.js";
import { ErrorCode, formatErrorForUser, SyncPairError } from "../utils/errors.js";
import type { Command, CommandContext, CommandResult } from "./types.js";

// Re-export types for convenience so other command files can import from BaseCommand
export type { CommandContext, CommandResult } from "./types.js";

/**
 * BaseCommand provides a foundation for implementing commands with common utilities.
 * Extend this class to create new commands with shared functionality.
 */
export abstract class BaseCommand implements Command {
  abstract name: string;
  abstract description: string;
  abstract usage: string;

  aliases?: string[];
  requiresArgs?: boolean;

  /**
   * Check if this command can handle the given command name.
   * Matches against both the primary name and any aliases.
   */
  canHandle(commandName: string): boolean {
    const normalizedName = commandName.toLowerCase();
    if (this.name.toLowerCase() === normalizedName) {
      return true;
    }
    if (this.aliases?.some((alias) => alias.toLowerCase() === normalizedName)) {
      return true;
    }
    return false;
  }

  /**
   * Execute the command. Must be implemented by subclasses.
   */
  abstract execute(args: string[], context: CommandContext): Promise<CommandResult>;

  // ==================== Helper Methods ====================

  /**
   * Create a success result with an optional response message.
   */
  protected success(response?: string): CommandResult {
    if (response) {
      return {
        handled: true,
        response: { role: "assistant", content: response, tone: "success" },
      };
    }
    return { handled: true };
  }

  protected info(response: string): CommandResult {
    return {
      handled: true,
      response: { role: "assistant", content: response, tone: "info" },
    };
  }

  /**
   * Create an error result with a message.
   */
  protected error(message: string): CommandResult {
    return {
      handled: true,
      error: message,
      response: { role: "assistant", content: message, tone: "error" },
    };
  }

  /**
   * Error result for anything thrown by the store or a dialog.
   */
  protected failure(err: unknown): CommandResult {
    return this.error(formatErrorForUser(err));
  }

  /**
   * Turn a sync step outcome into a result tagged with its status. Failed
   * steps carry the raw tool output below the summary.
   */
  protected fromOutcome(outcome: StepOutcome): CommandResult {
    return { ...this.resultFor(outcome), status: outcome.status };
  }

  private resultFor(outcome: StepOutcome): CommandResult {
    switch (outcome.status) {
      case "success":
        return this.success(outcome.message);
      case "nothing_to_do":
      case "cancelled":
        return this.info(outcome.message);
      case "failed":
        return this.error(outcome.output ? `${outcome.message}\n${outcome.output}` : outcome.message);
    }
  }

  /**
   * The selected project.
   * @throws {SyncPairError} When nothing is selected
   */
  protected requireProject(context: CommandContext): Project {
    const project = context.store.current();
    if (!project) {
      throw new SyncPairError(ErrorCode.PROJECT_NOT_SELECTED);
    }
    return project;
  }

  /**
   * Project named in the first argument, falling back to the selected one.
   */
  protected targetProject(args: string[], context: CommandContext): Project {
    const name = args.join(" ").trim();
    if (!name) {
      return this.requireProject(context);
    }
    const project = context.store.get(name);
    if (!project) {
      throw new SyncPairError(ErrorCode.PROJECT_NOT_FOUND, t("errors:validation.project_not_found", { name }));
    }
    return project;
  }
}
