import { BaseCommand } from "./BaseCommand.js";
import type { CommandContext, CommandResult } from "./types.js";
import { t } from "../i18n/index.js";

/**
 * Commit (after asking for a message) and push the project branch.
 */
export class PushCommand extends BaseCommand {
  readonly name = "push";
  get description() { return t('commands:git.push_description'); }
  readonly usage = "/push";

  async execute(_args: string[], context: CommandContext): Promise<CommandResult> {
    try {
      return this.fromOutcome(await context.manager.push(this.requireProject(context)));
    } catch (err) {
      return this.failure(err);
    }
  }
}

export class PullCommand extends BaseCommand {
  readonly name = "pull";
  get description() { return t('commands:git.pull_description'); }
  readonly usage = "/pull";

  async execute(_args: string[], context: CommandContext): Promise<CommandResult> {
    try {
      return this.fromOutcome(await context.manager.pull(this.requireProject(context)));
    } catch (err) {
      return this.failure(err);
    }
  }
}

export const pushCommand = new PushCommand();
export const pullCommand = new PullCommand();
