import { BaseCommand } from "./BaseCommand.js";
import type { CommandContext, CommandResult } from "./types.js";
import { t } from "../i18n/index.js";

export class QuitCommand extends BaseCommand {
  readonly name = "quit";
  aliases = ["exit", "q"];
  get description() { return t('commands:quit.description'); }
  readonly usage = "/quit";

  async execute(_args: string[], context: CommandContext): Promise<CommandResult> {
    context.exit();
    return this.success();
  }
}

export const quitCommand = new QuitCommand();
