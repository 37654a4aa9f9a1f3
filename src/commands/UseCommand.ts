import { BaseCommand } from "./BaseCommand.js";
import type { CommandContext, CommandResult } from "./types.js";
import { t } from "../i18n/index.js";

/**
 * Select the project later commands act on.
 */
export class UseCommand extends BaseCommand {
  readonly name = "use";
  aliases = ["select"];
  requiresArgs = true;
  get description() { return t('commands:use.description'); }
  readonly usage = "/use <name>";

  async execute(args: string[], context: CommandContext): Promise<CommandResult> {
    try {
      const project = context.store.select(args.join(" ").trim());
      context.refreshProjects();
      return this.success(t('commands:use.selected', { name: project.name }));
    } catch (err) {
      return this.failure(err);
    }
  }
}

export const useCommand = new UseCommand();
