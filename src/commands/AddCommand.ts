import { BaseCommand } from "./BaseCommand.js";
import type { CommandContext, CommandResult } from "./types.js";
import { t } from "../i18n/index.js";

/**
 * Create a project through the project form and select it.
 */
export class AddCommand extends BaseCommand {
  readonly name = "add";
  get description() { return t('commands:add.description'); }
  readonly usage = "/add";

  async execute(_args: string[], context: CommandContext): Promise<CommandResult> {
    const input = await context.prompter.editProject();
    if (!input) {
      return this.info(t('commands:add.cancelled'));
    }

    try {
      const project = await context.store.add(input);
      context.store.select(project.name);
      context.refreshProjects();
      return this.success(t('commands:add.added', { name: project.name }));
    } catch (err) {
      return this.failure(err);
    }
  }
}

export const addCommand = new AddCommand();
