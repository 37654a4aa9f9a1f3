import { BaseCommand } from "./BaseCommand.js";
import type { CommandContext, CommandResult } from "./types.js";
import { t } from "../i18n/index.js";

/**
 * Delete a project after confirmation. Files on either machine are untouched.
 */
export class RemoveCommand extends BaseCommand {
  readonly name = "remove";
  aliases = ["rm"];
  get description() { return t('commands:remove.description'); }
  readonly usage = "/remove [name]";

  async execute(args: string[], context: CommandContext): Promise<CommandResult> {
    try {
      const project = this.targetProject(args, context);
      const confirmed = await context.prompter.confirm(t('commands:remove.confirm', { name: project.name }));
      if (!confirmed) {
        return this.info(t('commands:remove.cancelled'));
      }

      await context.store.remove(project.name);
      context.refreshProjects();
      return this.success(t('commands:remove.removed', { name: project.name }));
    } catch (err) {
      return this.failure(err);
    }
  }
}

export const removeCommand = new RemoveCommand();
