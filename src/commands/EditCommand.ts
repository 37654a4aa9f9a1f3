import { BaseCommand } from "./BaseCommand.js";
import type { CommandContext, CommandResult } from "./types.js";
import { t } from "../i18n/index.js";

/**
 * Edit a project (the selected one unless a name is given).
 */
export class EditCommand extends BaseCommand {
  readonly name = "edit";
  get description() { return t('commands:edit.description'); }
  readonly usage = "/edit [name]";

  async execute(args: string[], context: CommandContext): Promise<CommandResult> {
    try {
      const original = this.targetProject(args, context);
      const input = await context.prompter.editProject(original);
      if (!input) {
        return this.info(t('commands:edit.cancelled'));
      }

      const project = await context.store.update(original.name, input);
      context.refreshProjects();
      return this.success(t('commands:edit.updated', { name: project.name }));
    } catch (err) {
      return this.failure(err);
    }
  }
}

export const editCommand = new EditCommand();
