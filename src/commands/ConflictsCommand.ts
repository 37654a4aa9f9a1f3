import { BaseCommand } from "./BaseCommand.js";
import type { CommandContext, CommandResult } from "./types.js";
import { t } from "../i18n/index.js";

/**
 * Show ignored files whose modification times differ between the two
 * machines, without transferring anything.
 */
export class ConflictsCommand extends BaseCommand {
  readonly name = "conflicts";
  get description() { return t('commands:conflicts.description'); }
  readonly usage = "/conflicts";

  async execute(_args: string[], context: CommandContext): Promise<CommandResult> {
    try {
      const project = this.requireProject(context);
      context.setStatus(t('commands:sync.checking_conflicts'), "progress");
      const conflicts = await context.manager.detectConflicts(project);

      if (conflicts.length === 0) {
        return this.info(t('commands:conflicts.none'));
      }

      const lines = conflicts.map((conflict) =>
        t('commands:conflicts.line', {
          file: conflict.file,
          local: conflict.localTime,
          remote: conflict.remoteTime,
        })
      );
      return this.info(`${t('commands:conflicts.title', { count: conflicts.length })}\n${lines.join("\n")}`);
    } catch (err) {
      return this.failure(err);
    }
  }
}

export const conflictsCommand = new ConflictsCommand();
