import { BaseCommand } from "./BaseCommand.js";
import type { CommandContext, CommandResult } from "./types.js";
import { t } from "../i18n/index.js";

/**
 * Help command - displays available commands and key bindings.
 */
export class HelpCommand extends BaseCommand {
  readonly name = "help";
  get description() { return t('commands:help.description'); }
  readonly usage = "/help";

  async execute(_args: string[], _context: CommandContext): Promise<CommandResult> {
    const helpText = `${t('commands:help.title')}
/projects - ${t('commands:projects.description')}
/use <name> - ${t('commands:use.description')}
/add - ${t('commands:add.description')}
/edit [name] - ${t('commands:edit.description')}
/remove [name] - ${t('commands:remove.description')}
/test-ssh - ${t('commands:test_ssh.description')}
/conflicts - ${t('commands:conflicts.description')}
/sync-to [--no-resolve] - ${t('commands:sync.to_description')}
/sync-from [--no-resolve] - ${t('commands:sync.from_description')}
/push - ${t('commands:git.push_description')}
/pull - ${t('commands:git.pull_description')}
/full-sync - ${t('commands:full_sync.description')}
/quit - ${t('commands:quit.description')}

${t('commands:help.shortcuts_section')}
- ${t('commands:help.shortcuts.exit')}
- ${t('commands:help.shortcuts.history')}`;

    return this.info(helpText);
  }
}

// Export singleton instance
export const helpCommand = new HelpCommand();
