import { BaseCommand } from "./BaseCommand.js";
import type { CommandContext, CommandResult } from "./types.js";
import { t } from "../i18n/index.js";

export class TestSshCommand extends BaseCommand {
  readonly name = "test-ssh";
  aliases = ["ssh"];
  get description() { return t('commands:test_ssh.description'); }
  readonly usage = "/test-ssh";

  async execute(_args: string[], context: CommandContext): Promise<CommandResult> {
    try {
      const project = this.requireProject(context);
      return this.fromOutcome(await context.manager.testConnection(project));
    } catch (err) {
      return this.failure(err);
    }
  }
}

export const testSshCommand = new TestSshCommand();
