import { BaseCommand } from "./BaseCommand.js";
import type { CommandContext, CommandResult } from "./types.js";
import { isFullSyncResult } from "../sync/manager.js";
import { stepLabel } from "../sync/fullSync.js";
import { t } from "../i18n/index.js";

/**
 * Ignored files up, git push, git pull, ignored files down; stops at the
 * first step that fails or is cancelled.
 */
export class FullSyncCommand extends BaseCommand {
  readonly name = "full-sync";
  aliases = ["sync"];
  get description() { return t('commands:full_sync.description'); }
  readonly usage = "/full-sync";

  async execute(_args: string[], context: CommandContext): Promise<CommandResult> {
    try {
      const result = await context.manager.fullSync(this.requireProject(context));
      if (!isFullSyncResult(result)) {
        return this.fromOutcome(result);
      }

      const lines = result.outcomes.map(({ step, outcome }) => `${stepLabel(step)}: ${outcome.message}`);
      if (result.completed) {
        return { ...this.success(`${t('commands:full_sync.completed')}\n${lines.join("\n")}`), status: "success" };
      }

      const last = result.outcomes[result.outcomes.length - 1];
      const summary = t('commands:full_sync.stopped_at', { step: result.stoppedAt ? stepLabel(result.stoppedAt) : "" });
      const output = last?.outcome.output ? `\n${last.outcome.output}` : "";
      const text = `${summary}\n${lines.join("\n")}${output}`;
      const status = last?.outcome.status ?? "failed";
      return { ...(status === "cancelled" ? this.info(text) : this.error(text)), status };
    } catch (err) {
      return this.failure(err);
    }
  }
}

export const fullSyncCommand = new FullSyncCommand();
