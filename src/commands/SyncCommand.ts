import { BaseCommand } from "./BaseCommand.js";
import type { CommandContext, CommandResult } from "./types.js";
import type { SyncDirection } from "../sync/types.js";
import { t } from "../i18n/index.js";

export const NO_RESOLVE_FLAG = "--no-resolve";

/**
 * Transfer ignored files in one direction. Conflicts are put to the user
 * first unless `--no-resolve` is given.
 */
export class SyncCommand extends BaseCommand {
  readonly name: string;
  readonly usage: string;
  private readonly direction: SyncDirection;

  constructor(direction: SyncDirection) {
    super();
    this.direction = direction;
    this.name = direction === "to_remote" ? "sync-to" : "sync-from";
    this.usage = `/${this.name} [${NO_RESOLVE_FLAG}]`;
  }

  get description() {
    return this.direction === "to_remote" ? t('commands:sync.to_description') : t('commands:sync.from_description');
  }

  async execute(args: string[], context: CommandContext): Promise<CommandResult> {
    try {
      const project = this.requireProject(context);
      const resolve = !args.includes(NO_RESOLVE_FLAG);
      const outcome =
        this.direction === "to_remote"
          ? await context.manager.syncToRemote(project, resolve)
          : await context.manager.syncFromRemote(project, resolve);
      return this.fromOutcome(outcome);
    } catch (err) {
      return this.failure(err);
    }
  }
}

export const syncToCommand = new SyncCommand("to_remote");
export const syncFromCommand = new SyncCommand("from_remote");
