import { t } from "../i18n/index.js";
import type { Project } from "../projects/types.js";
import type { SyncPairConfig } from "../utils/config.js";
import { getLogger } from "../utils/logger.js";
import { createCommandRunner, type CommandRunner } from "./commandRunner.js";
import { detectConflicts } from "./conflicts.js";
import { testConnection } from "./connection.js";
import { runFullSync, type FullSyncResult } from "./fullSync.js";
import { gitPull, gitPush } from "./git.js";
import { failed } from "./outcome.js";
import { syncUntrackedFiles } from "./transfer.js";
import type { Conflict, StepOutcome, SyncEnvironment, SyncPrompter, SyncReporter, SyncSettings } from "./types.js";

const logger = getLogger();

/**
 * Entry point the commands use for every sync operation.
 *
 * Operations run one at a time: a call made while another is still running
 * is rejected with a failed outcome instead of being queued.
 */
export class SyncManager {
  private env: SyncEnvironment;
  private isBusy: boolean = false;

  constructor(env: SyncEnvironment) {
    this.env = env;
  }

  get busy(): boolean {
    return this.isBusy;
  }

  async detectConflicts(project: Project, direction: "to_remote" | "from_remote" = "to_remote"): Promise<Conflict[]> {
    return detectConflicts(this.env, project, direction);
  }

  syncToRemote(project: Project, resolveConflicts: boolean = true): Promise<StepOutcome> {
    return this.exclusive("sync to remote", () => syncUntrackedFiles(this.env, project, "to_remote", resolveConflicts));
  }

  syncFromRemote(project: Project, resolveConflicts: boolean = true): Promise<StepOutcome> {
    return this.exclusive("sync from remote", () =>
      syncUntrackedFiles(this.env, project, "from_remote", resolveConflicts)
    );
  }

  push(project: Project): Promise<StepOutcome> {
    return this.exclusive("git push", () => gitPush(this.env, project));
  }

  pull(project: Project): Promise<StepOutcome> {
    return this.exclusive("git pull", () => gitPull(this.env, project));
  }

  testConnection(project: Project): Promise<StepOutcome> {
    return this.exclusive("test connection", () => testConnection(this.env, project));
  }

  async fullSync(project: Project): Promise<FullSyncResult | StepOutcome> {
    if (this.isBusy) {
      return this.rejectBusy("full sync");
    }
    this.isBusy = true;
    try {
      return await runFullSync(this.env, project);
    } finally {
      this.isBusy = false;
    }
  }

  private async exclusive(name: string, operation: () => Promise<StepOutcome>): Promise<StepOutcome> {
    if (this.isBusy) {
      return this.rejectBusy(name);
    }
    this.isBusy = true;
    try {
      return await operation();
    } finally {
      this.isBusy = false;
    }
  }

  private rejectBusy(name: string): StepOutcome {
    logger.warn("[SyncManager] Operation rejected, another one is running", { operation: name });
    return failed(t("errors:operation_in_progress"));
  }
}

export interface SyncManagerOptions {
  config: Pick<SyncPairConfig, "commandTimeoutMs"> & SyncSettings;
  prompter: SyncPrompter;
  reporter?: SyncReporter;
  /** Replaces the shell runner, mainly for tests */
  runner?: CommandRunner;
}

/**
 * Create a SyncManager from the application config.
 */
export function createSyncManager(options: SyncManagerOptions): SyncManager {
  const { config } = options;
  return new SyncManager({
    runner: options.runner ?? createCommandRunner(config.commandTimeoutMs),
    prompter: options.prompter,
    reporter: options.reporter,
    settings: {
      sshConnectTimeoutSec: config.sshConnectTimeoutSec,
      gitRemote: config.gitRemote,
      rsyncFlags: config.rsyncFlags,
    },
  });
}

export function isFullSyncResult(value: FullSyncResult | StepOutcome): value is FullSyncResult {
  return "outcomes" in value;
}
