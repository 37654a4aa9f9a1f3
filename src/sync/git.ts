import { t } from "../i18n/index.js";
import type { Project } from "../projects/types.js";
import { getLogger } from "../utils/logger.js";
import { escapeShellArg } from "./commandRunner.js";
import { cancelled, failed, guardStep, report, reportOutcome, succeeded } from "./outcome.js";
import type { StepOutcome, SyncEnvironment } from "./types.js";

const logger = getLogger();

export interface WorkingTreeStatus {
  /** The status query itself succeeded */
  success: boolean;
  dirty: boolean;
  /** Porcelain status lines, or the failure output */
  summary: string;
}

/**
 * Query uncommitted changes in the local working tree.
 */
export async function getWorkingTreeStatus(env: SyncEnvironment, project: Project): Promise<WorkingTreeStatus> {
  const result = await env.runner("git status --porcelain", { cwd: project.localPath });
  if (!result.success) {
    logger.warn("[Git] Status query failed", { project: project.name, output: result.output });
    return { success: false, dirty: false, summary: result.output };
  }
  return { success: true, dirty: result.output.length > 0, summary: result.output };
}

export function buildCommitCommand(message: string): string {
  return `git add -A && git commit -m ${escapeShellArg(message)}`;
}

export function buildPushCommand(env: SyncEnvironment, project: Project): string {
  return `git push ${escapeShellArg(env.settings.gitRemote)} ${escapeShellArg(project.gitBranch)}`;
}

export function buildPullCommand(env: SyncEnvironment, project: Project): string {
  return `git pull ${escapeShellArg(env.settings.gitRemote)} ${escapeShellArg(project.gitBranch)}`;
}

/**
 * Commit pending changes (after asking for a message) and push the
 * configured branch.
 */
export function gitPush(env: SyncEnvironment, project: Project): Promise<StepOutcome> {
  return guardStep("git push", async () => {
    report(env, t("commands:git.checking_status"));
    const status = await getWorkingTreeStatus(env, project);
    if (!status.success) {
      return reportOutcome(env, failed(t("commands:git.status_failed"), status.summary));
    }

    if (status.dirty) {
      const message = (await env.prompter.askCommitMessage(status.summary))?.trim();
      if (!message) {
        return reportOutcome(env, cancelled(t("commands:git.push_cancelled")));
      }

      report(env, t("commands:git.committing"));
      const commit = await env.runner(buildCommitCommand(message), { cwd: project.localPath });
      if (!commit.success) {
        logger.error("[Git] Commit failed", { project: project.name, output: commit.output });
        return reportOutcome(env, failed(t("commands:git.commit_failed"), commit.output));
      }
      logger.info("[Git] Committed local changes", { project: project.name });
    }

    report(env, t("commands:git.pushing"));
    const push = await env.runner(buildPushCommand(env, project), { cwd: project.localPath });
    if (!push.success) {
      logger.error("[Git] Push failed", { project: project.name, output: push.output });
      return reportOutcome(env, failed(t("commands:git.push_failed"), push.output));
    }

    logger.info("[Git] Push completed", { project: project.name, branch: project.gitBranch });
    return reportOutcome(env, succeeded(t("commands:git.push_succeeded")));
  });
}

/**
 * Pull the configured branch. A dirty working tree needs explicit
 * confirmation first; merge conflicts are left to git's own output.
 */
export function gitPull(env: SyncEnvironment, project: Project): Promise<StepOutcome> {
  return guardStep("git pull", async () => {
    report(env, t("commands:git.checking_status"));
    const status = await getWorkingTreeStatus(env, project);
    if (!status.success) {
      return reportOutcome(env, failed(t("commands:git.status_failed"), status.summary));
    }

    if (status.dirty) {
      const proceed = await env.prompter.confirm(t("commands:git.dirty_pull_warning"));
      if (!proceed) {
        return reportOutcome(env, cancelled(t("commands:git.pull_cancelled")));
      }
    }

    report(env, t("commands:git.pulling"));
    const pull = await env.runner(buildPullCommand(env, project), { cwd: project.localPath });
    if (!pull.success) {
      logger.error("[Git] Pull failed", { project: project.name, output: pull.output });
      return reportOutcome(env, failed(t("commands:git.pull_failed"), pull.output));
    }

    logger.info("[Git] Pull completed", { project: project.name, branch: project.gitBranch });
    return reportOutcome(env, succeeded(t("commands:git.pull_succeeded")));
  });
}
