import { t } from "../i18n/index.js";
import type { Project } from "../projects/types.js";
import { getLogger } from "../utils/logger.js";
import { gitPull, gitPush } from "./git.js";
import { isSuccessful, report } from "./outcome.js";
import { syncUntrackedFiles } from "./transfer.js";
import type { StepOutcome, SyncEnvironment } from "./types.js";

const logger = getLogger();

export type FullSyncStepId = "sync_to_remote" | "git_push" | "git_pull" | "sync_from_remote";

export interface FullSyncStep {
  id: FullSyncStepId;
  run(env: SyncEnvironment, project: Project): Promise<StepOutcome>;
}

export const FULL_SYNC_STEPS: readonly FullSyncStep[] = [
  { id: "sync_to_remote", run: (env, project) => syncUntrackedFiles(env, project, "to_remote", true) },
  { id: "git_push", run: gitPush },
  { id: "git_pull", run: gitPull },
  { id: "sync_from_remote", run: (env, project) => syncUntrackedFiles(env, project, "from_remote", true) },
];

export interface FullSyncResult {
  /** Every step reported success */
  completed: boolean;
  /** Outcomes of the steps that ran, in order */
  outcomes: Array<{ step: FullSyncStepId; outcome: StepOutcome }>;
  /** The step that failed or was cancelled */
  stoppedAt?: FullSyncStepId;
}

export function stepLabel(step: FullSyncStepId): string {
  return t(`commands:full_sync.steps.${step}`);
}

/**
 * Run the full pipeline: untracked files up, git push, git pull, untracked
 * files down. The first step that fails or is cancelled stops the pipeline;
 * completed steps are not rolled back.
 */
export async function runFullSync(
  env: SyncEnvironment,
  project: Project,
  steps: readonly FullSyncStep[] = FULL_SYNC_STEPS
): Promise<FullSyncResult> {
  const outcomes: FullSyncResult["outcomes"] = [];

  for (const step of steps) {
    report(env, t("commands:full_sync.running_step", { step: stepLabel(step.id) }));
    const outcome = await step.run(env, project);
    outcomes.push({ step: step.id, outcome });

    if (!isSuccessful(outcome)) {
      logger.warn("[FullSync] Stopped", { project: project.name, step: step.id, status: outcome.status });
      report(env, t("commands:full_sync.stopped_at", { step: stepLabel(step.id) }), "warning");
      return { completed: false, outcomes, stoppedAt: step.id };
    }
  }

  logger.info("[FullSync] Completed", { project: project.name });
  report(env, t("commands:full_sync.completed"), "success");
  return { completed: true, outcomes };
}
