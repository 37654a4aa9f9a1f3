import { t } from "../i18n/index.js";
import { formatErrorForUser } from "../utils/errors.js";
import { getLogger } from "../utils/logger.js";
import type { StepOutcome, SyncEnvironment, StatusTone } from "./types.js";

const logger = getLogger();

export function succeeded(message: string, extra: Omit<StepOutcome, "status" | "message"> = {}): StepOutcome {
  return { status: "success", message, ...extra };
}

export function nothingToDo(message: string): StepOutcome {
  return { status: "nothing_to_do", message };
}

export function cancelled(message: string): StepOutcome {
  return { status: "cancelled", message };
}

export function failed(message: string, output?: string): StepOutcome {
  return { status: "failed", message, output };
}

/**
 * `nothing_to_do` counts as success: the step had no work, not a problem.
 */
export function isSuccessful(outcome: StepOutcome): boolean {
  return outcome.status === "success" || outcome.status === "nothing_to_do";
}

export function report(env: SyncEnvironment, message: string, tone: StatusTone = "progress"): void {
  env.reporter?.status(message, tone);
}

/**
 * Report the final outcome of a step on the status line.
 */
export function reportOutcome(env: SyncEnvironment, outcome: StepOutcome): StepOutcome {
  const tones: Record<StepOutcome["status"], StatusTone> = {
    success: "success",
    nothing_to_do: "info",
    cancelled: "info",
    failed: "error",
  };
  report(env, outcome.message, tones[outcome.status]);
  return outcome;
}

/**
 * Run a step so that nothing it throws escapes: an unexpected error
 * becomes a failed outcome.
 */
export async function guardStep(name: string, step: () => Promise<StepOutcome>): Promise<StepOutcome> {
  try {
    return await step();
  } catch (error) {
    logger.error(`[Sync] ${name} raised an unexpected error`, error);
    return failed(t("commands:outcome.unexpected_error", { step: name }), formatErrorForUser(error));
  }
}
