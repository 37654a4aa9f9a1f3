import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { t } from "../i18n/index.js";
import type { Project } from "../projects/types.js";
import { getLogger } from "../utils/logger.js";
import { escapeShellArg } from "./commandRunner.js";
import { detectConflicts } from "./conflicts.js";
import { cancelled, failed, guardStep, nothingToDo, report, reportOutcome, succeeded } from "./outcome.js";
import { excludedFiles, resolveConflicts } from "./resolution.js";
import { listUntrackedFiles } from "./untrackedFiles.js";
import type { Resolution, StepOutcome, SyncDirection, SyncEnvironment } from "./types.js";

const logger = getLogger();

function withTrailingSlash(dir: string): string {
  return dir.endsWith("/") ? dir : `${dir}/`;
}

/**
 * Build the rsync invocation for an explicit, NUL-terminated file list.
 *
 * Both roots end in a slash so rsync merges the listed paths into the
 * destination root instead of nesting the source directory inside it.
 */
export function buildTransferCommand(
  project: Project,
  direction: SyncDirection,
  listFile: string,
  flags: readonly string[]
): string {
  const localRoot = withTrailingSlash(project.localPath);
  const remoteRoot = `${project.remoteHost}:${withTrailingSlash(project.remotePath)}`;
  const [source, destination] = direction === "to_remote" ? [localRoot, remoteRoot] : [remoteRoot, localRoot];

  return [
    "rsync",
    ...flags.map(escapeShellArg),
    "--from0",
    `--files-from=${escapeShellArg(listFile)}`,
    escapeShellArg(source),
    escapeShellArg(destination),
  ].join(" ");
}

async function transferFiles(
  env: SyncEnvironment,
  project: Project,
  direction: SyncDirection,
  files: string[]
): Promise<StepOutcome> {
  const tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "syncpair-"));
  const listFile = path.join(tmpDir, "files.txt");

  try {
    await fs.writeFile(listFile, files.map((file) => `${file}\0`).join(""), "utf-8");
    const command = buildTransferCommand(project, direction, listFile, env.settings.rsyncFlags);
    const result = await env.runner(command);

    if (!result.success) {
      logger.error("[Sync] Transfer failed", { project: project.name, direction, output: result.output });
      return failed(t("commands:sync.failed"), result.output);
    }

    logger.info("[Sync] Transfer completed", { project: project.name, direction, files: files.length });
    const key = direction === "to_remote" ? "commands:sync.synced_to_remote" : "commands:sync.synced_from_remote";
    return succeeded(t(key, { count: files.length }), { files });
  } finally {
    await fs.rm(tmpDir, { recursive: true, force: true });
  }
}

/**
 * Mirror the ignored files of one side onto the other.
 *
 * With `resolveConflictsFirst`, files present on both sides with differing
 * modification times are put to the user first; cancelling aborts the whole
 * sync. The transfer never mirrors a directory wholesale: only the listed
 * files are handed to rsync, and there is no retry on failure.
 */
export function syncUntrackedFiles(
  env: SyncEnvironment,
  project: Project,
  direction: SyncDirection,
  resolveConflictsFirst: boolean = true
): Promise<StepOutcome> {
  return guardStep(`sync ${direction}`, async () => {
    let resolution: Resolution = new Map();

    if (resolveConflictsFirst) {
      report(env, t("commands:sync.checking_conflicts"));
      const conflicts = await detectConflicts(env, project, direction);

      if (conflicts.length > 0) {
        const result = await resolveConflicts(conflicts, env.prompter.decideConflict);
        if (result.kind === "cancelled") {
          logger.info("[Sync] Conflict resolution cancelled", { project: project.name, direction });
          return reportOutcome(env, cancelled(t("commands:sync.cancelled")));
        }
        resolution = result.resolution;
      }
    }

    const excluded = excludedFiles(resolution, direction);
    const side = direction === "to_remote" ? "local" : "remote";

    report(
      env,
      t(direction === "to_remote" ? "commands:sync.syncing_to_remote" : "commands:sync.syncing_from_remote")
    );

    const listing = await listUntrackedFiles(env, project, side);
    if (!listing.success) {
      return reportOutcome(env, failed(t("commands:sync.listing_failed"), listing.output));
    }

    const files = listing.files.filter((file) => !excluded.has(file));
    if (files.length === 0) {
      return reportOutcome(env, nothingToDo(t("commands:sync.nothing_to_sync")));
    }

    return reportOutcome(env, await transferFiles(env, project, direction, files));
  });
}
