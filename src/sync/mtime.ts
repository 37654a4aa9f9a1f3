import fs from "node:fs/promises";
import path from "node:path";
import type { Project } from "../projects/types.js";
import { getLogger } from "../utils/logger.js";
import { formatEpochSeconds, formatTimestamp } from "../utils/time.js";
import { escapeRemotePath, remoteShellCommand } from "./commandRunner.js";
import type { Side, SyncEnvironment } from "./types.js";

const logger = getLogger();

/**
 * stat flag forms tried in order: BSD/macOS first, then GNU coreutils.
 * Both print the modification time as Unix epoch seconds.
 */
export const REMOTE_STAT_FORMS = ["stat -f %m", "stat -c %Y"] as const;

const EPOCH_SECONDS = /^\d+$/;

export async function getLocalMtime(project: Project, file: string): Promise<string | null> {
  try {
    const stats = await fs.stat(path.join(project.localPath, file));
    return formatTimestamp(stats.mtime);
  } catch (error) {
    logger.debug("[Sync] Local mtime unavailable", { file, error: String(error) });
    return null;
  }
}

export async function getRemoteMtime(env: SyncEnvironment, project: Project, file: string): Promise<string | null> {
  const remoteFile = escapeRemotePath(path.posix.join(project.remotePath, file));

  for (const form of REMOTE_STAT_FORMS) {
    const result = await env.runner(remoteShellCommand(project.remoteHost, `${form} ${remoteFile}`));
    const value = result.output.trim();
    if (result.success && EPOCH_SECONDS.test(value)) {
      return formatEpochSeconds(Number(value));
    }
  }

  logger.debug("[Sync] Remote mtime unavailable", { file });
  return null;
}

/**
 * Modification time of `file` on one side, formatted to whole seconds, or
 * null when it cannot be determined.
 */
export function getFileMtime(
  env: SyncEnvironment,
  project: Project,
  file: string,
  side: Side
): Promise<string | null> {
  return side === "local" ? getLocalMtime(project, file) : getRemoteMtime(env, project, file);
}
