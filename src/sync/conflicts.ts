import type { Project } from "../projects/types.js";
import { getLogger } from "../utils/logger.js";
import { getFileMtime } from "./mtime.js";
import { listUntrackedFiles } from "./untrackedFiles.js";
import type { Conflict, SyncDirection, SyncEnvironment } from "./types.js";

const logger = getLogger();

/**
 * Find ignored files present on both machines with differing modification
 * times.
 *
 * Only timestamps are compared, never content: a file touched without
 * changes is reported, and two edits inside the same second are not.
 * A file whose time cannot be read on either side is left out silently.
 * The order of the returned list is not meaningful.
 */
export async function detectConflicts(
  env: SyncEnvironment,
  project: Project,
  direction: SyncDirection
): Promise<Conflict[]> {
  const local = await listUntrackedFiles(env, project, "local");
  const remote = await listUntrackedFiles(env, project, "remote");

  const remoteFiles = new Set(remote.files);
  const common = [...new Set(local.files)].filter((file) => remoteFiles.has(file));

  const conflicts: Conflict[] = [];
  for (const file of common) {
    const localTime = await getFileMtime(env, project, file, "local");
    const remoteTime = await getFileMtime(env, project, file, "remote");

    if (localTime && remoteTime && localTime !== remoteTime) {
      conflicts.push({ file, localTime, remoteTime });
    }
  }

  logger.info("[Sync] Conflict detection finished", {
    project: project.name,
    direction,
    candidates: common.length,
    conflicts: conflicts.length,
  });

  return conflicts;
}
