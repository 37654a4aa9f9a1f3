import type { Project } from "../projects/types.js";
import { getLogger } from "../utils/logger.js";
import { escapeRemotePath, remoteShellCommand } from "./commandRunner.js";
import type { Side, SyncEnvironment } from "./types.js";

const logger = getLogger();

/**
 * Lists files that exist in the working tree but are excluded by the ignore
 * rules: the artifacts git never carries between machines.
 *
 * Names come back NUL-terminated and unquoted, so spaces and non-ASCII
 * characters survive as they are on disk.
 */
export const LIST_IGNORED_FILES_COMMAND =
  "git -c core.quotePath=false ls-files -z --others --ignored --exclude-standard";

export interface FileListing {
  success: boolean;
  files: string[];
  /** Raw output of the listing command, kept for failure reports */
  output: string;
}

/**
 * Split NUL-terminated listing output. Anything after the last NUL (stderr
 * noise such as an ssh banner) is not a file name and is dropped.
 */
export function parseFileList(output: string): string[] {
  return output
    .split("\0")
    .slice(0, -1)
    .filter((name) => name.length > 0);
}

/**
 * Build the listing command for one side of a project.
 */
export function buildListCommand(project: Project, side: Side): { command: string; cwd?: string } {
  if (side === "local") {
    return { command: LIST_IGNORED_FILES_COMMAND, cwd: project.localPath };
  }
  return {
    command: remoteShellCommand(
      project.remoteHost,
      `cd ${escapeRemotePath(project.remotePath)} && ${LIST_IGNORED_FILES_COMMAND}`
    ),
  };
}

/**
 * Query the ignored-but-present files on one side.
 */
export async function listUntrackedFiles(
  env: SyncEnvironment,
  project: Project,
  side: Side
): Promise<FileListing> {
  const { command, cwd } = buildListCommand(project, side);
  const result = await env.runner(command, { cwd, untrimmed: true });

  if (!result.success) {
    const output = result.output.trim();
    logger.warn("[Sync] Listing untracked files failed", { project: project.name, side, output });
    return { success: false, files: [], output };
  }

  const files = parseFileList(result.output);
  logger.debug("[Sync] Listed untracked files", { project: project.name, side, count: files.length });
  return { success: true, files, output: result.output };
}
