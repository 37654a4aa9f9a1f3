import fs from "node:fs";
import { z } from "zod";
import { t } from "../i18n/index.js";
import { expandPath } from "../utils/config.js";
import { ErrorCode, ValidationError } from "../utils/errors.js";
import { DEFAULT_GIT_BRANCH, type Project, type ProjectInput } from "./types.js";

// ============================================================================
// On-disk shape
// ============================================================================

/**
 * One project as stored in projects.json (snake_case keys).
 */
export const StoredProjectSchema = z.object({
  name: z.string().min(1),
  local_path: z.string().min(1),
  remote_host: z.string().min(1),
  remote_path: z.string().min(1),
  git_branch: z.string().min(1).default(DEFAULT_GIT_BRANCH),
});

export type StoredProject = z.infer<typeof StoredProjectSchema>;

export const ProjectsFileSchema = z.object({
  projects: z.array(StoredProjectSchema),
});

export type ProjectsFile = z.infer<typeof ProjectsFileSchema>;

export function fromStored(stored: StoredProject): Project {
  return {
    name: stored.name,
    localPath: stored.local_path,
    remoteHost: stored.remote_host,
    remotePath: stored.remote_path,
    gitBranch: stored.git_branch,
  };
}

export function toStored(project: Project): StoredProject {
  return {
    name: project.name,
    local_path: project.localPath,
    remote_host: project.remoteHost,
    remote_path: project.remotePath,
    git_branch: project.gitBranch,
  };
}

// ============================================================================
// Input validation
// ============================================================================

const REQUIRED_FIELDS = ["name", "localPath", "remoteHost", "remotePath"] as const;

function isDirectory(dir: string): boolean {
  try {
    return fs.statSync(dir).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Turn raw form input into a Project.
 *
 * Fields are trimmed, `~` in the local path is expanded and a blank branch
 * becomes `main`. The local path must be an existing directory; the remote
 * side is not contacted.
 *
 * @throws {ValidationError} On a blank required field or a missing local directory
 */
export function validateProjectInput(input: ProjectInput): Project {
  const trimmed = {
    name: input.name.trim(),
    localPath: input.localPath.trim(),
    remoteHost: input.remoteHost.trim(),
    remotePath: input.remotePath.trim(),
  };

  for (const field of REQUIRED_FIELDS) {
    if (!trimmed[field]) {
      throw new ValidationError(
        ErrorCode.VALIDATION_REQUIRED_FIELD,
        t("errors:validation.required_field", { field: t(`common:project_fields.${field}`) }),
        { field }
      );
    }
  }

  const localPath = expandPath(trimmed.localPath);
  if (!isDirectory(localPath)) {
    throw new ValidationError(
      ErrorCode.VALIDATION_INVALID_PATH,
      t("errors:validation.local_path_missing", { path: localPath }),
      { field: "localPath", value: localPath }
    );
  }

  return {
    ...trimmed,
    localPath,
    gitBranch: input.gitBranch?.trim() || DEFAULT_GIT_BRANCH,
  };
}
