/**
 * A project pairs a local git checkout with its counterpart on a remote
 * machine reachable over ssh.
 */
export interface Project {
  /** Unique, user-facing key */
  name: string;
  /** Absolute path of the local working tree */
  localPath: string;
  /** ssh destination: an alias from ~/.ssh/config or user@host */
  remoteHost: string;
  /** Path of the working tree on the remote machine */
  remotePath: string;
  /** Branch pushed to and pulled from */
  gitBranch: string;
}

/**
 * Raw user input for creating or editing a project, before validation.
 */
export interface ProjectInput {
  name: string;
  localPath: string;
  remoteHost: string;
  remotePath: string;
  gitBranch?: string;
}

export const DEFAULT_GIT_BRANCH = "main";
