import { exec } from "node:child_process";
import { getLogger } from "../utils/logger.js";

const logger = getLogger();

export const DEFAULT_COMMAND_TIMEOUT_MS = 120_000;

export const TIMED_OUT_MESSAGE = "Command timed out";

export interface RunOptions {
  /** Working directory; defaults to the process cwd */
  cwd?: string;
  /** Overrides the runner's timeout for this call */
  timeoutMs?: number;
  /** Keep surrounding whitespace in the output, for NUL-separated listings */
  untrimmed?: boolean;
}

export interface RunResult {
  /** Exit code was zero */
  success: boolean;
  /** stdout followed by stderr, trimmed unless `untrimmed` was set */
  output: string;
  timedOut: boolean;
}

/**
 * Runs one shell command to completion. Implementations never reject:
 * spawn errors, non-zero exits and timeouts all come back as
 * `success: false`.
 */
export type CommandRunner = (command: string, options?: RunOptions) => Promise<RunResult>;

/**
 * Run a shell command, capturing combined output.
 */
export function runCommand(command: string, options: RunOptions = {}): Promise<RunResult> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS;

  logger.debug("[Runner] Running command", { command, cwd: options.cwd });

  return new Promise((resolve) => {
    exec(
      command,
      {
        cwd: options.cwd,
        encoding: "utf-8",
        timeout: timeoutMs,
        maxBuffer: 10 * 1024 * 1024, // 10MB buffer
      },
      (error, stdout, stderr) => {
        const combined = `${stdout}${stderr}`;
        const output = options.untrimmed ? combined : combined.trim();

        if (!error) {
          resolve({ success: true, output, timedOut: false });
          return;
        }

        if (error.killed && error.signal === "SIGTERM") {
          logger.warn("[Runner] Command timed out", { command, timeoutMs });
          resolve({ success: false, output: TIMED_OUT_MESSAGE, timedOut: true });
          return;
        }

        logger.debug("[Runner] Command failed", { command, code: error.code });
        resolve({ success: false, output: output || error.message, timedOut: false });
      }
    );
  });
}

/**
 * Create a runner whose calls default to the given timeout.
 */
export function createCommandRunner(defaultTimeoutMs: number = DEFAULT_COMMAND_TIMEOUT_MS): CommandRunner {
  return (command, options = {}) =>
    runCommand(command, { ...options, timeoutMs: options.timeoutMs ?? defaultTimeoutMs });
}

// ==================== Shell quoting ====================

const SAFE_SHELL_ARG = /^[A-Za-z0-9_\-.,:/@%+=]+$/;

/**
 * Quote an argument for a POSIX shell. Arguments made only of characters
 * the shell never interprets are returned unchanged.
 */
export function escapeShellArg(arg: string): string {
  if (SAFE_SHELL_ARG.test(arg)) {
    return arg;
  }
  return "'" + arg.replace(/'/g, "'\\''") + "'";
}

/**
 * Quote a path for the remote shell while keeping a leading `~/` outside
 * the quotes, so the remote side still expands it to the home directory.
 */
export function escapeRemotePath(remotePath: string): string {
  if (remotePath === "~") {
    return "~";
  }
  if (remotePath.startsWith("~/")) {
    const rest = remotePath.slice(2);
    return rest ? `~/${escapeShellArg(rest)}` : "~/";
  }
  return escapeShellArg(remotePath);
}

/**
 * Build an `ssh` invocation that runs `remoteCommand` on `host`.
 */
export function remoteShellCommand(host: string, remoteCommand: string, sshOptions: string[] = []): string {
  return ["ssh", ...sshOptions.map(escapeShellArg), escapeShellArg(host), escapeShellArg(remoteCommand)].join(" ");
}
