import { t } from "../i18n/index.js";
import type { Project } from "../projects/types.js";
import { getLogger } from "../utils/logger.js";
import { remoteShellCommand } from "./commandRunner.js";
import { failed, guardStep, report, reportOutcome, succeeded } from "./outcome.js";
import type { StepOutcome, SyncEnvironment } from "./types.js";

const logger = getLogger();

/** Echoed by the remote shell; its presence proves a working session */
export const CONNECTION_SENTINEL = "connected";

export function buildConnectionTestCommand(env: SyncEnvironment, project: Project): string {
  return remoteShellCommand(project.remoteHost, `echo ${CONNECTION_SENTINEL}`, [
    "-o",
    `ConnectTimeout=${env.settings.sshConnectTimeoutSec}`,
    "-o",
    "BatchMode=yes",
  ]);
}

/**
 * Check that the remote host accepts a non-interactive ssh session.
 */
export function testConnection(env: SyncEnvironment, project: Project): Promise<StepOutcome> {
  return guardStep("test connection", async () => {
    report(env, t("commands:test_ssh.testing"));
    const result = await env.runner(buildConnectionTestCommand(env, project));

    if (result.success && result.output.includes(CONNECTION_SENTINEL)) {
      logger.info("[SSH] Connection ok", { host: project.remoteHost });
      return reportOutcome(env, succeeded(t("commands:test_ssh.success", { host: project.remoteHost })));
    }

    logger.warn("[SSH] Connection failed", { host: project.remoteHost, output: result.output });
    return reportOutcome(env, failed(t("commands:test_ssh.failed", { host: project.remoteHost }), result.output));
  });
}
