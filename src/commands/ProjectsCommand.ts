import { BaseCommand } from "./BaseCommand.js";
import type { CommandContext, CommandResult } from "./types.js";
import { t } from "../i18n/index.js";

/**
 * Lists configured projects, marking the selected one.
 */
export class ProjectsCommand extends BaseCommand {
  readonly name = "projects";
  aliases = ["ls"];
  get description() { return t('commands:projects.description'); }
  readonly usage = "/projects";

  async execute(_args: string[], context: CommandContext): Promise<CommandResult> {
    const projects = context.store.list();
    if (projects.length === 0) {
      return this.info(t('commands:projects.empty'));
    }

    const current = context.store.current()?.name;
    const lines = projects.map((project) => {
      const marker = project.name === current ? "*" : " ";
      return `${marker} ${project.name}  ${project.localPath} -> ${project.remoteHost}:${project.remotePath} (${project.gitBranch})`;
    });

    return this.info(`${t('commands:projects.title', { count: projects.length })}\n${lines.join("\n")}`);
  }
}

export const projectsCommand = new ProjectsCommand();
