import fs from "node:fs/promises";
import path from "node:path";
import { t } from "../i18n/index.js";
import { getProjectsPath } from "../utils/config.js";
import { ErrorCode, FileSystemError, SyncPairError, ValidationError } from "../utils/errors.js";
import { getLogger } from "../utils/logger.js";
import { fromStored, ProjectsFileSchema, toStored, validateProjectInput } from "./schema.js";
import type { Project, ProjectInput } from "./types.js";

const logger = getLogger();

/**
 * The list of configured projects plus the current selection.
 *
 * Every mutation is validated first and then written through to disk, so
 * the file and the in-memory list never disagree after a successful call.
 */
export class ProjectStore {
  private readonly filePath: string;
  private projects: Project[] = [];
  private selectedName: string | null = null;

  constructor(filePath: string = getProjectsPath()) {
    this.filePath = filePath;
  }

  /**
   * Read the project file. A missing, unreadable or malformed file leaves
   * the store empty.
   */
  async load(): Promise<Project[]> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, "utf-8");
    } catch (error) {
      logger.debug("[Projects] No project file, starting empty", { path: this.filePath, error: String(error) });
      this.projects = [];
      return this.list();
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      logger.warn("[Projects] Project file is not valid JSON, starting empty", { path: this.filePath, error: String(error) });
      this.projects = [];
      return this.list();
    }

    const result = ProjectsFileSchema.safeParse(parsed);
    if (!result.success) {
      logger.warn("[Projects] Project file has an unexpected shape, starting empty", {
        path: this.filePath,
        issue: result.error.issues[0]?.message,
      });
      this.projects = [];
      return this.list();
    }

    this.projects = result.data.projects.map(fromStored);
    if (this.selectedName && !this.get(this.selectedName)) {
      this.selectedName = null;
    }
    logger.info("[Projects] Loaded projects", { count: this.projects.length });
    return this.list();
  }

  /**
   * @throws {FileSystemError} When the file cannot be written
   */
  async save(): Promise<void> {
    await this.write(this.projects);
  }

  list(): Project[] {
    return [...this.projects];
  }

  get(name: string): Project | undefined {
    return this.projects.find((project) => project.name === name);
  }

  /**
   * @throws {ValidationError} On invalid input or a name already in use
   */
  async add(input: ProjectInput): Promise<Project> {
    const project = validateProjectInput(input);
    this.assertNameFree(project.name);

    await this.commit([...this.projects, project]);
    logger.info("[Projects] Added project", { name: project.name });
    return project;
  }

  /**
   * Replace the project called `originalName`. Renaming is allowed as long
   * as the new name is not taken by another project.
   *
   * @throws {SyncPairError} When no project has that name
   * @throws {ValidationError} On invalid input or a name clash
   */
  async update(originalName: string, input: ProjectInput): Promise<Project> {
    const index = this.indexOf(originalName);
    const project = validateProjectInput(input);
    if (project.name !== originalName) {
      this.assertNameFree(project.name);
    }

    const next = [...this.projects];
    next[index] = project;
    await this.commit(next);

    if (this.selectedName === originalName) {
      this.selectedName = project.name;
    }
    logger.info("[Projects] Updated project", { name: originalName, newName: project.name });
    return project;
  }

  /**
   * @throws {SyncPairError} When no project has that name
   */
  async remove(name: string): Promise<void> {
    this.indexOf(name);
    await this.commit(this.projects.filter((project) => project.name !== name));

    if (this.selectedName === name) {
      this.selectedName = null;
    }
    logger.info("[Projects] Removed project", { name });
  }

  /**
   * @throws {SyncPairError} When no project has that name
   */
  select(name: string): Project {
    const project = this.projects[this.indexOf(name)];
    this.selectedName = project.name;
    return project;
  }

  current(): Project | undefined {
    return this.selectedName ? this.get(this.selectedName) : undefined;
  }

  private indexOf(name: string): number {
    const index = this.projects.findIndex((project) => project.name === name);
    if (index === -1) {
      throw new SyncPairError(ErrorCode.PROJECT_NOT_FOUND, t("errors:validation.project_not_found", { name }));
    }
    return index;
  }

  private assertNameFree(name: string): void {
    if (this.get(name)) {
      throw new ValidationError(
        ErrorCode.VALIDATION_DUPLICATE_NAME,
        t("errors:validation.duplicate_name", { name }),
        { field: "name", value: name }
      );
    }
  }

  private async commit(next: Project[]): Promise<void> {
    await this.write(next);
    this.projects = next;
  }

  private async write(projects: Project[]): Promise<void> {
    const content = JSON.stringify({ projects: projects.map(toStored) }, null, 2) + "\n";
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(this.filePath, content, "utf-8");
    } catch (error) {
      if (error instanceof Error) {
        throw FileSystemError.fromNodeError(error, this.filePath, "write");
      }
      throw error;
    }
  }
}
