export { ProjectStore } from "./store.js";
export { validateProjectInput, StoredProjectSchema, ProjectsFileSchema, type StoredProject } from "./schema.js";
export { DEFAULT_GIT_BRANCH, type Project, type ProjectInput } from "./types.js";
