export {
  PROJECT_CONFIG_FILENAME,
  projectConfigSchema,
  projectTitleSchema,
  type ProjectConfig
} from "./domain/project-config.js";
export { ConfigError, InvalidProjectConfigError, ProjectConfigNotFoundError } from "./errors.js";
