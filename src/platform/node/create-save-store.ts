import { InvalidProjectConfigError, projectTitleSchema } from "../../core/config/index.js";
import type { Logger } from "../../core/logging/index.js";
import type { SavePathProvider } from "../../core/ports/save-path.port.js";
import type { CodecRegistry } from "../../core/store/codecs/index.js";
import { SaveStore } from "../../core/store/index.js";
import { NodeFileSystem } from "./node-file-system.js";
import { createNodeLogger } from "./node-logger.js";
import { NodePathPort, NodeSavePathProvider } from "./node-path.port.js";
import { loadProjectConfig, type LoadProjectConfigParams } from "./project-config.loader.js";

export interface CreateSaveStoreOptions {
  projectTitle: string;
  pathsProvider?: SavePathProvider;
  logger?: Logger;
  codecs?: CodecRegistry;
  structuredExtensions?: readonly string[];
}

/**
 * Resolves the project's save directory once and returns the store that owns
 * it. Create one per process and share it.
 */
export function createSaveStore(options: CreateSaveStoreOptions): SaveStore {
  const title = projectTitleSchema.safeParse(options.projectTitle);
  if (!title.success) {
    throw new InvalidProjectConfigError("projectTitle", title.error.issues[0]?.message ?? "invalid value");
  }

  const pathsProvider = options.pathsProvider ?? new NodeSavePathProvider();
  return new SaveStore({
    projectTitle: title.data,
    rootPath: pathsProvider.resolveRoot(title.data),
    fileSystem: new NodeFileSystem(),
    pathPort: new NodePathPort(),
    logger: options.logger ?? createNodeLogger(),
    codecs: options.codecs,
    structuredExtensions: options.structuredExtensions
  });
}

export interface OpenProjectStoreOptions extends LoadProjectConfigParams {
  pathsProvider?: SavePathProvider;
  logger?: Logger;
}

export async function openProjectStore(options: OpenProjectStoreOptions = {}): Promise<SaveStore> {
  const config = await loadProjectConfig(options);
  return createSaveStore({
    projectTitle: config.project.title,
    pathsProvider: options.pathsProvider ?? new NodeSavePathProvider({ env: options.env, cwd: options.cwd }),
    logger: options.logger ?? createNodeLogger({ env: options.env })
  });
}
