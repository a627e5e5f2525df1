export * from "./core/store/index.js";
export * from "./core/logging/index.js";
export * from "./core/config/index.js";
export type { EntryKind, FileHandlePort, FileSystemPort, OpenMode } from "./core/ports/file-system.port.js";
export type { PathPort } from "./core/ports/path.port.js";
export type { SavePathProvider } from "./core/ports/save-path.port.js";
export { NodeFileSystem } from "./platform/node/node-file-system.js";
export { NodePathPort, NodeSavePathProvider, DATA_DIR_ENV, type NodeSavePathProviderOptions } from "./platform/node/node-path.port.js";
export { createNodeLogger, LOG_FORMAT_ENV, LOG_LEVEL_ENV, type NodeLogFormat, type NodeLoggerOptions } from "./platform/node/node-logger.js";
export { loadProjectConfig, PROJECT_TITLE_ENV, type LoadProjectConfigParams } from "./platform/node/project-config.loader.js";
export {
  createSaveStore,
  openProjectStore,
  type CreateSaveStoreOptions,
  type OpenProjectStoreOptions
} from "./platform/node/create-save-store.js";
