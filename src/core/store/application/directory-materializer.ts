import type { Logger } from "../../logging/index.js";
import type { EntryKind, FileSystemPort } from "../../ports/file-system.port.js";
import type { PathPort } from "../../ports/path.port.js";
import { splitRelativePath, type RelativePath } from "../domain/relative-path.js";
import { fail, succeed, type StoreResult } from "../domain/store-result.js";
import { StoreIoError, errnoOf } from "../errors.js";

interface DirectoryMaterializerDeps {
  fileSystem: FileSystemPort;
  pathPort: PathPort;
  rootPath: string;
  logger: Logger;
}

/**
 * Creates the ancestor directories of a key, root first. Each directory is
 * created on its own: by the time a segment is reached its parent was either
 * found or created by the previous step.
 */
export class DirectoryMaterializer {
  private readonly fileSystem: FileSystemPort;
  private readonly pathPort: PathPort;
  private readonly rootPath: string;
  private readonly logger: Logger;

  public constructor(deps: DirectoryMaterializerDeps) {
    this.fileSystem = deps.fileSystem;
    this.pathPort = deps.pathPort;
    this.rootPath = deps.rootPath;
    this.logger = deps.logger;
  }

  public async ensureDirectories(path: RelativePath): Promise<StoreResult<void>> {
    try {
      await this.fileSystem.ensureDirectory(this.rootPath);
    } catch (error) {
      return fail(new StoreIoError("create directory", this.rootPath, error));
    }

    let current = this.rootPath;
    for (const segment of splitRelativePath(path).directories) {
      current = this.pathPort.join(current, segment);
      const ensured = await this.ensureDirectory(current);
      if (!ensured.ok) {
        return ensured;
      }
    }

    return succeed(undefined);
  }

  private async ensureDirectory(directory: string): Promise<StoreResult<void>> {
    let kind: EntryKind | undefined;
    try {
      kind = await this.fileSystem.entryKind(directory);
    } catch (error) {
      return fail(new StoreIoError("inspect", directory, error));
    }

    if (kind === "directory") {
      return succeed(undefined);
    }
    if (kind !== undefined) {
      return fail(new StoreIoError("create directory", directory, notADirectory()));
    }

    try {
      await this.fileSystem.createDirectory(directory);
    } catch (error) {
      if (errnoOf(error) === "EEXIST" && (await this.isDirectory(directory))) {
        return succeed(undefined);
      }
      return fail(new StoreIoError("create directory", directory, error));
    }

    this.logger.debug("Created directory", { path: directory });
    return succeed(undefined);
  }

  private async isDirectory(path: string): Promise<boolean> {
    try {
      return (await this.fileSystem.entryKind(path)) === "directory";
    } catch {
      return false;
    }
  }
}

function notADirectory(): NodeJS.ErrnoException {
  const error: NodeJS.ErrnoException = new Error("an entry that is not a directory is in the way");
  error.code = "ENOTDIR";
  return error;
}
