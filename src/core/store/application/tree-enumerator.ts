import type { FileSystemPort } from "../../ports/file-system.port.js";
import type { PathPort } from "../../ports/path.port.js";
import { PATH_SEPARATOR, type RelativePath } from "../domain/relative-path.js";
import { StoreIoError, errnoOf } from "../errors.js";

interface TreeEnumeratorDeps {
  fileSystem: FileSystemPort;
  pathPort: PathPort;
  rootPath: string;
}

interface PendingDirectory {
  /** Key prefix of entries found in `directory`, ending in a separator except for the root. */
  prefix: string;
  directory: string;
}

const PSEUDO_ENTRIES = new Set([".", ".."]);

/**
 * Walks the save directory breadth-first and reports every regular file as a
 * key relative to the root, in discovery order. Symlinks and special files are
 * skipped.
 */
export class TreeEnumerator {
  private readonly fileSystem: FileSystemPort;
  private readonly pathPort: PathPort;
  private readonly rootPath: string;

  public constructor(deps: TreeEnumeratorDeps) {
    this.fileSystem = deps.fileSystem;
    this.pathPort = deps.pathPort;
    this.rootPath = deps.rootPath;
  }

  public async list(): Promise<RelativePath[]> {
    const files: RelativePath[] = [];
    const pending: PendingDirectory[] = [{ prefix: "", directory: this.rootPath }];

    for (let cursor = 0; cursor < pending.length; cursor += 1) {
      const current = pending[cursor];
      if (!current) {
        break;
      }
      const { prefix, directory } = current;

      try {
        for await (const name of this.fileSystem.listEntries(directory)) {
          if (PSEUDO_ENTRIES.has(name)) {
            continue;
          }

          const entryPath = this.pathPort.join(directory, name);
          const kind = await this.fileSystem.entryKind(entryPath);
          if (kind === "file") {
            files.push(`${prefix}${name}`);
          } else if (kind === "directory") {
            pending.push({ prefix: `${prefix}${name}${PATH_SEPARATOR}`, directory: entryPath });
          }
        }
      } catch (error) {
        if (prefix === "" && errnoOf(error) === "ENOENT") {
          return [];
        }
        throw new StoreIoError("list", directory, error);
      }
    }

    return files;
  }
}
