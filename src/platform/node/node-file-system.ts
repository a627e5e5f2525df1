import { lstat, mkdir, open, opendir, type FileHandle } from "node:fs/promises";
import { errnoOf } from "../../core/store/errors.js";
import type { EntryKind, FileHandlePort, FileSystemPort, OpenMode } from "../../core/ports/file-system.port.js";

export class NodeFileSystem implements FileSystemPort {
  public async entryKind(path: string): Promise<EntryKind | undefined> {
    try {
      const stats = await lstat(path);
      if (stats.isFile()) {
        return "file";
      }
      if (stats.isDirectory()) {
        return "directory";
      }
      return "other";
    } catch (error) {
      if (isMissing(error)) {
        return undefined;
      }
      throw error;
    }
  }

  public createDirectory(path: string): Promise<void> {
    return mkdir(path);
  }

  public async ensureDirectory(path: string): Promise<void> {
    await mkdir(path, { recursive: true });
  }

  public async *listEntries(path: string): AsyncIterable<string> {
    const directory = await opendir(path);
    for await (const entry of directory) {
      yield entry.name;
    }
  }

  public async open(path: string, mode: OpenMode): Promise<FileHandlePort> {
    const handle = await open(path, mode === "read" ? "r" : "w");
    return new NodeFileHandle(handle);
  }
}

class NodeFileHandle implements FileHandlePort {
  private readonly handle: FileHandle;

  public constructor(handle: FileHandle) {
    this.handle = handle;
  }

  public readAll(): Promise<Uint8Array> {
    return this.handle.readFile();
  }

  public async write(bytes: Uint8Array): Promise<void> {
    await this.handle.writeFile(bytes);
  }

  public sync(): Promise<void> {
    return this.handle.datasync();
  }

  public close(): Promise<void> {
    return this.handle.close();
  }
}

// ENOTDIR: a path component that should be a directory is a file, so nothing can exist below it.
function isMissing(error: unknown): boolean {
  const code = errnoOf(error);
  return code === "ENOENT" || code === "ENOTDIR";
}
