export type EntryKind = "file" | "directory" | "other";

export type OpenMode = "read" | "write";

export interface FileHandlePort {
  readAll(): Promise<Uint8Array>;
  write(bytes: Uint8Array): Promise<void>;
  /** Forces written bytes to stable storage. */
  sync(): Promise<void>;
  close(): Promise<void>;
}

export interface FileSystemPort {
  /** Resolves to `undefined` when nothing exists at `path`. Symlinks report as "other". */
  entryKind(path: string): Promise<EntryKind | undefined>;
  /** Creates a single directory; the parent must already exist. */
  createDirectory(path: string): Promise<void>;
  ensureDirectory(path: string): Promise<void>;
  listEntries(path: string): AsyncIterable<string>;
  /** "write" creates the file when absent and truncates it otherwise. */
  open(path: string, mode: OpenMode): Promise<FileHandlePort>;
}
