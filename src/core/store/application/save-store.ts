import { createNoopLogger, type Logger } from "../../logging/index.js";
import type { FileHandlePort, FileSystemPort, OpenMode } from "../../ports/file-system.port.js";
import type { PathPort } from "../../ports/path.port.js";
import { DEFAULT_CODECS, type CodecRegistry, type StoreCodec } from "../codecs/index.js";
import { DEFAULT_STRUCTURED_EXTENSIONS, selectCodecKind } from "../domain/codec-kind.js";
import type { RelativePath } from "../domain/relative-path.js";
import { fail, succeed, type StoreResult } from "../domain/store-result.js";
import { DecodeError, EncodeError, EntryNotFoundError, StoreIoError, type SaveStoreError } from "../errors.js";
import { DirectoryMaterializer } from "./directory-materializer.js";
import { TreeEnumerator } from "./tree-enumerator.js";

export interface SaveStoreDeps {
  projectTitle: string;
  rootPath: string;
  fileSystem: FileSystemPort;
  pathPort: PathPort;
  logger?: Logger;
  codecs?: CodecRegistry;
  structuredExtensions?: readonly string[];
}

/**
 * Persistent key/value store rooted at a project's save directory. Keys are
 * slash-separated paths relative to `rootPath`; `.json` keys are stored as JSON
 * text and every other key in V8's binary serialization format.
 *
 * `read` and `write` report failures as `{ ok: false, error }` instead of
 * throwing. Operations are not coordinated with each other or with other
 * processes touching the same directory.
 */
export class SaveStore {
  public readonly projectTitle: string;
  public readonly rootPath: string;
  private readonly fileSystem: FileSystemPort;
  private readonly pathPort: PathPort;
  private readonly logger: Logger;
  private readonly codecs: CodecRegistry;
  private readonly structuredExtensions: readonly string[];
  private readonly materializer: DirectoryMaterializer;
  private readonly enumerator: TreeEnumerator;

  public constructor(deps: SaveStoreDeps) {
    this.projectTitle = deps.projectTitle;
    this.rootPath = deps.rootPath;
    this.fileSystem = deps.fileSystem;
    this.pathPort = deps.pathPort;
    this.logger = (deps.logger ?? createNoopLogger()).child({ scope: "save-store" });
    this.codecs = deps.codecs ?? DEFAULT_CODECS;
    this.structuredExtensions = deps.structuredExtensions ?? DEFAULT_STRUCTURED_EXTENSIONS;
    this.materializer = new DirectoryMaterializer({
      fileSystem: this.fileSystem,
      pathPort: this.pathPort,
      rootPath: this.rootPath,
      logger: this.logger
    });
    this.enumerator = new TreeEnumerator({
      fileSystem: this.fileSystem,
      pathPort: this.pathPort,
      rootPath: this.rootPath
    });
  }

  public resolve(path: RelativePath): string {
    return this.pathPort.join(this.rootPath, path);
  }

  public codecFor(path: RelativePath): StoreCodec {
    return this.codecs[selectCodecKind(path, this.structuredExtensions)];
  }

  public async read(path: RelativePath): Promise<StoreResult<unknown>> {
    const absolutePath = this.resolve(path);
    if (!(await this.exists(path))) {
      return this.reject("read", path, new EntryNotFoundError(absolutePath));
    }

    const bytes = await this.withHandle(absolutePath, "read", (handle) => handle.readAll());
    if (!bytes.ok) {
      return this.reject("read", path, bytes.error);
    }

    const codec = this.codecFor(path);
    const decoded = decodeWith(codec, path, bytes.value);
    if (!decoded.ok) {
      return this.reject("read", path, decoded.error);
    }

    this.logger.debug("Read entry", { path, codec: codec.name, bytes: bytes.value.byteLength });
    return decoded;
  }

  public async write(path: RelativePath, value: unknown): Promise<StoreResult<void>> {
    const materialized = await this.materializer.ensureDirectories(path);
    if (!materialized.ok) {
      return this.reject("write", path, materialized.error);
    }

    // Encoding precedes opening so a rejected value leaves the previous file intact.
    const codec = this.codecFor(path);
    const encoded = encodeWith(codec, path, value);
    if (!encoded.ok) {
      return this.reject("write", path, encoded.error);
    }

    const bytes = encoded.value;
    const written = await this.withHandle(this.resolve(path), "write", async (handle) => {
      await handle.write(bytes);
      await handle.sync();
    });
    if (!written.ok) {
      return this.reject("write", path, written.error);
    }

    this.logger.debug("Wrote entry", { path, codec: codec.name, bytes: bytes.byteLength });
    return succeed(undefined);
  }

  /** True when anything, file or directory, exists at the key. Never rejects. */
  public async exists(path: RelativePath): Promise<boolean> {
    try {
      return (await this.fileSystem.entryKind(this.resolve(path))) !== undefined;
    } catch (error) {
      this.logger.debug("Treating unreadable entry as absent", {
        path,
        reason: error instanceof Error ? error.message : String(error)
      });
      return false;
    }
  }

  /**
   * Every stored file as a key, breadth-first. Resolves to an empty list when the
   * save directory does not exist yet; other listing failures reject with
   * `StoreIoError`.
   */
  public list(): Promise<RelativePath[]> {
    return this.enumerator.list();
  }

  private async withHandle<T>(
    absolutePath: string,
    mode: OpenMode,
    action: (handle: FileHandlePort) => Promise<T>
  ): Promise<StoreResult<T>> {
    let handle: FileHandlePort;
    try {
      handle = await this.fileSystem.open(absolutePath, mode);
    } catch (error) {
      return fail(new StoreIoError("open", absolutePath, error));
    }

    let outcome: StoreResult<T>;
    try {
      outcome = succeed(await action(handle));
    } catch (error) {
      outcome = fail(new StoreIoError(mode, absolutePath, error));
    }

    try {
      await handle.close();
    } catch (error) {
      const closeError = new StoreIoError("close", absolutePath, error);
      if (outcome.ok) {
        return fail(closeError);
      }
      this.logger.warn(closeError.message, { path: absolutePath });
    }

    return outcome;
  }

  private reject<T>(operation: "read" | "write", path: RelativePath, error: SaveStoreError): StoreResult<T> {
    this.logger.warn(`Failed to ${operation} entry`, { path, code: error.code, reason: error.message });
    return fail(error);
  }
}

function encodeWith(codec: StoreCodec, path: RelativePath, value: unknown): StoreResult<Uint8Array> {
  try {
    return succeed(codec.encode(value));
  } catch (error) {
    return fail(new EncodeError(path, codec.name, error));
  }
}

function decodeWith(codec: StoreCodec, path: RelativePath, bytes: Uint8Array): StoreResult<unknown> {
  try {
    return succeed(codec.decode(bytes));
  } catch (error) {
    return fail(new DecodeError(path, codec.name, error));
  }
}
