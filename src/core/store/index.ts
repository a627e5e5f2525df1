export { SaveStore, type SaveStoreDeps } from "./application/save-store.js";
export { DirectoryMaterializer } from "./application/directory-materializer.js";
export { TreeEnumerator } from "./application/tree-enumerator.js";
export {
  PATH_SEPARATOR,
  extensionOf,
  joinPathComponents,
  splitRelativePath,
  type PathComponents,
  type RelativePath
} from "./domain/relative-path.js";
export { DEFAULT_STRUCTURED_EXTENSIONS, selectCodecKind, type CodecKind } from "./domain/codec-kind.js";
export { fail, succeed, type StoreResult } from "./domain/store-result.js";
export * from "./codecs/index.js";
export * from "./errors.js";
