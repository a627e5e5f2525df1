import { extensionOf, type RelativePath } from "./relative-path.js";

export type CodecKind = "structured" | "opaque";

export const DEFAULT_STRUCTURED_EXTENSIONS: readonly string[] = ["json"];

/**
 * Keys whose extension is a recognized structured format are stored as text;
 * everything else, including keys without an extension, is stored opaquely.
 * Matching is exact and case-sensitive.
 */
export function selectCodecKind(
  path: RelativePath,
  structuredExtensions: readonly string[] = DEFAULT_STRUCTURED_EXTENSIONS
): CodecKind {
  const extension = extensionOf(path);
  if (extension !== undefined && structuredExtensions.includes(extension)) {
    return "structured";
  }
  return "opaque";
}
