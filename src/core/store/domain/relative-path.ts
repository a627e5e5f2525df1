export const PATH_SEPARATOR = "/";

/**
 * A store key such as `profiles/slot-1/progress.json`. Keys are relative to the
 * project's root save directory and never start with a separator.
 */
export type RelativePath = string;

export interface PathComponents {
  directories: string[];
  leaf: string;
}

/**
 * Splits a key into the directories that must exist before the leaf file can be
 * written. A key without separators has no directories; a trailing separator
 * yields an empty leaf.
 */
export function splitRelativePath(path: RelativePath): PathComponents {
  const directories: string[] = [];
  let start = 0;
  let separator = path.indexOf(PATH_SEPARATOR, start);

  while (separator !== -1) {
    directories.push(path.slice(start, separator));
    start = separator + 1;
    separator = path.indexOf(PATH_SEPARATOR, start);
  }

  return {
    directories,
    leaf: path.slice(start)
  };
}

export function joinPathComponents(components: PathComponents): RelativePath {
  return [...components.directories, components.leaf].join(PATH_SEPARATOR);
}

/** Suffix after the final `.` of the leaf, or `undefined` when the leaf has none. */
export function extensionOf(path: RelativePath): string | undefined {
  const { leaf } = splitRelativePath(path);
  const dot = leaf.lastIndexOf(".");
  if (dot === -1) {
    return undefined;
  }
  return leaf.slice(dot + 1);
}
