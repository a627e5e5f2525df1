export type SaveStoreErrorCode = "NOT_FOUND" | "IO_FAILED" | "ENCODE_FAILED" | "DECODE_FAILED";

export class SaveStoreError extends Error {
  public readonly code: SaveStoreErrorCode;

  public constructor(code: SaveStoreErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
    this.code = code;
  }
}

export class EntryNotFoundError extends SaveStoreError {
  public readonly path: string;

  public constructor(path: string) {
    super("NOT_FOUND", `${path}: No such file or directory`);
    this.path = path;
  }
}

export class StoreIoError extends SaveStoreError {
  public readonly path: string;
  public readonly errno?: string;

  public constructor(action: string, path: string, cause: unknown) {
    super("IO_FAILED", `Failed to ${action} ${path}: ${describeCause(cause)}`, { cause });
    this.path = path;
    this.errno = errnoOf(cause);
  }
}

export class EncodeError extends SaveStoreError {
  public constructor(path: string, codecName: string, cause: unknown) {
    super("ENCODE_FAILED", `Cannot encode ${path} as ${codecName}: ${describeCause(cause)}`, { cause });
  }
}

export class DecodeError extends SaveStoreError {
  public constructor(path: string, codecName: string, cause: unknown) {
    super("DECODE_FAILED", `Cannot decode ${path} as ${codecName}: ${describeCause(cause)}`, { cause });
  }
}

export function errnoOf(error: unknown): string | undefined {
  if (typeof error !== "object" || error === null || !("code" in error)) {
    return undefined;
  }
  return typeof error.code === "string" ? error.code : undefined;
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
