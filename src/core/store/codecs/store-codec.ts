import type { CodecKind } from "../domain/codec-kind.js";

/**
 * Converts values to and from the bytes of a single save file. Implementations
 * throw on values or bytes they cannot handle; the store wraps those failures in
 * `EncodeError` and `DecodeError`.
 */
export interface StoreCodec {
  readonly kind: CodecKind;
  readonly name: string;
  encode(value: unknown): Uint8Array;
  decode(bytes: Uint8Array): unknown;
}

export type CodecRegistry = Readonly<Record<CodecKind, StoreCodec>>;
