import { jsonCodec } from "./json.codec.js";
import type { CodecRegistry } from "./store-codec.js";
import { v8Codec } from "./v8.codec.js";

export { JsonCodec, jsonCodec, jsonValueSchema, type JsonValue } from "./json.codec.js";
export { V8Codec, v8Codec } from "./v8.codec.js";
export type { CodecRegistry, StoreCodec } from "./store-codec.js";

export const DEFAULT_CODECS: CodecRegistry = {
  structured: jsonCodec,
  opaque: v8Codec
};
