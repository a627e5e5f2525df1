import { deserialize, serialize } from "node:v8";
import type { StoreCodec } from "./store-codec.js";

/**
 * V8's structured-clone wire format. Carries everything JSON does plus bigint,
 * undefined, Map, Set, Date, RegExp, typed arrays and circular references.
 * Functions and symbols are rejected.
 */
export class V8Codec implements StoreCodec {
  public readonly kind = "opaque";
  public readonly name = "v8";

  public encode(value: unknown): Uint8Array {
    return serialize(value);
  }

  public decode(bytes: Uint8Array): unknown {
    if (bytes.byteLength === 0) {
      throw new Error("file is empty");
    }
    return deserialize(bytes);
  }
}

export const v8Codec: StoreCodec = new V8Codec();
