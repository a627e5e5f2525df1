import { z } from "zod";
import type { StoreCodec } from "./store-codec.js";

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null) {
    return false;
  }
  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}

// Only plain objects map onto JSON objects.
const plainObjectSchema = z.custom<Record<string, unknown>>(isPlainObject, { message: "expected a plain object" });

export const jsonValueSchema: z.ZodType<JsonValue, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.union([
    z.string(),
    z.number().finite(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    plainObjectSchema.pipe(z.record(jsonValueSchema))
  ])
);

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder("utf-8", { fatal: true });

export class JsonCodec implements StoreCodec {
  public readonly kind = "structured";
  public readonly name = "json";

  public encode(value: unknown): Uint8Array {
    // Validated first so values JSON.stringify would drop or coerce are rejected.
    const parsed = jsonValueSchema.safeParse(value);
    if (!parsed.success) {
      throw new Error("value contains a node that JSON cannot represent");
    }
    return textEncoder.encode(JSON.stringify(value, null, 2));
  }

  public decode(bytes: Uint8Array): unknown {
    return JSON.parse(textDecoder.decode(bytes));
  }
}

export const jsonCodec: StoreCodec = new JsonCodec();
