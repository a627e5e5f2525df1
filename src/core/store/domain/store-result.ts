import type { SaveStoreError } from "../errors.js";

export type StoreResult<T> =
  | {
      ok: true;
      value: T;
    }
  | {
      ok: false;
      error: SaveStoreError;
    };

export function succeed<T>(value: T): StoreResult<T> {
  return { ok: true, value };
}

export function fail<T = never>(error: SaveStoreError): StoreResult<T> {
  return { ok: false, error };
}
