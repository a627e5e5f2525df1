import { mkdir, readFile, stat, symlink, writeFile } from "node:fs/promises";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { createNoopLogger } from "../../src/core/logging/index.js";
import { EntryNotFoundError, StoreIoError, type SaveStore } from "../../src/core/store/index.js";
import { createSaveStore } from "../../src/platform/node/create-save-store.js";
import { useTempDirs } from "../helpers/temp-dir.js";

const createTempDir = useTempDirs("savekeep-store-");

async function createStore(): Promise<SaveStore> {
  const dataDir = await createTempDir();
  return createSaveStore({
    projectTitle: "Test Game",
    pathsProvider: { resolveRoot: (title) => path.join(dataDir, title) },
    logger: createNoopLogger()
  });
}

describe("SaveStore on the local filesystem", () => {
  it("resolves the root once from the project title", async () => {
    const store = await createStore();

    expect(path.basename(store.rootPath)).toBe("Test Game");
    expect(store.projectTitle).toBe("Test Game");
  });

  it("round-trips a JSON value tree through a .json key", async () => {
    const store = await createStore();
    const value = { player: { name: "Ada", hp: 12.5 }, flags: [true, false, null] };

    expect(await store.write("slots/1/state.json", value)).toEqual({ ok: true, value: undefined });
    expect(await store.read("slots/1/state.json")).toEqual({ ok: true, value });

    const text = await readFile(path.join(store.rootPath, "slots", "1", "state.json"), "utf8");
    expect(JSON.parse(text)).toEqual(value);
  });

  it("round-trips engine-native values through an opaque key", async () => {
    const store = await createStore();
    const value = { unlocked: new Set([1, 2]), coins: 12345678901234567890n, at: new Date(86_400_000) };

    await store.write("world.bin", value);

    expect(await store.read("world.bin")).toEqual({ ok: true, value });
  });

  it("uses the opaque codec for keys without an extension", async () => {
    const store = await createStore();
    const value = new Map([["volume", 7n]]);

    expect(await store.write("settings", value)).toEqual({ ok: true, value: undefined });
    expect(await store.read("settings")).toEqual({ ok: true, value });
  });

  it("reports existence only after a write", async () => {
    const store = await createStore();

    expect(await store.exists("profile.json")).toBe(false);
    await store.write("profile.json", { name: "Ada" });
    expect(await store.exists("profile.json")).toBe(true);
  });

  it("fails reads of keys that do not exist", async () => {
    const store = await createStore();

    const result = await store.read("nope/never.bin");

    expect(await store.exists("nope/never.bin")).toBe(false);
    expect(result.ok).toBe(false);
    if (result.ok) {
      return;
    }
    expect(result.error).toBeInstanceOf(EntryNotFoundError);
    expect(result.error.message).toBe(`${path.join(store.rootPath, "nope", "never.bin")}: No such file or directory`);
  });

  it("materializes intermediate directories and lists the file once", async () => {
    const store = await createStore();

    await store.write("a/b/c.json", { ok: 1 });

    expect(await store.exists("a")).toBe(true);
    expect(await store.exists("a/b")).toBe(true);
    expect((await stat(path.join(store.rootPath, "a", "b"))).isDirectory()).toBe(true);
    expect(await store.list()).toEqual(["a/b/c.json"]);
  });

  it("lists nothing for a root that was never written", async () => {
    const store = await createStore();

    expect(await store.list()).toEqual([]);
  });

  it("lists every stored file exactly once", async () => {
    const store = await createStore();

    await store.write("x.bin", 1);
    await store.write("d/y.bin", 2);
    await store.write("d/e/z.json", 3);

    const listed = await store.list();
    expect([...listed].sort()).toEqual(["d/e/z.json", "d/y.bin", "x.bin"]);
    expect(listed.indexOf("d/y.bin")).toBeLessThan(listed.indexOf("d/e/z.json"));
  });

  it("overwrites previous values", async () => {
    const store = await createStore();

    await store.write("slot.json", { level: 1, extra: "will disappear" });
    await store.write("slot.json", { level: 2 });

    expect(await store.read("slot.json")).toEqual({ ok: true, value: { level: 2 } });
    expect(await store.list()).toEqual(["slot.json"]);
  });

  it("skips symlinks when listing", async () => {
    const store = await createStore();
    await store.write("real.bin", "data");
    await symlink(path.join(store.rootPath, "real.bin"), path.join(store.rootPath, "alias.bin"));

    expect(await store.list()).toEqual(["real.bin"]);
  });

  it("fails writes below a plain file with ENOTDIR", async () => {
    const store = await createStore();
    await mkdir(store.rootPath, { recursive: true });
    await writeFile(path.join(store.rootPath, "profiles"), "not a directory");

    const result = await store.write("profiles/slot.json", {});

    expect(result.ok).toBe(false);
    if (result.ok) {
      return;
    }
    expect(result.error).toBeInstanceOf(StoreIoError);
    expect(result.error).toMatchObject({ errno: "ENOTDIR", path: path.join(store.rootPath, "profiles") });
  });

  it("fails reads of a directory with an I/O error", async () => {
    const store = await createStore();
    await store.write("folder/inner.bin", 1);

    const result = await store.read("folder");

    expect(result.ok).toBe(false);
    if (result.ok) {
      return;
    }
    expect(result.error).toBeInstanceOf(StoreIoError);
    expect(result.error).toMatchObject({ errno: "EISDIR" });
  });
});
