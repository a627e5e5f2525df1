import { describe, expect, it } from "vitest";
import { StoreIoError, TreeEnumerator } from "../../src/core/store/index.js";
import { MemoryFileSystem, errnoError, posixPathPort } from "../helpers/memory-file-system.js";

const ROOT = "/saves/demo";

function createEnumerator(fileSystem: MemoryFileSystem): TreeEnumerator {
  return new TreeEnumerator({ fileSystem, pathPort: posixPathPort, rootPath: ROOT });
}

class UnreadableDirectoryFileSystem extends MemoryFileSystem {
  public readonly unreadable: string;

  public constructor(unreadable: string) {
    super();
    this.unreadable = unreadable;
  }

  public async *listEntries(target: string): AsyncIterable<string> {
    if (target === this.unreadable) {
      throw errnoError("EACCES", `EACCES: permission denied, opendir '${target}'`);
    }
    yield* super.listEntries(target);
  }
}

describe("TreeEnumerator", () => {
  it("reports files breadth-first as root-relative keys", async () => {
    const fileSystem = new MemoryFileSystem();
    fileSystem.putFile(`${ROOT}/x.bin`, "x");
    fileSystem.putFile(`${ROOT}/d/e/z.json`, "{}");
    fileSystem.putFile(`${ROOT}/d/y.bin`, "y");
    fileSystem.putFile(`${ROOT}/w.bin`, "w");
    fileSystem.mkdirp(`${ROOT}/empty`);

    const files = await createEnumerator(fileSystem).list();

    expect(files).toEqual(["x.bin", "w.bin", "d/y.bin", "d/e/z.json"]);
  });

  it("skips entries that are neither files nor directories", async () => {
    const fileSystem = new MemoryFileSystem();
    fileSystem.putSpecial(`${ROOT}/latest`);
    fileSystem.putFile(`${ROOT}/slot-1.bin`, "1");

    expect(await createEnumerator(fileSystem).list()).toEqual(["slot-1.bin"]);
  });

  it("returns an empty list for an empty root", async () => {
    const fileSystem = new MemoryFileSystem();
    fileSystem.mkdirp(ROOT);

    expect(await createEnumerator(fileSystem).list()).toEqual([]);
  });

  it("returns an empty list when the root does not exist", async () => {
    expect(await createEnumerator(new MemoryFileSystem()).list()).toEqual([]);
  });

  it("rejects when a nested directory cannot be listed", async () => {
    const fileSystem = new UnreadableDirectoryFileSystem(`${ROOT}/locked`);
    fileSystem.putFile(`${ROOT}/locked/secret.bin`, "s");

    const listing = createEnumerator(fileSystem).list();

    await expect(listing).rejects.toBeInstanceOf(StoreIoError);
    await expect(listing).rejects.toThrow(
      "Failed to list /saves/demo/locked: EACCES: permission denied, opendir '/saves/demo/locked'"
    );
  });
});
