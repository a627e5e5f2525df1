import { writeFile } from "node:fs/promises";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { ConfigError, InvalidProjectConfigError, ProjectConfigNotFoundError } from "../../src/core/config/index.js";
import { createNoopLogger } from "../../src/core/logging/index.js";
import { createSaveStore, openProjectStore } from "../../src/platform/node/create-save-store.js";
import { loadProjectConfig } from "../../src/platform/node/project-config.loader.js";
import { useTempDirs } from "../helpers/temp-dir.js";

const createTempDir = useTempDirs("savekeep-config-");

describe("loadProjectConfig", () => {
  it("reads the title from savekeep.json", async () => {
    const cwd = await createTempDir();
    await writeFile(path.join(cwd, "savekeep.json"), JSON.stringify({ project: { title: "  Star Miner " } }), "utf8");

    expect(await loadProjectConfig({ cwd, env: {} })).toEqual({ project: { title: "Star Miner" } });
  });

  it("prefers SAVEKEEP_PROJECT over the file", async () => {
    const cwd = await createTempDir();
    await writeFile(path.join(cwd, "savekeep.json"), JSON.stringify({ project: { title: "From File" } }), "utf8");

    const config = await loadProjectConfig({ cwd, env: { SAVEKEEP_PROJECT: "From Env" } });

    expect(config.project.title).toBe("From Env");
  });

  it("explains how to configure a missing title", async () => {
    const cwd = await createTempDir();

    const loading = loadProjectConfig({ cwd, env: {} });

    await expect(loading).rejects.toBeInstanceOf(ProjectConfigNotFoundError);
    await expect(loading).rejects.toThrow(
      `No project title configured. Create ${path.join(cwd, "savekeep.json")} or set SAVEKEEP_PROJECT.`
    );
  });

  it("rejects malformed JSON", async () => {
    const cwd = await createTempDir();
    const configPath = path.join(cwd, "savekeep.json");
    await writeFile(configPath, "{ project", "utf8");

    await expect(loadProjectConfig({ cwd, env: {} })).rejects.toThrow(
      `Invalid project configuration in ${configPath}: invalid JSON.`
    );
  });

  it("names the offending field", async () => {
    const cwd = await createTempDir();
    const configPath = path.join(cwd, "savekeep.json");
    await writeFile(configPath, JSON.stringify({ project: { title: "a/b" } }), "utf8");

    await expect(loadProjectConfig({ cwd, env: {} })).rejects.toThrow(
      `Invalid project configuration in ${configPath}: project.title: must not contain path separators.`
    );
  });

  it("reports a missing title field", async () => {
    const cwd = await createTempDir();
    const configPath = path.join(cwd, "savekeep.json");
    await writeFile(configPath, JSON.stringify({ project: {} }), "utf8");

    await expect(loadProjectConfig({ cwd, env: {} })).rejects.toThrow(
      `Invalid project configuration in ${configPath}: project.title: Required.`
    );
  });

  it("validates the environment override", async () => {
    const cwd = await createTempDir();

    const loading = loadProjectConfig({ cwd, env: { SAVEKEEP_PROJECT: ".." } });

    await expect(loading).rejects.toBeInstanceOf(InvalidProjectConfigError);
    await expect(loading).rejects.toThrow(
      "Invalid project configuration in SAVEKEEP_PROJECT: must not be a relative directory name."
    );
  });
});

describe("createSaveStore", () => {
  it("rejects titles that would escape the data directory", () => {
    expect(() => createSaveStore({ projectTitle: "../other", logger: createNoopLogger() })).toThrow(ConfigError);
  });

  it("places the root under SAVEKEEP_DATA_DIR when opened from configuration", async () => {
    const cwd = await createTempDir();
    const dataDir = await createTempDir();

    const store = await openProjectStore({
      cwd,
      env: { SAVEKEEP_PROJECT: "Star Miner", SAVEKEEP_DATA_DIR: dataDir },
      logger: createNoopLogger()
    });

    expect(store.projectTitle).toBe("Star Miner");
    expect(store.rootPath).toBe(path.join(dataDir, "Star Miner"));
  });
});
