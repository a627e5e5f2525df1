import os from "node:os";
import path from "node:path";
import type { PathPort } from "../../core/ports/path.port.js";
import type { SavePathProvider } from "../../core/ports/save-path.port.js";

export const DATA_DIR_ENV = "SAVEKEEP_DATA_DIR";

export class NodePathPort implements PathPort {
  public join(...parts: string[]): string {
    return path.join(...parts);
  }
}

export interface NodeSavePathProviderOptions {
  platform?: NodeJS.Platform;
  env?: NodeJS.ProcessEnv;
  homeDir?: string;
  cwd?: string;
}

/**
 * Per-user application data directories, one subdirectory per project:
 *
 * - Linux and other unixes: `$XDG_DATA_HOME/<title>`, falling back to `~/.local/share/<title>`
 * - macOS: `~/Library/Application Support/<title>`
 * - Windows: `%APPDATA%\<title>`
 *
 * `SAVEKEEP_DATA_DIR` replaces the platform directory.
 */
export class NodeSavePathProvider implements SavePathProvider {
  private readonly platform: NodeJS.Platform;
  private readonly env: NodeJS.ProcessEnv;
  private readonly homeDir: string;
  private readonly cwd: string;

  public constructor(options: NodeSavePathProviderOptions = {}) {
    this.platform = options.platform ?? process.platform;
    this.env = options.env ?? process.env;
    this.homeDir = options.homeDir ?? os.homedir();
    this.cwd = options.cwd ?? process.cwd();
  }

  public resolveRoot(projectTitle: string): string {
    return this.pathApi().join(this.resolveDataDir(), projectTitle);
  }

  public resolveDataDir(): string {
    const pathApi = this.pathApi();
    const override = this.env[DATA_DIR_ENV]?.trim();
    if (override) {
      return this.resolveUserPath(override);
    }

    if (this.platform === "win32") {
      return this.env.APPDATA?.trim() || pathApi.join(this.homeDir, "AppData", "Roaming");
    }

    if (this.platform === "darwin") {
      return pathApi.join(this.homeDir, "Library", "Application Support");
    }

    // Relative XDG paths are invalid and must be ignored.
    const xdgDataHome = this.env.XDG_DATA_HOME?.trim();
    if (xdgDataHome && pathApi.isAbsolute(xdgDataHome)) {
      return xdgDataHome;
    }
    return pathApi.join(this.homeDir, ".local", "share");
  }

  private resolveUserPath(value: string): string {
    const pathApi = this.pathApi();
    if (value === "~") {
      return this.homeDir;
    }
    if (value.startsWith("~/") || value.startsWith("~\\")) {
      return pathApi.join(this.homeDir, value.slice(2));
    }
    return pathApi.resolve(this.cwd, value);
  }

  private pathApi(): path.PlatformPath {
    return this.platform === "win32" ? path.win32 : path.posix;
  }
}
