import type { SaveStore } from "../../../core/store/index.js";

export type CliStore = Pick<SaveStore, "projectTitle" | "rootPath" | "read" | "write" | "exists" | "list" | "codecFor">;

export interface CliContext {
  /** Opened on first use so that `help` works without a configured project. */
  openStore(): Promise<CliStore>;
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
}

export interface CliCommand {
  path: string[];
  usage: string;
  description: string;
  run(args: string[], context: CliContext): Promise<number>;
}
