import type { SaveStore } from "../../core/store/index.js";
import { openProjectStore } from "../../platform/node/create-save-store.js";
import { existsCommand } from "./commands/exists.command.js";
import { listCommand } from "./commands/list.command.js";
import { pathsCommand } from "./commands/paths.command.js";
import { readCommand } from "./commands/read.command.js";
import { writeCommand } from "./commands/write.command.js";
import type { CliCommand } from "./framework/command.js";
import { CommandRouter } from "./framework/router.js";

export const CLI_COMMANDS: CliCommand[] = [pathsCommand, listCommand, existsCommand, readCommand, writeCommand];

export async function runCli(argv: string[]): Promise<number> {
  let store: Promise<SaveStore> | undefined;

  const router = new CommandRouter(CLI_COMMANDS, {
    openStore: () => {
      store ??= openProjectStore();
      return store;
    },
    stdout: process.stdout,
    stderr: process.stderr
  });

  return router.dispatch(argv);
}
