import type { CliCommand } from "../framework/command.js";

export const listCommand: CliCommand = {
  path: ["list"],
  usage: "list",
  description: "List every stored path, breadth-first.",
  async run(_args, context): Promise<number> {
    const store = await context.openStore();
    const paths = await store.list();

    if (paths.length === 0) {
      context.stderr.write(`No entries stored under ${store.rootPath}\n`);
      return 0;
    }

    for (const path of paths) {
      context.stdout.write(`${path}\n`);
    }
    return 0;
  }
};
