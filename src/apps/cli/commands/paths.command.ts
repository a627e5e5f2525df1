import type { CliCommand } from "../framework/command.js";

export const pathsCommand: CliCommand = {
  path: ["paths"],
  usage: "paths",
  description: "Print the project title and its save directory.",
  async run(_args, context): Promise<number> {
    const store = await context.openStore();
    context.stdout.write(`Project: ${store.projectTitle}\n`);
    context.stdout.write(`Root: ${store.rootPath}\n`);
    return 0;
  }
};
