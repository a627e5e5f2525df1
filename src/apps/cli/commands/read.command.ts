import { inspect } from "node:util";
import type { CliCommand } from "../framework/command.js";

export const readCommand: CliCommand = {
  path: ["read"],
  usage: "read <path>",
  description: "Print a stored value.",
  async run(args, context): Promise<number> {
    const [path] = args;
    if (path === undefined || args.length !== 1) {
      context.stderr.write("Usage: savekeep read <path>\n");
      return 2;
    }

    const store = await context.openStore();
    const result = await store.read(path);
    if (!result.ok) {
      context.stderr.write(`${result.error.message}\n`);
      return 1;
    }

    const rendered =
      store.codecFor(path).kind === "structured"
        ? JSON.stringify(result.value, null, 2)
        : inspect(result.value, { depth: null });
    context.stdout.write(`${rendered}\n`);
    return 0;
  }
};
