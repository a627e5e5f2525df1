import type { CliCommand } from "../framework/command.js";

export const writeCommand: CliCommand = {
  path: ["write"],
  usage: "write <path> <json>",
  description: "Parse a JSON value and store it at the path.",
  async run(args, context): Promise<number> {
    const [path, ...valueTokens] = args;
    if (path === undefined || valueTokens.length === 0) {
      context.stderr.write("Usage: savekeep write <path> <json>\n");
      return 2;
    }

    let value: unknown;
    try {
      value = JSON.parse(valueTokens.join(" "));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      context.stderr.write(`Invalid JSON value: ${message}\n`);
      return 2;
    }

    const store = await context.openStore();
    const result = await store.write(path, value);
    if (!result.ok) {
      context.stderr.write(`${result.error.message}\n`);
      return 1;
    }

    context.stdout.write(`Wrote ${path}\n`);
    return 0;
  }
};
