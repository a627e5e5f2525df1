import type { CliCommand } from "../framework/command.js";

export const existsCommand: CliCommand = {
  path: ["exists"],
  usage: "exists <path>",
  description: "Print yes and exit 0 when the path exists, no and exit 1 otherwise.",
  async run(args, context): Promise<number> {
    const [path] = args;
    if (path === undefined || args.length !== 1) {
      context.stderr.write("Usage: savekeep exists <path>\n");
      return 2;
    }

    const store = await context.openStore();
    const found = await store.exists(path);
    context.stdout.write(found ? "yes\n" : "no\n");
    return found ? 0 : 1;
  }
};
