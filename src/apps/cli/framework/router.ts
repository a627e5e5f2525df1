import type { CliCommand, CliContext } from "./command.js";

const HELP_TOKENS = new Set(["help", "--help", "-h"]);

export class CommandRouter {
  private readonly commands: CliCommand[];
  private readonly context: CliContext;

  public constructor(commands: CliCommand[], context: CliContext) {
    this.commands = [...commands].sort((left, right) => right.path.length - left.path.length);
    this.context = context;
  }

  public async dispatch(argv: string[]): Promise<number> {
    const [first] = argv;
    if (first === undefined || HELP_TOKENS.has(first)) {
      this.printHelp(this.context.stdout);
      return 0;
    }

    const match = this.commands.find((command) => startsWith(argv, command.path));
    if (!match) {
      this.context.stderr.write(`Unknown command: ${argv.join(" ")}\n\n`);
      this.printHelp(this.context.stderr);
      return 1;
    }

    return match.run(argv.slice(match.path.length), this.context);
  }

  public printHelp(output: NodeJS.WritableStream): void {
    output.write("savekeep: per-project save file store\n\n");
    output.write("Usage:\n");
    output.write("  savekeep <command> [arguments]\n\n");
    output.write("Commands:\n");

    const sorted = [...this.commands].sort((left, right) => left.usage.localeCompare(right.usage));
    for (const command of sorted) {
      output.write(`  ${command.usage.padEnd(28, " ")}${command.description}\n`);
    }
  }
}

function startsWith(argv: string[], path: string[]): boolean {
  return argv.length >= path.length && path.every((segment, index) => argv[index] === segment);
}
