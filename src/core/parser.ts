import type { ParsedCommand } from "../types";

const FLAGS_WITH_VALUE = new Set(["C"]);

export class Parser {
  parse(args: string[]): ParsedCommand {
    const result: ParsedCommand = {
      config: {},
      patterns: [],
    };

    for (let i = 0; i < args.length; i++) {
      const arg = args[i];
      if (arg === undefined || arg === "") {
        continue;
      }

      if (arg.startsWith("--")) {
        this.processLongFlag(arg.substring(2), result);
      } else if (arg.startsWith("-") && arg.length > 1) {
        // A value-taking short flag consumes the next argument
        const consumed = this.processShortFlags(arg.substring(1), args[i + 1], result);
        if (consumed) {
          i++;
        }
      } else {
        result.patterns.push(arg);
      }
    }

    return result;
  }

  private processLongFlag(flag: string, result: ParsedCommand): void {
    if (flag === "quiet") {
      result.config.quiet = true;
    } else if (flag === "dry-run" || flag === "just-print") {
      result.config.dryRun = true;
    } else if (flag === "always-make") {
      result.config.force = true;
    } else if (flag === "list") {
      result.config.list = true;
    } else if (flag === "no-prefix") {
      result.config.prefix = false;
    } else if (flag.startsWith("prefix=")) {
      result.config.prefix = flag.substring("prefix=".length);
    } else if (flag.startsWith("directory=")) {
      result.config.directory = flag.substring("directory=".length);
    } else if (flag.startsWith("flavor=")) {
      result.config.flavor = flag.substring("flavor=".length);
    } else if (flag.startsWith("config=")) {
      result.config.configFile = flag.substring("config=".length);
    } else {
      console.warn(`Unknown flag: --${flag}`);
    }
  }

  /**
   * Returns true when the flag group consumed `next` as a value.
   */
  private processShortFlags(
    flags: string,
    next: string | undefined,
    result: ParsedCommand
  ): boolean {
    for (let i = 0; i < flags.length; i++) {
      const flag = flags.charAt(i);

      if (FLAGS_WITH_VALUE.has(flag)) {
        // -Cdir or -C dir
        const inline = flags.substring(i + 1);
        const value = inline || next;
        if (value === undefined) {
          throw new Error(`Flag -${flag} requires a value`);
        }
        result.config.directory = value;
        return inline === "";
      }

      if (flag === "q") {
        result.config.quiet = true;
      } else if (flag === "n") {
        result.config.dryRun = true;
      } else if (flag === "B") {
        result.config.force = true;
      } else if (flag === "l") {
        result.config.list = true;
      } else {
        console.warn(`Unknown flag: -${flag}`);
      }
    }
    return false;
  }
}

export function parseCommand(args: string[]): ParsedCommand {
  const parser = new Parser();
  return parser.parse(args);
}
