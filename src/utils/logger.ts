import ansis from "ansis";
import type { Config } from "../types";

type Paint = (text: string) => string;

const PALETTE: readonly Paint[] = [
  ansis.cyan,
  ansis.green,
  ansis.yellow,
  ansis.blue,
  ansis.magenta,
  ansis.red,
  ansis.gray,
  ansis.white,
];

type LoggerConfig = Pick<Config, "prefix" | "quiet">;

type Sink = (line: string) => void;

const stdout: Sink = (line) => console.log(line);
const stderr: Sink = (line) => console.error(line);

function nonBlankLines(message: string): string[] {
  return message.split("\n").filter((line) => line.trim() !== "");
}

/**
 * Console output of a run. Each target gets a stable colour and a
 * `[name] |` prefix padded to the longest target registered so far.
 * Quiet mode drops target output and status lines; errors and warnings
 * are always shown.
 */
export class Logger {
  private readonly paints = new Map<string, Paint>();
  private width = 0;
  private readonly prefix: boolean | string;
  private readonly quiet: boolean;

  constructor({ prefix = true, quiet = false }: LoggerConfig = {}) {
    this.prefix = prefix;
    this.quiet = quiet;
  }

  registerTarget(name: string): void {
    if (this.paints.has(name)) {
      return;
    }
    this.paints.set(name, PALETTE[this.paints.size % PALETTE.length] ?? ansis.white);
    this.width = Math.max(this.width, name.length + 2);
  }

  log(name: string, message: string): void {
    if (!this.quiet) {
      this.write(stdout, name, message);
    }
  }

  error(name: string, message: string): void {
    this.write(stderr, name, message, ansis.red);
  }

  info(message: string): void {
    this.status(ansis.blue("ℹ"), message);
  }

  success(message: string): void {
    this.status(ansis.green("✓"), message);
  }

  warn(message: string): void {
    console.warn(`${ansis.yellow("⚠")} ${message}`);
  }

  createTargetLogger(name: string): TargetLogger {
    this.registerTarget(name);
    return new TargetLogger(this, name);
  }

  private status(symbol: string, message: string): void {
    if (!this.quiet) {
      console.log(`${symbol} ${message}`);
    }
  }

  private write(sink: Sink, name: string, message: string, paintLine?: Paint): void {
    const head = this.head(name);
    for (const line of nonBlankLines(message)) {
      const body = paintLine ? paintLine(line) : line;
      sink(head ? `${head} ${body}` : body);
    }
  }

  private head(name: string): string {
    if (this.prefix === false) {
      return "";
    }
    const paint = this.paints.get(name) ?? ansis.white;
    if (typeof this.prefix === "string") {
      return paint(this.prefix);
    }
    return `${paint(`[${name}]`.padEnd(this.width))} ${ansis.gray("|")}`;
  }
}

/** Output of a single target's actions and commands. */
export class TargetLogger {
  private readonly parent: Logger;
  readonly targetName: string;

  constructor(parent: Logger, targetName: string) {
    this.parent = parent;
    this.targetName = targetName;
  }

  log(message: string): void {
    this.parent.log(this.targetName, message);
  }

  error(message: string): void {
    this.parent.error(this.targetName, message);
  }

  warn(message: string): void {
    this.parent.warn(`[${this.targetName}] ${message}`);
  }
}
