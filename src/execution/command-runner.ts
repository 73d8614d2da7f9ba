import debug from "debug";
import { execa } from "execa";
import type { ExecAction } from "../types";
import type { TargetLogger } from "../utils/logger";

const log = debug("bsdiso:command");

/** Exit code reported when the program could not be started at all. */
export const SPAWN_FAILURE_EXIT_CODE = 127;

export type CommandContext = {
  logger: TargetLogger;
  env?: Record<string, string>;
};

export type CommandResult = {
  exitCode: number;
};

/**
 * Process-execution interface through which every external program is run.
 * Implementations report the exit status instead of throwing on a non-zero
 * exit.
 */
export interface CommandRunner {
  run(action: ExecAction, context: CommandContext): Promise<CommandResult>;
}

export class ExecaCommandRunner implements CommandRunner {
  async run(action: ExecAction, context: CommandContext): Promise<CommandResult> {
    const [file, ...args] = action.argv;
    const { logger } = context;

    log("Spawning %s %o in %s", file, args, action.cwd ?? process.cwd());

    const proc = execa(file, args, {
      cwd: action.cwd,
      env: {
        ...process.env,
        ...context.env,
        ...action.env,
      },
      reject: false,
      stdin: "ignore",
      stdout: "pipe",
      stderr: "pipe",
    });

    proc.stdout?.on("data", (data: Buffer) => {
      logger.log(data.toString().trimEnd());
    });

    proc.stderr?.on("data", (data: Buffer) => {
      const message = data.toString().trim();
      if (message) {
        logger.error(message);
      }
    });

    const result = await proc;

    // execa leaves exitCode undefined when the process never started or was killed
    if (typeof result.exitCode !== "number") {
      logger.error(
        result.signal
          ? `${file} was killed by ${result.signal}`
          : `Could not start ${file}`
      );
      return { exitCode: SPAWN_FAILURE_EXIT_CODE };
    }

    log("%s exited with %d", file, result.exitCode);
    return { exitCode: result.exitCode };
  }
}
