export class BuildError extends Error {
  readonly exitCode: number;

  constructor(message: string, exitCode = 1) {
    super(message);
    this.name = new.target.name;
    this.exitCode = exitCode;
  }
}

/**
 * A fatal action of a target failed. Carries the exit code of the failing
 * command so the CLI can exit with it.
 */
export class TargetFailedError extends BuildError {
  readonly target: string;
  readonly command: string;

  constructor(
    target: string,
    command: string,
    exitCode: number,
    detail = `exited with code ${exitCode}`
  ) {
    super(`Target '${target}' failed: '${command}' ${detail}`, exitCode);
    this.target = target;
    this.command = command;
  }
}

export class MissingArtifactError extends BuildError {
  readonly target: string;
  readonly path: string;

  constructor(target: string, path: string) {
    super(`No rule to make target '${target}' (${path} does not exist)`);
    this.target = target;
    this.path = path;
  }
}

export class CircularDependencyError extends BuildError {
  readonly cycles: string[][];

  constructor(cycles: string[][]) {
    super(`Circular dependency detected: ${JSON.stringify(cycles)}`);
    this.cycles = cycles;
  }
}

export class UnknownTargetError extends BuildError {
  constructor(pattern: string) {
    super(`Target not found: ${pattern}`);
  }
}

export class ConfigError extends BuildError {}

export function exitCodeOf(error: unknown): number {
  return error instanceof BuildError ? error.exitCode : 1;
}
