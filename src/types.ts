import type { ArtifactRegistry } from "./core/artifacts";

export type Config = {
  quiet?: boolean;
  prefix?: boolean | string;
  dryRun?: boolean;
  force?: boolean;
  list?: boolean;
  flavor?: string;
  directory?: string;
  configFile?: string;
};

export type ParsedCommand = {
  patterns: string[];
  config: Config;
};

/**
 * What a failing action does to the run: `false` aborts it, `true` logs a
 * warning and carries on with the next action, `"skip-rest"` logs a warning
 * and ends the target without running its remaining actions.
 */
export type FailurePolicy = boolean | "skip-rest";

type ActionBase = {
  tolerateFailure?: FailurePolicy;
};

export type ExecAction = ActionBase & {
  kind: "exec";
  argv: [string, ...string[]];
  cwd?: string;
  env?: Record<string, string>;
};

export type MkdirAction = ActionBase & { kind: "mkdir"; path: string };

export type CopyAction = ActionBase & { kind: "copy"; from: string; to: string };

export type RemoveAction = ActionBase & { kind: "remove"; path: string };

/** Write an empty marker file; its mtime records when a step last completed. */
export type StampAction = ActionBase & { kind: "stamp"; path: string };

/** Substitute `{{ name }}` placeholders in every text file below `dir`, in place. */
export type RenderAction = ActionBase & {
  kind: "render";
  dir: string;
  variables: Record<string, string>;
};

export type FileAction =
  | MkdirAction
  | CopyAction
  | RemoveAction
  | StampAction
  | RenderAction;

export type Action = ExecAction | FileAction;

export type Target = {
  name: string;
  description?: string;
  prerequisites: string[];
  actions: Action[];
};

export type Recipe = {
  targets: Target[];
  artifacts: ArtifactRegistry;
  defaultTarget: string;
};

export type TargetState =
  | "unvisited"
  | "satisfying-prerequisites"
  | "stale-check"
  | "running"
  | "done"
  | "failed"
  | "skipped";

export type TargetOutcome = {
  name: string;
  state: "done" | "skipped";
  reason?: string;
};

export type RunReport = {
  outcomes: TargetOutcome[];
  commands: number;
};

export interface RunOptions extends Config {
  cwd?: string;
  env?: Record<string, string>;
}
