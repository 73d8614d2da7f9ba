export { Runner, loadIsoRecipe } from './execution/runner';
export type { RecipeFactory } from './execution/runner';
export { Parser, parseCommand } from './core/parser';
export { PatternMatcher } from './core/pattern-matcher';
export { GraphBuilder, TargetGraph } from './core/graph-builder';
export { ArtifactRegistry } from './core/artifacts';
export { Executor } from './execution/executor';
export type { ExecutorOptions } from './execution/executor';
export { ExecaCommandRunner, SPAWN_FAILURE_EXIT_CODE } from './execution/command-runner';
export type { CommandContext, CommandResult, CommandRunner } from './execution/command-runner';
export { describeAction } from './execution/actions';
export { createIsoRecipe, resolveLayout, DEFAULT_TARGET } from './recipe/iso-recipe';
export type { RecipeLayout } from './recipe/iso-recipe';
export {
  CONFIG_FILE_NAME,
  loadRecipeConfig,
  parseRecipeConfig,
  parsePackageList,
  templateVariables,
} from './recipe/config';
export { renderTemplate } from './utils/template';
export type { RecipeConfig, RecipeConfigInput } from './recipe/config';
export { Logger, TargetLogger } from './utils/logger';
export {
  BuildError,
  CircularDependencyError,
  ConfigError,
  MissingArtifactError,
  TargetFailedError,
  UnknownTargetError,
} from './errors';

export type {
  Action,
  Config,
  ExecAction,
  FailurePolicy,
  FileAction,
  ParsedCommand,
  Recipe,
  RenderAction,
  RunOptions,
  RunReport,
  StampAction,
  Target,
  TargetOutcome,
  TargetState,
} from './types';
