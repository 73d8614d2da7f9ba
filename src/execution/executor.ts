import debug from "debug";
import type { ArtifactRegistry } from "../core/artifacts";
import type { TargetGraph } from "../core/graph-builder";
import {
  CircularDependencyError,
  MissingArtifactError,
  TargetFailedError,
} from "../errors";
import type {
  Action,
  RunOptions,
  RunReport,
  Target,
  TargetOutcome,
  TargetState,
} from "../types";
import { Logger, type TargetLogger } from "../utils/logger";
import { describeAction, runFileAction } from "./actions";
import type { CommandRunner } from "./command-runner";

const log = debug("bsdiso:executor");

export type ExecutorOptions = Pick<
  RunOptions,
  "dryRun" | "env" | "force" | "prefix" | "quiet"
>;

type ActionFailure = {
  exitCode: number;
  detail: string;
};

/**
 * Brings requested targets up to date, one at a time: prerequisites first in
 * declaration order, then the target's own actions when its artifact is
 * missing or stale. The first fatal failure aborts the run.
 */
export class Executor {
  private readonly states = new Map<string, TargetState>();
  private readonly outcomes: TargetOutcome[] = [];
  // Targets with an artifact whose actions ran during this run
  private readonly rebuilt = new Set<string>();
  private readonly stack: string[] = [];
  private readonly logger: Logger;
  private readonly graph: TargetGraph;
  private readonly artifacts: ArtifactRegistry;
  private readonly commandRunner: CommandRunner;
  private readonly options: ExecutorOptions;
  private requested = new Set<string>();
  private commands = 0;

  constructor(
    graph: TargetGraph,
    artifacts: ArtifactRegistry,
    commandRunner: CommandRunner,
    options: ExecutorOptions = {}
  ) {
    this.graph = graph;
    this.artifacts = artifacts;
    this.commandRunner = commandRunner;
    this.options = options;
    this.logger = new Logger(options);
  }

  state(name: string): TargetState {
    return this.states.get(name) ?? "unvisited";
  }

  async execute(requested: string[]): Promise<RunReport> {
    log("=== Starting execution ===");
    log("Requested targets:", requested);

    this.requested = new Set(requested);
    for (const name of this.graph.executionOrder(requested)) {
      this.logger.registerTarget(name);
    }

    for (const name of requested) {
      await this.satisfy(name);
    }

    return { commands: this.commands, outcomes: [...this.outcomes] };
  }

  private async satisfy(name: string): Promise<void> {
    const state = this.state(name);
    if (state === "done" || state === "skipped") {
      log(`Target ${name} already ${state}`);
      return;
    }
    if (state !== "unvisited") {
      const start = this.stack.indexOf(name);
      throw new CircularDependencyError([[...this.stack.slice(start), name]]);
    }

    const target = this.graph.target(name);
    this.stack.push(name);
    this.transition(name, "satisfying-prerequisites");
    for (const prerequisite of target.prerequisites) {
      await this.satisfy(prerequisite);
    }
    this.stack.pop();

    this.transition(name, "stale-check");
    const reason = await this.staleReason(target);

    if (reason === undefined) {
      this.transition(name, "skipped");
      this.outcomes.push({ name, state: "skipped" });
      if (this.requested.has(name)) {
        this.logger.info(`Up to date: ${name}`);
      }
      return;
    }

    log(`Target ${name} is stale: ${reason}`);
    this.transition(name, "running");
    try {
      await this.runActions(target);
    } catch (error) {
      this.transition(name, "failed");
      throw error;
    }

    if (this.artifacts.has(name)) {
      this.rebuilt.add(name);
    }
    this.transition(name, "done");
    this.outcomes.push({ name, reason, state: "done" });
  }

  /**
   * Why the target has to run, or undefined when it is up to date.
   */
  private async staleReason(target: Target): Promise<string | undefined> {
    if (this.options.force && target.actions.length > 0) {
      return "forced";
    }

    const path = this.artifacts.path(target.name);
    if (path === undefined) {
      return "always-run";
    }

    const own = await this.artifacts.timestamp(target.name);
    if (own === undefined) {
      if (target.actions.length === 0 && target.prerequisites.length === 0) {
        throw new MissingArtifactError(target.name, path);
      }
      return "missing";
    }

    for (const prerequisite of target.prerequisites) {
      if (this.rebuilt.has(prerequisite)) {
        return `prerequisite '${prerequisite}' was rebuilt`;
      }
    }

    for (const prerequisite of target.prerequisites) {
      const time = await this.artifacts.timestamp(prerequisite);
      if (time !== undefined && own < time) {
        return `older than '${prerequisite}'`;
      }
    }

    return undefined;
  }

  private async runActions(target: Target): Promise<void> {
    if (target.actions.length === 0) {
      return;
    }

    const logger = this.logger.createTargetLogger(target.name);
    this.logger.info(
      `${this.options.dryRun ? "Would run" : "Running"}: ${target.name}`
    );

    for (const action of target.actions) {
      const description = describeAction(action);

      if (this.options.dryRun) {
        logger.log(`$ ${description}`);
        continue;
      }

      log(`[${target.name}] ${description}`);
      const failure = await this.runAction(action, logger);
      if (failure === undefined) {
        continue;
      }

      if (action.tolerateFailure === "skip-rest") {
        logger.warn(`'${description}' ${failure.detail}, skipping the rest of ${target.name}`);
        break;
      }
      if (action.tolerateFailure) {
        logger.warn(`'${description}' ${failure.detail}, ignoring`);
        continue;
      }

      logger.error(`Failed: ${description}`);
      throw new TargetFailedError(
        target.name,
        description,
        failure.exitCode,
        failure.detail
      );
    }

    if (!this.options.dryRun) {
      this.logger.success(`Completed: ${target.name}`);
    }
  }

  private async runAction(
    action: Action,
    logger: TargetLogger
  ): Promise<ActionFailure | undefined> {
    if (action.kind === "exec") {
      this.commands++;
      const { exitCode } = await this.commandRunner.run(action, {
        env: this.options.env,
        logger,
      });
      return exitCode === 0
        ? undefined
        : { detail: `exited with code ${exitCode}`, exitCode };
    }

    try {
      await runFileAction(action);
      return undefined;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return { detail: `failed: ${message}`, exitCode: 1 };
    }
  }

  private transition(name: string, state: TargetState): void {
    log(`${name}: ${this.state(name)} -> ${state}`);
    this.states.set(name, state);
  }
}
