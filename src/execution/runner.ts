import { resolve } from "node:path";
import ansis from "ansis";
import debug from "debug";
import { GraphBuilder } from "../core/graph-builder";
import { parseCommand } from "../core/parser";
import { PatternMatcher } from "../core/pattern-matcher";
import { exitCodeOf } from "../errors";
import { loadRecipeConfig } from "../recipe/config";
import { createIsoRecipe } from "../recipe/iso-recipe";
import type { Recipe, RunOptions } from "../types";
import { type CommandRunner, ExecaCommandRunner } from "./command-runner";
import { Executor } from "./executor";

const log = debug("bsdiso:runner");

export type RecipeFactory = (cwd: string, options: RunOptions) => Recipe;

export const loadIsoRecipe: RecipeFactory = (cwd, options) => {
  const config = loadRecipeConfig(cwd, options.configFile);
  return createIsoRecipe({ ...config, flavor: options.flavor ?? config.flavor }, cwd);
};

export class Runner {
  private readonly matcher = new PatternMatcher();
  private readonly graphBuilder = new GraphBuilder();
  private readonly commandRunner: CommandRunner;
  private readonly recipeFactory: RecipeFactory;

  constructor(
    commandRunner: CommandRunner = new ExecaCommandRunner(),
    recipeFactory: RecipeFactory = loadIsoRecipe
  ) {
    this.commandRunner = commandRunner;
    this.recipeFactory = recipeFactory;
  }

  /**
   * Run the targets named in `args` and resolve to the process exit code.
   */
  async run(args: string[], options: RunOptions = {}): Promise<number> {
    try {
      const parsed = parseCommand(args);

      // Merge config with options
      const config: RunOptions = { ...parsed.config, ...options };
      const cwd = resolve(options.cwd ?? process.cwd(), config.directory ?? ".");
      log("Working directory:", cwd);

      const recipe = this.recipeFactory(cwd, config);
      const graph = this.graphBuilder.buildGraph(recipe.targets);

      if (config.list) {
        this.printTargets(recipe);
        return 0;
      }

      const requested =
        parsed.patterns.length > 0
          ? this.matcher.resolvePatterns(parsed.patterns, recipe.targets)
          : [recipe.defaultTarget];
      log("Requested targets:", requested);

      const executor = new Executor(
        graph,
        recipe.artifacts,
        this.commandRunner,
        config
      );
      await executor.execute(requested);
      return 0;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error("Error:", message);
      return exitCodeOf(error);
    }
  }

  private printTargets(recipe: Recipe): void {
    const width = Math.max(...recipe.targets.map((t) => t.name.length));
    for (const target of recipe.targets) {
      const marker = target.name === recipe.defaultTarget ? " (default)" : "";
      const prerequisites =
        target.prerequisites.length > 0
          ? ansis.gray(` <- ${target.prerequisites.join(", ")}`)
          : "";
      console.log(
        `${ansis.bold(target.name.padEnd(width))}  ${target.description ?? ""}${marker}${prerequisites}`
      );
    }
  }
}
