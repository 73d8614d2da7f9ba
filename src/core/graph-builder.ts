import debug from "debug";
import graphlib, { type Graph as Digraph } from "graphlib";
import { BuildError, CircularDependencyError } from "../errors";
import type { Target } from "../types";

const { Graph, alg } = graphlib;

const log = debug("bsdiso:graph");

/**
 * Validated view over a recipe's targets: names are unique, every
 * prerequisite exists and the prerequisite relation is acyclic.
 */
export class TargetGraph {
  private readonly targets: Map<string, Target>;

  constructor(targets: Map<string, Target>) {
    this.targets = targets;
  }

  has(name: string): boolean {
    return this.targets.has(name);
  }

  target(name: string): Target {
    const target = this.targets.get(name);
    if (!target) {
      throw new BuildError(`Unknown target: ${name}`);
    }
    return target;
  }

  names(): string[] {
    return Array.from(this.targets.keys());
  }

  /**
   * Depth-first post-order of everything reachable from `requested`:
   * prerequisites in declaration order before the target, each target once.
   */
  executionOrder(requested: string[]): string[] {
    const order: string[] = [];
    const visited = new Set<string>();

    const visit = (name: string): void => {
      if (visited.has(name)) {
        return;
      }
      visited.add(name);
      for (const prerequisite of this.target(name).prerequisites) {
        visit(prerequisite);
      }
      order.push(name);
    };

    for (const name of requested) {
      visit(name);
    }

    log("Execution order for %o: %o", requested, order);
    return order;
  }
}

export class GraphBuilder {
  /**
   * Build and validate the target graph. Edges go from a target to each of
   * its prerequisites.
   */
  buildGraph(targets: Target[]): TargetGraph {
    const byName = new Map<string, Target>();
    const graph = new Graph();

    log("=== Starting graph build ===");

    for (const target of targets) {
      if (byName.has(target.name)) {
        throw new BuildError(`Duplicate target: ${target.name}`);
      }
      byName.set(target.name, target);
      graph.setNode(target.name);
    }

    for (const target of targets) {
      for (const prerequisite of target.prerequisites) {
        if (!byName.has(prerequisite)) {
          throw new BuildError(
            `Target '${target.name}' depends on unknown target '${prerequisite}'`
          );
        }
        log(`Adding edge from ${target.name} to ${prerequisite}`);
        graph.setEdge(target.name, prerequisite);
      }
    }

    log("Nodes:", graph.nodes());
    log("Edges:", graph.edges());

    this.validateGraph(graph);

    return new TargetGraph(byName);
  }

  private validateGraph(graph: Digraph): void {
    if (!alg.isAcyclic(graph)) {
      throw new CircularDependencyError(alg.findCycles(graph));
    }
  }
}
