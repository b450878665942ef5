import debug from "debug";
import graphlib, { type Graph as DependencyGraph } from "graphlib";
import { CyclicDependencyError } from "../errors";
import type { ExecutionPlan, Target } from "../types";
import { PatternMatcher } from "./pattern-matcher";
import type { TargetRegistry } from "./registry";

const { Graph, alg } = graphlib;

const log = debug("makeway:resolver");

export class DependencyResolver {
  private readonly matcher = new PatternMatcher();
  private readonly registry: TargetRegistry;

  constructor(registry: TargetRegistry) {
    this.registry = registry;
  }

  /**
   * Expand the requested names into one deduplicated plan where every
   * prerequisite precedes its dependents. Prerequisites are visited
   * depth-first in declaration order and recorded post-order, so diamonds
   * collapse onto their first visit. Nothing is returned unless the whole
   * plan resolves.
   */
  plan(requested: string[]): ExecutionPlan {
    const names = this.matcher.resolvePatterns(requested, this.registry);
    log("Requested:", requested, "resolved:", names);

    const planned: Target[] = [];
    const visited = new Set<string>();
    // Insertion-ordered, doubles as the path for cycle reporting
    const stack = new Set<string>();

    const visit = (name: string, referencedBy?: string): void => {
      if (stack.has(name)) {
        const path = Array.from(stack);
        const cycle = [...path.slice(path.indexOf(name)), name];
        throw new CyclicDependencyError(cycle);
      }
      if (visited.has(name)) {
        log(`Already planned ${name}, skipping`);
        return;
      }

      const target = this.registry.lookup(name, referencedBy);
      stack.add(name);
      for (const prerequisite of target.prerequisites) {
        visit(prerequisite, name);
      }
      stack.delete(name);

      visited.add(name);
      planned.push(target);
      log(`Planned ${name} at position ${planned.length - 1}`);
    };

    for (const name of names) {
      visit(name);
    }

    return { requested: names, targets: planned };
  }

  /**
   * Dependency graph of a plan for the parallel scheduler. Edges go from
   * dependent to prerequisite.
   */
  graph(plan: ExecutionPlan): DependencyGraph {
    const graph = new Graph();
    for (const target of plan.targets) {
      graph.setNode(target.name, target);
    }
    for (const target of plan.targets) {
      for (const prerequisite of target.prerequisites) {
        graph.setEdge(target.name, prerequisite);
      }
    }

    if (!alg.isAcyclic(graph)) {
      const [cycle = []] = alg.findCycles(graph);
      throw new CyclicDependencyError([...cycle, cycle[0] ?? ""]);
    }
    return graph;
  }
}
