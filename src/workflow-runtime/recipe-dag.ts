/**
 * Multi-edge directed acyclic graph for recipe step dependencies.
 *
 * Uses Kahn's algorithm for:
 * - Cycle detection (nodes remaining after the algorithm = cycle participants)
 * - Topological sorting (valid execution order)
 *
 * Node order is insertion order, and the Kahn queue is seeded and drained in
 * that order, so for a recipe built with fromSteps() every result here is
 * stable with respect to declaration order.
 */

import type { RecipeStep } from './types.js';

export interface CycleDetectionResult {
  hasCycle: boolean;
  /** Nodes participating in cycle(s), in insertion order */
  cycle?: string[];
  /** Valid execution order, present when hasCycle is false */
  topologicalOrder?: string[];
}

const EMPTY: ReadonlySet<string> = new Set();

export class RecipeDAG {
  private inEdges: Map<string, Set<string>> = new Map();
  private outEdges: Map<string, Set<string>> = new Map();
  private nodes: Set<string> = new Set();

  /**
   * Register a node in the graph.
   */
  addNode(id: string): void {
    this.nodes.add(id);
    if (!this.inEdges.has(id)) {
      this.inEdges.set(id, new Set());
    }
    if (!this.outEdges.has(id)) {
      this.outEdges.set(id, new Set());
    }
  }

  /**
   * Add a directed edge: `from` must finish before `to` can start.
   */
  addEdge(from: string, to: string): void {
    this.addNode(from);
    this.addNode(to);
    this.outEdges.get(from)?.add(to);
    this.inEdges.get(to)?.add(from);
  }

  /** Steps `id` waits on. */
  predecessors(id: string): ReadonlySet<string> {
    return this.inEdges.get(id) ?? EMPTY;
  }

  /** Steps waiting directly on `id`. */
  dependents(id: string): ReadonlySet<string> {
    return this.outEdges.get(id) ?? EMPTY;
  }

  /**
   * Every step reachable from `id` through dependency edges, in
   * breadth-first order. Does not include `id` itself.
   */
  transitiveDependents(id: string): string[] {
    const seen = new Set<string>();
    const queue = [...this.dependents(id)];

    while (queue.length > 0) {
      const next = queue.shift();
      if (next === undefined || seen.has(next)) continue;
      seen.add(next);
      queue.push(...this.dependents(next));
    }

    return [...seen];
  }

  /** Every step `id` waits on, directly or through other steps. */
  transitivePredecessors(id: string): string[] {
    const seen = new Set<string>();
    const queue = [...this.predecessors(id)];

    while (queue.length > 0) {
      const next = queue.shift();
      if (next === undefined || seen.has(next)) continue;
      seen.add(next);
      queue.push(...this.predecessors(next));
    }

    return [...seen];
  }

  /**
   * Detect cycles using Kahn's algorithm.
   *
   * Returns topological order when acyclic, or the nodes that could not be
   * ordered when a cycle exists.
   */
  detectCycles(): CycleDetectionResult {
    const inDegree = new Map<string, number>();
    for (const node of this.nodes) {
      inDegree.set(node, this.predecessors(node).size);
    }

    const queue: string[] = [];
    for (const [node, degree] of inDegree) {
      if (degree === 0) {
        queue.push(node);
      }
    }

    const topologicalOrder: string[] = [];

    while (queue.length > 0) {
      const node = queue.shift();
      if (node === undefined) break;
      topologicalOrder.push(node);

      for (const successor of this.dependents(node)) {
        const newDegree = (inDegree.get(successor) ?? 0) - 1;
        inDegree.set(successor, newDegree);
        if (newDegree === 0) {
          queue.push(successor);
        }
      }
    }

    if (topologicalOrder.length === this.nodes.size) {
      return { hasCycle: false, topologicalOrder };
    }

    // Whatever Kahn left is on a cycle or downstream of one. Peel off the
    // downstream part by repeatedly dropping nodes with no remaining successor.
    const remaining = new Set([...this.nodes].filter((n) => !topologicalOrder.includes(n)));
    let trimmed = true;
    while (trimmed) {
      trimmed = false;
      for (const node of remaining) {
        const hasSuccessor = [...this.dependents(node)].some((s) => remaining.has(s));
        if (!hasSuccessor) {
          remaining.delete(node);
          trimmed = true;
        }
      }
    }

    return { hasCycle: true, cycle: [...remaining] };
  }

  /**
   * Build a RecipeDAG from recipe steps.
   *
   * Each step becomes a node. Each entry in step.depends_on creates an edge
   * from the dependency to the step. Dependencies on unknown ids are
   * ignored here; the validator reports them.
   */
  static fromSteps(steps: readonly Pick<RecipeStep, 'id' | 'depends_on'>[]): RecipeDAG {
    const dag = new RecipeDAG();
    const ids = new Set(steps.map((s) => s.id));

    for (const step of steps) {
      dag.addNode(step.id);
    }

    for (const step of steps) {
      for (const dep of step.depends_on) {
        if (ids.has(dep)) {
          dag.addEdge(dep, step.id);
        }
      }
    }

    return dag;
  }
}
