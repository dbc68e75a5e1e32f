/**
 * Dependency graph helpers shared by the loader and the planner.
 * Edges point from a node to its prerequisites.
 */

export type PrerequisiteMap = ReadonlyMap<string, readonly string[]>;

type Mark = "visiting" | "visited";

/**
 * Depth-first search with visiting/visited marks. Roots are visited in
 * lexicographic order so the reported cycle is deterministic.
 * Returns the cycle as a closed path (`[a, b, a]`) or null.
 */
export function findCycle(prerequisites: PrerequisiteMap): string[] | null {
  const marks = new Map<string, Mark>();
  const stack: string[] = [];

  const visit = (node: string): string[] | null => {
    const mark = marks.get(node);
    if (mark === "visited") return null;
    if (mark === "visiting") {
      return [...stack.slice(stack.indexOf(node)), node];
    }

    marks.set(node, "visiting");
    stack.push(node);
    for (const prerequisite of [...(prerequisites.get(node) ?? [])].sort()) {
      const cycle = visit(prerequisite);
      if (cycle) return cycle;
    }
    stack.pop();
    marks.set(node, "visited");
    return null;
  };

  for (const node of [...prerequisites.keys()].sort()) {
    const cycle = visit(node);
    if (cycle) return cycle;
  }
  return null;
}

export interface TopologicalResult {
  order: string[];
  /** Nodes that could not be placed (they sit on or behind a cycle). */
  remaining: string[];
}

/**
 * Kahn's algorithm. Among ready nodes the lexicographically smallest goes
 * first. Prerequisites that are not themselves nodes are ignored.
 */
export function topologicalSort(nodes: Iterable<string>, prerequisites: PrerequisiteMap): TopologicalResult {
  const nodeSet = new Set(nodes);
  const pending = new Map<string, number>();
  const dependents = new Map<string, string[]>();

  for (const node of nodeSet) {
    const inside = new Set((prerequisites.get(node) ?? []).filter((p) => nodeSet.has(p)));
    pending.set(node, inside.size);
    for (const prerequisite of inside) {
      const list = dependents.get(prerequisite) ?? [];
      list.push(node);
      dependents.set(prerequisite, list);
    }
  }

  const ready = [...nodeSet].filter((node) => pending.get(node) === 0).sort();
  const order: string[] = [];

  while (ready.length > 0) {
    const node = ready.shift();
    if (node === undefined) break;
    order.push(node);

    for (const dependent of dependents.get(node) ?? []) {
      const count = (pending.get(dependent) ?? 0) - 1;
      pending.set(dependent, count);
      if (count === 0) {
        ready.push(dependent);
        ready.sort();
      }
    }
  }

  const placed = new Set(order);
  const remaining = [...nodeSet].filter((node) => !placed.has(node)).sort();
  return { order, remaining };
}
