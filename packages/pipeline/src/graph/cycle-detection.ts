/**
 * Cycle Detection Utility
 *
 * Graph helpers shared by the compiler (package dependencies) and the
 * merge engine (variable references). Graphs are adjacency lists keyed by
 * node id; an edge `a -> b` means "a depends on / refers to b". Key order
 * of the adjacency map is the insertion order used to break ties.
 */

export type Adjacency = ReadonlyMap<string, readonly string[]>;

/**
 * Build adjacency list from (source, target) pairs, keeping every source
 * in first-seen order and dropping repeated edges
 */
export function buildAdjacencyList(
  ids: Iterable<string>,
  edges: Iterable<readonly [string, string]>
): Map<string, string[]> {
  const graph = new Map<string, string[]>();

  for (const id of ids) {
    graph.set(id, []);
  }

  for (const [source, target] of edges) {
    const neighbors = graph.get(source) ?? [];
    if (!neighbors.includes(target)) {
      neighbors.push(target);
    }
    graph.set(source, neighbors);
  }

  return graph;
}

/**
 * Find any cycle using DFS, as the path from the first node revisited
 * while still on the stack
 */
function findAnyCycle(graph: Adjacency): string[] | null {
  const visited = new Set<string>();
  const recursionStack = new Set<string>();
  const pathStack: string[] = [];

  function dfs(node: string): string[] | null {
    visited.add(node);
    recursionStack.add(node);
    pathStack.push(node);

    for (const neighbor of graph.get(node) ?? []) {
      if (!visited.has(neighbor)) {
        const cycle = dfs(neighbor);
        if (cycle) return cycle;
      } else if (recursionStack.has(neighbor)) {
        return pathStack.slice(pathStack.indexOf(neighbor));
      }
    }

    pathStack.pop();
    recursionStack.delete(node);
    return null;
  }

  for (const node of graph.keys()) {
    if (!visited.has(node)) {
      const cycle = dfs(node);
      if (cycle) return cycle;
    }
  }

  return null;
}

/**
 * Shortest closed walk from `start` back to itself, via BFS
 */
function shortestCycleThrough(graph: Adjacency, start: string): string[] | null {
  const parent = new Map<string, string>();
  const queue: string[] = [start];
  let head = 0;

  while (head < queue.length) {
    const node = queue[head++];
    for (const neighbor of graph.get(node) ?? []) {
      if (neighbor === start) {
        const cycle = [node];
        let current = node;
        while (current !== start) {
          const previous = parent.get(current);
          if (previous === undefined) break;
          cycle.unshift(previous);
          current = previous;
        }
        return cycle;
      }
      if (!parent.has(neighbor) && neighbor !== start) {
        parent.set(neighbor, node);
        queue.push(neighbor);
      }
    }
  }

  return null;
}

/**
 * Detect a cycle and report the minimal one
 *
 * Among the members of the first cycle DFS finds, picks the shortest
 * cycle through any of them, then rotates it to start at the member that
 * comes first in insertion order. A self-edge yields `[id]`.
 *
 * @returns The cycle without repeating its first node, or null if acyclic
 */
export function detectCycle(graph: Adjacency): string[] | null {
  const found = findAnyCycle(graph);
  if (!found) {
    return null;
  }

  const order = new Map<string, number>();
  for (const id of graph.keys()) {
    order.set(id, order.size);
  }
  const rank = (id: string): number => order.get(id) ?? Number.MAX_SAFE_INTEGER;

  let best = found;
  const candidates = [...found].sort((a, b) => rank(a) - rank(b));
  for (const candidate of candidates) {
    const cycle = shortestCycleThrough(graph, candidate);
    if (cycle && cycle.length < best.length) {
      best = cycle;
    }
  }

  let startIndex = 0;
  for (let i = 1; i < best.length; i++) {
    if (rank(best[i]) < rank(best[startIndex])) {
      startIndex = i;
    }
  }

  return [...best.slice(startIndex), ...best.slice(0, startIndex)];
}

/**
 * Stable topological order: dependencies before dependents, and among
 * nodes that are ready at the same time, insertion order wins
 *
 * @returns Ordered ids, or null if a cycle exists
 */
export function getTopologicalOrder(graph: Adjacency): string[] | null {
  const index = new Map<string, number>();
  const inDegree = new Map<string, number>();
  const dependents = new Map<string, string[]>();

  for (const id of graph.keys()) {
    index.set(id, index.size);
    inDegree.set(id, 0);
    dependents.set(id, []);
  }

  for (const [id, deps] of graph) {
    for (const dep of deps) {
      inDegree.set(id, (inDegree.get(id) ?? 0) + 1);
      dependents.get(dep)?.push(id);
    }
  }

  const byIndex = (a: string, b: string) => (index.get(a) ?? 0) - (index.get(b) ?? 0);
  const ready = [...graph.keys()].filter((id) => inDegree.get(id) === 0);
  const result: string[] = [];

  // Kahn's algorithm, always taking the earliest-inserted ready node
  while (ready.length > 0) {
    const node = ready.shift();
    if (node === undefined) break;
    result.push(node);

    let added = false;
    for (const dependent of dependents.get(node) ?? []) {
      const remaining = (inDegree.get(dependent) ?? 1) - 1;
      inDegree.set(dependent, remaining);
      if (remaining === 0) {
        ready.push(dependent);
        added = true;
      }
    }
    if (added) {
      ready.sort(byIndex);
    }
  }

  if (result.length !== graph.size) {
    return null;
  }

  return result;
}

/**
 * Length of the longest dependency chain below each node (0 = no deps)
 *
 * @param order - A topological order of the same graph
 */
export function computeDepths(graph: Adjacency, order: readonly string[]): Map<string, number> {
  const depths = new Map<string, number>();

  for (const id of order) {
    let depth = 0;
    for (const dep of graph.get(id) ?? []) {
      depth = Math.max(depth, (depths.get(dep) ?? 0) + 1);
    }
    depths.set(id, depth);
  }

  return depths;
}
