export interface GraphNode<T extends GraphNode<T>> {
  readonly id: string;
  /** Distinct nodes reachable over one edge of `type`. */
  neighbours(type: string): readonly T[];
}

export type CycleListener = (nodeId: string, path: readonly string[]) => void;

/**
 * Breadth-first transitive closure over edges of `type`. The origin is never
 * yielded and no node is yielded twice. A negative or infinite `depthLimit`
 * means unbounded; `0` yields nothing.
 */
export function* breadthFirstClosure<T extends GraphNode<T>>(
  origin: T,
  type: string,
  depthLimit: number = Number.POSITIVE_INFINITY,
): Generator<T, void, undefined> {
  const limit = depthLimit < 0 ? Number.POSITIVE_INFINITY : depthLimit;
  const visited = new Set<string>([origin.id]);
  const queue: { node: T; depth: number }[] = [];

  const enqueueNeighbours = (node: T, depth: number) => {
    for (const next of node.neighbours(type)) {
      if (!visited.has(next.id)) {
        visited.add(next.id);
        queue.push({ node: next, depth });
      }
    }
  };

  if (limit >= 1) {
    enqueueNeighbours(origin, 1);
  }

  for (let head = 0; head < queue.length; head++) {
    const { node, depth } = queue[head];
    yield node;
    if (depth < limit) {
      enqueueNeighbours(node, depth + 1);
    }
  }
}

/**
 * Depth of `node` above the nodes with no outgoing `type` edge, combining the
 * parents' depths with `combine`. Every node visited is kept on one path for
 * the whole walk; meeting a node already on it (the start excepted) scores 0.
 * This stops cycles, and it also cuts short a second route to an ancestor
 * that another route already reached.
 */
export function hierarchyDepth<T extends GraphNode<T>>(
  node: T,
  type: string,
  combine: (depths: readonly number[]) => number,
  onCycle?: CycleListener,
): number {
  const path: string[] = [];

  const walk = (current: T): number => {
    if (path.indexOf(current.id, 1) !== -1) {
      onCycle?.(current.id, [...path]);
      return 0;
    }
    path.push(current.id);
    const parents = current.neighbours(type);
    if (parents.length === 0) {
      return 0;
    }
    return 1 + combine(parents.map(walk));
  };

  return walk(node);
}

export function maxDepth<T extends GraphNode<T>>(
  node: T,
  type: string,
  onCycle?: CycleListener,
): number {
  return hierarchyDepth(node, type, (depths) => Math.max(...depths), onCycle);
}

export function minDepth<T extends GraphNode<T>>(
  node: T,
  type: string,
  onCycle?: CycleListener,
): number {
  return hierarchyDepth(node, type, (depths) => Math.min(...depths), onCycle);
}

/** Every node without an outgoing `type` edge reachable from `start`. */
export function findRoots<T extends GraphNode<T>>(start: T, type: string): T[] {
  const roots: T[] = [];
  const seen = new Set<string>();
  const stack: T[] = [start];

  for (let node = stack.pop(); node; node = stack.pop()) {
    if (seen.has(node.id)) {
      continue;
    }
    seen.add(node.id);
    const parents = node.neighbours(type);
    if (parents.length === 0) {
      roots.push(node);
    } else {
      stack.push(...parents);
    }
  }
  return roots;
}

/**
 * All simple paths from a root down to `node`, each ordered root first and
 * ending with `node`. Parents already on the path are skipped, so a branch
 * that only leads back into a cycle contributes nothing.
 */
export function pathsToRoots<T extends GraphNode<T>>(node: T, type: string): T[][] {
  const onPath = new Set<string>();

  const walk = (current: T): T[][] => {
    const parents = current.neighbours(type);
    if (parents.length === 0) {
      return [[current]];
    }
    onPath.add(current.id);
    const paths: T[][] = [];
    for (const parent of parents) {
      if (onPath.has(parent.id)) {
        continue;
      }
      for (const ancestors of walk(parent)) {
        paths.push([...ancestors, current]);
      }
    }
    onPath.delete(current.id);
    return paths;
  };

  return walk(node);
}
