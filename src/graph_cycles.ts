/**
 * Purpose: Generic reachability and cycle detection over an explicit edge set.
 * Intent: One traversal shared by tree-move validation and the script dependency graph.
 */

export interface EdgeSet<T> {
  successors(node: T): Iterable<T>;
}

interface Frame<T> {
  node: T;
  next: Iterator<T>;
}

/**
 * Depth-first search from `start`, marking nodes on the active path. Reaching
 * a node that is still on the path closes a cycle; the returned path starts
 * and ends with that node (`[a, b, a]`). Returns null when no cycle is
 * reachable from `start`.
 */
export function findCycleFrom<T>(edges: EdgeSet<T>, start: T): T[] | null {
  const onPath = new Set<T>();
  const done = new Set<T>();
  const stack: Frame<T>[] = [{ node: start, next: edges.successors(start)[Symbol.iterator]() }];
  onPath.add(start);

  while (stack.length > 0) {
    const top = stack[stack.length - 1];
    if (!top) break;
    const step = top.next.next();
    if (step.done) {
      stack.pop();
      onPath.delete(top.node);
      done.add(top.node);
      continue;
    }

    const succ = step.value;
    if (onPath.has(succ)) {
      const path = stack.map((f) => f.node);
      const from = path.indexOf(succ);
      return [...path.slice(from), succ];
    }
    if (done.has(succ)) continue;
    onPath.add(succ);
    stack.push({ node: succ, next: edges.successors(succ)[Symbol.iterator]() });
  }

  return null;
}

/** Shortest cycle through `node` as `[node, ..., node]`, or null when `node` is not on a cycle. */
export function shortestCycleThrough<T>(edges: EdgeSet<T>, node: T): T[] | null {
  const prev = new Map<T, T>();
  const queue: T[] = [node];
  for (let i = 0; i < queue.length; i++) {
    const cur = queue[i];
    if (cur === undefined) continue;
    for (const succ of edges.successors(cur)) {
      if (succ === node) {
        const back: T[] = [];
        let at: T | undefined = cur;
        while (at !== undefined && at !== node) {
          back.push(at);
          at = prev.get(at);
        }
        return [node, ...back.reverse(), node];
      }
      if (prev.has(succ)) continue;
      prev.set(succ, cur);
      queue.push(succ);
    }
  }
  return null;
}

export function reachableFrom<T>(edges: EdgeSet<T>, starts: Iterable<T>): Set<T> {
  const seen = new Set<T>();
  const queue: T[] = [];
  for (const s of starts) {
    if (seen.has(s)) continue;
    seen.add(s);
    queue.push(s);
  }
  for (let i = 0; i < queue.length; i++) {
    const node = queue[i];
    if (node === undefined) continue;
    for (const succ of edges.successors(node)) {
      if (seen.has(succ)) continue;
      seen.add(succ);
      queue.push(succ);
    }
  }
  return seen;
}
