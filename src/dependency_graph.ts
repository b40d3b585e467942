/**
 * Purpose: Maintain the "reads" relation between nodes and its reverse index.
 * Intent: Derived state only; every edge set is replaced atomically when a node's reads are re-resolved.
 */

import { findCycleFrom, reachableFrom, shortestCycleThrough, type EdgeSet } from "./graph_cycles.js";
import type { NodeId } from "./types.js";

const EMPTY: ReadonlySet<NodeId> = new Set();

export class DependencyGraph {
  private readonly reads = new Map<NodeId, Set<NodeId>>();
  private readonly readers = new Map<NodeId, Set<NodeId>>();

  private readonly forward: EdgeSet<NodeId> = { successors: (n) => this.reads.get(n) ?? EMPTY };
  private readonly reverse: EdgeSet<NodeId> = { successors: (n) => this.readers.get(n) ?? EMPTY };

  /** Replaces the full edge set of `nodeId`. */
  recordReads(nodeId: NodeId, ids: Iterable<NodeId>): void {
    const next = new Set(ids);
    const prev = this.reads.get(nodeId);
    if (prev) {
      for (const dep of prev) {
        if (next.has(dep)) continue;
        const back = this.readers.get(dep);
        back?.delete(nodeId);
        if (back && back.size === 0) this.readers.delete(dep);
      }
    }

    if (next.size === 0) this.reads.delete(nodeId);
    else this.reads.set(nodeId, next);

    for (const dep of next) {
      let back = this.readers.get(dep);
      if (!back) {
        back = new Set();
        this.readers.set(dep, back);
      }
      back.add(nodeId);
    }
  }

  dependencies(nodeId: NodeId): ReadonlySet<NodeId> {
    return new Set(this.reads.get(nodeId) ?? EMPTY);
  }

  dependents(nodeId: NodeId): ReadonlySet<NodeId> {
    return new Set(this.readers.get(nodeId) ?? EMPTY);
  }

  /** `ids` plus everything that transitively reads any of them. */
  dependentsClosure(ids: Iterable<NodeId>): Set<NodeId> {
    return reachableFrom(this.reverse, ids);
  }

  /** Cycle path reachable from `nodeId` along read edges, or null. */
  cycleCheck(nodeId: NodeId): NodeId[] | null {
    return findCycleFrom(this.forward, nodeId);
  }

  /** Shortest read cycle passing through `nodeId`, or null when it is not on one. */
  cycleThrough(nodeId: NodeId): NodeId[] | null {
    return shortestCycleThrough(this.forward, nodeId);
  }

  /** Drops every edge that starts or ends at one of `ids`. */
  removeNodes(ids: Iterable<NodeId>): void {
    const gone = new Set(ids);
    for (const id of gone) this.recordReads(id, []);
    for (const id of gone) {
      const back = this.readers.get(id);
      if (!back) continue;
      for (const reader of back) this.reads.get(reader)?.delete(id);
      this.readers.delete(id);
    }
    for (const [reader, deps] of this.reads) {
      if (deps.size === 0) this.reads.delete(reader);
    }
  }

  clear(): void {
    this.reads.clear();
    this.readers.clear();
  }

  edgeCount(): number {
    let n = 0;
    for (const deps of this.reads.values()) n += deps.size;
    return n;
  }
}
