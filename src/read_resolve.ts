/**
 * Purpose: Resolve declared script reads against the current tree.
 * Intent: Turn tagged read declarations into concrete node ids plus node-local diagnostics.
 */

import type { NodeStore } from "./node_store.js";
import type { ReadDeclaration } from "./script/reads.js";
import { isNodeRef, type NodeId, type OutlineMessage } from "./types.js";

export interface ResolvedReads {
  /** Concrete ids read, in first-seen order, deduplicated. */
  ids: NodeId[];
  children?: NodeId[];
  descendants?: NodeId[];
  parent?: NodeId | null;
  nodes: Set<NodeId>;
  refs: Map<string, NodeId>;
  /** Ids read through `node("...")` or a `ref` field that do not exist (yet). */
  missing: NodeId[];
  problems: OutlineMessage[];
}

export function emptyReads(): ResolvedReads {
  return { ids: [], nodes: new Set(), refs: new Map(), missing: [], problems: [] };
}

export function resolveReads(store: NodeStore, nodeId: NodeId, reads: readonly ReadDeclaration[]): ResolvedReads {
  const out = emptyReads();
  const seen = new Set<NodeId>();
  const add = (id: NodeId): void => {
    if (seen.has(id)) return;
    seen.add(id);
    out.ids.push(id);
  };

  for (const r of reads) {
    switch (r.kind) {
      case "children":
        out.children = store.children(nodeId).slice();
        out.children.forEach(add);
        break;
      case "descendants":
        out.descendants = store.descendants(nodeId);
        out.descendants.forEach(add);
        break;
      case "parent":
        out.parent = store.parentOf(nodeId);
        if (out.parent !== null) add(out.parent);
        break;
      case "node":
        if (store.has(r.id)) {
          out.nodes.add(r.id);
          add(r.id);
        } else {
          out.missing.push(r.id);
          out.problems.push({
            severity: "error",
            code: "OC_NOT_FOUND",
            message: store.isRetired(r.id) ? `Node was deleted: ${r.id}` : `Node not found: ${r.id}`,
            nodeId,
          });
        }
        break;
      case "ref": {
        const value = store.peek(nodeId)?.meta.get(r.key);
        if (value === undefined || !isNodeRef(value)) {
          out.problems.push({
            severity: "error",
            code: "OC_REF_INVALID",
            message:
              value === undefined
                ? `Metadata field ${r.key} is not set`
                : `Metadata field ${r.key} is not a node reference`,
            nodeId,
          });
          break;
        }
        if (!store.has(value.ref)) {
          out.missing.push(value.ref);
          out.problems.push({
            severity: "error",
            code: "OC_NOT_FOUND",
            message: `Metadata field ${r.key} references a missing node: ${value.ref}`,
            nodeId,
          });
          break;
        }
        out.refs.set(r.key, value.ref);
        add(value.ref);
        break;
      }
      default: {
        const _exhaustive: never = r;
        return _exhaustive;
      }
    }
  }

  return out;
}
