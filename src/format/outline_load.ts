/**
 * Purpose: Move outlines between an engine and the plain document model.
 * Intent: Loading keeps ids by default; with `remap` every id is fresh and references follow the mapping.
 */

import type { OutlineEngine } from "../engine.js";
import { splitScriptText } from "../script/sandbox.js";
import { isNodeRef, type MetaValue, type NodeId } from "../types.js";
import type { OutlineDocNode, OutlineDocument } from "./outline_doc.js";

export interface LoadOptions {
  /** Issue fresh ids instead of keeping the document's ids. */
  remap?: boolean;
}

export function snapshotOutline(engine: OutlineEngine): OutlineDocument {
  const nodes: OutlineDocNode[] = engine.allIds().map((id) => {
    const n = engine.getNode(id);
    const meta: Record<string, MetaValue> = {};
    for (const [k, v] of Object.entries(n.meta)) meta[k] = isNodeRef(v) ? { ref: v.ref } : v;
    return { id: n.id, parent: n.parent, text: n.text, meta, required: n.required.slice() };
  });
  return { nodes };
}

const nodeCall = /node\(\s*(["'])([^"'\\]*)\1\s*\)/g;

/** Rewrites `node("old")` reads in the script part of `text`. */
export function remapScriptText(text: string, ids: ReadonlyMap<NodeId, NodeId>): string {
  const split = splitScriptText(text);
  if (!split) return text;
  const head = text.slice(0, split.offset);
  const source = split.source.replace(nodeCall, (whole, quote: string, id: string) => {
    const next = ids.get(id);
    return next === undefined ? whole : `node(${quote}${next}${quote})`;
  });
  return head + source;
}

/** Adds the document's nodes to `engine` (pre-order); returns old id -> new id. */
export function loadOutline(engine: OutlineEngine, doc: OutlineDocument, options: LoadOptions = {}): Map<NodeId, NodeId> {
  const ids = new Map<NodeId, NodeId>();

  for (const n of doc.nodes) {
    const parent = n.parent === null ? null : ids.get(n.parent) ?? n.parent;
    const id = options.remap ? engine.createNode(parent) : engine.createNode(parent, undefined, { id: n.id });
    ids.set(n.id, id);
  }

  for (const n of doc.nodes) {
    const id = ids.get(n.id);
    if (id === undefined) continue;
    engine.setText(id, options.remap ? remapScriptText(n.text, ids) : n.text);
    for (const [key, value] of Object.entries(n.meta)) {
      const next = isNodeRef(value) && options.remap ? { ref: ids.get(value.ref) ?? value.ref } : value;
      engine.setMeta(id, key, next);
    }
    for (const key of n.required) engine.markRequired(id, key);
  }

  return ids;
}
