/**
 * Purpose: Plain outline document shared by the line and JSON formats.
 * Intent: Nodes in forest pre-order, so every parent precedes its children.
 */

import type { MetaValue, NodeId } from "../types.js";

export interface OutlineDocNode {
  id: NodeId;
  parent: NodeId | null;
  text: string;
  meta: Record<string, MetaValue>;
  /** Keys left unset by a template prompt. */
  required: string[];
}

export interface OutlineDocument {
  nodes: OutlineDocNode[];
}
