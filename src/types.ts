/**
 * Purpose: Declare shared outline data-model and diagnostic types.
 * Intent: Keep contracts between store, graph, sandbox, and evaluator explicit and stable.
 */

export type NodeId = string;

export interface NodeRefValue {
  readonly ref: NodeId;
}

export type MetaValue = string | number | boolean | NodeRefValue;

export type MetaTypeTag = "string" | "number" | "boolean" | "ref";

export type OutlineSeverity = "error" | "warning";

export interface OutlineMessage {
  severity: OutlineSeverity;
  code: string;
  message: string;
  nodeId?: NodeId;
  line?: number;
  column?: number;
}

export type NodeState = "clean" | "dirty" | "evaluating" | "cycle_error" | "script_error";

/** Marker for "no computed value yet"; scripts observe it as `null`. */
export const NO_VALUE: unique symbol = Symbol("outline.no-value");

export type ComputedValue = unknown;

export interface NodeRecord {
  readonly id: NodeId;
  /** Creation ordinal; used for deterministic scheduling among independent nodes. */
  readonly seq: number;
  text: string;
  parent: NodeId | null;
  children: NodeId[];
  meta: Map<string, MetaValue>;
  required: Set<string>;
  /** Store version of the last write touching this node. */
  version: number;
}

export interface NodeSnapshot {
  id: NodeId;
  text: string;
  parent: NodeId | null;
  children: readonly NodeId[];
  meta: Readonly<Record<string, MetaValue>>;
  required: readonly string[];
  version: number;
}

export interface NodeInfo extends NodeSnapshot {
  state: NodeState;
  value: ComputedValue | typeof NO_VALUE;
  error: OutlineMessage | null;
  /** Store version observed when the node was last evaluated; 0 when never evaluated. */
  evaluatedAt: number;
}

export function isNodeRef(v: unknown): v is NodeRefValue {
  return (
    typeof v === "object" &&
    v !== null &&
    !Array.isArray(v) &&
    Object.prototype.hasOwnProperty.call(v, "ref") &&
    typeof Reflect.get(v, "ref") === "string"
  );
}

export function metaTypeOf(v: MetaValue): MetaTypeTag {
  if (typeof v === "string") return "string";
  if (typeof v === "number") return "number";
  if (typeof v === "boolean") return "boolean";
  return "ref";
}

export function metaValuesEqual(a: MetaValue | undefined, b: MetaValue | undefined): boolean {
  if (a === undefined || b === undefined) return a === b;
  if (isNodeRef(a) && isNodeRef(b)) return a.ref === b.ref;
  return a === b;
}
