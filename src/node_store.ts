/**
 * Purpose: Own the outline forest (nodes, parent/child links, metadata).
 * Intent: Pure data with synchronous, validated writes; derived state listens through change events.
 */

import { CycleRejectedError, InvalidValueError, NotFoundError } from "./errors.js";
import { findCycleFrom, type EdgeSet } from "./graph_cycles.js";
import { isNodeRef, metaValuesEqual, type MetaValue, type NodeId, type NodeRecord, type NodeSnapshot } from "./types.js";

export type StoreChange =
  | { kind: "created"; id: NodeId; parent: NodeId | null }
  | { kind: "text"; id: NodeId }
  | { kind: "meta"; id: NodeId; key: string }
  | { kind: "moved"; id: NodeId; from: NodeId | null; to: NodeId | null }
  | { kind: "removed"; ids: NodeId[]; parent: NodeId | null };

export type StoreListener = (change: StoreChange) => void;

const bannedKeys = new Set(["__proto__", "prototype", "constructor"]);

export function assertMetaKey(key: string): void {
  if (typeof key !== "string" || !key.trim()) throw new InvalidValueError("Metadata key must be a non-empty string");
  if (bannedKeys.has(key)) throw new InvalidValueError(`Disallowed metadata key: ${key}`);
}

export function normalizeMetaValue(value: unknown, key: string): MetaValue {
  if (typeof value === "string" || typeof value === "boolean") return value;
  if (typeof value === "number") {
    if (!Number.isFinite(value)) throw new InvalidValueError(`Metadata ${key} must be a finite number`);
    return value;
  }
  if (isNodeRef(value)) return Object.freeze({ ref: value.ref });
  throw new InvalidValueError(`Metadata ${key} must be a string, number, boolean, or node reference`);
}

export interface CreateNodeOptions {
  /** Explicit id, used when restoring a saved outline. */
  id?: NodeId;
}

export class NodeStore {
  private readonly nodes = new Map<NodeId, NodeRecord>();
  private readonly rootIds: NodeId[] = [];
  private readonly retired = new Set<NodeId>();
  private readonly listeners = new Set<StoreListener>();
  private seq = 0;
  private _version = 0;

  constructor(private readonly createId: () => NodeId) {}

  get version(): number {
    return this._version;
  }

  get size(): number {
    return this.nodes.size;
  }

  subscribe(listener: StoreListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  has(id: NodeId): boolean {
    return this.nodes.has(id);
  }

  /** True for ids that existed once and were deleted. */
  isRetired(id: NodeId): boolean {
    return this.retired.has(id);
  }

  peek(id: NodeId): Readonly<NodeRecord> | undefined {
    return this.nodes.get(id);
  }

  getNode(id: NodeId): NodeSnapshot {
    const n = this.require(id);
    return {
      id: n.id,
      text: n.text,
      parent: n.parent,
      children: n.children.slice(),
      meta: Object.assign(Object.create(null), Object.fromEntries(n.meta)),
      required: [...n.required].sort(),
      version: n.version,
    };
  }

  roots(): readonly NodeId[] {
    return this.rootIds.slice();
  }

  children(id: NodeId | null): readonly NodeId[] {
    if (id === null) return this.roots();
    return this.require(id).children.slice();
  }

  parentOf(id: NodeId): NodeId | null {
    return this.require(id).parent;
  }

  ancestors(id: NodeId): NodeId[] {
    const out: NodeId[] = [];
    let cur = this.require(id).parent;
    while (cur !== null) {
      out.push(cur);
      cur = this.nodes.get(cur)?.parent ?? null;
    }
    return out;
  }

  /** Descendants of `id` in pre-order, excluding `id`. */
  descendants(id: NodeId): NodeId[] {
    const out: NodeId[] = [];
    const stack = this.require(id).children.slice().reverse();
    while (stack.length > 0) {
      const next = stack.pop();
      if (next === undefined) break;
      out.push(next);
      const n = this.nodes.get(next);
      if (!n) continue;
      for (let i = n.children.length - 1; i >= 0; i--) {
        const c = n.children[i];
        if (c !== undefined) stack.push(c);
      }
    }
    return out;
  }

  /** Every node in forest pre-order. */
  allIds(): NodeId[] {
    const out: NodeId[] = [];
    for (const r of this.rootIds) {
      out.push(r, ...this.descendants(r));
    }
    return out;
  }

  createNode(parentId: NodeId | null, position?: number, options: CreateNodeOptions = {}): NodeId {
    if (parentId !== null) this.require(parentId);

    const id = options.id ?? this.freshId();
    if (options.id !== undefined) {
      if (!id.trim() || /\s/.test(id)) throw new InvalidValueError(`Invalid node id: ${JSON.stringify(id)}`);
      if (this.nodes.has(id) || this.retired.has(id)) throw new InvalidValueError(`Node id already used: ${id}`);
    }

    const record: NodeRecord = {
      id,
      seq: ++this.seq,
      text: "",
      parent: parentId,
      children: [],
      meta: new Map(),
      required: new Set(),
      version: this.bump(),
    };
    this.nodes.set(id, record);
    insertAt(this.siblingsOf(parentId), id, position);
    if (parentId !== null) this.touch(parentId);

    this.emit({ kind: "created", id, parent: parentId });
    return id;
  }

  /** Removes `id` and its subtree; returns removed ids in pre-order. */
  deleteNode(id: NodeId): NodeId[] {
    const node = this.require(id);
    const removed = [id, ...this.descendants(id)];
    const parent = node.parent;

    removeFrom(this.siblingsOf(parent), id);
    for (const r of removed) {
      this.nodes.delete(r);
      this.retired.add(r);
    }
    this.bump();
    if (parent !== null) this.touch(parent);

    this.emit({ kind: "removed", ids: removed, parent });
    return removed;
  }

  moveNode(id: NodeId, newParentId: NodeId | null, position?: number): void {
    const node = this.require(id);
    if (newParentId !== null) {
      this.require(newParentId);
      if (this.wouldCreateCycle(id, newParentId)) throw new CycleRejectedError(id, newParentId);
    }

    const from = node.parent;
    removeFrom(this.siblingsOf(from), id);
    insertAt(this.siblingsOf(newParentId), id, position);
    node.parent = newParentId;

    this.touch(id);
    if (from !== null) this.touch(from);
    if (newParentId !== null && newParentId !== from) this.touch(newParentId);

    this.emit({ kind: "moved", id, from, to: newParentId });
  }

  setText(id: NodeId, text: string): boolean {
    const node = this.require(id);
    if (typeof text !== "string") throw new InvalidValueError("Node text must be a string");
    if (node.text === text) return false;
    node.text = text;
    this.touch(id);
    this.emit({ kind: "text", id });
    return true;
  }

  setMeta(id: NodeId, key: string, value: MetaValue): boolean {
    const node = this.require(id);
    assertMetaKey(key);
    const normalized = normalizeMetaValue(value, key);
    node.required.delete(key);
    if (metaValuesEqual(node.meta.get(key), normalized)) return false;
    node.meta.set(key, normalized);
    this.touch(id);
    this.emit({ kind: "meta", id, key });
    return true;
  }

  removeMeta(id: NodeId, key: string): boolean {
    const node = this.require(id);
    if (!node.meta.has(key)) return false;
    node.meta.delete(key);
    this.touch(id);
    this.emit({ kind: "meta", id, key });
    return true;
  }

  /** Marks a metadata key as awaiting a value from the editing surface. */
  markRequired(id: NodeId, key: string): void {
    const node = this.require(id);
    assertMetaKey(key);
    if (node.meta.has(key)) return;
    node.required.add(key);
  }

  private wouldCreateCycle(id: NodeId, newParentId: NodeId): boolean {
    // Upward edges as they would be after the move.
    const upward: EdgeSet<NodeId> = {
      successors: (n) => {
        if (n === id) return [newParentId];
        const p = this.nodes.get(n)?.parent ?? null;
        return p === null ? [] : [p];
      },
    };
    return findCycleFrom(upward, id) !== null;
  }

  private freshId(): NodeId {
    for (let attempt = 0; attempt < 16; attempt++) {
      const id = this.createId();
      if (!this.nodes.has(id) && !this.retired.has(id)) return id;
    }
    throw new InvalidValueError("Id generator keeps returning ids that are already in use");
  }

  private require(id: NodeId): NodeRecord {
    const n = this.nodes.get(id);
    if (!n) throw new NotFoundError(id);
    return n;
  }

  private siblingsOf(parentId: NodeId | null): NodeId[] {
    return parentId === null ? this.rootIds : this.require(parentId).children;
  }

  private bump(): number {
    this._version += 1;
    return this._version;
  }

  private touch(id: NodeId): void {
    const n = this.nodes.get(id);
    if (n) n.version = this.bump();
  }

  private emit(change: StoreChange): void {
    for (const listener of this.listeners) listener(change);
  }
}

function insertAt(list: NodeId[], id: NodeId, position: number | undefined): void {
  if (position === undefined || !Number.isFinite(position)) {
    list.push(id);
    return;
  }
  const at = Math.max(0, Math.min(Math.trunc(position), list.length));
  list.splice(at, 0, id);
}

function removeFrom(list: NodeId[], id: NodeId): void {
  const at = list.indexOf(id);
  if (at !== -1) list.splice(at, 1);
}
