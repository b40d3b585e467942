/**
 * Purpose: Read and write the JSON outline snapshot (`{ version: 1, nodes: [...] }`).
 */

import { FormatInvalidError } from "../errors.js";
import { isNodeRef, type MetaValue, type OutlineMessage } from "../types.js";
import type { OutlineDocNode, OutlineDocument } from "./outline_doc.js";

export const SNAPSHOT_VERSION = 1;

const bannedKeys = new Set(["__proto__", "prototype", "constructor"]);

export interface OutlineSnapshotJson {
  version: typeof SNAPSHOT_VERSION;
  nodes: OutlineDocNode[];
}

export function toSnapshotJson(doc: OutlineDocument): OutlineSnapshotJson {
  return {
    version: SNAPSHOT_VERSION,
    nodes: doc.nodes.map((n) => ({
      id: n.id,
      parent: n.parent,
      text: n.text,
      meta: { ...n.meta },
      required: n.required.slice(),
    })),
  };
}

export function serializeJson(doc: OutlineDocument): string {
  return `${JSON.stringify(toSnapshotJson(doc), null, 2)}\n`;
}

function isPlainObject(v: unknown): v is Record<string, unknown> {
  return Boolean(v) && typeof v === "object" && !Array.isArray(v);
}

function metaValueOf(v: unknown): MetaValue | null {
  if (typeof v === "string" || typeof v === "boolean") return v;
  if (typeof v === "number") return Number.isFinite(v) ? v : null;
  if (isNodeRef(v)) return { ref: v.ref };
  return null;
}

function readNode(raw: unknown, at: string, seen: Set<string>, messages: OutlineMessage[]): OutlineDocNode | null {
  const problem = (message: string): null => {
    messages.push({ severity: "error", code: "OC_FORMAT_JSON", message: `${at}: ${message}` });
    return null;
  };
  if (!isPlainObject(raw)) return problem("node must be an object");

  const id = raw.id;
  if (typeof id !== "string" || !id.trim() || /\s/.test(id)) return problem("id must be a non-empty string without spaces");
  if (seen.has(id)) return problem(`duplicate node id: ${id}`);

  const rawParent = raw.parent ?? null;
  let parent: string | null = null;
  if (rawParent !== null) {
    if (typeof rawParent !== "string") return problem("parent must be a string or null");
    if (!seen.has(rawParent)) return problem(`parent ${rawParent} must appear earlier`);
    parent = rawParent;
  }

  const text = raw.text ?? "";
  if (typeof text !== "string") return problem("text must be a string");

  const meta: Record<string, MetaValue> = {};
  const rawMeta = raw.meta ?? {};
  if (!isPlainObject(rawMeta)) return problem("meta must be an object");
  for (const [key, value] of Object.entries(rawMeta)) {
    if (bannedKeys.has(key) || !key.trim()) return problem(`disallowed metadata key: ${JSON.stringify(key)}`);
    const v = metaValueOf(value);
    if (v === null) return problem(`metadata ${key} must be a string, finite number, boolean, or { ref }`);
    meta[key] = v;
  }

  const rawRequired = raw.required ?? [];
  if (!Array.isArray(rawRequired)) return problem("required must be an array of keys");
  const keys: unknown[] = rawRequired;
  const required: string[] = [];
  for (const key of keys) {
    if (typeof key !== "string" || bannedKeys.has(key) || !key.trim()) return problem("required must be an array of keys");
    required.push(key);
  }

  seen.add(id);
  return { id, parent, text, meta, required };
}

/** Throws FormatInvalidError carrying every problem found. */
export function parseJsonSnapshot(raw: unknown): OutlineDocument {
  const messages: OutlineMessage[] = [];
  if (!isPlainObject(raw)) {
    throw new FormatInvalidError([{ severity: "error", code: "OC_FORMAT_JSON", message: "Snapshot must be a JSON object" }]);
  }
  if (raw.version !== SNAPSHOT_VERSION) {
    messages.push({ severity: "error", code: "OC_FORMAT_VERSION", message: `Unsupported snapshot version: ${String(raw.version)}` });
  }
  const rawNodes = raw.nodes;
  if (!Array.isArray(rawNodes)) {
    messages.push({ severity: "error", code: "OC_FORMAT_JSON", message: "nodes must be an array" });
    throw new FormatInvalidError(messages);
  }

  const seen = new Set<string>();
  const nodes: OutlineDocNode[] = [];
  rawNodes.forEach((n: unknown, i: number) => {
    const node = readNode(n, `nodes[${i}]`, seen, messages);
    if (node) nodes.push(node);
  });

  if (messages.length > 0) throw new FormatInvalidError(messages);
  return { nodes };
}

export function parseJsonText(text: string): OutlineDocument {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new FormatInvalidError([{ severity: "error", code: "OC_FORMAT_JSON", message: `Invalid JSON: ${message}` }]);
  }
  return parseJsonSnapshot(raw);
}
