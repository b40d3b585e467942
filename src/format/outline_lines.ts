/**
 * Purpose: Read and write the line-oriented outline format.
 * Intent: One node per line, `<id> <parent|-> <attrs|-> <JSON text>`, with line-numbered diagnostics.
 */

import { FormatInvalidError } from "../errors.js";
import type { MetaValue, OutlineMessage } from "../types.js";
import type { OutlineDocNode, OutlineDocument } from "./outline_doc.js";

const bannedKeys = new Set(["__proto__", "prototype", "constructor"]);
const bareKey = /^[^\s=;"@?#-][^\s=;"]*$/;
const numberLiteral = /^-?(?:\d+)(?:\.\d+)?(?:[eE][+-]?\d+)?$/;

function formatKey(key: string): string {
  return bareKey.test(key) ? key : JSON.stringify(key);
}

function formatMetaValue(value: MetaValue): string {
  if (typeof value === "string") return JSON.stringify(value);
  if (typeof value === "number") return String(value);
  if (typeof value === "boolean") return value ? "T" : "F";
  return `@${value.ref}`;
}

function formatAttrs(node: OutlineDocNode): string {
  const parts: string[] = [];
  for (const key of Object.keys(node.meta).sort()) {
    const value = node.meta[key];
    if (value !== undefined) parts.push(`${formatKey(key)}=${formatMetaValue(value)};`);
  }
  for (const key of node.required) {
    if (!Object.prototype.hasOwnProperty.call(node.meta, key)) parts.push(`${formatKey(key)}=?;`);
  }
  return parts.length > 0 ? parts.join("") : "-";
}

export function serializeLines(doc: OutlineDocument): string {
  return doc.nodes
    .map((n) => `${n.id} ${n.parent ?? "-"} ${formatAttrs(n)} ${JSON.stringify(n.text)}`)
    .map((line) => `${line}\n`)
    .join("");
}

class LineError extends Error {
  constructor(message: string, readonly column: number) {
    super(message);
  }
}

/** Position within one line; columns are 1-based in diagnostics. */
interface LineCursor {
  readonly src: string;
  pos: number;
}

function atEnd(c: LineCursor): boolean {
  return c.pos >= c.src.length;
}

function peek(c: LineCursor): string {
  return c.src[c.pos] ?? "";
}

function fail(c: LineCursor, message: string): never {
  throw new LineError(message, c.pos + 1);
}

function readWord(c: LineCursor, what: string): string {
  const start = c.pos;
  while (!atEnd(c) && peek(c) !== " ") c.pos++;
  if (c.pos === start) fail(c, `Expected ${what}`);
  return c.src.slice(start, c.pos);
}

function readSpace(c: LineCursor): void {
  if (peek(c) !== " ") fail(c, "Expected a single space");
  c.pos++;
}

function readJsonString(c: LineCursor, what: string): string {
  const start = c.pos;
  if (peek(c) !== '"') fail(c, `Expected ${what} as a JSON string`);
  c.pos++;
  while (!atEnd(c)) {
    const ch = peek(c);
    if (ch === "\\") {
      c.pos += 2;
      continue;
    }
    c.pos++;
    if (ch === '"') {
      try {
        const v: unknown = JSON.parse(c.src.slice(start, c.pos));
        if (typeof v === "string") return v;
      } catch {
        c.pos = start;
      }
      fail(c, `Invalid JSON string for ${what}`);
    }
  }
  c.pos = start;
  return fail(c, `Unterminated string for ${what}`);
}

function readUntil(c: LineCursor, stop: string): string {
  const start = c.pos;
  while (!atEnd(c) && peek(c) !== stop) c.pos++;
  return c.src.slice(start, c.pos);
}

function scanAttrs(c: LineCursor, node: OutlineDocNode): void {
  if (peek(c) === "-" && c.src[c.pos + 1] === " ") {
    c.pos++;
    return;
  }
  while (!atEnd(c) && peek(c) !== " ") {
    let key: string;
    if (peek(c) === '"') {
      key = readJsonString(c, "attribute key");
    } else {
      key = readUntil(c, "=");
      if (!bareKey.test(key)) fail(c, `Invalid attribute key: ${key || "(empty)"}`);
    }
    if (!key.trim() || bannedKeys.has(key)) fail(c, `Disallowed attribute key: ${JSON.stringify(key)}`);
    if (peek(c) !== "=") fail(c, `Expected '=' after attribute ${key}`);
    c.pos++;

    if (Object.prototype.hasOwnProperty.call(node.meta, key) || node.required.includes(key)) {
      fail(c, `Duplicate attribute: ${key}`);
    }

    if (peek(c) === '"') {
      node.meta[key] = readJsonString(c, `attribute ${key}`);
    } else {
      const start = c.pos;
      const raw = readUntil(c, ";");
      if (raw === "T" || raw === "F") node.meta[key] = raw === "T";
      else if (raw === "?") node.required.push(key);
      else if (raw.startsWith("@") && raw.length > 1 && !/\s/.test(raw)) node.meta[key] = { ref: raw.slice(1) };
      else if (numberLiteral.test(raw)) node.meta[key] = Number(raw);
      else {
        c.pos = start;
        fail(c, `Invalid value for attribute ${key}: ${raw || "(empty)"}`);
      }
    }
    if (peek(c) !== ";") fail(c, `Expected ';' after attribute ${key}`);
    c.pos++;
  }
}

function parseLine(src: string): OutlineDocNode {
  const c: LineCursor = { src, pos: 0 };
  const id = readWord(c, "node id");
  if (id === "-") fail(c, "Node id cannot be '-'");
  readSpace(c);
  const parentWord = readWord(c, "parent id or '-'");
  readSpace(c);
  const node: OutlineDocNode = { id, parent: parentWord === "-" ? null : parentWord, text: "", meta: {}, required: [] };
  scanAttrs(c, node);
  readSpace(c);
  node.text = readJsonString(c, "node text");
  if (!atEnd(c) && c.src.slice(c.pos).trim()) fail(c, "Unexpected content after node text");
  return node;
}

/** Throws FormatInvalidError carrying every problem found. */
export function parseLines(text: string): OutlineDocument {
  const messages: OutlineMessage[] = [];
  const nodes: OutlineDocNode[] = [];
  const seen = new Set<string>();

  text.split(/\r?\n/).forEach((raw, index) => {
    const line = index + 1;
    if (!raw.trim() || raw.trimStart().startsWith("#")) return;
    try {
      const node = parseLine(raw);
      if (seen.has(node.id)) throw new LineError(`Duplicate node id: ${node.id}`, 1);
      if (node.parent !== null && !seen.has(node.parent)) {
        throw new LineError(`Parent ${node.parent} must appear on an earlier line`, node.id.length + 2);
      }
      seen.add(node.id);
      nodes.push(node);
    } catch (err) {
      if (!(err instanceof LineError)) throw err;
      messages.push({ severity: "error", code: "OC_FORMAT_LINE", message: err.message, line, column: err.column });
    }
  });

  if (messages.length > 0) throw new FormatInvalidError(messages);
  return { nodes };
}
