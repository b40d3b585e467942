/**
 * Purpose: Validate a parsed script and extract the reads it declares.
 * Intent: Make every cross-node access static so the dependency graph never has to run scripts to learn edges.
 */

import type { NodeId } from "../types.js";
import type { Expr } from "./ast.js";
import { ScriptSyntaxError } from "./tokenizer.js";

export type ReadDeclaration =
  | { kind: "children" }
  | { kind: "descendants" }
  | { kind: "parent" }
  | { kind: "node"; id: NodeId }
  | { kind: "ref"; key: string };

/** Names provided by the sandbox; none of them may be rebound. */
export const AMBIENT_NAMES = ["id", "text", "meta", "children", "descendants", "parent", "node", "ref", "std"] as const;

const ambient = new Set<string>(AMBIENT_NAMES);
const bannedProperties = new Set(["__proto__", "prototype", "constructor"]);

export function readKey(r: ReadDeclaration): string {
  switch (r.kind) {
    case "children":
    case "descendants":
    case "parent":
      return r.kind;
    case "node":
      return `node:${r.id}`;
    case "ref":
      return `ref:${r.key}`;
    default: {
      const _exhaustive: never = r;
      return _exhaustive;
    }
  }
}

class ReadCollector {
  readonly reads = new Map<string, ReadDeclaration>();

  add(r: ReadDeclaration): void {
    this.reads.set(readKey(r), r);
  }

  sorted(): ReadDeclaration[] {
    return [...this.reads.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)).map(([, r]) => r);
  }
}

function fail(message: string, pos = 0): never {
  throw new ScriptSyntaxError(message, pos);
}

function checkBinding(name: string, what: string): void {
  if (ambient.has(name)) fail(`The identifier '${name}' is reserved and cannot be used as ${what}`);
  if (bannedProperties.has(name)) fail(`Disallowed ${what}: ${name}`);
}

function stringArg(args: Expr[], fn: string, pos: number): string {
  const only = args[0];
  if (args.length !== 1 || !only || only.kind !== "string") fail(`${fn}() expects a single string literal`, pos);
  if (!only.value.trim()) fail(`${fn}() expects a non-empty string`, pos);
  return only.value;
}

function isCalleeAllowed(callee: Expr): boolean {
  let cur = callee;
  while (cur.kind === "member") cur = cur.object;
  return cur.kind === "identifier" && cur.name === "std" && callee.kind === "member";
}

function visit(expr: Expr, scope: ReadonlySet<string>, out: ReadCollector): void {
  switch (expr.kind) {
    case "number":
    case "string":
    case "boolean":
    case "null":
      return;
    case "identifier": {
      const name = expr.name;
      if (scope.has(name)) return;
      if (name === "children" || name === "descendants" || name === "parent") {
        out.add({ kind: name });
        return;
      }
      if (name === "node" || name === "ref") fail(`${name}() must be called with a string literal`, expr.pos);
      if (ambient.has(name)) return;
      return fail(`Unknown identifier: ${name}`, expr.pos);
    }
    case "unary":
      visit(expr.expr, scope, out);
      return;
    case "binary":
      visit(expr.left, scope, out);
      visit(expr.right, scope, out);
      return;
    case "conditional":
      visit(expr.test, scope, out);
      visit(expr.consequent, scope, out);
      visit(expr.alternate, scope, out);
      return;
    case "let": {
      const inner = new Set(scope);
      const seen = new Set<string>();
      for (const b of expr.bindings) {
        checkBinding(b.name, "a let binding name");
        if (seen.has(b.name)) fail(`Duplicate let binding name: ${b.name}`);
        seen.add(b.name);
        visit(b.expr, inner, out);
        inner.add(b.name);
      }
      visit(expr.body, inner, out);
      return;
    }
    case "member":
      if (bannedProperties.has(expr.property)) fail(`Disallowed property access: ${expr.property}`, expr.pos);
      visit(expr.object, scope, out);
      return;
    case "index":
      visit(expr.object, scope, out);
      visit(expr.index, scope, out);
      return;
    case "call": {
      const callee = expr.callee;
      if (callee.kind === "identifier" && !scope.has(callee.name)) {
        if (callee.name === "node") {
          out.add({ kind: "node", id: stringArg(expr.args, "node", expr.pos) });
          return;
        }
        if (callee.name === "ref") {
          const key = stringArg(expr.args, "ref", expr.pos);
          if (bannedProperties.has(key)) fail(`Disallowed metadata key: ${key}`, expr.pos);
          out.add({ kind: "ref", key });
          return;
        }
      }
      if (!isCalleeAllowed(callee)) fail("Only std.* functions, node() and ref() may be called", expr.pos);
      visit(callee, scope, out);
      for (const a of expr.args) visit(a, scope, out);
      return;
    }
    case "array":
      for (const item of expr.items) visit(item, scope, out);
      return;
    case "object":
      for (const e of expr.entries) {
        if (e.kind === "spread") {
          visit(e.expr, scope, out);
          continue;
        }
        if (bannedProperties.has(e.key)) fail(`Disallowed object key: ${e.key}`);
        visit(e.value, scope, out);
      }
      return;
    case "arrow": {
      const inner = new Set(scope);
      const seen = new Set<string>();
      for (const p of expr.params) {
        checkBinding(p, "an arrow parameter");
        if (seen.has(p)) fail(`Duplicate arrow parameter name: ${p}`);
        seen.add(p);
        inner.add(p);
      }
      visit(expr.body, inner, out);
      return;
    }
    default: {
      const _exhaustive: never = expr;
      return _exhaustive;
    }
  }
}

/** Throws ScriptSyntaxError on the first problem found. */
export function collectReads(expr: Expr): ReadDeclaration[] {
  const out = new ReadCollector();
  visit(expr, new Set(), out);
  return out.sorted();
}
