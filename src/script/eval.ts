/**
 * Purpose: Evaluate script expressions against a read-only snapshot.
 * Intent: Enforce deterministic sandboxed execution; every step is charged to the execution budget.
 */

import type { Expr } from "./ast.js";
import {
  assertBoolean,
  compareScalars,
  evalConcat,
  evalNot,
  evalNumericBinary,
  evalUnaryMinus,
  strictEquals,
} from "./eval_ops.js";
import { isBannedProperty, isScriptFunction, safeGet, type ExecutionBudget } from "./eval_runtime.js";

export type Env = Record<string, unknown>;

export interface EvalContext {
  stdFunctions: ReadonlySet<unknown>;
  budget: ExecutionBudget;
  lookupNode(id: string): unknown;
  lookupRef(key: string): unknown;
}

function labelFor(item: unknown, index: number): string {
  if (typeof item === "object" && item !== null && Object.prototype.hasOwnProperty.call(item, "id")) {
    const id = Reflect.get(item, "id");
    if (typeof id === "string") return `Node ${id}`;
  }
  return `Item ${index}`;
}

function evalMember(obj: unknown, prop: string): unknown {
  if (!Array.isArray(obj)) return safeGet(obj, prop);
  if (Object.prototype.hasOwnProperty.call(obj, prop)) return safeGet(obj, prop);
  if (prop in Array.prototype) throw new Error(`Unknown property: ${prop}`);

  const out = new Array<unknown>(obj.length);
  for (let i = 0; i < obj.length; i++) {
    const item: unknown = obj[i];
    try {
      out[i] = safeGet(item, prop);
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      throw new Error(`${labelFor(item, i)}: ${msg}`);
    }
  }
  return out;
}

function evalIndex(obj: unknown, idx: unknown): unknown {
  if (Array.isArray(obj)) {
    if (typeof idx !== "number" || !Number.isInteger(idx) || idx < 0) {
      throw new Error("Index must be a non-negative integer");
    }
    if (idx >= obj.length) throw new Error("Index out of bounds");
    return obj[idx];
  }
  if (typeof idx === "string") return safeGet(obj, idx);
  throw new Error("Indexing requires an array (or an object with a string key)");
}

function stringArgument(expr: Expr | undefined, env: Env, ctx: EvalContext, fn: string): string {
  if (!expr) throw new Error(`${fn}() expects one argument`);
  const v = evalExpr(expr, env, ctx);
  if (typeof v !== "string") throw new Error(`${fn}() expects a string`);
  return v;
}

export function evalExpr(expr: Expr, env: Env, ctx: EvalContext): unknown {
  ctx.budget.tick();

  switch (expr.kind) {
    case "number":
    case "string":
    case "boolean":
      return expr.value;
    case "null":
      return null;
    case "identifier": {
      if (expr.name in env) return env[expr.name];
      throw new Error(`Unknown identifier: ${expr.name}`);
    }
    case "unary": {
      const v = evalExpr(expr.expr, env, ctx);
      return expr.op === "-" ? evalUnaryMinus(v, "Unary '-'") : evalNot(v, "Unary '!'");
    }
    case "binary": {
      if (expr.op === "&&") {
        if (!assertBoolean(evalExpr(expr.left, env, ctx), "Binary '&&'")) return false;
        return assertBoolean(evalExpr(expr.right, env, ctx), "Binary '&&'");
      }
      if (expr.op === "||") {
        if (assertBoolean(evalExpr(expr.left, env, ctx), "Binary '||'")) return true;
        return assertBoolean(evalExpr(expr.right, env, ctx), "Binary '||'");
      }
      if (expr.op === "??") {
        const a = evalExpr(expr.left, env, ctx);
        if (a !== null && a !== undefined) return a;
        return evalExpr(expr.right, env, ctx);
      }

      const a = evalExpr(expr.left, env, ctx);
      const b = evalExpr(expr.right, env, ctx);
      switch (expr.op) {
        case "&":
          return evalConcat(a, b, "Binary '&'");
        case "+":
          return evalNumericBinary("+", a, b, (x, y) => x + y);
        case "-":
          return evalNumericBinary("-", a, b, (x, y) => x - y);
        case "*":
          return evalNumericBinary("*", a, b, (x, y) => x * y);
        case "/":
          return evalNumericBinary("/", a, b, (x, y) => {
            if (y === 0) throw new Error("Division by zero");
            return x / y;
          });
        case "%":
          return evalNumericBinary("%", a, b, (x, y) => {
            if (y === 0) throw new Error("Division by zero");
            return x % y;
          });
        case "**":
          return evalNumericBinary("**", a, b, (x, y) => x ** y);
        case "<":
        case "<=":
        case ">":
        case ">=":
          return compareScalars(expr.op, a, b);
        case "==":
          return strictEquals(a, b);
        case "!=":
          return !strictEquals(a, b);
        default: {
          const _exhaustive: never = expr.op;
          throw new Error(`Unsupported binary op: ${String(_exhaustive)}`);
        }
      }
    }
    case "conditional": {
      const test = assertBoolean(evalExpr(expr.test, env, ctx), "Conditional test");
      return test ? evalExpr(expr.consequent, env, ctx) : evalExpr(expr.alternate, env, ctx);
    }
    case "let": {
      const child: Env = Object.create(env);
      for (const b of expr.bindings) {
        if (isBannedProperty(b.name)) throw new Error(`Disallowed let binding name: ${b.name}`);
        child[b.name] = evalExpr(b.expr, child, ctx);
      }
      return evalExpr(expr.body, child, ctx);
    }
    case "member":
      return evalMember(evalExpr(expr.object, env, ctx), expr.property);
    case "index":
      return evalIndex(evalExpr(expr.object, env, ctx), evalExpr(expr.index, env, ctx));
    case "call": {
      const callee = expr.callee;
      if (callee.kind === "identifier" && callee.name === "node") {
        return ctx.lookupNode(stringArgument(expr.args[0], env, ctx, "node"));
      }
      if (callee.kind === "identifier" && callee.name === "ref") {
        return ctx.lookupRef(stringArgument(expr.args[0], env, ctx, "ref"));
      }
      const fn = evalExpr(callee, env, ctx);
      if (!isScriptFunction(fn)) throw new Error("Callee is not a function");
      if (!ctx.stdFunctions.has(fn)) throw new Error("Only std library functions may be called");
      const args = expr.args.map((a) => evalExpr(a, env, ctx));
      return fn(...args);
    }
    case "array":
      return expr.items.map((item) => evalExpr(item, env, ctx));
    case "object": {
      const out: Env = Object.create(null);
      for (const e of expr.entries) {
        if (e.kind === "spread") {
          const src = evalExpr(e.expr, env, ctx);
          if (!src || typeof src !== "object" || Array.isArray(src)) throw new Error("Object spread requires an object");
          for (const k of Object.keys(src)) {
            if (isBannedProperty(k)) throw new Error(`Disallowed object key: ${k}`);
            out[k] = Reflect.get(src, k);
          }
          continue;
        }
        if (isBannedProperty(e.key)) throw new Error(`Disallowed object key: ${e.key}`);
        out[e.key] = evalExpr(e.value, env, ctx);
      }
      return out;
    }
    case "arrow": {
      const captured = env;
      const params = expr.params.slice();
      const body = expr.body;
      return (...args: unknown[]): unknown => {
        const child: Env = Object.create(captured);
        params.forEach((name, i) => {
          child[name] = args[i] ?? null;
        });
        return evalExpr(body, child, ctx);
      };
    }
    default: {
      const _exhaustive: never = expr;
      return _exhaustive;
    }
  }
}

export function scriptErrorCodeForMessage(message: string): string {
  if (message.startsWith("Division by zero")) return "OC_SCRIPT_DIV_ZERO";
  if (message.startsWith("Non-finite numeric result")) return "OC_SCRIPT_NONFINITE";
  if (message.includes("Unknown property:")) return "OC_SCRIPT_UNKNOWN_PROPERTY";
  return "OC_SCRIPT_RUNTIME";
}
