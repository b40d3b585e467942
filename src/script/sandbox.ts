/**
 * Purpose: Implement the sandbox protocol for `<label>@= <expression>` node scripts.
 * Intent: Parsing yields static reads plus an opaque executable; execution sees only frozen inputs and std.
 */

import type { NodeId } from "../types.js";
import { createStd, type MutationRequest } from "../stdlib/std.js";
import type { Expr } from "./ast.js";
import { evalExpr, type Env, type EvalContext } from "./eval.js";
import {
  collectStdFunctions,
  createExecutionBudget,
  deepFreeze,
  ExecutionAbortedError,
  isScriptFunction,
  type ExecutionLimits,
} from "./eval_runtime.js";
import { parseExpression } from "./parser.js";
import { collectReads, type ReadDeclaration } from "./reads.js";
import { ScriptSyntaxError } from "./tokenizer.js";

export const SCRIPT_MARKER = "@=";

/** Opaque handle returned by `parse`; only the sandbox that produced it can run it. */
export interface Executable {
  readonly source: string;
}

export type ParsedText =
  | { kind: "literal"; value: string }
  | { kind: "script"; reads: readonly ReadDeclaration[]; executable: Executable; label: string };

export interface NodeView {
  readonly id: NodeId;
  readonly text: string;
  readonly value: unknown;
  readonly meta: Readonly<Record<string, unknown>>;
}

/** Snapshot handed to one execution; only declared reads are populated. */
export interface ScriptInputs {
  self: NodeView;
  children?: readonly NodeView[];
  descendants?: readonly NodeView[];
  parent?: NodeView | null;
  nodes?: ReadonlyMap<NodeId, NodeView>;
  refs?: ReadonlyMap<string, NodeView>;
}

export interface ExecutionResult {
  value: unknown;
  mutations: MutationRequest[];
}

export interface ScriptSandbox {
  /** Throws ScriptParseError. */
  parse(text: string): ParsedText;
  /** Throws ScriptTimeoutError, ExecutionAbortedError or a runtime Error. */
  execute(executable: Executable, inputs: ScriptInputs, limits: ExecutionLimits): ExecutionResult;
}

export class ScriptParseError extends Error {
  /** 1-based column in the full node text. */
  readonly column: number;

  constructor(message: string, column: number) {
    super(message);
    this.name = "ScriptParseError";
    this.column = column;
  }
}

/** Splits node text at the first marker; null when the text has no script. */
export function splitScriptText(text: string): { label: string; source: string; offset: number } | null {
  const at = text.indexOf(SCRIPT_MARKER);
  if (at === -1) return null;
  const offset = at + SCRIPT_MARKER.length;
  return { label: text.slice(0, at).trim(), source: text.slice(offset), offset };
}

interface Compiled {
  expr: Expr;
  label: string;
}

const PARSE_CACHE_LIMIT = 512;

export class ExpressionSandbox implements ScriptSandbox {
  private readonly compiled = new WeakMap<Executable, Compiled>();
  private readonly cache = new Map<string, ParsedText | ScriptParseError>();

  parse(text: string): ParsedText {
    const hit = this.cache.get(text);
    if (hit instanceof ScriptParseError) throw hit;
    if (hit) return hit;

    let result: ParsedText | ScriptParseError;
    try {
      result = this.parseUncached(text);
    } catch (err) {
      if (!(err instanceof ScriptParseError)) throw err;
      result = err;
    }

    if (this.cache.size >= PARSE_CACHE_LIMIT) {
      const oldest = this.cache.keys().next();
      if (!oldest.done) this.cache.delete(oldest.value);
    }
    this.cache.set(text, result);
    if (result instanceof ScriptParseError) throw result;
    return result;
  }

  execute(executable: Executable, inputs: ScriptInputs, limits: ExecutionLimits): ExecutionResult {
    const compiled = this.compiled.get(executable);
    if (!compiled) throw new Error("Executable was not produced by this sandbox");
    if (limits.signal?.aborted) throw new ExecutionAbortedError();

    const mutations: MutationRequest[] = [];
    const budget = createExecutionBudget(limits);
    const std = createStd({ emit: (request) => mutations.push(request), charge: budget.charge });

    const env: Env = Object.create(null);
    env.id = inputs.self.id;
    env.text = compiled.label;
    env.meta = inputs.self.meta;
    env.children = inputs.children ?? null;
    env.descendants = inputs.descendants ?? null;
    env.parent = inputs.parent ?? null;
    env.std = std;

    const nodes = inputs.nodes;
    const refs = inputs.refs;
    const ctx: EvalContext = {
      stdFunctions: collectStdFunctions(std),
      budget,
      lookupNode(id) {
        const view = nodes?.get(id);
        if (!view) throw new Error(`Node not found: ${id}`);
        return view;
      },
      lookupRef(key) {
        const view = refs?.get(key);
        if (!view) throw new Error(`Reference not resolved: ${key}`);
        return view;
      },
    };

    const raw = evalExpr(compiled.expr, env, ctx);
    if (isScriptFunction(raw)) throw new Error("Script result cannot be a function");
    return { value: deepFreeze(raw === undefined ? null : raw), mutations };
  }

  private parseUncached(text: string): ParsedText {
    const split = splitScriptText(text);
    if (!split) return { kind: "literal", value: text };
    if (!split.source.trim()) throw new ScriptParseError("Empty script after '@='", split.offset + 1);

    let expr: Expr;
    let reads: ReadDeclaration[];
    try {
      expr = parseExpression(split.source);
      reads = collectReads(expr);
    } catch (err) {
      if (err instanceof ScriptSyntaxError) throw new ScriptParseError(err.message, split.offset + err.pos + 1);
      throw err;
    }

    const executable: Executable = Object.freeze({ source: split.source });
    this.compiled.set(executable, { expr, label: split.label });
    return Object.freeze({ kind: "script", reads: Object.freeze(reads), executable, label: split.label });
  }
}
