/**
 * Purpose: Provide shared runtime safety helpers for script evaluation.
 * Intent: Centralize execution budgets, safe property access, and std function discovery.
 */

const bannedProperties = new Set(["__proto__", "prototype", "constructor"]);

export type ScriptFunction = (...args: unknown[]) => unknown;

export class ScriptTimeoutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ScriptTimeoutError";
  }
}

export class ExecutionAbortedError extends Error {
  constructor() {
    super("Script execution aborted");
    this.name = "ExecutionAbortedError";
  }
}

export interface ExecutionLimits {
  stepLimit: number;
  timeoutMs: number;
  signal?: AbortSignal;
  now?: () => number;
}

const CLOCK_CHECK_INTERVAL = 256;

export interface ExecutionBudget {
  /** Charges one evaluation step. */
  tick(): void;
  /** Charges `steps` at once; std functions call this before doing work of that size. */
  charge(steps: number): void;
  used(): number;
}

export function createExecutionBudget(limits: ExecutionLimits): ExecutionBudget {
  const now = limits.now ?? Date.now;
  const deadline = now() + limits.timeoutMs;
  let steps = 0;
  let nextClockCheck = CLOCK_CHECK_INTERVAL;

  const charge = (n: number): void => {
    steps += n;
    if (steps > limits.stepLimit) throw new ScriptTimeoutError(`Step limit exceeded (${limits.stepLimit} steps)`);
    if (steps < nextClockCheck) return;
    nextClockCheck = steps + CLOCK_CHECK_INTERVAL;
    if (limits.signal?.aborted) throw new ExecutionAbortedError();
    if (now() > deadline) throw new ScriptTimeoutError(`Time limit exceeded (${limits.timeoutMs} ms)`);
  };

  return { tick: () => charge(1), charge, used: () => steps };
}

export function isBannedProperty(prop: string): boolean {
  return bannedProperties.has(prop);
}

export function isScriptFunction(v: unknown): v is ScriptFunction {
  return typeof v === "function";
}

export function safeGet(obj: unknown, prop: string): unknown {
  if (isBannedProperty(prop)) throw new Error(`Disallowed property access: ${prop}`);
  if ((typeof obj !== "object" && typeof obj !== "function") || obj === null) {
    throw new Error(`Cannot access property ${prop} on ${obj === null ? "null" : typeof obj}`);
  }
  if (!Object.prototype.hasOwnProperty.call(obj, prop)) {
    throw new Error(`Unknown property: ${prop}`);
  }
  return Reflect.get(obj, prop);
}

export function collectStdFunctions(std: unknown): Set<unknown> {
  const out = new Set<unknown>();
  const seen = new WeakSet<object>();

  function visit(v: unknown): void {
    if ((typeof v !== "object" && typeof v !== "function") || v === null) return;
    if (seen.has(v)) return;
    seen.add(v);

    if (typeof v === "function") {
      out.add(v);
      return;
    }

    for (const key of Object.keys(v)) visit(Reflect.get(v, key));
  }

  visit(std);
  return out;
}

export function deepFreeze<T>(value: T, seen = new WeakSet<object>()): T {
  if ((typeof value !== "object" && typeof value !== "function") || value === null) return value;
  if (seen.has(value)) return value;
  seen.add(value);

  for (const key of Object.keys(value)) deepFreeze(Reflect.get(value, key), seen);
  Object.freeze(value);
  return value;
}
