/**
 * Purpose: Provide shared utilities for std module construction.
 * Intent: Keep argument checks and scalar/array lifting consistent across modules.
 */

export type Module = Record<string, unknown>;

/** Charges `steps` to the running execution's budget; throws once the budget is spent. */
export type ChargeSteps = (steps: number) => void;

const bannedProperties = new Set(["__proto__", "prototype", "constructor"]);

export function makeModule<T extends Module>(entries: T): Readonly<T> {
  return Object.freeze(Object.assign(Object.create(null), entries));
}

export function assertSafeKey(key: unknown, prefix: string): string {
  if (typeof key !== "string" || !key) throw new Error(`${prefix}: expected key string`);
  if (bannedProperties.has(key)) throw new Error(`${prefix}: disallowed key: ${key}`);
  return key;
}

export function assertArray(items: unknown, fn: string): unknown[] {
  if (!Array.isArray(items)) throw new Error(`${fn}: expected array`);
  return items;
}

export function assertFiniteArray(xs: unknown, fn: string): number[] {
  const arr = assertArray(xs, fn);
  const out = new Array<number>(arr.length);
  for (let i = 0; i < arr.length; i++) {
    const v = arr[i];
    if (typeof v !== "number" || !Number.isFinite(v)) throw new Error(`${fn}: expected finite number array`);
    out[i] = v;
  }
  return out;
}

export function assertFinite(x: unknown, label: string): number {
  if (typeof x !== "number" || !Number.isFinite(x)) throw new Error(`${label} must be finite`);
  return x;
}

export function assertInteger(x: unknown, label: string): number {
  if (typeof x !== "number" || !Number.isInteger(x)) throw new Error(`${label} must be an integer`);
  return x;
}

export function assertString(x: unknown, label: string): string {
  if (typeof x !== "string") throw new Error(label);
  return x;
}

export function assertCallable(fn: unknown, label: string): (...args: unknown[]) => unknown {
  if (typeof fn !== "function") throw new Error(`${label}: expected function`);
  return (...args: unknown[]) => Reflect.apply(fn, undefined, args);
}

export function textPartToString(v: unknown, label: string): string {
  if (typeof v === "string") return v;
  if (typeof v === "number") {
    if (!Number.isFinite(v)) throw new Error(`${label}: expected finite numbers`);
    return String(v);
  }
  if (typeof v === "boolean") return v ? "true" : "false";
  throw new Error(`${label}: expected string, number, or boolean`);
}

/** Common length of the array arguments, or null when every argument is scalar. */
export function broadcastLen(fn: string, parts: unknown[]): number | null {
  let len: number | null = null;
  for (const p of parts) {
    if (!Array.isArray(p)) continue;
    len = len ?? p.length;
    if (len !== p.length) throw new Error(`${fn}: array length mismatch`);
  }
  return len;
}

export function broadcastAt(part: unknown, index: number): unknown {
  return Array.isArray(part) ? part[index] : part;
}

/** Applies `scalar` once, or element-wise when any argument is an array. */
export function lift(
  charge: ChargeSteps,
  fn: string,
  parts: unknown[],
  scalar: (...values: unknown[]) => unknown
): unknown {
  const len = broadcastLen(fn, parts);
  if (len === null) return scalar(...parts);
  charge(len);
  const out = new Array<unknown>(len);
  for (let i = 0; i < len; i++) out[i] = scalar(...parts.map((p) => broadcastAt(p, i)));
  return out;
}
