/**
 * Purpose: Implement scalar/vector operators used by script evaluation.
 * Intent: Keep arithmetic, comparison, and concatenation strict; arrays broadcast element-wise.
 */

export function assertFiniteNumber(v: unknown, label: string): number {
  if (typeof v !== "number" || !Number.isFinite(v)) throw new Error(`${label} expects finite number`);
  return v;
}

export function assertFiniteResult(v: number): number {
  if (!Number.isFinite(v)) throw new Error("Non-finite numeric result");
  return v;
}

export function assertBoolean(v: unknown, label: string): boolean {
  if (typeof v !== "boolean") throw new Error(`${label} expects boolean`);
  return v;
}

export function compareScalars(op: "<" | "<=" | ">" | ">=", a: unknown, b: unknown): boolean {
  if (typeof a === "number" && typeof b === "number") {
    const aa = assertFiniteNumber(a, `Binary '${op}'`);
    const bb = assertFiniteNumber(b, `Binary '${op}'`);
    if (op === "<") return aa < bb;
    if (op === "<=") return aa <= bb;
    if (op === ">") return aa > bb;
    return aa >= bb;
  }

  if (typeof a === "string" && typeof b === "string") {
    if (op === "<") return a < b;
    if (op === "<=") return a <= b;
    if (op === ">") return a > b;
    return a >= b;
  }

  throw new Error(`Binary '${op}' expects two numbers or two strings`);
}

export function strictEquals(a: unknown, b: unknown): boolean {
  if (typeof a === "number" && typeof b === "number") {
    return assertFiniteNumber(a, "Binary '=='") === assertFiniteNumber(b, "Binary '=='");
  }
  if (a === null || b === null) return a === b;
  if (typeof a === "string" || typeof a === "boolean") return a === b;
  if (typeof b === "string" || typeof b === "boolean" || typeof b === "number") return false;
  if (typeof a === "number") return false;

  throw new Error("Binary '==' expects comparable scalars");
}

function concatPartToString(v: unknown, label: string): string {
  if (typeof v === "string") return v;
  if (typeof v === "number") {
    if (!Number.isFinite(v)) throw new Error(`${label} expects finite number`);
    return String(v);
  }
  if (typeof v === "boolean") return v ? "true" : "false";
  throw new Error(`${label} expects string, number, or boolean`);
}

function broadcast<T>(
  a: unknown,
  b: unknown,
  label: string,
  scalarFn: (x: unknown, y: unknown, at: string) => T
): T | T[] {
  const aIsArray = Array.isArray(a);
  const bIsArray = Array.isArray(b);
  if (!aIsArray && !bIsArray) return scalarFn(a, b, label);

  const aa: unknown[] | null = Array.isArray(a) ? a : null;
  const bb: unknown[] | null = Array.isArray(b) ? b : null;
  if (aa && bb && aa.length !== bb.length) {
    throw new Error(`${label} vector length mismatch: ${aa.length} vs ${bb.length}`);
  }
  const len = aa?.length ?? bb?.length ?? 0;
  const out = new Array<T>(len);
  for (let i = 0; i < len; i++) {
    out[i] = scalarFn(aa ? aa[i] : a, bb ? bb[i] : b, `${label} [index ${i}]`);
  }
  return out;
}

export function evalUnaryMinus(v: unknown, label: string): unknown {
  if (!Array.isArray(v)) return assertFiniteResult(-assertFiniteNumber(v, label));
  return v.map((item, i) => assertFiniteResult(-assertFiniteNumber(item, `${label} [index ${i}]`)));
}

export function evalNot(v: unknown, label: string): unknown {
  if (!Array.isArray(v)) return !assertBoolean(v, label);
  return v.map((item, i) => !assertBoolean(item, `${label} [index ${i}]`));
}

export function evalConcat(a: unknown, b: unknown, label: string): unknown {
  return broadcast(a, b, label, (x, y, at) => concatPartToString(x, at) + concatPartToString(y, at));
}

export function evalNumericBinary(
  op: string,
  a: unknown,
  b: unknown,
  scalarFn: (x: number, y: number) => number
): unknown {
  return broadcast(a, b, `Binary '${op}'`, (x, y, at) =>
    assertFiniteResult(scalarFn(assertFiniteNumber(x, at), assertFiniteNumber(y, at)))
  );
}
