/**
 * Purpose: Implement array helpers for std.array.
 * Intent: Callbacks are script arrows; results are fresh arrays. Every item handled is charged to the budget.
 */

import { assertArray, assertCallable, assertInteger, makeModule, type ChargeSteps } from "./std_shared.js";

function scalarKey(v: unknown, fn: string): string {
  if (v === null) return "null";
  if (typeof v === "string") return `s:${v}`;
  if (typeof v === "number" || typeof v === "boolean") return `${typeof v}:${String(v)}`;
  throw new Error(`${fn}: expected scalar items`);
}

export function createArrayModule(charge: ChargeSteps): Readonly<Record<string, unknown>> {
  const items = (xs: unknown, fn: string): unknown[] => {
    const arr = assertArray(xs, fn);
    charge(arr.length);
    return arr;
  };

  return makeModule({
    map(xs: unknown, fn: unknown): unknown[] {
      const f = assertCallable(fn, "map");
      return items(xs, "map").map((v, i) => f(v, i));
    },
    filter(xs: unknown, predicate: unknown): unknown[] {
      const f = assertCallable(predicate, "filter");
      return items(xs, "filter").filter((v, i) => {
        const keep = f(v, i);
        if (typeof keep !== "boolean") throw new Error("filter: predicate must return boolean");
        return keep;
      });
    },
    find(xs: unknown, predicate: unknown): unknown {
      const f = assertCallable(predicate, "find");
      for (const [i, v] of assertArray(xs, "find").entries()) {
        charge(1);
        if (f(v, i) === true) return v;
      }
      return null;
    },
    some(xs: unknown, predicate: unknown): boolean {
      const f = assertCallable(predicate, "some");
      return assertArray(xs, "some").some((v, i) => {
        charge(1);
        return f(v, i) === true;
      });
    },
    every(xs: unknown, predicate: unknown): boolean {
      const f = assertCallable(predicate, "every");
      return assertArray(xs, "every").every((v, i) => {
        charge(1);
        return f(v, i) === true;
      });
    },
    take(xs: unknown, n: unknown): unknown[] {
      const count = assertInteger(n, "take: n");
      if (count < 0) throw new Error("take: n must be >= 0");
      return assertArray(xs, "take").slice(0, count);
    },
    drop(xs: unknown, n: unknown): unknown[] {
      const count = assertInteger(n, "drop: n");
      if (count < 0) throw new Error("drop: n must be >= 0");
      return assertArray(xs, "drop").slice(count);
    },
    flatten(xs: unknown): unknown[] {
      const out: unknown[] = [];
      for (const v of items(xs, "flatten")) {
        if (Array.isArray(v)) {
          charge(v.length);
          out.push(...v);
        } else {
          out.push(v);
        }
      }
      return out;
    },
    distinct(xs: unknown): unknown[] {
      const seen = new Set<string>();
      const out: unknown[] = [];
      for (const v of items(xs, "distinct")) {
        const key = scalarKey(v, "distinct");
        if (seen.has(key)) continue;
        seen.add(key);
        out.push(v);
      }
      return out;
    },
    range(n: unknown): number[] {
      const count = assertInteger(n, "range: n");
      if (count < 0) throw new Error("range: n must be >= 0");
      charge(count);
      return Array.from({ length: count }, (_v, i) => i);
    },
  });
}
