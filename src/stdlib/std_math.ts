/**
 * Purpose: Implement numeric aggregate and rounding functions for std.math.
 * Intent: Reject non-finite values early so results stay deterministic.
 */

import { assertFinite, assertFiniteArray, assertInteger, lift, makeModule, type ChargeSteps } from "./std_shared.js";

function roundHalfAwayFromZero(n: number): number {
  return n < 0 ? -Math.round(-n) : Math.round(n);
}

export function createMathModule(charge: ChargeSteps): Readonly<Record<string, unknown>> {
  return makeModule({
    sum(xs: unknown): number {
      return assertFiniteArray(xs, "sum").reduce((s, v) => s + v, 0);
    },
    count(xs: unknown): number {
      if (!Array.isArray(xs)) throw new Error("count: expected array");
      return xs.length;
    },
    mean(xs: unknown): number {
      const arr = assertFiniteArray(xs, "mean");
      if (arr.length === 0) throw new Error("mean: empty array");
      return arr.reduce((s, v) => s + v, 0) / arr.length;
    },
    minOf(xs: unknown): number {
      const arr = assertFiniteArray(xs, "minOf");
      if (arr.length === 0) throw new Error("minOf: empty array");
      return Math.min(...arr);
    },
    maxOf(xs: unknown): number {
      const arr = assertFiniteArray(xs, "maxOf");
      if (arr.length === 0) throw new Error("maxOf: empty array");
      return Math.max(...arr);
    },
    round(x: unknown, digits: unknown = 0): unknown {
      const d = assertInteger(digits, "round: digits");
      if (Math.abs(d) > 12) throw new Error("round: digits out of range");
      return lift(charge, "round", [x], (v) => {
        const n = assertFinite(v, "round: x");
        if (d === 0) return roundHalfAwayFromZero(n);
        const factor = 10 ** Math.abs(d);
        return d > 0 ? roundHalfAwayFromZero(n * factor) / factor : roundHalfAwayFromZero(n / factor) * factor;
      });
    },
    abs(x: unknown): unknown {
      return lift(charge, "abs", [x], (v) => Math.abs(assertFinite(v, "abs: x")));
    },
    clamp(x: unknown, lo: unknown, hi: unknown): unknown {
      return lift(charge, "clamp", [x, lo, hi], (v, a, b) => {
        const low = assertFinite(a, "clamp: lo");
        const high = assertFinite(b, "clamp: hi");
        if (low > high) throw new Error("clamp: lo must be <= hi");
        return Math.min(high, Math.max(low, assertFinite(v, "clamp: x")));
      });
    },
  });
}
