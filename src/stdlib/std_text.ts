/**
 * Purpose: Implement text helpers for std.text.
 * Intent: Accept only scalars, broadcasting over arrays where a scalar is expected.
 */

import { assertArray, assertString, lift, makeModule, textPartToString, type ChargeSteps } from "./std_shared.js";

export function createTextModule(charge: ChargeSteps): Readonly<Record<string, unknown>> {
  return makeModule({
    concat(...parts: unknown[]): unknown {
      return lift(charge, "concat", parts, (...values) =>
        values.map((v) => textPartToString(v, "concat")).join("")
      );
    },
    upper(s: unknown): unknown {
      return lift(charge, "upper", [s], (v) => assertString(v, "upper: expected string").toUpperCase());
    },
    lower(s: unknown): unknown {
      return lift(charge, "lower", [s], (v) => assertString(v, "lower: expected string").toLowerCase());
    },
    trim(s: unknown): unknown {
      return lift(charge, "trim", [s], (v) => assertString(v, "trim: expected string").trim());
    },
    length(s: unknown): unknown {
      return lift(charge, "length", [s], (v) => assertString(v, "length: expected string").length);
    },
    contains(s: unknown, part: unknown): unknown {
      return lift(charge, "contains", [s, part], (v, p) =>
        assertString(v, "contains: expected string").includes(assertString(p, "contains: expected string"))
      );
    },
    join(items: unknown, sep: unknown = ", "): string {
      const separator = assertString(sep, "join: separator must be a string");
      const arr = assertArray(items, "join");
      charge(arr.length);
      return arr.map((v) => textPartToString(v, "join")).join(separator);
    },
    /** Replaces `{0}`, `{1}`, ... with the matching argument. */
    format(template: unknown, ...args: unknown[]): string {
      const t = assertString(template, "format: template must be a string");
      return t.replace(/\{(\d+)\}/g, (_m, digits: string) => {
        const i = Number(digits);
        if (i >= args.length) throw new Error(`format: missing argument ${i}`);
        return textPartToString(args[i], "format");
      });
    },
  });
}
