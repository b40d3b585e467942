/**
 * Purpose: Implement conditional helpers for std.logic.
 */

import { assertArray, lift, makeModule, type ChargeSteps } from "./std_shared.js";

function isPresent(v: unknown): boolean {
  return v !== null && v !== undefined;
}

export function createLogicModule(charge: ChargeSteps): Readonly<Record<string, unknown>> {
  return makeModule({
    /** `cond(test1, value1, test2, value2, ..., fallback)` */
    cond(...args: unknown[]): unknown {
      if (args.length < 3 || args.length % 2 === 0) {
        throw new Error("cond: expected pairs of (test, value) followed by a fallback");
      }
      for (let i = 0; i + 1 < args.length; i += 2) {
        const test = args[i];
        if (typeof test !== "boolean") throw new Error("cond: test must be boolean");
        if (test) return args[i + 1];
      }
      return args[args.length - 1];
    },
    coalesce(...args: unknown[]): unknown {
      for (const a of args) if (isPresent(a)) return a;
      return null;
    },
    isPresent(v: unknown): unknown {
      return lift(charge, "isPresent", [v], isPresent);
    },
    where(test: unknown, whenTrue: unknown, whenFalse: unknown): unknown {
      return lift(charge, "where", [test, whenTrue, whenFalse], (t, a, b) => {
        if (typeof t !== "boolean") throw new Error("where: test must be boolean");
        return t ? a : b;
      });
    },
    /** Drops null entries; useful over `children.value` when some children are plain text. */
    present(items: unknown): unknown[] {
      const arr = assertArray(items, "present");
      charge(arr.length);
      return arr.filter(isPresent);
    },
  });
}
