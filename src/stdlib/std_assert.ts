import { makeModule } from "./std_shared.js";

export function createAssertModule(): Readonly<Record<string, unknown>> {
  return makeModule({
    that(condition: unknown, message: unknown = "Assertion failed"): true {
      if (typeof condition !== "boolean") throw new Error("assert.that: condition must be boolean");
      if (!condition) throw new Error(typeof message === "string" ? message : "Assertion failed");
      return true;
    },
  });
}
