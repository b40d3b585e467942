import { describe, expect, it } from "vitest";
import { ExecutionAbortedError, ScriptTimeoutError } from "./eval_runtime.js";
import { ExpressionSandbox, ScriptParseError, splitScriptText, type NodeView, type ScriptInputs } from "./sandbox.js";

const self: NodeView = Object.freeze({ id: "n1", text: "", value: null, meta: Object.freeze({ rate: 2 }) });
const limits = { stepLimit: 10_000, timeoutMs: 1_000 };

function view(id: string, value: unknown, meta: Record<string, unknown> = {}): NodeView {
  return Object.freeze({ id, text: "", value, meta: Object.freeze(meta) });
}

function run(sandbox: ExpressionSandbox, text: string, inputs: Omit<ScriptInputs, "self"> = {}) {
  const parsed = sandbox.parse(text);
  if (parsed.kind !== "script") throw new Error(`not a script: ${text}`);
  return sandbox.execute(parsed.executable, { self, ...inputs }, limits);
}

function valueOf(text: string, inputs: Omit<ScriptInputs, "self"> = {}): unknown {
  return run(new ExpressionSandbox(), text, inputs).value;
}

describe("ExpressionSandbox", () => {
  describe("parse", () => {
    it("should treat text without the marker as a literal", () => {
      expect(new ExpressionSandbox().parse("plain text")).toEqual({ kind: "literal", value: "plain text" });
    });

    it("should split label and source at the first marker", () => {
      expect(splitScriptText("Total @= 1 + 2")).toEqual({ label: "Total", source: " 1 + 2", offset: 8 });
      expect(splitScriptText("no script")).toBeNull();
    });

    it("should declare reads in a stable order", () => {
      const parsed = new ExpressionSandbox().parse(
        'Mix @= node("a").value + ref("owner").value + std.math.sum(children.value)'
      );
      expect(parsed.kind === "script" ? parsed.reads : null).toEqual([
        { kind: "children" },
        { kind: "node", id: "a" },
        { kind: "ref", key: "owner" },
      ]);
    });

    it("should report the column of a parse error within the node text", () => {
      const sandbox = new ExpressionSandbox();
      let caught: unknown;
      try {
        sandbox.parse("x @= foo");
      } catch (err) {
        caught = err;
      }
      expect(caught).toBeInstanceOf(ScriptParseError);
      expect(caught instanceof ScriptParseError ? [caught.message, caught.column] : null).toEqual([
        "Unknown identifier: foo",
        6,
      ]);
    });

    it("should reject an empty script", () => {
      expect(() => new ExpressionSandbox().parse("x @=  ")).toThrow("Empty script after '@='");
    });

    it("should reject calls to anything but std, node() and ref()", () => {
      expect(() => new ExpressionSandbox().parse("@= children.map(x => x)")).toThrow(
        "Only std.* functions, node() and ref() may be called"
      );
    });

    it("should reject dynamic node ids", () => {
      expect(() => new ExpressionSandbox().parse('@= node("a" & "b")')).toThrow("node() expects a single string literal");
    });

    it("should reject banned property names", () => {
      expect(() => new ExpressionSandbox().parse("@= meta.__proto__")).toThrow("Disallowed property access: __proto__");
    });

    it("should return the cached result for repeated text", () => {
      const sandbox = new ExpressionSandbox();
      expect(sandbox.parse("@= 1")).toBe(sandbox.parse("@= 1"));
    });
  });

  describe("execute", () => {
    it("should evaluate arithmetic and bindings", () => {
      expect(valueOf("@= let { a = 2; b = a * 3 } in a + b")).toBe(8);
      expect(valueOf("@= meta.rate ** 3")).toBe(8);
    });

    it("should expose the label as text", () => {
      expect(valueOf('Title @= text & "!"')).toBe("Title!");
    });

    it("should broadcast member access over children", () => {
      const children = [view("c1", 1, { qty: 2 }), view("c2", 3, { qty: 5 })];
      expect(valueOf("@= children.meta.qty", { children })).toEqual([2, 5]);
      expect(valueOf("@= std.math.sum(children.value * children.meta.qty)", { children })).toBe(17);
    });

    it("should read declared nodes and references", () => {
      const nodes = new Map([["a", view("a", 40)]]);
      const refs = new Map([["owner", view("b", 2)]]);
      expect(valueOf('@= node("a").value + ref("owner").value', { nodes, refs })).toBe(42);
    });

    it("should run script arrows through std.array", () => {
      expect(valueOf("@= std.array.map([1, 2, 3], x => x * 2)")).toEqual([2, 4, 6]);
      expect(valueOf("@= std.array.filter(std.array.range(5), x => x % 2 == 0)")).toEqual([0, 2, 4]);
    });

    it("should round half away from zero", () => {
      expect(valueOf("@= [std.math.round(2.5), std.math.round(-2.5), std.math.round(1.234, 2)]")).toEqual([3, -3, 1.23]);
    });

    it("should lift text helpers over arrays", () => {
      expect(valueOf('@= std.text.upper(["a", "b"])')).toEqual(["A", "B"]);
      expect(valueOf('@= std.text.format("{0} of {1}", 2, "three")')).toBe("2 of three");
      expect(valueOf("@= std.text.join([1, true])")).toBe("1, true");
    });

    it("should pick values with std.logic", () => {
      expect(valueOf('@= std.logic.cond(1 > 2, "a", 2 > 1, "b", "c")')).toBe("b");
      expect(valueOf("@= std.logic.coalesce(null, 0, 5)")).toBe(0);
      expect(valueOf("@= std.logic.where([true, false], 1, 2)")).toEqual([1, 2]);
    });

    it("should fail an assertion with its message", () => {
      expect(() => valueOf('@= std.assert.that(1 > 2, "too small")')).toThrow("too small");
    });

    it("should record outline mutations instead of applying them", () => {
      const result = run(new ExpressionSandbox(), '@= std.outline.setMeta(id, "done", true)');
      expect(result.value).toBe(true);
      expect(result.mutations).toEqual([{ kind: "setMeta", target: "n1", key: "done", value: true }]);
    });

    it("should freeze the result", () => {
      const value = valueOf("@= [1, 2]");
      expect(Object.isFrozen(value)).toBe(true);
    });

    it("should refuse a function result", () => {
      expect(() => valueOf("@= x => x")).toThrow("Script result cannot be a function");
    });

    it("should raise runtime errors as plain errors", () => {
      expect(() => valueOf("@= 1 / 0")).toThrow("Division by zero");
      expect(() => valueOf("@= meta.missing")).toThrow("Unknown property: missing");
      expect(() => valueOf('@= std.array.filter([1], x => x)')).toThrow("filter: predicate must return boolean");
    });

    it("should stop at the step limit", () => {
      const sandbox = new ExpressionSandbox();
      const parsed = sandbox.parse("@= 1 + 1 + 1 + 1 + 1 + 1");
      if (parsed.kind !== "script") throw new Error("not a script");
      expect(() => sandbox.execute(parsed.executable, { self }, { stepLimit: 5, timeoutMs: 1_000 })).toThrow(
        ScriptTimeoutError
      );
    });

    it("should charge std work to the step limit", () => {
      const sandbox = new ExpressionSandbox();
      const tight = { stepLimit: 1_000, timeoutMs: 1_000 };
      const range = sandbox.parse("@= std.array.range(1000000)");
      const mapped = sandbox.parse("@= std.array.map(std.array.range(600), x => x)");
      if (range.kind !== "script" || mapped.kind !== "script") throw new Error("not a script");
      expect(() => sandbox.execute(range.executable, { self }, tight)).toThrow("Step limit exceeded (1000 steps)");
      expect(() => sandbox.execute(mapped.executable, { self }, tight)).toThrow(ScriptTimeoutError);
    });

    it("should stop once the clock passes the time limit", () => {
      const sandbox = new ExpressionSandbox();
      const parsed = sandbox.parse("@= std.math.sum(std.array.range(1000))");
      if (parsed.kind !== "script") throw new Error("not a script");
      let calls = 0;
      const now = (): number => (calls++ === 0 ? 0 : 10_000);
      expect(() => sandbox.execute(parsed.executable, { self }, { stepLimit: 10_000, timeoutMs: 50, now })).toThrow(
        "Time limit exceeded (50 ms)"
      );
    });

    it("should not start when the signal is already aborted", () => {
      const sandbox = new ExpressionSandbox();
      const parsed = sandbox.parse("@= 1");
      if (parsed.kind !== "script") throw new Error("not a script");
      const controller = new AbortController();
      controller.abort();
      expect(() => sandbox.execute(parsed.executable, { self }, { ...limits, signal: controller.signal })).toThrow(
        ExecutionAbortedError
      );
    });

    it("should only run executables it produced", () => {
      const parsed = new ExpressionSandbox().parse("@= 1");
      if (parsed.kind !== "script") throw new Error("not a script");
      expect(() => new ExpressionSandbox().execute(parsed.executable, { self }, limits)).toThrow(
        "Executable was not produced by this sandbox"
      );
    });
  });
});
