import { beforeEach, describe, expect, it } from "vitest";
import { OutlineEngine } from "./engine.js";
import { ConfigInvalidError, NotFoundError } from "./errors.js";

function counterIds(): () => string {
  let n = 0;
  return () => `n${++n}`;
}

describe("OutlineEngine", () => {
  let engine: OutlineEngine;

  beforeEach(() => {
    engine = new OutlineEngine({ createId: counterIds(), logLevel: "silent" });
  });

  it("should reject invalid limits at construction", () => {
    expect(() => new OutlineEngine({ stepLimit: 0, logLevel: "silent" })).toThrow(ConfigInvalidError);
  });

  it("should expose node info with evaluation state", () => {
    const a = engine.createNode(null);
    engine.setText(a, "Price @= 3 * 4");
    expect(engine.getNode(a).state).toBe("dirty");

    engine.evaluate();
    const info = engine.getNode(a);
    expect(info).toMatchObject({ id: a, parent: null, text: "Price @= 3 * 4", state: "clean", value: 12, error: null });
    expect(info.evaluatedAt).toBe(engine.version);
  });

  it("should render literal nodes as their text", () => {
    const a = engine.createNode(null);
    engine.setText(a, "Just words");
    expect(engine.labelOf(a)).toBeNull();
    expect(engine.render(a)).toBe("Just words");
  });

  it("should render arrays and node views", () => {
    const a = engine.createNode(null);
    const b = engine.createNode(null);
    engine.setText(a, "List @= [1, true, \"x\"]");
    engine.setText(b, 'Link @= node("n1")');
    engine.evaluate();
    expect(engine.render(a)).toBe("List 1, true, x");
    expect(engine.render(b)).toBe("Link @n1");
  });

  it("should evaluate once per outermost batch", () => {
    const report = engine.batch((e) => {
      const a = e.createNode(null);
      e.setText(a, "@= 1");
      const inner = e.batch((inside) => {
        const b = inside.createNode(null);
        inside.setText(b, '@= node("n1").value + 1');
      });
      expect(inner.evaluated).toEqual([]);
    });
    expect(report.evaluated).toEqual(["n1", "n2"]);
    expect(engine.getNode("n2").value).toBe(2);
  });

  it("should evaluate writes made before a batch throws", () => {
    const a = engine.createNode(null);
    const reader = engine.createNode(null);
    engine.setMeta(a, "x", 1);
    engine.setText(reader, '@= node("n1").meta.x');
    engine.evaluate();

    expect(() =>
      engine.batch((e) => {
        e.setMeta(a, "x", 2);
        e.setMeta("missing", "x", 3);
      })
    ).toThrow("Node not found: missing");
    expect(engine.dirtyNodes()).toEqual([]);
    expect(engine.getNode(reader)).toMatchObject({ state: "clean", value: 2 });
  });

  it("should throw NotFoundError for unknown ids", () => {
    expect(() => engine.dependents("missing")).toThrow(NotFoundError);
    expect(() => engine.labelOf("missing")).toThrow("Node not found: missing");
  });

  it("should list the forest in pre-order", () => {
    const r = engine.createNode(null);
    const a = engine.createNode(r);
    engine.createNode(a);
    const s = engine.createNode(null);
    expect(engine.allIds()).toEqual(["n1", "n2", "n3", "n4"]);
    expect(engine.roots()).toEqual([r, s]);
    expect(engine.descendants(r)).toEqual(["n2", "n3"]);
    expect(engine.size).toBe(4);
  });
});
