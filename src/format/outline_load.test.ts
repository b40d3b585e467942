import { describe, expect, it } from "vitest";
import { OutlineEngine } from "../engine.js";
import type { OutlineDocument } from "./outline_doc.js";
import { loadOutline, remapScriptText, snapshotOutline } from "./outline_load.js";

function counterIds(): () => string {
  let n = 0;
  return () => `n${++n}`;
}

const doc: OutlineDocument = {
  nodes: [
    { id: "a", parent: null, text: 'Sum @= node("b").meta.v', meta: {}, required: [] },
    { id: "b", parent: "a", text: "", meta: { v: 2, owner: { ref: "a" } }, required: ["due"] },
  ],
};

describe("outline loading", () => {
  it("should keep document ids by default", () => {
    const engine = new OutlineEngine({ createId: counterIds(), logLevel: "silent" });
    expect([...loadOutline(engine, doc)]).toEqual([
      ["a", "a"],
      ["b", "b"],
    ]);
    engine.evaluate();
    expect(engine.render("a")).toBe("Sum 2");
    expect(snapshotOutline(engine)).toEqual(doc);
  });

  it("should rewrite ids and references when remapping", () => {
    const engine = new OutlineEngine({ createId: counterIds(), logLevel: "silent" });
    const ids = loadOutline(engine, doc, { remap: true });
    expect([...ids]).toEqual([
      ["a", "n1"],
      ["b", "n2"],
    ]);
    expect(engine.getNode("n1").text).toBe('Sum @= node("n2").meta.v');
    expect(engine.getNode("n2").meta.owner).toEqual({ ref: "n1" });
    expect(engine.getNode("n2").required).toEqual(["due"]);
    engine.evaluate();
    expect(engine.getNode("n1").value).toBe(2);
  });

  it("should only rewrite ids it knows inside the script part", () => {
    const ids = new Map([["x", "y"]]);
    expect(remapScriptText("node(\"x\") @= node('x').value & node(\"q\").text", ids)).toBe(
      "node(\"x\") @= node('y').value & node(\"q\").text"
    );
    expect(remapScriptText('node("x")', ids)).toBe('node("x")');
  });
});
