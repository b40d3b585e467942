import { beforeEach, describe, expect, it } from "vitest";
import { CycleRejectedError, InvalidValueError, NotFoundError } from "./errors.js";
import { NodeStore, type StoreChange } from "./node_store.js";

function counterIds(): () => string {
  let n = 0;
  return () => `n${++n}`;
}

describe("NodeStore", () => {
  let store: NodeStore;
  let changes: StoreChange[];

  beforeEach(() => {
    store = new NodeStore(counterIds());
    changes = [];
    store.subscribe((c) => changes.push(c));
  });

  describe("structure", () => {
    it("should create roots and children in order", () => {
      const r = store.createNode(null);
      const a = store.createNode(r);
      const b = store.createNode(r, 0);
      expect(store.roots()).toEqual(["n1"]);
      expect(store.children(r)).toEqual([b, a]);
      expect(store.parentOf(a)).toBe(r);
      expect(store.allIds()).toEqual(["n1", "n3", "n2"]);
    });

    it("should reject creating under a missing parent", () => {
      expect(() => store.createNode("nope")).toThrow(NotFoundError);
    });

    it("should reject reusing an explicit id", () => {
      store.createNode(null, undefined, { id: "a" });
      expect(() => store.createNode(null, undefined, { id: "a" })).toThrow("Node id already used: a");
    });

    it("should remove the whole subtree and retire its ids", () => {
      const r = store.createNode(null);
      const a = store.createNode(r);
      const b = store.createNode(a);
      expect(store.deleteNode(a)).toEqual([a, b]);
      expect(store.has(b)).toBe(false);
      expect(store.isRetired(b)).toBe(true);
      expect(store.children(r)).toEqual([]);
      expect(changes.at(-1)).toEqual({ kind: "removed", ids: [a, b], parent: r });
    });

    it("should move a node and report both parents", () => {
      const p = store.createNode(null);
      const q = store.createNode(null);
      const a = store.createNode(p);
      store.moveNode(a, q);
      expect(store.children(p)).toEqual([]);
      expect(store.children(q)).toEqual([a]);
      expect(changes.at(-1)).toEqual({ kind: "moved", id: a, from: p, to: q });
    });

    it("should refuse to move a node under its own descendant", () => {
      const r = store.createNode(null);
      const a = store.createNode(r);
      expect(() => store.moveNode(r, a)).toThrow(CycleRejectedError);
      expect(store.parentOf(r)).toBeNull();
    });
  });

  describe("content", () => {
    it("should skip no-op writes", () => {
      const a = store.createNode(null);
      expect(store.setText(a, "hello")).toBe(true);
      expect(store.setText(a, "hello")).toBe(false);
      expect(store.setMeta(a, "count", 3)).toBe(true);
      expect(store.setMeta(a, "count", 3)).toBe(false);
      expect(changes.map((c) => c.kind)).toEqual(["created", "text", "meta"]);
    });

    it("should bump the node version on every effective write", () => {
      const a = store.createNode(null);
      const before = store.getNode(a).version;
      store.setText(a, "x");
      expect(store.getNode(a).version).toBeGreaterThan(before);
      expect(store.version).toBe(store.getNode(a).version);
    });

    it("should validate metadata keys and values", () => {
      const a = store.createNode(null);
      expect(() => store.setMeta(a, "__proto__", 1)).toThrow(InvalidValueError);
      expect(() => store.setMeta(a, "", 1)).toThrow("Metadata key must be a non-empty string");
      expect(() => store.setMeta(a, "n", Number.NaN)).toThrow("Metadata n must be a finite number");
    });

    it("should clear a required marker once the key gets a value", () => {
      const a = store.createNode(null);
      store.markRequired(a, "owner");
      expect(store.getNode(a).required).toEqual(["owner"]);
      store.setMeta(a, "owner", { ref: a });
      expect(store.getNode(a).required).toEqual([]);
      expect(store.getNode(a).meta.owner).toEqual({ ref: a });
    });
  });
});
