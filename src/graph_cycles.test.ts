import { describe, expect, it } from "vitest";
import { findCycleFrom, reachableFrom, shortestCycleThrough, type EdgeSet } from "./graph_cycles.js";

function edges(map: Record<string, string[]>): EdgeSet<string> {
  return { successors: (n) => map[n] ?? [] };
}

describe("graph_cycles", () => {
  describe("findCycleFrom", () => {
    it("should return null for an acyclic graph", () => {
      expect(findCycleFrom(edges({ a: ["b", "c"], b: ["c"] }), "a")).toBeNull();
    });

    it("should return the cycle path reachable from the start", () => {
      expect(findCycleFrom(edges({ s: ["a"], a: ["b"], b: ["a"] }), "s")).toEqual(["a", "b", "a"]);
    });

    it("should report a self-loop", () => {
      expect(findCycleFrom(edges({ a: ["a"] }), "a")).toEqual(["a", "a"]);
    });
  });

  describe("shortestCycleThrough", () => {
    it("should pick the shortest cycle through the node", () => {
      const g = edges({ a: ["b", "c"], b: ["x"], x: ["a"], c: ["a"] });
      expect(shortestCycleThrough(g, "a")).toEqual(["a", "c", "a"]);
    });

    it("should return null when the node only leads into a cycle", () => {
      expect(shortestCycleThrough(edges({ s: ["a"], a: ["b"], b: ["a"] }), "s")).toBeNull();
    });

    it("should report a self-loop as a two-element path", () => {
      expect(shortestCycleThrough(edges({ a: ["a"] }), "a")).toEqual(["a", "a"]);
    });
  });

  describe("reachableFrom", () => {
    it("should include the starts and everything they reach", () => {
      const seen = reachableFrom(edges({ a: ["b"], b: ["c"], d: ["e"] }), ["a"]);
      expect([...seen]).toEqual(["a", "b", "c"]);
    });
  });
});
