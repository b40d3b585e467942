import { describe, expect, it } from "vitest";
import { FormatInvalidError } from "../errors.js";
import { parseJsonSnapshot, parseJsonText, serializeJson } from "./outline_json.js";

function codesOf(raw: unknown): string[] {
  try {
    parseJsonSnapshot(raw);
  } catch (err) {
    if (err instanceof FormatInvalidError) return err.messages.map((m) => `${m.code} ${m.message}`);
    throw err;
  }
  return [];
}

describe("JSON snapshot", () => {
  it("should write a versioned snapshot", () => {
    const text = serializeJson({ nodes: [{ id: "a", parent: null, text: "x", meta: { k: 1 }, required: [] }] });
    expect(JSON.parse(text)).toEqual({
      version: 1,
      nodes: [{ id: "a", parent: null, text: "x", meta: { k: 1 }, required: [] }],
    });
    expect(text.endsWith("}\n")).toBe(true);
  });

  it("should fill optional fields with defaults", () => {
    expect(parseJsonText('{"version":1,"nodes":[{"id":"a"},{"id":"b","parent":"a","meta":{"o":{"ref":"a"}}}]}')).toEqual({
      nodes: [
        { id: "a", parent: null, text: "", meta: {}, required: [] },
        { id: "b", parent: "a", text: "", meta: { o: { ref: "a" } }, required: [] },
      ],
    });
  });

  it("should reject other versions", () => {
    expect(codesOf({ version: 2, nodes: [] })).toEqual(["OC_FORMAT_VERSION Unsupported snapshot version: 2"]);
  });

  it("should report node problems by index", () => {
    expect(
      codesOf({
        version: 1,
        nodes: [{ id: "a" }, { id: "a" }, { id: "b", parent: "zz" }, { id: "c", meta: { bad: [1] } }],
      })
    ).toEqual([
      "OC_FORMAT_JSON nodes[1]: duplicate node id: a",
      "OC_FORMAT_JSON nodes[2]: parent zz must appear earlier",
      "OC_FORMAT_JSON nodes[3]: metadata bad must be a string, finite number, boolean, or { ref }",
    ]);
  });

  it("should wrap invalid JSON", () => {
    expect(() => parseJsonText("{")).toThrow(FormatInvalidError);
  });
});
