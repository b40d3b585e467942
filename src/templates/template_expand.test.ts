import { beforeEach, describe, expect, it } from "vitest";
import { OutlineEngine } from "../engine.js";
import { NotFoundError, TemplateInvalidError } from "../errors.js";
import type { TemplateDefinition } from "./template_types.js";
import { validateTemplate } from "./template_validate.js";

function counterIds(): () => string {
  let n = 0;
  return () => `n${++n}`;
}

const task: TemplateDefinition = {
  id: "task",
  root: {
    text: "Task",
    fields: [
      { key: "done", type: "boolean", default: false },
      { key: "owner", type: "ref", prompt: true },
    ],
    children: [{ text: "Notes" }],
  },
};

describe("templates", () => {
  let engine: OutlineEngine;

  beforeEach(() => {
    engine = new OutlineEngine({ createId: counterIds(), logLevel: "silent" });
    engine.registerTemplate(task);
  });

  describe("expand", () => {
    it("should build a fresh subtree with defaults and prompts", () => {
      const root = engine.expand("task", null);
      expect(root).toBe("n1");
      const info = engine.getNode(root);
      expect(info.text).toBe("Task");
      expect({ ...info.meta }).toEqual({ done: false });
      expect(info.required).toEqual(["owner"]);
      expect(engine.children(root)).toEqual(["n2"]);
      expect(engine.getNode("n2").text).toBe("Notes");
    });

    it("should create independent subtrees on every call", () => {
      const first = engine.expand("task", null);
      const second = engine.expand("task", null);
      expect([first, second]).toEqual(["n1", "n3"]);
      expect(engine.size).toBe(4);
    });

    it("should fail for unknown templates and parents", () => {
      expect(() => engine.expand("nope", null)).toThrow("Template not found: nope");
      expect(() => engine.expand("task", "ghost")).toThrow(NotFoundError);
    });
  });

  describe("apply", () => {
    it("should only fill keys the node does not have yet", () => {
      const a = engine.createNode(null);
      engine.setMeta(a, "done", true);
      expect(engine.applyTemplate("task", a)).toEqual([]);
      expect(engine.getNode(a).meta.done).toBe(true);
      expect(engine.getNode(a).required).toEqual(["owner"]);

      const b = engine.createNode(null);
      expect(engine.applyTemplate("task", b)).toEqual(["done"]);
      expect(engine.applyTemplate("task", b)).toEqual([]);
    });

    it("should clear the prompt once the field is set", () => {
      const root = engine.expand("task", null);
      engine.setMeta(root, "owner", { ref: root });
      expect(engine.getNode(root).required).toEqual([]);
    });
  });

  describe("registration", () => {
    it("should refuse a second template with the same id", () => {
      let caught: unknown;
      try {
        engine.registerTemplate(task);
      } catch (err) {
        caught = err;
      }
      expect(caught).toBeInstanceOf(TemplateInvalidError);
      expect(caught instanceof TemplateInvalidError ? caught.messages.map((m) => m.code) : []).toEqual([
        "OC_TEMPLATE_DUPLICATE_ID",
      ]);
    });

    it("should load templates from parsed JSON", () => {
      engine.loadTemplates([{ id: "note", root: { text: "Note" } }]);
      expect(engine.templateIds()).toEqual(["note", "task"]);
    });
  });

  describe("validateTemplate", () => {
    it("should collect every problem with its path", () => {
      const { definition, messages } = validateTemplate({
        id: "bad",
        root: {
          fields: [
            { key: "n", type: "number", default: "x" },
            { key: "when", type: "date", default: 1 },
            { key: "n", type: "number", default: 1 },
            { key: "who", type: "string" },
          ],
          children: [{ text: 5 }],
        },
      });
      expect(definition).toBeNull();
      expect(messages.map((m) => `${m.code} ${m.message}`)).toEqual([
        "OC_TEMPLATE_DEFAULT_MISMATCH root.fields[0]: default for n does not match type number",
        "OC_TEMPLATE_TYPE_UNKNOWN root.fields[1]: unknown type tag for when: date",
        "OC_TEMPLATE_DEFAULT_MISSING root.fields[3]: field who needs a default or prompt: true",
        "OC_TEMPLATE_ENTRY_INVALID root.children[0]: text must be a string",
      ]);
    });

    it("should reject disallowed keys and missing ids", () => {
      const { messages } = validateTemplate({ id: " ", root: { fields: [{ key: "__proto__", type: "string", default: "" }] } });
      expect(messages.map((m) => m.code)).toEqual(["OC_TEMPLATE_INVALID", "OC_TEMPLATE_KEY_DISALLOWED"]);
    });
  });
});
