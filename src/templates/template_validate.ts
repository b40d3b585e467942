/**
 * Purpose: Validate template definitions (typed or parsed from JSON) and normalize them.
 * Intent: Collect every problem with a path into the definition instead of stopping at the first.
 */

import { isNodeRef, metaTypeOf, type MetaTypeTag, type MetaValue, type OutlineMessage } from "../types.js";
import { META_TYPE_TAGS, type TemplateDefinition, type TemplateEntry, type TemplateField } from "./template_types.js";

const bannedKeys = new Set(["__proto__", "prototype", "constructor"]);

function isPlainObject(v: unknown): v is Record<string, unknown> {
  return Boolean(v) && typeof v === "object" && !Array.isArray(v);
}

function isMetaTypeTag(v: unknown): v is MetaTypeTag {
  return META_TYPE_TAGS.some((t) => t === v);
}

function err(messages: OutlineMessage[], code: string, message: string): void {
  messages.push({ severity: "error", code, message });
}

function metaValueOf(v: unknown): MetaValue | null {
  if (typeof v === "string" || typeof v === "boolean") return v;
  if (typeof v === "number") return Number.isFinite(v) ? v : null;
  if (isNodeRef(v)) return { ref: v.ref };
  return null;
}

function validateField(raw: unknown, at: string, messages: OutlineMessage[]): TemplateField | null {
  if (!isPlainObject(raw)) {
    err(messages, "OC_TEMPLATE_FIELD_INVALID", `${at}: field must be an object`);
    return null;
  }
  const key = raw.key;
  if (typeof key !== "string" || !key.trim()) {
    err(messages, "OC_TEMPLATE_FIELD_INVALID", `${at}: field key must be a non-empty string`);
    return null;
  }
  if (bannedKeys.has(key)) {
    err(messages, "OC_TEMPLATE_KEY_DISALLOWED", `${at}: disallowed field key: ${key}`);
    return null;
  }
  const type = raw.type;
  if (!isMetaTypeTag(type)) {
    err(messages, "OC_TEMPLATE_TYPE_UNKNOWN", `${at}: unknown type tag for ${key}: ${String(type)}`);
    return null;
  }
  if (raw.prompt !== undefined && typeof raw.prompt !== "boolean") {
    err(messages, "OC_TEMPLATE_FIELD_INVALID", `${at}: prompt must be a boolean`);
    return null;
  }
  const prompt = raw.prompt === true;

  if (raw.default === undefined) {
    if (!prompt) {
      err(messages, "OC_TEMPLATE_DEFAULT_MISSING", `${at}: field ${key} needs a default or prompt: true`);
      return null;
    }
    return { key, type, prompt };
  }

  const value = metaValueOf(raw.default);
  if (value === null || metaTypeOf(value) !== type) {
    err(messages, "OC_TEMPLATE_DEFAULT_MISMATCH", `${at}: default for ${key} does not match type ${type}`);
    return null;
  }
  return prompt ? { key, type, default: value, prompt } : { key, type, default: value };
}

function validateEntry(raw: unknown, at: string, messages: OutlineMessage[]): TemplateEntry | null {
  if (!isPlainObject(raw)) {
    err(messages, "OC_TEMPLATE_ENTRY_INVALID", `${at}: entry must be an object`);
    return null;
  }
  const entry: TemplateEntry = {};
  let ok = true;

  const text = raw.text;
  if (text !== undefined) {
    if (typeof text === "string") entry.text = text;
    else {
      err(messages, "OC_TEMPLATE_ENTRY_INVALID", `${at}: text must be a string`);
      ok = false;
    }
  }

  const rawFields = raw.fields;
  if (rawFields !== undefined) {
    if (!Array.isArray(rawFields)) {
      err(messages, "OC_TEMPLATE_ENTRY_INVALID", `${at}: fields must be an array`);
      ok = false;
    } else {
      const seen = new Set<string>();
      const fields: TemplateField[] = [];
      rawFields.forEach((f: unknown, i: number) => {
        const field = validateField(f, `${at}.fields[${i}]`, messages);
        if (!field) {
          ok = false;
          return;
        }
        if (seen.has(field.key)) {
          err(messages, "OC_TEMPLATE_KEY_DUPLICATE", `${at}.fields[${i}]: duplicate field key: ${field.key}`);
          ok = false;
          return;
        }
        seen.add(field.key);
        fields.push(field);
      });
      entry.fields = fields;
    }
  }

  const rawChildren = raw.children;
  if (rawChildren !== undefined) {
    if (!Array.isArray(rawChildren)) {
      err(messages, "OC_TEMPLATE_ENTRY_INVALID", `${at}: children must be an array`);
      ok = false;
    } else {
      const children: TemplateEntry[] = [];
      rawChildren.forEach((c: unknown, i: number) => {
        const child = validateEntry(c, `${at}.children[${i}]`, messages);
        if (child) children.push(child);
        else ok = false;
      });
      entry.children = children;
    }
  }

  return ok ? entry : null;
}

export function validateTemplate(raw: unknown): { definition: TemplateDefinition | null; messages: OutlineMessage[] } {
  const messages: OutlineMessage[] = [];
  if (!isPlainObject(raw)) {
    err(messages, "OC_TEMPLATE_INVALID", "Template must be an object");
    return { definition: null, messages };
  }
  const rawId = raw.id;
  const id = typeof rawId === "string" ? rawId.trim() : "";
  if (!id) err(messages, "OC_TEMPLATE_INVALID", "Template id must be a non-empty string");
  const root = validateEntry(raw.root, "root", messages);
  if (!id || !root || messages.length > 0) return { definition: null, messages };
  return { definition: { id, root }, messages };
}

/** Accepts a single template object or an array of them (the CLI `--templates` file). */
export function templateListFromJson(raw: unknown): unknown[] {
  return Array.isArray(raw) ? raw : [raw];
}
