/**
 * Purpose: Register templates and materialize them into the node store.
 * Intent: Expansion is a constructor (fresh subtree every call); re-templating merges without overwriting.
 */

import { NotFoundError, TemplateInvalidError } from "../errors.js";
import type { NodeStore } from "../node_store.js";
import type { NodeId, OutlineMessage } from "../types.js";
import type { TemplateDefinition, TemplateEntry, TemplateField } from "./template_types.js";
import { validateTemplate } from "./template_validate.js";

export class TemplateRegistry {
  private readonly templates = new Map<string, TemplateDefinition>();

  constructor(private readonly store: NodeStore) {}

  has(templateId: string): boolean {
    return this.templates.has(templateId);
  }

  ids(): string[] {
    return [...this.templates.keys()].sort();
  }

  get(templateId: string): TemplateDefinition {
    const t = this.templates.get(templateId);
    if (!t) throw new NotFoundError(templateId, "Template");
    return t;
  }

  register(raw: unknown): TemplateDefinition {
    const { definition, messages } = validateTemplate(raw);
    if (!definition) throw new TemplateInvalidError(templateIdOf(raw), messages);
    if (this.templates.has(definition.id)) {
      const dup: OutlineMessage = {
        severity: "error",
        code: "OC_TEMPLATE_DUPLICATE_ID",
        message: `Template already registered: ${definition.id}`,
      };
      throw new TemplateInvalidError(definition.id, [dup]);
    }
    this.templates.set(definition.id, definition);
    return definition;
  }

  /** Creates one node per template entry under `parentId`; returns the new root id. */
  expand(templateId: string, parentId: NodeId | null, position?: number): NodeId {
    const template = this.get(templateId);
    if (parentId !== null && !this.store.has(parentId)) throw new NotFoundError(parentId);
    return this.materialize(template.root, parentId, position);
  }

  /** Merges the root entry's fields into `nodeId`, skipping keys already present; returns the keys written. */
  apply(templateId: string, nodeId: NodeId): string[] {
    const template = this.get(templateId);
    const node = this.store.peek(nodeId);
    if (!node) throw new NotFoundError(nodeId);
    const written: string[] = [];
    for (const field of template.root.fields ?? []) {
      if (node.meta.has(field.key)) continue;
      if (this.seedField(nodeId, field)) written.push(field.key);
    }
    return written;
  }

  private materialize(entry: TemplateEntry, parentId: NodeId | null, position?: number): NodeId {
    const id = this.store.createNode(parentId, position);
    if (entry.text) this.store.setText(id, entry.text);
    for (const field of entry.fields ?? []) this.seedField(id, field);
    for (const child of entry.children ?? []) this.materialize(child, id);
    return id;
  }

  /** True when a default was written; prompt fields are only marked required. */
  private seedField(nodeId: NodeId, field: TemplateField): boolean {
    if (field.prompt || field.default === undefined) {
      this.store.markRequired(nodeId, field.key);
      return false;
    }
    this.store.setMeta(nodeId, field.key, field.default);
    return true;
  }
}

function templateIdOf(raw: unknown): string {
  if (typeof raw !== "object" || raw === null) return "(unknown)";
  const id: unknown = Reflect.get(raw, "id");
  return typeof id === "string" && id.trim() ? id.trim() : "(unknown)";
}
