/**
 * Purpose: Wire store, dependency graph, sandbox, evaluator and templates for one outline.
 * Intent: Single entry point for tree edits, queries, evaluation and templates; no global state.
 */

import { resolveEngineConfig, type EngineConfig, type EngineConfigInput } from "./config.js";
import { DependencyGraph } from "./dependency_graph.js";
import { NotFoundError } from "./errors.js";
import { Evaluator, type PassReport } from "./evaluator.js";
import { displayText } from "./format/render.js";
import { NodeStore, type CreateNodeOptions, type StoreChange } from "./node_store.js";
import { ExpressionSandbox, splitScriptText, type ScriptSandbox } from "./script/sandbox.js";
import { TemplateRegistry } from "./templates/template_expand.js";
import type { TemplateDefinition } from "./templates/template_types.js";
import { templateListFromJson } from "./templates/template_validate.js";
import { NO_VALUE, type MetaValue, type NodeId, type NodeInfo } from "./types.js";

export interface OutlineEngineOptions extends EngineConfigInput {
  sandbox?: ScriptSandbox;
}

const FROM = "engine";

export class OutlineEngine {
  readonly config: EngineConfig;
  private readonly store: NodeStore;
  private readonly graph = new DependencyGraph();
  private readonly evaluator: Evaluator;
  private readonly templates: TemplateRegistry;
  private batchDepth = 0;

  constructor(options: OutlineEngineOptions = {}) {
    this.config = resolveEngineConfig(options);
    this.store = new NodeStore(this.config.createId);
    this.evaluator = new Evaluator(this.store, this.graph, options.sandbox ?? new ExpressionSandbox(), this.config);
    this.templates = new TemplateRegistry(this.store);
    this.store.subscribe((change: StoreChange) => this.evaluator.handleChange(change));
  }

  // Tree mutation

  createNode(parentId: NodeId | null, position?: number, options?: CreateNodeOptions): NodeId {
    return this.store.createNode(parentId, position, options);
  }

  /** Removes the node and its subtree; returns the removed ids in pre-order. */
  deleteNode(id: NodeId): NodeId[] {
    return this.store.deleteNode(id);
  }

  moveNode(id: NodeId, newParentId: NodeId | null, position?: number): void {
    this.store.moveNode(id, newParentId, position);
  }

  setText(id: NodeId, text: string): boolean {
    return this.store.setText(id, text);
  }

  setMeta(id: NodeId, key: string, value: MetaValue): boolean {
    return this.store.setMeta(id, key, value);
  }

  removeMeta(id: NodeId, key: string): boolean {
    return this.store.removeMeta(id, key);
  }

  markRequired(id: NodeId, key: string): void {
    this.store.markRequired(id, key);
  }

  // Queries

  get size(): number {
    return this.store.size;
  }

  get version(): number {
    return this.store.version;
  }

  has(id: NodeId): boolean {
    return this.store.has(id);
  }

  getNode(id: NodeId): NodeInfo {
    const snapshot = this.store.getNode(id);
    const rec = this.evaluator.record(id);
    return {
      ...snapshot,
      state: rec?.state ?? "dirty",
      value: rec ? rec.value : NO_VALUE,
      error: rec?.error ?? null,
      evaluatedAt: rec?.evaluatedAt ?? 0,
    };
  }

  roots(): readonly NodeId[] {
    return this.store.roots();
  }

  children(id: NodeId | null): readonly NodeId[] {
    return this.store.children(id);
  }

  parentOf(id: NodeId): NodeId | null {
    return this.store.parentOf(id);
  }

  descendants(id: NodeId): NodeId[] {
    return this.store.descendants(id);
  }

  /** Every node in forest pre-order. */
  allIds(): NodeId[] {
    return this.store.allIds();
  }

  /** Nodes whose scripts read `id`, in creation order. */
  dependents(id: NodeId): NodeId[] {
    this.requireNode(id);
    return this.inCreationOrder(this.graph.dependents(id));
  }

  /** Nodes `id` reads, in creation order. */
  dependencies(id: NodeId): NodeId[] {
    this.requireNode(id);
    return this.inCreationOrder(this.graph.dependencies(id));
  }

  dirtyNodes(): NodeId[] {
    return this.evaluator.dirtyNodes();
  }

  /** Script label, or null for nodes without a script. */
  labelOf(id: NodeId): string | null {
    const rec = this.evaluator.record(id);
    if (rec?.parsed?.kind === "script") return rec.parsed.label;
    if (rec?.parseError) return splitScriptText(this.store.getNode(id).text)?.label ?? "";
    this.requireNode(id);
    return null;
  }

  render(id: NodeId): string {
    const info = this.getNode(id);
    return displayText(info.state, this.labelOf(id), info.value);
  }

  // Evaluation

  /** Rebuilds all derived state and evaluates to quiescence. */
  evaluate(signal?: AbortSignal): PassReport {
    this.evaluator.rebuild();
    return this.evaluator.runPass(signal);
  }

  evaluateIncremental(signal?: AbortSignal): PassReport {
    return this.evaluator.runPass(signal);
  }

  /**
   * Runs `fn` as one mutation batch, then evaluates incrementally (outermost batch only).
   * When `fn` throws, writes it already made are evaluated before the error is rethrown.
   */
  batch(fn: (engine: OutlineEngine) => void, signal?: AbortSignal): PassReport {
    this.batchDepth++;
    try {
      fn(this);
    } catch (err) {
      this.batchDepth--;
      if (this.batchDepth === 0) this.evaluateIncremental(signal);
      throw err;
    }
    this.batchDepth--;
    if (this.batchDepth > 0) return { evaluated: [], rounds: 0, messages: [], cancelled: false };
    const report = this.evaluateIncremental(signal);
    this.config.logger.debug(`Batch applied at version ${this.store.version}`, FROM);
    return report;
  }

  // Templates

  registerTemplate(definition: TemplateDefinition): TemplateDefinition {
    return this.templates.register(definition);
  }

  /** Registers templates parsed from JSON: one definition object or an array of them. */
  loadTemplates(raw: unknown): TemplateDefinition[] {
    return templateListFromJson(raw).map((t) => this.templates.register(t));
  }

  templateIds(): string[] {
    return this.templates.ids();
  }

  expand(templateId: string, parentId: NodeId | null, position?: number): NodeId {
    return this.templates.expand(templateId, parentId, position);
  }

  applyTemplate(templateId: string, nodeId: NodeId): string[] {
    return this.templates.apply(templateId, nodeId);
  }

  private requireNode(id: NodeId): void {
    if (!this.store.has(id)) throw new NotFoundError(id);
  }

  private inCreationOrder(ids: Iterable<NodeId>): NodeId[] {
    return [...ids].sort((a, b) => (this.store.peek(a)?.seq ?? 0) - (this.store.peek(b)?.seq ?? 0));
  }
}
