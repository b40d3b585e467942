/**
 * Purpose: Keep computed node values consistent with the outline.
 * Intent: Track per-node evaluation state, schedule dirty scripts in dependency order,
 * and turn every script problem into a node-local diagnostic.
 */

import type { EngineConfig } from "./config.js";
import type { DependencyGraph } from "./dependency_graph.js";
import { InvalidValueError } from "./errors.js";
import { normalizeMetaValue, type NodeStore, type StoreChange } from "./node_store.js";
import { emptyReads, resolveReads, type ResolvedReads } from "./read_resolve.js";
import { scriptErrorCodeForMessage } from "./script/eval.js";
import { ExecutionAbortedError, ScriptTimeoutError } from "./script/eval_runtime.js";
import {
  ScriptParseError,
  type NodeView,
  type ParsedText,
  type ScriptInputs,
  type ScriptSandbox,
} from "./script/sandbox.js";
import type { MutationRequest } from "./stdlib/std.js";
import { NO_VALUE, type ComputedValue, type NodeId, type NodeState, type OutlineMessage } from "./types.js";

export interface EvalRecord {
  state: NodeState;
  value: ComputedValue | typeof NO_VALUE;
  error: OutlineMessage | null;
  evaluatedAt: number;
  /** Text the parse fields below were computed from. */
  parsedFrom: string | null;
  parsed: ParsedText | null;
  parseError: OutlineMessage | null;
  reads: ResolvedReads;
}

export interface PassReport {
  /** Ids in evaluation order; a node re-dirtied by a mutation appears once per round. */
  evaluated: NodeId[];
  rounds: number;
  messages: OutlineMessage[];
  cancelled: boolean;
}

interface QueuedMutation {
  emitter: NodeId;
  request: MutationRequest;
}

type NodeOutcome = "done" | "cancelled";

const FROM = "evaluator";

function hasScript(rec: EvalRecord): boolean {
  return rec.parseError !== null || rec.parsed?.kind === "script";
}

function errorText(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class Evaluator {
  private readonly records = new Map<NodeId, EvalRecord>();
  private readonly dirty = new Set<NodeId>();
  /** Missing id -> nodes whose `node("id")` read is waiting for it. */
  private readonly waiting = new Map<NodeId, Set<NodeId>>();

  constructor(
    private readonly store: NodeStore,
    private readonly graph: DependencyGraph,
    private readonly sandbox: ScriptSandbox,
    private readonly config: EngineConfig
  ) {}

  record(id: NodeId): Readonly<EvalRecord> | undefined {
    return this.records.get(id);
  }

  /** Dirty node ids in creation order. */
  dirtyNodes(): NodeId[] {
    return this.bySeq(this.dirty);
  }

  handleChange(change: StoreChange): void {
    switch (change.kind) {
      case "created": {
        this.records.set(change.id, {
          state: "dirty",
          value: NO_VALUE,
          error: null,
          evaluatedAt: 0,
          parsedFrom: null,
          parsed: null,
          parseError: null,
          reads: emptyReads(),
        });
        const touched = [change.id, ...this.structuralReaders(change.parent)];
        const waiters = this.waiting.get(change.id);
        if (waiters) {
          this.waiting.delete(change.id);
          touched.push(...waiters);
        }
        this.refresh(touched);
        this.markDirty(touched);
        return;
      }
      case "text":
      case "meta":
        this.refresh([change.id]);
        this.markDirty([change.id]);
        return;
      case "moved": {
        const touched = [change.id, ...this.structuralReaders(change.from), ...this.structuralReaders(change.to)];
        this.refresh(touched);
        this.markDirty(touched);
        return;
      }
      case "removed": {
        const gone = new Set(change.ids);
        const affected = [...this.graph.dependentsClosure(gone)].filter((id) => !gone.has(id));
        this.graph.removeNodes(gone);
        for (const id of gone) {
          this.stopWaiting(id);
          this.records.delete(id);
          this.dirty.delete(id);
        }
        const touched = [...affected, ...this.structuralReaders(change.parent)];
        this.refresh(touched);
        this.markDirty(touched);
        return;
      }
      default: {
        const _exhaustive: never = change;
        return _exhaustive;
      }
    }
  }

  /** Rebuilds parse results, read edges and the dirty set from the store. */
  rebuild(): void {
    this.graph.clear();
    this.waiting.clear();
    const all = this.store.allIds();
    for (const id of all) {
      const rec = this.records.get(id);
      if (rec) rec.parsedFrom = null;
    }
    this.refresh(all);
    this.markDirty(all);
  }

  runPass(signal?: AbortSignal): PassReport {
    const report: PassReport = { evaluated: [], rounds: 0, messages: [], cancelled: false };

    while (this.dirty.size > 0) {
      report.rounds++;
      const queued: QueuedMutation[] = [];
      const outcome = this.runRound(signal, report, queued);
      if (outcome === "cancelled") {
        report.cancelled = true;
        // Nodes finished before the abort are clean; their requests still apply.
        this.commitRound(queued, report);
        this.config.logger.warn(`Pass cancelled; ${this.dirty.size} node(s) left dirty`, FROM);
        break;
      }
      this.settleCycles(report);
      const another = queued.length > 0 && report.rounds < this.config.maxMutationRounds;
      this.commitRound(queued, report);
      if (!another) break;
    }

    this.config.logger.debug(
      `Pass finished: ${report.evaluated.length} evaluated, ${report.rounds} round(s), ${report.messages.length} message(s)`,
      FROM
    );
    return report;
  }

  private runRound(signal: AbortSignal | undefined, report: PassReport, queued: QueuedMutation[]): NodeOutcome {
    const indegree = new Map<NodeId, number>();
    const outgoing = new Map<NodeId, NodeId[]>();
    for (const id of this.dirty) {
      let count = 0;
      for (const dep of this.graph.dependencies(id)) {
        if (!this.dirty.has(dep)) continue;
        count++;
        const arr = outgoing.get(dep) ?? [];
        arr.push(id);
        outgoing.set(dep, arr);
      }
      indegree.set(id, count);
    }

    const ready = this.bySeq([...indegree].filter(([, n]) => n === 0).map(([id]) => id));
    while (ready.length > 0) {
      if (signal?.aborted) return "cancelled";
      const id = ready.shift();
      if (id === undefined) break;

      if (this.evaluateNode(id, signal, report, queued) === "cancelled") return "cancelled";

      const released: NodeId[] = [];
      for (const next of outgoing.get(id) ?? []) {
        const left = (indegree.get(next) ?? 0) - 1;
        indegree.set(next, left);
        if (left === 0) released.push(next);
      }
      if (released.length > 0) this.insertBySeq(ready, released);
    }
    return "done";
  }

  private evaluateNode(id: NodeId, signal: AbortSignal | undefined, report: PassReport, queued: QueuedMutation[]): NodeOutcome {
    const rec = this.records.get(id);
    const node = this.store.peek(id);
    if (!rec || !node) {
      this.dirty.delete(id);
      return "done";
    }
    if (rec.state === "evaluating") {
      const message: OutlineMessage = { severity: "error", code: "OC_CYCLE", message: "Re-entered while evaluating", nodeId: id };
      this.fail(rec, id, "cycle_error", message, report);
      return "done";
    }

    rec.state = "evaluating";
    report.evaluated.push(id);

    if (rec.parseError) {
      this.fail(rec, id, "script_error", rec.parseError, report);
      return "done";
    }
    const parsed = rec.parsed;
    if (!parsed || parsed.kind === "literal") {
      this.settleLiteral(rec, id);
      return "done";
    }
    const problem = rec.reads.problems[0];
    if (problem) {
      this.fail(rec, id, "script_error", problem, report);
      return "done";
    }

    try {
      const result = this.sandbox.execute(parsed.executable, this.inputsFor(id, rec.reads), {
        stepLimit: this.config.stepLimit,
        timeoutMs: this.config.timeoutMs,
        signal,
      });
      rec.value = result.value;
      rec.state = "clean";
      rec.error = null;
      rec.evaluatedAt = this.store.version;
      this.dirty.delete(id);
      for (const request of result.mutations) queued.push({ emitter: id, request });
      return "done";
    } catch (err) {
      if (err instanceof ExecutionAbortedError) {
        rec.state = "dirty";
        report.evaluated.pop();
        return "cancelled";
      }
      const message = errorText(err);
      const code = err instanceof ScriptTimeoutError ? "OC_SCRIPT_TIMEOUT" : scriptErrorCodeForMessage(message);
      this.fail(rec, id, "script_error", { severity: "error", code, message, nodeId: id }, report);
      return "done";
    }
  }

  /** Marks every node left dirty after a round as part of, or downstream of, a read cycle. */
  private settleCycles(report: PassReport): void {
    if (this.dirty.size === 0) return;
    for (const id of this.bySeq(this.dirty)) {
      const rec = this.records.get(id);
      if (!rec) continue;
      const own = this.graph.cycleThrough(id);
      const upstream = own ? null : this.graph.cycleCheck(id);
      const message: OutlineMessage = own
        ? { severity: "error", code: "OC_CYCLE", message: `Dependency cycle: ${own.join(" -> ")}`, nodeId: id }
        : {
            severity: "error",
            code: "OC_UPSTREAM_CYCLE",
            message: upstream ? `Depends on dependency cycle: ${upstream.join(" -> ")}` : "Depends on a dependency cycle",
            nodeId: id,
          };
      this.fail(rec, id, "cycle_error", message, report);
    }
  }

  /** Applies the round's requests, or drops them once the round limit is reached. */
  private commitRound(queued: QueuedMutation[], report: PassReport): void {
    if (queued.length === 0) return;
    if (report.rounds >= this.config.maxMutationRounds) this.reportLoopLimit(queued, report);
    else this.applyMutations(queued, report);
  }

  private applyMutations(queued: QueuedMutation[], report: PassReport): void {
    for (const { emitter, request } of queued) {
      const problem = this.applyMutation(emitter, request);
      if (!problem) continue;
      report.messages.push(problem);
      this.config.logger.warn(`${emitter}: ${problem.message}`, FROM);
    }
  }

  private applyMutation(emitter: NodeId, request: MutationRequest): OutlineMessage | null {
    if (!this.store.has(request.target)) {
      return {
        severity: "warning",
        code: "OC_MUTATION_TARGET_MISSING",
        message: `Mutation target not found: ${request.target}`,
        nodeId: emitter,
      };
    }
    try {
      switch (request.kind) {
        case "setMeta":
          this.store.setMeta(request.target, request.key, normalizeMetaValue(request.value, request.key));
          break;
        case "removeMeta":
          this.store.removeMeta(request.target, request.key);
          break;
        case "setText":
          this.store.setText(request.target, request.text);
          break;
        default: {
          const _exhaustive: never = request;
          return _exhaustive;
        }
      }
      return null;
    } catch (err) {
      if (!(err instanceof InvalidValueError)) throw err;
      return { severity: "warning", code: "OC_MUTATION_INVALID", message: err.message, nodeId: emitter };
    }
  }

  private reportLoopLimit(queued: QueuedMutation[], report: PassReport): void {
    const dropped = new Map<NodeId, number>();
    for (const q of queued) dropped.set(q.emitter, (dropped.get(q.emitter) ?? 0) + 1);
    for (const [emitter, count] of dropped) {
      const msg: OutlineMessage = {
        severity: "warning",
        code: "OC_MUTATION_LOOP_LIMIT",
        message: `Mutation chain stopped after ${this.config.maxMutationRounds} round(s); ${count} request(s) dropped`,
        nodeId: emitter,
      };
      const rec = this.records.get(emitter);
      if (rec) rec.error = msg;
      report.messages.push(msg);
      this.config.logger.warn(`${emitter}: ${msg.message}`, FROM);
    }
  }

  private fail(
    rec: EvalRecord,
    id: NodeId,
    state: "cycle_error" | "script_error",
    message: OutlineMessage,
    report: PassReport
  ): void {
    rec.state = state;
    rec.error = message;
    this.dirty.delete(id);
    report.messages.push(message);
  }

  /** Re-parses (when the text changed) and re-resolves reads, replacing the node's edges. */
  private refresh(ids: Iterable<NodeId>): void {
    for (const id of new Set(ids)) {
      const rec = this.records.get(id);
      const node = this.store.peek(id);
      if (!rec || !node) continue;

      if (rec.parsedFrom !== node.text) {
        rec.parsedFrom = node.text;
        rec.parsed = null;
        rec.parseError = null;
        try {
          rec.parsed = this.sandbox.parse(node.text);
        } catch (err) {
          if (!(err instanceof ScriptParseError)) throw err;
          rec.parseError = {
            severity: "error",
            code: "OC_SCRIPT_PARSE",
            message: err.message,
            nodeId: id,
            column: err.column,
          };
        }
      }

      this.stopWaiting(id);
      const parsed = rec.parsed;
      rec.reads = parsed?.kind === "script" ? resolveReads(this.store, id, parsed.reads) : emptyReads();
      this.graph.recordReads(id, rec.reads.ids);
      for (const missing of rec.reads.missing) {
        const set = this.waiting.get(missing) ?? new Set<NodeId>();
        set.add(id);
        this.waiting.set(missing, set);
      }
    }
  }

  /** Dirties `ids` and their transitive dependents; literal nodes settle immediately. */
  private markDirty(ids: Iterable<NodeId>): void {
    for (const id of this.graph.dependentsClosure(ids)) {
      const rec = this.records.get(id);
      if (!rec) continue;
      if (hasScript(rec)) {
        rec.state = "dirty";
        this.dirty.add(id);
      } else {
        this.settleLiteral(rec, id);
      }
    }
  }

  private settleLiteral(rec: EvalRecord, id: NodeId): void {
    const node = this.store.peek(id);
    if (!node) return;
    if (rec.state !== "clean" || rec.value !== node.text) rec.evaluatedAt = this.store.version;
    rec.value = node.text;
    rec.state = "clean";
    rec.error = null;
    this.dirty.delete(id);
  }

  /** `parentId` plus its ancestors whose scripts read descendants. */
  private structuralReaders(parentId: NodeId | null): NodeId[] {
    if (parentId === null || !this.store.has(parentId)) return [];
    const out: NodeId[] = [parentId];
    for (const id of this.store.ancestors(parentId)) {
      const parsed = this.records.get(id)?.parsed;
      if (parsed?.kind === "script" && parsed.reads.some((r) => r.kind === "descendants")) out.push(id);
    }
    return out;
  }

  private stopWaiting(id: NodeId): void {
    const rec = this.records.get(id);
    for (const missing of rec?.reads.missing ?? []) {
      const set = this.waiting.get(missing);
      set?.delete(id);
      if (set && set.size === 0) this.waiting.delete(missing);
    }
  }

  private inputsFor(id: NodeId, reads: ResolvedReads): ScriptInputs {
    const self = this.viewOf(id);
    if (!self) throw new Error(`Node not found: ${id}`);
    const views = (ids: readonly NodeId[]): NodeView[] => ids.flatMap((n) => this.viewOf(n) ?? []);
    const inputs: ScriptInputs = { self };
    if (reads.children) inputs.children = Object.freeze(views(reads.children));
    if (reads.descendants) inputs.descendants = Object.freeze(views(reads.descendants));
    if (reads.parent !== undefined) inputs.parent = reads.parent === null ? null : this.viewOf(reads.parent) ?? null;
    const nodes = new Map<NodeId, NodeView>();
    for (const n of reads.nodes) {
      const v = this.viewOf(n);
      if (v) nodes.set(n, v);
    }
    const refs = new Map<string, NodeView>();
    for (const [key, n] of reads.refs) {
      const v = this.viewOf(n);
      if (v) refs.set(key, v);
    }
    inputs.nodes = nodes;
    inputs.refs = refs;
    return inputs;
  }

  private viewOf(id: NodeId): NodeView | null {
    const node = this.store.peek(id);
    if (!node) return null;
    const value = this.records.get(id)?.value;
    const meta: Record<string, unknown> = Object.create(null);
    for (const [k, v] of node.meta) meta[k] = v;
    return Object.freeze({
      id,
      text: node.text,
      value: value === undefined || value === NO_VALUE ? null : value,
      meta: Object.freeze(meta),
    });
  }

  private bySeq(ids: Iterable<NodeId>): NodeId[] {
    return [...ids].sort((a, b) => this.seqOf(a) - this.seqOf(b));
  }

  private insertBySeq(list: NodeId[], ids: NodeId[]): void {
    for (const id of ids) {
      const seq = this.seqOf(id);
      let at = list.length;
      while (at > 0 && this.seqOf(list[at - 1] ?? id) > seq) at--;
      list.splice(at, 0, id);
    }
  }

  private seqOf(id: NodeId): number {
    return this.store.peek(id)?.seq ?? Number.MAX_SAFE_INTEGER;
  }
}
