/**
 * Purpose: Record outline mutation requests emitted by a script.
 * Intent: Scripts never write to the store; requests are returned as data and applied by the evaluator.
 */

import type { NodeId } from "../types.js";
import { assertSafeKey, assertString, makeModule } from "./std_shared.js";

export type MutationRequest =
  | { kind: "setMeta"; target: NodeId; key: string; value: unknown }
  | { kind: "removeMeta"; target: NodeId; key: string }
  | { kind: "setText"; target: NodeId; text: string };

export interface OutlineModuleContext {
  emit(request: MutationRequest): void;
}

/** Accepts an id string, a `{ ref }` value or a node view. */
export function targetIdOf(target: unknown, fn: string): NodeId {
  if (typeof target === "string" && target) return target;
  if (typeof target === "object" && target !== null && !Array.isArray(target)) {
    for (const key of ["ref", "id"]) {
      if (!Object.prototype.hasOwnProperty.call(target, key)) continue;
      const id = Reflect.get(target, key);
      if (typeof id === "string" && id) return id;
    }
  }
  throw new Error(`${fn}: expected node id, node reference, or node`);
}

export function createOutlineModule(ctx: OutlineModuleContext): Readonly<Record<string, unknown>> {
  return makeModule({
    setMeta(target: unknown, key: unknown, value: unknown): unknown {
      ctx.emit({
        kind: "setMeta",
        target: targetIdOf(target, "setMeta"),
        key: assertSafeKey(key, "setMeta"),
        value,
      });
      return value ?? null;
    },
    removeMeta(target: unknown, key: unknown): null {
      ctx.emit({ kind: "removeMeta", target: targetIdOf(target, "removeMeta"), key: assertSafeKey(key, "removeMeta") });
      return null;
    },
    setText(target: unknown, text: unknown): string {
      const next = assertString(text, "setText: expected text string");
      ctx.emit({ kind: "setText", target: targetIdOf(target, "setText"), text: next });
      return next;
    },
  });
}
