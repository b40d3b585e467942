/**
 * Purpose: Format computed values as plain display text.
 */

import { isNodeRef, NO_VALUE, type NodeState } from "../types.js";

export function formatValue(value: unknown): string {
  if (value === NO_VALUE || value === null || value === undefined) return "null";
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  if (Array.isArray(value)) return value.map(formatValue).join(", ");
  if (isNodeRef(value)) return `@${value.ref}`;
  if (typeof value === "object") {
    const id: unknown = Reflect.get(value, "id");
    if (typeof id === "string" && Object.prototype.hasOwnProperty.call(value, "value")) return `@${id}`;
    return JSON.stringify(value);
  }
  return String(value);
}

/** Label followed by the formatted value; literal nodes render their text unchanged. */
export function displayText(state: NodeState, label: string | null, value: unknown): string {
  if (label === null) return formatValue(value);
  const shown = state === "cycle_error" ? "#CYCLE" : state === "script_error" ? "#ERROR" : formatValue(value);
  return label ? `${label} ${shown}` : shown;
}
