/**
 * Purpose: Define the typed errors thrown synchronously by structural operations.
 * Intent: Give callers a stable `code` to branch on; script failures never surface here.
 */

import type { OutlineMessage } from "./types.js";

export const ERROR_CODES = {
  NOT_FOUND: "NOT_FOUND",
  CYCLE_REJECTED: "CYCLE_REJECTED",
  INVALID_VALUE: "INVALID_VALUE",
  TEMPLATE_INVALID: "TEMPLATE_INVALID",
  CONFIG_INVALID: "CONFIG_INVALID",
  FORMAT_INVALID: "FORMAT_INVALID",
  SESSION_CLOSED: "SESSION_CLOSED",
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

export class OutlineError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class NotFoundError extends OutlineError {
  readonly id: string;

  constructor(id: string, what = "Node") {
    super(ERROR_CODES.NOT_FOUND, `${what} not found: ${id}`);
    this.id = id;
  }
}

export class CycleRejectedError extends OutlineError {
  constructor(nodeId: string, newParentId: string) {
    super(ERROR_CODES.CYCLE_REJECTED, `Cannot move ${nodeId} under ${newParentId}: target is inside the moved subtree`);
  }
}

export class InvalidValueError extends OutlineError {
  constructor(message: string) {
    super(ERROR_CODES.INVALID_VALUE, message);
  }
}

/** Carries the full diagnostic list so callers can show every problem at once. */
export class TemplateInvalidError extends OutlineError {
  readonly messages: OutlineMessage[];

  constructor(templateId: string, messages: OutlineMessage[]) {
    const first = messages[0]?.message ?? "unknown problem";
    super(ERROR_CODES.TEMPLATE_INVALID, `Invalid template ${templateId}: ${first}`);
    this.messages = messages;
  }
}

export class ConfigInvalidError extends OutlineError {
  constructor(message: string) {
    super(ERROR_CODES.CONFIG_INVALID, message);
  }
}

export class FormatInvalidError extends OutlineError {
  readonly messages: OutlineMessage[];

  constructor(messages: OutlineMessage[]) {
    const first = messages[0];
    const where = first?.line !== undefined ? ` (line ${first.line})` : "";
    super(ERROR_CODES.FORMAT_INVALID, `${first?.message ?? "Invalid outline document"}${where}`);
    this.messages = messages;
  }
}

export class SessionClosedError extends OutlineError {
  constructor() {
    super(ERROR_CODES.SESSION_CLOSED, "Outline session is closed");
  }
}
