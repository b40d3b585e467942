/**
 * Purpose: Resolve and validate engine configuration.
 * Intent: Apply defaults in one place and reject bad limits before any outline is built.
 */

import { v4 as uuidv4 } from "uuid";
import { ConfigInvalidError } from "./errors.js";
import { createLogger, isLogLevel, type LogLevel, type Logger } from "./log.js";

export interface EngineConfig {
  /** Evaluation rounds per pass; the default allows one extra round dirtied by script writes. */
  maxMutationRounds: number;
  /** Evaluation steps allowed per script execution. */
  stepLimit: number;
  /** Wall-clock budget per script execution, in milliseconds. */
  timeoutMs: number;
  createId: () => string;
  logger: Logger;
}

export interface EngineConfigInput {
  maxMutationRounds?: number;
  stepLimit?: number;
  timeoutMs?: number;
  createId?: () => string;
  logLevel?: LogLevel;
  logger?: Logger;
}

export const DEFAULT_CONFIG = {
  maxMutationRounds: 2,
  stepLimit: 100_000,
  timeoutMs: 250,
  logLevel: "warn",
} as const;

function positiveInteger(value: number | undefined, fallback: number, name: string): number {
  if (value === undefined) return fallback;
  if (!Number.isFinite(value) || !Number.isInteger(value) || value < 1) {
    throw new ConfigInvalidError(`${name} must be a positive integer (got ${String(value)})`);
  }
  return value;
}

export function resolveEngineConfig(input: EngineConfigInput = {}): EngineConfig {
  if (input.logLevel !== undefined && !isLogLevel(input.logLevel)) {
    throw new ConfigInvalidError(`Unknown logLevel: ${String(input.logLevel)}`);
  }
  return {
    maxMutationRounds: positiveInteger(input.maxMutationRounds, DEFAULT_CONFIG.maxMutationRounds, "maxMutationRounds"),
    stepLimit: positiveInteger(input.stepLimit, DEFAULT_CONFIG.stepLimit, "stepLimit"),
    timeoutMs: positiveInteger(input.timeoutMs, DEFAULT_CONFIG.timeoutMs, "timeoutMs"),
    createId: input.createId ?? (() => uuidv4()),
    logger: input.logger ?? createLogger(input.logLevel ?? DEFAULT_CONFIG.logLevel),
  };
}

/** Reads config keys from parsed JSON (CLI `--config` files); unknown keys are rejected. */
export function configInputFromJson(raw: unknown): EngineConfigInput {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    throw new ConfigInvalidError("Config file must contain a JSON object");
  }
  const out: EngineConfigInput = {};
  for (const [key, value] of Object.entries(raw)) {
    switch (key) {
      case "maxMutationRounds":
      case "stepLimit":
      case "timeoutMs":
        if (typeof value !== "number") throw new ConfigInvalidError(`${key} must be a number`);
        out[key] = value;
        break;
      case "logLevel":
        if (!isLogLevel(value)) throw new ConfigInvalidError(`Unknown logLevel: ${String(value)}`);
        out.logLevel = value;
        break;
      default:
        throw new ConfigInvalidError(`Unknown config key: ${key}`);
    }
  }
  return out;
}
