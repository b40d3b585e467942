import { describe, expect, it } from "vitest";
import { configInputFromJson, DEFAULT_CONFIG, resolveEngineConfig } from "./config.js";
import { ConfigInvalidError } from "./errors.js";

describe("config", () => {
  it("should apply defaults", () => {
    const config = resolveEngineConfig({ logLevel: "silent" });
    expect([config.maxMutationRounds, config.stepLimit, config.timeoutMs]).toEqual([2, 100_000, 250]);
    expect(DEFAULT_CONFIG.maxMutationRounds).toBe(2);
  });

  it("should generate distinct uuid node ids by default", () => {
    const { createId } = resolveEngineConfig({ logLevel: "silent" });
    const a = createId();
    expect(a).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    expect(createId()).not.toBe(a);
  });

  it("should reject non-positive or fractional limits", () => {
    expect(() => resolveEngineConfig({ stepLimit: 0 })).toThrow("stepLimit must be a positive integer (got 0)");
    expect(() => resolveEngineConfig({ timeoutMs: 1.5 })).toThrow(ConfigInvalidError);
  });

  it("should read known keys from JSON and reject the rest", () => {
    expect(configInputFromJson({ stepLimit: 50, logLevel: "debug" })).toEqual({ stepLimit: 50, logLevel: "debug" });
    expect(() => configInputFromJson({ logLevel: "loud" })).toThrow("Unknown logLevel: loud");
    expect(() => configInputFromJson([])).toThrow("Config file must contain a JSON object");
  });
});
