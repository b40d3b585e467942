export { OutlineEngine, type OutlineEngineOptions } from "./engine.js";
export { OutlineSession, type BatchFn } from "./session.js";
export type { EvalRecord, PassReport } from "./evaluator.js";
export { NodeStore, type CreateNodeOptions, type StoreChange, type StoreListener } from "./node_store.js";
export { DependencyGraph } from "./dependency_graph.js";
export { findCycleFrom, reachableFrom, shortestCycleThrough, type EdgeSet } from "./graph_cycles.js";
export {
  DEFAULT_CONFIG,
  configInputFromJson,
  resolveEngineConfig,
  type EngineConfig,
  type EngineConfigInput,
} from "./config.js";
export { createLogger, formatLogLine, type LogLevel, type LogSink, type Logger } from "./log.js";
export {
  ConfigInvalidError,
  CycleRejectedError,
  ERROR_CODES,
  FormatInvalidError,
  InvalidValueError,
  NotFoundError,
  OutlineError,
  SessionClosedError,
  TemplateInvalidError,
  type ErrorCode,
} from "./errors.js";
export {
  ExpressionSandbox,
  SCRIPT_MARKER,
  ScriptParseError,
  splitScriptText,
  type Executable,
  type ExecutionResult,
  type NodeView,
  type ParsedText,
  type ScriptInputs,
  type ScriptSandbox,
} from "./script/sandbox.js";
export { ExecutionAbortedError, ScriptTimeoutError, type ExecutionLimits } from "./script/eval_runtime.js";
export type { ReadDeclaration } from "./script/reads.js";
export type { MutationRequest } from "./stdlib/std.js";
export type { TemplateDefinition, TemplateEntry, TemplateField } from "./templates/template_types.js";
export { validateTemplate } from "./templates/template_validate.js";
export type { OutlineDocNode, OutlineDocument } from "./format/outline_doc.js";
export { parseLines, serializeLines } from "./format/outline_lines.js";
export { parseJsonSnapshot, parseJsonText, serializeJson, toSnapshotJson, SNAPSHOT_VERSION } from "./format/outline_json.js";
export { loadOutline, remapScriptText, snapshotOutline, type LoadOptions } from "./format/outline_load.js";
export { displayText, formatValue } from "./format/render.js";
export { runCli, type CliIO, type CliOverrides } from "./cli.js";
export * from "./types.js";
