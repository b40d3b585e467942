/**
 * Purpose: Command-line front end over one outline engine.
 * Intent: Pure entry point (`runCli`) with injected IO so commands are testable without a process.
 */

import { parseArgs } from "node:util";
import { configInputFromJson, type EngineConfigInput } from "./config.js";
import { OutlineEngine } from "./engine.js";
import { FormatInvalidError, OutlineError, TemplateInvalidError } from "./errors.js";
import type { PassReport } from "./evaluator.js";
import type { OutlineDocument } from "./format/outline_doc.js";
import { parseJsonText, serializeJson } from "./format/outline_json.js";
import { parseLines, serializeLines } from "./format/outline_lines.js";
import { loadOutline, snapshotOutline } from "./format/outline_load.js";
import { createLogger, type LogSink } from "./log.js";
import type { OutlineMessage } from "./types.js";

export interface CliIO {
  readFile(path: string): Promise<string>;
  readStdin(): Promise<string>;
  stdout(text: string): void;
  stderr(text: string): void;
}

export interface CliOverrides {
  /** Replaces the configured id generator (tests). */
  createId?: () => string;
}

type InputFormat = "lines" | "json";
type OutputFormat = InputFormat | "text";

const USAGE = `Usage: outline-calc [--file F] [--from lines|json] [--to lines|json|text] [--config C] [--templates T] <command>

Commands:
  eval                          evaluate every node and print the outline
  show <id>                     evaluate and print one node's display text
  insert <parentId|-> <text>    add a node, evaluate, print the outline
  expand <templateId> <parentId|->
                                expand a template, evaluate, print the outline
  new-id                        print a fresh node id
`;

class UsageError extends Error {}

function isInputFormat(v: string): v is InputFormat {
  return v === "lines" || v === "json";
}

function isOutputFormat(v: string): v is OutputFormat {
  return isInputFormat(v) || v === "text";
}

function formatMessage(m: OutlineMessage): string {
  const where = m.nodeId ? ` [${m.nodeId}]` : m.line !== undefined ? ` (line ${m.line})` : "";
  return `${m.severity} ${m.code}${where}: ${m.message}\n`;
}

function stderrSink(io: CliIO): LogSink {
  const write = (line: string): void => io.stderr(`${line}\n`);
  return { debug: write, info: write, warn: write, error: write };
}

function parentArg(raw: string | undefined, what: string): string | null {
  if (raw === undefined) throw new UsageError(`Missing ${what}`);
  return raw === "-" ? null : raw;
}

function renderText(engine: OutlineEngine): string {
  const depth = new Map<string, number>();
  let out = "";
  for (const id of engine.allIds()) {
    const parent = engine.parentOf(id);
    const d = parent === null ? 0 : (depth.get(parent) ?? 0) + 1;
    depth.set(id, d);
    out += `${"  ".repeat(d)}${engine.render(id)}\n`;
  }
  return out;
}

function printOutline(engine: OutlineEngine, to: OutputFormat, io: CliIO): void {
  const doc = snapshotOutline(engine);
  if (to === "lines") io.stdout(serializeLines(doc));
  else if (to === "json") io.stdout(serializeJson(doc));
  else io.stdout(renderText(engine));
}

function reportPass(report: PassReport, io: CliIO): void {
  for (const m of report.messages) io.stderr(formatMessage(m));
}

/** Returns the process exit code: 0 on success, 1 for outline errors, 2 for usage errors. */
export async function runCli(argv: string[], io: CliIO, overrides: CliOverrides = {}): Promise<number> {
  try {
    const { values, positionals } = parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        file: { type: "string", short: "f" },
        from: { type: "string" },
        to: { type: "string" },
        config: { type: "string" },
        templates: { type: "string" },
        help: { type: "boolean", short: "h" },
      },
    });

    const [command, ...args] = positionals;
    if (values.help || command === undefined) {
      io.stdout(USAGE);
      return command === undefined && !values.help ? 2 : 0;
    }

    const from = values.from ?? "lines";
    if (!isInputFormat(from)) throw new UsageError(`Unknown input format: ${from}`);
    const to = values.to ?? from;
    if (!isOutputFormat(to)) throw new UsageError(`Unknown output format: ${to}`);

    const configInput: EngineConfigInput = values.config ? configInputFromJson(JSON.parse(await io.readFile(values.config))) : {};
    const engine = new OutlineEngine({
      ...configInput,
      ...(overrides.createId ? { createId: overrides.createId } : {}),
      logger: createLogger(configInput.logLevel ?? "warn", stderrSink(io)),
    });

    if (command === "new-id") {
      io.stdout(`${engine.config.createId()}\n`);
      return 0;
    }

    const source = values.file ? await io.readFile(values.file) : await io.readStdin();
    const doc: OutlineDocument = from === "json" ? parseJsonText(source) : parseLines(source);
    loadOutline(engine, doc);

    switch (command) {
      case "eval": {
        reportPass(engine.evaluate(), io);
        printOutline(engine, to, io);
        return 0;
      }
      case "show": {
        const id = args[0];
        if (!id) throw new UsageError("Missing node id");
        reportPass(engine.evaluate(), io);
        io.stdout(`${engine.render(id)}\n`);
        return 0;
      }
      case "insert": {
        const parent = parentArg(args[0], "parent id");
        const text = args[1];
        if (text === undefined) throw new UsageError("Missing node text");
        engine.evaluate();
        const report = engine.batch((e) => {
          const id = e.createNode(parent);
          e.setText(id, text);
          io.stderr(`created ${id}\n`);
        });
        reportPass(report, io);
        printOutline(engine, to, io);
        return 0;
      }
      case "expand": {
        const templateId = args[0];
        if (!templateId) throw new UsageError("Missing template id");
        const parent = parentArg(args[1], "parent id");
        if (!values.templates) throw new UsageError("expand needs --templates");
        engine.loadTemplates(JSON.parse(await io.readFile(values.templates)));
        engine.evaluate();
        const report = engine.batch((e) => {
          io.stderr(`created ${e.expand(templateId, parent)}\n`);
        });
        reportPass(report, io);
        printOutline(engine, to, io);
        return 0;
      }
      default:
        throw new UsageError(`Unknown command: ${command}`);
    }
  } catch (err) {
    if (err instanceof UsageError || (err instanceof TypeError && "code" in err)) {
      io.stderr(`${err.message}\n\n${USAGE}`);
      return 2;
    }
    if (err instanceof FormatInvalidError || err instanceof TemplateInvalidError) {
      for (const m of err.messages) io.stderr(formatMessage(m));
      return 1;
    }
    if (err instanceof OutlineError) {
      io.stderr(`error ${err.code}: ${err.message}\n`);
      return 1;
    }
    if (err instanceof SyntaxError) {
      io.stderr(`error INVALID_JSON: ${err.message}\n`);
      return 1;
    }
    throw err;
  }
}
