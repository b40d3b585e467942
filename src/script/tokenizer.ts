/**
 * Purpose: Split script source into tokens with source offsets.
 * Intent: Support backtracking (mark/reset) so the parser can try arrow parameter lists.
 */

export class ScriptSyntaxError extends Error {
  readonly pos: number;

  constructor(message: string, pos: number) {
    super(message);
    this.name = "ScriptSyntaxError";
    this.pos = pos;
  }
}

export type PunctValue = "(" | ")" | "{" | "}" | "[" | "]" | "," | "." | ":" | "?" | ";" | "=";

export type OpValue =
  | "**"
  | "*"
  | "/"
  | "%"
  | "+"
  | "-"
  | "&"
  | "<"
  | "<="
  | ">"
  | ">="
  | "=="
  | "!="
  | "&&"
  | "||"
  | "??"
  | "!";

export type Token =
  | { type: "eof"; pos: number }
  | { type: "punct"; value: PunctValue; pos: number }
  | { type: "op"; value: OpValue; pos: number }
  | { type: "spread"; pos: number }
  | { type: "arrow"; pos: number }
  | { type: "identifier"; value: string; pos: number }
  | { type: "number"; value: number; pos: number }
  | { type: "string"; value: string; pos: number }
  | { type: "boolean"; value: boolean; pos: number }
  | { type: "null"; pos: number };

// Longest match first.
const operators: OpValue[] = ["**", "<=", ">=", "==", "!=", "&&", "||", "??", "*", "/", "%", "+", "-", "&", "<", ">", "!"];
const punctuation = new Set<string>(["(", ")", "{", "}", "[", "]", ",", ".", ":", "?", ";", "="]);

function isPunct(ch: string): ch is PunctValue {
  return punctuation.has(ch);
}

function isIdentStart(ch: string): boolean {
  return /[A-Za-z_$]/.test(ch);
}

function isIdentPart(ch: string): boolean {
  return /[A-Za-z0-9_$]/.test(ch);
}

function isDigit(ch: string): boolean {
  return ch >= "0" && ch <= "9";
}

export class Tokenizer {
  private readonly tokens: Token[];
  private index = 0;

  constructor(src: string) {
    this.tokens = tokenize(src);
  }

  peek(): Token {
    return this.tokens[this.index] ?? this.eof();
  }

  next(): Token {
    const tok = this.peek();
    if (this.index < this.tokens.length) this.index++;
    return tok;
  }

  mark(): number {
    return this.index;
  }

  reset(mark: number): void {
    this.index = mark;
  }

  private eof(): Token {
    const last = this.tokens[this.tokens.length - 1];
    return { type: "eof", pos: last ? last.pos : 0 };
  }
}

export function tokenize(src: string): Token[] {
  const out: Token[] = [];
  let i = 0;

  while (i < src.length) {
    const ch = src[i] ?? "";

    if (/\s/.test(ch)) {
      i++;
      continue;
    }

    if (ch === "/" && src[i + 1] === "/") {
      while (i < src.length && src[i] !== "\n") i++;
      continue;
    }

    const start = i;

    if (isDigit(ch) || (ch === "." && isDigit(src[i + 1] ?? ""))) {
      const m = /^(?:\d+(?:_\d+)*)?(?:\.\d+)?(?:[eE][+-]?\d+)?/.exec(src.slice(i));
      const raw = m?.[0] ?? "";
      const value = Number(raw.replace(/_/g, ""));
      if (!raw || !Number.isFinite(value)) throw new ScriptSyntaxError(`Invalid number literal`, start);
      out.push({ type: "number", value, pos: start });
      i += raw.length;
      continue;
    }

    if (isIdentStart(ch)) {
      while (i < src.length && isIdentPart(src[i] ?? "")) i++;
      const word = src.slice(start, i);
      if (word === "true" || word === "false") out.push({ type: "boolean", value: word === "true", pos: start });
      else if (word === "null") out.push({ type: "null", pos: start });
      else out.push({ type: "identifier", value: word, pos: start });
      continue;
    }

    if (ch === '"' || ch === "'") {
      const { value, end } = readString(src, i, ch);
      out.push({ type: "string", value, pos: start });
      i = end;
      continue;
    }

    if (src.startsWith("...", i)) {
      out.push({ type: "spread", pos: start });
      i += 3;
      continue;
    }

    if (src.startsWith("=>", i)) {
      out.push({ type: "arrow", pos: start });
      i += 2;
      continue;
    }

    const op = operators.find((o) => src.startsWith(o, i));
    if (op) {
      out.push({ type: "op", value: op, pos: start });
      i += op.length;
      continue;
    }

    if (isPunct(ch)) {
      out.push({ type: "punct", value: ch, pos: start });
      i++;
      continue;
    }

    throw new ScriptSyntaxError(`Unexpected character: ${JSON.stringify(ch)}`, start);
  }

  out.push({ type: "eof", pos: src.length });
  return out;
}

const simpleEscapes: Record<string, string> = {
  n: "\n",
  t: "\t",
  r: "\r",
  "\\": "\\",
  '"': '"',
  "'": "'",
  "0": "\0",
};

function readString(src: string, start: number, quote: string): { value: string; end: number } {
  let i = start + 1;
  let value = "";
  while (i < src.length) {
    const ch = src[i] ?? "";
    if (ch === quote) return { value, end: i + 1 };
    if (ch === "\n") break;
    if (ch === "\\") {
      const esc = src[i + 1] ?? "";
      if (esc === "u") {
        const hex = src.slice(i + 2, i + 6);
        if (!/^[0-9a-fA-F]{4}$/.test(hex)) throw new ScriptSyntaxError("Invalid unicode escape", i);
        value += String.fromCharCode(parseInt(hex, 16));
        i += 6;
        continue;
      }
      const mapped = simpleEscapes[esc];
      if (mapped === undefined) throw new ScriptSyntaxError(`Invalid escape: \\${esc}`, i);
      value += mapped;
      i += 2;
      continue;
    }
    value += ch;
    i++;
  }
  throw new ScriptSyntaxError("Unterminated string literal", start);
}
