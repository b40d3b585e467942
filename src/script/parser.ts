/**
 * Purpose: Parse script expressions into AST nodes.
 * Intent: Precedence-climbing grammar without runtime code generation.
 */

import type { ArrowExpr, BinaryOp, Expr, ObjectEntry } from "./ast.js";
import { ScriptSyntaxError, Tokenizer, type PunctValue, type Token } from "./tokenizer.js";

interface BinaryLevel {
  ops: readonly BinaryOp[];
  rightAssoc?: boolean;
}

// Lowest precedence first.
const binaryLevels: readonly BinaryLevel[] = [
  { ops: ["??"] },
  { ops: ["||"] },
  { ops: ["&&"] },
  { ops: ["==", "!="] },
  { ops: ["<", "<=", ">", ">="] },
  { ops: ["&"] },
  { ops: ["+", "-"] },
  { ops: ["*", "/", "%"] },
  { ops: ["**"], rightAssoc: true },
];

function isBinaryOp(v: string): v is BinaryOp {
  return binaryLevels.some((level) => level.ops.some((op) => op === v));
}

export function parseExpression(src: string): Expr {
  const t = new Tokenizer(src);
  const expr = parseArrow(t);
  const tail = t.peek();
  if (tail.type !== "eof") {
    throw new ScriptSyntaxError(`Unexpected trailing token: ${describeToken(tail)}`, tail.pos);
  }
  return expr;
}

export function describeToken(tok: Token): string {
  switch (tok.type) {
    case "eof":
      return "end of expression";
    case "punct":
    case "op":
      return `'${tok.value}'`;
    case "spread":
      return "'...'";
    case "arrow":
      return "'=>'";
    case "identifier":
      return `identifier ${tok.value}`;
    case "number":
      return `number ${tok.value}`;
    case "boolean":
      return `boolean ${tok.value ? "true" : "false"}`;
    case "null":
      return "null";
    case "string":
      return `string ${JSON.stringify(tok.value)}`;
    default: {
      const _exhaustive: never = tok;
      return String(_exhaustive);
    }
  }
}

function isPunctTok(tok: Token, value: PunctValue): boolean {
  return tok.type === "punct" && tok.value === value;
}

function expectPunct(t: Tokenizer, value: PunctValue, context: string): void {
  const tok = t.next();
  if (!isPunctTok(tok, value)) {
    throw new ScriptSyntaxError(`Expected '${value}' ${context}, found ${describeToken(tok)}`, tok.pos);
  }
}

function parseArrow(t: Tokenizer): Expr {
  const mark = t.mark();
  const params = tryParseArrowParams(t);
  if (params && t.peek().type === "arrow") {
    t.next();
    const arrow: ArrowExpr = { kind: "arrow", params, body: parseArrow(t) };
    return arrow;
  }
  t.reset(mark);
  return parseConditional(t);
}

function tryParseArrowParams(t: Tokenizer): string[] | null {
  const tok = t.next();
  if (tok.type === "identifier") return [tok.value];
  if (!isPunctTok(tok, "(")) return null;

  const params: string[] = [];
  if (isPunctTok(t.peek(), ")")) {
    t.next();
    return params;
  }
  while (true) {
    const p = t.next();
    if (p.type !== "identifier") return null;
    params.push(p.value);
    const sep = t.next();
    if (isPunctTok(sep, ",")) continue;
    if (isPunctTok(sep, ")")) return params;
    return null;
  }
}

function parseConditional(t: Tokenizer): Expr {
  const test = parseBinary(t, 0);
  if (!isPunctTok(t.peek(), "?")) return test;
  t.next();
  const consequent = parseArrow(t);
  expectPunct(t, ":", "in conditional expression");
  const alternate = parseArrow(t);
  return { kind: "conditional", test, consequent, alternate };
}

function parseBinary(t: Tokenizer, level: number): Expr {
  const spec = binaryLevels[level];
  if (!spec) return parseUnary(t);

  let left = parseBinary(t, level + 1);
  while (true) {
    const tok = t.peek();
    if (tok.type !== "op" || !isBinaryOp(tok.value) || !spec.ops.includes(tok.value)) return left;
    const op = tok.value;
    t.next();
    const right = spec.rightAssoc ? parseBinary(t, level) : parseBinary(t, level + 1);
    left = { kind: "binary", op, left, right };
    if (spec.rightAssoc) return left;
  }
}

function parseUnary(t: Tokenizer): Expr {
  const tok = t.peek();
  if (tok.type === "op" && (tok.value === "-" || tok.value === "!")) {
    t.next();
    return { kind: "unary", op: tok.value, expr: parseUnary(t) };
  }
  return parsePostfix(t);
}

function parsePostfix(t: Tokenizer): Expr {
  let expr = parsePrimary(t);
  while (true) {
    const tok = t.peek();
    if (isPunctTok(tok, ".")) {
      t.next();
      const id = t.next();
      if (id.type !== "identifier") throw new ScriptSyntaxError("Expected identifier after '.'", id.pos);
      expr = { kind: "member", object: expr, property: id.value, pos: id.pos };
      continue;
    }
    if (isPunctTok(tok, "(")) {
      t.next();
      const args = parseList(t, ")", "in argument list");
      expr = { kind: "call", callee: expr, args, pos: tok.pos };
      continue;
    }
    if (isPunctTok(tok, "[")) {
      t.next();
      const index = parseArrow(t);
      expectPunct(t, "]", "after index");
      expr = { kind: "index", object: expr, index };
      continue;
    }
    return expr;
  }
}

function parseList(t: Tokenizer, close: PunctValue, context: string): Expr[] {
  const items: Expr[] = [];
  if (isPunctTok(t.peek(), close)) {
    t.next();
    return items;
  }
  while (true) {
    items.push(parseArrow(t));
    const sep = t.next();
    if (isPunctTok(sep, ",")) {
      if (isPunctTok(t.peek(), close)) {
        t.next();
        return items;
      }
      continue;
    }
    if (isPunctTok(sep, close)) return items;
    throw new ScriptSyntaxError(`Expected ',' or '${close}' ${context}`, sep.pos);
  }
}

function parseLet(t: Tokenizer): Expr {
  expectPunct(t, "{", "after 'let'");
  const bindings: { name: string; expr: Expr }[] = [];
  while (true) {
    const nameTok = t.next();
    if (nameTok.type !== "identifier") throw new ScriptSyntaxError("Expected identifier in let binding", nameTok.pos);
    expectPunct(t, "=", "in let binding");
    bindings.push({ name: nameTok.value, expr: parseArrow(t) });

    const sep = t.next();
    if (isPunctTok(sep, ";")) {
      if (isPunctTok(t.peek(), "}")) {
        t.next();
        break;
      }
      continue;
    }
    if (isPunctTok(sep, "}")) break;
    throw new ScriptSyntaxError("Expected ';' or '}' after let binding", sep.pos);
  }

  const inTok = t.next();
  if (!(inTok.type === "identifier" && inTok.value === "in")) {
    throw new ScriptSyntaxError("Expected 'in' after let bindings", inTok.pos);
  }
  return { kind: "let", bindings, body: parseArrow(t) };
}

function parseObject(t: Tokenizer): Expr {
  const entries: ObjectEntry[] = [];
  if (isPunctTok(t.peek(), "}")) {
    t.next();
    return { kind: "object", entries };
  }
  while (true) {
    const keyTok = t.next();
    if (keyTok.type === "spread") {
      entries.push({ kind: "spread", expr: parseArrow(t) });
    } else if (keyTok.type === "identifier" || keyTok.type === "string") {
      if (isPunctTok(t.peek(), ":")) {
        t.next();
        entries.push({ kind: "property", key: keyTok.value, value: parseArrow(t) });
      } else if (keyTok.type === "identifier") {
        entries.push({ kind: "property", key: keyTok.value, value: { kind: "identifier", name: keyTok.value, pos: keyTok.pos } });
      } else {
        throw new ScriptSyntaxError("String keys require ':' value", keyTok.pos);
      }
    } else {
      throw new ScriptSyntaxError("Expected object property key", keyTok.pos);
    }

    const sep = t.next();
    if (isPunctTok(sep, ",")) {
      if (isPunctTok(t.peek(), "}")) {
        t.next();
        break;
      }
      continue;
    }
    if (isPunctTok(sep, "}")) break;
    throw new ScriptSyntaxError("Expected ',' or '}' in object literal", sep.pos);
  }
  return { kind: "object", entries };
}

function parsePrimary(t: Tokenizer): Expr {
  const tok = t.next();
  switch (tok.type) {
    case "number":
      return { kind: "number", value: tok.value };
    case "string":
      return { kind: "string", value: tok.value };
    case "boolean":
      return { kind: "boolean", value: tok.value };
    case "null":
      return { kind: "null" };
    case "identifier":
      if (tok.value === "let" && isPunctTok(t.peek(), "{")) return parseLet(t);
      return { kind: "identifier", name: tok.value, pos: tok.pos };
    case "punct":
      if (tok.value === "(") {
        const inner = parseArrow(t);
        expectPunct(t, ")", "to close group");
        return inner;
      }
      if (tok.value === "[") return { kind: "array", items: parseList(t, "]", "in array literal") };
      if (tok.value === "{") return parseObject(t);
      break;
    case "eof":
      throw new ScriptSyntaxError("Unexpected end of expression", tok.pos);
    default:
      break;
  }
  throw new ScriptSyntaxError(`Unexpected token: ${describeToken(tok)}`, tok.pos);
}
