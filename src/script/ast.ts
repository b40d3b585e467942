/**
 * Purpose: Declare the expression tree produced by the script parser.
 * Intent: Keep node shapes small and exhaustively switchable.
 */

export type BinaryOp =
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
  | "??";

export type UnaryOp = "-" | "!";

export interface NumberExpr {
  kind: "number";
  value: number;
}

export interface StringExpr {
  kind: "string";
  value: string;
}

export interface BooleanExpr {
  kind: "boolean";
  value: boolean;
}

export interface NullExpr {
  kind: "null";
}

export interface IdentifierExpr {
  kind: "identifier";
  name: string;
  pos: number;
}

export interface UnaryExpr {
  kind: "unary";
  op: UnaryOp;
  expr: Expr;
}

export interface BinaryExpr {
  kind: "binary";
  op: BinaryOp;
  left: Expr;
  right: Expr;
}

export interface ConditionalExpr {
  kind: "conditional";
  test: Expr;
  consequent: Expr;
  alternate: Expr;
}

export interface LetExpr {
  kind: "let";
  bindings: { name: string; expr: Expr }[];
  body: Expr;
}

export interface MemberExpr {
  kind: "member";
  object: Expr;
  property: string;
  pos: number;
}

export interface IndexExpr {
  kind: "index";
  object: Expr;
  index: Expr;
}

export interface CallExpr {
  kind: "call";
  callee: Expr;
  args: Expr[];
  pos: number;
}

export interface ArrayExpr {
  kind: "array";
  items: Expr[];
}

export type ObjectEntry = { kind: "property"; key: string; value: Expr } | { kind: "spread"; expr: Expr };

export interface ObjectExpr {
  kind: "object";
  entries: ObjectEntry[];
}

export interface ArrowExpr {
  kind: "arrow";
  params: string[];
  body: Expr;
}

export type Expr =
  | NumberExpr
  | StringExpr
  | BooleanExpr
  | NullExpr
  | IdentifierExpr
  | UnaryExpr
  | BinaryExpr
  | ConditionalExpr
  | LetExpr
  | MemberExpr
  | IndexExpr
  | CallExpr
  | ArrayExpr
  | ObjectExpr
  | ArrowExpr;
