import { ExpressionError } from "../errors";
import { tokenize, TokenStream, describe } from "../expr/lexer";
import { collectLeafValues, type MapNode } from "../engine/tree";
import type { Scalar } from "../types";

export type FormulaNode =
  | { kind: "num"; value: number }
  | { kind: "sum"; path: string }
  | { kind: "neg"; operand: FormulaNode }
  | { kind: "bin"; op: "+" | "-" | "*" | "/"; left: FormulaNode; right: FormulaNode };

const NUMERIC_RX = /^[-+]?(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?$/;

/*
 * expr   := term (("+" | "-") term)*
 * term   := factor (("*" | "/") factor)*
 * factor := number | "sum" "(" path ")" | "(" expr ")" | "-" factor
 */
class FormulaParser {
  constructor(private readonly ts: TokenStream) {}

  expr(): FormulaNode {
    let left = this.term();
    while (this.ts.isOp("+") || this.ts.isOp("-")) {
      const op = this.ts.next().value === "+" ? "+" : "-";
      left = { kind: "bin", op, left, right: this.term() };
    }
    return left;
  }

  private term(): FormulaNode {
    let left = this.factor();
    while (this.ts.isOp("*") || this.ts.isOp("/")) {
      const op = this.ts.next().value === "*" ? "*" : "/";
      left = { kind: "bin", op, left, right: this.factor() };
    }
    return left;
  }

  private factor(): FormulaNode {
    const t = this.ts.peek();
    if (this.ts.isOp("-")) {
      this.ts.next();
      return { kind: "neg", operand: this.factor() };
    }
    if (this.ts.isOp("(")) {
      this.ts.next();
      const inner = this.expr();
      this.ts.expectOp(")");
      return inner;
    }
    if (t.type === "num") {
      this.ts.next();
      return { kind: "num", value: Number(t.value) };
    }
    if (t.type === "ident" && t.value === "sum") {
      this.ts.next();
      this.ts.expectOp("(");
      const path = this.path();
      this.ts.expectOp(")");
      return { kind: "sum", path };
    }
    throw new ExpressionError(`unexpected ${describe(t)}`, t.pos);
  }

  private path(): string {
    const start = this.ts.peek().pos;
    const parts: string[] = [];
    let arrays = 0;
    for (;;) {
      let seg = this.ts.expectIdent().value;
      if (this.ts.isOp("[") && this.ts.isOp("]", 1)) {
        this.ts.next();
        this.ts.next();
        seg += "[]";
        arrays++;
      }
      parts.push(seg);
      if (!this.ts.isOp(".")) break;
      this.ts.next();
    }
    if (arrays === 0) throw new ExpressionError("sum() takes a path with at least one '[]' segment", start);
    return parts.join(".");
  }
}

export function parseFormula(formula: string): FormulaNode {
  const ts = new TokenStream(tokenize(formula));
  const node = new FormulaParser(ts).expr();
  ts.expectEnd();
  return node;
}

function toNumber(v: Scalar | undefined): number | undefined {
  if (typeof v === "number") return v;
  if (typeof v === "string" && NUMERIC_RX.test(v.trim())) return Number(v.trim());
  return undefined;
}

/** Adds up every value the path reaches; anything non-numeric counts as 0 and is reported. */
export function sumPath(tree: MapNode, path: string, warn: (message: string) => void): number {
  const { values, missing } = collectLeafValues(tree, path);
  if (missing !== undefined) {
    warn(`sum(${path}): '${missing}' not found, using 0`);
    return 0;
  }
  let total = 0;
  let skipped = 0;
  for (const v of values) {
    const n = toNumber(v);
    if (n === undefined) skipped++;
    else total += n;
  }
  if (skipped > 0) warn(`sum(${path}): ${skipped} non-numeric value(s) treated as 0`);
  return total;
}

export function evaluateFormula(node: FormulaNode, tree: MapNode, warn: (message: string) => void): number {
  switch (node.kind) {
    case "num":
      return node.value;
    case "sum":
      return sumPath(tree, node.path, warn);
    case "neg":
      return -evaluateFormula(node.operand, tree, warn);
    case "bin": {
      const l = evaluateFormula(node.left, tree, warn);
      const r = evaluateFormula(node.right, tree, warn);
      switch (node.op) {
        case "+":
          return l + r;
        case "-":
          return l - r;
        case "*":
          return l * r;
        case "/":
          return l / r;
      }
    }
  }
}
