import { ExpressionError, MissingFieldError } from "../errors";
import { describe, tokenize, TokenStream } from "../expr/lexer";
import type { PlainValue } from "../types";

// Expression language for validation rules over extracted data. Parsed into an AST and
// interpreted, never eval'd.

type PlainMap = { [key: string]: PlainValue };

const HELPERS = ["sum", "len", "min", "max", "all", "any", "abs", "round"] as const;
type Helper = (typeof HELPERS)[number];

type CompareOp = "==" | "!=" | "<" | "<=" | ">" | ">=" | "in" | "not in" | "is" | "is not";
type ArithOp = "+" | "-" | "*" | "/" | "%";

type PathOp =
  | { kind: "member"; name: string; label: string }
  | { kind: "index"; index: PredicateNode; label: string }
  | { kind: "project"; label: string }
  | { kind: "get"; args: PredicateNode[]; label: string };

export type PredicateNode =
  | { kind: "lit"; value: PlainValue }
  | { kind: "list"; items: PredicateNode[] }
  | { kind: "dict"; entries: Array<[PredicateNode, PredicateNode]> }
  | { kind: "root" }
  | { kind: "path"; base: PredicateNode; ops: PathOp[] }
  | { kind: "call"; fn: Helper; args: PredicateNode[] }
  | { kind: "not"; operand: PredicateNode }
  | { kind: "neg"; operand: PredicateNode }
  | { kind: "logic"; op: "and" | "or"; left: PredicateNode; right: PredicateNode }
  | { kind: "arith"; op: ArithOp; left: PredicateNode; right: PredicateNode }
  | { kind: "compare"; first: PredicateNode; rest: Array<{ op: CompareOp; right: PredicateNode }> };

const KEYWORD_LITERALS: Record<string, PlainValue> = {
  true: true,
  false: false,
  null: null,
  True: true,
  False: false,
  None: null,
};

const SYMBOL_COMPARE_OPS: CompareOp[] = ["==", "!=", "<", "<=", ">", ">="];

const isHelper = (name: string): name is Helper => HELPERS.some((h) => h === name);

class PredicateParser {
  constructor(private readonly ts: TokenStream) {}

  expr(): PredicateNode {
    let left = this.and();
    while (this.ts.isWord("or")) {
      this.ts.next();
      left = { kind: "logic", op: "or", left, right: this.and() };
    }
    return left;
  }

  private and(): PredicateNode {
    let left = this.not();
    while (this.ts.isWord("and")) {
      this.ts.next();
      left = { kind: "logic", op: "and", left, right: this.not() };
    }
    return left;
  }

  private not(): PredicateNode {
    if (this.ts.isWord("not")) {
      this.ts.next();
      return { kind: "not", operand: this.not() };
    }
    return this.comparison();
  }

  private compareOp(): CompareOp | undefined {
    const t = this.ts.peek();
    const symbol = t.type === "op" ? SYMBOL_COMPARE_OPS.find((o) => o === t.value) : undefined;
    if (symbol) {
      this.ts.next();
      return symbol;
    }
    if (this.ts.isWord("in")) {
      this.ts.next();
      return "in";
    }
    if (this.ts.isWord("not") && this.ts.isWord("in", 1)) {
      this.ts.next();
      this.ts.next();
      return "not in";
    }
    if (this.ts.isWord("is")) {
      this.ts.next();
      if (this.ts.isWord("not")) {
        this.ts.next();
        return "is not";
      }
      return "is";
    }
    return undefined;
  }

  private comparison(): PredicateNode {
    const first = this.arith();
    const rest: Array<{ op: CompareOp; right: PredicateNode }> = [];
    for (let op = this.compareOp(); op; op = this.compareOp()) rest.push({ op, right: this.arith() });
    return rest.length ? { kind: "compare", first, rest } : first;
  }

  private arith(): PredicateNode {
    let left = this.term();
    while (this.ts.isOp("+") || this.ts.isOp("-")) {
      const op = this.ts.next().value === "+" ? "+" : "-";
      left = { kind: "arith", op, left, right: this.term() };
    }
    return left;
  }

  private term(): PredicateNode {
    let left = this.unary();
    for (;;) {
      const op = this.ts.isOp("*") ? "*" : this.ts.isOp("/") ? "/" : this.ts.isOp("%") ? "%" : undefined;
      if (!op) return left;
      this.ts.next();
      left = { kind: "arith", op, left, right: this.unary() };
    }
  }

  private unary(): PredicateNode {
    if (this.ts.isOp("-")) {
      this.ts.next();
      return { kind: "neg", operand: this.unary() };
    }
    if (this.ts.isOp("+")) {
      this.ts.next();
      return this.unary();
    }
    return this.postfix();
  }

  private postfix(): PredicateNode {
    const base = this.primary();
    let label = base.kind === "root" ? "data" : "(value)";
    const ops: PathOp[] = [];
    for (;;) {
      if (this.ts.isOp(".")) {
        this.ts.next();
        const name = this.ts.expectIdent();
        if (this.ts.isOp("(")) {
          if (name.value !== "get") throw new ExpressionError(`unknown method '${name.value}'`, name.pos);
          label += ".get(...)";
          ops.push({ kind: "get", args: this.args(), label });
        } else {
          label += `.${name.value}`;
          ops.push({ kind: "member", name: name.value, label });
        }
      } else if (this.ts.isOp("[") && this.ts.isOp("]", 1)) {
        this.ts.next();
        this.ts.next();
        label += "[]";
        ops.push({ kind: "project", label });
      } else if (this.ts.isOp("[")) {
        this.ts.next();
        const index = this.expr();
        this.ts.expectOp("]");
        label += index.kind === "lit" ? `[${JSON.stringify(index.value)}]` : "[...]";
        ops.push({ kind: "index", index, label });
      } else {
        break;
      }
    }
    return ops.length ? { kind: "path", base, ops } : base;
  }

  private args(): PredicateNode[] {
    this.ts.expectOp("(");
    const args: PredicateNode[] = [];
    while (!this.ts.isOp(")")) {
      args.push(this.expr());
      if (!this.ts.isOp(",")) break;
      this.ts.next();
    }
    this.ts.expectOp(")");
    return args;
  }

  private primary(): PredicateNode {
    const t = this.ts.next();
    if (t.type === "num") return { kind: "lit", value: Number(t.value) };
    if (t.type === "str") return { kind: "lit", value: t.value };
    if (t.type === "ident") {
      if (Object.hasOwn(KEYWORD_LITERALS, t.value)) return { kind: "lit", value: KEYWORD_LITERALS[t.value] };
      if (t.value === "data") return { kind: "root" };
      if (this.ts.isOp("(")) {
        if (!isHelper(t.value)) throw new ExpressionError(`unknown function '${t.value}'`, t.pos);
        return { kind: "call", fn: t.value, args: this.args() };
      }
      throw new ExpressionError(`unknown name '${t.value}'`, t.pos);
    }
    if (t.type === "op" && t.value === "(") {
      const inner = this.expr();
      this.ts.expectOp(")");
      return inner;
    }
    if (t.type === "op" && t.value === "[") {
      const items: PredicateNode[] = [];
      while (!this.ts.isOp("]")) {
        items.push(this.expr());
        if (!this.ts.isOp(",")) break;
        this.ts.next();
      }
      this.ts.expectOp("]");
      return { kind: "list", items };
    }
    if (t.type === "op" && t.value === "{") {
      const entries: Array<[PredicateNode, PredicateNode]> = [];
      while (!this.ts.isOp("}")) {
        const key = this.expr();
        this.ts.expectOp(":");
        entries.push([key, this.expr()]);
        if (!this.ts.isOp(",")) break;
        this.ts.next();
      }
      this.ts.expectOp("}");
      return { kind: "dict", entries };
    }
    throw new ExpressionError(`unexpected ${describe(t)}`, t.pos);
  }
}

export function parsePredicate(source: string): PredicateNode {
  const ts = new TokenStream(tokenize(source));
  const node = new PredicateParser(ts).expr();
  ts.expectEnd();
  return node;
}

// ---- evaluation ----

function isMap(v: PlainValue): v is PlainMap {
  return v !== null && typeof v === "object" && !Array.isArray(v);
}

function typeName(v: PlainValue): string {
  if (v === null) return "null";
  if (Array.isArray(v)) return "list";
  if (isMap(v)) return "map";
  return typeof v;
}

function asNumber(v: PlainValue): number | undefined {
  if (typeof v === "number") return v;
  if (typeof v === "boolean") return v ? 1 : 0;
  return undefined;
}

export function truthy(v: PlainValue): boolean {
  if (v === null) return false;
  if (typeof v === "boolean") return v;
  if (typeof v === "number") return v !== 0;
  if (typeof v === "string") return v.length > 0;
  if (Array.isArray(v)) return v.length > 0;
  return Object.keys(v).length > 0;
}

function equals(a: PlainValue, b: PlainValue): boolean {
  const na = asNumber(a);
  const nb = asNumber(b);
  if (na !== undefined && nb !== undefined) return na === nb;
  if (Array.isArray(a) && Array.isArray(b)) return a.length === b.length && a.every((x, i) => equals(x, b[i]));
  if (isMap(a) && isMap(b)) {
    const keys = Object.keys(a);
    return keys.length === Object.keys(b).length && keys.every((k) => Object.hasOwn(b, k) && equals(a[k], b[k]));
  }
  return a === b;
}

function order(a: PlainValue, b: PlainValue, op: string): number {
  const na = asNumber(a);
  const nb = asNumber(b);
  if (na !== undefined && nb !== undefined) return na - nb;
  if (typeof a === "string" && typeof b === "string") return a < b ? -1 : a > b ? 1 : 0;
  throw new Error(`'${op}' not supported between ${typeName(a)} and ${typeName(b)}`);
}

function contains(container: PlainValue, item: PlainValue): boolean {
  if (Array.isArray(container)) return container.some((x) => equals(x, item));
  if (isMap(container)) return typeof item === "string" && Object.hasOwn(container, item);
  if (typeof container === "string" && typeof item === "string") return container.includes(item);
  throw new Error(`'in' not supported between ${typeName(item)} and ${typeName(container)}`);
}

function compare(a: PlainValue, op: CompareOp, b: PlainValue): boolean {
  switch (op) {
    case "==":
      return equals(a, b);
    case "!=":
      return !equals(a, b);
    case "<":
      return order(a, b, op) < 0;
    case "<=":
      return order(a, b, op) <= 0;
    case ">":
      return order(a, b, op) > 0;
    case ">=":
      return order(a, b, op) >= 0;
    case "in":
      return contains(b, a);
    case "not in":
      return !contains(b, a);
    case "is":
      return a === b;
    case "is not":
      return !compare(a, "is", b);
  }
}

function arith(op: ArithOp, a: PlainValue, b: PlainValue): PlainValue {
  if (op === "+") {
    if (typeof a === "string" && typeof b === "string") return a + b;
    if (Array.isArray(a) && Array.isArray(b)) return [...a, ...b];
  }
  const x = asNumber(a);
  const y = asNumber(b);
  if (x === undefined || y === undefined) {
    throw new Error(`unsupported operand types for ${op}: ${typeName(a)} and ${typeName(b)}`);
  }
  switch (op) {
    case "+":
      return x + y;
    case "-":
      return x - y;
    case "*":
      return x * y;
    case "/":
      if (y === 0) throw new Error("division by zero");
      return x / y;
    case "%":
      if (y === 0) throw new Error("division by zero");
      return ((x % y) + y) % y;
  }
}

// Half-to-even, so round(2.5) == 2.
function roundHalfEven(x: number, digits: number): number {
  const factor = 10 ** digits;
  const scaled = x * factor;
  const floor = Math.floor(scaled);
  const diff = scaled - floor;
  let r: number;
  if (Math.abs(diff - 0.5) < 1e-9) r = floor % 2 === 0 ? floor : floor + 1;
  else r = Math.round(scaled);
  return r / factor;
}

function listArg(fn: string, v: PlainValue): PlainValue[] {
  if (!Array.isArray(v)) throw new Error(`${fn}() expects a list, got ${typeName(v)}`);
  return v;
}

function numberArg(fn: string, v: PlainValue): number {
  const n = asNumber(v);
  if (n === undefined) throw new Error(`${fn}() expects a number, got ${typeName(v)}`);
  return n;
}

function callHelper(fn: Helper, args: PlainValue[]): PlainValue {
  const arity = (min: number, max: number) => {
    if (args.length < min || args.length > max) {
      throw new Error(`${fn}() takes ${min === max ? min : `${min} to ${max}`} argument(s), got ${args.length}`);
    }
  };
  switch (fn) {
    case "len": {
      arity(1, 1);
      const v = args[0];
      if (typeof v === "string" || Array.isArray(v)) return v.length;
      if (isMap(v)) return Object.keys(v).length;
      throw new Error(`len() of ${typeName(v)}`);
    }
    case "sum": {
      arity(1, 2);
      const start = args.length > 1 ? numberArg(fn, args[1]) : 0;
      return listArg(fn, args[0]).reduce<number>((acc, v) => acc + numberArg(fn, v), start);
    }
    case "min":
    case "max": {
      if (args.length === 0) throw new Error(`${fn}() takes at least 1 argument`);
      const items = args.length === 1 ? listArg(fn, args[0]) : args;
      if (items.length === 0) throw new Error(`${fn}() of an empty list`);
      const sign = fn === "min" ? -1 : 1;
      return items.reduce((best, v) => (sign * order(v, best, fn) > 0 ? v : best));
    }
    case "all":
      arity(1, 1);
      return listArg(fn, args[0]).every(truthy);
    case "any":
      arity(1, 1);
      return listArg(fn, args[0]).some(truthy);
    case "abs":
      arity(1, 1);
      return Math.abs(numberArg(fn, args[0]));
    case "round": {
      arity(1, 2);
      const digits = args.length > 1 ? numberArg(fn, args[1]) : 0;
      return roundHalfEven(numberArg(fn, args[0]), digits);
    }
  }
}

function applyOps(value: PlainValue, ops: PathOp[], data: PlainMap): PlainValue {
  let current = value;
  for (let i = 0; i < ops.length; i++) {
    const op = ops[i];
    switch (op.kind) {
      case "member": {
        if (!isMap(current)) throw new Error(`${op.label}: cannot read '${op.name}' of ${typeName(current)}`);
        if (!Object.hasOwn(current, op.name)) throw new MissingFieldError(op.label);
        current = current[op.name];
        break;
      }
      case "index": {
        const key = evaluate(op.index, data);
        if (Array.isArray(current) && typeof key === "number" && Number.isInteger(key)) {
          const idx = key < 0 ? current.length + key : key;
          if (idx < 0 || idx >= current.length) throw new MissingFieldError(op.label);
          current = current[idx];
        } else if (isMap(current) && typeof key === "string") {
          if (!Object.hasOwn(current, key)) throw new MissingFieldError(op.label);
          current = current[key];
        } else {
          throw new Error(`${op.label}: cannot index ${typeName(current)} with ${typeName(key)}`);
        }
        break;
      }
      case "get": {
        if (op.args.length < 1 || op.args.length > 2) throw new Error(`get() takes 1 or 2 arguments, got ${op.args.length}`);
        if (!isMap(current)) throw new Error(`${op.label}: get() needs a map, got ${typeName(current)}`);
        const key = evaluate(op.args[0], data);
        const fallback = op.args.length > 1 ? evaluate(op.args[1], data) : null;
        current = typeof key === "string" && Object.hasOwn(current, key) ? current[key] : fallback;
        break;
      }
      case "project": {
        if (!Array.isArray(current)) throw new Error(`${op.label}: expected a list, got ${typeName(current)}`);
        const rest = ops.slice(i + 1);
        const mapped = current.map((el) => applyOps(el, rest, data));
        // nested projections flatten into one list
        return rest.some((o) => o.kind === "project") ? mapped.flatMap((m) => (Array.isArray(m) ? m : [m])) : mapped;
      }
    }
  }
  return current;
}

export function evaluate(node: PredicateNode, data: PlainMap): PlainValue {
  switch (node.kind) {
    case "lit":
      return node.value;
    case "list":
      return node.items.map((n) => evaluate(n, data));
    case "dict": {
      const out: PlainMap = {};
      for (const [k, v] of node.entries) {
        const key = evaluate(k, data);
        if (typeof key !== "string") throw new Error(`map keys must be strings, got ${typeName(key)}`);
        out[key] = evaluate(v, data);
      }
      return out;
    }
    case "root":
      return data;
    case "path":
      return applyOps(evaluate(node.base, data), node.ops, data);
    case "call":
      return callHelper(node.fn, node.args.map((a) => evaluate(a, data)));
    case "not":
      return !truthy(evaluate(node.operand, data));
    case "neg": {
      const v = evaluate(node.operand, data);
      const n = asNumber(v);
      if (n === undefined) throw new Error(`bad operand type for unary -: ${typeName(v)}`);
      return -n;
    }
    case "logic": {
      const left = evaluate(node.left, data);
      if (node.op === "and") return truthy(left) ? evaluate(node.right, data) : left;
      return truthy(left) ? left : evaluate(node.right, data);
    }
    case "arith":
      return arith(node.op, evaluate(node.left, data), evaluate(node.right, data));
    case "compare": {
      let left = evaluate(node.first, data);
      for (const { op, right } of node.rest) {
        const r = evaluate(right, data);
        if (!compare(left, op, r)) return false;
        left = r;
      }
      return true;
    }
  }
}
