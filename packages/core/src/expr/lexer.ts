import { ExpressionError } from "../errors";

export type TokenType = "num" | "str" | "ident" | "op" | "eof";

export interface Token {
  type: TokenType;
  value: string;
  pos: number;
}

// Longest operators first so "<=" wins over "<".
const OPERATORS = ["==", "!=", "<=", ">=", "<", ">", "+", "-", "*", "/", "%", "(", ")", "[", "]", "{", "}", ",", ".", ":"];
const NUMBER_RX = /^(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?/;
/** Names shared by expressions, field paths and source references. No "-": it is subtraction. */
export const NAME_PATTERN = "[A-Za-z_][A-Za-z0-9_]*";
const IDENT_RX = new RegExp(`^${NAME_PATTERN}`);
const NAME_RX = new RegExp(`^${NAME_PATTERN}$`);

export const isName = (s: string) => NAME_RX.test(s);

function readString(src: string, start: number): { value: string; end: number } {
  const quote = src[start];
  let out = "";
  let i = start + 1;
  while (i < src.length) {
    const ch = src[i];
    if (ch === "\\" && i + 1 < src.length) {
      const next = src[i + 1];
      out += next === "n" ? "\n" : next === "t" ? "\t" : next;
      i += 2;
      continue;
    }
    if (ch === quote) return { value: out, end: i + 1 };
    out += ch;
    i++;
  }
  throw new ExpressionError("unterminated string literal", start);
}

export function tokenize(src: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;
  while (i < src.length) {
    const ch = src[i];
    if (/\s/.test(ch)) {
      i++;
      continue;
    }
    if (ch === "'" || ch === '"') {
      const { value, end } = readString(src, i);
      tokens.push({ type: "str", value, pos: i });
      i = end;
      continue;
    }
    const rest = src.slice(i);
    const num = NUMBER_RX.exec(rest);
    if (num && !(ch === "." && tokens.length > 0 && tokens[tokens.length - 1].type === "ident")) {
      tokens.push({ type: "num", value: num[0], pos: i });
      i += num[0].length;
      continue;
    }
    const ident = IDENT_RX.exec(rest);
    if (ident) {
      tokens.push({ type: "ident", value: ident[0], pos: i });
      i += ident[0].length;
      continue;
    }
    const op = OPERATORS.find((o) => rest.startsWith(o));
    if (!op) throw new ExpressionError(`unexpected character '${ch}'`, i);
    tokens.push({ type: "op", value: op, pos: i });
    i += op.length;
  }
  tokens.push({ type: "eof", value: "", pos: src.length });
  return tokens;
}

/** Cursor over a token list shared by the formula and predicate parsers. */
export class TokenStream {
  private index = 0;

  constructor(private readonly tokens: Token[]) {}

  peek(offset = 0): Token {
    return this.tokens[Math.min(this.index + offset, this.tokens.length - 1)];
  }

  next(): Token {
    const t = this.peek();
    if (t.type !== "eof") this.index++;
    return t;
  }

  isOp(value: string, offset = 0): boolean {
    const t = this.peek(offset);
    return t.type === "op" && t.value === value;
  }

  isWord(value: string, offset = 0): boolean {
    const t = this.peek(offset);
    return t.type === "ident" && t.value === value;
  }

  expectOp(value: string): Token {
    const t = this.next();
    if (t.type !== "op" || t.value !== value) {
      throw new ExpressionError(`expected '${value}' but found ${describe(t)}`, t.pos);
    }
    return t;
  }

  expectIdent(): Token {
    const t = this.next();
    if (t.type !== "ident") throw new ExpressionError(`expected a name but found ${describe(t)}`, t.pos);
    return t;
  }

  expectEnd(): void {
    const t = this.peek();
    if (t.type !== "eof") throw new ExpressionError(`unexpected ${describe(t)}`, t.pos);
  }
}

export function describe(t: Token): string {
  return t.type === "eof" ? "end of expression" : `'${t.value}'`;
}
