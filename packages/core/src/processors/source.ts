import { NAME_PATTERN } from "../expr/lexer";

export type SourceRef =
  | { kind: "anchor_text"; anchor: string }
  | { kind: "anchor_right"; anchor: string; index: number }
  | { kind: "anchor_next"; anchor: string }
  | { kind: "region_text"; region: string }
  | { kind: "region_column"; region: string; column: number }
  | { kind: "region_rows"; region: string }
  | { kind: "literal"; value: string };

const NAME = `(${NAME_PATTERN})`;
const ANCHOR_RX = new RegExp(`^anchor\\.${NAME}(?:\\.(text|next|right(?:\\[(\\d+)\\])?))?$`);
const REGION_RX = new RegExp(`^region\\.${NAME}(?:\\.(text|rows|column\\[(\\d+)\\]))?$`);

/** Parses an extraction-op source string; returns null when the syntax is not recognized. */
export function parseSource(source: string): SourceRef | null {
  if (source.startsWith("literal:")) {
    return { kind: "literal", value: source.slice("literal:".length) };
  }
  const s = source.trim();

  const a = ANCHOR_RX.exec(s);
  if (a) {
    const [, anchor, accessor, idx] = a;
    if (!accessor || accessor === "text") return { kind: "anchor_text", anchor };
    if (accessor === "next") return { kind: "anchor_next", anchor };
    return { kind: "anchor_right", anchor, index: idx ? Number(idx) : 0 };
  }

  const r = REGION_RX.exec(s);
  if (r) {
    const [, region, accessor, col] = r;
    if (!accessor || accessor === "text") return { kind: "region_text", region };
    if (accessor === "rows") return { kind: "region_rows", region };
    return { kind: "region_column", region, column: Number(col) };
  }

  return null;
}
