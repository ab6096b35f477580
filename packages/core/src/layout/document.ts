import { createHash } from "node:crypto";
import { DEFAULT_ENGINE_CONFIG } from "../config";
import type { BlockType, BoundingBox, DocumentLayout, TextBlock } from "../types";
import { centerDistance, centerX, centerY, height, overlaps, width } from "./geometry";

const NUMERIC_RX = /^[-+]?\d+(?:[.,]\d+)*%?$/;

export function isNumericText(text: string): boolean {
  return NUMERIC_RX.test(text.trim());
}

export function isLikelyHeader(block: TextBlock): boolean {
  return (block.font_size ?? 0) > 14 && block.bbox.y0 < 0.2;
}

export function inferBlockType(text: string, bbox: BoundingBox, fontSize?: number): BlockType {
  if ((fontSize ?? 0) > 14 && bbox.y0 < 0.15) return "header";
  const stripped = text.replace(/[-/.]/g, "");
  if (/^\d+$/.test(stripped)) return "number";
  if (text.length <= 5 && /\d/.test(text)) return "number";
  return "text";
}

/**
 * Structural fingerprint: position, size and type of the first `limit` blocks, never their text,
 * so two documents from the same template hash alike.
 */
export function computeLayoutHash(blocks: TextBlock[], limit = 50): string {
  const structure = blocks.slice(0, limit).map((b) => [
    b.bbox.x0.toFixed(2),
    b.bbox.y0.toFixed(2),
    width(b.bbox).toFixed(2),
    height(b.bbox).toFixed(2),
    b.block_type,
  ].join(","));
  return createHash("md5").update(structure.join("|")).digest("hex");
}

export interface CreateLayoutOptions {
  filename?: string;
  pageCount?: number;
  pageDimensions?: Array<[number, number]>;
  fingerprintBlocks?: number;
}

export function createLayout(blocks: TextBlock[], opts: CreateLayoutOptions = {}): DocumentLayout {
  const maxPage = blocks.reduce((m, b) => Math.max(m, b.bbox.page), -1);
  const pageCount = opts.pageCount ?? Math.max(1, maxPage + 1);
  return {
    filename: opts.filename,
    page_count: pageCount,
    page_dimensions: opts.pageDimensions ?? Array.from({ length: pageCount }, (): [number, number] => [1, 1]),
    blocks,
    layout_hash: computeLayoutHash(blocks, opts.fingerprintBlocks),
  };
}

export function layoutText(layout: DocumentLayout): string {
  return layout.blocks.map((b) => b.text).join(" ");
}

export function blocksOnPage(layout: DocumentLayout, page: number): TextBlock[] {
  return layout.blocks.filter((b) => b.bbox.page === page);
}

export function blocksByType(layout: DocumentLayout, type: BlockType): TextBlock[] {
  return layout.blocks.filter((b) => b.block_type === type);
}

export function findText(layout: DocumentLayout, pattern: string, caseSensitive = false): TextBlock[] {
  const needle = caseSensitive ? pattern : pattern.toLowerCase();
  return layout.blocks.filter((b) => (caseSensitive ? b.text : b.text.toLowerCase()).includes(needle));
}

export function findTextExact(layout: DocumentLayout, pattern: string, caseSensitive = true): TextBlock[] {
  const needle = caseSensitive ? pattern : pattern.toLowerCase();
  return layout.blocks.filter((b) => (caseSensitive ? b.text : b.text.toLowerCase()) === needle);
}

/** Case-insensitive regex search; throws on an invalid pattern. */
export function findRegex(layout: DocumentLayout, pattern: string): TextBlock[] {
  const rx = new RegExp(pattern, "i");
  return layout.blocks.filter((b) => rx.test(b.text));
}

export function blocksNear(layout: DocumentLayout, ref: TextBlock, maxDistance = 0.1): TextBlock[] {
  return layout.blocks.filter((b) =>
    b.id !== ref.id && b.bbox.page === ref.bbox.page && centerDistance(b.bbox, ref.bbox) <= maxDistance
  );
}

export function blocksInRow(layout: DocumentLayout, ref: TextBlock, tolerance = DEFAULT_ENGINE_CONFIG.rowTolerance): TextBlock[] {
  const y = centerY(ref.bbox);
  return layout.blocks
    .filter((b) => b.id !== ref.id && b.bbox.page === ref.bbox.page && Math.abs(centerY(b.bbox) - y) <= tolerance)
    .sort((a, b) => a.bbox.x0 - b.bbox.x0);
}

export function blocksInColumn(layout: DocumentLayout, ref: TextBlock, tolerance = DEFAULT_ENGINE_CONFIG.columnTolerance): TextBlock[] {
  const x = centerX(ref.bbox);
  return layout.blocks
    .filter((b) => b.id !== ref.id && b.bbox.page === ref.bbox.page && Math.abs(centerX(b.bbox) - x) <= tolerance)
    .sort((a, b) => a.bbox.y0 - b.bbox.y0);
}

export function blocksInBox(layout: DocumentLayout, box: BoundingBox): TextBlock[] {
  return layout.blocks.filter((b) => overlaps(b.bbox, box));
}
