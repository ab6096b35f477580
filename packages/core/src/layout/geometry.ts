import type { BoundingBox, TextBlock } from "../types";

export const width = (b: BoundingBox) => b.x1 - b.x0;
export const height = (b: BoundingBox) => b.y1 - b.y0;
export const centerX = (b: BoundingBox) => (b.x0 + b.x1) / 2;
export const centerY = (b: BoundingBox) => (b.y0 + b.y1) / 2;
export const area = (b: BoundingBox) => width(b) * height(b);

// Boxes on different pages never overlap; touching edges count as overlap.
export function overlaps(a: BoundingBox, b: BoundingBox): boolean {
  if (a.page !== b.page) return false;
  return !(a.x1 < b.x0 || a.x0 > b.x1 || a.y1 < b.y0 || a.y0 > b.y1);
}

export function containsPoint(b: BoundingBox, x: number, y: number, page = b.page): boolean {
  return b.page === page && b.x0 <= x && x <= b.x1 && b.y0 <= y && y <= b.y1;
}

/** Smallest box enclosing every input box; all inputs must share a page. */
export function unionBox(boxes: BoundingBox[]): BoundingBox {
  if (boxes.length === 0) throw new Error("unionBox requires at least one box");
  return {
    x0: Math.min(...boxes.map((b) => b.x0)),
    y0: Math.min(...boxes.map((b) => b.y0)),
    x1: Math.max(...boxes.map((b) => b.x1)),
    y1: Math.max(...boxes.map((b) => b.y1)),
    page: boxes[0].page,
  };
}

export function centerDistance(a: BoundingBox, b: BoundingBox): number {
  return Math.hypot(centerX(a) - centerX(b), centerY(a) - centerY(b));
}

/** Reading order: page, then top edge, then left edge. */
export function compareReadingOrder(a: TextBlock, b: TextBlock): number {
  return a.bbox.page - b.bbox.page || a.bbox.y0 - b.bbox.y0 || a.bbox.x0 - b.bbox.x0;
}
