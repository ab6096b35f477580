import { blocksInRow } from "../layout/document";
import { centerX, centerY, overlaps } from "../layout/geometry";
import type { Anchor, DocumentLayout, Region, TextBlock } from "../types";
import type { AnchorMap } from "./anchors";

export interface ColumnRange {
  header: string;
  start: number; // inclusive
  end: number; // exclusive, except the last column which runs to the page edge
}

/**
 * Groups blocks into rows by vertical center. A block joins the current row when its
 * center is within `tolerance` of the row's first block; rows come back sorted left-to-right.
 */
export function groupBlocksByRow(blocks: TextBlock[], tolerance = 0.015): TextBlock[][] {
  if (blocks.length === 0) return [];
  const sorted = blocks.slice().sort((a, b) => centerY(a.bbox) - centerY(b.bbox));
  const byX = (a: TextBlock, b: TextBlock) => a.bbox.x0 - b.bbox.x0;

  const rows: TextBlock[][] = [];
  let current = [sorted[0]];
  let rowY = centerY(sorted[0].bbox);
  for (const block of sorted.slice(1)) {
    if (Math.abs(centerY(block.bbox) - rowY) <= tolerance) {
      current.push(block);
    } else {
      rows.push(current.sort(byX));
      current = [block];
      rowY = centerY(block.bbox);
    }
  }
  rows.push(current.sort(byX));
  return rows;
}

/** Splits the page width at the midpoints between adjacent header centers. */
export function columnRanges(headers: TextBlock[]): ColumnRange[] {
  const sorted = headers.slice().sort((a, b) => centerX(a.bbox) - centerX(b.bbox));
  return sorted.map((h, i) => {
    const prev = sorted[i - 1];
    const next = sorted[i + 1];
    return {
      header: h.text,
      start: prev ? (centerX(prev.bbox) + centerX(h.bbox)) / 2 : 0,
      end: next ? (centerX(h.bbox) + centerX(next.bbox)) / 2 : 1,
    };
  });
}

export function columnIndexAt(ranges: ColumnRange[], x: number): number {
  const last = ranges.length - 1;
  return ranges.findIndex((r, i) => x >= r.start && (x < r.end || i === last));
}

export interface TableLayout {
  ranges: ColumnRange[];
  rows: TextBlock[][];
}

export interface TableTolerances {
  rowTolerance: number;
  columnTolerance: number;
}

function tableFrom(headers: TextBlock[], data: TextBlock[], rowTolerance: number): TableLayout {
  return { ranges: columnRanges(headers), rows: groupBlocksByRow(data, rowTolerance) };
}

/**
 * Header anchors that head this region: the nearest row of them at or above the region's
 * first row. Headers of other tables on the same page are left out.
 */
function regionHeaders(candidates: TextBlock[], regionBlocks: TextBlock[], rowTolerance: number): TextBlock[] {
  const top = Math.min(...regionBlocks.map((b) => centerY(b.bbox)));
  const above = candidates.filter((h) => centerY(h.bbox) <= top + rowTolerance);
  if (above.length === 0) return [];
  const rowY = Math.max(...above.map((h) => centerY(h.bbox)));
  return above.filter((h) => rowY - centerY(h.bbox) <= rowTolerance);
}

/**
 * Column headers come from role-tagged anchors (or the region's explicit `header_anchors`)
 * heading the region. Without those, the start anchor's row is the header row when it holds
 * two or more blocks, and failing that the region's first row is. Header blocks, including
 * those of other tables on the page, never appear in the returned data rows.
 */
export function inferTable(
  layout: DocumentLayout,
  regionBlocks: TextBlock[],
  region: Region | undefined,
  anchorSpecs: Anchor[],
  anchors: AnchorMap,
  { rowTolerance }: TableTolerances
): TableLayout {
  if (regionBlocks.length === 0) return { ranges: [], rows: [] };
  const page = regionBlocks[0].bbox.page;

  const names = region?.header_anchors ?? anchorSpecs.filter((a) => a.role !== undefined).map((a) => a.name);
  const tagged = new Set<string>();
  const candidates: TextBlock[] = [];
  for (const name of names) {
    const block = anchors.get(name);
    if (!block || block.bbox.page !== page || tagged.has(block.id)) continue;
    tagged.add(block.id);
    candidates.push(block);
  }
  const untagged = regionBlocks.filter((b) => !tagged.has(b.id));
  if (untagged.length === 0) return { ranges: [], rows: [] };

  const headers = regionHeaders(candidates, untagged, rowTolerance);
  if (headers.length > 0) return tableFrom(headers, untagged, rowTolerance);

  const start = region ? anchors.get(region.start_anchor) : undefined;
  if (start && start.bbox.page === page) {
    // A proximity anchor is synthetic; the blocks it was joined from sit inside its box.
    const row = [start, ...blocksInRow(layout, start, rowTolerance).filter((b) => !overlaps(b.bbox, start.bbox))];
    if (row.length >= 2) {
      const ids = new Set(row.map((b) => b.id));
      return tableFrom(row, untagged.filter((b) => !ids.has(b.id)), rowTolerance);
    }
  }

  const [headerRow, ...rows] = groupBlocksByRow(untagged, rowTolerance);
  return { ranges: columnRanges(headerRow), rows };
}

/**
 * One value per row; a row without a block in the column yields "" so rows stay aligned.
 * A block starting within `tolerance` before a column boundary belongs to the column on its right.
 */
export function columnValues(table: TableLayout, column: number, tolerance = 0): string[] {
  return table.rows.map((row) =>
    row
      .filter((b) => columnIndexAt(table.ranges, b.bbox.x0 + tolerance) === column)
      .map((b) => b.text)
      .join(" ")
  );
}

/** Index of the column whose header equals `header`, ignoring case and surrounding whitespace. */
export function findColumnByHeader(ranges: ColumnRange[], header: string): number {
  const wanted = header.trim().toLowerCase();
  return ranges.findIndex((r) => r.header.trim().toLowerCase() === wanted);
}
