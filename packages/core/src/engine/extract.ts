import { blocksInRow, isNumericText } from "../layout/document";
import { parseSource } from "../processors/source";
import type { DocumentLayout, ExtractedValue, ExtractionOp, Processor, TextBlock } from "../types";
import type { AnchorMap } from "./anchors";
import { columnValues, findColumnByHeader, groupBlocksByRow, inferTable } from "./columns";
import { degrade, type EngineContext } from "./context";
import type { RegionMap } from "./regions";
import { applyTransform } from "./transforms";

export interface Resolved {
  anchors: AnchorMap;
  regions: RegionMap;
}

export const isArrayPath = (fieldPath: string) => fieldPath.includes("[]");

/** Field name the column map is keyed by: the last path segment without its `[]` marker. */
export function semanticFieldName(fieldPath: string): string {
  const segments = fieldPath.split(".");
  return segments[segments.length - 1].replace(/\[\]$/, "");
}

function perRowOrFirst(values: string[], fieldPath: string): ExtractedValue {
  if (isArrayPath(fieldPath)) return values;
  return values.length ? values[0] : null;
}

/** Blocks to the right of `anchor` on its row, nearest first, within the search distance. */
function blocksRightOf(layout: DocumentLayout, anchor: TextBlock, ctx: EngineContext): TextBlock[] {
  const { rowTolerance, valueSearchDistance } = ctx.config;
  return blocksInRow(layout, anchor, rowTolerance).filter(
    (b) => b.bbox.x0 >= anchor.bbox.x1 && b.bbox.x0 - anchor.bbox.x1 <= valueSearchDistance
  );
}

function extractColumn(
  layout: DocumentLayout,
  processor: Processor,
  resolved: Resolved,
  op: ExtractionOp,
  regionName: string,
  column: number,
  ctx: EngineContext
): ExtractedValue {
  const blocks = resolved.regions.get(regionName) ?? [];
  const region = processor.regions.find((r) => r.name === regionName);
  const table = inferTable(layout, blocks, region, processor.anchors, resolved.anchors, ctx.config);

  let index = column;
  const field = semanticFieldName(op.field_path);
  const header = processor.field_column_map?.[field];
  if (header !== undefined) {
    const mapped = findColumnByHeader(table.ranges, header);
    if (mapped >= 0) {
      if (mapped !== column) {
        ctx.log.debug("extract.column.corrected", { field_path: op.field_path, header, from: column, to: mapped });
      }
      index = mapped;
    } else {
      ctx.log.debug("extract.column.header_not_found", { field_path: op.field_path, header });
    }
  }

  if (index >= table.ranges.length) {
    degrade(ctx, "extract.column.out_of_range", `Field '${op.field_path}': column ${index} not found in region '${regionName}'`, {
      columns: table.ranges.length,
    });
    return null;
  }
  return perRowOrFirst(columnValues(table, index, ctx.config.columnTolerance), op.field_path);
}

function extractRaw(
  layout: DocumentLayout,
  processor: Processor,
  resolved: Resolved,
  op: ExtractionOp,
  ctx: EngineContext
): ExtractedValue {
  const ref = parseSource(op.source);
  if (!ref) {
    degrade(ctx, "extract.source.invalid", `Field '${op.field_path}': unrecognized source '${op.source}'`);
    return null;
  }

  switch (ref.kind) {
    case "literal":
      return ref.value;

    case "anchor_text":
    case "anchor_next":
    case "anchor_right": {
      const anchor = resolved.anchors.get(ref.anchor);
      if (!anchor) return null;
      if (ref.kind === "anchor_text") return anchor.text;
      const right = blocksRightOf(layout, anchor, ctx);
      if (ref.kind === "anchor_next") return right.length ? right[0].text : null;
      const numbers = right.filter((b) => isNumericText(b.text));
      return ref.index < numbers.length ? numbers[ref.index].text.trim() : null;
    }

    case "region_text":
    case "region_rows":
    case "region_column": {
      const blocks = resolved.regions.get(ref.region);
      if (!blocks || blocks.length === 0) return null;
      if (ref.kind === "region_text") return blocks.map((b) => b.text).join(" ");
      if (ref.kind === "region_rows") {
        const rows = groupBlocksByRow(blocks, ctx.config.rowTolerance).map((row) => row.map((b) => b.text).join(" "));
        return perRowOrFirst(rows, op.field_path);
      }
      return extractColumn(layout, processor, resolved, op, ref.region, ref.column, ctx);
    }
  }
}

/** Runs one extraction op; null means the op produced nothing and should not be written. */
export function extractField(
  layout: DocumentLayout,
  processor: Processor,
  resolved: Resolved,
  op: ExtractionOp,
  ctx: EngineContext
): ExtractedValue {
  const raw = extractRaw(layout, processor, resolved, op, ctx);
  if (raw === null) return null;
  return applyTransform(raw, op.transform);
}
