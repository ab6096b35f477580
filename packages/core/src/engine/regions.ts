import { blocksOnPage } from "../layout/document";
import { END_OF_DOCUMENT } from "../types";
import type { DocumentLayout, Region, TextBlock } from "../types";
import type { AnchorMap } from "./anchors";
import { degrade, type EngineContext } from "./context";

export type RegionMap = Map<string, TextBlock[]>;

const byRowThenColumn = (a: TextBlock, b: TextBlock) => a.bbox.y0 - b.bbox.y0 || a.bbox.x0 - b.bbox.x0;

/** Blocks below `start` on its page, optionally bounded above `end`. Regions never span pages. */
export function blocksBetween(layout: DocumentLayout, start: TextBlock, end?: TextBlock): TextBlock[] {
  if (end && end.bbox.page !== start.bbox.page) return [];
  const top = start.bbox.y1;
  const bottom = end ? end.bbox.y0 : Number.POSITIVE_INFINITY;
  return blocksOnPage(layout, start.bbox.page)
    .filter((b) => b.bbox.y0 >= top && b.bbox.y0 <= bottom)
    .sort(byRowThenColumn);
}

export function resolveRegions(
  layout: DocumentLayout,
  anchors: AnchorMap,
  regions: Region[],
  ctx: EngineContext
): RegionMap {
  const out: RegionMap = new Map();

  for (const region of regions) {
    const start = anchors.get(region.start_anchor);
    const toEnd = region.end_anchor === END_OF_DOCUMENT;
    const end = toEnd ? undefined : anchors.get(region.end_anchor);

    if (!start || (!toEnd && !end)) {
      degrade(ctx, "region.missing_anchor", `Region '${region.name}' skipped: anchor not found`, {
        region: region.name,
        start: start !== undefined,
        end: toEnd || end !== undefined,
      });
      continue;
    }
    if (end && end.bbox.page !== start.bbox.page) {
      degrade(ctx, "region.cross_page", `Region '${region.name}' skipped: anchors are on different pages`, {
        region: region.name,
        start_page: start.bbox.page,
        end_page: end.bbox.page,
      });
      continue;
    }

    const blocks = blocksBetween(layout, start, end);
    out.set(region.name, blocks);
    ctx.log.debug("region.resolved", { region: region.name, blocks: blocks.length, page: start.bbox.page });
  }

  return out;
}
