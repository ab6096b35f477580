import { RequiredAnchorError } from "../errors";
import { findRegex, findText, findTextExact } from "../layout/document";
import { compareReadingOrder, unionBox } from "../layout/geometry";
import type { Anchor, DocumentLayout, LocationHint, TextBlock } from "../types";
import { degrade, type EngineContext } from "./context";

export type AnchorMap = Map<string, TextBlock>;

function candidatesFor(layout: DocumentLayout, anchor: Anchor, pattern: string, ctx: EngineContext): TextBlock[] {
  switch (anchor.pattern_type) {
    case "exact":
      return findTextExact(layout, pattern, false);
    case "contains":
      return findText(layout, pattern);
    case "regex":
      try {
        return findRegex(layout, pattern);
      } catch (e: unknown) {
        degrade(ctx, "anchor.regex.invalid", `Anchor '${anchor.name}' has invalid regex '${pattern}'`, {
          error: e instanceof Error ? e.message : String(e),
        });
        return [];
      }
  }
}

/**
 * Multi-word fallback for landmarks split into separate tokens. Each chain starts at a
 * block holding the first word and greedily takes, for every following word, the nearest
 * unused candidate to the previously matched block on the same page.
 */
export function findProximityMatches(layout: DocumentLayout, pattern: string, threshold = 0.1): TextBlock[] {
  const words = pattern.toLowerCase().split(/\s+/).filter(Boolean);
  if (words.length < 2) return [];

  const perWord: TextBlock[][] = [];
  for (const word of words) {
    const matches = layout.blocks.filter((b) => b.text.toLowerCase().includes(word));
    if (matches.length === 0) return [];
    perWord.push(matches);
  }

  const out: TextBlock[] = [];
  for (const first of perWord[0]) {
    const chain = [first];
    const used = new Set([first.id]);
    for (const candidates of perWord.slice(1)) {
      const prev = chain[chain.length - 1];
      let closest: TextBlock | undefined;
      let best = threshold;
      for (const c of candidates) {
        if (used.has(c.id) || c.bbox.page !== prev.bbox.page) continue;
        const dist = Math.hypot(c.bbox.x0 - prev.bbox.x1, c.bbox.y0 - prev.bbox.y0);
        if (dist < best) {
          best = dist;
          closest = c;
        }
      }
      if (!closest) break;
      chain.push(closest);
      used.add(closest.id);
    }
    if (chain.length !== words.length) continue;

    out.push({
      id: `proximity_${first.id}`,
      text: chain.map((b) => b.text).join(" "),
      bbox: unionBox(chain.map((b) => b.bbox)),
      confidence: Math.min(...chain.map((b) => b.confidence)),
      font_size: first.font_size,
      is_bold: first.is_bold,
      block_type: first.block_type,
    });
  }
  return out;
}

export function filterByLocationHint(blocks: TextBlock[], hint: LocationHint): TextBlock[] {
  const ordered = () => blocks.slice().sort(compareReadingOrder);
  switch (hint) {
    case "first_occurrence":
      return ordered().slice(0, 1);
    case "second_occurrence":
      return ordered().slice(1, 2);
    case "last_occurrence":
      return ordered().slice(-1);
    case "top_third":
      return blocks.filter((b) => b.bbox.y0 < 0.33);
    case "top_half":
      return blocks.filter((b) => b.bbox.y0 < 0.5);
    case "bottom_half":
      return blocks.filter((b) => b.bbox.y0 >= 0.5);
    case "left_half":
      return blocks.filter((b) => b.bbox.x0 < 0.5);
    case "right_half":
      return blocks.filter((b) => b.bbox.x0 >= 0.5);
  }
}

export function findAnchorBlock(layout: DocumentLayout, anchor: Anchor, ctx: EngineContext): TextBlock | undefined {
  for (const pattern of anchor.patterns) {
    let blocks = candidatesFor(layout, anchor, pattern, ctx);
    if (blocks.length === 0 && anchor.pattern_type !== "regex" && /\s/.test(pattern.trim())) {
      blocks = findProximityMatches(layout, pattern, ctx.config.proximityThreshold);
      if (blocks.length) ctx.log.debug("anchor.proximity.match", { anchor: anchor.name, pattern, text: blocks[0].text });
    }
    if (blocks.length === 0) continue;
    if (anchor.location_hint) blocks = filterByLocationHint(blocks, anchor.location_hint);
    if (blocks.length) return blocks[0];
  }
  return undefined;
}

/** Resolves every anchor; throws RequiredAnchorError naming the first required anchor that is absent. */
export function resolveAnchors(layout: DocumentLayout, anchors: Anchor[], ctx: EngineContext): AnchorMap {
  const found: AnchorMap = new Map();
  let missingRequired: string | undefined;

  for (const anchor of anchors) {
    const block = findAnchorBlock(layout, anchor, ctx);
    if (block) {
      found.set(anchor.name, block);
      ctx.log.debug("anchor.found", { anchor: anchor.name, block_id: block.id, page: block.bbox.page, y0: block.bbox.y0 });
    } else if (anchor.required) {
      ctx.log.warn("anchor.required.missing", { anchor: anchor.name });
      if (missingRequired === undefined) missingRequired = anchor.name;
    } else {
      degrade(ctx, "anchor.optional.missing", `Optional anchor '${anchor.name}' not found`, { anchor: anchor.name });
    }
  }

  ctx.log.info("anchors.resolve.done", { found: found.size, total: anchors.length });
  if (missingRequired !== undefined) throw new RequiredAnchorError(missingRequired);
  return found;
}
