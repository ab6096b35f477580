import { layoutText } from "../layout/document";
import type { DocumentLayout, Processor } from "../types";

export interface ProcessorMatch {
  processor: Processor;
  reason: "layout_hash" | "text_patterns";
  score: number;
}

/**
 * Picks the processor for a layout. An exact fingerprint match wins; otherwise the processor
 * whose text patterns appear most (as a share of its own patterns) is chosen. Ties keep
 * declaration order.
 */
export function matchProcessor(layout: DocumentLayout, processors: Processor[]): ProcessorMatch | null {
  const exact = processors.find((p) => p.layout_hash !== undefined && p.layout_hash === layout.layout_hash);
  if (exact) return { processor: exact, reason: "layout_hash", score: 1 };

  const text = layoutText(layout).toLowerCase();
  let best: ProcessorMatch | null = null;
  for (const p of processors) {
    if (p.text_patterns.length === 0) continue;
    const hits = p.text_patterns.filter((t) => text.includes(t.toLowerCase())).length;
    const score = hits / p.text_patterns.length;
    if (score > 0 && (best === null || score > best.score)) best = { processor: p, reason: "text_patterns", score };
  }
  return best;
}
