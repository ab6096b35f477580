import { createLayout, inferBlockType } from '../layout/document';
import { getLogger, type Logger } from '../logger';
import type { BoundingBox, DocumentLayout, TextBlock } from '../types';
import type { LayoutProvider, LoadOptions } from './types';

export type PdfTextItem = {
  str: string;
  transform: number[];
  width?: number;
  height?: number;
};

type PositionedItem = { text: string; x: number; y: number; w: number; h: number };

const LINE_TOLERANCE = 3; // points
const DEFAULT_WORD_GAP = 2.5;
const DEFAULT_COLUMN_GAP = 12;

const clamp = (v: number) => Math.min(1, Math.max(0, v));

function positioned(raw: PdfTextItem): PositionedItem | undefined {
  const text = raw.str.replace(/\u00A0/g, ' ');
  if (!text.trim()) return undefined;
  const x = Number(raw.transform[4] || 0);
  const y = Number(raw.transform[5] || 0);
  const w = Number(raw.width ?? Math.abs(raw.transform[0] || 0)) || text.length * 4;
  const h = Number(raw.height ?? Math.abs(raw.transform[3] || 0));
  return { text, x, y, w, h };
}

// Groups items by baseline; PDF origin is bottom-left so lines come back top-to-bottom.
function clusterItemsIntoLines(items: PositionedItem[]): PositionedItem[][] {
  const lines: Array<{ y: number; items: PositionedItem[] }> = [];
  for (const item of items) {
    let line = lines.find((ln) => Math.abs(ln.y - item.y) <= LINE_TOLERANCE);
    if (!line) {
      line = { y: item.y, items: [] };
      lines.push(line);
    }
    line.items.push(item);
  }
  lines.sort((a, b) => b.y - a.y);
  return lines.map((ln) => ln.items.slice().sort((a, b) => a.x - b.x));
}

// Splits a line into cells at wide gaps so table columns become separate blocks.
function splitLine(line: PositionedItem[]): PositionedItem[][] {
  const chars = line.reduce((n, it) => n + (it.text.replace(/\s+/g, '').length || it.text.length), 0);
  const avgCharWidth = chars ? line.reduce((n, it) => n + it.w, 0) / chars : 0;
  const columnGap = Math.max(DEFAULT_COLUMN_GAP, avgCharWidth * 3.5);

  const cells: PositionedItem[][] = [];
  let prevRight: number | null = null;
  for (const item of line) {
    if (prevRight === null || item.x - prevRight > columnGap) cells.push([item]);
    else cells[cells.length - 1].push(item);
    prevRight = item.x + item.w;
  }
  return cells;
}

function joinCell(cell: PositionedItem[]): string {
  const chars = cell.reduce((n, it) => n + it.text.length, 0);
  const avgCharWidth = chars ? cell.reduce((n, it) => n + it.w, 0) / chars : 0;
  const wordGap = Math.max(DEFAULT_WORD_GAP, avgCharWidth * 0.6);
  let text = '';
  let prevRight: number | null = null;
  for (const item of cell) {
    if (prevRight !== null && item.x - prevRight > wordGap && !text.endsWith(' ')) text += ' ';
    text += item.text;
    prevRight = item.x + item.w;
  }
  return text.trim();
}

/**
 * Builds text blocks for one page from pdf.js text items. Coordinates are normalized by the
 * viewport and flipped so y grows downwards. Block ids are `p<page>_b<n>`.
 */
export function itemsToBlocks(items: PdfTextItem[], page: number, viewport: { width: number; height: number }): TextBlock[] {
  const { width: pw, height: ph } = viewport;
  const usable = items.map(positioned).filter((it): it is PositionedItem => it !== undefined);
  const blocks: TextBlock[] = [];

  for (const line of clusterItemsIntoLines(usable)) {
    for (const cell of splitLine(line)) {
      const text = joinCell(cell);
      if (!text) continue;
      const left = Math.min(...cell.map((it) => it.x));
      const right = Math.max(...cell.map((it) => it.x + it.w));
      const baseline = Math.min(...cell.map((it) => it.y));
      const top = Math.max(...cell.map((it) => it.y + it.h));
      const fontSize = Math.max(...cell.map((it) => it.h));
      const bbox: BoundingBox = {
        x0: clamp(left / pw),
        y0: clamp((ph - top) / ph),
        x1: clamp(right / pw),
        y1: clamp((ph - baseline) / ph),
        page,
      };
      blocks.push({
        id: `p${page}_b${blocks.length}`,
        text,
        bbox,
        confidence: 100,
        font_size: fontSize > 0 ? fontSize : undefined,
        is_bold: false,
        block_type: inferBlockType(text, bbox, fontSize > 0 ? fontSize : undefined),
      });
    }
  }
  return blocks;
}

/** Embedded-text PDF reader. Scanned pages without a text layer yield no blocks and a warning. */
export class PdfLayoutProvider implements LayoutProvider {
  readonly name = 'pdf';
  private readonly log: Logger;
  private readonly fingerprintBlocks?: number;

  constructor(opts: { fingerprintBlocks?: number; log?: Logger } = {}) {
    this.fingerprintBlocks = opts.fingerprintBlocks;
    this.log = opts.log ?? getLogger('ingest');
  }

  async load(input: Uint8Array, opts: LoadOptions = {}): Promise<DocumentLayout> {
    const pdfjs = await import('pdfjs-dist/legacy/build/pdf.mjs');
    const doc = await pdfjs.getDocument({ data: new Uint8Array(input) }).promise;
    const blocks: TextBlock[] = [];
    const dims: Array<[number, number]> = [];
    const warnings: string[] = [];

    try {
      for (let p = 1; p <= doc.numPages; p++) {
        const page = await doc.getPage(p);
        const viewport = page.getViewport({ scale: 1 });
        const content = await page.getTextContent();
        const items: PdfTextItem[] = [];
        for (const item of content.items) {
          if ('str' in item) items.push({ str: item.str, transform: item.transform.map(Number), width: item.width, height: item.height });
        }
        const pageBlocks = itemsToBlocks(items, p - 1, viewport);
        if (pageBlocks.length === 0) warnings.push(`Page ${p} has no selectable text`);
        blocks.push(...pageBlocks);
        dims.push([viewport.width, viewport.height]);
      }
    } finally {
      await doc.destroy();
    }

    this.log.info('ingest.pdf.done', { filename: opts.filename, pages: doc.numPages, blocks: blocks.length });
    const layout = createLayout(blocks, {
      filename: opts.filename,
      pageCount: doc.numPages,
      pageDimensions: dims,
      fingerprintBlocks: this.fingerprintBlocks,
    });
    return warnings.length ? { ...layout, warnings } : layout;
  }
}
