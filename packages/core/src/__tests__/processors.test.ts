/**
 * Processor and layout interchange: defaults, legacy keys, integrity checks,
 * round-tripping and processor routing.
 */
import { describe, test, expect } from 'vitest';
import { LayoutInputError, ProcessorSpecError } from '../errors';
import { computeLayoutHash } from '../layout/document';
import { matchProcessor } from '../processors/routing';
import { parseLayout, parseProcessor, serializeProcessor } from '../processors/schema';
import { boxScoreLayout, boxScoreProcessor, processorOf } from './fixtures';

function issuesOf(run: () => unknown): string[] {
  try {
    run();
  } catch (err) {
    if (err instanceof ProcessorSpecError || err instanceof LayoutInputError) return err.issues;
    throw err;
  }
  throw new Error('expected the input to be rejected');
}

describe('parseProcessor', () => {
  test('fills defaults', () => {
    const p = parseProcessor({
      id: 'p1',
      name: 'Honor roll',
      created_at: '2024-01-01T00:00:00.000Z',
      updated_at: '2024-01-01T00:00:00.000Z',
      anchors: [{ name: 'title', patterns: ['Honor Roll'] }],
      validations: [{ name: 'has_names', predicate: 'len(data.names) > 0' }],
    });
    expect(p).toEqual({
      id: 'p1',
      name: 'Honor roll',
      document_type: 'generic',
      version: 1,
      created_at: '2024-01-01T00:00:00.000Z',
      updated_at: '2024-01-01T00:00:00.000Z',
      text_patterns: [],
      anchors: [{ name: 'title', patterns: ['Honor Roll'], pattern_type: 'contains', required: true }],
      regions: [],
      extraction_ops: [],
      calculations: [],
      validations: [{ name: 'has_names', predicate: 'len(data.names) > 0', severity: 'error' }],
    });
  });

  test('accepts JSON text', () => {
    expect(parseProcessor('{"id":"p2","name":"From text"}').name).toBe('From text');
    expect(issuesOf(() => parseProcessor('{not json'))[0]).toMatch(/^invalid JSON: /);
  });

  test('migrates legacy key names', () => {
    const p = processorOf({
      calculations: [{ field: 'total', formula: 'sum(rows[].n)' }],
      validations: [{ name: 'positive', check: 'data.total > 0' }],
      field_column_mapping: { fouls: 'FLS' },
    });
    expect(p.calculations).toEqual([{ field_path: 'total', formula: 'sum(rows[].n)' }]);
    expect(p.validations).toEqual([{ name: 'positive', predicate: 'data.total > 0', severity: 'error' }]);
    expect(p.field_column_map).toEqual({ fouls: 'FLS' });
  });

  test('reports schema issues by path', () => {
    const issues = issuesOf(() =>
      processorOf({ anchors: [{ name: 'a', patterns: ['x'], pattern_type: 'fuzzy' }] })
    );
    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatch(/^anchors\.0\.pattern_type: Invalid enum value/);
  });

  test('rejects dangling references and broken patterns', () => {
    const issues = issuesOf(() =>
      processorOf({
        anchors: [
          { name: 'start', patterns: ['Roster'] },
          { name: 'start', patterns: ['Team'] },
          { name: 'num', patterns: ['('], pattern_type: 'regex' },
        ],
        regions: [
          { name: 'r', start_anchor: 'start', end_anchor: 'footer', header_anchors: ['hdr'] },
          { name: 'ok', start_anchor: 'start', end_anchor: 'end_of_document' },
        ],
        extraction_ops: [{ field_path: 'a..b', source: 'region.r' }],
      })
    );
    expect(issues).toEqual([
      "duplicate anchor name 'start'",
      "anchor 'num' has invalid regex '('",
      "region 'r' references undeclared end_anchor 'footer'",
      "region 'r' references undeclared header anchor 'hdr'",
      "invalid path segment '' in 'a..b'",
    ]);
  });

  test('names follow the expression identifier rule', () => {
    const issues = issuesOf(() =>
      processorOf({
        anchors: [{ name: 'home-team', patterns: ['Home'] }],
        regions: [{ name: 'box-score', start_anchor: 'home-team', end_anchor: 'end_of_document' }],
        extraction_ops: [{ field_path: 'players[].free-throws', source: 'region.box-score.column[3]' }],
      })
    );
    expect(issues).toEqual([
      "invalid anchor name 'home-team'",
      "invalid region name 'box-score'",
      "invalid path segment 'free-throws' in 'players[].free-throws'",
    ]);
  });

  test('serialize then parse gives back an equal processor', () => {
    const original = boxScoreProcessor({ field_column_map: { fouls: 'FLS' }, layout_hash: 'abc123' });
    const text = serializeProcessor(original);
    expect(parseProcessor(text)).toEqual(original);
    expect(serializeProcessor(parseProcessor(text))).toBe(text);
  });
});

describe('parseLayout', () => {
  test('fills block defaults and computes the hash', () => {
    const layout = parseLayout({
      page_count: 1,
      blocks: [
        { id: 'b1', text: 'Results', bbox: { x0: 0.1, y0: 0.02, x1: 0.5, y1: 0.06, page: 0 }, block_type: 'title', font_size: 20 },
        { id: 'b2', text: '12', bbox: { x0: 0.1, y0: 0.2, x1: 0.15, y1: 0.22, page: 0 }, font_size: null },
      ],
    });
    expect(layout.blocks[0]).toEqual({
      id: 'b1',
      text: 'Results',
      bbox: { x0: 0.1, y0: 0.02, x1: 0.5, y1: 0.06, page: 0 },
      confidence: 100,
      font_size: 20,
      is_bold: false,
      block_type: 'header',
    });
    expect(layout.blocks[1].font_size).toBeUndefined();
    expect(layout.blocks[1].block_type).toBe('text');
    expect(layout.page_dimensions).toEqual([[1, 1]]);
    expect(layout.layout_hash).toBe(computeLayoutHash(layout.blocks));
  });

  test('keeps a supplied hash', () => {
    const layout = parseLayout({ page_count: 1, blocks: [], layout_hash: 'fixed' });
    expect(layout.layout_hash).toBe('fixed');
  });

  test('rejects blocks outside the document and duplicate ids', () => {
    const bbox = { x0: 0.1, y0: 0.1, x1: 0.2, y1: 0.2, page: 0 };
    const issues = issuesOf(() =>
      parseLayout({
        page_count: 1,
        blocks: [
          { id: 'a', text: 'x', bbox },
          { id: 'a', text: 'y', bbox },
          { id: 'c', text: 'z', bbox: { ...bbox, page: 1 } },
        ],
      })
    );
    expect(issues).toEqual(["blocks.1.id: duplicate block id 'a'", 'blocks.2.bbox.page: page 1 outside page_count 1']);
  });

  test('rejects coordinates outside the unit square', () => {
    const issues = issuesOf(() =>
      parseLayout({ page_count: 1, blocks: [{ id: 'a', text: 'x', bbox: { x0: 0.1, y0: 0.1, x1: 1.5, y1: 0.2, page: 0 } }] })
    );
    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatch(/^blocks\.0\.bbox\.x1: /);
  });
});

describe('matchProcessor', () => {
  const layout = boxScoreLayout();

  test('an exact layout hash wins over text patterns', () => {
    const byText = boxScoreProcessor({ id: 'by-text' });
    const byHash = processorOf({ id: 'by-hash', layout_hash: layout.layout_hash });
    expect(matchProcessor(layout, [byText, byHash])).toEqual({ processor: byHash, reason: 'layout_hash', score: 1 });
  });

  test('otherwise the highest share of text patterns wins', () => {
    const partial = processorOf({ id: 'partial', text_patterns: ['tigers', 'lions'] });
    const full = processorOf({ id: 'full', text_patterns: ['TIGERS', 'player'] });
    const match = matchProcessor(layout, [partial, full]);
    expect(match?.processor.id).toBe('full');
    expect(match?.score).toBe(1);
  });

  test('ties keep declaration order and no hit means no match', () => {
    const a = processorOf({ id: 'a', text_patterns: ['tigers'] });
    const b = processorOf({ id: 'b', text_patterns: ['tigers'] });
    expect(matchProcessor(layout, [a, b])?.processor.id).toBe('a');
    expect(matchProcessor(layout, [processorOf({ id: 'c', text_patterns: ['receipt'] })])).toBeNull();
    expect(matchProcessor(layout, [])).toBeNull();
  });
});
