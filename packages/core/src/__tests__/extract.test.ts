/**
 * Field extraction: anchor-relative values, region text, column inference with
 * header-name correction, row preservation and transforms.
 */
import { describe, test, expect } from 'vitest';
import type { EngineConfig } from '../config';
import { createLayout } from '../layout/document';
import { createContext } from '../engine/context';
import { resolveAnchors } from '../engine/anchors';
import { resolveRegions } from '../engine/regions';
import { columnRanges, columnIndexAt, groupBlocksByRow } from '../engine/columns';
import { extractField, semanticFieldName } from '../engine/extract';
import { applyTransform, transformScalar } from '../engine/transforms';
import { parseSource } from '../processors/source';
import type { DocumentLayout, ExtractionOp, Processor } from '../types';
import { block, boxScoreLayout, boxScoreProcessor, processorOf, quietLog } from './fixtures';

function extractor(layout: DocumentLayout, processor: Processor, config: Partial<EngineConfig> = {}) {
  const ctx = createContext({ config, log: quietLog });
  const anchors = resolveAnchors(layout, processor.anchors, ctx);
  const regions = resolveRegions(layout, anchors, processor.regions, ctx);
  return {
    ctx,
    run: (op: Partial<ExtractionOp> & Pick<ExtractionOp, 'source'>) =>
      extractField(layout, processor, { anchors, regions }, { field_path: 'value', ...op }, ctx),
  };
}

describe('parseSource', () => {
  test('recognized forms', () => {
    expect(parseSource('anchor.home')).toEqual({ kind: 'anchor_text', anchor: 'home' });
    expect(parseSource('anchor.home.text')).toEqual({ kind: 'anchor_text', anchor: 'home' });
    expect(parseSource('anchor.home.right')).toEqual({ kind: 'anchor_right', anchor: 'home', index: 0 });
    expect(parseSource('anchor.home.right[3]')).toEqual({ kind: 'anchor_right', anchor: 'home', index: 3 });
    expect(parseSource('anchor.home.next')).toEqual({ kind: 'anchor_next', anchor: 'home' });
    expect(parseSource('region.players')).toEqual({ kind: 'region_text', region: 'players' });
    expect(parseSource('region.players.rows')).toEqual({ kind: 'region_rows', region: 'players' });
    expect(parseSource('region.players.column[2]')).toEqual({ kind: 'region_column', region: 'players', column: 2 });
    expect(parseSource('literal: Final ')).toEqual({ kind: 'literal', value: ' Final ' });
  });

  test('unknown forms are null', () => {
    expect(parseSource('anchor.home.left')).toBeNull();
    expect(parseSource('region.players.column[x]')).toBeNull();
    expect(parseSource('cell:A1')).toBeNull();
  });
});

describe('anchor sources', () => {
  const { run } = extractor(boxScoreLayout(), boxScoreProcessor());

  test('anchor text and the next block to the right', () => {
    expect(run({ source: 'anchor.home' })).toBe('Home:');
    expect(run({ source: 'anchor.home.next' })).toBe('Tigers');
  });

  test('right[N] counts numeric blocks only', () => {
    expect(run({ source: 'anchor.home.right' })).toBe('12');
    expect(run({ source: 'anchor.home.right[1]' })).toBe('15');
    expect(run({ source: 'anchor.home.right[2]', transform: 'to_int' })).toBe(27);
    expect(run({ source: 'anchor.home.right[3]' })).toBeNull();
  });

  test('an unresolved anchor yields null', () => {
    expect(run({ source: 'anchor.away.next' })).toBeNull();
  });

  test('literals pass through', () => {
    expect(run({ source: 'literal:basketball', transform: 'upper' })).toBe('BASKETBALL');
  });
});

describe('region sources', () => {
  const { run, ctx } = extractor(boxScoreLayout(), boxScoreProcessor());

  test('whole region text joins blocks in reading order', () => {
    expect(run({ source: 'region.players' })).toBe('John Smith 10 2 Mike Jones 8 1 Sam Lee 9 3');
  });

  test('rows give one string per line', () => {
    expect(run({ source: 'region.players.rows', field_path: 'lines[]' })).toEqual([
      'John Smith 10 2',
      'Mike Jones 8 1',
      'Sam Lee 9 3',
    ]);
    expect(run({ source: 'region.players.rows', field_path: 'first_line' })).toBe('John Smith 10 2');
  });

  test('columns from role-tagged header anchors', () => {
    expect(run({ source: 'region.players.column[0]', field_path: 'players[].name' })).toEqual([
      'John Smith',
      'Mike Jones',
      'Sam Lee',
    ]);
    expect(run({ source: 'region.players.column[1]', field_path: 'players[].pts', transform: 'to_int' })).toEqual([10, 8, 9]);
    expect(run({ source: 'region.players.column[2]', field_path: 'top_fouls' })).toBe('2');
  });

  test('an out-of-range column is reported', () => {
    expect(run({ source: 'region.players.column[5]', field_path: 'x[]' })).toBeNull();
    expect(ctx.warnings).toEqual(["Field 'x[]': column 5 not found in region 'players'"]);
  });

  test('an unknown region yields null', () => {
    expect(run({ source: 'region.bench.column[0]' })).toBeNull();
  });
});

describe('column correction by header name', () => {
  // No header anchors: the first row of the region is the header row.
  const layout = createLayout([
    block('stats', 'Stats', [0.05, 0.02, 0.15, 0.05]),
    block('h_name', 'Name', [0.05, 0.1, 0.12, 0.12]),
    block('h_pts', 'Pts', [0.3, 0.1, 0.35, 0.12]),
    block('h_fouls', 'Fouls', [0.55, 0.1, 0.63, 0.12]),
    block('john', 'John', [0.05, 0.15, 0.12, 0.17]),
    block('ten', '10', [0.3, 0.15, 0.33, 0.17]),
    block('two', '2', [0.55, 0.15, 0.57, 0.17]),
  ]);
  const spec = {
    anchors: [{ name: 'stats', patterns: ['Stats'], pattern_type: 'exact' }],
    regions: [{ name: 'table', start_anchor: 'stats', end_anchor: 'end_of_document' }],
  };

  test('the mapped header overrides a wrong column index', () => {
    const { run } = extractor(layout, processorOf({ ...spec, field_column_map: { fouls: 'Fouls' } }));
    expect(run({ field_path: 'fouls', source: 'region.table.column[1]' })).toBe('2');
  });

  test('without a mapping the index is used as written', () => {
    const { run } = extractor(layout, processorOf(spec));
    expect(run({ field_path: 'fouls', source: 'region.table.column[1]' })).toBe('10');
  });

  test('a mapping whose header is absent keeps the index', () => {
    const { run } = extractor(layout, processorOf({ ...spec, field_column_map: { fouls: 'Rebounds' } }));
    expect(run({ field_path: 'fouls', source: 'region.table.column[1]' })).toBe('10');
  });

  test('the header row is not data', () => {
    const { run } = extractor(layout, processorOf(spec));
    expect(run({ field_path: 'names[]', source: 'region.table.column[0]' })).toEqual(['John']);
  });
});

describe('header row at the region start', () => {
  // The region starts at an untagged "Player" label whose row holds the other headers.
  const layout = createLayout([
    block('roster', 'Roster', [0.05, 0.02, 0.2, 0.05]),
    block('h_player', 'Player', [0.05, 0.1, 0.15, 0.12]),
    block('h_pts', 'PTS', [0.4, 0.1, 0.45, 0.12]),
    block('ann', 'Ann', [0.05, 0.15, 0.12, 0.17]),
    block('ann_pts', '10', [0.4, 0.15, 0.43, 0.17]),
    block('cy', 'Cy', [0.05, 0.2, 0.12, 0.22]),
    block('cy_pts', '4', [0.4, 0.2, 0.42, 0.22]),
  ]);

  test('the start anchor row is the header and every data row is kept', () => {
    const processor = processorOf({
      anchors: [{ name: 'player', patterns: ['Player'], pattern_type: 'exact' }],
      regions: [{ name: 'players', start_anchor: 'player', end_anchor: 'end_of_document' }],
      field_column_map: { pts: 'PTS' },
    });
    const { run, ctx } = extractor(layout, processor);
    expect(run({ field_path: 'players[].name', source: 'region.players.column[0]' })).toEqual(['Ann', 'Cy']);
    expect(run({ field_path: 'players[].pts', source: 'region.players.column[0]' })).toEqual(['10', '4']);
    expect(ctx.warnings).toEqual([]);
  });

  test('a start anchor alone on its row falls back to the first region row', () => {
    const processor = processorOf({
      anchors: [{ name: 'roster', patterns: ['Roster'], pattern_type: 'exact' }],
      regions: [{ name: 'players', start_anchor: 'roster', end_anchor: 'end_of_document' }],
    });
    const { run } = extractor(layout, processor);
    expect(run({ field_path: 'names[]', source: 'region.players.column[0]' })).toEqual(['Ann', 'Cy']);
  });
});

describe('column tolerance', () => {
  // Name centers at 0.1 and Total at 0.55, so the boundary is 0.325; "1,250" starts at 0.31.
  const layout = createLayout([
    block('h_name', 'Name', [0.05, 0.1, 0.15, 0.12]),
    block('h_total', 'Total', [0.5, 0.1, 0.6, 0.12]),
    block('ann', 'Ann', [0.05, 0.15, 0.12, 0.17]),
    block('ann_total', '1,250', [0.31, 0.15, 0.6, 0.17]),
  ]);
  const processor = processorOf({
    anchors: [
      { name: 'name', patterns: ['Name'], pattern_type: 'exact', role: 'row_label' },
      { name: 'total', patterns: ['Total'], pattern_type: 'exact', role: 'column_header' },
    ],
    regions: [{ name: 'rows', start_anchor: 'name', end_anchor: 'end_of_document' }],
  });

  test('a block starting just before a boundary joins the column on its right', () => {
    const { run } = extractor(layout, processor);
    expect(run({ field_path: 'r[].name', source: 'region.rows.column[0]' })).toEqual(['Ann']);
    expect(run({ field_path: 'r[].total', source: 'region.rows.column[1]' })).toEqual(['1,250']);
  });

  test('with no tolerance the left edge decides', () => {
    const { run } = extractor(layout, processor, { columnTolerance: 0 });
    expect(run({ field_path: 'r[].name', source: 'region.rows.column[0]' })).toEqual(['Ann 1,250']);
    expect(run({ field_path: 'r[].total', source: 'region.rows.column[1]' })).toEqual(['']);
  });
});

describe('row preservation', () => {
  const layout = createLayout([
    block('h_name', 'Name', [0.05, 0.1, 0.15, 0.12]),
    block('h_pts', 'PTS', [0.4, 0.1, 0.45, 0.12]),
    block('a', 'Ana', [0.05, 0.2, 0.12, 0.22]),
    block('a_pts', '7', [0.4, 0.2, 0.42, 0.22]),
    block('b', 'Bea', [0.05, 0.25, 0.12, 0.27]),
    block('c', 'Cy', [0.05, 0.3, 0.12, 0.32]),
    block('c_pts', '4', [0.4, 0.3, 0.42, 0.32]),
  ]);
  const processor = processorOf({
    anchors: [
      { name: 'name', patterns: ['Name'], pattern_type: 'exact', role: 'row_label' },
      { name: 'pts', patterns: ['PTS'], pattern_type: 'exact', role: 'column_header' },
    ],
    regions: [{ name: 'roster', start_anchor: 'name', end_anchor: 'end_of_document' }],
  });

  test('an empty cell keeps its row', () => {
    const { run } = extractor(layout, processor);
    const names = run({ field_path: 'p[].name', source: 'region.roster.column[0]' });
    const pts = run({ field_path: 'p[].pts', source: 'region.roster.column[1]' });
    expect(names).toEqual(['Ana', 'Bea', 'Cy']);
    expect(pts).toEqual(['7', '', '4']);
  });
});

describe('column helpers', () => {
  test('groupBlocksByRow clusters on vertical centers', () => {
    const rows = groupBlocksByRow([
      block('b', 'b', [0.5, 0.205, 0.6, 0.225]),
      block('a', 'a', [0.1, 0.2, 0.2, 0.22]),
      block('c', 'c', [0.1, 0.3, 0.2, 0.32]),
    ]);
    expect(rows.map((r) => r.map((b) => b.id))).toEqual([['a', 'b'], ['c']]);
  });

  test('column ranges split at midpoints between header centers', () => {
    const ranges = columnRanges([
      block('r', 'Right', [0.5, 0, 1, 0.02]),
      block('l', 'Left', [0, 0, 0.5, 0.02]),
    ]);
    expect(ranges).toEqual([
      { header: 'Left', start: 0, end: 0.5 },
      { header: 'Right', start: 0.5, end: 1 },
    ]);
    expect(columnIndexAt(ranges, 0.49)).toBe(0);
    expect(columnIndexAt(ranges, 0.5)).toBe(1);
    expect(columnIndexAt(ranges, 1)).toBe(1);
  });

  test('semanticFieldName drops the array marker', () => {
    expect(semanticFieldName('home.players[].fouls')).toBe('fouls');
    expect(semanticFieldName('scores[]')).toBe('scores');
  });
});

describe('transforms', () => {
  test('numeric coercions fall back to zero', () => {
    expect(transformScalar(' 42 ', 'to_int')).toBe(42);
    expect(transformScalar('4.5', 'to_int')).toBe(0);
    expect(transformScalar(4.9, 'to_int')).toBe(4);
    expect(transformScalar('4.5', 'to_float')).toBe(4.5);
    expect(transformScalar('n/a', 'to_float')).toBe(0);
  });

  test('text transforms', () => {
    expect(transformScalar('  Tigers ', 'strip')).toBe('Tigers');
    expect(transformScalar('Tigers', 'lower')).toBe('tigers');
    expect(transformScalar('John Q Smith', 'last_name_only')).toBe('Smith');
    expect(transformScalar('', 'last_name_only')).toBe('');
  });

  test('null passes through and lists map element-wise', () => {
    expect(transformScalar(null, 'to_int')).toBeNull();
    expect(applyTransform(['1', 'x'], 'to_int')).toEqual([1, 0]);
    expect(applyTransform('1')).toBe('1');
  });
});
