/**
 * Shared layouts and processors for the engine tests.
 */
import { createLayout } from '../layout/document';
import { getLogger } from '../logger';
import { parseProcessor } from '../processors/schema';
import type { DocumentLayout, Processor, TextBlock } from '../types';

export const quietLog = getLogger('test', { level: 'silent' });

export function block(
  id: string,
  text: string,
  [x0, y0, x1, y1]: [number, number, number, number],
  extra: Partial<Omit<TextBlock, 'id' | 'text' | 'bbox'>> & { page?: number } = {}
): TextBlock {
  const { page = 0, ...rest } = extra;
  return {
    id,
    text,
    bbox: { x0, y0, x1, y1, page },
    confidence: 100,
    is_bold: false,
    block_type: 'text',
    ...rest,
  };
}

export function processorOf(spec: Record<string, unknown>): Processor {
  return parseProcessor({ id: 'proc-test', name: 'Test processor', ...spec });
}

// A one-team box score: title split over two blocks, a team line with quarter scores
// and a three-row player table under Player / PTS / FLS headers.
export function boxScoreLayout(): DocumentLayout {
  return createLayout(
    [
      block('t1', 'Box', [0.4, 0.02, 0.46, 0.05]),
      block('t2', 'Score', [0.47, 0.02, 0.55, 0.05]),
      block('home_lbl', 'Home:', [0.05, 0.1, 0.12, 0.12]),
      block('home_name', 'Tigers', [0.14, 0.1, 0.25, 0.12]),
      block('q1', '12', [0.4, 0.1, 0.43, 0.12]),
      block('q2', '15', [0.45, 0.1, 0.48, 0.12]),
      block('final', '27', [0.6, 0.1, 0.63, 0.12]),
      block('h_player', 'Player', [0.05, 0.2, 0.15, 0.22]),
      block('h_pts', 'PTS', [0.4, 0.2, 0.45, 0.22]),
      block('h_fls', 'FLS', [0.6, 0.2, 0.65, 0.22]),
      block('r1_name', 'John Smith', [0.05, 0.25, 0.2, 0.27]),
      block('r1_pts', '10', [0.4, 0.25, 0.43, 0.27]),
      block('r1_fls', '2', [0.6, 0.25, 0.62, 0.27]),
      block('r2_name', 'Mike Jones', [0.05, 0.3, 0.2, 0.32]),
      block('r2_pts', '8', [0.4, 0.3, 0.42, 0.32]),
      block('r2_fls', '1', [0.6, 0.3, 0.62, 0.32]),
      block('r3_name', 'Sam Lee', [0.05, 0.35, 0.15, 0.37]),
      block('r3_pts', '9', [0.4, 0.35, 0.42, 0.37]),
      block('r3_fls', '3', [0.6, 0.35, 0.62, 0.37]),
    ],
    { filename: 'box-score.json' }
  );
}

export function boxScoreProcessor(overrides: Record<string, unknown> = {}): Processor {
  return processorOf({
    id: 'box-score',
    name: 'Box score',
    document_type: 'box_score',
    text_patterns: ['box score', 'player', 'pts'],
    anchors: [
      { name: 'title', patterns: ['Box Score'], pattern_type: 'contains' },
      { name: 'home', patterns: ['Home:'], pattern_type: 'exact' },
      { name: 'player', patterns: ['Player'], pattern_type: 'exact', role: 'row_label' },
      { name: 'pts', patterns: ['PTS'], pattern_type: 'exact', role: 'column_header' },
      { name: 'fls', patterns: ['FLS'], pattern_type: 'exact', role: 'column_header' },
    ],
    regions: [{ name: 'players', start_anchor: 'player', end_anchor: 'end_of_document' }],
    extraction_ops: [
      { field_path: 'home.team_name', source: 'anchor.home.next' },
      { field_path: 'home.final_score', source: 'anchor.home.right[2]', transform: 'to_int' },
      { field_path: 'home.players[].name', source: 'region.players.column[0]' },
      { field_path: 'home.players[].points', source: 'region.players.column[1]', transform: 'to_int' },
      { field_path: 'home.players[].fouls', source: 'region.players.column[2]', transform: 'to_int' },
    ],
    calculations: [
      { field_path: 'home.total_points', formula: 'sum(home.players[].points)' },
      { field_path: 'home.total_fouls', formula: 'sum(home.players[].fouls)' },
    ],
    validations: [
      { name: 'points_match_final', predicate: 'data.home.total_points == data.home.final_score' },
      { name: 'fouls_non_negative', predicate: 'min(data.home.players[].fouls) >= 0', severity: 'warning' },
    ],
    ...overrides,
  });
}
