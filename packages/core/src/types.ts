// Coordinates are normalized per page (0..1, origin top-left) so processors transfer
// across resolutions and page sizes. Pages are 0-indexed.
export interface BoundingBox {
  x0: number;
  y0: number;
  x1: number;
  y1: number;
  page: number;
}

export type BlockType = "text" | "header" | "number";

export interface TextBlock {
  id: string;
  text: string;
  bbox: BoundingBox;
  confidence: number; // 0..100
  font_size?: number;
  is_bold: boolean;
  block_type: BlockType;
}

export interface DocumentLayout {
  filename?: string;
  page_count: number;
  page_dimensions: Array<[number, number]>; // (width, height) per page
  blocks: TextBlock[];
  layout_hash: string;
  warnings?: string[];
}

export type PatternType = "exact" | "contains" | "regex";

export type LocationHint =
  | "first_occurrence"
  | "second_occurrence"
  | "last_occurrence"
  | "top_third"
  | "top_half"
  | "bottom_half"
  | "left_half"
  | "right_half";

export type AnchorRole = "column_header" | "row_label";

export interface Anchor {
  name: string;
  patterns: string[];
  pattern_type: PatternType;
  location_hint?: LocationHint;
  required: boolean;
  role?: AnchorRole;
}

export const END_OF_DOCUMENT = "end_of_document";

export type RegionType = "table" | "list" | "key_value";

export interface Region {
  name: string;
  start_anchor: string;
  end_anchor: string; // anchor name or END_OF_DOCUMENT
  region_type: RegionType;
  header_anchors?: string[];
}

export type Transform = "to_int" | "to_float" | "strip" | "upper" | "lower" | "last_name_only";

export interface ExtractionOp {
  field_path: string; // "home_team.players[].fouls"
  source: string; // "region.home_players.column[3]", "anchor.title", "literal:Final"
  transform?: Transform;
}

export interface Calculation {
  field_path: string;
  formula: string; // "sum(players[].oreb) + sum(players[].dreb)"
  description?: string;
}

export type Severity = "error" | "warning";

export interface Validation {
  name: string;
  predicate: string; // "data.home.final_score == sum(data.home.period_scores)"
  severity: Severity;
}

export interface Processor {
  id: string;
  name: string;
  document_type: string;
  version: number;
  created_at: string;
  updated_at: string;

  // routing
  layout_hash?: string;
  text_patterns: string[];

  anchors: Anchor[];
  regions: Region[];
  extraction_ops: ExtractionOp[];
  calculations: Calculation[];
  validations: Validation[];

  // semantic field name -> exact column header text, e.g. { fouls: "FOUL" }
  field_column_map?: Record<string, string>;
}

export type Scalar = string | number | boolean | null;

/** JSON view of the extracted tree. */
export type PlainValue = Scalar | PlainValue[] | { [key: string]: PlainValue };
export type ExtractedData = { [key: string]: PlainValue };

/** What a single extraction op produces before it is written into the tree. */
export type ExtractedValue = Scalar | Scalar[];

export interface ValidationResult {
  success: boolean;
  errors: string[];
  warnings: string[];
}

export interface ExecutionResult {
  processor_id: string;
  data: ExtractedData;
  validation: ValidationResult;
  anchors: Record<string, string>; // anchor name -> block id
  regions: Record<string, number>; // region name -> block count
  warnings: string[];
  status: "ok" | "needs_review";
}
