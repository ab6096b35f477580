import { z } from "zod";
import { LayoutInputError, ProcessorSpecError } from "../errors";
import { parsePath } from "../engine/tree";
import { isName } from "../expr/lexer";
import { computeLayoutHash } from "../layout/document";
import { END_OF_DOCUMENT } from "../types";
import type { DocumentLayout, Processor } from "../types";

const unit = z.number().min(0).max(1);

const bboxSchema = z
  .object({ x0: unit, y0: unit, x1: unit, y1: unit, page: z.number().int().nonnegative() })
  .refine((b) => b.x0 <= b.x1 && b.y0 <= b.y1, { message: "expected x0<=x1 and y0<=y1" });

const blockSchema = z.object({
  id: z.string().min(1),
  text: z.string(),
  bbox: bboxSchema,
  confidence: z.number().min(0).max(100).default(100),
  font_size: z.number().positive().nullish().transform((v) => v ?? undefined),
  is_bold: z.boolean().default(false),
  // older IR dumps tag large text as "title"
  block_type: z.preprocess((v) => (v === "title" ? "header" : v), z.enum(["text", "header", "number"]).default("text")),
});

const layoutSchema = z
  .object({
    filename: z.string().optional(),
    page_count: z.number().int().positive(),
    page_dimensions: z.array(z.tuple([z.number(), z.number()])).default([]),
    blocks: z.array(blockSchema),
    layout_hash: z.string().optional(),
    warnings: z.array(z.string()).optional(),
  })
  .superRefine((layout, ctx) => {
    const seen = new Set<string>();
    layout.blocks.forEach((b, i) => {
      if (b.bbox.page >= layout.page_count) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["blocks", i, "bbox", "page"], message: `page ${b.bbox.page} outside page_count ${layout.page_count}` });
      }
      if (seen.has(b.id)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["blocks", i, "id"], message: `duplicate block id '${b.id}'` });
      }
      seen.add(b.id);
    });
  });

const anchorSchema = z.object({
  name: z.string().min(1),
  patterns: z.array(z.string().min(1)).min(1),
  pattern_type: z.enum(["exact", "contains", "regex"]).default("contains"),
  location_hint: z
    .enum(["first_occurrence", "second_occurrence", "last_occurrence", "top_third", "top_half", "bottom_half", "left_half", "right_half"])
    .nullish()
    .transform((v) => v ?? undefined),
  required: z.boolean().default(true),
  role: z.enum(["column_header", "row_label"]).optional(),
});

const regionSchema = z.object({
  name: z.string().min(1),
  start_anchor: z.string().min(1),
  end_anchor: z.string().min(1),
  region_type: z.enum(["table", "list", "key_value"]).default("table"),
  header_anchors: z.array(z.string()).optional(),
});

const opSchema = z.object({
  field_path: z.string().min(1),
  source: z.string().min(1),
  transform: z
    .enum(["to_int", "to_float", "strip", "upper", "lower", "last_name_only"])
    .nullish()
    .transform((v) => v ?? undefined),
});

const calculationSchema = z.object({
  field_path: z.string().min(1),
  formula: z.string().min(1),
  description: z.string().nullish().transform((v) => v ?? undefined),
});

const validationSchema = z.object({
  name: z.string().min(1),
  predicate: z.string().min(1),
  severity: z.enum(["error", "warning"]).default("error"),
});

const processorSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  document_type: z.string().default("generic"),
  version: z.number().int().positive().default(1),
  created_at: z.string().default(() => new Date().toISOString()),
  updated_at: z.string().default(() => new Date().toISOString()),
  layout_hash: z.string().nullish().transform((v) => v ?? undefined),
  text_patterns: z.array(z.string()).default([]),
  anchors: z.array(anchorSchema).default([]),
  regions: z.array(regionSchema).default([]),
  extraction_ops: z.array(opSchema).default([]),
  calculations: z.array(calculationSchema).default([]),
  validations: z.array(validationSchema).default([]),
  field_column_map: z.record(z.string()).nullish().transform((v) => v ?? undefined),
});

type Json = Record<string, unknown>;
const isRecord = (v: unknown): v is Json => typeof v === "object" && v !== null && !Array.isArray(v);

// Synthesized processors written before the rename use `field`, `check` and `field_column_mapping`.
function migrateLegacyKeys(raw: unknown): unknown {
  if (!isRecord(raw)) return raw;
  const out: Json = { ...raw };
  if (out.field_column_map === undefined && out.field_column_mapping !== undefined) {
    out.field_column_map = out.field_column_mapping;
  }
  delete out.field_column_mapping;
  if (Array.isArray(out.calculations)) {
    out.calculations = out.calculations.map((c: unknown) =>
      isRecord(c) && c.field_path === undefined ? { ...c, field_path: c.field } : c
    );
  }
  if (Array.isArray(out.validations)) {
    out.validations = out.validations.map((v: unknown) =>
      isRecord(v) && v.predicate === undefined ? { ...v, predicate: v.check } : v
    );
  }
  return out;
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((i) => (i.path.length ? `${i.path.join(".")}: ${i.message}` : i.message));
}

function readJson(input: unknown, onError: (msg: string) => Error): unknown {
  if (typeof input !== "string") return input;
  try {
    return JSON.parse(input);
  } catch (e: unknown) {
    throw onError(`invalid JSON: ${e instanceof Error ? e.message : String(e)}`);
  }
}

/** Referential integrity between regions and anchors, plus name uniqueness and regex syntax. */
export function checkProcessorIntegrity(p: Processor): string[] {
  const issues: string[] = [];
  const anchors = new Set<string>();
  for (const a of p.anchors) {
    if (!isName(a.name)) issues.push(`invalid anchor name '${a.name}'`);
    if (anchors.has(a.name)) issues.push(`duplicate anchor name '${a.name}'`);
    anchors.add(a.name);
    if (a.pattern_type === "regex") {
      for (const pattern of a.patterns) {
        try {
          new RegExp(pattern, "i");
        } catch {
          issues.push(`anchor '${a.name}' has invalid regex '${pattern}'`);
        }
      }
    }
  }
  const regions = new Set<string>();
  for (const r of p.regions) {
    if (!isName(r.name)) issues.push(`invalid region name '${r.name}'`);
    if (regions.has(r.name)) issues.push(`duplicate region name '${r.name}'`);
    regions.add(r.name);
    if (!anchors.has(r.start_anchor)) {
      issues.push(`region '${r.name}' references undeclared start_anchor '${r.start_anchor}'`);
    }
    if (r.end_anchor !== END_OF_DOCUMENT && !anchors.has(r.end_anchor)) {
      issues.push(`region '${r.name}' references undeclared end_anchor '${r.end_anchor}'`);
    }
    for (const h of r.header_anchors ?? []) {
      if (!anchors.has(h)) issues.push(`region '${r.name}' references undeclared header anchor '${h}'`);
    }
  }
  for (const fieldPath of [...p.extraction_ops, ...p.calculations].map((o) => o.field_path)) {
    try {
      parsePath(fieldPath);
    } catch (err) {
      issues.push(err instanceof Error ? err.message : String(err));
    }
  }
  return issues;
}

export function parseProcessor(input: unknown): Processor {
  const raw = readJson(input, (msg) => new ProcessorSpecError([msg]));
  const parsed = processorSchema.safeParse(migrateLegacyKeys(raw));
  if (!parsed.success) throw new ProcessorSpecError(formatIssues(parsed.error));
  const processor: Processor = parsed.data;
  const issues = checkProcessorIntegrity(processor);
  if (issues.length) throw new ProcessorSpecError(issues);
  return processor;
}

export function serializeProcessor(p: Processor): string {
  // Re-parsing fixes key order so equal processors serialize identically.
  return JSON.stringify(processorSchema.parse(p), null, 2);
}

export function parseLayout(input: unknown, fingerprintBlocks?: number): DocumentLayout {
  const raw = readJson(input, (msg) => new LayoutInputError([msg]));
  const parsed = layoutSchema.safeParse(raw);
  if (!parsed.success) throw new LayoutInputError(formatIssues(parsed.error));
  const l = parsed.data;
  const dims = l.page_dimensions.length
    ? l.page_dimensions
    : Array.from({ length: l.page_count }, (): [number, number] => [1, 1]);
  return {
    filename: l.filename,
    page_count: l.page_count,
    page_dimensions: dims,
    blocks: l.blocks,
    layout_hash: l.layout_hash ?? computeLayoutHash(l.blocks, fingerprintBlocks),
    warnings: l.warnings,
  };
}
