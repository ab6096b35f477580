import { runCalculations } from "../calc/calculations";
import type { EngineConfig } from "../config";
import { getLogger, type Logger } from "../logger";
import type { DocumentLayout, ExecutionResult, Processor } from "../types";
import { validate } from "../validation/validator";
import { resolveAnchors } from "./anchors";
import { createContext, degrade } from "./context";
import { extractField } from "./extract";
import { resolveRegions } from "./regions";
import { createTree, treeToData, writePath } from "./tree";

export interface ExecutorOptions {
  config?: Partial<EngineConfig>;
  log?: Logger;
}

/**
 * Runs a processor against a layout: anchors, regions, extraction ops in declaration order,
 * calculations, then validation. Holds no state between calls.
 */
export class ProcessorExecutor {
  private readonly config?: Partial<EngineConfig>;
  private readonly log: Logger;

  constructor(opts: ExecutorOptions = {}) {
    this.config = opts.config;
    this.log = opts.log ?? getLogger("engine");
  }

  execute(layout: DocumentLayout, processor: Processor): ExecutionResult {
    const log = this.log.child({ processor_id: processor.id, document_id: layout.filename ?? layout.layout_hash });
    const ctx = createContext({ config: this.config, log });
    log.info("execute.start", { blocks: layout.blocks.length, ops: processor.extraction_ops.length });

    const anchors = resolveAnchors(layout, processor.anchors, ctx);
    const regions = resolveRegions(layout, anchors, processor.regions, ctx);
    const resolved = { anchors, regions };

    const tree = createTree();
    for (const op of processor.extraction_ops) {
      const value = extractField(layout, processor, resolved, op, ctx);
      if (value === null) {
        degrade(ctx, "extract.field.empty", `Field '${op.field_path}' extracted no value`, { source: op.source });
        continue;
      }
      const outcome = writePath(tree, op.field_path, value);
      if (outcome.mismatch) {
        degrade(
          ctx,
          "write.length_mismatch",
          `Field '${op.field_path}': ${outcome.mismatch.values} values for ${outcome.mismatch.sequence} records`,
          { ...outcome.mismatch }
        );
      }
      for (const r of outcome.replaced ?? []) {
        degrade(ctx, "write.shape_conflict", `Field '${op.field_path}' replaced the ${r.kind} at '${r.path}'`, { ...r });
      }
    }

    runCalculations(tree, processor.calculations, ctx);
    const data = treeToData(tree);
    const validation = validate(data, processor.validations, log);

    const status = validation.success && ctx.warnings.length === 0 ? "ok" : "needs_review";
    log.info("execute.done", {
      status,
      errors: validation.errors.length,
      warnings: ctx.warnings.length + validation.warnings.length,
    });

    return {
      processor_id: processor.id,
      data,
      validation,
      anchors: Object.fromEntries(Array.from(anchors, ([name, block]) => [name, block.id])),
      regions: Object.fromEntries(Array.from(regions, ([name, blocks]) => [name, blocks.length])),
      warnings: ctx.warnings,
      status,
    };
  }
}
