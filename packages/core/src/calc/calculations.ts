import { ExpressionError } from "../errors";
import { degrade, type EngineContext } from "../engine/context";
import { writePath, type MapNode } from "../engine/tree";
import type { Calculation } from "../types";
import { evaluateFormula, parseFormula } from "./formula";

/**
 * Evaluates calculations in declaration order against the tree built so far, so a later
 * formula can read what an earlier one wrote. A formula that fails to parse or yields a
 * non-finite number is reported and writes nothing.
 */
export function runCalculations(tree: MapNode, calculations: Calculation[], ctx: EngineContext): void {
  for (const calc of calculations) {
    let result: number;
    try {
      const ast = parseFormula(calc.formula);
      result = evaluateFormula(ast, tree, (message) =>
        degrade(ctx, "calc.value.coerced", `Calculation '${calc.field_path}': ${message}`)
      );
    } catch (err) {
      if (!(err instanceof ExpressionError)) throw err;
      degrade(ctx, "calc.formula.invalid", `Calculation '${calc.field_path}' has an invalid formula: ${err.message}`, {
        formula: calc.formula,
        position: err.position,
      });
      continue;
    }

    if (!Number.isFinite(result)) {
      degrade(ctx, "calc.result.invalid", `Calculation '${calc.field_path}' produced a non-finite result`, {
        formula: calc.formula,
      });
      continue;
    }
    const outcome = writePath(tree, calc.field_path, result);
    for (const r of outcome.replaced ?? []) {
      degrade(ctx, "write.shape_conflict", `Calculation '${calc.field_path}' replaced the ${r.kind} at '${r.path}'`, { ...r });
    }
    ctx.log.debug("calc.done", { field_path: calc.field_path, result });
  }
}
