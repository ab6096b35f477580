import { MissingFieldError } from "../errors";
import { getLogger, type Logger } from "../logger";
import type { ExtractedData, Validation, ValidationResult } from "../types";
import { evaluate, parsePredicate, truthy } from "./predicate";

/**
 * Runs every rule against `data`; one failing rule never stops the rest. Failures go to
 * `errors` or `warnings` by severity and only errors make the result unsuccessful.
 */
export function validate(data: ExtractedData, validations: Validation[], log: Logger = getLogger("validator")): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  for (const rule of validations) {
    let failure: string | undefined;
    try {
      if (!truthy(evaluate(parsePredicate(rule.predicate), data))) failure = `Validation failed: ${rule.name}`;
    } catch (err) {
      if (err instanceof MissingFieldError) failure = `Validation '${rule.name}' failed: Missing field ${err.path}`;
      else if (err instanceof Error) failure = `Validation '${rule.name}' error: ${err.message}`;
      else throw err;
    }
    if (failure === undefined) continue;
    log.debug("validation.rule.failed", { rule: rule.name, severity: rule.severity, message: failure });
    (rule.severity === "error" ? errors : warnings).push(failure);
  }

  return { success: errors.length === 0, errors, warnings };
}
