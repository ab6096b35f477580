import { z } from "zod";
import type { PlainValue } from "@layout-rules/core";

const plainValue: z.ZodType<PlainValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(plainValue), z.record(plainValue)])
);

export const validateBody = z.object({
  data: z.record(plainValue),
  validations: z.array(
    z.object({
      name: z.string().min(1),
      predicate: z.string().min(1),
      severity: z.enum(["error", "warning"]).default("error"),
    })
  ),
});

export const layoutBody = z.object({ layout: z.unknown() });

// Either a layout IR or a base64-encoded document for the layout providers.
export const executeBody = z.object({
  layout: z.unknown().optional(),
  data_base64: z.string().min(1).optional(),
  filename: z.string().optional(),
  mime: z.string().optional(),
});

export const routeBody = z.object({ layout: z.unknown(), processor_id: z.string().optional() });

export function issuesOf(error: z.ZodError): string[] {
  return error.issues.map((i) => (i.path.length ? `${i.path.join(".")}: ${i.message}` : i.message));
}
