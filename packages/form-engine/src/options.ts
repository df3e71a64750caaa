import { z, type ZodTypeAny } from "zod";
import { ConfigurationError } from "@formwire/shared-types";

const callable = z.custom<(...args: never[]) => unknown>((value) => typeof value === "function", "Expected a function");

export const baseFieldOptionsSchema = z
  .object({
    label: z.string().optional(),
    description: z.string().optional(),
    id: z.string().min(1).optional(),
    attributes: z.record(z.string()).optional()
  })
  .passthrough();

export const fieldOptionsSchema = baseFieldOptionsSchema.extend({
  validators: z.array(callable).optional(),
  filters: z.array(callable).optional()
});

export function checkOptions(schema: ZodTypeAny, options: unknown, fieldType: string): void {
  const parsed = schema.safeParse(options);
  if (parsed.success) return;
  const [issue] = parsed.error.issues;
  const path = issue && issue.path.length > 0 ? ` '${issue.path.join(".")}'` : "";
  throw new ConfigurationError(`${fieldType}: invalid option${path}: ${issue?.message ?? "unknown problem"}`);
}
