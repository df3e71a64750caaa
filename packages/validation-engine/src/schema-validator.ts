import type { ZodTypeAny } from "zod";
import { invalid } from "./outcome";
import type { Validator } from "./types";

/**
 * Checks the field's coerced data against a zod schema. The first issue becomes the
 * error message unless one is given.
 */
export function matchesSchema(schema: ZodTypeAny, message?: string): Validator {
  return (_form, field) => {
    const result = schema.safeParse(field.data);
    if (result.success) return;
    const issue = result.error.issues[0];
    return invalid(field.gettext(message ?? issue?.message ?? "Invalid input."));
  };
}
