/**
 * Multi-valued wire input. `URLSearchParams` satisfies this directly.
 */
export interface FormInput {
  has(key: string): boolean;
  getAll(key: string): readonly string[];
  keys(): Iterable<string>;
}

export interface Translations {
  gettext(message: string): string;
  ngettext(singular: string, plural: string, n: number): string;
}

export function isFormInput(value: unknown): value is FormInput {
  if (!value || typeof value !== "object") return false;
  return (
    "has" in value &&
    typeof value.has === "function" &&
    "getAll" in value &&
    typeof value.getAll === "function" &&
    "keys" in value &&
    typeof value.keys === "function"
  );
}

export function hasAnyKey(input: FormInput): boolean {
  for (const _key of input.keys()) return true;
  return false;
}
