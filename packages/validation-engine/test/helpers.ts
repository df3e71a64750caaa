import type { FormLike, ValidationTarget } from "../src";

export function target(data: unknown, rawData?: readonly string[], name = "field"): ValidationTarget {
  return {
    name,
    shortName: name,
    label: name,
    data,
    rawData,
    gettext: (message) => message,
    ngettext: (singular, plural, n) => (n === 1 ? singular : plural)
  };
}

export function formOf(...fields: ValidationTarget[]): FormLike {
  return {
    getField: (name) => fields.find((field) => field.name === name)
  };
}
