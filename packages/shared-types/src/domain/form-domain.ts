export const UNSET: unique symbol = Symbol("formwire.unset");

export type Unset = typeof UNSET;

export type FieldDefault<T> = T | (() => T);

export type ChoiceValue = string | number | boolean;

export type Choice = readonly [value: ChoiceValue, label: string];

export interface ChoiceOption<T = ChoiceValue> {
  value: T;
  label: string;
  selected: boolean;
}

export function isUnset(value: unknown): value is Unset {
  return value === UNSET;
}

function isFactory<T>(value: FieldDefault<T>): value is () => T {
  return typeof value === "function";
}

export function resolveDefault<T>(value: FieldDefault<T>): T {
  return isFactory(value) ? value() : value;
}
