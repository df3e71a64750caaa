import { format as formatDate, isValid, parse as parseDate } from "date-fns";
import Decimal from "decimal.js";
import { ValueError } from "@formwire/shared-types";

export type Coercer<T> = (value: unknown) => T;

const INTEGER = /^[+-]?\d+$/;
const FLOAT = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;
const SPECIAL = /^([+-]?)(inf|infinity|nan)$/i;

export function parseInteger(value: string): number {
  const text = value.trim();
  if (!INTEGER.test(text)) throw new ValueError(`invalid integer literal: '${value}'`);
  const parsed = Number(text);
  if (!Number.isSafeInteger(parsed)) throw new ValueError(`integer out of range: '${value}'`);
  return parsed;
}

export function parseFloatValue(value: string): number {
  const text = value.trim();
  const special = SPECIAL.exec(text);
  if (special) {
    if (special[2]?.toLowerCase() === "nan") return Number.NaN;
    return special[1] === "-" ? -Infinity : Infinity;
  }
  if (!FLOAT.test(text)) throw new ValueError(`could not convert string to float: '${value}'`);
  return Number(text);
}

export function parseDecimalValue(value: string): Decimal {
  const text = value.trim();
  const special = SPECIAL.exec(text);
  if (special) {
    if (special[2]?.toLowerCase() === "nan") return new Decimal(Number.NaN);
    return new Decimal(special[1] === "-" ? -Infinity : Infinity);
  }
  if (!FLOAT.test(text)) throw new ValueError(`invalid decimal literal: '${value}'`);
  return new Decimal(text);
}

export function parseDateTime(value: string, pattern: string, referenceDate: Date): Date {
  const parsed = parseDate(value, pattern, referenceDate);
  if (!isValid(parsed)) throw new ValueError(`'${value}' does not match format '${pattern}'`);
  return parsed;
}

export function formatDateTime(value: Date, pattern: string): string {
  return formatDate(value, pattern);
}

export const coerceString: Coercer<string> = (value) => {
  if (value === null || value === undefined) throw new TypeError("cannot coerce an empty value to a string");
  return String(value);
};

export const coerceInteger: Coercer<number> = (value) => {
  if (typeof value === "number") {
    if (!Number.isFinite(value)) throw new ValueError(`cannot convert ${value} to integer`);
    return Math.trunc(value);
  }
  if (typeof value === "boolean") return value ? 1 : 0;
  if (typeof value === "string") return parseInteger(value);
  throw new TypeError(`cannot coerce ${typeof value} to an integer`);
};

export const coerceNumber: Coercer<number> = (value) => {
  if (typeof value === "number") return value;
  if (typeof value === "string") return parseFloatValue(value);
  throw new TypeError(`cannot coerce ${typeof value} to a number`);
};

const TRUE_STRINGS = new Set(["true", "1", "on", "yes", "y"]);
const FALSE_STRINGS = new Set(["false", "0", "off", "no", "n", ""]);

export const coerceBoolean: Coercer<boolean> = (value) => {
  if (typeof value === "boolean") return value;
  if (typeof value === "number") return value !== 0;
  if (typeof value === "string") {
    const text = value.trim().toLowerCase();
    if (TRUE_STRINGS.has(text)) return true;
    if (FALSE_STRINGS.has(text)) return false;
    throw new ValueError(`'${value}' is not a boolean`);
  }
  throw new TypeError(`cannot coerce ${typeof value} to a boolean`);
};
