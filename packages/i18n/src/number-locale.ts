import Decimal from "decimal.js";
import { ValueError } from "@formwire/shared-types";
import { toLanguageTag } from "./locale-tag";

export type NumberFormatSpec = Intl.NumberFormatOptions;

export interface NumberLocale {
  parseDecimal(value: string, locale: string): Decimal;
  formatDecimal(value: Decimal, format: NumberFormatSpec | null, locale: string): string;
}

interface NumberSymbols {
  group: string;
  decimal: string;
  minus: string;
}

const symbolsByLocale = new Map<string, NumberSymbols>();

function symbolsFor(locale: string): NumberSymbols {
  const cached = symbolsByLocale.get(locale);
  if (cached) return cached;

  const parts = new Intl.NumberFormat(toLanguageTag(locale), { useGrouping: true }).formatToParts(-12345.6);
  const symbols: NumberSymbols = {
    group: parts.find((part) => part.type === "group")?.value ?? ",",
    decimal: parts.find((part) => part.type === "decimal")?.value ?? ".",
    minus: parts.find((part) => part.type === "minusSign")?.value ?? "-"
  };
  symbolsByLocale.set(locale, symbols);
  return symbols;
}

/** A string `Intl.NumberFormat` formats digit for digit. */
function isPlainNumeral(text: string): text is `${number}` {
  return /^-?\d+(\.\d+)?$/.test(text);
}

function escapeRegExp(input: string): string {
  return input.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export const intlNumberLocale: NumberLocale = {
  parseDecimal(value, locale) {
    const { group, decimal, minus } = symbolsFor(locale);
    const normalized = value
      .trim()
      .replace(new RegExp(escapeRegExp(group), "g"), "")
      .replace(/\s/g, "")
      .replace(minus, "-")
      .replace(decimal, ".");
    if (!/^[+-]?(\d+(\.\d*)?|\.\d+)$/.test(normalized)) {
      throw new ValueError(`'${value}' is not a valid decimal number for locale ${locale}`);
    }
    return new Decimal(normalized);
  },

  formatDecimal(value, format, locale) {
    const formatter = new Intl.NumberFormat(toLanguageTag(locale), format ?? undefined);
    const text = value.toFixed();
    return formatter.format(isPlainNumeral(text) ? text : value.toNumber());
  }
};
